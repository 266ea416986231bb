/**
 * Overlay descriptors for drawing the scan region and stage position on top
 * of the measurement heatmap. Rendering is left to the caller.
 */

// Types
export type {
    Overlay,
    PointOverlay,
    PointStyle,
    RectOverlay,
    RectStyle,
    ScanBounds,
    StageBounds,
    StagePoint,
} from './types';

// Builders
export {
    buildCenterMarkerOverlay,
    buildScanAreaOverlay,
    buildScanOverlays,
    buildStageMarkerOverlay,
    computeScanBounds,
} from './builders';

export type { BuildScanOverlaysParams } from './builders';
