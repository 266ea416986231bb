/**
 * Builder functions from scan state to overlay descriptors.
 */
import type { Position } from '@/types';

import type { Overlay, PointOverlay, RectOverlay, ScanBounds } from './types';

export const SCAN_AREA_STYLE: RectOverlay['style'] = {
    strokeColor: 'black',
    lineWidth: 1.5,
    dashed: true,
};

export const CENTER_MARKER_STYLE: PointOverlay['style'] = {
    color: 'red',
    marker: 'cross',
    size: 5,
};

export const STAGE_MARKER_STYLE: PointOverlay['style'] = {
    color: 'green',
    marker: 'dot',
    size: 8,
};

export const computeScanBounds = (center: Position, extension: number): ScanBounds => ({
    // Shifted by half a cell so the outline encloses the outer cell centers.
    lowerLeft: { x: center.x - extension - 0.5, y: center.y - extension - 0.5 },
    length: 2 * extension + 1,
    center: { x: center.x, y: center.y },
});

export const buildScanAreaOverlay = (bounds: ScanBounds): RectOverlay => ({
    type: 'rect',
    id: 'scan-area',
    bounds: {
        minX: bounds.lowerLeft.x,
        minY: bounds.lowerLeft.y,
        maxX: bounds.lowerLeft.x + bounds.length,
        maxY: bounds.lowerLeft.y + bounds.length,
    },
    style: SCAN_AREA_STYLE,
});

export const buildCenterMarkerOverlay = (bounds: ScanBounds): PointOverlay => ({
    type: 'point',
    id: 'scan-center',
    position: bounds.center,
    style: CENTER_MARKER_STYLE,
});

export const buildStageMarkerOverlay = (position: Position): PointOverlay => ({
    type: 'point',
    id: 'stage-position',
    position: { x: position.x, y: position.y },
    style: STAGE_MARKER_STYLE,
});

export interface BuildScanOverlaysParams {
    bounds: ScanBounds;
    stagePosition?: Position | null;
}

export const buildScanOverlays = ({ bounds, stagePosition }: BuildScanOverlaysParams): Overlay[] => {
    const overlays: Overlay[] = [buildScanAreaOverlay(bounds), buildCenterMarkerOverlay(bounds)];
    if (stagePosition) {
        overlays.push(buildStageMarkerOverlay(stagePosition));
    }
    return overlays;
};
