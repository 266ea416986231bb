/**
 * Declarative overlay descriptors for the heatmap view.
 *
 * Coordinates are stage steps. Cell centers sit on integer coordinates, so a
 * cell spans `[x - 0.5, x + 0.5]`.
 */

export interface StagePoint {
    x: number;
    y: number;
}

export interface StageBounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

// =============================================================================
// STYLE TYPES
// =============================================================================

export interface PointStyle {
    color: string;
    marker: 'cross' | 'dot';
    size: number;
}

export interface RectStyle {
    strokeColor: string;
    lineWidth: number;
    dashed?: boolean;
}

// =============================================================================
// OVERLAY TYPES (Discriminated Union)
// =============================================================================

export interface PointOverlay {
    type: 'point';
    id: string;
    position: StagePoint;
    style: PointStyle;
}

export interface RectOverlay {
    type: 'rect';
    id: string;
    bounds: StageBounds;
    style: RectStyle;
}

export type Overlay = PointOverlay | RectOverlay;

/** The scanned square, as the collaborator draws it. */
export interface ScanBounds {
    lowerLeft: StagePoint;
    /** Side length in steps (`2 · extension + 1`). */
    length: number;
    center: StagePoint;
}
