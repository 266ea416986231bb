import type { Axis, Position } from '../types';

export interface ScanErrorDetail {
    /** Failure kind, or 'error' for anything that is not a ScanFailure. */
    kind: string;
    message: string;

    // Available when the failure belongs to a specific command or move
    command?: string;
    field?: string;
    port?: string;
    axis?: Axis;
    position?: Position;
}
