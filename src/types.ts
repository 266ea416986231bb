export type Axis = 'x' | 'y';

export type JogDirection = 1 | -1;

export interface Position {
    x: number;
    y: number;
}

export interface ScanParameters {
    /** Half-width of the square scan area, in steps. */
    extension: number;
    center: Position;
    /** Spacing between sampled points, in steps. */
    stepsize: number;
    /** Settle time the firmware waits before each sample. */
    delayMs: number;
    speed: number;
}

export interface GridCell {
    row: number;
    col: number;
}

export type ScanPhase =
    | 'idle'
    | 'configuring'
    | 'homing'
    | 'scanning'
    | 'returning'
    | 'aborted'
    | 'failed';

export type ScanOutcome = 'completed' | 'aborted' | 'failed';

export interface ScanProgress {
    total: number;
    visited: number;
    missed: number;
}

export interface ScanControllerState {
    phase: ScanPhase;
    /** Outcome of the most recent run, `null` until one has finished. */
    outcome: ScanOutcome | null;
    progress: ScanProgress;
    activeCell: GridCell | null;
    error: string | null;
}

export interface ScanRunResult {
    outcome: ScanOutcome;
    visited: number;
    missed: number;
    error?: string;
}

export type LinkStatus = 'closed' | 'opening' | 'open';

export interface LinkState {
    status: LinkStatus;
    port: string;
    baudRate: number;
    lastError?: string;
}

export interface SerialPortSummary {
    path: string;
    manufacturer?: string;
    serialNumber?: string;
}
