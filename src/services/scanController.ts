import { ADC_OFF_COMMAND, ADC_ON_COMMAND } from '@/constants/control';
import {
    DEFAULT_SCAN_CONTROLLER_SETTINGS,
    DEFAULT_SCAN_PARAMETERS,
    DEFAULT_WORKSPACE_SIZE,
    type ScanControllerSettings,
} from '@/constants/scan';
import { computeScanBounds } from '@/overlays/builders';
import type { ScanBounds } from '@/overlays/types';
import type {
    Axis,
    JogDirection,
    Position,
    ScanControllerState,
    ScanOutcome,
    ScanParameters,
    ScanRunResult,
} from '@/types';
import { extractScanErrorDetail } from '@/utils/commandErrors';

import { LogStore, type ScanLogger } from './logStore';
import { MeasurementGrid, NO_DATA, type MeasurementGridView } from './measurementGrid';
import {
    AckTimeoutError,
    ConnectionError,
    InvalidParameterError,
    ScanAbortError,
    ScanBusyError,
} from './scanErrors';
import { computeRasterCount, validateRegion, validateScanParameters } from './scanParameters';
import type { StageLink } from './stageLink';
import {
    formatMoveCommand,
    formatSettleDelayCommand,
    formatSpeedCommand,
} from './stageProtocol';

export interface ScanControllerParams {
    link: StageLink;
    parameters?: ScanParameters;
    /** Side length of the square workspace the grid covers. */
    gridSize?: number;
    /** Stage position when the controller is created; defaults to the scan center. */
    initialPosition?: Position;
    settings?: Partial<ScanControllerSettings>;
    logger?: ScanLogger;
}

export type SampleWrittenListener = (position: Position, grid: MeasurementGridView) => void;

type StateListener = (state: ScanControllerState) => void;

type BoundsListener = (bounds: ScanBounds) => void;

type PositionListener = (position: Position) => void;

/** Who currently drives the link. */
type LinkOwner = 'scan' | 'manual';

interface ScanRun {
    parameters: ScanParameters;
    aborted: boolean;
    row: number;
    col: number;
    visited: number;
    missed: number;
}

const LOG_SCOPE = 'scan';

const cloneParameters = (params: ScanParameters): ScanParameters => ({
    ...params,
    center: { ...params.center },
});

export const createIdleScanState = (): ScanControllerState => ({
    phase: 'idle',
    outcome: null,
    progress: { total: 0, visited: 0, missed: 0 },
    activeCell: null,
    error: null,
});

/**
 * Raster scan state machine over a `StageLink`.
 *
 * The stage never reports where it is, so the controller dead-reckons the
 * position from acknowledged moves only. Every command goes out one at a time
 * and waits for its reply before the next one is sent.
 */
export class ScanController {
    private readonly link: StageLink;

    private readonly settings: ScanControllerSettings;

    private readonly logger: ScanLogger;

    private readonly grid: MeasurementGrid;

    private parameters: ScanParameters;

    private position: Position;

    private state: ScanControllerState = createIdleScanState();

    private owner: LinkOwner | null = null;

    private activeRun: ScanRun | null = null;

    private readonly sampleListeners = new Set<SampleWrittenListener>();

    private readonly stateListeners = new Set<StateListener>();

    private readonly boundsListeners = new Set<BoundsListener>();

    private readonly positionListeners = new Set<PositionListener>();

    constructor(params: ScanControllerParams) {
        this.link = params.link;
        this.settings = { ...DEFAULT_SCAN_CONTROLLER_SETTINGS, ...params.settings };
        this.logger = params.logger ?? new LogStore();
        this.grid = new MeasurementGrid(params.gridSize ?? DEFAULT_WORKSPACE_SIZE);
        this.parameters = cloneParameters(
            validateScanParameters(params.parameters ?? DEFAULT_SCAN_PARAMETERS),
        );
        const initial = params.initialPosition ?? this.parameters.center;
        this.position = { x: initial.x, y: initial.y };
    }

    // ---------------------------------------------------------------------
    // Parameters and read-only accessors
    // ---------------------------------------------------------------------

    /** Replaces the live parameters; invalid input leaves them unchanged. */
    public configure(params: ScanParameters): void {
        this.parameters = cloneParameters(validateScanParameters(params));
        this.emitBounds();
    }

    /** Live edit of the scan region, e.g. while the user types. */
    public updateRegion(center: Position, extension: number): void {
        validateRegion(center, extension);
        this.parameters = {
            ...this.parameters,
            center: { x: center.x, y: center.y },
            extension,
        };
        this.emitBounds();
    }

    public getParameters(): ScanParameters {
        return cloneParameters(this.parameters);
    }

    public getBounds(): ScanBounds {
        return computeScanBounds(this.parameters.center, this.parameters.extension);
    }

    public currentPosition(): Position {
        return { ...this.position };
    }

    public getGrid(): MeasurementGridView {
        return this.grid;
    }

    public snapshotGrid(): number[][] {
        return this.grid.snapshot();
    }

    public clearGrid(): void {
        if (this.activeRun) {
            throw new ScanBusyError('Cannot clear the grid while a scan is running');
        }
        this.grid.clear();
    }

    public getState(): ScanControllerState {
        return this.state;
    }

    public isScanning(): boolean {
        return this.activeRun !== null;
    }

    // ---------------------------------------------------------------------
    // Subscriptions
    // ---------------------------------------------------------------------

    public onSampleWritten(listener: SampleWrittenListener): () => void {
        this.sampleListeners.add(listener);
        return () => this.sampleListeners.delete(listener);
    }

    public onStateChange(listener: StateListener): () => void {
        this.stateListeners.add(listener);
        listener(this.state);
        return () => this.stateListeners.delete(listener);
    }

    public onBoundsChange(listener: BoundsListener): () => void {
        this.boundsListeners.add(listener);
        listener(this.getBounds());
        return () => this.boundsListeners.delete(listener);
    }

    /** Fires after every acknowledged move, inside the grid or not. */
    public onPositionChange(listener: PositionListener): () => void {
        this.positionListeners.add(listener);
        listener(this.currentPosition());
        return () => this.positionListeners.delete(listener);
    }

    // ---------------------------------------------------------------------
    // Control
    // ---------------------------------------------------------------------

    public startScan(): Promise<ScanRunResult> {
        if (this.owner === 'scan') {
            return Promise.reject(new ScanBusyError('A scan is already running'));
        }
        if (this.owner === 'manual') {
            return Promise.reject(new ScanBusyError('A manual move is in progress'));
        }
        if (!this.link.isOpen()) {
            const { port } = this.link.getState();
            return Promise.reject(
                new ConnectionError(port, `Cannot start scan: ${port} is not open`),
            );
        }
        const parameters = cloneParameters(this.parameters);
        if (parameters.extension <= 0) {
            return Promise.reject(
                new InvalidParameterError('extension', 'Scan extension must be greater than 0'),
            );
        }

        const run: ScanRun = {
            parameters,
            aborted: false,
            row: 0,
            col: 0,
            visited: 0,
            missed: 0,
        };
        const count = computeRasterCount(parameters.extension, parameters.stepsize);
        this.owner = 'scan';
        this.activeRun = run;
        this.updateState({
            phase: 'configuring',
            outcome: null,
            progress: { total: count * count, visited: 0, missed: 0 },
            activeCell: null,
            error: null,
        });
        this.logger.logInfo(LOG_SCOPE, 'Scan started', {
            extension: parameters.extension,
            center: parameters.center,
            stepsize: parameters.stepsize,
            points: count * count,
        });
        return this.execute(run);
    }

    /**
     * Requests a stop at the next column boundary. Moves already sent are not
     * undone. Returns false when no run is active.
     */
    public abort(): boolean {
        const run = this.activeRun;
        if (!run || run.aborted) {
            return false;
        }
        run.aborted = true;
        this.logger.logInfo(LOG_SCOPE, 'Abort requested', { row: run.row, col: run.col });
        return true;
    }

    /** Manual jog by one stepsize; rejected while a scan or another move holds the link. */
    public jog(axis: Axis, direction: JogDirection): Promise<boolean> {
        return this.moveAxis(axis, direction * this.parameters.stepsize);
    }

    /**
     * Relative move outside a scan. Resolves false when the stage does not
     * acknowledge, in which case the tracked position is unchanged.
     */
    public async moveAxis(axis: Axis, delta: number): Promise<boolean> {
        if (delta === 0) {
            return true;
        }
        if (this.owner !== null) {
            throw new ScanBusyError(
                this.owner === 'scan'
                    ? 'Cannot move while a scan is running'
                    : 'Another manual move is in progress',
            );
        }
        this.owner = 'manual';
        try {
            return await this.performMove(axis, delta);
        } finally {
            this.owner = null;
        }
    }

    // ---------------------------------------------------------------------
    // Run
    // ---------------------------------------------------------------------

    private async execute(run: ScanRun): Promise<ScanRunResult> {
        try {
            try {
                await this.runInternal(run);
            } catch (error) {
                if (error instanceof ScanAbortError) {
                    this.updateState({ phase: 'aborted', activeCell: null });
                    this.logger.logWarning(LOG_SCOPE, 'Scan aborted', {
                        row: run.row,
                        col: run.col,
                        position: this.currentPosition(),
                    });
                    return this.finishRun(run, 'aborted', null);
                }
                const detail = extractScanErrorDetail(error, { position: this.currentPosition() });
                this.updateState({ phase: 'failed', activeCell: null, error: detail.message });
                this.logger.logError(LOG_SCOPE, detail.message, { ...detail });
                return this.finishRun(run, 'failed', detail.message);
            }
            this.logger.logInfo(LOG_SCOPE, 'Scan completed', {
                visited: run.visited,
                missed: run.missed,
            });
            return this.finishRun(run, 'completed', null);
        } finally {
            this.releaseRun(run);
        }
    }

    private async runInternal(run: ScanRun): Promise<void> {
        const { parameters } = run;

        // === CONFIGURE ===
        await this.sendAndConfirm(formatSpeedCommand(parameters.speed));
        await this.sendAndConfirm(formatSettleDelayCommand(parameters.delayMs));

        // === HOME: center, then the first corner ===
        this.updateState({ phase: 'homing' });
        this.checkContinue(run);
        await this.requireMove('x', parameters.center.x - this.position.x);
        this.checkContinue(run);
        await this.requireMove('y', parameters.center.y - this.position.y);
        this.checkContinue(run);
        await this.requireMove('x', -parameters.extension);
        this.checkContinue(run);
        await this.requireMove('y', -parameters.extension);
        this.checkContinue(run);
        await this.sendAndConfirm(ADC_ON_COMMAND);

        // === SCAN ===
        this.updateState({ phase: 'scanning' });
        await this.scanRaster(run);

        // === RETURN ===
        this.updateState({ phase: 'returning', activeCell: null });
        await this.returnToCenter(parameters.center);
    }

    private async scanRaster(run: ScanRun): Promise<void> {
        const { extension, stepsize } = run.parameters;
        const count = computeRasterCount(extension, stepsize);
        for (let row = 0; row < count; row += 1) {
            let columnsVisited = 0;
            for (let col = 0; col < count; col += 1) {
                this.checkContinue(run);
                run.row = row;
                run.col = col;
                this.updateState({ activeCell: { row, col } });
                await this.sampleCurrentPosition(run);
                columnsVisited += 1;
                this.checkContinue(run);
                await this.requireMove('x', stepsize);
            }
            await this.requireMove('x', -stepsize * columnsVisited);
            if (row < count - 1) {
                await this.requireMove('y', stepsize);
            }
        }
    }

    private async sampleCurrentPosition(run: ScanRun): Promise<void> {
        const value = await this.link.requestAdcValue(
            this.settings.sampleTimeoutMs + run.parameters.delayMs,
        );
        const position = this.currentPosition();
        if (value === null) {
            this.ensureConnected();
            run.missed += 1;
            this.logger.logWarning(LOG_SCOPE, 'Sample missed, recording no data', {
                position,
                row: run.row,
                col: run.col,
            });
        }
        run.visited += 1;

        const blockSize = this.settings.fillSampleBlock ? run.parameters.stepsize : 1;
        const written = this.grid.writeBlock(position, blockSize, value ?? NO_DATA);

        this.updateState({
            progress: { ...this.state.progress, visited: run.visited, missed: run.missed },
        });
        if (written === 0) {
            return;
        }
        this.notify(this.sampleListeners, 'Sample listener failed', (listener) =>
            listener(position, this.grid),
        );
    }

    /** Failures on the way back are logged; the run still counts as completed. */
    private async returnToCenter(center: Position): Promise<void> {
        await this.attemptReturnStep(`"${ADC_OFF_COMMAND}"`, async () => {
            await this.link.sendCommand(ADC_OFF_COMMAND);
            return this.link.waitForAck(this.settings.ackTimeoutMs);
        });
        await this.attemptReturnStep('return to center on x', () =>
            this.performMove('x', center.x - this.position.x),
        );
        await this.attemptReturnStep('return to center on y', () =>
            this.performMove('y', center.y - this.position.y),
        );
    }

    private async attemptReturnStep(label: string, step: () => Promise<boolean>): Promise<void> {
        try {
            if (!(await step())) {
                this.logger.logWarning(LOG_SCOPE, `No acknowledgement for ${label}`, {
                    position: this.currentPosition(),
                });
            }
        } catch (error) {
            const detail = extractScanErrorDetail(error, { position: this.currentPosition() });
            this.logger.logWarning(LOG_SCOPE, `Failed ${label}: ${detail.message}`, { ...detail });
        }
    }

    // ---------------------------------------------------------------------
    // Link requests
    // ---------------------------------------------------------------------

    private async sendAndConfirm(command: string): Promise<void> {
        await this.link.sendCommand(command);
        if (!(await this.link.waitForAck(this.settings.ackTimeoutMs))) {
            this.ensureConnected();
            throw new AckTimeoutError(command, this.settings.ackTimeoutMs);
        }
    }

    private async requireMove(axis: Axis, delta: number): Promise<void> {
        if (!(await this.performMove(axis, delta))) {
            throw new AckTimeoutError(formatMoveCommand(axis, delta), this.settings.moveAckTimeoutMs);
        }
    }

    /** Updates the tracked position only when the stage acknowledges the move. */
    private async performMove(axis: Axis, delta: number): Promise<boolean> {
        if (delta === 0) {
            return true;
        }
        const command = formatMoveCommand(axis, delta);
        await this.link.sendCommand(command);
        if (!(await this.link.waitForAck(this.settings.moveAckTimeoutMs))) {
            this.ensureConnected();
            this.logger.logError(LOG_SCOPE, `No ACK for ${command}`, {
                position: this.currentPosition(),
            });
            return false;
        }
        if (axis === 'x') {
            this.position = { x: this.position.x + delta, y: this.position.y };
        } else {
            this.position = { x: this.position.x, y: this.position.y + delta };
        }
        const position = this.currentPosition();
        this.notify(this.positionListeners, 'Position listener failed', (listener) =>
            listener(position),
        );
        return true;
    }

    /** A wait that ended because the link dropped is a connection failure, not a timeout. */
    private ensureConnected(): void {
        if (this.link.isOpen()) {
            return;
        }
        const { port, lastError } = this.link.getState();
        throw new ConnectionError(
            port,
            lastError ? `Lost connection to ${port}: ${lastError}` : `Lost connection to ${port}`,
        );
    }

    // ---------------------------------------------------------------------
    // State
    // ---------------------------------------------------------------------

    private checkContinue(run: ScanRun): void {
        if (run.aborted) {
            throw new ScanAbortError();
        }
    }

    private finishRun(run: ScanRun, outcome: ScanOutcome, error: string | null): ScanRunResult {
        this.releaseRun(run);
        this.updateState({ phase: 'idle', outcome, activeCell: null, error });
        const result: ScanRunResult = { outcome, visited: run.visited, missed: run.missed };
        if (error !== null) {
            result.error = error;
        }
        return result;
    }

    private releaseRun(run: ScanRun): void {
        if (this.activeRun !== run) {
            return;
        }
        this.activeRun = null;
        this.owner = null;
    }

    private updateState(patch: Partial<ScanControllerState>): void {
        this.state = {
            ...this.state,
            ...patch,
            progress: patch.progress ?? this.state.progress,
        };
        const state = this.state;
        this.notify(this.stateListeners, 'State listener failed', (listener) => listener(state));
    }

    private emitBounds(): void {
        const bounds = this.getBounds();
        this.notify(this.boundsListeners, 'Bounds listener failed', (listener) =>
            listener(bounds),
        );
    }

    /** Listener errors are logged; they never end a run or skip other listeners. */
    private notify<T>(listeners: Set<T>, label: string, call: (listener: T) => void): void {
        for (const listener of listeners) {
            try {
                call(listener);
            } catch (error) {
                this.logger.logError(LOG_SCOPE, label, {
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
