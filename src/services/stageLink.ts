import {
    ACK_MARKER,
    ADC_READ_COMMAND,
    ADC_VALUE_PATTERN,
    COMMAND_ACK_TIMEOUT_MS,
    DEFAULT_BAUD_RATE,
    DEFAULT_SERIAL_PORT,
    DEVICE_RESET_SETTLE_MS,
    LINE_READ_TIMEOUT_MS,
    LINE_TERMINATOR,
    MOCK_PORT_PREFIX,
    SAMPLE_TIMEOUT_MS,
} from '@/constants/control';
import type { LinkState } from '@/types';

import { classifyLine, type LineClassification } from './lineParser';
import type { LineTransport, TransportFactory } from './lineTransport';
import { LogStore, type ScanLogger } from './logStore';
import { MockStageTransport } from './mockTransport';
import { ConnectionError } from './scanErrors';
import { SerialLineTransport } from './serialTransport';

export interface StageLinkSettings {
    port: string;
    baudRate: number;
    /** Default window for `readLine` when no timeout is given. */
    readTimeoutMs: number;
    resetSettleMs: number;
    ackMarker: string;
    valuePattern: RegExp;
}

export const DEFAULT_STAGE_LINK_SETTINGS: StageLinkSettings = {
    port: DEFAULT_SERIAL_PORT,
    baudRate: DEFAULT_BAUD_RATE,
    readTimeoutMs: LINE_READ_TIMEOUT_MS,
    resetSettleMs: DEVICE_RESET_SETTLE_MS,
    ackMarker: ACK_MARKER,
    valuePattern: ADC_VALUE_PATTERN,
};

export interface StageLinkParams {
    settings?: Partial<StageLinkSettings>;
    createTransport?: TransportFactory;
    logger?: ScanLogger;
}

type StateListener = (state: LinkState) => void;

interface LineWaiter {
    wake: (arrived: boolean) => void;
}

const LOG_SCOPE = 'link';

const defaultFactory: TransportFactory = (request) =>
    request.path.startsWith(MOCK_PORT_PREFIX)
        ? new MockStageTransport()
        : new SerialLineTransport(request);

const sleep = (ms: number): Promise<void> =>
    new Promise((resolve) => {
        setTimeout(resolve, ms);
    });

/**
 * Framing and response classification over the stage's line-oriented serial
 * stream. One caller at a time: waits consume lines, and a line read while
 * waiting for something else is dropped.
 */
export class StageLink {
    private readonly settings: StageLinkSettings;

    private readonly createTransport: TransportFactory;

    private readonly logger: ScanLogger;

    private transport: LineTransport | null = null;

    private detachTransport: (() => void) | null = null;

    private readonly lineQueue: string[] = [];

    private waiter: LineWaiter | null = null;

    private opening: Promise<void> | null = null;

    private currentState: LinkState;

    private readonly listeners = new Set<StateListener>();

    constructor(params: StageLinkParams = {}) {
        this.settings = { ...DEFAULT_STAGE_LINK_SETTINGS, ...params.settings };
        this.createTransport = params.createTransport ?? defaultFactory;
        this.logger = params.logger ?? new LogStore();
        this.currentState = {
            status: 'closed',
            port: this.settings.port,
            baudRate: this.settings.baudRate,
        };
    }

    public getState(): LinkState {
        return this.currentState;
    }

    public onStateChange(listener: StateListener): () => void {
        this.listeners.add(listener);
        listener(this.currentState);
        return () => this.listeners.delete(listener);
    }

    public isOpen(): boolean {
        return this.currentState.status === 'open' && Boolean(this.transport?.isOpen());
    }

    /** Concurrent callers share one attempt. */
    public open(): Promise<void> {
        if (this.opening) {
            return this.opening;
        }
        if (this.transport) {
            return Promise.resolve();
        }
        const attempt = this.openTransport().finally(() => {
            if (this.opening === attempt) {
                this.opening = null;
            }
        });
        this.opening = attempt;
        return attempt;
    }

    private async openTransport(): Promise<void> {
        const { port, baudRate } = this.settings;
        this.updateState({ status: 'opening', lastError: undefined });

        const transport = this.createTransport({ path: port, baudRate });
        const detachLines = transport.onLine((line) => this.handleIncoming(line));
        const detachDisconnect = transport.onDisconnect((error) =>
            this.handleDisconnect(transport, error),
        );
        const detach = () => {
            detachLines();
            detachDisconnect();
        };
        try {
            await transport.open();
        } catch (error) {
            detach();
            const message = error instanceof Error ? error.message : String(error);
            this.updateState({ status: 'closed', lastError: message });
            this.logger.logError(LOG_SCOPE, `Failed to open ${port}`, { error: message });
            throw new ConnectionError(port, `Unable to open ${port}: ${message}`, { cause: error });
        }
        this.transport = transport;
        this.detachTransport = detach;

        if (this.settings.resetSettleMs > 0) {
            await sleep(this.settings.resetSettleMs);
        }
        if (this.transport !== transport) {
            throw new ConnectionError(
                port,
                `Connection to ${port} was closed while the device was resetting`,
            );
        }
        // Whatever the board printed while resetting is not a reply to anything.
        this.lineQueue.length = 0;

        this.updateState({ status: 'open' });
        this.logger.logInfo(LOG_SCOPE, `Opened ${port} @ ${baudRate}`);
    }

    public async close(): Promise<void> {
        const transport = this.transport;
        if (!transport) {
            return;
        }
        this.transport = null;
        this.detachTransport?.();
        this.detachTransport = null;
        this.lineQueue.length = 0;
        this.wakeWaiter(false);
        try {
            await transport.close();
        } finally {
            this.updateState({ status: 'closed' });
            this.logger.logInfo(LOG_SCOPE, `Closed ${this.settings.port}`);
        }
    }

    public async setPort(port: string): Promise<void> {
        const wasOpen = this.transport !== null;
        if (wasOpen) {
            await this.close();
        }
        this.settings.port = port;
        this.updateState({ port });
        this.logger.logInfo(LOG_SCOPE, `Port set to ${port}`);
        if (wasOpen) {
            await this.open();
        }
    }

    public async sendCommand(text: string): Promise<void> {
        const transport = this.transport;
        if (!transport || !transport.isOpen()) {
            throw new ConnectionError(
                this.settings.port,
                `Cannot send "${text}": ${this.settings.port} is not open`,
            );
        }
        try {
            await transport.write(`${text}${LINE_TERMINATOR}`);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConnectionError(
                this.settings.port,
                `Failed to write "${text}" to ${this.settings.port}: ${message}`,
                { cause: error },
            );
        }
        this.logger.logInfo(LOG_SCOPE, `>>> ${text}`);
    }

    /**
     * Resolves with the next non-empty line, or `null` once the wall-clock
     * deadline passes. Blank lines are skipped without extending the deadline.
     */
    public async readLine(timeoutMs: number = this.settings.readTimeoutMs): Promise<string | null> {
        const deadline = Date.now() + timeoutMs;
        for (;;) {
            const next = this.lineQueue.shift();
            if (next !== undefined) {
                const line = next.trim();
                if (line.length > 0) {
                    this.logger.logInfo(LOG_SCOPE, `<<< ${line}`);
                    return line;
                }
                continue;
            }
            const remaining = deadline - Date.now();
            if (remaining <= 0 || !this.transport) {
                return null;
            }
            const arrived = await this.waitForIncoming(remaining);
            if (!arrived && this.lineQueue.length === 0) {
                return null;
            }
        }
    }

    public async waitForAck(timeoutMs: number = COMMAND_ACK_TIMEOUT_MS): Promise<boolean> {
        const result = await this.waitForClassified('ack', timeoutMs);
        return result !== null;
    }

    public async waitForAdcValue(timeoutMs: number = SAMPLE_TIMEOUT_MS): Promise<number | null> {
        const result = await this.waitForClassified('sample', timeoutMs);
        return result?.kind === 'sample' ? result.value : null;
    }

    /** A miss is logged and reported as `null`; it is never thrown. */
    public async requestAdcValue(timeoutMs: number = SAMPLE_TIMEOUT_MS): Promise<number | null> {
        await this.sendCommand(ADC_READ_COMMAND);
        const value = await this.waitForAdcValue(timeoutMs);
        if (value === null) {
            this.logger.logWarning(LOG_SCOPE, 'Failed to read ADC value', { timeoutMs });
        }
        return value;
    }

    private async waitForClassified(
        kind: LineClassification['kind'],
        timeoutMs: number,
    ): Promise<LineClassification | null> {
        const deadline = Date.now() + timeoutMs;
        for (;;) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                return null;
            }
            const line = await this.readLine(remaining);
            if (line === null) {
                return null;
            }
            const classified = classifyLine(line, {
                ackMarker: this.settings.ackMarker,
                valuePattern: this.settings.valuePattern,
            });
            if (classified.kind === kind) {
                return classified;
            }
        }
    }

    private waitForIncoming(timeoutMs: number): Promise<boolean> {
        this.wakeWaiter(false);
        return new Promise<boolean>((resolve) => {
            const timer = setTimeout(() => {
                if (this.waiter === waiter) {
                    this.waiter = null;
                }
                resolve(false);
            }, timeoutMs);
            const waiter: LineWaiter = {
                wake: (arrived) => {
                    clearTimeout(timer);
                    resolve(arrived);
                },
            };
            this.waiter = waiter;
        });
    }

    private wakeWaiter(arrived: boolean): void {
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.wake(arrived);
    }

    private handleDisconnect(transport: LineTransport, error: Error): void {
        if (this.transport !== transport) {
            return;
        }
        this.transport = null;
        this.detachTransport?.();
        this.detachTransport = null;
        this.lineQueue.length = 0;
        this.wakeWaiter(false);
        this.updateState({ status: 'closed', lastError: error.message });
        this.logger.logError(LOG_SCOPE, `Lost connection to ${this.settings.port}`, {
            error: error.message,
        });
        transport.close().catch((closeError: unknown) => {
            this.logger.logWarning(LOG_SCOPE, `Failed to release ${this.settings.port}`, {
                error: closeError instanceof Error ? closeError.message : String(closeError),
            });
        });
    }

    private handleIncoming(line: string): void {
        this.lineQueue.push(line);
        this.wakeWaiter(true);
    }

    private updateState(patch: Partial<LinkState>): void {
        this.currentState = { ...this.currentState, ...patch };
        for (const listener of this.listeners) {
            listener(this.currentState);
        }
    }
}
