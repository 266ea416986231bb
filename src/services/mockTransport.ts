import {
    ACK_MARKER,
    ADC_OFF_COMMAND,
    ADC_ON_COMMAND,
    ADC_READ_COMMAND,
} from '@/constants/control';
import type { Position } from '@/types';

import type { DisconnectHandler, LineHandler, LineTransport } from './lineTransport';
import { parseMoveCommand } from './stageProtocol';

export type MockSignal = (position: Position) => number;

export interface MockStageOptions {
    /** Where the simulated motors are when the port opens. */
    origin?: Position;
    signal?: MockSignal;
    /** Emit a firmware debug line before every reply. */
    chatter?: boolean;
}

export interface MockStageSnapshot {
    position: Position;
    speed: number;
    settleDelayMs: number;
    adcEnabled: boolean;
}

const SET_COMMAND_PATTERN = /^set\s+(speed|tau)=(\d+)$/;

/** A bright spot around (100, 100) on a flat background. */
export const defaultMockSignal: MockSignal = ({ x, y }) => {
    const dx = x - 100;
    const dy = y - 100;
    return Math.round(100 + 900 * Math.exp(-(dx * dx + dy * dy) / 50));
};

/**
 * In-process stand-in for the stage firmware, selected by a `mock://` port.
 * Replies are emitted synchronously from `write`, before it resolves.
 */
export class MockStageTransport implements LineTransport {
    private readonly signal: MockSignal;

    private readonly chatter: boolean;

    private readonly handlers = new Set<LineHandler>();

    private readonly disconnectHandlers = new Set<DisconnectHandler>();

    private opened = false;

    private position: Position;

    private speed = 0;

    private settleDelayMs = 0;

    private adcEnabled = false;

    constructor(options: MockStageOptions = {}) {
        this.signal = options.signal ?? defaultMockSignal;
        this.chatter = options.chatter ?? false;
        this.position = { ...(options.origin ?? { x: 0, y: 0 }) };
    }

    public open(): Promise<void> {
        this.opened = true;
        return Promise.resolve();
    }

    public close(): Promise<void> {
        this.opened = false;
        return Promise.resolve();
    }

    public isOpen(): boolean {
        return this.opened;
    }

    public onLine(handler: LineHandler): () => void {
        this.handlers.add(handler);
        return () => this.handlers.delete(handler);
    }

    public onDisconnect(handler: DisconnectHandler): () => void {
        this.disconnectHandlers.add(handler);
        return () => this.disconnectHandlers.delete(handler);
    }

    /** Behaves like a pulled USB cable: the port closes and listeners hear why. */
    public simulateDisconnect(message = 'Mock stage disconnected'): void {
        if (!this.opened) {
            return;
        }
        this.opened = false;
        const error = new Error(message);
        for (const handler of this.disconnectHandlers) {
            handler(error);
        }
    }

    public getSnapshot(): MockStageSnapshot {
        return {
            position: { ...this.position },
            speed: this.speed,
            settleDelayMs: this.settleDelayMs,
            adcEnabled: this.adcEnabled,
        };
    }

    public write(data: string): Promise<void> {
        if (!this.opened) {
            return Promise.reject(new Error('Mock stage is not open'));
        }
        for (const command of data.split(/\r?\n/)) {
            const trimmed = command.trim();
            if (trimmed.length > 0) {
                this.handleCommand(trimmed);
            }
        }
        return Promise.resolve();
    }

    private handleCommand(command: string): void {
        if (this.chatter) {
            this.emit(`dbg: rx ${command}`);
        }

        const move = parseMoveCommand(command);
        if (move) {
            this.position = {
                ...this.position,
                [move.axis]: this.position[move.axis] + move.delta,
            };
            this.emit(ACK_MARKER);
            return;
        }

        const setting = SET_COMMAND_PATTERN.exec(command);
        if (setting) {
            const value = Number.parseInt(setting[2] ?? '0', 10);
            if (setting[1] === 'speed') {
                this.speed = value;
            } else {
                this.settleDelayMs = value;
            }
            this.emit(ACK_MARKER);
            return;
        }

        switch (command) {
            case ADC_ON_COMMAND:
                this.adcEnabled = true;
                this.emit(ACK_MARKER);
                return;
            case ADC_OFF_COMMAND:
                this.adcEnabled = false;
                this.emit(ACK_MARKER);
                return;
            case ADC_READ_COMMAND:
                this.emit(`ADC: ${this.signal(this.position)}`);
                return;
            default:
                this.emit(`ERR unknown command "${command}"`);
        }
    }

    private emit(line: string): void {
        for (const handler of this.handlers) {
            handler(line);
        }
    }
}
