export type ScanFailureKind =
    | 'connection'
    | 'ack-timeout'
    | 'invalid-parameter'
    | 'busy'
    | 'aborted';

export class ScanFailure extends Error {
    public readonly kind: ScanFailureKind;

    constructor(kind: ScanFailureKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ScanFailure';
        this.kind = kind;
    }
}

/** The link cannot be opened or is not open when a command is issued. */
export class ConnectionError extends ScanFailure {
    public readonly port: string;

    constructor(port: string, message: string, options?: { cause?: unknown }) {
        super('connection', message, options);
        this.name = 'ConnectionError';
        this.port = port;
    }
}

export class AckTimeoutError extends ScanFailure {
    public readonly command: string;

    public readonly timeoutMs: number;

    constructor(command: string, timeoutMs: number) {
        super('ack-timeout', `No acknowledgement for "${command}" within ${timeoutMs} ms`);
        this.name = 'AckTimeoutError';
        this.command = command;
        this.timeoutMs = timeoutMs;
    }
}

export class InvalidParameterError extends ScanFailure {
    public readonly field: string;

    constructor(field: string, message: string) {
        super('invalid-parameter', message);
        this.name = 'InvalidParameterError';
        this.field = field;
    }
}

/** Rejects a request that would interleave with another owner of the link. */
export class ScanBusyError extends ScanFailure {
    constructor(message = 'Stage is busy with another request') {
        super('busy', message);
        this.name = 'ScanBusyError';
    }
}

export class ScanAbortError extends ScanFailure {
    constructor(message = 'Scan run aborted') {
        super('aborted', message);
        this.name = 'ScanAbortError';
    }
}

export const isScanFailure = (error: unknown): error is ScanFailure =>
    error instanceof ScanFailure;
