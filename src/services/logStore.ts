export type LogSeverity = 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    scope: string;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

export interface AppendLogParams {
    scope: string;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

/** What the link and the scan controller log through. */
export interface ScanLogger {
    logInfo: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logWarning: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
    logError: (scope: string, message: string, metadata?: Record<string, unknown>) => void;
}

export interface LogStoreOptions {
    maxEntries?: number;
    /** Mirror every entry to the console as it is appended. */
    console?: boolean;
}

type LogListener = (entry: LogEntry) => void;

export const MAX_LOG_ENTRIES = 200;

const createLogId = (() => {
    let counter = 0;
    return () => {
        counter += 1;
        return `log-${Date.now()}-${counter}`;
    };
})();

const writeToConsole = (entry: LogEntry): void => {
    const line = `[${entry.scope}] ${entry.message}`;
    const args: unknown[] = entry.metadata ? [line, entry.metadata] : [line];
    switch (entry.severity) {
        case 'error':
            console.error(...args);
            break;
        case 'warning':
            console.warn(...args);
            break;
        default:
            console.info(...args);
    }
};

export class LogStore implements ScanLogger {
    private readonly maxEntries: number;

    private readonly mirrorToConsole: boolean;

    private entries: LogEntry[] = [];

    private readonly listeners = new Set<LogListener>();

    constructor(options: LogStoreOptions = {}) {
        this.maxEntries = options.maxEntries ?? MAX_LOG_ENTRIES;
        this.mirrorToConsole = options.console ?? false;
    }

    /** Newest first. */
    public getEntries(): LogEntry[] {
        return this.entries;
    }

    public append(entry: AppendLogParams): LogEntry {
        const nextEntry: LogEntry = {
            id: createLogId(),
            scope: entry.scope,
            severity: entry.severity,
            message: entry.message,
            metadata: entry.metadata,
            timestamp: entry.timestamp ?? Date.now(),
        };
        this.entries = [nextEntry, ...this.entries].slice(0, this.maxEntries);
        if (this.mirrorToConsole) {
            writeToConsole(nextEntry);
        }
        for (const listener of this.listeners) {
            listener(nextEntry);
        }
        return nextEntry;
    }

    public clear(): void {
        this.entries = [];
    }

    public subscribe(listener: LogListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    public logInfo = (scope: string, message: string, metadata?: Record<string, unknown>) => {
        this.append({ severity: 'info', scope, message, metadata });
    };

    public logWarning = (scope: string, message: string, metadata?: Record<string, unknown>) => {
        this.append({ severity: 'warning', scope, message, metadata });
    };

    public logError = (scope: string, message: string, metadata?: Record<string, unknown>) => {
        this.append({ severity: 'error', scope, message, metadata });
    };
}
