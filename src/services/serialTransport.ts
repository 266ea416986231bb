import { ReadlineParser, SerialPort } from 'serialport';

import type { SerialPortSummary } from '@/types';

import type {
    DisconnectHandler,
    LineHandler,
    LineTransport,
    TransportRequest,
} from './lineTransport';

export interface SerialPortRequest extends TransportRequest {
    autoOpen: false;
}

export type SerialPortFactory = (request: SerialPortRequest) => SerialPort;

const defaultPortFactory: SerialPortFactory = (request) => new SerialPort(request);

const toError = (value: unknown, fallback: string): Error =>
    value instanceof Error ? value : new Error(fallback);

export class SerialLineTransport implements LineTransport {
    private readonly request: TransportRequest;

    private readonly createPort: SerialPortFactory;

    private port: SerialPort | null = null;

    private parser: ReadlineParser | null = null;

    /** Set once the current port has been reported lost; cleared by the next open. */
    private lost = false;

    private readonly handlers = new Set<LineHandler>();

    private readonly disconnectHandlers = new Set<DisconnectHandler>();

    constructor(request: TransportRequest, createPort: SerialPortFactory = defaultPortFactory) {
        this.request = request;
        this.createPort = createPort;
    }

    public async open(): Promise<void> {
        if (this.isOpen()) {
            return;
        }
        if (this.port) {
            await this.close();
        }
        const port = this.createPort({
            path: this.request.path,
            baudRate: this.request.baudRate,
            autoOpen: false,
        });
        const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
        parser.on('data', (chunk: unknown) => {
            const line = typeof chunk === 'string' ? chunk : String(chunk);
            for (const handler of this.handlers) {
                handler(line);
            }
        });

        // A stream error without a listener would be rethrown by Node.
        port.on('error', (error: unknown) => {
            this.handlePortLost(port, toError(error, `Serial port ${this.request.path} failed`));
        });
        // Emitted with a DisconnectedError when the device is unplugged.
        port.on('close', (error?: unknown) => {
            this.handlePortLost(
                port,
                toError(error, `Serial port ${this.request.path} closed unexpectedly`),
            );
        });

        return new Promise<void>((resolve, reject) => {
            port.open((error) => {
                if (error) {
                    parser.removeAllListeners();
                    port.removeAllListeners();
                    reject(error);
                    return;
                }
                this.port = port;
                this.parser = parser;
                this.lost = false;
                resolve();
            });
        });
    }

    public close(): Promise<void> {
        const port = this.port;
        this.port = null;
        this.parser?.removeAllListeners();
        this.parser = null;
        if (!port || !port.isOpen) {
            return Promise.resolve();
        }
        return new Promise<void>((resolve, reject) => {
            port.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                resolve();
            });
        });
    }

    public write(data: string): Promise<void> {
        const port = this.port;
        if (!port || this.lost) {
            return Promise.reject(new Error(`Serial port ${this.request.path} is not open`));
        }
        return new Promise<void>((resolve, reject) => {
            port.write(data, (writeError) => {
                if (writeError) {
                    reject(writeError);
                    return;
                }
                port.drain((drainError) => {
                    if (drainError) {
                        reject(drainError);
                        return;
                    }
                    resolve();
                });
            });
        });
    }

    public isOpen(): boolean {
        return Boolean(this.port?.isOpen) && !this.lost;
    }

    public onLine(handler: LineHandler): () => void {
        this.handlers.add(handler);
        return () => this.handlers.delete(handler);
    }

    public onDisconnect(handler: DisconnectHandler): () => void {
        this.disconnectHandlers.add(handler);
        return () => this.disconnectHandlers.delete(handler);
    }

    /**
     * Reports the loss once. The port is kept so that `close()` still releases
     * it after an error; events from a port closed on purpose are ignored.
     */
    private handlePortLost(port: SerialPort, error: Error): void {
        if (this.port !== port || this.lost) {
            return;
        }
        this.lost = true;
        for (const handler of this.disconnectHandlers) {
            handler(error);
        }
    }
}

export const listSerialPorts = async (): Promise<SerialPortSummary[]> => {
    const ports = await SerialPort.list();
    return ports.map((port) => ({
        path: port.path,
        manufacturer: port.manufacturer,
        serialNumber: port.serialNumber,
    }));
};
