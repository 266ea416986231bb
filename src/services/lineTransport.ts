export type LineHandler = (line: string) => void;

/** Called once when the device goes away without `close()` being asked for. */
export type DisconnectHandler = (error: Error) => void;

/** Line-oriented duplex stream underneath the stage link. */
export interface LineTransport {
    open: () => Promise<void>;
    close: () => Promise<void>;
    /** Writes raw text and resolves once it has been flushed to the device. */
    write: (data: string) => Promise<void>;
    isOpen: () => boolean;
    onLine: (handler: LineHandler) => () => void;
    onDisconnect: (handler: DisconnectHandler) => () => void;
}

export interface TransportRequest {
    path: string;
    baudRate: number;
}

export type TransportFactory = (request: TransportRequest) => LineTransport;
