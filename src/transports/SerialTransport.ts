import { SerialPort } from 'serialport';
import { Transport } from './ITransport';
import { ConnErrorKind, ConnectionError, WriteError, WriteErrorKind } from './TransportErrors';
import { CommandChar } from '../core/Protocol';
import { ErrorClassifier } from '../core/ErrorClassifier';
import { logger } from '../utils/logger';

/** The slice of the serialport stream API this transport relies on. */
export interface SerialLink {
    readonly isOpen: boolean;
    open(callback: (err: Error | null) => void): void;
    write(data: string, callback: (err: Error | null | undefined) => void): boolean;
    drain(callback: (err: Error | null) => void): void;
    close(callback: (err: Error | null) => void): void;
    on(event: 'close', listener: () => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface SerialLinkOptions {
    path: string;
    baudRate: number;
    autoOpen: false;
}

export type SerialLinkFactory = (options: SerialLinkOptions) => SerialLink;

export interface SerialTransportOptions {
    path: string;
    baudRate?: number;
    connectTimeoutMs?: number;
    writeTimeoutMs?: number;
    /** Swapped for `SerialPortMock` in tests. */
    factory?: SerialLinkFactory;
}

const defaultFactory: SerialLinkFactory = (options) => new SerialPort(options);

/**
 * Wired link through a serial device (an rfcomm-bound Bluetooth module or a
 * USB adapter). One byte per write, drained before the write resolves.
 */
export class SerialTransport implements Transport {
    public readonly kind = 'serial' as const;
    public readonly address: string;

    private port: SerialLink | null = null;
    private closing = false;
    private error: Error | null = null;
    private readonly baudRate: number;
    private readonly connectTimeoutMs: number;
    private readonly writeTimeoutMs: number;
    private readonly factory: SerialLinkFactory;
    private closeListeners: Array<(reason: string) => void> = [];

    constructor(options: SerialTransportOptions) {
        this.address = options.path;
        this.baudRate = options.baudRate ?? 9600;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 8000;
        this.writeTimeoutMs = options.writeTimeoutMs ?? 2000;
        this.factory = options.factory ?? defaultFactory;
    }

    public open(): Promise<void> {
        if (this.port?.isOpen) return Promise.resolve();

        logger.info(`SerialTransport: Opening ${this.address} at ${this.baudRate} baud...`);
        this.closing = false;
        this.error = null;

        const port = this.factory({ path: this.address, baudRate: this.baudRate, autoOpen: false });

        return new Promise<void>((resolve, reject) => {
            let timedOut = false;
            const timer = setTimeout(() => {
                timedOut = true;
                const timeout = new ConnectionError(
                    ConnErrorKind.TIMEOUT,
                    `Timed out connecting to ${this.address} after ${this.connectTimeoutMs}ms`
                );
                this.error = timeout;
                logger.error(`SerialTransport: ${timeout.message}`);
                reject(timeout);
            }, this.connectTimeoutMs);

            port.open((err) => {
                if (timedOut) {
                    // The caller has given up; release a device that opened late.
                    if (!err) this.release(port);
                    return;
                }
                clearTimeout(timer);

                if (err) {
                    const classified = ErrorClassifier.classifyConnection(err, this.address);
                    this.error = classified;
                    logger.error(`SerialTransport: ${classified.message}`);
                    reject(classified);
                    return;
                }

                this.attach(port);
                logger.info(`SerialTransport: Connected to ${this.address}`);
                resolve();
            });
        });
    }

    private release(port: SerialLink) {
        port.close((err) => {
            if (err) logger.warn(`SerialTransport: Could not release ${this.address} after timeout: ${err.message}`);
        });
    }

    private attach(port: SerialLink) {
        this.port = port;

        port.on('error', (err: Error) => {
            this.error = err;
            logger.warn(`SerialTransport: ${this.address} error: ${err.message}`);
        });

        port.on('close', () => {
            const wasIntentional = this.closing;
            this.port = null;
            if (wasIntentional) return;

            const reason = this.error ? this.error.message : 'device closed';
            logger.warn(`SerialTransport: ${this.address} closed unexpectedly (${reason})`);
            for (const listener of this.closeListeners) listener(reason);
        });
    }

    public write(char: CommandChar): Promise<void> {
        const port = this.port;
        if (!port || !port.isOpen) {
            return Promise.reject(new WriteError(WriteErrorKind.NOT_OPEN, `${this.address} is not open`));
        }

        return new Promise<void>((resolve, reject) => {
            let settled = false;
            const settle = (err?: Error | null) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (err) {
                    const classified = ErrorClassifier.classifyWrite(err);
                    this.error = classified;
                    reject(classified);
                } else {
                    resolve();
                }
            };

            const timer = setTimeout(() => {
                settle(new WriteError(WriteErrorKind.TIMEOUT, `Write to ${this.address} timed out after ${this.writeTimeoutMs}ms`));
            }, this.writeTimeoutMs);

            port.write(char, (writeErr) => {
                if (writeErr) {
                    settle(writeErr);
                    return;
                }
                port.drain((drainErr) => settle(drainErr));
            });
        });
    }

    public close(): Promise<void> {
        const port = this.port;
        if (!port) return Promise.resolve();

        this.closing = true;
        return new Promise<void>((resolve) => {
            port.close((err) => {
                if (err) {
                    logger.warn(`SerialTransport: Error during close of ${this.address}: ${err.message}`);
                }
                this.port = null;
                logger.info(`SerialTransport: Disconnected from ${this.address}`);
                resolve();
            });
        });
    }

    public isOpen(): boolean {
        return this.port !== null && this.port.isOpen;
    }

    public lastError(): Error | null {
        return this.error;
    }

    public onUnexpectedClose(listener: (reason: string) => void): void {
        this.closeListeners.push(listener);
    }

    public static async listPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
        const ports = await SerialPort.list();
        return ports.map(p => ({ path: p.path, manufacturer: p.manufacturer }));
    }
}
