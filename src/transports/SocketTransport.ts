import net from 'net';
import { Transport } from './ITransport';
import { ConnErrorKind, ConnectionError, WriteError, WriteErrorKind } from './TransportErrors';
import { CommandChar } from '../core/Protocol';
import { ErrorClassifier } from '../core/ErrorClassifier';
import { logger } from '../utils/logger';

export interface SocketTransportOptions {
    host: string;
    port: number;
    connectTimeoutMs?: number;
    writeTimeoutMs?: number;
}

/**
 * Stream link to a wireless bridge (e.g. a serial-over-TCP module on the
 * robot). `open` only resolves after the peer has accepted the connection.
 */
export class SocketTransport implements Transport {
    public readonly kind = 'socket' as const;
    public readonly address: string;

    private socket: net.Socket | null = null;
    private closing = false;
    private error: Error | null = null;
    private readonly connectTimeoutMs: number;
    private readonly writeTimeoutMs: number;
    private closeListeners: Array<(reason: string) => void> = [];

    constructor(private readonly options: SocketTransportOptions) {
        this.address = `${options.host}:${options.port}`;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 8000;
        this.writeTimeoutMs = options.writeTimeoutMs ?? 2000;
    }

    public open(): Promise<void> {
        if (this.socket) return Promise.resolve();

        logger.info(`SocketTransport: Connecting to ${this.address}...`);
        this.closing = false;
        this.error = null;

        return new Promise<void>((resolve, reject) => {
            const socket = net.createConnection({ host: this.options.host, port: this.options.port });
            let settled = false;

            const fail = (err: ConnectionError) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                this.error = err;
                socket.destroy();
                reject(err);
            };

            const timer = setTimeout(() => {
                fail(new ConnectionError(ConnErrorKind.TIMEOUT, `Timed out connecting to ${this.address} after ${this.connectTimeoutMs}ms`));
            }, this.connectTimeoutMs);

            socket.once('error', (err) => fail(ErrorClassifier.classifyConnection(err, this.address)));

            socket.once('connect', () => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                socket.setNoDelay(true);
                socket.removeAllListeners('error');
                this.attach(socket);
                logger.info(`SocketTransport: Connected to ${this.address}`);
                resolve();
            });
        });
    }

    private attach(socket: net.Socket) {
        this.socket = socket;

        socket.on('error', (err) => {
            this.error = err;
            logger.warn(`SocketTransport: ${this.address} error: ${err.message}`);
        });

        socket.on('close', () => {
            const wasIntentional = this.closing;
            this.socket = null;
            if (wasIntentional) return;

            const reason = this.error ? this.error.message : 'peer closed the connection';
            logger.warn(`SocketTransport: Connection to ${this.address} lost (${reason})`);
            for (const listener of this.closeListeners) listener(reason);
        });
    }

    public write(char: CommandChar): Promise<void> {
        const socket = this.socket;
        if (!socket || socket.destroyed) {
            return Promise.reject(new WriteError(WriteErrorKind.NOT_OPEN, `Socket to ${this.address} is not open`));
        }

        return new Promise<void>((resolve, reject) => {
            let settled = false;
            const timer = setTimeout(() => {
                if (settled) return;
                settled = true;
                const err = new WriteError(WriteErrorKind.TIMEOUT, `Write to ${this.address} timed out after ${this.writeTimeoutMs}ms`);
                this.error = err;
                reject(err);
            }, this.writeTimeoutMs);

            socket.write(char, 'ascii', (err) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (err) {
                    const classified = ErrorClassifier.classifyWrite(err);
                    this.error = classified;
                    reject(classified);
                    return;
                }
                resolve();
            });
        });
    }

    public close(): Promise<void> {
        const socket = this.socket;
        if (!socket) return Promise.resolve();

        this.closing = true;
        return new Promise<void>((resolve) => {
            socket.once('close', () => resolve());
            socket.end();
            socket.destroy();
            logger.info(`SocketTransport: Disconnected from ${this.address}`);
        });
    }

    public isOpen(): boolean {
        return this.socket !== null && !this.socket.destroyed;
    }

    public lastError(): Error | null {
        return this.error;
    }

    public onUnexpectedClose(listener: (reason: string) => void): void {
        this.closeListeners.push(listener);
    }
}
