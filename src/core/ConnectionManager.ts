import { CommandGateway } from './CommandGateway';
import { ErrorClassifier } from './ErrorClassifier';
import { EventBus, eventBus } from './EventBus';
import { ConnectionConfig, ConnectionStateEvent } from './types';
import { Transport } from '../transports/ITransport';
import { ConnErrorKind, ConnectionError, WriteError } from '../transports/TransportErrors';
import { CreateTransport, createTransportFactory, describeConnection } from '../transports/TransportFactory';
import { ErrorHandler } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

export interface ConnectionManagerOptions {
    createTransport?: CreateTransport;
    bus?: EventBus;
    reconnectAttempts?: number;
    reconnectDelayMs?: number;
}

export interface ReconnectOptions {
    attempts?: number;
    delayMs?: number;
}

const RETRYABLE = new Set<ConnErrorKind>([ConnErrorKind.TIMEOUT, ConnErrorKind.NOT_FOUND]);

/**
 * Owns the link lifecycle around the gateway. Nothing here reconnects on its
 * own; `reconnect()` is an explicit request.
 */
export class ConnectionManager {
    private transport: Transport | null = null;
    private lastConfig: ConnectionConfig | null = null;
    private current: ConnectionStateEvent = { status: 'disconnected' };
    private pending: Promise<unknown> = Promise.resolve();
    private readonly createTransport: CreateTransport;
    private readonly bus: EventBus;
    private readonly reconnectAttempts: number;
    private readonly reconnectDelayMs: number;

    private readonly onFault = ({ error }: { error: WriteError }) => {
        if (!this.transport) return;
        this.setState({ status: 'error', kind: this.transport.kind, reason: `Write failed: ${error.message}` });
    };

    constructor(private readonly gateway: CommandGateway, options: ConnectionManagerOptions = {}) {
        this.bus = options.bus ?? eventBus;
        this.createTransport = options.createTransport ?? createTransportFactory({ bus: this.bus });
        this.reconnectAttempts = Math.max(1, options.reconnectAttempts ?? 3);
        this.reconnectDelayMs = Math.max(0, options.reconnectDelayMs ?? 2000);
        this.bus.on('gateway:faulted', this.onFault);
    }

    public state(): ConnectionStateEvent {
        return { ...this.current };
    }

    public getTransport(): Transport | null {
        return this.transport;
    }

    /** Rejects with a `ConnectionError` when the link cannot be opened. */
    public connect(config: ConnectionConfig): Promise<void> {
        return this.serialize(() => this.doConnect(config));
    }

    public disconnect(): Promise<void> {
        return this.serialize(async () => {
            await this.teardown();
            this.setState({ status: 'disconnected' });
        });
    }

    /** Retries the last configuration, but only for timeouts and missing devices. */
    public reconnect(options: ReconnectOptions = {}): Promise<void> {
        const config = this.lastConfig;
        if (!config) {
            return Promise.reject(new Error('No previous connection to retry'));
        }

        const attempts = Math.max(1, options.attempts ?? this.reconnectAttempts);
        const delayMs = Math.max(0, options.delayMs ?? this.reconnectDelayMs);
        logger.info(`ConnectionManager: Reconnecting to ${describeConnection(config)} (up to ${attempts} attempts)`);

        return ErrorHandler.withRetry(() => this.connect(config), {
            maxRetries: attempts - 1,
            initialDelay: delayMs,
            maxDelay: delayMs,
            factor: 1,
            retryCondition: (error) => error instanceof ConnectionError && RETRYABLE.has(error.kind)
        });
    }

    /** Removes the bus subscription. The link, if any, stays as it is. */
    public dispose() {
        this.bus.off('gateway:faulted', this.onFault);
    }

    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.pending.then(task);
        this.pending = run.catch(() => undefined);
        return run;
    }

    private async doConnect(config: ConnectionConfig): Promise<void> {
        this.lastConfig = config;
        this.setState({ status: 'connecting', kind: config.kind });
        await this.teardown();

        const transport = this.createTransport(config);
        try {
            await transport.open();
        } catch (error) {
            const connError = ErrorClassifier.classifyConnection(error, transport.address);
            logger.error(`ConnectionManager: Could not connect to ${describeConnection(config)} - ${connError.message}`);
            this.setState({ status: 'error', kind: config.kind, reason: connError.message });
            this.setState({ status: 'disconnected', kind: config.kind, reason: connError.message });
            throw connError;
        }

        transport.onUnexpectedClose((reason) => this.handleUnexpectedClose(transport, reason));
        this.transport = transport;
        this.gateway.attach(transport);
        this.setState({ status: 'connected', kind: config.kind });
    }

    private handleUnexpectedClose(transport: Transport, reason: string) {
        if (transport !== this.transport) return;
        logger.warn(`ConnectionManager: Link to ${transport.address} closed unexpectedly (${reason})`);
        this.gateway.detach();
        this.transport = null;
        this.bus.emit('transport:closed', { reason });
        this.setState({ status: 'error', kind: transport.kind, reason: `Link lost: ${reason}` });
    }

    private async teardown() {
        const transport = this.transport;
        if (!transport) return;
        this.transport = null;
        this.gateway.detach();
        try {
            await transport.close();
        } catch (error) {
            logger.warn(`ConnectionManager: Error closing ${transport.address}: ${error}`);
        }
    }

    private setState(next: ConnectionStateEvent) {
        this.current = next;
        this.bus.emit('connection:state', { ...next });
    }
}
