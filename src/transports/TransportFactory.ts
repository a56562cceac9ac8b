import { Transport } from './ITransport';
import { SerialTransport, SerialLinkFactory } from './SerialTransport';
import { SocketTransport } from './SocketTransport';
import { VirtualTransport } from './VirtualTransport';
import { ConnectionConfig } from '../core/types';
import { EventBus } from '../core/EventBus';

export interface TransportFactoryOptions {
    bus?: EventBus;
    serialFactory?: SerialLinkFactory;
}

export type CreateTransport = (config: ConnectionConfig) => Transport;

export function createTransportFactory(options: TransportFactoryOptions = {}): CreateTransport {
    return (config: ConnectionConfig): Transport => {
        switch (config.kind) {
            case 'serial':
                return new SerialTransport({
                    path: config.path,
                    baudRate: config.baudRate,
                    connectTimeoutMs: config.connectTimeoutMs,
                    writeTimeoutMs: config.writeTimeoutMs,
                    factory: options.serialFactory
                });
            case 'socket':
                return new SocketTransport({
                    host: config.host,
                    port: config.port,
                    connectTimeoutMs: config.connectTimeoutMs,
                    writeTimeoutMs: config.writeTimeoutMs
                });
            case 'virtual':
                return new VirtualTransport({
                    latencyMs: config.latencyMs,
                    historyLimit: config.historyLimit,
                    bus: options.bus
                });
        }
    };
}

export function describeConnection(config: ConnectionConfig): string {
    switch (config.kind) {
        case 'serial':
            return `serial ${config.path} @ ${config.baudRate}`;
        case 'socket':
            return `socket ${config.host}:${config.port}`;
        case 'virtual':
            return 'virtual link';
    }
}
