import { Transport } from './ITransport';
import { WriteError, WriteErrorKind } from './TransportErrors';
import { CommandChar } from '../core/Protocol';
import { WireRecord } from '../core/types';
import { EventBus, eventBus } from '../core/EventBus';
import { logger } from '../utils/logger';

export interface VirtualTransportOptions {
    /** Simulated time a write takes to complete. The byte is recorded when the write starts. */
    latencyMs?: number;
    historyLimit?: number;
    bus?: EventBus;
}

/**
 * In-memory link used for development and the test suite. Writes always
 * succeed while open and every byte is kept in an observable history.
 */
export class VirtualTransport implements Transport {
    public readonly kind = 'virtual' as const;
    public readonly address = 'virtual';

    private opened = false;
    private history: WireRecord[] = [];
    private readonly latencyMs: number;
    private readonly historyLimit: number;
    private readonly bus: EventBus;
    private closeListeners: Array<(reason: string) => void> = [];

    constructor(options: VirtualTransportOptions = {}) {
        this.latencyMs = Math.max(0, options.latencyMs ?? 0);
        this.historyLimit = Math.max(1, options.historyLimit ?? 1000);
        this.bus = options.bus ?? eventBus;
    }

    public async open(): Promise<void> {
        this.opened = true;
        logger.info('VirtualTransport: connected (simulation)');
    }

    public async write(char: CommandChar): Promise<void> {
        if (!this.opened) {
            throw new WriteError(WriteErrorKind.NOT_OPEN, 'Virtual link is not open');
        }

        const record: WireRecord = { char, timestamp: new Date().toISOString() };
        this.history.push(record);
        if (this.history.length > this.historyLimit) {
            this.history.splice(0, this.history.length - this.historyLimit);
        }
        logger.debug(`VirtualTransport: [VIRTUAL] sent ${char}`);
        this.bus.emit('virtual:byte', record);

        if (this.latencyMs > 0) {
            await new Promise<void>(resolve => setTimeout(resolve, this.latencyMs));
        }
    }

    public async close(): Promise<void> {
        if (!this.opened) return;
        this.opened = false;
        logger.info('VirtualTransport: disconnected');
    }

    public isOpen(): boolean {
        return this.opened;
    }

    public lastError(): Error | null {
        return null;
    }

    public onUnexpectedClose(listener: (reason: string) => void): void {
        this.closeListeners.push(listener);
    }

    /** Simulates the remote end going away, as a dropped radio link would. */
    public simulateDrop(reason: string = 'link dropped'): void {
        if (!this.opened) return;
        this.opened = false;
        for (const listener of this.closeListeners) listener(reason);
    }

    public getHistory(): WireRecord[] {
        return [...this.history];
    }

    /** Bytes written so far, in order. */
    public getWritten(): string[] {
        return this.history.map(record => record.char);
    }
}
