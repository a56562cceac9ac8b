import { EventEmitter } from 'events';
import type {
    CommandEvent,
    ConnectionStateEvent,
    ModeChangedEvent,
    RecognitionDecisionEvent,
    WireRecord
} from './types';
import type { WriteError } from '../transports/TransportErrors';
import type { BotConfig } from '../config/ConfigManager';

export interface BusEvents {
    'command:accepted': CommandEvent;
    'command:rejected': CommandEvent;
    'command:failed': CommandEvent;
    'gateway:faulted': { error: WriteError };
    'recognition:decision': RecognitionDecisionEvent;
    'connection:state': ConnectionStateEvent;
    'transport:closed': { reason: string };
    'mode:changed': ModeChangedEvent;
    'virtual:byte': WireRecord;
    'config:changed': { oldConfig: BotConfig; newConfig: BotConfig };
}

export type BusEventName = keyof BusEvents;

/**
 * Typed facade over a Node EventEmitter. Components take a bus in their
 * constructor and default to the shared `eventBus`.
 */
export class EventBus {
    private emitter = new EventEmitter();

    constructor() {
        this.emitter.setMaxListeners(50);
    }

    public on<K extends BusEventName>(event: K, listener: (payload: BusEvents[K]) => void): this {
        this.emitter.on(event, listener);
        return this;
    }

    public off<K extends BusEventName>(event: K, listener: (payload: BusEvents[K]) => void): this {
        this.emitter.off(event, listener);
        return this;
    }

    public emit<K extends BusEventName>(event: K, payload: BusEvents[K]): boolean {
        return this.emitter.emit(event, payload);
    }
}

export const eventBus = new EventBus();
