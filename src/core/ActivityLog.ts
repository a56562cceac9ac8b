import { describeRequest } from './CommandGateway';
import { EventBus, eventBus } from './EventBus';
import { CommandEvent, ConnectionStateEvent, ModeChangedEvent, RecognitionDecisionEvent } from './types';
import { logger } from '../utils/logger';

export type ActivityLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface ActivityEntry {
    timestamp: string;
    level: ActivityLevel;
    message: string;
    /** How many times this line arrived in a row. */
    count: number;
}

export interface ActivityLogOptions {
    bus?: EventBus;
    historyLimit?: number;
}

const COALESCED: ReadonlySet<ActivityLevel> = new Set<ActivityLevel>(['warn', 'error']);

function tag(event: CommandEvent): string {
    return `[${event.producer.toUpperCase()}]`;
}

/**
 * One human-readable line per command, recognition decision, connection
 * change and mode change. Repeated warnings collapse into a counter.
 */
export class ActivityLog {
    private history: ActivityEntry[] = [];
    private readonly bus: EventBus;
    private readonly historyLimit: number;
    private subscribed = false;
    private lastProblem: ActivityEntry | null = null;

    private readonly onRejected = (e: CommandEvent) =>
        this.record('warn', `${tag(e)} Not sent: ${describeRequest(e.request)} (${e.reason ?? 'rejected'})`);
    private readonly onFailed = (e: CommandEvent) =>
        this.record('error', `${tag(e)} Write failed: ${describeRequest(e.request)} (${e.reason ?? 'link error'})`);

    constructor(options: ActivityLogOptions = {}) {
        this.bus = options.bus ?? eventBus;
        this.historyLimit = Math.max(1, options.historyLimit ?? 500);
    }

    public start(): this {
        if (this.subscribed) return this;
        this.subscribed = true;
        this.bus.on('command:accepted', this.onAccepted);
        this.bus.on('command:rejected', this.onRejected);
        this.bus.on('command:failed', this.onFailed);
        this.bus.on('recognition:decision', this.onDecision);
        this.bus.on('connection:state', this.onConnection);
        this.bus.on('mode:changed', this.onMode);
        return this;
    }

    public stop() {
        if (!this.subscribed) return;
        this.subscribed = false;
        this.flushRepeats();
        this.bus.off('command:accepted', this.onAccepted);
        this.bus.off('command:rejected', this.onRejected);
        this.bus.off('command:failed', this.onFailed);
        this.bus.off('recognition:decision', this.onDecision);
        this.bus.off('connection:state', this.onConnection);
        this.bus.off('mode:changed', this.onMode);
    }

    public getHistory(): ActivityEntry[] {
        return this.history.map(entry => ({ ...entry }));
    }

    public clear() {
        this.history = [];
        this.lastProblem = null;
    }

    /**
     * Warnings and errors are compared with the previous warning or error,
     * not with the previous line, so the info and debug lines a producer
     * writes between two identical failures do not break the run.
     */
    public record(level: ActivityLevel, message: string): ActivityEntry {
        if (COALESCED.has(level)) {
            const last = this.lastProblem;
            if (last && last.level === level && last.message === message) {
                last.count++;
                last.timestamp = new Date().toISOString();
                return last;
            }
            this.flushRepeats();
        }

        logger.log(level, message);
        const entry: ActivityEntry = { timestamp: new Date().toISOString(), level, message, count: 1 };
        this.history.push(entry);
        if (this.history.length > this.historyLimit) {
            this.history.splice(0, this.history.length - this.historyLimit);
        }
        if (COALESCED.has(level)) this.lastProblem = entry;
        return entry;
    }

    private flushRepeats() {
        const last = this.lastProblem;
        this.lastProblem = null;
        if (last && last.count > 1) {
            logger.log(last.level, `last message repeated ${last.count - 1} times`);
        }
    }

    private readonly onAccepted = (event: CommandEvent) => {
        if (event.reason === 'noop') {
            this.record('debug', `${tag(event)} ${describeRequest(event.request)} already engaged`);
            return;
        }
        this.record('info', `${tag(event)} Sent ${event.written.join(' ')} (${describeRequest(event.request)})`);
    }

    private readonly onDecision = (event: RecognitionDecisionEvent) => {
        const pct = `${Math.round(event.confidence * 100)}%`;
        const source = event.source.toUpperCase();
        switch (event.decision) {
            case 'low-confidence':
                this.record('debug', `[${source}] "${event.label}" ${pct} below threshold`);
                break;
            case 'cooldown':
                this.record('debug', `[${source}] "${event.label}" ${pct} ignored during cooldown`);
                break;
            case 'repeat':
                this.record('debug', `[${source}] "${event.label}" repeated`);
                break;
            case 'unmapped':
                this.record('verbose', `[${source}] "${event.label}" has no command`);
                break;
            case 'submitted':
                this.record('info', `[${source}] Recognized "${event.label}" (${pct})`);
                break;
        }
    }

    private readonly onConnection = (event: ConnectionStateEvent) => {
        const via = event.kind ? ` (${event.kind})` : '';
        switch (event.status) {
            case 'connecting':
                this.record('info', `Connecting${via}...`);
                break;
            case 'connected':
                this.record('info', `Connected${via}`);
                break;
            case 'disconnected':
                this.record('info', event.reason ? `Disconnected${via}: ${event.reason}` : `Disconnected${via}`);
                break;
            case 'error':
                this.record('error', `Connection error${via}: ${event.reason ?? 'unknown'}`);
                break;
        }
    }

    private readonly onMode = (event: ModeChangedEvent) => {
        this.record('info', `Mode ${event.from.toUpperCase()} -> ${event.to.toUpperCase()}`);
    }
}
