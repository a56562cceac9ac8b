import { ActuatorStateTracker } from './ActuatorStateTracker';
import { ErrorClassifier } from './ErrorClassifier';
import { EventBus, eventBus } from './EventBus';
import {
    Action,
    CommandChar,
    ControlGroup,
    EMERGENCY_STOP,
    encode,
    isMotionAction,
    stopCharForGroup
} from './Protocol';
import { ActuatorSnapshot, CommandEvent, CommandRequest } from './types';
import { Transport } from '../transports/ITransport';
import { WriteError } from '../transports/TransportErrors';
import { logger } from '../utils/logger';

/** Longest duration a Node timer can hold; larger delays fire immediately. */
export const MAX_DURATION_MS = 2147483647;

export type GatewayErrorCode = 'NotConnected' | 'WriteFailed' | 'InvalidRequest';

export class GatewayError extends Error {
    constructor(
        public readonly code: GatewayErrorCode,
        message: string,
        public readonly writeError?: WriteError
    ) {
        super(message, { cause: writeError });
        this.name = 'GatewayError';
    }
}

export type SubmitOutcome = 'sent' | 'noop' | 'preempted';

export type SubmitResult =
    | { ok: true; outcome: SubmitOutcome; written: CommandChar[] }
    | { ok: false; error: GatewayError; written: CommandChar[] };

interface DeferredStop {
    token: number;
    timer: NodeJS.Timeout;
}

/**
 * CommandGateway - the only writer to the transport.
 *
 * Ordinary requests run one at a time through a promise chain, so a
 * read-state/decide/write/record sequence is never interleaved with another
 * producer's. The emergency stop skips the chain: it bumps the epoch, which
 * makes every queued or in-flight ordinary request abandon itself at its next
 * checkpoint, and writes `!` straight away.
 */
export class CommandGateway {
    private transport: Transport | null = null;
    private readonly tracker = new ActuatorStateTracker();
    private fault: WriteError | null = null;
    private epoch = 0;
    private tail: Promise<unknown> = Promise.resolve();
    private deferred = new Map<ControlGroup, DeferredStop>();
    private nextToken = 0;
    private readonly bus: EventBus;

    constructor(options: { bus?: EventBus } = {}) {
        this.bus = options.bus ?? eventBus;
    }

    /** Hands a freshly opened link to the gateway. State starts all-inactive. */
    public attach(transport: Transport): void {
        if (this.transport) this.detach();
        this.transport = transport;
        this.epoch++;
        this.tracker.reset();
        this.fault = null;
        logger.info(`CommandGateway: Attached ${transport.kind} link (${transport.address})`);
    }

    /**
     * Drops the link without writing anything: the device is assumed to
     * fail safe or to be unreachable already.
     */
    public detach(): Transport | null {
        const transport = this.transport;
        this.epoch++;
        this.cancelAllDeferred();
        this.tracker.reset();
        this.transport = null;
        this.fault = null;
        if (transport) {
            logger.info(`CommandGateway: Detached ${transport.kind} link`);
        }
        return transport;
    }

    public isConnected(): boolean {
        return this.transport !== null && this.transport.isOpen();
    }

    public isFaulted(): boolean {
        return this.fault !== null;
    }

    public snapshot(): ActuatorSnapshot {
        return this.tracker.snapshot();
    }

    public isStale(): boolean {
        return this.tracker.isStale();
    }

    public pendingDeferredStops(): ControlGroup[] {
        return Array.from(this.deferred.keys());
    }

    /** Resolves once every request queued so far has been processed. */
    public async idle(): Promise<void> {
        await this.tail;
    }

    public emergencyStop(producer: CommandRequest['producer']): Promise<SubmitResult> {
        return this.submit({ producer, action: Action.EmergencyStop });
    }

    public submit(request: CommandRequest): Promise<SubmitResult> {
        if (request.action === Action.EmergencyStop) {
            return this.handleEmergencyStop(request);
        }

        const target = request.target;
        const char = encode(target, request.action);
        if (!target || !char) {
            return Promise.resolve(this.reject(request, new GatewayError(
                'InvalidRequest',
                `No protocol command for ${request.action} on ${target ?? 'no target'}`
            )));
        }

        if (request.durationMs !== undefined && request.durationMs > MAX_DURATION_MS) {
            return Promise.resolve(this.reject(request, new GatewayError(
                'InvalidRequest',
                `Duration ${request.durationMs}ms exceeds the ${MAX_DURATION_MS}ms limit`
            )));
        }

        if (!this.isConnected()) {
            return Promise.resolve(this.reject(request, this.notConnected()));
        }

        const epoch = this.epoch;
        return this.runExclusive(() => this.apply(request, target, char, epoch));
    }

    private runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(task);
        this.tail = run.catch((error: unknown) => {
            logger.error(`CommandGateway: Unexpected error in critical section: ${error}`);
        });
        return run;
    }

    private async apply(request: CommandRequest, target: ControlGroup, char: CommandChar, epoch: number): Promise<SubmitResult> {
        if (epoch !== this.epoch) return this.preempted(request, []);

        const transport = this.transport;
        if (!transport || !transport.isOpen() || this.fault) {
            return this.reject(request, this.notConnected());
        }

        // A new command for the group replaces whatever deferred stop was pending.
        this.cancelDeferred(target);

        const withDuration = request.durationMs !== undefined && request.durationMs > 0 && isMotionAction(request.action);

        if (this.tracker.isEngaged(target, request.action)) {
            if (withDuration && request.durationMs !== undefined) {
                this.scheduleDeferredStop(target, request.durationMs);
            }
            return this.accept(request, 'noop', []);
        }

        const written: CommandChar[] = [];

        if (isMotionAction(request.action) && this.tracker.isGroupActive(target)) {
            const stopChar = stopCharForGroup(target);
            if (stopChar) {
                const stopError = await this.writeChar(transport, stopChar, written);
                if (stopError) return this.fail(request, stopError, written);
                if (epoch !== this.epoch) return this.preempted(request, written);
            }
        }

        const writeError = await this.writeChar(transport, char, written);
        if (writeError) return this.fail(request, writeError, written);
        if (epoch !== this.epoch) return this.preempted(request, written);

        // The stop is only recorded once both bytes went out; a failed second
        // write leaves the old direction in place, flagged stale.
        if (written.length > 1) this.tracker.recordStop(target);
        this.tracker.record(target, request.action);

        if (withDuration && request.durationMs !== undefined) {
            this.scheduleDeferredStop(target, request.durationMs);
        }

        return this.accept(request, 'sent', written);
    }

    private async handleEmergencyStop(request: CommandRequest): Promise<SubmitResult> {
        this.epoch++;
        this.cancelAllDeferred();
        this.tracker.reset();

        const transport = this.transport;
        if (!transport || !transport.isOpen()) {
            logger.warn('CommandGateway: Emergency stop requested with no open link; state reset');
            return this.reject(request, this.notConnected());
        }

        const written: CommandChar[] = [];
        const writeError = await this.writeChar(transport, EMERGENCY_STOP, written);
        if (writeError) return this.fail(request, writeError, written);

        logger.warn(`CommandGateway: EMERGENCY STOP from ${request.producer}`);
        return this.accept(request, 'sent', written);
    }

    private async writeChar(transport: Transport, char: CommandChar, written: CommandChar[]): Promise<WriteError | null> {
        try {
            await transport.write(char);
            written.push(char);
            return null;
        } catch (error) {
            return ErrorClassifier.classifyWrite(error);
        }
    }

    private scheduleDeferredStop(group: ControlGroup, durationMs: number) {
        this.cancelDeferred(group);
        const token = ++this.nextToken;
        const timer = setTimeout(() => {
            this.fireDeferredStop(group, token).catch((error: unknown) => {
                logger.error(`CommandGateway: Deferred stop for ${group} failed: ${error}`);
            });
        }, durationMs);
        this.deferred.set(group, { token, timer });
        logger.debug(`CommandGateway: Deferred stop for ${group} in ${durationMs}ms`);
    }

    private fireDeferredStop(group: ControlGroup, token: number): Promise<SubmitResult | null> {
        const epoch = this.epoch;
        return this.runExclusive(async () => {
            // Cancellation is decided here, inside the critical section, so a
            // command that replaced this timer always wins.
            const pending = this.deferred.get(group);
            if (!pending || pending.token !== token) return null;
            this.deferred.delete(group);

            const stopChar = stopCharForGroup(group);
            if (!stopChar) return null;
            return this.apply({ producer: 'system', target: group, action: Action.Stop }, group, stopChar, epoch);
        });
    }

    private cancelDeferred(group: ControlGroup) {
        const pending = this.deferred.get(group);
        if (!pending) return;
        clearTimeout(pending.timer);
        this.deferred.delete(group);
    }

    private cancelAllDeferred() {
        for (const pending of this.deferred.values()) {
            clearTimeout(pending.timer);
        }
        this.deferred.clear();
    }

    private notConnected(): GatewayError {
        if (this.fault) {
            return new GatewayError('NotConnected', `Link faulted after failed write (${this.fault.message}); reconnect required`);
        }
        return new GatewayError('NotConnected', 'Not connected - command not sent');
    }

    private accept(request: CommandRequest, outcome: SubmitOutcome, written: CommandChar[]): SubmitResult {
        const event: CommandEvent = { producer: request.producer, request, written, reason: outcome };
        if (outcome === 'sent') {
            logger.info(`CommandGateway [${request.producer.toUpperCase()}]: sent ${written.join(' ')} (${describeRequest(request)})`);
        } else {
            logger.debug(`CommandGateway [${request.producer.toUpperCase()}]: ${describeRequest(request)} already engaged`);
        }
        this.bus.emit('command:accepted', event);
        return { ok: true, outcome, written };
    }

    private preempted(request: CommandRequest, written: CommandChar[]): SubmitResult {
        this.bus.emit('command:rejected', {
            producer: request.producer,
            request,
            written,
            reason: 'preempted by emergency stop'
        });
        logger.debug(`CommandGateway [${request.producer.toUpperCase()}]: ${describeRequest(request)} preempted by emergency stop`);
        return { ok: true, outcome: 'preempted', written };
    }

    private reject(request: CommandRequest, error: GatewayError): SubmitResult {
        this.bus.emit('command:rejected', { producer: request.producer, request, written: [], reason: error.message });
        return { ok: false, error, written: [] };
    }

    private fail(request: CommandRequest, writeError: WriteError, written: CommandChar[]): SubmitResult {
        this.tracker.markStale();
        this.fault = writeError;
        this.cancelAllDeferred();

        const error = new GatewayError('WriteFailed', `Write failed: ${writeError.message}`, writeError);
        logger.error(`CommandGateway [${request.producer.toUpperCase()}]: ${describeRequest(request)} failed - ${writeError.message}; actuator state unknown`);
        this.bus.emit('command:failed', { producer: request.producer, request, written, reason: writeError.message });
        this.bus.emit('gateway:faulted', { error: writeError });
        return { ok: false, error, written };
    }
}

export function describeRequest(request: CommandRequest): string {
    const target = request.target ? `${request.target} ` : '';
    const duration = request.durationMs ? ` for ${request.durationMs}ms` : '';
    return `${target}${request.action}${duration}`;
}
