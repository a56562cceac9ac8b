import { EventBus, eventBus } from './EventBus';
import {
    Action,
    CommandChar,
    ControlGroup,
    EMERGENCY_STOP,
    decode,
    isCommandChar,
    isMotionAction
} from './Protocol';
import {
    CommandRequest,
    PolicyDecisionKind,
    RecognitionEvent,
    RecognitionSource
} from './types';
import type { SubmitResult } from './CommandGateway';
import { logger } from '../utils/logger';

/**
 * What a label resolves to. `start` drives in the wrapper's current default
 * direction; `stop` stops whatever this wrapper last drove.
 */
export interface MappingTemplate {
    command: CommandChar | 'start' | 'stop';
    durationMs?: number;
}

export type LabelMapping = ReadonlyMap<string, MappingTemplate>;

export type RawMappingEntry = string | { command: string; durationMs?: number };

export interface CommandSink {
    submit(request: CommandRequest): Promise<SubmitResult>;
}

export type PolicyDecision =
    | { kind: Exclude<PolicyDecisionKind, 'submitted'> }
    | { kind: 'submitted'; request: CommandRequest; result: SubmitResult };

export type PolicyState = 'idle' | 'cooldown';

export interface RecognitionPolicyOptions {
    source: RecognitionSource;
    mapping: LabelMapping;
    threshold?: number;
    cooldownMs?: number;
    /** Applied to motion commands whose template has no duration of its own. */
    defaultDurationMs?: number;
    toggleDirectionOnStop?: boolean;
    suppressRepeats?: boolean;
    now?: () => number;
    bus?: EventBus;
}

/**
 * Builds an ordered label mapping from configuration. Entries that do not
 * name a protocol character or keyword are dropped with a warning.
 */
export function buildMapping(raw: Record<string, RawMappingEntry>): LabelMapping {
    const mapping = new Map<string, MappingTemplate>();

    for (const [label, entry] of Object.entries(raw)) {
        const command = typeof entry === 'string' ? entry : entry.command;
        const durationMs = typeof entry === 'string' ? undefined : entry.durationMs;

        if (command === 'start' || command === 'stop' || isCommandChar(command)) {
            mapping.set(label, durationMs === undefined ? { command } : { command, durationMs });
        } else {
            logger.warn(`RecognitionPolicy: Ignoring mapping "${label}" -> "${command}" (not a protocol command)`);
        }
    }

    return mapping;
}

/**
 * Gating between a classifier and the gateway: confidence threshold,
 * cooldown after each accepted event and the label-to-command table.
 * One instance per recognition pipeline.
 */
export class RecognitionPolicy {
    public readonly source: RecognitionSource;

    private mapping: LabelMapping;
    private readonly threshold: number;
    private readonly cooldownMs: number;
    private readonly defaultDurationMs?: number;
    private readonly toggleDirectionOnStop: boolean;
    private readonly suppressRepeats: boolean;
    private readonly now: () => number;
    private readonly bus: EventBus;

    private lastAcceptedAt: number | null = null;
    private lastLabel: string | null = null;
    private lastTarget: ControlGroup | null = null;
    private forward = true;

    constructor(private readonly sink: CommandSink, options: RecognitionPolicyOptions) {
        this.source = options.source;
        this.mapping = options.mapping;
        this.threshold = options.threshold ?? 0.7;
        this.cooldownMs = options.cooldownMs ?? 1000;
        this.defaultDurationMs = options.defaultDurationMs;
        this.toggleDirectionOnStop = options.toggleDirectionOnStop ?? false;
        this.suppressRepeats = options.suppressRepeats ?? false;
        this.now = options.now ?? Date.now;
        this.bus = options.bus ?? eventBus;
    }

    public get state(): PolicyState {
        return this.inCooldown() ? 'cooldown' : 'idle';
    }

    /** Direction the next `start` label drives in. */
    public get defaultDirection(): Action.Forward | Action.Backward {
        return this.forward ? Action.Forward : Action.Backward;
    }

    public getMapping(): LabelMapping {
        return this.mapping;
    }

    public setMapping(mapping: LabelMapping) {
        this.mapping = mapping;
        logger.info(`RecognitionPolicy [${this.source}]: Mapping updated (${mapping.size} labels)`);
    }

    public reset() {
        this.lastAcceptedAt = null;
        this.lastLabel = null;
        this.lastTarget = null;
        this.forward = true;
    }

    public async onEvent(event: RecognitionEvent): Promise<PolicyDecision> {
        const { label, confidence } = event;

        if (confidence < this.threshold) {
            return this.decide(event, { kind: 'low-confidence' });
        }

        const template = this.mapping.get(label);
        const isEmergency = template?.command === EMERGENCY_STOP;

        // An emergency stop is never held back by the cooldown.
        if (!isEmergency && this.inCooldown()) {
            return this.decide(event, { kind: 'cooldown' });
        }

        if (!template) {
            return this.decide(event, { kind: 'unmapped' });
        }

        if (this.suppressRepeats && !isEmergency && label === this.lastLabel) {
            return this.decide(event, { kind: 'repeat' });
        }

        const request = this.resolve(template);
        this.lastAcceptedAt = this.now();
        this.lastLabel = label;

        const result = await this.sink.submit(request);
        return this.decide(event, { kind: 'submitted', request, result });
    }

    private resolve(template: MappingTemplate): CommandRequest {
        if (template.command === 'start') {
            this.lastTarget = ControlGroup.Drive;
            return this.withDuration({ producer: this.source, target: ControlGroup.Drive, action: this.defaultDirection }, template);
        }

        if (template.command === 'stop') {
            const target = this.lastTarget ?? ControlGroup.Drive;
            if (this.toggleDirectionOnStop) {
                this.forward = !this.forward;
                logger.debug(`RecognitionPolicy [${this.source}]: Next start drives ${this.defaultDirection}`);
            }
            return { producer: this.source, target, action: Action.Stop };
        }

        const entry = decode(template.command);
        if (!entry || entry.group === null) {
            this.lastTarget = null;
            return { producer: this.source, action: Action.EmergencyStop };
        }

        if (isMotionAction(entry.action)) {
            this.lastTarget = entry.group;
        }
        return this.withDuration({ producer: this.source, target: entry.group, action: entry.action }, template);
    }

    private withDuration(request: CommandRequest, template: MappingTemplate): CommandRequest {
        if (!isMotionAction(request.action)) return request;
        const durationMs = template.durationMs ?? this.defaultDurationMs;
        return durationMs === undefined ? request : { ...request, durationMs };
    }

    private inCooldown(): boolean {
        return this.lastAcceptedAt !== null && this.now() - this.lastAcceptedAt < this.cooldownMs;
    }

    private decide(event: RecognitionEvent, decision: PolicyDecision): PolicyDecision {
        const pct = `${(event.confidence * 100).toFixed(0)}%`;
        switch (decision.kind) {
            case 'low-confidence':
                logger.debug(`RecognitionPolicy [${this.source}]: "${event.label}" (${pct}) below threshold, ignored`);
                break;
            case 'cooldown':
                logger.debug(`RecognitionPolicy [${this.source}]: "${event.label}" (${pct}) during cooldown, ignored`);
                break;
            case 'unmapped':
                logger.verbose(`RecognitionPolicy [${this.source}]: "${event.label}" has no command mapping`);
                break;
            case 'repeat':
                logger.debug(`RecognitionPolicy [${this.source}]: "${event.label}" repeated, ignored`);
                break;
            case 'submitted':
                logger.info(`RecognitionPolicy [${this.source}]: "${event.label}" (${pct}) -> ${decision.request.action}`);
                break;
        }

        this.bus.emit('recognition:decision', {
            source: this.source,
            label: event.label,
            confidence: event.confidence,
            decision: decision.kind
        });
        return decision;
    }
}
