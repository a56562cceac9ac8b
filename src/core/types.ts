import { Action, ActuatorId, CommandChar, ControlGroup } from './Protocol';

export type ProducerId = 'keyboard' | 'voice' | 'gesture' | 'remote' | 'system';

export type RecognitionSource = 'voice' | 'gesture';

export type InputMode = 'keyboard' | RecognitionSource;

export interface CommandRequest {
    producer: ProducerId;
    /** Absent only for the emergency stop. */
    target?: ControlGroup;
    action: Action;
    durationMs?: number;
}

export interface RecognitionEvent {
    label: string;
    confidence: number;
}

export interface ActuatorState {
    active: boolean;
    direction: Action;
}

export type ActuatorSnapshot = Readonly<Record<ActuatorId, Readonly<ActuatorState>>>;

export type ConnectionConfig =
    | { kind: 'serial'; path: string; baudRate: number; connectTimeoutMs: number; writeTimeoutMs: number }
    | { kind: 'socket'; host: string; port: number; connectTimeoutMs: number; writeTimeoutMs: number }
    | { kind: 'virtual'; latencyMs?: number; historyLimit?: number };

export type ConnectionKind = ConnectionConfig['kind'];

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface ConnectionStateEvent {
    status: ConnectionStatus;
    kind?: ConnectionKind;
    reason?: string;
}

export interface CommandEvent {
    producer: ProducerId;
    request: CommandRequest;
    written: CommandChar[];
    reason?: string;
}

export type PolicyDecisionKind = 'low-confidence' | 'cooldown' | 'unmapped' | 'repeat' | 'submitted';

export interface RecognitionDecisionEvent {
    source: RecognitionSource;
    label: string;
    confidence: number;
    decision: PolicyDecisionKind;
}

export interface ModeChangedEvent {
    from: InputMode;
    to: InputMode;
}

export interface WireRecord {
    char: string;
    timestamp: string;
}
