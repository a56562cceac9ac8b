import { Action, ControlGroup, isMotionAction } from './Protocol';
import type { SubmitResult } from './CommandGateway';
import type { CommandSink } from './RecognitionPolicy';
import { RecognitionSource } from './types';
import { logger } from '../utils/logger';

export type KeyBinding =
    | { kind: 'command'; target: ControlGroup; action: Action }
    | { kind: 'emergency' }
    | { kind: 'mode'; mode: RecognitionSource };

export const DEFAULT_KEY_BINDINGS: ReadonlyMap<string, KeyBinding> = new Map<string, KeyBinding>([
    ['up', { kind: 'command', target: ControlGroup.Drive, action: Action.Forward }],
    ['down', { kind: 'command', target: ControlGroup.Drive, action: Action.Backward }],
    ['left', { kind: 'command', target: ControlGroup.Drive, action: Action.Left }],
    ['right', { kind: 'command', target: ControlGroup.Drive, action: Action.Right }],
    ['1', { kind: 'command', target: ControlGroup.Arm1, action: Action.Down }],
    ['4', { kind: 'command', target: ControlGroup.Arm1, action: Action.Up }],
    ['3', { kind: 'command', target: ControlGroup.Arm2, action: Action.Down }],
    ['6', { kind: 'command', target: ControlGroup.Arm2, action: Action.Up }],
    ['0', { kind: 'command', target: ControlGroup.Arm3, action: Action.Clockwise }],
    ['2', { kind: 'command', target: ControlGroup.Arm3, action: Action.CounterClockwise }],
    ['q', { kind: 'command', target: ControlGroup.Led, action: Action.Toggle }],
    ['escape', { kind: 'emergency' }],
    ['v', { kind: 'mode', mode: 'voice' }],
    ['space', { kind: 'mode', mode: 'gesture' }]
]);

/** The part of the mode coordinator the keyboard needs. */
export interface KeyboardGate {
    allowsKeyboard(action: Action): boolean;
    toggle(mode: RecognitionSource): Promise<boolean>;
}

export type KeyOutcome =
    | { kind: 'unbound' }
    | { kind: 'suppressed' }
    | { kind: 'ignored' }
    | { kind: 'mode'; mode: RecognitionSource; switched: boolean }
    | { kind: 'submitted'; result: SubmitResult };

/**
 * Turns key presses and releases into gateway requests. A held motion key
 * owns its group until released; releasing a key that no longer owns the
 * group sends nothing.
 */
export class KeyboardController {
    private holders = new Map<ControlGroup, string>();
    private readonly bindings: ReadonlyMap<string, KeyBinding>;

    constructor(
        private readonly sink: CommandSink,
        private readonly gate: KeyboardGate,
        bindings: ReadonlyMap<string, KeyBinding> = DEFAULT_KEY_BINDINGS
    ) {
        this.bindings = bindings;
    }

    public bindingFor(key: string): KeyBinding | undefined {
        return this.bindings.get(key.toLowerCase());
    }

    public holderOf(group: ControlGroup): string | undefined {
        return this.holders.get(group);
    }

    public async press(key: string): Promise<KeyOutcome> {
        const name = key.toLowerCase();
        const binding = this.bindings.get(name);
        if (!binding) return { kind: 'unbound' };

        switch (binding.kind) {
            case 'emergency': {
                this.holders.clear();
                const result = await this.sink.submit({ producer: 'keyboard', action: Action.EmergencyStop });
                return { kind: 'submitted', result };
            }
            case 'mode': {
                this.holders.clear();
                const switched = await this.gate.toggle(binding.mode);
                return { kind: 'mode', mode: binding.mode, switched };
            }
            case 'command': {
                if (!this.gate.allowsKeyboard(binding.action)) {
                    logger.debug(`KeyboardController: "${name}" suppressed outside keyboard mode`);
                    return { kind: 'suppressed' };
                }
                const result = await this.sink.submit({ producer: 'keyboard', target: binding.target, action: binding.action });
                if (result.ok && result.outcome !== 'preempted' && isMotionAction(binding.action)) {
                    this.holders.set(binding.target, name);
                }
                return { kind: 'submitted', result };
            }
        }
    }

    public async release(key: string): Promise<KeyOutcome> {
        const name = key.toLowerCase();
        const binding = this.bindings.get(name);
        if (!binding) return { kind: 'unbound' };
        if (binding.kind !== 'command' || !isMotionAction(binding.action)) return { kind: 'ignored' };
        if (this.holders.get(binding.target) !== name) return { kind: 'ignored' };

        this.holders.delete(binding.target);
        const result = await this.sink.submit({ producer: 'keyboard', target: binding.target, action: Action.Stop });
        return { kind: 'submitted', result };
    }

    /** Forgets every held key without sending anything. */
    public reset() {
        this.holders.clear();
    }
}
