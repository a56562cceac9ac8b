import { EventBus, eventBus } from './EventBus';
import { Action } from './Protocol';
import { CaptureLoop } from './RecognitionLoop';
import { CommandSink, RecognitionPolicy } from './RecognitionPolicy';
import { InputMode, RecognitionSource } from './types';
import { logger } from '../utils/logger';

/** Whether keyboard motion keys stay live while voice or gesture is producing. */
export type KeyboardPolicy = 'suppressed' | 'live';

type ModeState =
    | { mode: 'keyboard' }
    | { mode: RecognitionSource; loop: CaptureLoop };

interface Producer {
    loop: CaptureLoop;
    policy?: RecognitionPolicy;
}

export interface InputModeCoordinatorOptions {
    keyboardDuringAutomaticModes?: KeyboardPolicy;
    /** Send an emergency stop before every mode change. */
    stopOnSwitch?: boolean;
    bus?: EventBus;
}

/**
 * Decides which producer set is live. At most one of voice and gesture runs
 * at a time; the keyboard emergency stop is honoured in every mode.
 */
export class InputModeCoordinator {
    private current: ModeState = { mode: 'keyboard' };
    private producers = new Map<RecognitionSource, Producer>();
    private transition: Promise<unknown> = Promise.resolve();
    private readonly keyboardPolicy: KeyboardPolicy;
    private readonly stopOnSwitch: boolean;
    private readonly bus: EventBus;

    constructor(private readonly sink: CommandSink, options: InputModeCoordinatorOptions = {}) {
        this.keyboardPolicy = options.keyboardDuringAutomaticModes ?? 'suppressed';
        this.stopOnSwitch = options.stopOnSwitch ?? true;
        this.bus = options.bus ?? eventBus;
    }

    public get mode(): InputMode {
        return this.current.mode;
    }

    public register(loop: CaptureLoop, policy?: RecognitionPolicy): void {
        this.producers.set(loop.source, { loop, policy });
        logger.info(`InputModeCoordinator: ${loop.source} producer registered`);
    }

    public isAvailable(mode: InputMode): boolean {
        return mode === 'keyboard' || this.producers.has(mode);
    }

    public allowsKeyboard(action: Action): boolean {
        if (action === Action.EmergencyStop) return true;
        return this.current.mode === 'keyboard' || this.keyboardPolicy === 'live';
    }

    /**
     * Enters `mode`, or returns to keyboard when `mode` is already active.
     * The choice is made when the transition runs, after any queued before it.
     */
    public toggle(mode: RecognitionSource): Promise<boolean> {
        return this.enqueue(() => this.current.mode === mode ? 'keyboard' : mode);
    }

    /** Resolves true when the coordinator ends up in `next`. */
    public setMode(next: InputMode): Promise<boolean> {
        return this.enqueue(() => next);
    }

    private enqueue(target: () => InputMode): Promise<boolean> {
        const run = this.transition.then(() => this.switchTo(target()));
        this.transition = run.catch((error: unknown) => {
            logger.error(`InputModeCoordinator: Mode switch failed: ${error}`);
        });
        return run;
    }

    /** Stops any running producer and returns to keyboard mode. */
    public shutdown(): Promise<boolean> {
        return this.setMode('keyboard');
    }

    private async switchTo(next: InputMode): Promise<boolean> {
        const from = this.current.mode;
        if (from === next) return true;

        const producer = next === 'keyboard' ? undefined : this.producers.get(next);
        if (next !== 'keyboard' && !producer) {
            logger.warn(`InputModeCoordinator: ${next} mode not available (no capture loop)`);
            return false;
        }

        logger.info(`InputModeCoordinator: Switching ${from.toUpperCase()} -> ${next.toUpperCase()}`);

        if (this.stopOnSwitch) {
            const result = await this.sink.submit({ producer: 'system', action: Action.EmergencyStop });
            if (!result.ok) {
                logger.debug(`InputModeCoordinator: Stop on switch not sent (${result.error.message})`);
            }
        }

        await this.leave(this.current);
        this.current = { mode: 'keyboard' };

        let reached: InputMode = 'keyboard';
        if (producer && next !== 'keyboard') {
            try {
                await producer.loop.start();
                this.current = { mode: next, loop: producer.loop };
                reached = next;
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.error(`InputModeCoordinator: Could not start ${next} capture - ${message}`);
            }
        }

        if (reached !== from) {
            this.bus.emit('mode:changed', { from, to: reached });
        }
        logger.info(`InputModeCoordinator: Now in ${reached.toUpperCase()} mode`);
        return reached === next;
    }

    private async leave(state: ModeState): Promise<void> {
        if (state.mode === 'keyboard') return;
        await state.loop.stop();
        this.producers.get(state.mode)?.policy?.reset();
    }
}
