import { RecognitionPolicy } from './RecognitionPolicy';
import { RecognitionEvent, RecognitionSource } from './types';
import { logger } from '../utils/logger';

/** Opaque model backend: one buffer in, best label out. */
export interface Classifier {
    classify(buffer: Buffer): Promise<RecognitionEvent>;
}

/** Audio or camera capture. `read` returns null when no frame is ready yet. */
export interface FrameSource {
    open?(): Promise<void>;
    read(): Promise<Buffer | null>;
    close?(): Promise<void>;
}

export interface CaptureLoop {
    readonly source: RecognitionSource;
    start(): Promise<void>;
    stop(): Promise<void>;
    isRunning(): boolean;
}

export interface RecognitionLoopOptions {
    /** Delay between inference cycles. */
    intervalMs?: number;
    /** Delay after a read that produced no frame. */
    idleDelayMs?: number;
}

/**
 * RecognitionLoop - capture, classify, hand the result to the policy, repeat.
 * Cycles never overlap; `stop` waits for the one in flight.
 */
export class RecognitionLoop implements CaptureLoop {
    public readonly source: RecognitionSource;

    private running = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;
    private cycles = 0;
    private readonly intervalMs: number;
    private readonly idleDelayMs: number;

    constructor(
        private readonly policy: RecognitionPolicy,
        private readonly frames: FrameSource,
        private readonly classifier: Classifier,
        options: RecognitionLoopOptions = {}
    ) {
        this.source = policy.source;
        this.intervalMs = Math.max(0, options.intervalMs ?? 100);
        this.idleDelayMs = Math.max(1, options.idleDelayMs ?? 50);
    }

    public async start(): Promise<void> {
        if (this.running) return;
        if (this.frames.open) await this.frames.open();
        this.running = true;
        this.cycles = 0;
        logger.info(`RecognitionLoop [${this.source}]: started`);
        this.schedule(0);
    }

    public async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) await this.inFlight;
        if (this.frames.close) await this.frames.close();
        logger.info(`RecognitionLoop [${this.source}]: stopped after ${this.cycles} cycles`);
    }

    public isRunning(): boolean {
        return this.running;
    }

    public getCycleCount(): number {
        return this.cycles;
    }

    private schedule(delayMs: number) {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.cycle().finally(() => {
                this.inFlight = null;
            });
        }, delayMs);
    }

    private async cycle(): Promise<void> {
        let nextDelay = this.intervalMs;
        try {
            const buffer = await this.frames.read();
            if (!this.running) return;
            if (buffer === null) {
                nextDelay = this.idleDelayMs;
                return;
            }

            const event = await this.classifier.classify(buffer);
            this.cycles++;
            if (!this.running) return;
            await this.policy.onEvent(event);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`RecognitionLoop [${this.source}]: cycle failed - ${message}`);
        } finally {
            if (this.running) this.schedule(nextDelay);
        }
    }
}
