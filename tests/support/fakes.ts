import type { SubmitResult } from '../../src/core/CommandGateway';
import type { CommandSink } from '../../src/core/RecognitionPolicy';
import type { CaptureLoop } from '../../src/core/RecognitionLoop';
import type { CommandChar } from '../../src/core/Protocol';
import type { CommandRequest, RecognitionSource } from '../../src/core/types';
import type { Transport } from '../../src/transports/ITransport';

/** Sink that records every request and answers with `result`. */
export class RecordingSink implements CommandSink {
    public readonly requests: CommandRequest[] = [];

    constructor(private readonly result: SubmitResult = { ok: true, outcome: 'sent', written: [] }) { }

    public async submit(request: CommandRequest): Promise<SubmitResult> {
        this.requests.push(request);
        return this.result;
    }
}

/** Open link whose writes fail once `failAfter` bytes have gone through. */
export class FlakyTransport implements Transport {
    public readonly kind = 'virtual' as const;
    public readonly address = 'flaky';
    public readonly written: CommandChar[] = [];
    private opened = false;

    constructor(private readonly failAfter: number, private readonly failure: Error = new Error('EIO: broken pipe')) { }

    public async open() {
        this.opened = true;
    }

    public async write(char: CommandChar) {
        if (this.written.length >= this.failAfter) throw this.failure;
        this.written.push(char);
    }

    public async close() {
        this.opened = false;
    }

    public isOpen() {
        return this.opened;
    }

    public lastError() {
        return null;
    }

    public onUnexpectedClose() { }
}

export class FakeLoop implements CaptureLoop {
    public starts = 0;
    public stops = 0;
    private running = false;

    constructor(public readonly source: RecognitionSource, private readonly startError?: Error) { }

    public async start() {
        if (this.startError) throw this.startError;
        this.starts++;
        this.running = true;
    }

    public async stop() {
        if (!this.running) return;
        this.stops++;
        this.running = false;
    }

    public isRunning() {
        return this.running;
    }
}
