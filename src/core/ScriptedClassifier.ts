import fs from 'fs';
import yaml from 'yaml';
import { z } from 'zod';
import { Classifier, FrameSource } from './RecognitionLoop';
import { RecognitionEvent } from './types';

export const ScriptedEventSchema = z.object({
    label: z.string().min(1),
    confidence: z.number().min(0).max(1),
    waitMs: z.number().int().nonnegative().optional()
});

export const RecognitionScriptSchema = z.object({
    source: z.enum(['voice', 'gesture']),
    events: z.array(ScriptedEventSchema)
});

export type ScriptedEvent = z.infer<typeof ScriptedEventSchema>;
export type RecognitionScript = z.infer<typeof RecognitionScriptSchema>;

export function loadRecognitionScript(filePath: string): RecognitionScript {
    const parsed: unknown = yaml.parse(fs.readFileSync(filePath, 'utf8'));
    return RecognitionScriptSchema.parse(parsed);
}

/**
 * Plays back a fixed list of recognition events in place of a live capture
 * device and model. Each event is released after its `waitMs`.
 */
export class ScriptedClassifier implements Classifier, FrameSource {
    private index = 0;
    private current: RecognitionEvent | null = null;
    private releaseAt: number | null = null;

    constructor(private readonly events: ScriptedEvent[], private readonly now: () => number = Date.now) { }

    public async read(): Promise<Buffer | null> {
        const next = this.events[this.index];
        if (!next) return null;

        if (this.releaseAt === null) {
            this.releaseAt = this.now() + (next.waitMs ?? 0);
        }
        if (this.now() < this.releaseAt) return null;

        this.index++;
        this.releaseAt = null;
        this.current = { label: next.label, confidence: next.confidence };
        return Buffer.from(next.label, 'utf8');
    }

    public async classify(_buffer: Buffer): Promise<RecognitionEvent> {
        if (!this.current) {
            throw new Error('ScriptedClassifier: classify called before a frame was read');
        }
        return this.current;
    }

    public isExhausted(): boolean {
        return this.index >= this.events.length;
    }
}
