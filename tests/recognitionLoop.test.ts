import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EventBus } from '../src/core/EventBus';
import { Action } from '../src/core/Protocol';
import { Classifier, RecognitionLoop } from '../src/core/RecognitionLoop';
import { RecognitionPolicy, buildMapping } from '../src/core/RecognitionPolicy';
import { ScriptedClassifier, loadRecognitionScript } from '../src/core/ScriptedClassifier';
import { RecognitionDecisionEvent, RecognitionEvent } from '../src/core/types';
import { RecordingSink } from './support/fakes';

describe('ScriptedClassifier', () => {
    it('holds each event back for its wait time', async () => {
        let clock = 0;
        const scripted = new ScriptedClassifier([{ label: 'left', confidence: 0.8, waitMs: 100 }], () => clock);

        expect(await scripted.read()).toBeNull();
        clock = 99;
        expect(await scripted.read()).toBeNull();
        clock = 100;
        const frame = await scripted.read();

        expect(frame?.toString('utf8')).toBe('left');
        expect(frame && await scripted.classify(frame)).toEqual({ label: 'left', confidence: 0.8 });
        expect(scripted.isExhausted()).toBe(true);
        expect(await scripted.read()).toBeNull();
    });

    it('refuses to classify before any frame was read', async () => {
        const scripted = new ScriptedClassifier([]);
        await expect(scripted.classify(Buffer.from('x'))).rejects.toThrow('before a frame was read');
    });

    describe('loadRecognitionScript', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'botlink-script-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('parses a YAML script', () => {
            const file = path.join(dir, 'voice.yaml');
            fs.writeFileSync(file, 'source: voice\nevents:\n  - label: up\n    confidence: 0.9\n    waitMs: 50\n');

            expect(loadRecognitionScript(file)).toEqual({
                source: 'voice',
                events: [{ label: 'up', confidence: 0.9, waitMs: 50 }]
            });
        });

        it('rejects confidences outside 0..1', () => {
            const file = path.join(dir, 'bad.yaml');
            fs.writeFileSync(file, 'source: gesture\nevents:\n  - label: start\n    confidence: 1.5\n');
            expect(() => loadRecognitionScript(file)).toThrow();
        });
    });
});

describe('RecognitionLoop', () => {
    let sink: RecordingSink;
    let bus: EventBus;
    let policy: RecognitionPolicy;

    beforeEach(() => {
        sink = new RecordingSink();
        bus = new EventBus();
        policy = new RecognitionPolicy(sink, {
            source: 'voice',
            mapping: buildMapping({ forward: 'F', up: 'Z' }),
            cooldownMs: 0,
            bus
        });
    });

    it('feeds classified frames to the policy in order', async () => {
        const scripted = new ScriptedClassifier([
            { label: 'forward', confidence: 0.9 },
            { label: 'noise', confidence: 0.9 },
            { label: 'up', confidence: 0.9 }
        ]);
        const decisions: string[] = [];
        bus.on('recognition:decision', (e: RecognitionDecisionEvent) => decisions.push(`${e.label}:${e.decision}`));

        const loop = new RecognitionLoop(policy, scripted, scripted, { intervalMs: 1, idleDelayMs: 1 });
        await loop.start();
        await vi.waitFor(() => expect(loop.getCycleCount()).toBe(3));
        await loop.stop();

        expect(decisions).toEqual(['forward:submitted', 'noise:unmapped', 'up:submitted']);
        expect(sink.requests.map(r => r.action)).toEqual([Action.Forward, Action.Up]);
        expect(loop.isRunning()).toBe(false);
    });

    it('keeps running after a classifier error', async () => {
        let calls = 0;
        const flaky: Classifier = {
            async classify(): Promise<RecognitionEvent> {
                calls++;
                if (calls === 1) throw new Error('model not loaded');
                return { label: 'forward', confidence: 0.9 };
            }
        };
        const frames = { read: async () => Buffer.from('frame') };

        const loop = new RecognitionLoop(policy, frames, flaky, { intervalMs: 1 });
        await loop.start();
        await vi.waitFor(() => expect(sink.requests.length).toBeGreaterThan(0));
        await loop.stop();

        expect(calls).toBeGreaterThanOrEqual(2);
        expect(sink.requests[0].action).toBe(Action.Forward);
    });

    it('opens and closes its frame source', async () => {
        const frames = {
            opened: 0,
            closed: 0,
            async open() { this.opened++; },
            async read() { return null; },
            async close() { this.closed++; }
        };

        const loop = new RecognitionLoop(policy, frames, new ScriptedClassifier([]));
        await loop.start();
        await loop.start();
        await loop.stop();
        await loop.stop();

        expect(frames.opened).toBe(1);
        expect(frames.closed).toBe(1);
    });
});
