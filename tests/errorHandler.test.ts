import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ErrorHandler } from '../src/utils/ErrorHandler';

describe('ErrorHandler.withRetry', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('returns the first successful result', async () => {
        const fn = vi.fn(async () => 'linked');
        await expect(ErrorHandler.withRetry(fn)).resolves.toBe('linked');
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('backs off between attempts up to the maximum delay', async () => {
        let calls = 0;
        const delays: number[] = [];
        const fn = async () => {
            calls++;
            if (calls < 4) throw new Error(`attempt ${calls}`);
            return calls;
        };

        const result = ErrorHandler.withRetry(fn, {
            initialDelay: 100,
            maxDelay: 300,
            factor: 2,
            onRetry: (_attempt, _error, delayMs) => delays.push(delayMs)
        });
        await vi.runAllTimersAsync();

        await expect(result).resolves.toBe(4);
        expect(delays).toEqual([100, 200, 300]);
    });

    it('throws the last error once the retries are used up', async () => {
        let calls = 0;
        const fn = async () => {
            calls++;
            throw new Error(`attempt ${calls}`);
        };

        const result = ErrorHandler.withRetry(fn, { maxRetries: 2, initialDelay: 10 });
        const settled = expect(result).rejects.toThrow('attempt 3');
        await vi.runAllTimersAsync();
        await settled;
        expect(calls).toBe(3);
    });

    it('stops at the first error the condition rejects', async () => {
        const fn = vi.fn(async () => {
            throw new Error('permission denied');
        });

        await expect(ErrorHandler.withRetry(fn, {
            retryCondition: (error) => error instanceof Error && error.message.includes('timed out')
        })).rejects.toThrow('permission denied');
        expect(fn).toHaveBeenCalledTimes(1);
    });
});
