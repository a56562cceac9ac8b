import { logger } from './logger';

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    factor?: number;
    retryCondition?: (error: unknown) => boolean;
    /** Called before each wait, with the attempt that just failed. */
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class ErrorHandler {
    /**
     * Executes a function with exponential backoff retries.
     */
    public static async withRetry<T>(
        fn: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxRetries = 3,
            initialDelay = 1000,
            maxDelay = 10000,
            factor = 2,
            retryCondition = () => true,
            onRetry
        } = options;

        let lastError: unknown;
        let delay = initialDelay;

        for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
            try {
                return await fn();
            } catch (error) {
                lastError = error;

                if (attempt > maxRetries || !retryCondition(error)) {
                    break;
                }

                logger.warn(`ErrorHandler: Attempt ${attempt} failed. Retrying in ${delay}ms... (Error: ${messageOf(error)})`);
                onRetry?.(attempt, error, delay);
                await new Promise(resolve => setTimeout(resolve, delay));

                delay = Math.min(delay * factor, maxDelay);
            }
        }

        throw lastError;
    }
}
