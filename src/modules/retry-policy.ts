/**
 * Bounded exponential backoff for transient transport failures.
 * Time and randomness are injected so tests run without real waiting.
 */

import { RETRY } from './constants.js';
import { isRetryable } from './errors.js';
import { systemClock, throwIfAborted, type Clock } from './utilities.js';
import type { RetryPolicyOptions } from '../types.js';

export interface ExecuteOptions {
    clock?: Clock;
    signal?: AbortSignal;
    /** Called before each backoff sleep. */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
    maxAttempts: RETRY.MAX_ATTEMPTS,
    baseDelayMs: RETRY.BASE_DELAY_MS,
    maxDelayMs: RETRY.MAX_DELAY_MS,
    jitter: RETRY.JITTER
};

export class RetryPolicy {
    readonly options: Readonly<RetryPolicyOptions>;
    private readonly random: () => number;

    constructor(options: Partial<RetryPolicyOptions> = {}, random: () => number = Math.random) {
        const merged = { ...DEFAULT_RETRY_OPTIONS, ...options };
        if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${merged.maxAttempts}`);
        }
        if (merged.baseDelayMs < 0 || merged.maxDelayMs < merged.baseDelayMs) {
            throw new RangeError('Retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
        }
        if (merged.jitter < 0 || merged.jitter > 1) {
            throw new RangeError(`jitter must be between 0 and 1, got ${merged.jitter}`);
        }
        this.options = Object.freeze(merged);
        this.random = random;
    }

    /**
     * Delay before the next attempt, after `attempt` (1-based) has failed:
     * baseDelayMs * 2^(attempt-1), capped at maxDelayMs, then spread by ±jitter.
     */
    delayFor(attempt: number): number {
        const { baseDelayMs, maxDelayMs, jitter } = this.options;
        const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
        const spread = exponential * jitter;
        const delay = exponential - spread + this.random() * 2 * spread;
        return Math.round(Math.min(maxDelayMs, Math.max(0, delay)));
    }

    shouldRetry(error: unknown, attempt: number): boolean {
        return isRetryable(error) && attempt < this.options.maxAttempts;
    }

    /**
     * Run operation until it succeeds, fails with a non-transient error, or
     * runs out of attempts. The last error is rethrown unchanged.
     */
    async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
        const clock = options.clock ?? systemClock;
        for (let attempt = 1; ; attempt++) {
            throwIfAborted(options.signal);
            try {
                return await operation(attempt);
            } catch (err) {
                if (!this.shouldRetry(err, attempt)) throw err;
                const delayMs = this.delayFor(attempt);
                options.onRetry?.(err, attempt, delayMs);
                await clock.sleep(delayMs, options.signal);
            }
        }
    }
}
