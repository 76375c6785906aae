import { describe, it, expect } from 'vitest';
import { RetryPolicy } from '../retry-policy.js';
import { AuthError, CancelledError, TransientTransportError } from '../errors.js';
import { FakeClock } from './test-helpers.js';

describe('RetryPolicy', () => {
    it('validates its options', () => {
        expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
        expect(() => new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 50 })).toThrow(RangeError);
        expect(() => new RetryPolicy({ jitter: 1.5 })).toThrow(RangeError);
    });

    it('doubles the delay per attempt up to the cap', () => {
        const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 });
        expect([1, 2, 3, 4, 5, 6].map(a => policy.delayFor(a))).toEqual([100, 200, 400, 800, 1000, 1000]);
    });

    it('spreads the delay by the jitter fraction', () => {
        const low = new RetryPolicy({ baseDelayMs: 1000, maxDelayMs: 10_000, jitter: 0.2 }, () => 0);
        const high = new RetryPolicy({ baseDelayMs: 1000, maxDelayMs: 10_000, jitter: 0.2 }, () => 0.999999);
        expect(low.delayFor(1)).toBe(800);
        expect(high.delayFor(1)).toBe(1200);
    });

    it('never exceeds the cap after jitter', () => {
        const policy = new RetryPolicy({ baseDelayMs: 1000, maxDelayMs: 1000, jitter: 0.5 }, () => 0.999999);
        expect(policy.delayFor(1)).toBe(1000);
    });

    it('retries transient failures with backoff until success', async () => {
        const clock = new FakeClock();
        const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 1000, jitter: 0 });
        const retries: number[] = [];
        const result = await policy.execute(async (attempt) => {
            if (attempt < 3) throw new TransientTransportError('flaky', 503);
            return `ok on ${attempt}`;
        }, { clock, onRetry: (_err, attempt) => retries.push(attempt) });
        expect(result).toBe('ok on 3');
        expect(clock.sleeps).toEqual([10, 20]);
        expect(retries).toEqual([1, 2]);
    });

    it('gives up after maxAttempts with the last error', async () => {
        const clock = new FakeClock();
        const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 10, jitter: 0 });
        let calls = 0;
        const failure = policy.execute(async (attempt) => {
            calls++;
            throw new TransientTransportError(`attempt ${attempt}`, 500);
        }, { clock });
        await expect(failure).rejects.toThrow('attempt 3');
        expect(calls).toBe(3);
        expect(clock.sleeps).toEqual([1, 2]);
    });

    it('does not retry non-transient errors', async () => {
        const clock = new FakeClock();
        const policy = new RetryPolicy({ maxAttempts: 5 });
        let calls = 0;
        await expect(policy.execute(async () => {
            calls++;
            throw new AuthError('denied', 401);
        }, { clock })).rejects.toBeInstanceOf(AuthError);
        expect(calls).toBe(1);
        expect(clock.sleeps).toEqual([]);
    });

    it('stops when the signal is aborted', async () => {
        const controller = new AbortController();
        const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 1, maxDelayMs: 10, jitter: 0 });
        let calls = 0;
        const run = policy.execute(async () => {
            calls++;
            controller.abort();
            throw new TransientTransportError('reset');
        }, { clock: new FakeClock(), signal: controller.signal });
        await expect(run).rejects.toBeInstanceOf(CancelledError);
        expect(calls).toBe(1);
    });
});
