import { describeError } from '../core/errors.js';
import { logThought } from './logger.js';

/** How often and how patiently a failing delivery is repeated. */
export interface RetryPolicy {
    /** Total tries, the first one included. */
    attempts: number;
    /** Wait before the second try. */
    delayMs: number;
    /** Growth of the wait after every further failure. */
    factor: number;
    maxDelayMs: number;
}

export interface RetryOptions extends Partial<RetryPolicy> {
    label?: string;
    /** Return false for errors that repeating cannot fix, such as a 4xx. */
    shouldRetry?: (error: unknown) => boolean;
}

export type RetryResult<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: string; attempts: number };

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
    attempts: 3,
    delayMs: 1000,
    factor: 2,
    maxDelayMs: 15_000,
};

/** Wait before retry number `retry` (1-based), capped at `maxDelayMs`. */
export function backoffDelay(retry: number, policy: Pick<RetryPolicy, 'delayMs' | 'factor' | 'maxDelayMs'>): number {
    return Math.min(policy.delayMs * policy.factor ** (retry - 1), policy.maxDelayMs);
}

function pause(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Repeats `operation` until it resolves, `shouldRetry` refuses the error, or
 * the attempts run out. Never throws; the outcome is in the result.
 * Only the chat delivery layer uses this.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
    const { label = 'operation', shouldRetry, ...overrides } = options;
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...overrides };
    const attempts = Math.max(1, policy.attempts);

    let attempt = 0;
    for (;;) {
        attempt += 1;
        try {
            const value = await operation();
            if (attempt > 1) {
                await logThought(`[Retry] ${label}: delivered on try ${attempt} of ${attempts}.`);
            }
            return { ok: true, value, attempts: attempt };
        } catch (err) {
            const error = describeError(err);
            if (shouldRetry && !shouldRetry(err)) {
                await logThought(`[Retry] ${label}: giving up on a permanent error: ${error}`);
                return { ok: false, error, attempts: attempt };
            }
            if (attempt >= attempts) {
                await logThought(`[Retry] ${label}: no tries left after ${attempt}: ${error}`);
                return { ok: false, error, attempts: attempt };
            }

            const wait = backoffDelay(attempt, policy);
            await logThought(`[Retry] ${label}: try ${attempt} failed (${error}); next in ${wait}ms.`);
            await pause(wait);
        }
    }
}
