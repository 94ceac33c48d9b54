/**
 * CORE: Bounded retry with exponential backoff.
 * Never loops forever: the last error is rethrown after maxAttempts.
 */

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 50,
    maxDelayMs: 2000,
};

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before attempt `attempt + 1`, for attempt >= 1. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
    const delay = policy.baseDelayMs * Math.pow(2, attempt - 1);
    return Math.min(delay, policy.maxDelayMs ?? Number.POSITIVE_INFINITY);
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: { shouldRetry?: (err: unknown) => boolean; sleep?: Sleep } = {}
): Promise<T> {
    const shouldRetry = options.shouldRetry ?? (() => true);
    const sleep = options.sleep ?? defaultSleep;
    const attempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (err) {
            if (attempt >= attempts || !shouldRetry(err)) {
                throw err;
            }
            await sleep(backoffDelay(policy, attempt));
        }
    }
}
