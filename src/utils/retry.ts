import type { RetryConfig } from '../types/index.js';

/**
 * Retry timing shared by the HTTP client and the LLM wrapper.
 */
export type RetryPolicy = RetryConfig;

/**
 * Exponential backoff with symmetric jitter:
 * `min(maxDelay, initialDelay · base^attempt) · (1 ± jitter)`.
 *
 * @param attempt - zero-based attempt that just failed
 */
export function computeBackoff(
    attempt: number,
    policy: RetryPolicy,
    random: () => number = Math.random
): number {
    const exponential = policy.initialDelayMs * Math.pow(policy.backoffBase, attempt);
    const capped = Math.min(policy.maxDelayMs, exponential);
    const spread = capped * policy.jitter;
    return Math.max(0, capped - spread + random() * 2 * spread);
}

/**
 * Sleep for the specified number of milliseconds.
 * Rejects with the signal's reason if it aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
