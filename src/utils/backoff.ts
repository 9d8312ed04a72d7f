/**
 * Backoff and sleep helpers shared by the orchestrator and the scheduler
 */

import { RunCancelledError } from "@/errors";

/**
 * Compute exponential backoff delay with jitter
 * Formula: min(maxDelay, baseDelay * 2^(attempt-1)) * (0.5 + random(0.5))
 *
 * @param attempt - 1-based number of the attempt that just failed
 * @param random - Source of jitter in [0, 1), injectable for tests
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = 0.5 + random() * 0.5; // Random between 0.5 and 1.0
  return Math.floor(cappedDelay * jitter);
}

/**
 * Delay before the next attempt: the provider's Retry-After hint when it
 * gave one (clamped), otherwise exponential backoff.
 */
export function computeRetryDelay(
  attempt: number,
  options: {
    baseDelayMs: number;
    maxDelayMs: number;
    maxRetryAfterMs: number;
    retryAfterMs?: number;
    random?: () => number;
  },
): number {
  if (options.retryAfterMs !== undefined && options.retryAfterMs > 0) {
    return Math.min(options.retryAfterMs, options.maxRetryAfterMs);
  }
  return computeBackoffDelay(attempt, options.baseDelayMs, options.maxDelayMs, options.random);
}

/**
 * Sleep for the specified number of milliseconds
 *
 * @throws {RunCancelledError} If the signal fires before or during the sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new RunCancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
