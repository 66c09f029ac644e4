/**
 * Retry helpers for destination delivery.
 */

import type { RetryPolicy } from "../config/settings.js";

/**
 * Exponential backoff before the next attempt, after `retryCount`
 * retryable failures.
 * Formula: min(baseDelayMs * 2^(retryCount - 1), maxDelayMs)
 * With the defaults: 1s, 2s, 4s, ... capped at 30s.
 */
export function computeBackoffMs(retryCount: number, policy: RetryPolicy): number {
  const exponent = Math.max(0, retryCount - 1);
  return Math.min(policy.baseDelayMs * Math.pow(2, exponent), policy.maxDelayMs);
}

/** Whether another attempt is allowed after `retryCount` retryable failures. */
export function shouldRetry(retryCount: number, policy: RetryPolicy): boolean {
  return retryCount < policy.maxRetries;
}

/**
 * Wait `ms` milliseconds. Resolves true when the wait ran to completion and
 * false when `signal` aborted it first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
