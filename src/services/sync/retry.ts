/**
 * Retry with exponential backoff
 */

import { MarketplaceApiError } from "../../marketplaces/http.js";

import type { RetryConfig } from "../../config.js";

// Errors that should not be retried
const PERMANENT_ERROR_PATTERNS = [
  /missing credentials/i,
  /unauthori[sz]ed/i,
  /forbidden/i,
  /invalid api key/i,
];

/**
 * Delay before the retry that follows failed attempt number `attempt` (0-based).
 */
export function computeBackoff(attempt: number, retry: RetryConfig): number {
  return Math.min(
    retry.initialBackoffMs * Math.pow(retry.backoffMultiplier, attempt),
    retry.maxBackoffMs
  );
}

export function isPermanentError(error: unknown): boolean {
  if (error instanceof MarketplaceApiError) {
    return !error.transient;
  }
  const message = error instanceof Error ? error.message : String(error);
  return PERMANENT_ERROR_PATTERNS.some((p) => p.test(message));
}

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

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
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, a permanent error occurs, the signal aborts
 * or `maxAttempts` is used up. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  retry: RetryConfig,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, retry.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const exhausted = attempt + 1 >= maxAttempts;
      if (exhausted || options.signal?.aborted || isPermanentError(error)) {
        throw error;
      }
      const delayMs = computeBackoff(attempt, retry);
      options.onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}
