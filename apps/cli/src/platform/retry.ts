/**
 * Retry with exponential backoff for transient remote failures.
 * Only errors accepted by `shouldRetry` are retried; anything else is
 * rethrown on the first attempt.
 */

import { RateLimitedError, TransportError } from './errors';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 500) */
  baseDelay?: number;
  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelay?: number;
  /** Which errors are worth another attempt (default: transport and rate limit errors) */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, nextDelay: number) => void;
  /** Once aborted, the last error is rethrown instead of retried */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxRetries: 2,
  baseDelay: 500,
  maxDelay: 10000,
};

export function isTransient(error: unknown): boolean {
  return error instanceof TransportError || error instanceof RateLimitedError;
}

/**
 * Execute `fn`, retrying transient failures.
 *
 * Delay before retry n (1-based) is `baseDelay * 2^(n-1)`, capped at `maxDelay`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = DEFAULT_OPTIONS.maxRetries,
    baseDelay = DEFAULT_OPTIONS.baseDelay,
    maxDelay = DEFAULT_OPTIONS.maxDelay,
    shouldRetry = isTransient,
    onRetry,
    signal,
  } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      attempt++;
      if (attempt > maxRetries || !shouldRetry(error) || signal?.aborted) {
        throw error;
      }
      const lastError = error instanceof Error ? error : new Error(String(error));
      const delay = calculateBackoffDelay(attempt - 1, baseDelay, maxDelay);
      onRetry?.(attempt, lastError, delay);
      await sleep(delay, signal);
      if (signal?.aborted) {
        throw error;
      }
    }
  }
}

/**
 * delay = baseDelay * 2^attempt, capped at maxDelay
 */
export function calculateBackoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * Math.pow(2, attempt), maxDelay);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
