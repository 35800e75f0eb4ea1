/**
 * Caller-level Retry
 *
 * Retries an operation while the failure classifier says the error is
 * retryable and attempts remain. Backoff is exponential with full jitter:
 * the wait before attempt n+1 is uniform in [0, min(maxDelay, base * 2^(n-1))].
 *
 * @example
 * ```typescript
 * const raw = await withRetry(
 *   () => retriever.retrieve(context, query, topK),
 *   { maxAttempts: 3, sourceComponent: 'retrieval' }
 * );
 * ```
 */

import { setTimeout as delay } from 'node:timers/promises';

import { classify, type ClassifiedError, type SourceComponent } from '../errors/index.js';

export interface RetryInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  /** Wait before the next attempt */
  delayMs: number;
  classified: ClassifiedError;
  error: unknown;
}

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Base backoff delay (default: 500) */
  baseDelayMs?: number;
  /** Backoff ceiling (default: 8000) */
  maxDelayMs?: number;
  sourceComponent: SourceComponent;
  onRetry?: (info: RetryInfo) => void;
  /** Stop retrying once aborted */
  signal?: AbortSignal;
  /** Source of jitter in [0, 1); injectable for tests */
  random?: () => number;
  /** Wait implementation; injectable for tests. Rejects once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
} as const;

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/**
 * Full-jitter delay before the attempt after `attempt`.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. The last error is rethrown unchanged.
 *
 * @param operation - Receives the 1-based attempt number
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classified = classify(error, options.sourceComponent);
      if (!classified.retryable || attempt >= maxAttempts || options.signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, options.random);
      options.onRetry?.({ attempt, delayMs, classified, error });
      await sleep(delayMs, options.signal);
    }
  }
}
