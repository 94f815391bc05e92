/**
 * Retry with exponential backoff and a per-attempt timeout.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { withDeadline } from '../utils/deadline';
import { ProviderHttpError, ProviderTimeoutError, errorMessage } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  timeoutMs: number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Delay after the given failed attempt (1-based).
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor'>
): number {
  const delay = options.baseDelayMs * Math.pow(options.backoffFactor, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

/**
 * A 429 with Retry-After waits as long as the server asks, within the cap.
 */
export function retryDelay(
  error: unknown,
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor'>
): number {
  if (error instanceof ProviderHttpError && error.status === 429 && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, options.maxDelayMs);
  }
  return backoffDelay(attempt, options);
}

export async function retryWithBackoff<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { signal } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await withDeadline(operation, options.timeoutMs, () => new ProviderTimeoutError(options.timeoutMs), signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      lastError = error;
      if (attempt === options.maxAttempts) break;

      const delayMs = retryDelay(error, attempt, options);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, undefined, { signal });
    }
  }

  throw new Error(`Gave up after ${options.maxAttempts} attempt(s): ${errorMessage(lastError)}`, {
    cause: lastError,
  });
}
