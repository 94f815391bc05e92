import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, retryDelay, retryWithBackoff } from '../../src/providers/backoff';
import { ProviderHttpError, parseRetryAfter } from '../../src/providers/errors';

const DELAYS = { baseDelayMs: 250, maxDelayMs: 4000, backoffFactor: 2 };
const FAST = { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, backoffFactor: 2, timeoutMs: 1000 };

describe('backoffDelay', () => {
  it('grows exponentially up to the cap', () => {
    expect(backoffDelay(1, DELAYS)).toBe(250);
    expect(backoffDelay(2, DELAYS)).toBe(500);
    expect(backoffDelay(3, DELAYS)).toBe(1000);
    expect(backoffDelay(6, DELAYS)).toBe(4000);
  });
});

describe('retryDelay', () => {
  it('honours Retry-After on 429 within the cap', () => {
    expect(retryDelay(new ProviderHttpError(429, 'https://api.test', 1500), 1, DELAYS)).toBe(1500);
    expect(retryDelay(new ProviderHttpError(429, 'https://api.test', 9000), 1, DELAYS)).toBe(4000);
  });

  it('falls back to backoff for other statuses', () => {
    expect(retryDelay(new ProviderHttpError(503, 'https://api.test', 1500), 2, DELAYS)).toBe(500);
    expect(retryDelay(new Error('reset'), 1, DELAYS)).toBe(250);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:10 GMT', now)).toBe(10000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('ignores missing or unreadable headers', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('retryWithBackoff', () => {
  it('retries until the operation succeeds', async () => {
    const onRetry = vi.fn();
    const operation = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(retryWithBackoff(operation, { ...FAST, onRetry })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error('boom');
    });

    await expect(retryWithBackoff(operation, { ...FAST, maxAttempts: 2 })).rejects.toThrow(
      'Gave up after 2 attempt(s): boom'
    );
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('times out an attempt that never settles', async () => {
    const operation = () => new Promise<string>(() => undefined);

    await expect(retryWithBackoff(operation, { ...FAST, maxAttempts: 1, timeoutMs: 20 })).rejects.toThrow(
      'Gave up after 1 attempt(s): Provider call timed out after 20ms'
    );
  });

  it('aborts the attempt signal when it times out', async () => {
    let attemptSignal: AbortSignal | undefined;
    const operation = (signal: AbortSignal) => {
      attemptSignal = signal;
      return new Promise<string>(() => undefined);
    };

    await expect(retryWithBackoff(operation, { ...FAST, maxAttempts: 1, timeoutMs: 20 })).rejects.toThrow();
    expect(attemptSignal?.aborted).toBe(true);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(retryWithBackoff(operation, { ...FAST, signal: controller.signal })).rejects.toHaveProperty(
      'name',
      'AbortError'
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('stops retrying once cancelled', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new Error('boom');
    });

    await expect(retryWithBackoff(operation, { ...FAST, signal: controller.signal })).rejects.toThrow('boom');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
