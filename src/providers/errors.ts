/**
 * Provider errors. Anything thrown by a provider is retried unless the
 * run itself was cancelled.
 */

export class ProviderHttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    readonly retryAfterMs?: number
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'ProviderHttpError';
  }
}

export class ProviderTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export class MalformedPayloadError extends Error {
  constructor(
    readonly sourceId: string,
    readonly issues: string[]
  ) {
    super(`Malformed payload from ${sourceId}:\n${issues.join('\n')}`);
    this.name = 'MalformedPayloadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse a Retry-After header: delta seconds or an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
