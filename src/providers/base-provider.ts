/**
 * Base Provider
 *
 * Abstract base class for upstream providers with common HTTP and payload
 * utilities.
 */

import type { z } from 'zod';
import { formatIssues } from '../config/schema';
import type { CandidateOption, Category } from '../engine/types';
import { MalformedPayloadError, ProviderHttpError, parseRetryAfter } from './errors';
import type { CandidateProvider, FetchImpl, SearchConstraints } from './types';

/**
 * Fetch a URL and return its JSON body. Non-success statuses throw
 * ProviderHttpError carrying any Retry-After delay.
 */
export async function requestJson(
  fetchImpl: FetchImpl,
  url: string,
  init: RequestInit,
  signal: AbortSignal
): Promise<unknown> {
  const response = await fetchImpl(url, { ...init, signal });
  if (!response.ok) {
    throw new ProviderHttpError(response.status, url, parseRetryAfter(response.headers.get('retry-after')));
  }
  return response.json();
}

export function parsePayload<S extends z.ZodTypeAny>(sourceId: string, schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedPayloadError(sourceId, formatIssues(result.error));
  }
  return result.data;
}

export abstract class BaseProvider implements CandidateProvider {
  abstract readonly categories: readonly Category[];

  constructor(
    readonly sourceId: string,
    protected readonly fetchImpl: FetchImpl = fetch
  ) {}

  abstract search(category: Category, constraints: SearchConstraints, signal: AbortSignal): Promise<CandidateOption[]>;

  protected fetchJson(url: string, init: RequestInit, signal: AbortSignal): Promise<unknown> {
    return requestJson(this.fetchImpl, url, init, signal);
  }

  protected parse<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    return parsePayload(this.sourceId, schema, data);
  }

  /**
   * Generate canonical option ID
   */
  protected optionId(category: Category, providerId: string): string {
    return `${this.sourceId}:${category}:${providerId}`;
  }

  protected assertCategory(category: Category): void {
    if (!this.categories.includes(category)) {
      throw new Error(`${this.sourceId} does not search ${category}`);
    }
  }
}
