/**
 * Provider Adapter
 *
 * Single entry point the planner uses to fetch candidates for a category.
 * Adds caching, retries, currency conversion and dedupe on top of the
 * registered provider. Upstream failure degrades to an empty result with a
 * ProviderUnavailable notice; cancellation propagates.
 */

import { convertCurrency } from '../config/constants';
import type { ProviderConfig } from '../config/schema';
import type { CandidateOption, Category } from '../engine/types';
import { retryWithBackoff } from './backoff';
import { sharedCandidateCache, type CandidateCache } from './candidate-cache';
import { errorMessage } from './errors';
import type { ProviderRegistry } from './registry';
import type { FetchOutcome, SearchConstraints } from './types';

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Cache key: category plus constraints with case and whitespace folded.
 */
export function cacheKey(category: Category, constraints: SearchConstraints): string {
  const fold = (value: string | undefined): string => (value ?? '').trim().toUpperCase();
  return [
    category,
    fold(constraints.origin),
    fold(constraints.destination),
    fold(constraints.destinationName),
    constraints.startDate,
    constraints.endDate,
    constraints.travelers,
    fold(constraints.currency),
    constraints.maxResults,
  ].join('|');
}

/**
 * First occurrence of each (category, providerId) wins.
 */
export function dedupeOptions(options: readonly CandidateOption[]): CandidateOption[] {
  const seen = new Set<string>();
  return options.filter((option) => {
    const key = `${option.category}:${option.providerId}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Convert every price to `currency`. Options without a known rate are dropped.
 */
export function convertOptions(
  options: readonly CandidateOption[],
  currency: string,
  rates: Record<string, number>
): { options: CandidateOption[]; dropped: CandidateOption[] } {
  const converted: CandidateOption[] = [];
  const dropped: CandidateOption[] = [];
  for (const option of options) {
    const amount = convertCurrency(option.price.amount, option.price.currency, currency, rates);
    if (amount === null) {
      dropped.push(option);
      continue;
    }
    converted.push(amount === option.price.amount && option.price.currency === currency
      ? option
      : { ...option, price: { amount, currency } });
  }
  return { options: converted, dropped };
}

export class ProviderAdapter {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly config: ProviderConfig,
    private readonly cache: CandidateCache<CandidateOption[]> = sharedCandidateCache(config.cacheSweepIntervalMs)
  ) {}

  async fetch(category: Category, constraints: SearchConstraints, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { signal } = options;
    const provider = this.registry.get(category);
    if (!provider) {
      return {
        category,
        options: [],
        fromCache: false,
        unavailable: { category, kind: 'ProviderUnavailable', message: `No provider registered for ${category}` },
        warnings: [],
      };
    }

    const ttlMs = this.config.cacheTtlSeconds[category] * 1000;
    let raw: CandidateOption[];
    let fromCache: boolean;
    try {
      const lookup = await this.cache.getOrLoad(
        cacheKey(category, constraints),
        ttlMs,
        (loadSignal) =>
          retryWithBackoff((attemptSignal) => provider.search(category, constraints, attemptSignal), {
            maxAttempts: this.config.maxAttempts,
            baseDelayMs: this.config.baseDelayMs,
            maxDelayMs: this.config.maxDelayMs,
            backoffFactor: this.config.backoffFactor,
            timeoutMs: this.config.timeoutMs,
            signal: loadSignal,
            onRetry: (attempt, error, delayMs) =>
              console.warn(
                `  [providers] ${provider.sourceId} ${category} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`
              ),
          }),
        signal
      );
      raw = lookup.value;
      fromCache = lookup.fromCache;
    } catch (error) {
      if (signal?.aborted) throw error;
      console.error(`  [providers] ${provider.sourceId} ${category} unavailable: ${errorMessage(error)}`);
      return {
        category,
        options: [],
        fromCache: false,
        unavailable: {
          category,
          kind: 'ProviderUnavailable',
          message: `${provider.sourceId} ${category} search failed: ${errorMessage(error)}`,
        },
        warnings: [],
      };
    }

    const { options: converted, dropped } = convertOptions(
      dedupeOptions(raw.filter((o) => o.category === category)),
      constraints.currency,
      this.config.exchangeRates
    );
    const warnings = dropped.length > 0
      ? [`Dropped ${dropped.length} ${category} option(s) with no exchange rate to ${constraints.currency}`]
      : [];

    return { category, options: converted, fromCache, warnings };
  }
}
