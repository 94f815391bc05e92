/**
 * Providers Module
 *
 * Upstream candidate sources and the adapter the planner talks to.
 */

export * from './types';
export * from './errors';
export { retryWithBackoff, backoffDelay, retryDelay } from './backoff';
export type { RetryOptions } from './backoff';
export { CandidateCache, sharedCandidateCache } from './candidate-cache';
export type { CandidateCacheOptions, CacheLookup } from './candidate-cache';
export { BaseProvider, requestJson, parsePayload } from './base-provider';
export { AmadeusClient } from './amadeus-client';
export type { AmadeusCredentials } from './amadeus-client';
export { AmadeusFlightProvider, normalizeFlightOffers, parseIsoDuration } from './amadeus-flights';
export { AmadeusHotelProvider, normalizeHotelOffers, stayDates } from './amadeus-hotels';
export { PlacesProvider, normalizePlaces, dailyWindow, placeTags } from './places-poi';
export { ProviderRegistry, createDefaultRegistry } from './registry';
export { ProviderAdapter, cacheKey, dedupeOptions, convertOptions } from './adapter';
export type { FetchOptions } from './adapter';
