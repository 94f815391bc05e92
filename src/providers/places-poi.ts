/**
 * Google Places Points of Interest
 *
 * Text Search (New) for attractions and restaurants at the destination.
 * Price levels become per-person estimates, place types become interest
 * tags and regular opening hours become a single daily window.
 */

import { z } from 'zod';
import type { ProviderConfig } from '../config/schema';
import type { CandidateOption, Category, OpeningHours } from '../engine/types';
import { roundMoney } from '../planning/money';
import { BaseProvider } from './base-provider';
import type { FetchImpl, SearchConstraints } from './types';

export const PLACES_SEARCH_URL = 'https://places.googleapis.com/v1/places:searchText';

const FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.rating',
  'places.priceLevel',
  'places.types',
  'places.regularOpeningHours',
].join(',');

/** Text Search returns at most this many places per page. */
const MAX_PAGE_SIZE = 20;

/** Estimates in `priceLevelEstimates` are in this currency. */
export const PRICE_ESTIMATE_CURRENCY = 'USD';

const PointSchema = z.object({
  day: z.number().int().min(0).max(6),
  hour: z.number().int().min(0).max(24),
  minute: z.number().int().min(0).max(59),
});

const PlaceSchema = z.object({
  id: z.string(),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  rating: z.number().min(0).max(5).optional(),
  priceLevel: z.string().optional(),
  types: z.array(z.string()).default([]),
  regularOpeningHours: z
    .object({
      periods: z.array(z.object({ open: PointSchema, close: PointSchema.optional() })).default([]),
    })
    .optional(),
});

export const PlacesSearchResponseSchema = z.object({
  places: z.array(PlaceSchema).default([]),
});

export type PlacesSearchResponse = z.infer<typeof PlacesSearchResponseSchema>;
type Place = z.infer<typeof PlaceSchema>;
type OpeningPeriod = NonNullable<Place['regularOpeningHours']>['periods'][number];

export type HoursWindow = OpeningHours | 'always' | 'never';

/**
 * One daily window valid on every open day: the latest opening and the
 * earliest closing across the periods. A period without a close means the
 * place never closes.
 */
export function dailyWindow(periods: readonly OpeningPeriod[]): HoursWindow {
  if (periods.length === 0) return 'always';
  let open = 0;
  let close = 24 * 60;
  for (const period of periods) {
    if (!period.close) return 'always';
    const opensAt = period.open.hour * 60 + period.open.minute;
    const closesAt = period.close.day === period.open.day ? period.close.hour * 60 + period.close.minute : 24 * 60;
    open = Math.max(open, opensAt);
    close = Math.min(close, closesAt);
  }
  return close > open ? { open, close } : 'never';
}

export function placeTags(types: readonly string[], placeTypeTags: Record<string, string[]>): string[] {
  const tags = new Set<string>();
  for (const type of types) {
    for (const tag of placeTypeTags[type] ?? []) tags.add(tag);
  }
  return [...tags].sort();
}

export function searchQuery(category: Category, placeName: string): string {
  return category === 'meal' ? `restaurants in ${placeName}` : `top tourist attractions in ${placeName}`;
}

export function normalizePlaces(
  payload: PlacesSearchResponse,
  category: Category,
  travelers: number,
  config: Pick<ProviderConfig, 'priceLevelEstimates' | 'placeTypeTags' | 'defaultDurations'>,
  optionId: (providerId: string) => string,
  source = 'google-places'
): CandidateOption[] {
  const options: CandidateOption[] = [];
  const duration = category === 'meal' ? config.defaultDurations.meal : config.defaultDurations.activity;

  for (const place of payload.places) {
    if (!place.location) continue;
    const hours = dailyWindow(place.regularOpeningHours?.periods ?? []);
    if (hours === 'never') continue;

    const perPerson =
      config.priceLevelEstimates[place.priceLevel ?? 'PRICE_LEVEL_UNSPECIFIED'] ??
      config.priceLevelEstimates.PRICE_LEVEL_UNSPECIFIED ??
      0;

    options.push({
      id: optionId(place.id),
      category,
      source,
      providerId: place.id,
      name: place.displayName?.text ?? place.id,
      price: { amount: roundMoney(perPerson * travelers), currency: PRICE_ESTIMATE_CURRENCY },
      location: {
        coordinates: { lat: place.location.latitude, lon: place.location.longitude },
        ...(hours !== 'always' && { openingHours: hours }),
        ...(place.formattedAddress && { address: place.formattedAddress }),
      },
      durationMinutes: duration,
      tags: placeTags(place.types, config.placeTypeTags),
      quality: place.rating !== undefined ? place.rating / 5 : 0.5,
      ...(place.priceLevel && { details: { priceLevel: place.priceLevel } }),
    });
  }

  return options;
}

export class PlacesProvider extends BaseProvider {
  readonly categories: readonly Category[] = ['activity', 'meal'];

  constructor(
    private readonly apiKey: string,
    private readonly config: Pick<ProviderConfig, 'priceLevelEstimates' | 'placeTypeTags' | 'defaultDurations'>,
    fetchImpl?: FetchImpl
  ) {
    super('google-places', fetchImpl);
  }

  async search(category: Category, constraints: SearchConstraints, signal: AbortSignal): Promise<CandidateOption[]> {
    this.assertCategory(category);
    const data = await this.fetchJson(
      PLACES_SEARCH_URL,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-Goog-Api-Key': this.apiKey,
          'X-Goog-FieldMask': FIELD_MASK,
        },
        body: JSON.stringify({
          textQuery: searchQuery(category, constraints.destinationName ?? constraints.destination),
          maxResultCount: Math.min(constraints.maxResults, MAX_PAGE_SIZE),
          languageCode: 'en',
        }),
      },
      signal
    );
    const payload = this.parse(PlacesSearchResponseSchema, data);
    return normalizePlaces(
      payload,
      category,
      constraints.travelers,
      this.config,
      (id) => this.optionId(category, id),
      this.sourceId
    );
  }
}
