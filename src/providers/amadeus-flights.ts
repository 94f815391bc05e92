/**
 * Amadeus Flight Offers
 *
 * Round-trip flight search through /v2/shopping/flight-offers, normalized
 * into flight candidates priced for the whole party.
 */

import { z } from 'zod';
import type { CandidateOption, Category } from '../engine/types';
import { roundMoney } from '../planning/money';
import type { AmadeusClient } from './amadeus-client';
import { BaseProvider } from './base-provider';
import type { SearchConstraints } from './types';

const EndpointSchema = z.object({
  iataCode: z.string(),
  at: z.string(),
});

const SegmentSchema = z.object({
  departure: EndpointSchema,
  arrival: EndpointSchema,
  carrierCode: z.string(),
  number: z.string(),
});

const FlightOfferSchema = z.object({
  id: z.string(),
  price: z.object({
    currency: z.string(),
    total: z.string(),
    grandTotal: z.string().optional(),
  }),
  itineraries: z
    .array(
      z.object({
        duration: z.string().optional(),
        segments: z.array(SegmentSchema).min(1),
      })
    )
    .min(1),
});

export const FlightOffersResponseSchema = z.object({
  data: z.array(FlightOfferSchema),
  dictionaries: z
    .object({
      carriers: z.record(z.string(), z.string()).optional(),
    })
    .optional(),
});

export type FlightOffersResponse = z.infer<typeof FlightOffersResponseSchema>;
type FlightOffer = z.infer<typeof FlightOfferSchema>;

/**
 * Minutes in an ISO-8601 duration such as `PT2H35M`. Unknown shapes give 0.
 */
export function parseIsoDuration(duration: string | undefined): number {
  const match = duration?.match(/^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?$/);
  if (!match) return 0;
  const [, days, hours, minutes] = match;
  return Number(days ?? 0) * 1440 + Number(hours ?? 0) * 60 + Number(minutes ?? 0);
}

function offerProviderId(offer: FlightOffer): string {
  return offer.itineraries
    .flatMap((it) => it.segments.map((s) => `${s.carrierCode}${s.number}@${s.departure.at}`))
    .join('|');
}

export function normalizeFlightOffers(
  payload: FlightOffersResponse,
  optionId: (providerId: string) => string,
  source = 'amadeus'
): CandidateOption[] {
  const carriers = payload.dictionaries?.carriers ?? {};
  const options: CandidateOption[] = [];

  for (const offer of payload.data) {
    const amount = Number(offer.price.grandTotal ?? offer.price.total);
    if (!Number.isFinite(amount) || amount < 0) continue;

    const outbound = offer.itineraries[0];
    const first = outbound.segments[0];
    const last = outbound.segments[outbound.segments.length - 1];
    const carrier = carriers[first.carrierCode] ?? first.carrierCode;
    const maxStops = Math.max(...offer.itineraries.map((it) => it.segments.length - 1));
    const providerId = offerProviderId(offer);

    options.push({
      id: optionId(providerId),
      category: 'flight',
      source,
      providerId,
      name: `${carrier} ${first.departure.iataCode}-${last.arrival.iataCode}`,
      price: { amount: roundMoney(amount), currency: offer.price.currency },
      durationMinutes: parseIsoDuration(outbound.duration),
      tags: maxStops === 0 ? ['nonstop'] : [],
      quality: 1 / (1 + maxStops),
      details: {
        carrier,
        departure: first.departure.at,
        arrival: last.arrival.at,
        stops: String(maxStops),
      },
    });
  }

  return options;
}

export class AmadeusFlightProvider extends BaseProvider {
  readonly categories: readonly Category[] = ['flight'];

  constructor(private readonly client: AmadeusClient) {
    super('amadeus');
  }

  async search(category: Category, constraints: SearchConstraints, signal: AbortSignal): Promise<CandidateOption[]> {
    this.assertCategory(category);
    if (!constraints.origin) return [];

    const params: Record<string, string> = {
      originLocationCode: constraints.origin,
      destinationLocationCode: constraints.destination,
      departureDate: constraints.startDate,
      adults: String(constraints.travelers),
      currencyCode: constraints.currency,
      max: String(constraints.maxResults),
    };
    if (constraints.endDate !== constraints.startDate) params.returnDate = constraints.endDate;

    const data = await this.client.get('/v2/shopping/flight-offers', params, signal);
    const payload = this.parse(FlightOffersResponseSchema, data);
    return normalizeFlightOffers(payload, (id) => this.optionId('flight', id), this.sourceId);
  }
}
