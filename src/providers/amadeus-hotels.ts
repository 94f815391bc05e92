/**
 * Amadeus Hotels
 *
 * Lists hotels in the destination city, then asks Hotel Search v3 for
 * their offers over the stay. Each hotel yields one lodging candidate at
 * its cheapest offer.
 */

import { z } from 'zod';
import { addDays, validateDateRange } from '../types';
import type { CandidateOption, Category } from '../engine/types';
import { lodgingNights } from '../planning/budget-allocator';
import { roundMoney } from '../planning/money';
import type { AmadeusClient } from './amadeus-client';
import { BaseProvider } from './base-provider';
import type { SearchConstraints } from './types';

export const HotelListResponseSchema = z.object({
  data: z.array(
    z.object({
      hotelId: z.string(),
      name: z.string(),
      geoCode: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
      address: z.object({ lines: z.array(z.string()).optional() }).optional(),
    })
  ),
});

export const HotelOffersResponseSchema = z.object({
  data: z.array(
    z.object({
      available: z.boolean().optional(),
      hotel: z.object({
        hotelId: z.string(),
        name: z.string(),
        rating: z.string().optional(),
        latitude: z.number().optional(),
        longitude: z.number().optional(),
      }),
      offers: z
        .array(
          z.object({
            id: z.string(),
            price: z.object({ currency: z.string(), total: z.string() }),
            room: z.object({ typeEstimated: z.object({ category: z.string().optional() }).optional() }).optional(),
          })
        )
        .default([]),
    })
  ),
});

export type HotelListResponse = z.infer<typeof HotelListResponseSchema>;
export type HotelOffersResponse = z.infer<typeof HotelOffersResponseSchema>;

/** Hotel Search v3 takes a bounded list of hotel ids per call. */
const MAX_HOTEL_IDS = 20;

/**
 * Stay dates for a trip: one night per day but the last, at least one.
 */
export function stayDates(startDate: string, endDate: string): { checkIn: string; checkOut: string } {
  const range = validateDateRange(startDate, endDate);
  const days = range.ok ? range.value.days : 1;
  return { checkIn: startDate, checkOut: addDays(startDate, lodgingNights(days)) };
}

export function normalizeHotelOffers(
  list: HotelListResponse,
  offers: HotelOffersResponse,
  optionId: (providerId: string) => string,
  source = 'amadeus'
): CandidateOption[] {
  const listed = new Map(list.data.map((h) => [h.hotelId, h]));
  const options: CandidateOption[] = [];

  for (const entry of offers.data) {
    if (entry.available === false) continue;
    const priced = entry.offers
      .map((o) => ({ offer: o, amount: Number(o.price.total) }))
      .filter((o) => Number.isFinite(o.amount) && o.amount >= 0)
      .sort((a, b) => a.amount - b.amount);
    const cheapest = priced[0];
    if (!cheapest) continue;

    const { hotel } = entry;
    const info = listed.get(hotel.hotelId);
    const lat = info?.geoCode?.latitude ?? hotel.latitude;
    const lon = info?.geoCode?.longitude ?? hotel.longitude;
    const stars = hotel.rating ? Number(hotel.rating) : NaN;
    const roomCategory = cheapest.offer.room?.typeEstimated?.category;

    options.push({
      id: optionId(hotel.hotelId),
      category: 'lodging',
      source,
      providerId: hotel.hotelId,
      name: info?.name ?? hotel.name,
      price: { amount: roundMoney(cheapest.amount), currency: cheapest.offer.price.currency },
      ...(lat !== undefined &&
        lon !== undefined && {
          location: {
            coordinates: { lat, lon },
            ...(info?.address?.lines && { address: info.address.lines.join(', ') }),
          },
        }),
      durationMinutes: 0,
      tags: [],
      quality: Number.isFinite(stars) ? Math.min(1, Math.max(0, stars / 5)) : 0.5,
      details: {
        offerId: cheapest.offer.id,
        ...(roomCategory && { room: roomCategory }),
      },
    });
  }

  return options;
}

export class AmadeusHotelProvider extends BaseProvider {
  readonly categories: readonly Category[] = ['lodging'];

  constructor(private readonly client: AmadeusClient) {
    super('amadeus');
  }

  async search(category: Category, constraints: SearchConstraints, signal: AbortSignal): Promise<CandidateOption[]> {
    this.assertCategory(category);

    const listData = await this.client.get(
      '/v1/reference-data/locations/hotels/by-city',
      { cityCode: constraints.destination },
      signal
    );
    const list = this.parse(HotelListResponseSchema, listData);
    const hotelIds = list.data.slice(0, Math.min(constraints.maxResults, MAX_HOTEL_IDS)).map((h) => h.hotelId);
    if (hotelIds.length === 0) return [];

    const { checkIn, checkOut } = stayDates(constraints.startDate, constraints.endDate);
    const offerData = await this.client.get(
      '/v3/shopping/hotel-offers',
      {
        hotelIds: hotelIds.join(','),
        adults: String(constraints.travelers),
        checkInDate: checkIn,
        checkOutDate: checkOut,
        currency: constraints.currency,
        bestRateOnly: 'true',
      },
      signal
    );
    const offers = this.parse(HotelOffersResponseSchema, offerData);
    return normalizeHotelOffers(list, offers, (id) => this.optionId('lodging', id), this.sourceId);
  }
}
