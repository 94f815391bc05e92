/**
 * Amadeus client and normalizer tests against an in-process fetch
 */

import { describe, it, expect, vi } from 'vitest';
import { AmadeusClient, AMADEUS_TEST_URL } from '../../src/providers/amadeus-client';
import {
  AmadeusFlightProvider,
  FlightOffersResponseSchema,
  normalizeFlightOffers,
  parseIsoDuration,
} from '../../src/providers/amadeus-flights';
import {
  HotelListResponseSchema,
  HotelOffersResponseSchema,
  normalizeHotelOffers,
  stayDates,
} from '../../src/providers/amadeus-hotels';
import { ProviderHttpError } from '../../src/providers/errors';
import type { SearchConstraints } from '../../src/providers/types';

const CREDENTIALS = { apiKey: 'test-key', apiSecret: 'test-secret', testMode: true };

const CONSTRAINTS: SearchConstraints = {
  origin: 'TPE',
  destination: 'KIX',
  startDate: '2026-03-01',
  endDate: '2026-03-03',
  travelers: 2,
  currency: 'USD',
  maxResults: 5,
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * Fetch that answers the token endpoint and hands every other URL to `api`.
 */
function amadeusFetch(api: (url: string) => Response) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.endsWith('/v1/security/oauth2/token')) {
      return json({ access_token: 'token-1', expires_in: 1799 });
    }
    return api(url);
  });
}

const signal = new AbortController().signal;

describe('parseIsoDuration', () => {
  it('reads hours, minutes and days', () => {
    expect(parseIsoDuration('PT2H35M')).toBe(155);
    expect(parseIsoDuration('PT45M')).toBe(45);
    expect(parseIsoDuration('P1DT2H')).toBe(1560);
  });

  it('gives 0 for missing or unknown shapes', () => {
    expect(parseIsoDuration(undefined)).toBe(0);
    expect(parseIsoDuration('two hours')).toBe(0);
  });
});

describe('normalizeFlightOffers', () => {
  const payload = FlightOffersResponseSchema.parse({
    data: [
      {
        id: '1',
        price: { currency: 'USD', total: '400.00', grandTotal: '412.50' },
        itineraries: [
          {
            duration: 'PT2H35M',
            segments: [
              {
                departure: { iataCode: 'TPE', at: '2026-03-01T08:00:00' },
                arrival: { iataCode: 'KIX', at: '2026-03-01T11:35:00' },
                carrierCode: 'CI',
                number: '152',
              },
            ],
          },
          {
            duration: 'PT5H',
            segments: [
              {
                departure: { iataCode: 'KIX', at: '2026-03-03T09:00:00' },
                arrival: { iataCode: 'NRT', at: '2026-03-03T10:15:00' },
                carrierCode: 'JL',
                number: '100',
              },
              {
                departure: { iataCode: 'NRT', at: '2026-03-03T12:00:00' },
                arrival: { iataCode: 'TPE', at: '2026-03-03T14:00:00' },
                carrierCode: 'JL',
                number: '200',
              },
            ],
          },
        ],
      },
      {
        id: '2',
        price: { currency: 'USD', total: '380.00' },
        itineraries: [
          {
            duration: 'PT2H40M',
            segments: [
              {
                departure: { iataCode: 'TPE', at: '2026-03-01T10:00:00' },
                arrival: { iataCode: 'KIX', at: '2026-03-01T13:40:00' },
                carrierCode: 'BR',
                number: '178',
              },
            ],
          },
        ],
      },
      {
        id: '3',
        price: { currency: 'USD', total: 'n/a' },
        itineraries: [
          {
            segments: [
              {
                departure: { iataCode: 'TPE', at: '2026-03-01T12:00:00' },
                arrival: { iataCode: 'KIX', at: '2026-03-01T15:40:00' },
                carrierCode: 'IT',
                number: '210',
              },
            ],
          },
        ],
      },
    ],
    dictionaries: { carriers: { CI: 'China Airlines' } },
  });

  const options = normalizeFlightOffers(payload, (id) => `amadeus:flight:${id}`);

  it('skips offers without a usable price', () => {
    expect(options).toHaveLength(2);
  });

  it('names, prices and rates a connecting round trip', () => {
    const [connecting] = options;
    expect(connecting.providerId).toBe('CI152@2026-03-01T08:00:00|JL100@2026-03-03T09:00:00|JL200@2026-03-03T12:00:00');
    expect(connecting.id).toBe(`amadeus:flight:${connecting.providerId}`);
    expect(connecting.name).toBe('China Airlines TPE-KIX');
    expect(connecting.price).toEqual({ amount: 412.5, currency: 'USD' });
    expect(connecting.durationMinutes).toBe(155);
    expect(connecting.tags).toEqual([]);
    expect(connecting.quality).toBe(0.5);
    expect(connecting.details).toEqual({
      carrier: 'China Airlines',
      departure: '2026-03-01T08:00:00',
      arrival: '2026-03-01T11:35:00',
      stops: '1',
    });
  });

  it('tags nonstop offers and falls back to the carrier code', () => {
    const nonstop = options[1];
    expect(nonstop.name).toBe('BR TPE-KIX');
    expect(nonstop.price.amount).toBe(380);
    expect(nonstop.tags).toEqual(['nonstop']);
    expect(nonstop.quality).toBe(1);
  });
});

describe('normalizeHotelOffers', () => {
  const list = HotelListResponseSchema.parse({
    data: [
      {
        hotelId: 'H1',
        name: 'Harbor Inn',
        geoCode: { latitude: 34.6, longitude: 135.5 },
        address: { lines: ['1 Bay St', 'Osaka'] },
      },
      { hotelId: 'H2', name: 'Hill Lodge' },
    ],
  });
  const offers = HotelOffersResponseSchema.parse({
    data: [
      {
        hotel: { hotelId: 'H1', name: 'HARBOR INN', rating: '4' },
        offers: [
          { id: 'o2', price: { currency: 'USD', total: '320.00' } },
          {
            id: 'o1',
            price: { currency: 'USD', total: '280.40' },
            room: { typeEstimated: { category: 'STANDARD_ROOM' } },
          },
        ],
      },
      {
        available: false,
        hotel: { hotelId: 'H2', name: 'Hill Lodge' },
        offers: [{ id: 'o3', price: { currency: 'USD', total: '100.00' } }],
      },
      { hotel: { hotelId: 'H3', name: 'Loft', latitude: 34.7, longitude: 135.4 } },
      {
        hotel: { hotelId: 'H4', name: 'Dock', latitude: 34.7, longitude: 135.4 },
        offers: [{ id: 'o4', price: { currency: 'EUR', total: '90' } }],
      },
    ],
  });

  const options = normalizeHotelOffers(list, offers, (id) => `amadeus:lodging:${id}`);

  it('keeps available hotels that have an offer', () => {
    expect(options.map((o) => o.providerId)).toEqual(['H1', 'H4']);
  });

  it('uses the cheapest offer and the listing details', () => {
    const [harbor] = options;
    expect(harbor.name).toBe('Harbor Inn');
    expect(harbor.price).toEqual({ amount: 280.4, currency: 'USD' });
    expect(harbor.location).toEqual({
      coordinates: { lat: 34.6, lon: 135.5 },
      address: '1 Bay St, Osaka',
    });
    expect(harbor.quality).toBe(0.8);
    expect(harbor.details).toEqual({ offerId: 'o1', room: 'STANDARD_ROOM' });
  });

  it('falls back to offer coordinates and a neutral quality', () => {
    const dock = options[1];
    expect(dock.location).toEqual({ coordinates: { lat: 34.7, lon: 135.4 } });
    expect(dock.quality).toBe(0.5);
    expect(dock.price).toEqual({ amount: 90, currency: 'EUR' });
    expect(dock.details).toEqual({ offerId: 'o4' });
  });
});

describe('stayDates', () => {
  it('checks out on the last day', () => {
    expect(stayDates('2026-03-01', '2026-03-03')).toEqual({ checkIn: '2026-03-01', checkOut: '2026-03-03' });
  });

  it('books one night for a single-day trip', () => {
    expect(stayDates('2026-03-01', '2026-03-01')).toEqual({ checkIn: '2026-03-01', checkOut: '2026-03-02' });
  });
});

describe('AmadeusClient', () => {
  it('reuses the access token across calls', async () => {
    const fetchImpl = amadeusFetch(() => json({ data: [] }));
    const client = new AmadeusClient(CREDENTIALS, fetchImpl);

    await client.get('/v1/a', {}, signal);
    await client.get('/v1/b', { q: '1' }, signal);

    const urls = fetchImpl.mock.calls.map(([input]) => String(input));
    expect(urls).toEqual([
      `${AMADEUS_TEST_URL}/v1/security/oauth2/token`,
      `${AMADEUS_TEST_URL}/v1/a?`,
      `${AMADEUS_TEST_URL}/v1/b?q=1`,
    ]);
    const headers = new Headers(fetchImpl.mock.calls[1][1]?.headers);
    expect(headers.get('Authorization')).toBe('Bearer token-1');
  });

  it('requests a new token once the old one nears expiry', async () => {
    let now = 0;
    const fetchImpl = amadeusFetch(() => json({ data: [] }));
    const client = new AmadeusClient(CREDENTIALS, fetchImpl, () => now);

    await client.get('/v1/a', {}, signal);
    now = 1799 * 1000 - 60_000;
    await client.get('/v1/a', {}, signal);

    const tokenCalls = fetchImpl.mock.calls.filter(([input]) => String(input).endsWith('/oauth2/token'));
    expect(tokenCalls).toHaveLength(2);
  });

  it('drops the token on 401', async () => {
    let status = 401;
    const fetchImpl = amadeusFetch(() => json({ errors: [] }, status));
    const client = new AmadeusClient(CREDENTIALS, fetchImpl);

    await expect(client.get('/v1/a', {}, signal)).rejects.toBeInstanceOf(ProviderHttpError);
    status = 200;
    await client.get('/v1/a', {}, signal);

    const tokenCalls = fetchImpl.mock.calls.filter(([input]) => String(input).endsWith('/oauth2/token'));
    expect(tokenCalls).toHaveLength(2);
  });

  it('keeps a shared token request alive when one caller is cancelled', async () => {
    let releaseToken: () => void = () => undefined;
    const fetchImpl = vi.fn<typeof fetch>(async (input) => {
      if (String(input).endsWith('/v1/security/oauth2/token')) {
        await new Promise<void>((resolve) => {
          releaseToken = resolve;
        });
        return json({ access_token: 'token-1', expires_in: 1799 });
      }
      return json({ data: [] });
    });
    const client = new AmadeusClient(CREDENTIALS, fetchImpl);
    const runA = new AbortController();

    const first = client.get('/v1/a', {}, runA.signal);
    const second = client.get('/v1/b', {}, new AbortController().signal);
    runA.abort(new Error('run A cancelled'));

    await expect(first).rejects.toThrow('run A cancelled');
    releaseToken();
    await expect(second).resolves.toEqual({ data: [] });

    const tokenCalls = fetchImpl.mock.calls.filter(([input]) => String(input).endsWith('/oauth2/token'));
    expect(tokenCalls).toHaveLength(1);
    expect(tokenCalls[0][1]?.signal?.aborted).toBe(false);
  });

  it('aborts the token request once its last caller is cancelled', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('token aborted')), { once: true });
        })
    );
    const client = new AmadeusClient(CREDENTIALS, fetchImpl);
    const controller = new AbortController();

    const call = client.get('/v1/a', {}, controller.signal);
    controller.abort(new Error('cancelled'));

    await expect(call).rejects.toThrow('cancelled');
    expect(fetchImpl.mock.calls[0][1]?.signal?.aborted).toBe(true);
  });
});

describe('AmadeusFlightProvider', () => {
  it('searches a round trip in the requested currency', async () => {
    const fetchImpl = amadeusFetch(() => json({ data: [] }));
    const provider = new AmadeusFlightProvider(new AmadeusClient(CREDENTIALS, fetchImpl));

    await expect(provider.search('flight', CONSTRAINTS, signal)).resolves.toEqual([]);

    const url = new URL(String(fetchImpl.mock.calls[1][0]));
    expect(url.pathname).toBe('/v2/shopping/flight-offers');
    expect(url.searchParams.get('originLocationCode')).toBe('TPE');
    expect(url.searchParams.get('returnDate')).toBe('2026-03-03');
    expect(url.searchParams.get('adults')).toBe('2');
    expect(url.searchParams.get('currencyCode')).toBe('USD');
  });

  it('returns nothing without an origin', async () => {
    const fetchImpl = amadeusFetch(() => json({ data: [] }));
    const provider = new AmadeusFlightProvider(new AmadeusClient(CREDENTIALS, fetchImpl));

    await expect(provider.search('flight', { ...CONSTRAINTS, origin: undefined }, signal)).resolves.toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('rejects a malformed payload', async () => {
    const fetchImpl = amadeusFetch(() => json({ data: [{ id: 1 }] }));
    const provider = new AmadeusFlightProvider(new AmadeusClient(CREDENTIALS, fetchImpl));

    await expect(provider.search('flight', CONSTRAINTS, signal)).rejects.toThrow('Malformed payload from amadeus');
  });
});
