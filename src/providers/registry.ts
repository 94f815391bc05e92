/**
 * Provider Registry
 *
 * Maps each category to the provider that searches it.
 */

import type { ProviderConfig } from '../config/schema';
import type { ProviderCredentials } from '../config/loader';
import type { Category } from '../engine/types';
import { AmadeusClient } from './amadeus-client';
import { AmadeusFlightProvider } from './amadeus-flights';
import { AmadeusHotelProvider } from './amadeus-hotels';
import { PlacesProvider } from './places-poi';
import type { CandidateProvider, FetchImpl } from './types';

export class ProviderRegistry {
  private providers: Map<Category, CandidateProvider> = new Map();

  register(provider: CandidateProvider): void {
    for (const category of provider.categories) {
      const existing = this.providers.get(category);
      if (existing) {
        console.warn(`  [providers] ${category} already served by ${existing.sourceId}, replacing with ${provider.sourceId}`);
      }
      this.providers.set(category, provider);
    }
  }

  get(category: Category): CandidateProvider | undefined {
    return this.providers.get(category);
  }
}

/**
 * Registry wired to the upstreams the credentials allow.
 */
export function createDefaultRegistry(
  credentials: ProviderCredentials,
  config: ProviderConfig,
  fetchImpl: FetchImpl = fetch
): ProviderRegistry {
  const registry = new ProviderRegistry();

  if (credentials.amadeus) {
    const client = new AmadeusClient(credentials.amadeus, fetchImpl);
    registry.register(new AmadeusFlightProvider(client));
    registry.register(new AmadeusHotelProvider(client));
  } else {
    console.error('  [providers] AMADEUS_API_KEY/AMADEUS_API_SECRET not set: no flight or lodging search');
  }

  if (credentials.googlePlacesKey) {
    registry.register(new PlacesProvider(credentials.googlePlacesKey, config, fetchImpl));
  } else {
    console.error('  [providers] GOOGLE_PLACES_KEY not set: no activity or meal search');
  }

  return registry;
}
