/**
 * Shared test fixtures: candidate builders, a config copy and an
 * in-process candidate source.
 */

import { DEFAULT_PLANNER_CONFIG } from '../../src/config/constants';
import { mergeConfig, validatePlannerConfig } from '../../src/config/loader';
import type { PlannerConfig } from '../../src/config/schema';
import type { CandidateSource } from '../../src/engine/planner';
import type {
  CandidateOption,
  Category,
  GeoPoint,
  Itinerary,
  MealType,
  OpeningHours,
  ScheduledSlot,
  TripRequest,
} from '../../src/engine/types';
import type { FetchOutcome, SearchConstraints } from '../../src/providers/types';

export const BASE: GeoPoint = { lat: 0, lon: 0 };

export interface OptionFields {
  providerId: string;
  category: Category;
  price?: number;
  currency?: string;
  name?: string;
  quality?: number;
  tags?: string[];
  durationMinutes?: number;
  at?: GeoPoint | null;
  hours?: OpeningHours;
}

export function option(fields: OptionFields): CandidateOption {
  const at = fields.at === undefined ? BASE : fields.at;
  return {
    id: `test:${fields.category}:${fields.providerId}`,
    category: fields.category,
    source: 'test',
    providerId: fields.providerId,
    name: fields.name ?? fields.providerId,
    price: { amount: fields.price ?? 0, currency: fields.currency ?? 'USD' },
    ...(at && { location: { coordinates: at, ...(fields.hours && { openingHours: fields.hours }) } }),
    durationMinutes: fields.durationMinutes ?? (fields.category === 'meal' ? 60 : 120),
    tags: fields.tags ?? [],
    quality: fields.quality ?? 0.5,
  };
}

export function testConfig(overrides: unknown = {}): PlannerConfig {
  return validatePlannerConfig(mergeConfig(DEFAULT_PLANNER_CONFIG, overrides));
}

export function tripRequest(overrides: Partial<TripRequest> = {}): TripRequest {
  return {
    origin: 'TPE',
    destination: 'KIX',
    destinationName: 'Osaka',
    startDate: '2026-03-01',
    endDate: '2026-03-03',
    travelers: 2,
    budget: { amount: 2000, currency: 'USD' },
    interests: ['culture', 'food'],
    ...overrides,
  };
}

/**
 * Candidate source backed by fixed option lists.
 */
export class FakeCandidateSource implements CandidateSource {
  readonly calls: Array<{ category: Category; constraints: SearchConstraints }> = [];

  constructor(
    private readonly options: Partial<Record<Category, CandidateOption[]>>,
    private readonly unavailable: Category[] = []
  ) {}

  async fetch(category: Category, constraints: SearchConstraints, opts: { signal?: AbortSignal }): Promise<FetchOutcome> {
    opts.signal?.throwIfAborted();
    this.calls.push({ category, constraints });
    if (this.unavailable.includes(category)) {
      return {
        category,
        options: [],
        fromCache: false,
        unavailable: { category, kind: 'ProviderUnavailable', message: `fake ${category} search failed` },
        warnings: [],
      };
    }
    return { category, options: this.options[category] ?? [], fromCache: false, warnings: [] };
  }
}

export function slot(
  candidate: CandidateOption,
  start: string,
  end: string,
  startMinutes: number,
  endMinutes: number,
  mealType?: MealType
): ScheduledSlot {
  return {
    dayIndex: 0,
    kind: candidate.category === 'meal' ? 'meal' : 'activity',
    ...(mealType && { mealType }),
    start,
    end,
    startMinutes,
    endMinutes,
    travelMinutesBefore: 0,
    option: candidate,
  };
}

/**
 * Two-day Osaka itinerary: breakfast and a castle visit on day 1, nothing on day 2.
 */
export function sampleItinerary(): Itinerary {
  const flight = option({ providerId: 'f1', category: 'flight', name: 'CI TPE-KIX', price: 400, at: null });
  const lodging = option({ providerId: 'h1', category: 'lodging', name: 'Harbor Inn', price: 300 });
  const cafe = option({ providerId: 'm1', category: 'meal', name: 'Morning Cafe', price: 20.5 });
  const castle = option({ providerId: 'a1', category: 'activity', name: 'Castle', price: 50 });
  return {
    requestId: 'req-1',
    request: tripRequest({ endDate: '2026-03-02' }),
    flight,
    lodging,
    alternativeLodging: [],
    days: [
      {
        dayIndex: 0,
        date: '2026-03-01',
        status: 'full',
        unplanned: false,
        slots: [slot(cafe, '08:00', '08:45', 480, 525, 'breakfast'), slot(castle, '08:45', '10:45', 525, 645)],
      },
      { dayIndex: 1, date: '2026-03-02', status: 'partial', unplanned: true, slots: [] },
    ],
    allocation: {
      total: { amount: 2000, currency: 'USD' },
      byCategory: { flight: 700, lodging: 600, activity: 400, meal: 300 },
      excluded: [],
      unallocated: 0,
      notes: [],
    },
    costBreakdown: { flight: 400, lodging: 300, activity: 50, meal: 20.5 },
    totalCost: { amount: 770.5, currency: 'USD' },
    metadata: { unplannedDays: [1], notices: [], warnings: [] },
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}
