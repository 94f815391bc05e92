/**
 * Planner Configuration Constants
 *
 * Defaults for every tunable heuristic. Overridable through
 * data/planner-config.json and environment variables (see loader).
 */

import type { PlannerConfig } from './schema';

/**
 * Default values for the whole engine.
 *
 * Budget: the baseline split shifts toward activities by
 * `activityShiftPerTag` for each activity-relevant interest, up to
 * `maxActivityShift`.
 *
 * Travel time: a straight-line approximation, `overheadMinutes +
 * distanceKm * minutesPerKm` rounded up. It is not a routing estimate.
 */
export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  budget: {
    baseline: { flight: 0.35, lodging: 0.3, activity: 0.2, meal: 0.15 },
    floorFractions: { flight: 0.1, lodging: 0.1, activity: 0.05, meal: 0.05 },
    ceilingFractions: { flight: 0.6, lodging: 0.5, activity: 0.5, meal: 0.35 },
    mandatoryFloors: { flight: 100, lodging: 50, activity: 0, meal: 0 },
    activityShiftPerTag: 0.03,
    maxActivityShift: 0.15,
    activityInterestTags: [
      'culture',
      'adventure',
      'nature',
      'nightlife',
      'shopping',
      'beach',
      'mountain',
      'family',
      'history',
      'art',
    ],
  },

  selection: {
    interestWeight: 1,
    qualityWeight: 1,
    coreTopK: 5,
    slotMargin: 3,
    alternativeLodgingCount: 3,
  },

  schedule: {
    dayStart: '08:00',
    dayEnd: '22:00',
    meals: {
      breakfast: { start: '07:30', end: '09:30', durationMinutes: 45, enabled: true },
      lunch: { start: '12:00', end: '14:00', durationMinutes: 60, enabled: true },
      dinner: { start: '18:30', end: '21:00', durationMinutes: 90, enabled: true },
    },
    maxActivitiesPerDay: 3,
    travel: {
      overheadMinutes: 5,
      minutesPerKm: 4,
      unknownLocationMinutes: 20,
    },
  },

  providers: {
    timeoutMs: 10000,
    maxAttempts: 3,
    baseDelayMs: 250,
    maxDelayMs: 4000,
    backoffFactor: 2,
    maxResults: 20,
    cacheTtlSeconds: { flight: 3600, lodging: 3600, activity: 86400, meal: 86400 },
    cacheSweepIntervalMs: 60000,
    exchangeRates: {
      EUR_USD: 1.08,
      GBP_USD: 1.27,
      JPY_USD: 0.0067,
      SGD_USD: 0.74,
      USD_EUR: 0.93,
      USD_SGD: 1.35,
    },
    priceLevelEstimates: {
      PRICE_LEVEL_UNSPECIFIED: 20,
      PRICE_LEVEL_FREE: 0,
      PRICE_LEVEL_INEXPENSIVE: 15,
      PRICE_LEVEL_MODERATE: 35,
      PRICE_LEVEL_EXPENSIVE: 70,
      PRICE_LEVEL_VERY_EXPENSIVE: 120,
    },
    placeTypeTags: {},
    defaultDurations: { activity: 120, meal: 60 },
  },

  narration: {
    timeoutMs: 15000,
    model: 'gpt-4o-mini',
    temperature: 0.7,
  },
};

/** Currency every cross rate is routed through. */
const PIVOT_CURRENCY = 'USD';

/**
 * Rate from one currency to another in a `FROM_TO` table: the direct rate,
 * else the inverse of `TO_FROM`. Undefined when neither is listed.
 */
function pairRate(from: string, to: string, rates: Record<string, number>): number | undefined {
  if (from === to) return 1;
  const direct = rates[`${from}_${to}`];
  if (direct !== undefined) return direct;
  const inverse = rates[`${to}_${from}`];
  return inverse === undefined ? undefined : 1 / inverse;
}

/**
 * Convert an amount between currencies with a `FROM_TO` rate table,
 * crossing through USD when no pair rate is listed. Returns null when no
 * rate can be derived.
 */
export function convertCurrency(
  amount: number,
  from: string,
  to: string,
  rates: Record<string, number>
): number | null {
  if (from === to) return amount;
  let rate = pairRate(from, to, rates);
  if (rate === undefined) {
    const toPivot = pairRate(from, PIVOT_CURRENCY, rates);
    const fromPivot = pairRate(PIVOT_CURRENCY, to, rates);
    if (toPivot === undefined || fromPivot === undefined) return null;
    rate = toPivot * fromPivot;
  }
  return Math.round(amount * rate * 100) / 100;
}

/**
 * Default file paths, relative to the project root.
 */
export const PATHS = {
  plannerConfig: 'data/planner-config.json',
  placeTypeTags: 'data/place-type-tags.json',
} as const;
