/**
 * Candidate Selector
 *
 * Filters provider candidates against the category allocation and ranks
 * them by interest overlap plus provider quality.
 *
 * Ordering is total and deterministic: score desc, price asc, providerId asc.
 */

import { Result } from '../types';
import type { SelectionConfig } from '../config/schema';
import {
  CORE_CATEGORIES,
  type BudgetAllocation,
  type CandidateOption,
  type Category,
  type CategoryNotice,
  type PlanningFailure,
  type RankedCandidate,
} from '../engine/types';
import { floorMoney, toCents } from './money';

export interface SelectionContext {
  interests: readonly string[];
  /** Slots the category may fill over the whole trip (activity/meal only). */
  slotCount: number;
}

export interface CategorySelection {
  category: Category;
  ranked: RankedCandidate[];
  /** Price cap each candidate had to meet. */
  priceCap: number;
  notice?: CategoryNotice;
}

export type Selections = Record<Category, CategorySelection>;

/**
 * Interest overlap, weighted by the order of the traveler's interests:
 * the first of n interests counts 1, the last 1/n.
 */
export function interestOverlap(tags: readonly string[], interests: readonly string[]): number {
  const tagSet = new Set(tags.map((t) => t.toLowerCase()));
  const n = interests.length;
  let overlap = 0;
  const seen = new Set<string>();
  interests.forEach((interest, index) => {
    const key = interest.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    if (tagSet.has(key)) overlap += (n - index) / n;
  });
  return overlap;
}

export function scoreCandidate(
  option: CandidateOption,
  interests: readonly string[],
  config: SelectionConfig
): number {
  return config.interestWeight * interestOverlap(option.tags, interests) + config.qualityWeight * option.quality;
}

export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  const priceDiff = toCents(a.option.price.amount) - toCents(b.option.price.amount);
  if (priceDiff !== 0) return priceDiff;
  if (a.option.providerId < b.option.providerId) return -1;
  if (a.option.providerId > b.option.providerId) return 1;
  return 0;
}

function isPerSlot(category: Category): boolean {
  return category === 'activity' || category === 'meal';
}

export function topKFor(category: Category, slotCount: number, config: SelectionConfig): number {
  return isPerSlot(category) ? slotCount + config.slotMargin : config.coreTopK;
}

/**
 * Price cap for one candidate of the category. Per-item categories get a
 * fair per-slot share so that filling every slot stays within allocation.
 */
export function priceCapFor(category: Category, allocation: number, slotCount: number): number {
  if (!isPerSlot(category)) return allocation;
  if (slotCount <= 0) return 0;
  return floorMoney(allocation / slotCount);
}

export function selectCandidates(
  category: Category,
  options: readonly CandidateOption[],
  allocation: number,
  context: SelectionContext,
  config: SelectionConfig
): CategorySelection {
  const priceCap = priceCapFor(category, allocation, context.slotCount);
  const capCents = toCents(priceCap);

  const ranked = options
    .filter((o) => o.category === category && toCents(o.price.amount) <= capCents)
    .map((option) => ({ option, score: scoreCandidate(option, context.interests, config) }))
    .sort(compareRanked)
    .slice(0, topKFor(category, context.slotCount, config));

  if (ranked.length === 0) {
    return {
      category,
      ranked,
      priceCap,
      notice: {
        category,
        kind: 'NoCandidatesFound',
        message:
          options.length === 0
            ? `No ${category} options available`
            : `No ${category} options within ${priceCap} (${options.length} over budget)`,
      },
    };
  }

  return { category, ranked, priceCap };
}

/**
 * Select every category. Empty flight or lodging selections are fatal unless
 * the traveler excluded the category.
 */
export function selectAll(
  candidates: Record<Category, readonly CandidateOption[]>,
  allocation: BudgetAllocation,
  slotCounts: Record<Category, number>,
  interests: readonly string[],
  config: SelectionConfig,
  upstreamNotices: readonly CategoryNotice[] = []
): Result<Selections, PlanningFailure> {
  const select = (category: Category): CategorySelection => {
    if (allocation.excluded.includes(category)) {
      return { category, ranked: [], priceCap: 0 };
    }
    return selectCandidates(
      category,
      candidates[category],
      allocation.byCategory[category],
      { interests, slotCount: slotCounts[category] },
      config
    );
  };

  const selections: Selections = {
    flight: select('flight'),
    lodging: select('lodging'),
    activity: select('activity'),
    meal: select('meal'),
  };

  const missingCore = CORE_CATEGORIES.filter(
    (c) => !allocation.excluded.includes(c) && selections[c].ranked.length === 0
  );
  if (missingCore.length > 0) {
    const notices = [
      ...upstreamNotices.filter((n) => missingCore.some((c) => c === n.category)),
      ...missingCore.flatMap((c) => {
        const notice = selections[c].notice;
        return notice ? [notice] : [];
      }),
    ];
    return Result.err({
      kind: 'InsufficientCoreOptions',
      message: `No viable ${missingCore.join(' or ')} option for this trip`,
      categories: missingCore,
      notices,
    });
  }

  return Result.ok(selections);
}
