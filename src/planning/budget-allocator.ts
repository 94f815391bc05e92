/**
 * Budget Allocator
 *
 * Pure split of a trip budget across flight, lodging, activity and meal.
 * No I/O: given the same input and config it always returns the same
 * allocation.
 */

import { Result } from '../types';
import type { BudgetConfig } from '../config/schema';
import {
  CATEGORIES,
  CORE_CATEGORIES,
  type BudgetAllocation,
  type Category,
  type Money,
  type PlanningFailure,
} from '../engine/types';
import { floorMoney, roundMoney, sumAmounts } from './money';

export interface AllocationInput {
  total: Money;
  interests: readonly string[];
  hints?: Partial<Record<Category, number>>;
  days: number;
  excluded?: readonly Category[];
}

type CategoryAmounts = Record<Category, number>;

function zeroAmounts(): CategoryAmounts {
  return { flight: 0, lodging: 0, activity: 0, meal: 0 };
}

export function lodgingNights(days: number): number {
  return Math.max(1, days - 1);
}

/**
 * Absolute minimum for a category. The lodging minimum is per night.
 */
export function mandatoryFloor(category: Category, days: number, config: BudgetConfig): number {
  const amount = config.mandatoryFloors[category];
  return category === 'lodging' ? amount * lodgingNights(days) : amount;
}

export function categoryFloor(category: Category, total: number, days: number, config: BudgetConfig): number {
  return Math.max(config.floorFractions[category] * total, mandatoryFloor(category, days, config));
}

export function categoryCeiling(category: Category, total: number, days: number, config: BudgetConfig): number {
  return Math.max(config.ceilingFractions[category] * total, categoryFloor(category, total, days, config));
}

/**
 * Weight moved to activities: `activityShiftPerTag` per distinct
 * activity-relevant interest, capped at `maxActivityShift`.
 */
export function activityShift(interests: readonly string[], config: BudgetConfig): number {
  const relevant = new Set(config.activityInterestTags.map((t) => t.toLowerCase()));
  const matched = new Set(interests.map((t) => t.toLowerCase()).filter((t) => relevant.has(t)));
  return Math.min(matched.size * config.activityShiftPerTag, config.maxActivityShift);
}

/**
 * Baseline weights for the categories still to be split, with the activity
 * shift taken from the others in proportion to their baseline weight.
 */
export function computeWeights(
  categories: readonly Category[],
  interests: readonly string[],
  config: BudgetConfig
): Partial<CategoryAmounts> {
  const weights: Partial<CategoryAmounts> = {};
  for (const c of categories) weights[c] = config.baseline[c];

  if (!categories.includes('activity')) return weights;

  const donors = categories.filter((c) => c !== 'activity');
  const donorWeight = donors.reduce((sum, c) => sum + config.baseline[c], 0);
  if (donorWeight <= 0) return weights;

  const shift = Math.min(activityShift(interests, config), donorWeight);
  weights.activity = config.baseline.activity + shift;
  for (const d of donors) {
    weights[d] = config.baseline[d] - (shift * config.baseline[d]) / donorWeight;
  }
  return weights;
}

/**
 * Split `pool` by weight, pinning categories that would fall below their
 * floor or above their ceiling and re-spreading the rest. Whatever the
 * ceilings cannot absorb stays out of `out`.
 */
function distribute(
  pool: number,
  categories: readonly Category[],
  weights: Partial<CategoryAmounts>,
  floors: CategoryAmounts,
  ceilings: CategoryAmounts,
  out: CategoryAmounts
): void {
  let active = [...categories];
  let remaining = pool;

  while (active.length > 0) {
    const weightSum = active.reduce((sum, c) => sum + (weights[c] ?? 0), 0);
    const share = (c: Category): number =>
      weightSum > 0 ? (remaining * (weights[c] ?? 0)) / weightSum : remaining / active.length;

    const below = active.filter((c) => share(c) < floors[c]);
    const pinned = below.length > 0 ? below : active.filter((c) => share(c) > ceilings[c]);

    if (pinned.length === 0) {
      for (const c of active) out[c] = share(c);
      return;
    }

    for (const c of pinned) {
      out[c] = below.length > 0 ? floors[c] : ceilings[c];
      remaining -= out[c];
    }
    active = active.filter((c) => !pinned.includes(c));
  }
}

function infeasible(message: string, required: number, available: number): Result<never, PlanningFailure> {
  return Result.err({
    kind: 'BudgetInfeasible',
    message,
    required: roundMoney(required),
    available,
  });
}

export function allocateBudget(
  input: AllocationInput,
  config: BudgetConfig
): Result<BudgetAllocation, PlanningFailure> {
  const total = input.total.amount;
  const excluded = CATEGORIES.filter((c) => input.excluded?.includes(c));
  const included = CATEGORIES.filter((c) => !excluded.includes(c));
  const notes: string[] = [];

  const mandatory = CORE_CATEGORIES.filter((c) => included.includes(c)).reduce(
    (sum, c) => sum + mandatoryFloor(c, input.days, config),
    0
  );
  if (mandatory > total) {
    return infeasible(
      `Mandatory flight and lodging minimums (${roundMoney(mandatory)}) exceed the budget (${total})`,
      mandatory,
      total
    );
  }

  const floors = zeroAmounts();
  const ceilings = zeroAmounts();
  for (const c of included) {
    floors[c] = categoryFloor(c, total, input.days, config);
    ceilings[c] = categoryCeiling(c, total, input.days, config);
  }

  const floorSum = included.reduce((sum, c) => sum + floors[c], 0);
  if (floorSum > total) {
    return infeasible(`Category floors (${roundMoney(floorSum)}) exceed the budget (${total})`, floorSum, total);
  }

  const allocated = zeroAmounts();
  const hinted: Category[] = [];
  for (const c of included) {
    const hint = input.hints?.[c];
    if (hint === undefined) continue;
    if (!(hint >= 0) || hint > total) {
      notes.push(`Ignored ${c} hint ${hint}: must be between 0 and the total budget ${total}`);
      continue;
    }
    if (hint < floors[c]) {
      notes.push(`Raised ${c} hint ${hint} to its floor ${roundMoney(floors[c])}`);
      allocated[c] = floors[c];
    } else {
      allocated[c] = hint;
    }
    hinted.push(c);
  }

  const free = included.filter((c) => !hinted.includes(c));
  const hintedSum = hinted.reduce((sum, c) => sum + allocated[c], 0);
  const freeFloorSum = free.reduce((sum, c) => sum + floors[c], 0);
  if (hintedSum + freeFloorSum > total) {
    return infeasible(
      `Budget hints (${roundMoney(hintedSum)}) leave too little for the remaining category floors`,
      hintedSum + freeFloorSum,
      total
    );
  }

  const weights = computeWeights(free, input.interests, config);
  distribute(total - hintedSum, free, weights, floors, ceilings, allocated);

  const byCategory = zeroAmounts();
  for (const c of included) byCategory[c] = floorMoney(allocated[c]);

  const unallocated = roundMoney(total - sumAmounts(Object.values(byCategory)));
  if (unallocated >= 0.01) {
    notes.push(`${unallocated} ${input.total.currency} left unallocated by category ceilings`);
  }

  return Result.ok({
    total: { ...input.total },
    byCategory,
    excluded,
    unallocated,
    notes,
  });
}
