/**
 * Itinerary Assembler
 *
 * Joins the core selections and the day schedule into one itinerary, then
 * runs the validator over it. An itinerary that leaves the assembler is
 * valid and frozen.
 */

import { randomUUID } from 'node:crypto';
import { Result } from '../types';
import type { ScheduleConfig, SelectionConfig } from '../config/schema';
import {
  CATEGORIES,
  type BudgetAllocation,
  type Category,
  type CategoryNotice,
  type Itinerary,
  type PlanningFailure,
  type TripRequest,
} from '../engine/types';
import { ItineraryValidator } from '../validation';
import { deepFreeze } from '../utils/freeze';
import type { Selections } from './candidate-selector';
import type { ScheduleOutcome } from './day-scheduler';
import { roundMoney, sumAmounts } from './money';

export interface AssemblyInput {
  request: TripRequest;
  allocation: BudgetAllocation;
  selections: Selections;
  schedule: ScheduleOutcome;
  notices: readonly CategoryNotice[];
  warnings?: readonly string[];
}

export interface AssemblyOptions {
  now?: () => Date;
  newId?: () => string;
}

export function costBreakdownOf(itinerary: Pick<Itinerary, 'flight' | 'lodging' | 'days'>): Record<Category, number> {
  const breakdown: Record<Category, number[]> = { flight: [], lodging: [], activity: [], meal: [] };
  if (itinerary.flight) breakdown.flight.push(itinerary.flight.price.amount);
  if (itinerary.lodging) breakdown.lodging.push(itinerary.lodging.price.amount);
  for (const day of itinerary.days) {
    for (const slot of day.slots) breakdown[slot.option.category].push(slot.option.price.amount);
  }
  return {
    flight: sumAmounts(breakdown.flight),
    lodging: sumAmounts(breakdown.lodging),
    activity: sumAmounts(breakdown.activity),
    meal: sumAmounts(breakdown.meal),
  };
}

export function assembleItinerary(
  input: AssemblyInput,
  config: { selection: SelectionConfig; schedule: ScheduleConfig },
  options: AssemblyOptions = {}
): Result<Itinerary, PlanningFailure> {
  const { request, allocation, selections, schedule } = input;
  const now = options.now ?? (() => new Date());
  const newId = options.newId ?? randomUUID;

  const lodgingRanked = selections.lodging.ranked;
  const flight = selections.flight.ranked[0]?.option ?? null;
  const lodging = lodgingRanked[0]?.option ?? null;
  const alternativeLodging = lodgingRanked
    .slice(1, 1 + config.selection.alternativeLodgingCount)
    .map((r) => r.option);

  const partial = { flight, lodging, days: schedule.days };
  const costBreakdown = costBreakdownOf(partial);
  const totalAmount = sumAmounts(CATEGORIES.map((c) => costBreakdown[c]));

  const warnings = [...(input.warnings ?? [])];
  if (schedule.unplannedDays.length > 0) {
    warnings.push(
      `${schedule.unplannedDays.length} of ${schedule.days.length} days are unplanned`
    );
  }

  const itinerary: Itinerary = {
    requestId: newId(),
    request,
    flight,
    lodging,
    alternativeLodging,
    days: schedule.days,
    allocation,
    costBreakdown,
    totalCost: { amount: roundMoney(totalAmount), currency: request.budget.currency },
    metadata: {
      unplannedDays: [...schedule.unplannedDays],
      notices: [...input.notices],
      warnings,
    },
    createdAt: now().toISOString(),
  };

  const validator = new ItineraryValidator({
    dayStart: config.schedule.dayStart,
    dayEnd: config.schedule.dayEnd,
  });
  const result = validator.validate(itinerary);

  if (!result.valid) {
    const errors = result.issues.filter((i) => i.severity === 'error');
    if (errors.some((i) => i.category === 'budget_exceeded')) {
      return Result.err({
        kind: 'BudgetExceeded',
        message: `Itinerary costs ${itinerary.totalCost.amount} against a budget of ${request.budget.amount} ${request.budget.currency}`,
        totalCost: itinerary.totalCost.amount,
        budget: request.budget.amount,
      });
    }
    return Result.err({
      kind: 'AssemblyInvariantViolation',
      message: `Assembled itinerary failed ${errors.length} check(s)`,
      issues: errors.map((i) => i.message),
    });
  }

  return Result.ok(deepFreeze(itinerary));
}
