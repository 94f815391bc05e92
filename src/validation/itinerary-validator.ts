/**
 * Itinerary Validator
 *
 * Validates an assembled itinerary for:
 * - Time conflicts between slots
 * - Opening hours and daylight window compliance
 * - Travel time between consecutive slots
 * - Day indexing and day count
 * - Duplicate candidates
 * - Core options, cost totals and budget
 */

import { validateDateRange, parseClockTime } from '../types';
import { CORE_CATEGORIES, type Itinerary, type ItineraryDay, type ScheduledSlot } from '../engine/types';
import { sumAmounts, toCents } from '../planning/money';
import type {
  ValidationIssue,
  ItineraryValidationResult,
  ValidatorOptions,
} from './types';

const DEFAULT_OPTIONS: Required<ValidatorOptions> = {
  dayStart: '00:00',
  dayEnd: '24:00',
};

/**
 * Check if two time ranges overlap
 */
function timesOverlap(start1: number, end1: number, start2: number, end2: number): boolean {
  return start1 < end2 && start2 < end1;
}

function describe(slot: ScheduledSlot): string {
  return `"${slot.option.name}" (${slot.start}-${slot.end})`;
}

/**
 * Every price an itinerary pays for, flight and lodging first.
 */
export function itineraryPrices(itinerary: Pick<Itinerary, 'flight' | 'lodging' | 'days'>): number[] {
  const prices: number[] = [];
  if (itinerary.flight) prices.push(itinerary.flight.price.amount);
  if (itinerary.lodging) prices.push(itinerary.lodging.price.amount);
  for (const day of itinerary.days) {
    for (const slot of day.slots) prices.push(slot.option.price.amount);
  }
  return prices;
}

export class ItineraryValidator {
  private options: Required<ValidatorOptions>;
  private dayStart: number;
  private dayEnd: number;

  constructor(options?: ValidatorOptions) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const start = parseClockTime(this.options.dayStart, 'dayStart');
    const end = parseClockTime(this.options.dayEnd, 'dayEnd');
    if (!start.ok) throw new Error(start.error);
    if (!end.ok) throw new Error(end.error);
    this.dayStart = start.value;
    this.dayEnd = end.value;
  }

  /**
   * Validate an entire itinerary
   */
  validate(itinerary: Itinerary): ItineraryValidationResult {
    const issues: ValidationIssue[] = [];

    issues.push(...this.validateDayCount(itinerary));
    issues.push(...this.validateCoreOptions(itinerary));

    for (const day of itinerary.days) {
      issues.push(...this.validateDayIndex(day, itinerary.days.length));
      issues.push(...this.validateSlotWindows(day));
      issues.push(...this.validateDayConflicts(day));
      issues.push(...this.validateTransitGaps(day));
      if (day.slots.length === 0) {
        issues.push({
          severity: day.unplanned ? 'info' : 'error',
          category: 'unplanned_day',
          day: day.dayIndex,
          message: day.unplanned
            ? `Day ${day.dayIndex + 1} is unplanned`
            : `Day ${day.dayIndex + 1} has no slots but is not marked unplanned`,
        });
      }
    }

    issues.push(...this.validateDuplicates(itinerary));
    issues.push(...this.validateCost(itinerary));

    const summary = {
      errors: issues.filter((i) => i.severity === 'error').length,
      warnings: issues.filter((i) => i.severity === 'warning').length,
      info: issues.filter((i) => i.severity === 'info').length,
    };

    return {
      valid: summary.errors === 0,
      issues,
      summary,
    };
  }

  private validateDayCount(itinerary: Itinerary): ValidationIssue[] {
    const range = validateDateRange(itinerary.request.startDate, itinerary.request.endDate);
    if (!range.ok) {
      return [{ severity: 'error', category: 'day_count', message: range.error }];
    }
    if (range.value.days !== itinerary.days.length) {
      return [
        {
          severity: 'error',
          category: 'day_count',
          message: `Itinerary has ${itinerary.days.length} days but the date range spans ${range.value.days}`,
        },
      ];
    }
    return [];
  }

  private validateCoreOptions(itinerary: Itinerary): ValidationIssue[] {
    const excluded = itinerary.request.excludedCategories ?? [];
    return CORE_CATEGORIES.filter((c) => !excluded.includes(c) && itinerary[c] === null).map((c) => ({
      severity: 'error' as const,
      category: 'missing_core_option' as const,
      message: `No ${c} selected although the category is not excluded`,
    }));
  }

  private validateDayIndex(day: ItineraryDay, dayCount: number): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    if (day.dayIndex < 0 || day.dayIndex >= dayCount) {
      issues.push({
        severity: 'error',
        category: 'day_index',
        day: day.dayIndex,
        message: `Day index ${day.dayIndex} outside 0..${dayCount - 1}`,
      });
    }
    for (const slot of day.slots) {
      if (slot.dayIndex !== day.dayIndex) {
        issues.push({
          severity: 'error',
          category: 'day_index',
          day: day.dayIndex,
          optionId: slot.option.id,
          message: `${describe(slot)} carries day index ${slot.dayIndex} but is filed under day ${day.dayIndex}`,
        });
      }
    }
    return issues;
  }

  /**
   * Check each slot against the daylight window and its opening hours
   */
  private validateSlotWindows(day: ItineraryDay): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (const slot of day.slots) {
      if (slot.endMinutes <= slot.startMinutes) {
        issues.push({
          severity: 'error',
          category: 'day_window',
          day: day.dayIndex,
          optionId: slot.option.id,
          message: `${describe(slot)} ends before it starts`,
        });
      }
      if (slot.startMinutes < this.dayStart || slot.endMinutes > this.dayEnd) {
        issues.push({
          severity: 'error',
          category: 'day_window',
          day: day.dayIndex,
          optionId: slot.option.id,
          message: `${describe(slot)} falls outside the daylight window ${this.options.dayStart}-${this.options.dayEnd}`,
        });
      }

      const hours = slot.option.location?.openingHours;
      if (hours && (slot.startMinutes < hours.open || slot.endMinutes > hours.close)) {
        issues.push({
          severity: 'error',
          category: 'business_hours',
          day: day.dayIndex,
          optionId: slot.option.id,
          message: `${describe(slot)} is outside opening hours`,
        });
      }
    }

    return issues;
  }

  /**
   * Check for time conflicts within a day
   */
  private validateDayConflicts(day: ItineraryDay): ValidationIssue[] {
    const issues: ValidationIssue[] = [];

    for (let i = 0; i < day.slots.length; i++) {
      const a = day.slots[i];
      for (let j = i + 1; j < day.slots.length; j++) {
        const b = day.slots[j];
        if (timesOverlap(a.startMinutes, a.endMinutes, b.startMinutes, b.endMinutes)) {
          issues.push({
            severity: 'error',
            category: 'time_conflict',
            day: day.dayIndex,
            message: `Time conflict: ${describe(a)} overlaps with ${describe(b)}`,
          });
        }
      }
    }

    return issues;
  }

  private validateTransitGaps(day: ItineraryDay): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const ordered = [...day.slots].sort((a, b) => a.startMinutes - b.startMinutes);
    let previousEnd = this.dayStart;

    for (const slot of ordered) {
      if (slot.startMinutes - previousEnd < slot.travelMinutesBefore) {
        issues.push({
          severity: 'error',
          category: 'transport_gap',
          day: day.dayIndex,
          optionId: slot.option.id,
          message: `${describe(slot)} needs ${slot.travelMinutesBefore} min of travel but only ${slot.startMinutes - previousEnd} min are free`,
        });
      }
      previousEnd = slot.endMinutes;
    }

    return issues;
  }

  private validateDuplicates(itinerary: Itinerary): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const seen = new Set<string>();
    for (const day of itinerary.days) {
      for (const slot of day.slots) {
        if (seen.has(slot.option.id)) {
          issues.push({
            severity: 'error',
            category: 'duplicate_candidate',
            day: day.dayIndex,
            optionId: slot.option.id,
            message: `"${slot.option.name}" is scheduled more than once`,
          });
        }
        seen.add(slot.option.id);
      }
    }
    return issues;
  }

  private validateCost(itinerary: Itinerary): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const computed = sumAmounts(itineraryPrices(itinerary));

    if (toCents(computed) !== toCents(itinerary.totalCost.amount)) {
      issues.push({
        severity: 'error',
        category: 'cost_mismatch',
        message: `Total cost ${itinerary.totalCost.amount} differs from the sum of prices ${computed}`,
      });
    }

    const mixed = [itinerary.flight, itinerary.lodging, ...itinerary.days.flatMap((d) => d.slots.map((s) => s.option))]
      .filter((o) => o !== null && o.price.currency !== itinerary.totalCost.currency);
    if (mixed.length > 0) {
      issues.push({
        severity: 'error',
        category: 'cost_mismatch',
        message: `${mixed.length} option(s) priced in a currency other than ${itinerary.totalCost.currency}`,
      });
    }

    if (toCents(itinerary.totalCost.amount) > toCents(itinerary.request.budget.amount)) {
      issues.push({
        severity: 'error',
        category: 'budget_exceeded',
        message: `Total cost ${itinerary.totalCost.amount} exceeds the budget ${itinerary.request.budget.amount} ${itinerary.request.budget.currency}`,
      });
    }

    return issues;
  }
}
