/**
 * Day Scheduler
 *
 * Places ranked meals and activities into day-by-day time slots.
 *
 * Each day moves through empty → filling → full | partial:
 * - meals go first, at their canonical windows
 * - activities then fill the free gaps of the daylight window, earliest gap
 *   first, highest-ranked candidate that fits
 * - a day left without any slot ends partial and is reported unplanned
 * - when activities were requested, a day that got none is partial and
 *   unplanned too, even if its meals were placed
 * - the run is infeasible only when no day got any slot
 *
 * A candidate is used at most once over the whole trip. Between two slots
 * there is always at least the estimated travel time from the earlier one.
 */

import { Result, addDays, formatClockTime, parseClockTime } from '../types';
import type { MealWindow, ScheduleConfig } from '../config/schema';
import type {
  CandidateOption,
  DayStatus,
  GeoPoint,
  ItineraryDay,
  MealType,
  OpeningHours,
  PlanningFailure,
  RankedCandidate,
  ScheduledSlot,
} from '../engine/types';
import { estimateTravelMinutes } from './travel-time';

const MINUTES_PER_DAY = 24 * 60;
const MEAL_ORDER: readonly MealType[] = ['breakfast', 'lunch', 'dinner'];

export interface ScheduleInput {
  days: number;
  startDate: string;
  activities: readonly RankedCandidate[];
  meals: readonly RankedCandidate[];
  /** Where each day starts, usually the lodging. */
  base?: GeoPoint;
  /** Nothing was requested to schedule, so empty days are expected. */
  allowEmpty?: boolean;
  /** Activities were requested: a day without one counts as unplanned. */
  requireActivities?: boolean;
}

export interface ScheduleOutcome {
  days: ItineraryDay[];
  unplannedDays: number[];
}

interface Gap {
  start: number;
  end: number;
  prev?: ScheduledSlot;
  next?: ScheduledSlot;
}

/**
 * Minutes from midnight for a config time. Config is validated on load, so
 * a malformed value here is a programming error.
 */
export function minutesOf(time: string): number {
  const parsed = parseClockTime(time);
  if (!parsed.ok) throw new Error(`Invalid schedule time: ${parsed.error}`);
  return parsed.value;
}

export function openingWindow(option: CandidateOption): OpeningHours {
  return option.location?.openingHours ?? { open: 0, close: MINUTES_PER_DAY };
}

function coordinatesOf(slot: ScheduledSlot | undefined, base: GeoPoint | undefined): GeoPoint | undefined {
  return slot ? slot.option.location?.coordinates : base;
}

/**
 * Slots needed to fill every enabled meal window on every day.
 */
export function mealSlotsPerDay(config: ScheduleConfig): number {
  return MEAL_ORDER.filter((m) => config.meals[m].enabled).length;
}

/**
 * Activities allowed on one day: spreads a short candidate list across the
 * trip instead of front-loading the first day.
 */
export function activityCapPerDay(available: number, days: number, config: ScheduleConfig): number {
  if (days <= 0) return 0;
  return Math.min(config.maxActivitiesPerDay, Math.ceil(available / days));
}

class DayBuilder {
  status: DayStatus = 'empty';
  private slots: ScheduledSlot[] = [];

  constructor(
    readonly dayIndex: number,
    readonly date: string,
    private readonly dayStart: number,
    private readonly dayEnd: number,
    private readonly base: GeoPoint | undefined,
    private readonly config: ScheduleConfig
  ) {}

  get lastSlot(): ScheduledSlot | undefined {
    return this.slots[this.slots.length - 1];
  }

  place(
    option: CandidateOption,
    start: number,
    end: number,
    kind: ScheduledSlot['kind'],
    mealType?: MealType
  ): void {
    this.status = 'filling';
    this.slots.push({
      dayIndex: this.dayIndex,
      kind,
      ...(mealType && { mealType }),
      start: formatClockTime(start),
      end: formatClockTime(end),
      startMinutes: start,
      endMinutes: end,
      travelMinutesBefore: 0,
      option,
    });
    this.slots.sort((a, b) => a.startMinutes - b.startMinutes);
  }

  gaps(): Gap[] {
    const gaps: Gap[] = [];
    let cursor = this.dayStart;
    let prev: ScheduledSlot | undefined;
    for (const slot of this.slots) {
      if (slot.startMinutes > cursor) gaps.push({ start: cursor, end: slot.startMinutes, prev, next: slot });
      cursor = Math.max(cursor, slot.endMinutes);
      prev = slot;
    }
    if (this.dayEnd > cursor) gaps.push({ start: cursor, end: this.dayEnd, prev });
    return gaps;
  }

  /**
   * Earliest start for `option` in `gap`, honouring travel in and out and
   * the opening window, or null when it does not fit.
   */
  fit(option: CandidateOption, duration: number, gap: Gap): number | null {
    const here = option.location?.coordinates;
    const travelIn = estimateTravelMinutes(coordinatesOf(gap.prev, this.base), here, this.config.travel);
    const travelOut = gap.next ? estimateTravelMinutes(here, coordinatesOf(gap.next, this.base), this.config.travel) : 0;
    const hours = openingWindow(option);
    const start = Math.max(gap.start + travelIn, hours.open);
    const end = start + duration;
    return end <= Math.min(hours.close, gap.end - travelOut) ? start : null;
  }

  finish(requireActivities: boolean): ItineraryDay {
    let prev: ScheduledSlot | undefined;
    for (const slot of this.slots) {
      slot.travelMinutesBefore = estimateTravelMinutes(
        coordinatesOf(prev, this.base),
        slot.option.location?.coordinates,
        this.config.travel
      );
      prev = slot;
    }
    const missingActivity = requireActivities && !this.slots.some((s) => s.kind === 'activity');
    const status = this.slots.length > 0 && !missingActivity ? 'full' : 'partial';
    this.status = status;
    return {
      dayIndex: this.dayIndex,
      date: this.date,
      status,
      unplanned: status === 'partial',
      slots: this.slots,
    };
  }
}

function placeMeal(
  day: DayBuilder,
  mealType: MealType,
  window: MealWindow,
  meals: readonly RankedCandidate[],
  used: Set<string>,
  dayStart: number,
  dayEnd: number
): void {
  const windowStart = Math.max(minutesOf(window.start), dayStart);
  const windowEnd = Math.min(minutesOf(window.end), dayEnd);
  if (windowEnd - windowStart < window.durationMinutes) return;

  const prev = day.lastSlot;
  const gap: Gap = { start: Math.max(windowStart, prev ? prev.endMinutes : dayStart), end: windowEnd, prev };

  for (const { option } of meals) {
    if (used.has(option.id)) continue;
    const start = day.fit(option, window.durationMinutes, gap);
    if (start === null) continue;
    day.place(option, start, start + window.durationMinutes, 'meal', mealType);
    used.add(option.id);
    return;
  }
}

function placeActivities(
  day: DayBuilder,
  activities: readonly RankedCandidate[],
  used: Set<string>,
  cap: number
): void {
  let placed = 0;
  while (placed < cap) {
    let found = false;
    for (const gap of day.gaps()) {
      for (const { option } of activities) {
        if (used.has(option.id)) continue;
        const start = day.fit(option, option.durationMinutes, gap);
        if (start === null) continue;
        day.place(option, start, start + option.durationMinutes, 'activity');
        used.add(option.id);
        found = true;
        break;
      }
      if (found) break;
    }
    if (!found) return;
    placed++;
  }
}

export function scheduleDays(
  input: ScheduleInput,
  config: ScheduleConfig
): Result<ScheduleOutcome, PlanningFailure> {
  const dayStart = minutesOf(config.dayStart);
  const dayEnd = minutesOf(config.dayEnd);
  const used = new Set<string>();
  const cap = activityCapPerDay(input.activities.length, input.days, config);

  const days: ItineraryDay[] = [];
  for (let i = 0; i < input.days; i++) {
    const day = new DayBuilder(i, addDays(input.startDate, i), dayStart, dayEnd, input.base, config);

    for (const mealType of MEAL_ORDER) {
      const window = config.meals[mealType];
      if (window.enabled) placeMeal(day, mealType, window, input.meals, used, dayStart, dayEnd);
    }
    placeActivities(day, input.activities, used, cap);

    days.push(day.finish(input.requireActivities ?? false));
  }

  const unplannedDays = days.filter((d) => d.unplanned).map((d) => d.dayIndex);
  if (!input.allowEmpty && days.length > 0 && days.every((d) => d.slots.length === 0)) {
    return Result.err({
      kind: 'ScheduleInfeasible',
      message: `No activity or meal could be placed on any of the ${days.length} days`,
      days: days.length,
    });
  }

  return Result.ok({ days, unplannedDays });
}
