/**
 * Date and time validation utilities.
 *
 * Provides sanity checks and conversions for:
 * - ISO dates (YYYY-MM-DD), always interpreted in UTC
 * - Date ranges (inclusive day counts)
 * - Clock times (HH:MM) as minutes from midnight
 */

import { Result } from './result';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toUtcMs(input: string): number {
  const [year, month, day] = input.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

/**
 * Validate ISO-8601 date format (YYYY-MM-DD).
 * Also checks that the date is actually valid (not Feb 30, etc.)
 */
export function validateIsoDate(input: string, fieldName = 'date'): Result<string> {
  if (!input) {
    return Result.err(`${fieldName} is required`);
  }

  const match = input.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return Result.err(`${fieldName} must be YYYY-MM-DD format (got: "${input}")`);
  }

  const [, year, month, day] = match;
  const date = new Date(toUtcMs(input));
  if (
    isNaN(date.getTime()) ||
    date.getUTCFullYear() !== parseInt(year, 10) ||
    date.getUTCMonth() + 1 !== parseInt(month, 10) ||
    date.getUTCDate() !== parseInt(day, 10)
  ) {
    return Result.err(`${fieldName} is not a valid date: "${input}"`);
  }

  return Result.ok(input);
}

/**
 * Validate date range (start <= end). `days` counts both ends.
 */
export function validateDateRange(
  startDate: string,
  endDate: string
): Result<{ start: string; end: string; days: number }> {
  const startResult = validateIsoDate(startDate, 'start date');
  if (!startResult.ok) return startResult;

  const endResult = validateIsoDate(endDate, 'end date');
  if (!endResult.ok) return endResult;

  const start = toUtcMs(startDate);
  const end = toUtcMs(endDate);

  if (start > end) {
    return Result.err(`Start date (${startDate}) cannot be after end date (${endDate})`);
  }

  const days = Math.round((end - start) / MS_PER_DAY) + 1;

  return Result.ok({ start: startDate, end: endDate, days });
}

/**
 * Shift an ISO date by a number of days.
 */
export function addDays(isoDate: string, offset: number): string {
  return new Date(toUtcMs(isoDate) + offset * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Parse time format (HH:MM, 24-hour) to minutes from midnight.
 * "24:00" is accepted as end of day.
 */
export function parseClockTime(input: string, fieldName = 'time'): Result<number> {
  const match = input.match(/^([01]?\d|2[0-3]):([0-5]\d)$/);
  if (!match) {
    if (input === '24:00') return Result.ok(24 * 60);
    return Result.err(`${fieldName} must be HH:MM format (got: "${input}")`);
  }

  const [, hours, minutes] = match;
  return Result.ok(parseInt(hours, 10) * 60 + parseInt(minutes, 10));
}

/**
 * Format minutes from midnight to "HH:MM".
 */
export function formatClockTime(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${h.toString().padStart(2, '0')}:${m.toString().padStart(2, '0')}`;
}
