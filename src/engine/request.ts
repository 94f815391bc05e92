/**
 * Trip request validation at the engine boundary.
 */

import { z } from 'zod';
import { Result, validateDateRange } from '../types';
import { formatIssues } from '../config/schema';
import { deepFreeze } from '../utils/freeze';
import { CATEGORIES, type PlanningFailure, type TripRequest } from './types';

export const CategorySchema = z.enum(CATEGORIES);

const AmountSchema = z.number().finite().nonnegative();

export const TripRequestSchema = z.object({
  origin: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  destinationName: z.string().trim().min(1).optional(),
  startDate: z.string(),
  endDate: z.string(),
  travelers: z.number().int().min(1),
  budget: z.object({
    amount: z.number().finite().positive(),
    currency: z.string().regex(/^[A-Z]{3}$/, 'Must be a three-letter currency code'),
  }),
  interests: z.array(z.string().trim().min(1)).default([]),
  budgetHints: z
    .object({
      flight: AmountSchema.optional(),
      lodging: AmountSchema.optional(),
      activity: AmountSchema.optional(),
      meal: AmountSchema.optional(),
    })
    .strict()
    .optional(),
  excludedCategories: z.array(CategorySchema).optional(),
});

export interface ValidatedRequest {
  request: Readonly<TripRequest>;
  days: number;
}

/**
 * Validate raw input into a frozen TripRequest. The caller's object is
 * never frozen or kept: parsing builds a fresh copy.
 */
export function validateTripRequest(input: unknown): Result<ValidatedRequest, PlanningFailure> {
  const parsed = TripRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return Result.err({ kind: 'InvalidRequest', message: `Invalid trip request:\n${issues.join('\n')}`, issues });
  }

  const range = validateDateRange(parsed.data.startDate, parsed.data.endDate);
  if (!range.ok) {
    return Result.err({ kind: 'InvalidRequest', message: `Invalid trip request: ${range.error}`, issues: [range.error] });
  }

  const request: TripRequest = {
    ...parsed.data,
    ...(parsed.data.excludedCategories && {
      excludedCategories: [...new Set(parsed.data.excludedCategories)],
    }),
  };
  return Result.ok({ request: deepFreeze(request), days: range.value.days });
}
