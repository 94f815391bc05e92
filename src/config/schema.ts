/**
 * Zod Schemas for Planner Configuration
 *
 * Runtime validation for data/planner-config.json overrides and the
 * environment variables the engine reads.
 */

import { z } from 'zod';

export const TimeHHMMSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$|^24:00$/, 'Must be HH:MM');

const fraction = z.number().min(0).max(1);
const nonNegative = z.number().min(0);

const CategoryFractionsSchema = z.object({
  flight: fraction,
  lodging: fraction,
  activity: fraction,
  meal: fraction,
});

const CategoryAmountsSchema = z.object({
  flight: nonNegative,
  lodging: nonNegative,
  activity: nonNegative,
  meal: nonNegative,
});

export const MealWindowSchema = z.object({
  start: TimeHHMMSchema,
  end: TimeHHMMSchema,
  durationMinutes: z.number().int().positive(),
  enabled: z.boolean(),
});

export const BudgetConfigSchema = z.object({
  baseline: CategoryFractionsSchema,
  floorFractions: CategoryFractionsSchema,
  ceilingFractions: CategoryFractionsSchema,
  /** Absolute minimum amounts in the request currency; lodging is per night. */
  mandatoryFloors: CategoryAmountsSchema,
  activityShiftPerTag: fraction,
  maxActivityShift: fraction,
  activityInterestTags: z.array(z.string()),
});

export const SelectionConfigSchema = z.object({
  interestWeight: nonNegative,
  qualityWeight: nonNegative,
  coreTopK: z.number().int().positive(),
  slotMargin: z.number().int().min(0),
  alternativeLodgingCount: z.number().int().min(0),
});

export const TravelTimeConfigSchema = z.object({
  overheadMinutes: nonNegative,
  minutesPerKm: z.number().positive(),
  unknownLocationMinutes: nonNegative,
});

export const ScheduleConfigSchema = z.object({
  dayStart: TimeHHMMSchema,
  dayEnd: TimeHHMMSchema,
  meals: z.object({
    breakfast: MealWindowSchema,
    lunch: MealWindowSchema,
    dinner: MealWindowSchema,
  }),
  maxActivitiesPerDay: z.number().int().positive(),
  travel: TravelTimeConfigSchema,
});

export const ProviderConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  maxAttempts: z.number().int().positive(),
  baseDelayMs: nonNegative,
  maxDelayMs: nonNegative,
  backoffFactor: z.number().min(1),
  maxResults: z.number().int().positive(),
  cacheTtlSeconds: CategoryAmountsSchema,
  cacheSweepIntervalMs: z.number().int().positive(),
  /** Keyed `FROM_TO`, e.g. `EUR_USD`. */
  exchangeRates: z.record(z.string(), z.number().positive()),
  /** Per-person spend estimate for a Places price level. */
  priceLevelEstimates: z.record(z.string(), nonNegative),
  /** Places type → interest tags. */
  placeTypeTags: z.record(z.string(), z.array(z.string())),
  defaultDurations: z.object({
    activity: z.number().int().positive(),
    meal: z.number().int().positive(),
  }),
});

export const NarrationConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
});

export const PlannerConfigSchema = z.object({
  budget: BudgetConfigSchema,
  selection: SelectionConfigSchema,
  schedule: ScheduleConfigSchema,
  providers: ProviderConfigSchema,
  narration: NarrationConfigSchema,
});

export const PlannerConfigOverridesSchema = PlannerConfigSchema.deepPartial();

export const EnvironmentSchema = z.object({
  AMADEUS_API_KEY: z.string().optional(),
  AMADEUS_API_SECRET: z.string().optional(),
  AMADEUS_TEST_MODE: z
    .enum(['true', 'false', 'True', 'False', '1', '0'])
    .optional()
    .transform((value) => value === undefined || ['true', 'True', '1'].includes(value)),
  GOOGLE_PLACES_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  CACHE_EXPIRATION: z.coerce.number().int().positive().optional(),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  NARRATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;
export type PlannerConfigOverrides = z.infer<typeof PlannerConfigOverridesSchema>;
export type BudgetConfig = z.infer<typeof BudgetConfigSchema>;
export type SelectionConfig = z.infer<typeof SelectionConfigSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;
export type TravelTimeConfig = z.infer<typeof TravelTimeConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type NarrationConfig = z.infer<typeof NarrationConfigSchema>;
export type MealWindow = z.infer<typeof MealWindowSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Format zod issues the way every loader in this package reports them.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e: z.ZodIssue) => `  - ${e.path.join('.')}: ${e.message}`);
}
