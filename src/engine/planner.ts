/**
 * Itinerary Planner
 *
 * Runs one planning pass: validate, allocate, fetch, select, schedule,
 * assemble, narrate. Each run is independent; the candidate cache behind
 * the adapter is the only state runs share.
 */

import { Result } from '../types';
import { loadCredentials, loadPlannerConfig } from '../config/loader';
import type { PlannerConfig } from '../config/schema';
import { narrate, OpenAINarrator, type Narrator } from '../narration';
import { assembleItinerary, type AssemblyOptions } from '../planning/assembler';
import { allocateBudget } from '../planning/budget-allocator';
import { selectAll } from '../planning/candidate-selector';
import { mealSlotsPerDay, scheduleDays } from '../planning/day-scheduler';
import { ProviderAdapter, createDefaultRegistry, type FetchOutcome, type SearchConstraints } from '../providers';
import { validateTripRequest } from './request';
import {
  CATEGORIES,
  type CandidateOption,
  type Category,
  type CategoryNotice,
  type PlannedTrip,
  type PlanningFailure,
  type TripRequest,
} from './types';

export interface CandidateSource {
  fetch(category: Category, constraints: SearchConstraints, options: { signal?: AbortSignal }): Promise<FetchOutcome>;
}

export interface PlannerDependencies extends AssemblyOptions {
  config: PlannerConfig;
  candidates: CandidateSource;
  narrator: Narrator | null;
}

export interface PlanOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Helpers
// ============================================================================

function cancelled(): Result<never, PlanningFailure> {
  return Result.err({ kind: 'Cancelled', message: 'Planning run was cancelled' });
}

export function searchConstraints(request: TripRequest, maxResults: number): SearchConstraints {
  return {
    origin: request.origin,
    destination: request.destination,
    ...(request.destinationName && { destinationName: request.destinationName }),
    startDate: request.startDate,
    endDate: request.endDate,
    travelers: request.travelers,
    currency: request.budget.currency,
    maxResults,
  };
}

/**
 * Slots each category may fill over the trip.
 */
export function slotCountsFor(days: number, config: PlannerConfig): Record<Category, number> {
  return {
    flight: 1,
    lodging: 1,
    activity: days * config.schedule.maxActivitiesPerDay,
    meal: days * mealSlotsPerDay(config.schedule),
  };
}

// ============================================================================
// Planner
// ============================================================================

export class ItineraryPlanner {
  constructor(private readonly deps: PlannerDependencies) {}

  /**
   * Planner wired from the environment: config file, provider credentials
   * and, when OPENAI_API_KEY is set, the OpenAI narrator.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ItineraryPlanner {
    const config = loadPlannerConfig(env);
    const credentials = loadCredentials(env);
    const registry = createDefaultRegistry(credentials, config.providers);
    const narrator = credentials.openaiApiKey
      ? OpenAINarrator.fromApiKey(credentials.openaiApiKey, config.narration)
      : null;
    return new ItineraryPlanner({
      config,
      candidates: new ProviderAdapter(registry, config.providers),
      narrator,
    });
  }

  async plan(input: unknown, options: PlanOptions = {}): Promise<Result<PlannedTrip, PlanningFailure>> {
    const { signal } = options;
    const { config } = this.deps;
    if (signal?.aborted) return cancelled();

    const validated = validateTripRequest(input);
    if (!validated.ok) return validated;
    const { request, days } = validated.value;
    const excluded = request.excludedCategories ?? [];

    const allocation = allocateBudget(
      {
        total: request.budget,
        interests: request.interests,
        hints: request.budgetHints,
        days,
        excluded,
      },
      config.budget
    );
    if (!allocation.ok) return allocation;

    // Fetch every included category concurrently
    const constraints = searchConstraints(request, config.providers.maxResults);
    let outcomes: FetchOutcome[];
    try {
      outcomes = await Promise.all(
        CATEGORIES.filter((c) => !excluded.includes(c)).map((c) =>
          this.deps.candidates.fetch(c, constraints, { signal })
        )
      );
    } catch (error) {
      if (signal?.aborted) return cancelled();
      throw error;
    }

    const candidates: Record<Category, CandidateOption[]> = { flight: [], lodging: [], activity: [], meal: [] };
    const notices: CategoryNotice[] = [];
    const warnings: string[] = [...allocation.value.notes];
    for (const outcome of outcomes) {
      candidates[outcome.category] = outcome.options;
      if (outcome.unavailable) notices.push(outcome.unavailable);
      warnings.push(...outcome.warnings);
    }

    const selections = selectAll(
      candidates,
      allocation.value,
      slotCountsFor(days, config),
      request.interests,
      config.selection,
      notices
    );
    if (!selections.ok) return selections;
    for (const category of CATEGORIES) {
      const notice = selections.value[category].notice;
      if (notice) notices.push(notice);
    }

    const schedule = scheduleDays(
      {
        days,
        startDate: request.startDate,
        activities: selections.value.activity.ranked,
        meals: selections.value.meal.ranked,
        base: selections.value.lodging.ranked[0]?.option.location?.coordinates,
        allowEmpty: excluded.includes('activity') && excluded.includes('meal'),
        requireActivities: !excluded.includes('activity'),
      },
      config.schedule
    );

    const budget = allocation.value;
    const chosen = selections.value;
    const itinerary = Result.andThen(schedule, (scheduled) => {
      const assembled = assembleItinerary(
        {
          request,
          allocation: budget,
          selections: chosen,
          schedule: scheduled,
          notices,
          warnings,
        },
        config,
        this.deps
      );
      if (!assembled.ok) console.error(`  [planner] assembly failed: ${assembled.error.message}`);
      return assembled;
    });
    if (!itinerary.ok) return itinerary;

    if (signal?.aborted) return cancelled();
    try {
      const narrative = await narrate(itinerary.value, this.deps.narrator, {
        timeoutMs: config.narration.timeoutMs,
        signal,
      });
      return Result.ok({ itinerary: itinerary.value, narrative });
    } catch (error) {
      if (signal?.aborted) return cancelled();
      throw error;
    }
  }
}
