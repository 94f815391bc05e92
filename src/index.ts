/**
 * Trip itinerary engine
 *
 * Public entry points: the planner, its domain types, config loading and
 * the provider and narration seams for plugging in other upstreams.
 */

export { ItineraryPlanner, searchConstraints, slotCountsFor } from './engine/planner';
export type { CandidateSource, PlannerDependencies, PlanOptions } from './engine/planner';
export { TripRequestSchema, validateTripRequest } from './engine/request';
export * from './engine/types';
export { Result } from './types';
export {
  DEFAULT_PLANNER_CONFIG,
  loadPlannerConfig,
  loadCredentials,
  clearConfigCache,
  validatePlannerConfig,
} from './config';
export type { PlannerConfig, PlannerConfigOverrides, ProviderCredentials } from './config';
export { allocateBudget } from './planning/budget-allocator';
export { selectAll, selectCandidates } from './planning/candidate-selector';
export { scheduleDays } from './planning/day-scheduler';
export { assembleItinerary } from './planning/assembler';
export { ItineraryValidator } from './validation';
export * from './providers';
export * from './narration';
