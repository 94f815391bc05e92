/**
 * Itinerary Validator Types
 *
 * Types for checking an assembled itinerary before it is released.
 */

/**
 * Validation issue severity
 */
export type IssueSeverity = 'error' | 'warning' | 'info';

/**
 * Validation issue category
 */
export type IssueCategory =
  | 'time_conflict'        // Overlapping slots on one day
  | 'business_hours'       // Slot outside the option's opening hours
  | 'day_window'           // Slot outside the daylight window or malformed
  | 'transport_gap'        // Less time between slots than the travel estimate
  | 'day_index'            // Slot filed under the wrong day
  | 'day_count'            // Day count differs from the date range
  | 'duplicate_candidate'  // Same candidate scheduled twice
  | 'missing_core_option'  // Flight or lodging missing without being excluded
  | 'budget_exceeded'      // Total cost over the trip budget
  | 'cost_mismatch'        // Stated total differs from the sum of prices
  | 'unplanned_day';       // Day without any slot

/**
 * A single validation issue
 */
export interface ValidationIssue {
  severity: IssueSeverity;
  category: IssueCategory;
  day?: number;
  optionId?: string;
  message: string;
}

/**
 * Validation result for an entire itinerary
 */
export interface ItineraryValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
  summary: {
    errors: number;
    warnings: number;
    info: number;
  };
}

/**
 * Validator options
 */
export interface ValidatorOptions {
  /**
   * Daylight window start, HH:MM (default: 00:00)
   */
  dayStart?: string;

  /**
   * Daylight window end, HH:MM (default: 24:00)
   */
  dayEnd?: string;
}
