/**
 * Planning Domain Types
 *
 * Shapes shared by every stage of a planning run. Provider-native payloads
 * never appear here: the provider adapter normalizes them into
 * CandidateOption before anything downstream sees them.
 */

// ============================================================================
// Core values
// ============================================================================

export const CATEGORIES = ['flight', 'lodging', 'activity', 'meal'] as const;

export type Category = (typeof CATEGORIES)[number];

/** Categories without which an itinerary is not a valid plan. */
export const CORE_CATEGORIES = ['flight', 'lodging'] as const satisfies readonly Category[];

export type CoreCategory = (typeof CORE_CATEGORIES)[number];

export interface Money {
  amount: number;
  currency: string;
}

export interface GeoPoint {
  lat: number;
  lon: number;
}

/**
 * Daily opening window in minutes from midnight. `close` is always after
 * `open`; places open around the clock carry no window at all.
 */
export interface OpeningHours {
  open: number;
  close: number;
}

export interface CandidateLocation {
  coordinates: GeoPoint;
  openingHours?: OpeningHours;
  address?: string;
}

// ============================================================================
// Request
// ============================================================================

export interface TripRequest {
  origin: string;
  destination: string;
  /** Free-text place name for point-of-interest search (defaults to destination). */
  destinationName?: string;
  startDate: string;
  endDate: string;
  travelers: number;
  budget: Money;
  /** Ordered: earlier interests weigh more when ranking. */
  interests: string[];
  budgetHints?: Partial<Record<Category, number>>;
  excludedCategories?: Category[];
}

// ============================================================================
// Candidates
// ============================================================================

export interface CandidateOption {
  /** `<source>:<category>:<providerId>` */
  id: string;
  category: Category;
  /** Upstream capability that produced the option. */
  source: string;
  /** Identifier the provider assigns to the real-world offering. */
  providerId: string;
  name: string;
  /** What the whole party pays for this option. */
  price: Money;
  location?: CandidateLocation;
  durationMinutes: number;
  tags: string[];
  /** Provider quality signal scaled to 0..1. */
  quality: number;
  details?: Record<string, string>;
}

export interface RankedCandidate {
  option: CandidateOption;
  score: number;
}

// ============================================================================
// Budget
// ============================================================================

export interface BudgetAllocation {
  total: Money;
  byCategory: Record<Category, number>;
  excluded: Category[];
  /** Budget the ceilings could not absorb. */
  unallocated: number;
  notes: string[];
}

// ============================================================================
// Schedule
// ============================================================================

export type MealType = 'breakfast' | 'lunch' | 'dinner';

export type DayStatus = 'empty' | 'filling' | 'full' | 'partial';

export interface ScheduledSlot {
  dayIndex: number;
  kind: 'meal' | 'activity';
  mealType?: MealType;
  start: string;
  end: string;
  startMinutes: number;
  endMinutes: number;
  /** Estimated travel from the previous location, already accounted before `start`. */
  travelMinutesBefore: number;
  option: CandidateOption;
}

export interface ItineraryDay {
  dayIndex: number;
  date: string;
  status: Extract<DayStatus, 'full' | 'partial'>;
  unplanned: boolean;
  slots: ScheduledSlot[];
}

// ============================================================================
// Itinerary
// ============================================================================

export type NoticeKind = 'ProviderUnavailable' | 'NoCandidatesFound';

export interface CategoryNotice {
  category: Category;
  kind: NoticeKind;
  message: string;
}

export interface PlanMetadata {
  unplannedDays: number[];
  notices: CategoryNotice[];
  warnings: string[];
}

export interface Itinerary {
  requestId: string;
  request: TripRequest;
  flight: CandidateOption | null;
  lodging: CandidateOption | null;
  alternativeLodging: CandidateOption[];
  days: ItineraryDay[];
  allocation: BudgetAllocation;
  costBreakdown: Record<Category, number>;
  totalCost: Money;
  metadata: PlanMetadata;
  createdAt: string;
}

export interface DayNarrative {
  dayIndex: number;
  text: string;
  source: 'narrator' | 'fallback';
}

export interface Narrative {
  summary: string;
  days: DayNarrative[];
}

export interface PlannedTrip {
  itinerary: Itinerary;
  narrative: Narrative;
}

// ============================================================================
// Failures
// ============================================================================

export type PlanningFailure =
  | { kind: 'InvalidRequest'; message: string; issues: string[] }
  | { kind: 'BudgetInfeasible'; message: string; required: number; available: number }
  | { kind: 'InsufficientCoreOptions'; message: string; categories: Category[]; notices: CategoryNotice[] }
  | { kind: 'ScheduleInfeasible'; message: string; days: number }
  | { kind: 'BudgetExceeded'; message: string; totalCost: number; budget: number }
  | { kind: 'AssemblyInvariantViolation'; message: string; issues: string[] }
  | { kind: 'Cancelled'; message: string };

export type PlanningFailureKind = PlanningFailure['kind'];
