/**
 * Provider Interface
 *
 * Defines the contract for upstream candidate sources.
 * Providers must normalize results to CandidateOption format.
 */

import type { CandidateOption, Category, CategoryNotice } from '../engine/types';

/**
 * Search parameters shared by every category
 */
export interface SearchConstraints {
  /** IATA city code. */
  destination: string;
  /** Free-text place name for point-of-interest search. */
  destinationName?: string;
  origin?: string;
  startDate: string;
  endDate: string;
  travelers: number;
  /** Currency every returned price must be in. */
  currency: string;
  maxResults: number;
}

/**
 * Upstream capability for one or more categories.
 * `search` rejects on any failure; retries happen above it.
 */
export interface CandidateProvider {
  readonly sourceId: string;
  readonly categories: readonly Category[];

  search(category: Category, constraints: SearchConstraints, signal: AbortSignal): Promise<CandidateOption[]>;
}

/**
 * What the adapter hands to the planner for one category
 */
export interface FetchOutcome {
  category: Category;
  options: CandidateOption[];
  fromCache: boolean;
  /** Set when the upstream could not be reached or no provider exists. */
  unavailable?: CategoryNotice;
  warnings: string[];
}

export type FetchImpl = typeof fetch;
