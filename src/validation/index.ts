/**
 * Validation Module
 *
 * Exports itinerary validation types and utilities.
 */

export * from './types';
export * from './itinerary-validator';
