/**
 * Deterministic narrative used whenever the narrator is absent or fails.
 */

import type { Itinerary, ItineraryDay } from '../engine/types';

export const NO_ACTIVITIES_TEXT = 'No activities scheduled';

export function fallbackDayText(day: ItineraryDay): string {
  if (day.slots.length === 0) return NO_ACTIVITIES_TEXT;
  return day.slots.map((slot) => `${slot.start}-${slot.end} ${slot.option.name}`).join('\n');
}

export function fallbackSummary(itinerary: Itinerary): string {
  const { request } = itinerary;
  const place = request.destinationName ?? request.destination;
  const days = itinerary.days.length;
  const parts = [
    `${days} day${days === 1 ? '' : 's'} in ${place} for ${request.travelers} traveler${request.travelers === 1 ? '' : 's'}`,
  ];
  if (itinerary.flight) parts.push(`flying ${itinerary.flight.name}`);
  if (itinerary.lodging) parts.push(`staying at ${itinerary.lodging.name}`);
  return `${parts.join(', ')}. Total ${itinerary.totalCost.amount.toFixed(2)} ${itinerary.totalCost.currency}.`;
}
