/**
 * Narrator contract and the structured summary handed to it.
 *
 * The narrator only ever sees this summary; its text is stored beside the
 * itinerary and is never read back into planning data.
 */

import type { Itinerary } from '../engine/types';

export interface NarrationSlot {
  start: string;
  end: string;
  name: string;
  kind: 'meal' | 'activity';
  mealType?: string;
  address?: string;
}

export interface NarrationDay {
  dayIndex: number;
  date: string;
  unplanned: boolean;
  slots: NarrationSlot[];
}

export interface NarrationInput {
  destination: string;
  startDate: string;
  endDate: string;
  travelers: number;
  interests: string[];
  flight: string | null;
  lodging: string | null;
  totalCost: string;
  days: NarrationDay[];
}

export interface NarratorResponse {
  summary?: string;
  days: Array<{ dayIndex: number; text: string }>;
}

export interface Narrator {
  readonly name: string;
  narrate(input: NarrationInput, styleHint: string, signal: AbortSignal): Promise<NarratorResponse>;
}

export function buildNarrationInput(itinerary: Itinerary): NarrationInput {
  const { request } = itinerary;
  return {
    destination: request.destinationName ?? request.destination,
    startDate: request.startDate,
    endDate: request.endDate,
    travelers: request.travelers,
    interests: [...request.interests],
    flight: itinerary.flight?.name ?? null,
    lodging: itinerary.lodging?.name ?? null,
    totalCost: `${itinerary.totalCost.amount.toFixed(2)} ${itinerary.totalCost.currency}`,
    days: itinerary.days.map((day) => ({
      dayIndex: day.dayIndex,
      date: day.date,
      unplanned: day.unplanned,
      slots: day.slots.map((slot) => ({
        start: slot.start,
        end: slot.end,
        name: slot.option.name,
        kind: slot.kind,
        ...(slot.mealType && { mealType: slot.mealType }),
        ...(slot.option.location?.address && { address: slot.option.location.address }),
      })),
    })),
  };
}

/**
 * Tone for the narrator, led by the traveler's first interests.
 */
export function styleHintFor(interests: readonly string[]): string {
  if (interests.length === 0) return 'friendly and practical';
  return `friendly and practical, for a traveler into ${interests.slice(0, 3).join(', ')}`;
}
