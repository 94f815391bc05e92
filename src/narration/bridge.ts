/**
 * Narration Bridge
 *
 * Best-effort prose for an assembled itinerary. A day the narrator does not
 * cover, or any narrator failure or timeout, gets the template text instead.
 * Only cancellation of the run is passed on to the caller.
 */

import type { DayNarrative, Itinerary, Narrative } from '../engine/types';
import { withDeadline } from '../utils/deadline';
import { fallbackDayText, fallbackSummary } from './fallback';
import { buildNarrationInput, styleHintFor, type Narrator, type NarratorResponse } from './narrator';

export interface NarrateOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  styleHint?: string;
}

export class NarrationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Narration timed out after ${timeoutMs}ms`);
    this.name = 'NarrationTimeoutError';
  }
}

export function fallbackNarrative(itinerary: Itinerary): Narrative {
  return {
    summary: fallbackSummary(itinerary),
    days: itinerary.days.map((day): DayNarrative => ({
      dayIndex: day.dayIndex,
      text: fallbackDayText(day),
      source: 'fallback',
    })),
  };
}

/**
 * Merge the narrator's answer with the template: narrator text wins for
 * every day it covers with non-empty text.
 */
export function mergeNarrative(itinerary: Itinerary, response: NarratorResponse): Narrative {
  const texts = new Map<number, string>();
  for (const day of response.days) {
    const text = day.text.trim();
    if (text && !texts.has(day.dayIndex)) texts.set(day.dayIndex, text);
  }

  const days = itinerary.days.map((day): DayNarrative => {
    const text = texts.get(day.dayIndex);
    return text !== undefined
      ? { dayIndex: day.dayIndex, text, source: 'narrator' }
      : { dayIndex: day.dayIndex, text: fallbackDayText(day), source: 'fallback' };
  });

  const summary = response.summary?.trim();
  return { summary: summary || fallbackSummary(itinerary), days };
}

export async function narrate(
  itinerary: Itinerary,
  narrator: Narrator | null,
  options: NarrateOptions
): Promise<Narrative> {
  const { signal } = options;
  signal?.throwIfAborted();
  if (!narrator) return fallbackNarrative(itinerary);

  const input = buildNarrationInput(itinerary);
  const styleHint = options.styleHint ?? styleHintFor(itinerary.request.interests);

  try {
    const response = await withDeadline(
      (s) => narrator.narrate(input, styleHint, s),
      options.timeoutMs,
      () => new NarrationTimeoutError(options.timeoutMs),
      signal
    );
    return mergeNarrative(itinerary, response);
  } catch (error) {
    if (signal?.aborted) throw error;
    console.warn(`  [narration] ${narrator.name} failed, using template text: ${error instanceof Error ? error.message : String(error)}`);
    return fallbackNarrative(itinerary);
  }
}
