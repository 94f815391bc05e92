/**
 * Narration bridge tests: narrator merge, timeout and failure fallbacks
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  NO_ACTIVITIES_TEXT,
  OpenAINarrator,
  buildNarrationInput,
  fallbackNarrative,
  mergeNarrative,
  narrate,
  styleHintFor,
  type ChatRequest,
  type NarrationInput,
  type Narrator,
  type NarratorResponse,
} from '../../src/narration';
import { sampleItinerary } from '../helpers/fixtures';

const SUMMARY = '2 days in Osaka for 2 travelers, flying CI TPE-KIX, staying at Harbor Inn. Total 770.50 USD.';
const DAY_ONE = '08:00-08:45 Morning Cafe\n08:45-10:45 Castle';

class FakeNarrator implements Narrator {
  readonly name = 'fake';
  readonly inputs: Array<{ input: NarrationInput; styleHint: string }> = [];

  constructor(private readonly respond: (signal: AbortSignal) => Promise<NarratorResponse>) {}

  narrate(input: NarrationInput, styleHint: string, signal: AbortSignal): Promise<NarratorResponse> {
    this.inputs.push({ input, styleHint });
    return this.respond(signal);
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fallbackNarrative', () => {
  it('lists each day and summarizes the trip', () => {
    expect(fallbackNarrative(sampleItinerary())).toEqual({
      summary: SUMMARY,
      days: [
        { dayIndex: 0, text: DAY_ONE, source: 'fallback' },
        { dayIndex: 1, text: NO_ACTIVITIES_TEXT, source: 'fallback' },
      ],
    });
  });
});

describe('mergeNarrative', () => {
  it('keeps the first non-empty text per day', () => {
    const merged = mergeNarrative(sampleItinerary(), {
      days: [
        { dayIndex: 0, text: '   ' },
        { dayIndex: 0, text: 'A slow morning.' },
        { dayIndex: 0, text: 'Ignored.' },
      ],
    });
    expect(merged.summary).toBe(SUMMARY);
    expect(merged.days[0]).toEqual({ dayIndex: 0, text: 'A slow morning.', source: 'narrator' });
    expect(merged.days[1].source).toBe('fallback');
  });
});

describe('buildNarrationInput', () => {
  it('hands the narrator only the planned facts', () => {
    const input = buildNarrationInput(sampleItinerary());
    expect(input.destination).toBe('Osaka');
    expect(input.totalCost).toBe('770.50 USD');
    expect(input.days[0].slots[0]).toEqual({
      start: '08:00',
      end: '08:45',
      name: 'Morning Cafe',
      kind: 'meal',
      mealType: 'breakfast',
    });
    expect(input.days[1]).toEqual({ dayIndex: 1, date: '2026-03-02', unplanned: true, slots: [] });
  });
});

describe('styleHintFor', () => {
  it('leads with up to three interests', () => {
    expect(styleHintFor([])).toBe('friendly and practical');
    expect(styleHintFor(['food', 'art', 'nature', 'beach'])).toBe(
      'friendly and practical, for a traveler into food, art, nature'
    );
  });
});

describe('narrate', () => {
  it('uses the template without a narrator', async () => {
    const narrative = await narrate(sampleItinerary(), null, { timeoutMs: 100 });
    expect(narrative).toEqual(fallbackNarrative(sampleItinerary()));
  });

  it('merges narrator text and fills uncovered days from the template', async () => {
    const narrator = new FakeNarrator(async () => ({
      summary: 'Two easy days by the bay.',
      days: [{ dayIndex: 0, text: ' Breakfast, then the castle. ' }],
    }));

    const narrative = await narrate(sampleItinerary(), narrator, { timeoutMs: 100 });

    expect(narrative).toEqual({
      summary: 'Two easy days by the bay.',
      days: [
        { dayIndex: 0, text: 'Breakfast, then the castle.', source: 'narrator' },
        { dayIndex: 1, text: NO_ACTIVITIES_TEXT, source: 'fallback' },
      ],
    });
    expect(narrator.inputs[0].styleHint).toBe('friendly and practical, for a traveler into culture, food');
  });

  it('falls back when the narrator times out', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const narrator = new FakeNarrator(() => new Promise<NarratorResponse>(() => undefined));

    const narrative = await narrate(sampleItinerary(), narrator, { timeoutMs: 20 });

    expect(narrative.days.map((d) => d.source)).toEqual(['fallback', 'fallback']);
    expect(warn).toHaveBeenCalledWith('  [narration] fake failed, using template text: Narration timed out after 20ms');
  });

  it('falls back when the narrator fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const narrator = new FakeNarrator(async () => {
      throw new Error('quota exceeded');
    });

    const narrative = await narrate(sampleItinerary(), narrator, { timeoutMs: 100 });
    expect(narrative.summary).toBe(SUMMARY);
    expect(narrative.days[0]).toEqual({ dayIndex: 0, text: DAY_ONE, source: 'fallback' });
  });

  it('passes cancellation on', async () => {
    const controller = new AbortController();
    const narrator = new FakeNarrator(() => new Promise<NarratorResponse>(() => undefined));

    const pending = narrate(sampleItinerary(), narrator, { timeoutMs: 1000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toHaveProperty('name', 'AbortError');
  });
});

describe('OpenAINarrator', () => {
  const config = { model: 'gpt-4o-mini', temperature: 0.7 };
  const input = buildNarrationInput(sampleItinerary());
  const signal = new AbortController().signal;

  it('sends the summary and parses the JSON answer', async () => {
    const requests: ChatRequest[] = [];
    const narrator = new OpenAINarrator(async (request) => {
      requests.push(request);
      return JSON.stringify({ summary: 'Nice.', days: [{ dayIndex: 0, text: 'Castle day.' }] });
    }, config);

    await expect(narrator.narrate(input, 'calm', signal)).resolves.toEqual({
      summary: 'Nice.',
      days: [{ dayIndex: 0, text: 'Castle day.' }],
    });
    expect(requests[0].model).toBe('gpt-4o-mini');
    expect(requests[0].temperature).toBe(0.7);
    expect(requests[0].user.startsWith('Style: calm\n\nItinerary:\n')).toBe(true);
  });

  it('rejects empty, non-JSON and off-schema answers', async () => {
    await expect(new OpenAINarrator(async () => null, config).narrate(input, 'calm', signal)).rejects.toThrow(
      'Narrator returned an empty response'
    );
    await expect(new OpenAINarrator(async () => 'Day one: castle', config).narrate(input, 'calm', signal)).rejects.toThrow(
      'Narrator returned invalid JSON'
    );
    await expect(
      new OpenAINarrator(async () => '{"days":[{"dayIndex":-1,"text":"x"}]}', config).narrate(input, 'calm', signal)
    ).rejects.toThrow('Narrator response failed validation');
  });
});
