/**
 * OpenAI narrator: one chat completion per itinerary, answered as JSON and
 * validated before use.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { NarrationConfig } from '../config/schema';
import { formatIssues } from '../config/schema';
import type { NarrationInput, Narrator, NarratorResponse } from './narrator';

export interface ChatRequest {
  model: string;
  temperature: number;
  system: string;
  user: string;
}

/** Returns the raw message content of one completion. */
export type ChatCompleter = (request: ChatRequest, signal: AbortSignal) => Promise<string | null>;

export const NarratorResponseSchema = z.object({
  summary: z.string().optional(),
  days: z.array(
    z.object({
      dayIndex: z.number().int().min(0),
      text: z.string().min(1),
    })
  ),
});

const SYSTEM_PROMPT = `You are a travel writer describing an itinerary that has already been planned.
Describe each day in a few warm, practical sentences.
Use only the places and times provided; never add, remove or move anything.
Answer with JSON: {"summary": string, "days": [{"dayIndex": number, "text": string}]}.`;

export function openAICompleter(client: OpenAI): ChatCompleter {
  return async (request, signal) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        temperature: request.temperature,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
      },
      { signal }
    );
    return completion.choices[0]?.message?.content ?? null;
  };
}

export class OpenAINarrator implements Narrator {
  readonly name = 'openai';

  constructor(
    private readonly complete: ChatCompleter,
    private readonly config: Pick<NarrationConfig, 'model' | 'temperature'>
  ) {}

  static fromApiKey(apiKey: string, config: Pick<NarrationConfig, 'model' | 'temperature'>): OpenAINarrator {
    return new OpenAINarrator(openAICompleter(new OpenAI({ apiKey })), config);
  }

  async narrate(input: NarrationInput, styleHint: string, signal: AbortSignal): Promise<NarratorResponse> {
    const content = await this.complete(
      {
        model: this.config.model,
        temperature: this.config.temperature,
        system: SYSTEM_PROMPT,
        user: `Style: ${styleHint}\n\nItinerary:\n${JSON.stringify(input, null, 2)}`,
      },
      signal
    );
    if (!content) throw new Error('Narrator returned an empty response');

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new Error(`Narrator returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = NarratorResponseSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Narrator response failed validation:\n${formatIssues(result.error).join('\n')}`);
    }
    return result.data;
  }
}
