import fetch from 'node-fetch';
import { z } from 'zod';
import { CapabilityUnavailableError, errorMessage } from '../errors';
import { RatingEnsemble } from '../types';

const GROQ_API_URL = 'https://api.groq.com/openai/v1/chat/completions';

type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

type GroqClientOptions = {
  apiKey?: string;
  model: string;
  requestTimeoutMs: number;
  apiUrl?: string;
};

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      }),
    )
    .min(1),
});

const ratingAnswerSchema = z.object({
  rating: z.coerce.number(),
});

export async function createChatCompletion(
  options: GroqClientOptions,
  messages: ChatMessage[],
): Promise<string> {
  if (!options.apiKey) {
    throw new Error('GROQ_API_KEY is not set.');
  }

  const res = await fetch(options.apiUrl ?? GROQ_API_URL, {
    method: 'POST',
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      model: options.model,
      messages,
      temperature: 0,
    }),
    timeout: options.requestTimeoutMs,
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Groq API error: ${res.status} ${text}`);
  }

  const parsed = chatCompletionSchema.safeParse(await res.json());
  const content = parsed.success ? parsed.data.choices[0].message.content : '';
  if (!content) {
    throw new Error('Groq API returned empty content.');
  }
  return content;
}

/**
 * Reads a star rating out of the model answer. Accepts the requested
 * `{"rating": n}` JSON, or falls back to the first standalone digit 1-5.
 */
export function parseRatingAnswer(content: string): number {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (jsonMatch) {
    try {
      const answer = ratingAnswerSchema.safeParse(JSON.parse(jsonMatch[0]));
      if (answer.success) return answer.data.rating;
    } catch {
      // Not JSON after all; try the bare digit below.
    }
  }

  const digit = content.match(/\b([1-5])\b/);
  if (digit) return Number(digit[1]);
  throw new Error(`Could not read a rating from model answer: ${content.slice(0, 80)}`);
}

export class GroqRatingEnsemble implements RatingEnsemble {
  public readonly name = 'groq-rating';

  constructor(private readonly options: GroqClientOptions) {}

  async load(): Promise<void> {
    if (!this.options.apiKey) {
      throw new CapabilityUnavailableError(this.name, 'GROQ_API_KEY is not set');
    }
    try {
      await this.predict('Works as described.');
    } catch (err) {
      throw new CapabilityUnavailableError(
        this.name,
        `warm-up failed: ${errorMessage(err)}`,
      );
    }
  }

  async predict(text: string): Promise<number> {
    const responseText = await createChatCompletion(this.options, [
      {
        role: 'system',
        content:
          'You predict the star rating (1 to 5) a customer gave together with their product review.',
      },
      {
        role: 'user',
        content: `
Return only JSON of the form {"rating": <integer 1-5>}.

Review:
${text.replace(/\s+/g, ' ').slice(0, 800)}
        `.trim(),
      },
    ]);
    return parseRatingAnswer(responseText);
  }
}
