import fetch from 'node-fetch';
import { z } from 'zod';
import { CapabilityUnavailableError, errorMessage } from '../errors';
import { ZeroShotClassifier } from '../types';

const HF_INFERENCE_URL = 'https://api-inference.huggingface.co/models';

type HuggingFaceOptions = {
  apiToken?: string;
  model: string;
  requestTimeoutMs: number;
  apiBaseUrl?: string;
};

const zeroShotResultSchema = z.object({
  labels: z.array(z.string()),
  scores: z.array(z.number()),
});

// Single inputs come back as one object; some deployments wrap it in a list.
const zeroShotResponseSchema = z.union([
  zeroShotResultSchema,
  z.array(zeroShotResultSchema).min(1),
]);

export function zipScores(labels: string[], scores: number[]): Record<string, number> {
  const byLabel: Record<string, number> = {};
  labels.forEach((label, idx) => {
    const score = scores[idx];
    if (score !== undefined) byLabel[label] = score;
  });
  return byLabel;
}

/**
 * Zero-shot classification through the Hugging Face inference API
 * (an NLI model such as facebook/bart-large-mnli).
 */
export class HuggingFaceZeroShotClassifier implements ZeroShotClassifier {
  public readonly name = 'hf-zero-shot';

  constructor(private readonly options: HuggingFaceOptions) {}

  async load(): Promise<void> {
    if (!this.options.apiToken) {
      throw new CapabilityUnavailableError(this.name, 'HF_API_TOKEN is not set');
    }
    try {
      await this.classify('The product works as described.', [
        'complaint',
        'praise',
      ]);
    } catch (err) {
      throw new CapabilityUnavailableError(
        this.name,
        `warm-up failed: ${errorMessage(err)}`,
      );
    }
  }

  async classify(
    text: string,
    labels: readonly string[],
  ): Promise<Record<string, number>> {
    if (!this.options.apiToken) {
      throw new Error('HF_API_TOKEN is not set.');
    }

    const baseUrl = this.options.apiBaseUrl ?? HF_INFERENCE_URL;
    const res = await fetch(`${baseUrl}/${this.options.model}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.apiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        inputs: text,
        parameters: { candidate_labels: labels, multi_label: true },
      }),
      timeout: this.options.requestTimeoutMs,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Hugging Face API error: ${res.status} ${body}`);
    }

    const parsed = zeroShotResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Hugging Face API returned an unexpected payload.');
    }
    const result = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
    return zipScores(result.labels, result.scores);
  }
}
