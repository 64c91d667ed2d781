import { PerReviewClassificationError } from '../errors';
import {
  COMPLAINT_CATEGORIES,
  ComplaintCategory,
  ComplaintScores,
  ComplaintStrategy,
  TextComplaints,
  ZeroShotClassifier,
} from '../types';
import { withTimeout } from '../utils/async';
import { logger as rootLogger, Logger } from '../utils/logger';
import {
  COMPLAINT_PHRASES,
  ZERO_SHOT_LABELS,
  categoryForLabel,
} from './complaintCategories';
import { matchesUnnegated } from './negation';
import { phraseMatcher, toMatchable } from './textNormalizer';

export const DEFAULT_THRESHOLD = 0.5;

const PHRASE_MATCHERS = COMPLAINT_CATEGORIES.map(
  (category): [ComplaintCategory, RegExp[]] => [
    category,
    COMPLAINT_PHRASES[category].map((phrase) => phraseMatcher(phrase)),
  ],
);

/** Phrase lookup; a matching, non-negated category gets confidence 1. */
export class KeywordComplaintStrategy implements ComplaintStrategy {
  public readonly kind = 'keyword';

  async classify(
    text: string,
    threshold: number = DEFAULT_THRESHOLD,
  ): Promise<ComplaintScores> {
    const matchable = toMatchable(text);
    const complaints: ComplaintScores = {};
    if (!matchable || threshold > 1) return complaints;

    for (const [category, matchers] of PHRASE_MATCHERS) {
      if (matchers.some((matcher) => matchesUnnegated(matcher, matchable))) {
        complaints[category] = 1;
      }
    }
    return complaints;
  }
}

type MlComplaintOptions = {
  timeoutMs: number;
  logger?: Logger;
};

/**
 * Multi-label zero-shot classification over the category labels. A failed or
 * timed-out call yields no complaints for that review.
 */
export class MlComplaintStrategy implements ComplaintStrategy {
  public readonly kind = 'ml';
  private readonly log: Logger;

  constructor(
    private readonly classifier: ZeroShotClassifier,
    private readonly options: MlComplaintOptions,
  ) {
    this.log = options.logger ?? rootLogger.child('complaints');
  }

  async classify(
    text: string,
    threshold: number = DEFAULT_THRESHOLD,
  ): Promise<ComplaintScores> {
    if (!text) return {};

    let scores: Record<string, number>;
    try {
      scores = await withTimeout(
        this.classifier.classify(text, Object.values(ZERO_SHOT_LABELS)),
        this.options.timeoutMs,
        this.classifier.name,
      );
    } catch (err) {
      const failure = new PerReviewClassificationError(this.classifier.name, err);
      this.log.warn(`${failure.message}; treating review as complaint-free`);
      return {};
    }

    const complaints: ComplaintScores = {};
    for (const [label, score] of Object.entries(scores)) {
      const category = categoryForLabel(label);
      if (!category || !Number.isFinite(score)) continue;
      if (score >= threshold) complaints[category] = score;
    }
    return complaints;
  }
}

export function describeComplaints(complaints: ComplaintScores): TextComplaints {
  const described: TextComplaints = {};
  for (const category of COMPLAINT_CATEGORIES) {
    const score = complaints[category];
    if (score === undefined) continue;
    described[category] = {
      score,
      description: ZERO_SHOT_LABELS[category],
    };
  }
  return described;
}

/** Highest-confidence category; ties go to the earlier declared category. */
export function strongestComplaint(
  complaints: ComplaintScores,
): [ComplaintCategory, number] | null {
  let best: [ComplaintCategory, number] | null = null;
  for (const category of COMPLAINT_CATEGORIES) {
    const score = complaints[category];
    if (score === undefined) continue;
    if (!best || score > best[1]) best = [category, score];
  }
  return best;
}
