import { PerReviewClassificationError } from '../errors';
import { RatingEnsemble, RatingStrategy, StarRating } from '../types';
import { withTimeout } from '../utils/async';
import { logger as rootLogger, Logger } from '../utils/logger';
import { NEGATION_WINDOW, NEGATORS } from './negation';
import { tokenize } from './textNormalizer';
import ratingLexicon from './lexicons/rating.json';

const POSITIVE_WORDS = new Set(ratingLexicon.positive);
const NEGATIVE_WORDS = new Set(ratingLexicon.negative);

export function keywordScore(text: string): number {
  let score = 0;
  let negationLeft = 0;

  for (const token of tokenize(text)) {
    if (NEGATORS.has(token)) {
      negationLeft = NEGATION_WINDOW;
      continue;
    }

    let polarity = 0;
    if (POSITIVE_WORDS.has(token)) polarity = 1;
    else if (NEGATIVE_WORDS.has(token)) polarity = -1;

    if (polarity === 0) {
      if (negationLeft > 0) negationLeft -= 1;
      continue;
    }

    if (negationLeft > 0) {
      polarity = -polarity;
      negationLeft = 0;
    }
    score += polarity;
  }

  return score;
}

export function scoreToRating(score: number): StarRating {
  if (score >= 2) return 5;
  if (score === 1) return 4;
  if (score === 0) return 3;
  if (score === -1) return 2;
  return 1;
}

export function predictRatingByKeywords(text: string): StarRating {
  return scoreToRating(keywordScore(text));
}

const STAR_RATINGS: readonly StarRating[] = [1, 2, 3, 4, 5];

export function toStarRating(value: unknown): StarRating | null {
  return STAR_RATINGS.find((rating) => rating === value) ?? null;
}

export class KeywordRatingStrategy implements RatingStrategy {
  public readonly kind = 'keyword';

  async predict(text: string): Promise<StarRating> {
    return predictRatingByKeywords(text);
  }
}

type MlRatingOptions = {
  timeoutMs: number;
  fallback?: RatingStrategy;
  logger?: Logger;
};

/**
 * Asks the rating ensemble first. Any failure, timeout or out-of-range answer
 * degrades that single review to the fallback strategy.
 */
export class MlRatingStrategy implements RatingStrategy {
  public readonly kind = 'ml';
  private readonly fallback: RatingStrategy;
  private readonly log: Logger;

  constructor(
    private readonly ensemble: RatingEnsemble,
    private readonly options: MlRatingOptions,
  ) {
    this.fallback = options.fallback ?? new KeywordRatingStrategy();
    this.log = options.logger ?? rootLogger.child('rating');
  }

  async predict(text: string): Promise<StarRating> {
    try {
      const raw = await withTimeout(
        this.ensemble.predict(text),
        this.options.timeoutMs,
        this.ensemble.name,
      );
      const rating = toStarRating(raw);
      if (rating === null) {
        throw new Error(`answer ${String(raw)} is not a star rating`);
      }
      return rating;
    } catch (err) {
      const failure = new PerReviewClassificationError(this.ensemble.name, err);
      this.log.warn(`${failure.message}; using ${this.fallback.kind} rating`);
      return this.fallback.predict(text);
    }
  }
}
