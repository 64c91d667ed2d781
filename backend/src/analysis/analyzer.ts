import {
  AnalysisRun,
  ComplaintStrategy,
  RatingStrategy,
  Review,
  TextComplaints,
} from '../types';
import { errorMessage } from '../errors';
import { mapInChunks } from '../utils/async';
import { logger as rootLogger, Logger } from '../utils/logger';
import { CapabilityHandle } from './capabilities';
import {
  DEFAULT_THRESHOLD,
  KeywordComplaintStrategy,
  MlComplaintStrategy,
  describeComplaints,
} from './complaintClassifier';
import { KeywordRatingStrategy, MlRatingStrategy } from './ratingPredictor';
import { aggregate, collectComplaintReviews, emptyAnalysis } from './statistics';
import { normalize } from './textNormalizer';

export type ReviewAnalyzerOptions = {
  timeoutMs: number;
  concurrency: number;
  threshold?: number;
  logger?: Logger;
};

export type SelectedStrategies = {
  rating: RatingStrategy;
  complaints: ComplaintStrategy;
  advancedAnalysisAvailable: boolean;
};

export type RawReview = string | null | undefined;

export function selectStrategies(
  capabilities: CapabilityHandle,
  options: { timeoutMs: number; logger?: Logger },
): SelectedStrategies {
  const keywordRating = new KeywordRatingStrategy();
  const ensemble = capabilities.ratingEnsemble;
  const classifier = capabilities.zeroShotClassifier;

  return {
    rating: ensemble
      ? new MlRatingStrategy(ensemble, {
          timeoutMs: options.timeoutMs,
          fallback: keywordRating,
          logger: options.logger,
        })
      : keywordRating,
    complaints: classifier
      ? new MlComplaintStrategy(classifier, {
          timeoutMs: options.timeoutMs,
          logger: options.logger,
        })
      : new KeywordComplaintStrategy(),
    advancedAnalysisAvailable: Boolean(classifier),
  };
}

/**
 * Normalizes, rates and classifies each review, then aggregates the set.
 * Never rejects: capability failures only show up as a lower-quality result
 * (`analysis_method`, `advanced_analysis_available`).
 */
export class ReviewAnalyzer {
  private readonly log: Logger;
  private readonly threshold: number;

  constructor(
    private readonly capabilities: CapabilityHandle,
    private readonly options: ReviewAnalyzerOptions,
  ) {
    this.log = options.logger ?? rootLogger.child('analyzer');
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
  }

  async analyzeReviews(
    reviews: readonly RawReview[],
    threshold: number = this.threshold,
  ): Promise<AnalysisRun> {
    const strategies = await this.strategies();
    const advancedAnalysisAvailable = strategies.advancedAnalysisAvailable;

    if (reviews.length === 0) {
      this.log.info('No reviews supplied; returning an empty analysis');
      return {
        status: 'EMPTY',
        analysis: emptyAnalysis({ advancedAnalysisAvailable }),
        complaintReviews: [],
        advancedAnalysisAvailable,
      };
    }

    const texts = reviews.map((review) => normalize(review));

    const analyzed = await mapInChunks(texts, this.options.concurrency, (text, idx) =>
      this.analyzeOne(reviews[idx] ?? '', text, strategies, threshold),
    );

    const analysis = aggregate(analyzed, { advancedAnalysisAvailable });
    const complaintReviews = collectComplaintReviews(analyzed);

    this.log.info(
      `Analyzed ${analysis.total_reviews} reviews (${analysis.analysis_method}): ` +
        `avg rating ${analysis.average_rating}, ${analysis.total_complaints} with complaints`,
    );

    return {
      status: 'SUCCESS',
      analysis,
      complaintReviews,
      advancedAnalysisAvailable,
    };
  }

  async analyzeText(
    text: string,
    threshold: number = this.threshold,
  ): Promise<TextComplaints> {
    const strategies = await this.strategies();
    const complaints = await strategies.complaints.classify(
      normalize(text),
      threshold,
    );
    return describeComplaints(complaints);
  }

  private async strategies(): Promise<SelectedStrategies> {
    await this.capabilities.init();
    return selectStrategies(this.capabilities, {
      timeoutMs: this.options.timeoutMs,
      logger: this.options.logger,
    });
  }

  private async analyzeOne(
    rawText: string,
    text: string,
    strategies: SelectedStrategies,
    threshold: number,
  ): Promise<Review> {
    if (!text) {
      return { rawText, text, predictedRating: null, complaints: {} };
    }

    try {
      const [predictedRating, complaints] = await Promise.all([
        strategies.rating.predict(text),
        strategies.complaints.classify(text, threshold),
      ]);
      return { rawText, text, predictedRating, complaints };
    } catch (err) {
      this.log.error(`Review analysis failed, counting it as neutral: ${errorMessage(err)}`);
      return { rawText, text, predictedRating: null, complaints: {} };
    }
  }
}
