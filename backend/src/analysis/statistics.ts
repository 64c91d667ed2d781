import {
  AnalysisMethod,
  AnalysisResult,
  COMPLAINT_CATEGORIES,
  ComplaintCategory,
  ComplaintEntry,
  ComplaintReview,
  RatingDistribution,
  Review,
} from '../types';
import { CATEGORY_DESCRIPTIONS, emptyCategoryCounts } from './complaintCategories';
import { strongestComplaint } from './complaintClassifier';
import { matchesUnnegated } from './negation';
import { phraseMatcher, toMatchable } from './textNormalizer';
import themeVocabulary from './lexicons/themes.json';

export const TOP_COMPLAINTS_LIMIT = 3;
export const POSITIVE_THEMES_LIMIT = 4;
const NEUTRAL_RATING = 3;

const THEME_MATCHERS = themeVocabulary.map((entry) => ({
  theme: entry.theme,
  matchers: entry.keywords.map((keyword) => phraseMatcher(keyword)),
}));

export type AggregateOptions = {
  advancedAnalysisAvailable: boolean;
};

export function round(value: number, decimals = 1): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function analysisMethodFor(advanced: boolean): AnalysisMethod {
  return advanced ? 'ML+Complaint Analysis' : 'Keyword Analysis';
}

function emptyDistribution(): RatingDistribution {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
}

export function emptyAnalysis(options: AggregateOptions): AnalysisResult {
  return {
    average_rating: 0,
    total_reviews: 0,
    total_complaints: 0,
    complaint_percentage: 0,
    ml_rating_distribution: emptyDistribution(),
    sentiment_breakdown: { positive: 0, negative: 0 },
    top_complaints: [],
    complaint_categories: emptyCategoryCounts(),
    positive_themes: [],
    analysis_method: analysisMethodFor(options.advancedAnalysisAvailable),
    advanced_analysis_available: options.advancedAnalysisAvailable,
    recommendation_score: 0,
  };
}

/**
 * Sorted by count descending; equal counts keep category declaration order
 * because the sort is stable and the input is in that order.
 */
export function rankComplaints(
  counts: Record<ComplaintCategory, number>,
  limit = TOP_COMPLAINTS_LIMIT,
): ComplaintEntry[] {
  return COMPLAINT_CATEGORIES.filter((category) => counts[category] > 0)
    .map((category) => ({
      category,
      count: counts[category],
      description: CATEGORY_DESCRIPTIONS[category],
    }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function extractPositiveThemes(
  texts: readonly string[],
  limit = POSITIVE_THEMES_LIMIT,
): string[] {
  const matchable = texts.map((text) => toMatchable(text)).filter(Boolean);
  const themes: string[] = [];

  for (const { theme, matchers } of THEME_MATCHERS) {
    if (themes.length >= limit) break;
    const found = matchable.some((text) =>
      matchers.some((matcher) => matchesUnnegated(matcher, text)),
    );
    if (found) themes.push(theme);
  }
  return themes;
}

/**
 * 0..100 score: rating share, minus twice the complaint percentage (capped at
 * 50), plus one point per ten reviews (capped at 10).
 */
export function recommendationScore(
  meanRating: number,
  complaintPercentage: number,
  totalReviews: number,
): number {
  if (totalReviews === 0) return 0;
  const base = (meanRating / 5) * 100;
  const penalty = Math.min(complaintPercentage * 2, 50);
  const sampleBonus = Math.min(totalReviews / 10, 10);
  return round(Math.max(0, Math.min(100, base - penalty + sampleBonus)));
}

export function aggregate(
  reviews: readonly Review[],
  options: AggregateOptions,
): AnalysisResult {
  const totalReviews = reviews.length;
  if (totalReviews === 0) return emptyAnalysis(options);

  const distribution = emptyDistribution();
  const categoryCounts = emptyCategoryCounts();
  let ratingSum = 0;
  let reviewsWithComplaints = 0;

  for (const review of reviews) {
    const rating = review.predictedRating ?? NEUTRAL_RATING;
    distribution[rating] += 1;
    ratingSum += rating;

    let hasComplaint = false;
    for (const category of COMPLAINT_CATEGORIES) {
      if (review.complaints[category] !== undefined) {
        categoryCounts[category] += 1;
        hasComplaint = true;
      }
    }
    if (hasComplaint) reviewsWithComplaints += 1;
  }

  const meanRating = ratingSum / totalReviews;
  const rawComplaintShare = (100 * reviewsWithComplaints) / totalReviews;
  const complaintPercentage = round(rawComplaintShare);

  return {
    average_rating: round(meanRating),
    total_reviews: totalReviews,
    total_complaints: reviewsWithComplaints,
    complaint_percentage: complaintPercentage,
    ml_rating_distribution: distribution,
    sentiment_breakdown: {
      positive: round(100 - complaintPercentage),
      negative: complaintPercentage,
    },
    top_complaints: rankComplaints(categoryCounts),
    complaint_categories: categoryCounts,
    positive_themes: extractPositiveThemes(reviews.map((review) => review.text)),
    analysis_method: analysisMethodFor(options.advancedAnalysisAvailable),
    advanced_analysis_available: options.advancedAnalysisAvailable,
    recommendation_score: recommendationScore(
      meanRating,
      rawComplaintShare,
      totalReviews,
    ),
  };
}

export function collectComplaintReviews(
  reviews: readonly Review[],
): ComplaintReview[] {
  const collected: ComplaintReview[] = [];
  for (const review of reviews) {
    const strongest = strongestComplaint(review.complaints);
    if (!strongest) continue;
    const [category, confidence] = strongest;
    collected.push({
      text: review.text,
      complaint_type: category,
      confidence: round(confidence, 3),
    });
  }
  return collected;
}
