export const COMPLAINT_CATEGORIES = [
  'material_quality',
  'sound_quality',
  'battery_life',
  'comfort_fit',
  'connectivity',
  'shipping_delivery',
  'price_value',
  'customer_service',
] as const;

export type ComplaintCategory = (typeof COMPLAINT_CATEGORIES)[number];

export type StarRating = 1 | 2 | 3 | 4 | 5;

/** Category -> confidence in [0, 1], only entries at or above the threshold. */
export type ComplaintScores = Partial<Record<ComplaintCategory, number>>;

export type Review = {
  rawText: string;
  text: string;
  predictedRating: StarRating | null;
  complaints: ComplaintScores;
};

export type ComplaintEntry = {
  category: ComplaintCategory;
  count: number;
  description: string;
};

export type RatingDistribution = Record<'1' | '2' | '3' | '4' | '5', number>;

export type SentimentBreakdown = {
  positive: number;
  negative: number;
};

export type AnalysisMethod = 'ML+Complaint Analysis' | 'Keyword Analysis';

export type AnalysisResult = {
  average_rating: number;
  total_reviews: number;
  total_complaints: number;
  complaint_percentage: number;
  ml_rating_distribution: RatingDistribution;
  sentiment_breakdown: SentimentBreakdown;
  top_complaints: ComplaintEntry[];
  complaint_categories: Record<ComplaintCategory, number>;
  positive_themes: string[];
  analysis_method: AnalysisMethod;
  advanced_analysis_available: boolean;
  recommendation_score: number;
};

export type ComplaintReview = {
  text: string;
  complaint_type: ComplaintCategory;
  confidence: number;
};

export type ProductInfo = {
  name: string;
  rating: number;
  review_count: number;
  original_rating_distribution?: Record<string, number>;
};

export type ProductDocument = {
  document_key: string;
  product_id: string;
  retailer: string;
  product_info: ProductInfo;
  analysis: AnalysisResult;
  complaint_reviews: ComplaintReview[];
  timestamp: number;
};

export type RunStatus = 'SUCCESS' | 'EMPTY';

export type AnalysisRun = {
  status: RunStatus;
  analysis: AnalysisResult;
  complaintReviews: ComplaintReview[];
  advancedAnalysisAvailable: boolean;
};

export type TextComplaint = {
  score: number;
  description: string;
};

export type TextComplaints = Partial<Record<ComplaintCategory, TextComplaint>>;

export interface Capability {
  readonly name: string;
  load(): Promise<void>;
  unload?(): Promise<void>;
}

export interface RatingEnsemble extends Capability {
  predict(text: string): Promise<number>;
}

export interface ZeroShotClassifier extends Capability {
  classify(
    text: string,
    labels: readonly string[],
  ): Promise<Record<string, number>>;
}

export type CapabilityStatus = {
  ratingEnsemble: boolean;
  zeroShotClassifier: boolean;
};

export interface RatingStrategy {
  readonly kind: 'ml' | 'keyword';
  predict(text: string): Promise<StarRating>;
}

export interface ComplaintStrategy {
  readonly kind: 'ml' | 'keyword';
  classify(text: string, threshold?: number): Promise<ComplaintScores>;
}
