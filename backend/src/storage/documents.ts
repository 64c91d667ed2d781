import { AnalysisRun, ProductDocument, ProductInfo } from '../types';

export function productDocumentKey(retailer: string, productId: string): string {
  return `${retailer}_${productId}_product`;
}

export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}

/** Placeholder product info for callers that only sent review texts. */
export function fallbackProductInfo(
  productId: string,
  reviewCount: number,
): ProductInfo {
  return {
    name: `Product ${productId}`,
    rating: 0,
    review_count: reviewCount,
    original_rating_distribution: {},
  };
}

type BuildDocumentInput = {
  retailer: string;
  productId: string;
  productInfo?: Partial<ProductInfo>;
  run: AnalysisRun;
  now?: Date;
};

export function buildProductDocument(input: BuildDocumentInput): ProductDocument {
  const totalReviews = input.run.analysis.total_reviews;
  const productInfo: ProductInfo = {
    ...fallbackProductInfo(input.productId, totalReviews),
    ...input.productInfo,
  };

  return {
    document_key: productDocumentKey(input.retailer, input.productId),
    product_id: input.productId,
    retailer: input.retailer,
    product_info: {
      ...productInfo,
      review_count: productInfo.review_count || totalReviews,
    },
    analysis: input.run.analysis,
    complaint_reviews: input.run.complaintReviews,
    timestamp: unixSeconds(input.now),
  };
}

export function complaintView(document: ProductDocument) {
  const { analysis } = document;
  return {
    product_info: document.product_info,
    total_reviews: analysis.total_reviews,
    total_complaints: analysis.total_complaints,
    complaint_percentage: analysis.complaint_percentage,
    top_complaints: analysis.top_complaints,
    complaint_categories: analysis.complaint_categories,
    complaint_reviews: document.complaint_reviews,
    ml_rating_distribution: analysis.ml_rating_distribution,
    analysis_method: analysis.analysis_method,
    timestamp: document.timestamp,
  };
}

export function productSummary(document: ProductDocument) {
  const { analysis } = document;
  return {
    product_id: document.product_id,
    retailer: document.retailer,
    product_info: document.product_info,
    analysis_summary: {
      average_rating: analysis.average_rating,
      total_reviews: analysis.total_reviews,
      total_complaints: analysis.total_complaints,
      complaint_percentage: analysis.complaint_percentage,
      analysis_method: analysis.analysis_method,
    },
    timestamp: document.timestamp,
  };
}
