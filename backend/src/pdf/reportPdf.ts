import PDFDocument from 'pdfkit';
import { Response } from 'express';
import { displayName } from '../analysis/complaintCategories';
import { COMPLAINT_CATEGORIES, ProductDocument } from '../types';

const SAMPLE_COMPLAINTS = 5;

// Header-safe ASCII: anything else collapses to '-', empty parts use the fallback.
function fileNamePart(value: string, fallback: string): string {
  const safe = value.replace(/[^\w-]+/g, '-').replace(/^-+|-+$/g, '');
  return safe || fallback;
}

export function reportFileName(document: ProductDocument): string {
  const retailer = fileNamePart(document.retailer, 'retailer');
  const productId = fileNamePart(document.product_id, 'product');
  return `${retailer}-${productId}-review-report.pdf`;
}

export function streamReportPdf(res: Response, document: ProductDocument) {
  const doc = new PDFDocument({ margin: 50 });
  const { analysis } = document;

  res.setHeader('Content-Type', 'application/pdf');
  res.setHeader(
    'Content-Disposition',
    `attachment; filename="${reportFileName(document)}"`,
  );

  doc.pipe(res);

  const title = document.product_info.name || `Product ${document.product_id}`;

  doc.fontSize(20).text('Review Analysis Report', { align: 'center' });
  doc.moveDown(0.5);
  doc.fontSize(14).text(title, { align: 'center' });
  doc.fontSize(11).text(`Retailer: ${document.retailer}`, { align: 'center' });
  doc.moveDown();

  doc
    .fontSize(12)
    .text(`Analyzed at: ${new Date(document.timestamp * 1000).toISOString()}`);
  doc.text(`Method: ${analysis.analysis_method}`);
  doc.text(`Reviews analyzed: ${analysis.total_reviews}`);
  doc.text(`Average predicted rating: ${analysis.average_rating}`);
  doc.text(`Recommendation score: ${analysis.recommendation_score}/100`);
  doc.moveDown();

  // Predicted rating distribution
  doc.fontSize(16).text('Predicted rating distribution', { underline: true });
  doc.moveDown(0.5);
  const total = analysis.total_reviews || 1;
  Object.entries(analysis.ml_rating_distribution)
    .sort(([a], [b]) => Number(a) - Number(b))
    .forEach(([stars, count]) => {
      const pct = ((count / total) * 100).toFixed(1);
      doc.fontSize(12).text(`${stars} stars: ${count} reviews (${pct}%)`);
    });
  doc.moveDown();

  doc.fontSize(16).text('Sentiment breakdown', { underline: true });
  doc.moveDown(0.5);
  doc.fontSize(12).text(`Positive: ${analysis.sentiment_breakdown.positive}%`);
  doc.text(`Negative: ${analysis.sentiment_breakdown.negative}%`);
  doc.text(
    `Reviews with complaints: ${analysis.total_complaints} (${analysis.complaint_percentage}%)`,
  );
  doc.moveDown();

  if (analysis.top_complaints.length) {
    doc.fontSize(16).text('Top complaints', { underline: true });
    doc.moveDown(0.5);
    analysis.top_complaints.forEach((complaint, idx) => {
      doc
        .fontSize(13)
        .text(
          `${idx + 1}. ${displayName(complaint.category)} (${complaint.count} mentions)`,
        );
      doc.moveDown(0.25);
      doc.fontSize(12).text(complaint.description);
      doc.moveDown();
    });
  }

  if (analysis.total_complaints) {
    doc.fontSize(16).text('Complaints by category', { underline: true });
    doc.moveDown(0.5);
    COMPLAINT_CATEGORIES.forEach((category) => {
      doc
        .fontSize(12)
        .text(`${displayName(category)}: ${analysis.complaint_categories[category]}`);
    });
    doc.moveDown();
  }

  const samples = document.complaint_reviews.slice(0, SAMPLE_COMPLAINTS);
  if (samples.length) {
    doc.fontSize(16).text('Sample complaints', { underline: true });
    doc.moveDown(0.5);
    samples.forEach((review) => {
      doc
        .fontSize(11)
        .text(
          `[${displayName(review.complaint_type)}, ${review.confidence}] ${review.text}`,
        );
      doc.moveDown(0.25);
    });
    doc.moveDown();
  }

  if (analysis.positive_themes.length) {
    doc.fontSize(16).text('What customers like', { underline: true });
    doc.moveDown(0.5);
    analysis.positive_themes.forEach((theme) => {
      doc.fontSize(12).text(`- ${theme}`);
    });
  }

  doc.end();
}
