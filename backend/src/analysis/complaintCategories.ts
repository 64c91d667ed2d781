import { COMPLAINT_CATEGORIES, ComplaintCategory } from '../types';
import complaintLexicon from './lexicons/complaints.json';

/** Candidate labels sent to the zero-shot model, one per category. */
export const ZERO_SHOT_LABELS: Record<ComplaintCategory, string> = {
  material_quality: 'Bad material quality, cheap, flimsy, broke, damaged',
  sound_quality: 'Poor sound, muffled, distortion, static, bad audio',
  battery_life: 'Short battery life, battery dies quickly, charging issues',
  comfort_fit: 'Uncomfortable, too tight, too loose, painful to wear',
  connectivity: 'Connection issues, disconnects, lag, pairing problems',
  shipping_delivery: 'Late delivery, damaged packaging, lost item',
  price_value: 'Too expensive, overpriced, not worth the money',
  customer_service: 'Bad customer service, unhelpful, rude, no response',
};

export const CATEGORY_DESCRIPTIONS: Record<ComplaintCategory, string> = {
  material_quality:
    'Issues related to the physical quality and durability of materials',
  sound_quality: 'Issues related to audio performance and sound characteristics',
  battery_life: 'Issues related to battery performance and charging',
  comfort_fit: 'Issues related to physical comfort and fit',
  connectivity: 'Issues related to wireless connectivity and pairing',
  shipping_delivery: 'Issues related to shipping, delivery, and packaging',
  price_value: 'Issues related to pricing and value for money',
  customer_service: 'Issues related to customer service and support',
};

export const COMPLAINT_PHRASES: Record<ComplaintCategory, readonly string[]> =
  complaintLexicon;

const LABEL_TO_CATEGORY = new Map<string, ComplaintCategory>(
  COMPLAINT_CATEGORIES.map((category): [string, ComplaintCategory] => [
    ZERO_SHOT_LABELS[category],
    category,
  ]),
);

export function categoryForLabel(label: string): ComplaintCategory | undefined {
  return LABEL_TO_CATEGORY.get(label);
}

export function displayName(category: ComplaintCategory): string {
  return category
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function emptyCategoryCounts(): Record<ComplaintCategory, number> {
  return {
    material_quality: 0,
    sound_quality: 0,
    battery_life: 0,
    comfort_fit: 0,
    connectivity: 0,
    shipping_delivery: 0,
    price_value: 0,
    customer_service: 0,
  };
}

export function listCategories() {
  const categories = COMPLAINT_CATEGORIES.map((category) => ({
    category,
    description: ZERO_SHOT_LABELS[category],
    display_name: displayName(category),
  }));
  return { categories, total_categories: categories.length };
}
