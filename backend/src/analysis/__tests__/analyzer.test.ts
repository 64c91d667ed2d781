import {
  FakeRatingEnsemble,
  FakeZeroShotClassifier,
  quietLogger,
} from '../../__tests__/helpers/fakes';
import { CapabilityProviders, CapabilityHandle } from '../capabilities';
import { ReviewAnalyzer, selectStrategies } from '../analyzer';
import { ZERO_SHOT_LABELS } from '../complaintCategories';

const headphoneReviews = [
  'Great sound, love it!',
  'Battery dies in an hour, terrible',
  'Sound is muffled and connection drops constantly',
];

function analyzerFor(providers: CapabilityProviders) {
  const logger = quietLogger();
  const capabilities = new CapabilityHandle(providers, { loadTimeoutMs: 50, logger });
  const analyzer = new ReviewAnalyzer(capabilities, {
    timeoutMs: 50,
    concurrency: 2,
    logger,
  });
  return { analyzer, capabilities };
}

// Flags battery complaints only; everything else scores low.
const batteryClassifier = () =>
  new FakeZeroShotClassifier(async (text, labels) => {
    const scores: Record<string, number> = {};
    for (const label of labels) scores[label] = 0.05;
    if (text.toLowerCase().includes('battery')) {
      scores[ZERO_SHOT_LABELS.battery_life] = 0.8;
    }
    if (text.includes('boom')) throw new Error('inference failed');
    return scores;
  });

describe('ReviewAnalyzer with keyword analysis', () => {
  it('analyzes a review set', async () => {
    const { analyzer } = analyzerFor({});
    const run = await analyzer.analyzeReviews(headphoneReviews);

    expect(run.status).toBe('SUCCESS');
    expect(run.advancedAnalysisAvailable).toBe(false);
    expect(run.analysis).toMatchObject({
      average_rating: 2.7,
      total_reviews: 3,
      total_complaints: 2,
      complaint_percentage: 66.7,
      ml_rating_distribution: { 1: 1, 2: 1, 3: 0, 4: 0, 5: 1 },
      sentiment_breakdown: { positive: 33.3, negative: 66.7 },
      positive_themes: ['Great sound quality'],
      analysis_method: 'Keyword Analysis',
      advanced_analysis_available: false,
      recommendation_score: 3.6,
    });
    expect(run.analysis.top_complaints.map((entry) => entry.category)).toEqual([
      'sound_quality',
      'battery_life',
      'connectivity',
    ]);
    expect(run.complaintReviews).toEqual([
      {
        text: 'Battery dies in an hour, terrible',
        complaint_type: 'battery_life',
        confidence: 1,
      },
      {
        text: 'Sound is muffled and connection drops constantly',
        complaint_type: 'sound_quality',
        confidence: 1,
      },
    ]);
  });

  it('returns an empty analysis for no reviews', async () => {
    const { analyzer } = analyzerFor({});
    const run = await analyzer.analyzeReviews([]);

    expect(run.status).toBe('EMPTY');
    expect(run.analysis.total_reviews).toBe(0);
    expect(run.analysis.average_rating).toBe(0);
    expect(run.analysis.top_complaints).toEqual([]);
    expect(run.complaintReviews).toEqual([]);
  });

  it('counts blank and missing reviews as neutral', async () => {
    const { analyzer } = analyzerFor({});
    const run = await analyzer.analyzeReviews(['   ', null, 'Great sound, love it!']);

    expect(run.status).toBe('SUCCESS');
    expect(run.analysis.total_reviews).toBe(3);
    expect(run.analysis.ml_rating_distribution).toEqual({ 1: 0, 2: 0, 3: 2, 4: 0, 5: 1 });
    expect(run.analysis.average_rating).toBe(3.7);
    expect(run.analysis.total_complaints).toBe(0);
  });

  it('is repeatable', async () => {
    const { analyzer } = analyzerFor({});
    const first = await analyzer.analyzeReviews(headphoneReviews);
    const second = await analyzer.analyzeReviews(headphoneReviews);
    expect(second).toEqual(first);
  });

  it('describes complaints in a single text', async () => {
    const { analyzer } = analyzerFor({});
    await expect(
      analyzer.analyzeText('Battery dies fast and it feels flimsy'),
    ).resolves.toEqual({
      material_quality: { score: 1, description: ZERO_SHOT_LABELS.material_quality },
      battery_life: { score: 1, description: ZERO_SHOT_LABELS.battery_life },
    });
  });
});

describe('ReviewAnalyzer with model capabilities', () => {
  it('uses the ensemble and the zero-shot classifier', async () => {
    const { analyzer } = analyzerFor({
      ratingEnsemble: new FakeRatingEnsemble(async () => 4),
      zeroShotClassifier: batteryClassifier(),
    });
    const run = await analyzer.analyzeReviews(headphoneReviews);

    expect(run.advancedAnalysisAvailable).toBe(true);
    expect(run.analysis).toMatchObject({
      average_rating: 4,
      total_complaints: 1,
      complaint_percentage: 33.3,
      ml_rating_distribution: { 1: 0, 2: 0, 3: 0, 4: 3, 5: 0 },
      analysis_method: 'ML+Complaint Analysis',
      advanced_analysis_available: true,
    });
    expect(run.complaintReviews).toEqual([
      {
        text: 'Battery dies in an hour, terrible',
        complaint_type: 'battery_life',
        confidence: 0.8,
      },
    ]);
  });

  it('falls back to keyword analysis when the classifier cannot load', async () => {
    const classifier = batteryClassifier();
    classifier.load.mockRejectedValueOnce(new Error('HF_API_TOKEN is not set'));
    const { analyzer } = analyzerFor({ zeroShotClassifier: classifier });

    const run = await analyzer.analyzeReviews(headphoneReviews);

    expect(run.status).toBe('SUCCESS');
    expect(run.analysis.analysis_method).toBe('Keyword Analysis');
    expect(run.analysis.advanced_analysis_available).toBe(false);
    expect(run.analysis.total_complaints).toBe(2);
    expect(classifier.calls).toEqual([]);
  });

  it('keeps going when a single review fails to classify', async () => {
    const { analyzer } = analyzerFor({ zeroShotClassifier: batteryClassifier() });
    const run = await analyzer.analyzeReviews([
      'battery went boom',
      'Battery dies in an hour, terrible',
    ]);

    expect(run.status).toBe('SUCCESS');
    expect(run.analysis.total_reviews).toBe(2);
    expect(run.analysis.total_complaints).toBe(1);
    expect(run.analysis.analysis_method).toBe('ML+Complaint Analysis');
  });

  it('selects strategies from what loaded', async () => {
    const { capabilities } = analyzerFor({
      ratingEnsemble: new FakeRatingEnsemble(async () => 4),
    });
    await capabilities.init();

    const strategies = selectStrategies(capabilities, { timeoutMs: 50 });
    expect(strategies.rating.kind).toBe('ml');
    expect(strategies.complaints.kind).toBe('keyword');
    expect(strategies.advancedAnalysisAvailable).toBe(false);
  });
});
