import { FakeZeroShotClassifier, never, quietLogger } from '../../__tests__/helpers/fakes';
import { ZERO_SHOT_LABELS } from '../complaintCategories';
import {
  KeywordComplaintStrategy,
  MlComplaintStrategy,
  describeComplaints,
  strongestComplaint,
} from '../complaintClassifier';

describe('KeywordComplaintStrategy', () => {
  const strategy = new KeywordComplaintStrategy();

  it('finds a single category', async () => {
    await expect(strategy.classify('Battery dies in an hour, terrible')).resolves.toEqual({
      battery_life: 1,
    });
  });

  it('finds several categories in one review', async () => {
    await expect(
      strategy.classify('Sound is muffled and connection drops constantly'),
    ).resolves.toEqual({ sound_quality: 1, connectivity: 1 });
    await expect(
      strategy.classify('Overpriced and the seller was rude'),
    ).resolves.toEqual({ price_value: 1, customer_service: 1 });
  });

  it('reports nothing for praise', async () => {
    await expect(strategy.classify('Great sound, love it!')).resolves.toEqual({});
  });

  it('does not match a phrase in the middle of a word', async () => {
    await expect(strategy.classify('I was ecstatic')).resolves.toEqual({});
  });

  it('ignores phrases right after a negator', async () => {
    await expect(strategy.classify('No lag at all')).resolves.toEqual({});
    await expect(
      strategy.classify('There is no lag but the battery dies fast'),
    ).resolves.toEqual({ battery_life: 1 });
  });

  it('counts a phrase once the negator is out of reach', async () => {
    await expect(strategy.classify('Not sure why but it lags')).resolves.toEqual({
      connectivity: 1,
    });
  });

  it('reports nothing for empty text or a threshold above 1', async () => {
    await expect(strategy.classify('')).resolves.toEqual({});
    await expect(strategy.classify('Sound is muffled', 1.1)).resolves.toEqual({});
  });
});

describe('MlComplaintStrategy', () => {
  const classifier = new FakeZeroShotClassifier(async () => ({
    [ZERO_SHOT_LABELS.battery_life]: 0.91,
    [ZERO_SHOT_LABELS.sound_quality]: 0.42,
    [ZERO_SHOT_LABELS.comfort_fit]: Number.NaN,
    'not a category': 0.99,
  }));
  const strategy = new MlComplaintStrategy(classifier, {
    timeoutMs: 50,
    logger: quietLogger(),
  });

  it('sends every category label to the classifier', async () => {
    await strategy.classify('Battery dies quickly');
    const last = classifier.calls[classifier.calls.length - 1];
    expect(last.text).toBe('Battery dies quickly');
    expect(last.labels).toEqual(Object.values(ZERO_SHOT_LABELS));
  });

  it('keeps known labels at or above the threshold', async () => {
    await expect(strategy.classify('Battery dies quickly')).resolves.toEqual({
      battery_life: 0.91,
    });
    await expect(strategy.classify('Battery dies quickly', 0.42)).resolves.toEqual({
      battery_life: 0.91,
      sound_quality: 0.42,
    });
  });

  it('treats a failed call as no complaints', async () => {
    const failing = new MlComplaintStrategy(
      new FakeZeroShotClassifier(async () => {
        throw new Error('inference endpoint returned 503');
      }),
      { timeoutMs: 50, logger: quietLogger() },
    );
    await expect(failing.classify('Sound is muffled')).resolves.toEqual({});
  });

  it('treats a call that does not answer in time as no complaints', async () => {
    const slow = new MlComplaintStrategy(
      new FakeZeroShotClassifier(() => never<Record<string, number>>()),
      { timeoutMs: 20, logger: quietLogger() },
    );
    await expect(slow.classify('Sound is muffled')).resolves.toEqual({});
  });
});

describe('describeComplaints', () => {
  it('attaches the category label as description', () => {
    expect(describeComplaints({ connectivity: 0.8 })).toEqual({
      connectivity: { score: 0.8, description: ZERO_SHOT_LABELS.connectivity },
    });
  });
});

describe('strongestComplaint', () => {
  it('picks the highest score', () => {
    expect(strongestComplaint({ sound_quality: 0.7, connectivity: 0.9 })).toEqual([
      'connectivity',
      0.9,
    ]);
  });

  it('breaks ties by category order', () => {
    expect(strongestComplaint({ connectivity: 1, sound_quality: 1 })).toEqual([
      'sound_quality',
      1,
    ]);
  });

  it('returns null without complaints', () => {
    expect(strongestComplaint({})).toBeNull();
  });
});
