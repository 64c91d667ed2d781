import { CapabilityTimeoutError } from '../../errors';
import { FakeRatingEnsemble, never, quietLogger } from '../../__tests__/helpers/fakes';
import {
  KeywordRatingStrategy,
  MlRatingStrategy,
  keywordScore,
  predictRatingByKeywords,
  scoreToRating,
  toStarRating,
} from '../ratingPredictor';

describe('keyword rating', () => {
  it.each<[string, number]>([
    ['Great sound, love it!', 5],
    ['Battery dies in an hour, terrible', 1],
    ['Sound is muffled and connection drops constantly', 2],
    ['Good headphones', 4],
    ['It arrived on Tuesday', 3],
  ])('rates %j as %i', (text, expected) => {
    expect(predictRatingByKeywords(text)).toBe(expected);
  });

  it('flips the first sentiment word after a negator', () => {
    expect(keywordScore('not bad at all')).toBe(1);
    expect(keywordScore("I don't love it")).toBe(-1);
  });

  it('only looks a few words past the negator', () => {
    expect(keywordScore('not the best')).toBe(-1);
    expect(keywordScore('not sure why but great')).toBe(1);
  });

  it('maps scores onto stars', () => {
    expect([7, 2, 1, 0, -1, -2, -9].map(scoreToRating)).toEqual([5, 5, 4, 3, 2, 1, 1]);
  });

  it('exposes a keyword strategy', async () => {
    const strategy = new KeywordRatingStrategy();
    expect(strategy.kind).toBe('keyword');
    await expect(strategy.predict('awful and useless')).resolves.toBe(1);
  });
});

describe('toStarRating', () => {
  it('accepts whole numbers from 1 to 5 only', () => {
    expect(toStarRating(4)).toBe(4);
    expect(toStarRating(4.5)).toBeNull();
    expect(toStarRating('4')).toBeNull();
    expect(toStarRating(0)).toBeNull();
  });
});

describe('MlRatingStrategy', () => {
  const options = { timeoutMs: 50, logger: quietLogger() };

  it('uses the ensemble answer', async () => {
    const ensemble = new FakeRatingEnsemble(async () => 2);
    const strategy = new MlRatingStrategy(ensemble, options);
    await expect(strategy.predict('Great sound, love it!')).resolves.toBe(2);
  });

  it('falls back to keywords when the ensemble fails', async () => {
    const ensemble = new FakeRatingEnsemble(async () => {
      throw new Error('model crashed');
    });
    const strategy = new MlRatingStrategy(ensemble, options);
    await expect(strategy.predict('Great sound, love it!')).resolves.toBe(5);
  });

  it('falls back when the ensemble answers out of range', async () => {
    const ensemble = new FakeRatingEnsemble(async () => 9);
    const strategy = new MlRatingStrategy(ensemble, options);
    await expect(strategy.predict('Battery dies in an hour, terrible')).resolves.toBe(1);
  });

  it('falls back when the ensemble does not answer in time', async () => {
    const ensemble = new FakeRatingEnsemble(() => never<number>());
    const logger = quietLogger();
    const warn = jest.spyOn(logger, 'warn');
    const strategy = new MlRatingStrategy(ensemble, { timeoutMs: 20, logger });

    await expect(strategy.predict('It arrived on Tuesday')).resolves.toBe(3);
    expect(warn).toHaveBeenCalledWith(
      `fake-rating failed for a single review: ${new CapabilityTimeoutError('fake-rating', 20).message}; using keyword rating`,
    );
  });
});
