import { CapabilityTimeoutError } from '../../errors';
import { mapInChunks, withTimeout } from '../async';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapInChunks', () => {
  it('keeps input order and limits work in flight', async () => {
    let running = 0;
    let peak = 0;

    const results = await mapInChunks([30, 5, 20, 1, 10], 2, async (ms, index) => {
      running += 1;
      peak = Math.max(peak, running);
      await delay(ms);
      running -= 1;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('handles no items', async () => {
    await expect(mapInChunks([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe('withTimeout', () => {
  it('resolves with the operation result', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'probe')).resolves.toBe('ok');
  });

  it('rejects when the operation is too slow', async () => {
    const slow = delay(200).then(() => 'late');
    const result = withTimeout(slow, 10, 'probe');
    await expect(result).rejects.toBeInstanceOf(CapabilityTimeoutError);
    await expect(result).rejects.toThrow('probe did not answer within 10ms');
    await slow;
  });
});
