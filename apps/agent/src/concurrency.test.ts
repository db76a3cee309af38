import { describe, expect, it } from 'vitest';

import { mapWithConcurrency } from './concurrency.js';

const tick = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order regardless of completion order', async () => {
    const delays = [30, 5, 20, 1];

    const results = await mapWithConcurrency(delays, 4, async (delay, index) => {
      await tick(delay);
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1']);
  });

  it('never runs more tasks than the limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(2);
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it('returns an empty list for empty input', async () => {
    await expect(mapWithConcurrency([], 5, () => Promise.resolve(1))).resolves.toEqual([]);
  });

  it('rejects invalid limits', async () => {
    await expect(mapWithConcurrency([1], 0, () => Promise.resolve(1))).rejects.toThrow(RangeError);
  });
});
