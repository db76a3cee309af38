import { describe, expect, it } from 'vitest';

import { createFakeMarketplace, createRecordingLogger, detailFor, summary } from './__fixtures__/fakes.js';
import { enrichItems } from './enrichment.js';

describe('enrichItems', () => {
  it('returns details in input order', async () => {
    const items = [summary('m1'), summary('m2'), summary('m3')];
    const delays: Record<string, number> = { m1: 15, m2: 1, m3: 5 };
    const client = createFakeMarketplace({
      details: async (item) => {
        await new Promise((resolve) => setTimeout(resolve, delays[item.itemId ?? ''] ?? 0));
        return detailFor(item);
      }
    });

    const details = await enrichItems(items, {
      client,
      logger: createRecordingLogger(),
      concurrency: 5,
      timeoutMs: 1_000
    });

    expect(details.map((detail) => detail.itemId)).toEqual(['m1', 'm2', 'm3']);
    expect(details[0].description).toBe('Description of Listing m1');
  });

  it('falls back to the summary for items whose page fails', async () => {
    const items = [summary('m1'), summary('m2')];
    const logger = createRecordingLogger();
    const client = createFakeMarketplace({
      details: async (item) => {
        if (item.itemId === 'm2') {
          throw new Error('page structure changed');
        }
        return detailFor(item);
      }
    });

    const details = await enrichItems(items, { client, logger, concurrency: 5, timeoutMs: 1_000 });

    expect(details[1]).toEqual(summary('m2'));
    expect(details[0].sellerName).toBe('seller');
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'Item detail unavailable; keeping summary',
      args: { itemId: 'm2', index: 1, error: 'page structure changed' }
    });
  });

  it('falls back when a page exceeds the deadline', async () => {
    const client = createFakeMarketplace({
      details: () => new Promise<never>(() => undefined)
    });

    const details = await enrichItems([summary('m1')], {
      client,
      logger: createRecordingLogger(),
      concurrency: 1,
      timeoutMs: 10
    });

    expect(details).toEqual([summary('m1')]);
  });

  it('keeps the summary identity fields when the detail disagrees', async () => {
    const item = summary('m1', { price: '¥2,000' });
    const client = createFakeMarketplace({
      details: async (input) => ({ ...detailFor(input), price: '¥9,999', name: 'Renamed' })
    });

    const [detail] = await enrichItems([item], {
      client,
      logger: createRecordingLogger(),
      concurrency: 1,
      timeoutMs: 1_000
    });

    expect(detail.price).toBe('¥2,000');
    expect(detail.name).toBe('Listing m1');
  });

  it('limits concurrent page fetches', async () => {
    let active = 0;
    let peak = 0;
    const client = createFakeMarketplace({
      details: async (item) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active -= 1;
        return detailFor(item);
      }
    });

    await enrichItems(
      ['m1', 'm2', 'm3', 'm4', 'm5', 'm6', 'm7'].map((id) => summary(id)),
      { client, logger: createRecordingLogger(), concurrency: 5, timeoutMs: 1_000 }
    );

    expect(peak).toBe(5);
  });
});
