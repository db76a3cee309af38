import { summaryOnlyDetail, toItemSummary, type ItemDetail, type ItemSummary } from '@kaimono/core';
import type { MarketplaceClient } from '@kaimono/marketplace';

import { mapWithConcurrency } from '../concurrency.js';
import { withDeadline } from '../deadline.js';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface EnrichmentOptions {
  readonly client: MarketplaceClient;
  readonly logger: Logger;
  readonly concurrency: number;
  readonly timeoutMs: number;
}

export const enrichItems = async (
  items: readonly ItemSummary[],
  options: EnrichmentOptions
): Promise<ItemDetail[]> => {
  const { client, logger, concurrency, timeoutMs } = options;

  return mapWithConcurrency(items, concurrency, async (item, index) => {
    try {
      const detail = await withDeadline(`detail fetch for ${item.itemId ?? `item ${index}`}`, timeoutMs, (signal) =>
        client.fetchDetail(item, { signal })
      );
      return { ...detail, ...toItemSummary(item) };
    } catch (error) {
      logger.warn('Item detail unavailable; keeping summary', {
        itemId: item.itemId,
        index,
        error: describeError(error)
      });
      return summaryOnlyDetail(item);
    }
  });
};
