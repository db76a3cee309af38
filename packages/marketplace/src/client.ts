import {
  buildSearchUrl,
  DEFAULT_MARKETPLACE_ORIGIN,
  type ItemDetail,
  type ItemSummary,
  type SearchFilter
} from '@kaimono/core';

import { MissingItemUrlError, PageStructureError } from './errors.js';
import type { ParseDiagnostic } from './html.js';
import { parseItemDetail } from './item-page.js';
import type { PageRenderer } from './renderer.js';
import { parseSearchResults } from './search-page.js';

export interface RequestOptions {
  readonly signal?: AbortSignal;
}

export interface MarketplaceClient {
  search(filter: SearchFilter, limit: number, options?: RequestOptions): Promise<readonly ItemSummary[]>;
  fetchDetail(item: ItemSummary, options?: RequestOptions): Promise<ItemDetail>;
}

export interface DiagnosticsEvent {
  readonly page: 'search' | 'item';
  readonly url: string;
  readonly diagnostics: readonly ParseDiagnostic[];
}

export interface MarketplaceClientOptions {
  readonly renderer: PageRenderer;
  readonly detailRenderer?: PageRenderer;
  readonly origin?: string;
  readonly searchWaitMs?: number;
  readonly onDiagnostics?: (event: DiagnosticsEvent) => void;
}

const DEFAULT_SEARCH_WAIT_MS = 10_000;

export const createMarketplaceClient = (options: MarketplaceClientOptions): MarketplaceClient => {
  const origin = options.origin ?? DEFAULT_MARKETPLACE_ORIGIN;
  const searchRenderer = options.renderer;
  const detailRenderer = options.detailRenderer ?? options.renderer;
  const searchWaitMs = options.searchWaitMs ?? DEFAULT_SEARCH_WAIT_MS;

  const report = (event: DiagnosticsEvent) => {
    if (event.diagnostics.length > 0) {
      options.onDiagnostics?.(event);
    }
  };

  return {
    async search(filter, limit, requestOptions = {}) {
      if (limit < 1) {
        return [];
      }

      const url = buildSearchUrl(filter, origin);
      const html = await searchRenderer.render({ url, waitForMs: searchWaitMs, signal: requestOptions.signal });
      const { items, diagnostics } = parseSearchResults(html, { origin, limit });
      report({ page: 'search', url, diagnostics });
      return items;
    },

    async fetchDetail(item, requestOptions = {}) {
      if (!item.url) {
        throw new MissingItemUrlError(item.itemId);
      }

      const html = await detailRenderer.render({ url: item.url, signal: requestOptions.signal });
      const { detail, matchedFields, diagnostics } = parseItemDetail(html, item, { origin });
      report({ page: 'item', url: item.url, diagnostics });

      if (matchedFields.length === 0) {
        throw new PageStructureError(item.url);
      }
      return detail;
    }
  };
};
