import { describe, expect, it } from 'vitest';

import { ItemDetailSchema, ItemSummarySchema } from '@kaimono/core';

import {
  getFixturePath,
  loadItemDetailFixture,
  loadSearchResultsFixture,
  loadUnavailableItemFixture
} from './index.js';

describe('marketplace fixture loader', () => {
  it('loads the search results page with its expected summaries', () => {
    const first = loadSearchResultsFixture();
    const second = loadSearchResultsFixture();

    expect(first.id).toBe('search-results');
    expect(first.html).toContain('data-testid="thumbnail-link"');
    expect(first.expected.summaries).toHaveLength(7);
    expect(first.expected.summaries).not.toBe(second.expected.summaries);
    expect(first.expected.summaries[0]).not.toBe(second.expected.summaries[0]);
  });

  it('exposes schema-valid expected records', () => {
    const search = loadSearchResultsFixture();
    const detail = loadItemDetailFixture();

    for (const summary of search.expected.summaries) {
      expect(() => ItemSummarySchema.parse(summary)).not.toThrow();
    }
    expect(() => ItemDetailSchema.parse(detail.expected.detail)).not.toThrow();
    expect(detail.summary.itemId).toBe('m10000000001');
    expect(detail.expected.detail.sellerName).toBe('テスト出品者');
  });

  it('loads the unavailable item page', () => {
    expect(loadUnavailableItemFixture().html).toContain('削除されています');
  });

  it('returns file system paths for fixtures', () => {
    expect(getFixturePath('search-results')).toMatch(/fixtures\/search-results\.html$/);
    expect(loadItemDetailFixture().path).toMatch(/fixtures\/item-detail\.html$/);
  });
});
