import { describe, expect, it } from 'vitest';

import { loadItemDetailFixture, loadUnavailableItemFixture } from '@kaimono/fixtures';

import { parseItemDetail } from './item-page.js';

describe('parseItemDetail', () => {
  it('merges page details into the summary record', () => {
    const fixture = loadItemDetailFixture();

    const result = parseItemDetail(fixture.html, fixture.summary);

    expect(result.detail).toEqual(fixture.expected.detail);
    expect(result.diagnostics).toEqual([]);
    expect(result.matchedFields).toHaveLength(7);
  });

  it('keeps the summary fields even when the page disagrees', () => {
    const fixture = loadItemDetailFixture();
    const summary = { ...fixture.summary, name: '検索結果の名前', price: '¥13,000' };

    const result = parseItemDetail(fixture.html, summary);

    expect(result.detail.name).toBe('検索結果の名前');
    expect(result.detail.price).toBe('¥13,000');
  });

  it('reports every missing field on an unrelated page', () => {
    const fixture = loadItemDetailFixture();

    const result = parseItemDetail(loadUnavailableItemFixture().html, fixture.summary);

    expect(result.matchedFields).toEqual([]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.field)).toEqual([
      'description',
      'condition',
      'categories',
      'images',
      'sellerName',
      'sellerRating',
      'sellerRatingCount'
    ]);
    expect(result.detail).toEqual({ ...fixture.summary, categories: [], images: [] });
  });

  it('treats a seller block without rating as partially matched', () => {
    const html = `
      <a data-testid="seller-link"><p data-testid="seller-name"> 出品者B </p></a>
      <span data-testid="商品の状態">新品、未使用</span>`;

    const result = parseItemDetail(html, { name: 'マグカップ', price: '¥800', itemId: 'm7' });

    expect(result.matchedFields).toEqual(['condition', 'sellerName']);
    expect(result.detail).toEqual({
      name: 'マグカップ',
      price: '¥800',
      itemId: 'm7',
      categories: [],
      images: [],
      condition: '新品、未使用',
      sellerName: '出品者B'
    });
  });
});
