import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ItemDetailSchema, ItemSummarySchema, type ItemDetail, type ItemSummary } from '@kaimono/core';

const MARKETPLACE_FIXTURE_IDS = ['search-results', 'item-detail', 'item-detail-unavailable'] as const;

export type MarketplaceFixtureId = (typeof MARKETPLACE_FIXTURE_IDS)[number];

export interface HtmlFixture<TId extends MarketplaceFixtureId = MarketplaceFixtureId> {
  readonly id: TId;
  readonly path: string;
  readonly html: string;
}

export interface SearchResultsFixture extends HtmlFixture<'search-results'> {
  readonly expected: {
    readonly summaries: readonly ItemSummary[];
    readonly skippedLinks: number;
  };
}

export interface ItemDetailFixture extends HtmlFixture<'item-detail'> {
  readonly summary: ItemSummary;
  readonly expected: {
    readonly detail: ItemDetail;
  };
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');

const FIXTURE_ORIGIN = 'https://jp.mercari.com';

const thumbnail = (itemId: string): string => `https://static.example.test/thumb/item/${itemId}_1.jpg`;

const SEARCH_RESULTS_EXPECTED: readonly ItemSummary[] = [
  {
    name: 'iPhone 12 64GB ブラック SIMフリー',
    price: '¥14,800',
    image: thumbnail('m10000000001'),
    url: `${FIXTURE_ORIGIN}/item/m10000000001`,
    itemId: 'm10000000001',
    itemType: 'ITEM_TYPE_MERCARI'
  },
  {
    name: 'iPhone SE 第2世代 128GB ホワイト',
    price: '¥12,500',
    image: thumbnail('m10000000002'),
    url: `${FIXTURE_ORIGIN}/item/m10000000002`,
    itemId: 'm10000000002',
    itemType: 'ITEM_TYPE_MERCARI'
  },
  {
    name: 'iPhone 11 64GB パープル',
    price: '¥14,000',
    image: thumbnail('m10000000003'),
    url: `${FIXTURE_ORIGIN}/item/m10000000003`,
    itemId: 'm10000000003',
    itemType: 'ITEM_TYPE_MERCARI'
  },
  {
    name: 'iPhone XR 64GB レッド',
    price: '¥9,980',
    image: thumbnail('m10000000004'),
    url: `${FIXTURE_ORIGIN}/item/m10000000004`,
    itemId: 'm10000000004',
    itemType: 'ITEM_TYPE_MERCARI'
  },
  {
    name: 'iPhone 8 64GB ゴールド',
    price: '¥6,500',
    image: thumbnail('m10000000005'),
    url: `${FIXTURE_ORIGIN}/item/m10000000005`,
    itemId: 'm10000000005',
    itemType: 'ITEM_TYPE_MERCARI'
  },
  {
    name: 'iPhone 12 mini 64GB ブルー',
    price: '¥15,000',
    image: 'https://static.example.test/thumb/shops/2Ab3Cd4Ef5Gh6Ij7Kl8.jpg',
    url: `${FIXTURE_ORIGIN}/shops/product/2Ab3Cd4Ef5Gh6Ij7Kl8`,
    itemId: '2Ab3Cd4Ef5Gh6Ij7Kl8',
    itemType: 'ITEM_TYPE_BEYOND'
  },
  {
    name: 'iPhone ケース まとめ売り',
    price: 'N/A',
    url: `${FIXTURE_ORIGIN}/item/m10000000007`,
    itemId: 'm10000000007',
    itemType: 'ITEM_TYPE_MERCARI'
  }
].map((summary) => ItemSummarySchema.parse(summary));

const ITEM_DETAIL_SUMMARY: ItemSummary = SEARCH_RESULTS_EXPECTED[0];

const ITEM_DETAIL_EXPECTED: ItemDetail = ItemDetailSchema.parse({
  ...ITEM_DETAIL_SUMMARY,
  description: 'バッテリー最大容量 86% です。\n画面に目立った傷はありません。',
  condition: '目立った傷や汚れなし',
  categories: ['スマホ・タブレット・パソコン', 'スマートフォン/携帯電話', 'スマートフォン本体'],
  images: [
    'https://static.example.test/item/detail/m10000000001_1.jpg',
    'https://static.example.test/item/detail/m10000000001_2.jpg',
    `${FIXTURE_ORIGIN}/item/detail/m10000000001_3.jpg`
  ],
  sellerName: 'テスト出品者',
  sellerRating: '4.8',
  sellerRatingCount: '152'
});

const htmlCache = new Map<MarketplaceFixtureId, HtmlFixture>();

const readHtmlFixture = <TId extends MarketplaceFixtureId>(id: TId): HtmlFixture<TId> => {
  const cached = htmlCache.get(id);
  const path = join(FIXTURE_ROOT, `${id}.html`);
  if (cached) {
    return { id, path, html: cached.html };
  }

  const html = readFileSync(path, 'utf-8');
  htmlCache.set(id, Object.freeze({ id, path, html }));
  return { id, path, html };
};

export const loadSearchResultsFixture = (): SearchResultsFixture => ({
  ...readHtmlFixture('search-results'),
  expected: {
    summaries: SEARCH_RESULTS_EXPECTED.map((summary) => ({ ...summary })),
    skippedLinks: 1
  }
});

export const loadItemDetailFixture = (): ItemDetailFixture => ({
  ...readHtmlFixture('item-detail'),
  summary: { ...ITEM_DETAIL_SUMMARY },
  expected: {
    detail: ItemDetailSchema.parse(ITEM_DETAIL_EXPECTED)
  }
});

export const loadUnavailableItemFixture = (): HtmlFixture<'item-detail-unavailable'> =>
  readHtmlFixture('item-detail-unavailable');

export const getFixturePath = (id: MarketplaceFixtureId): string => join(FIXTURE_ROOT, `${id}.html`);
