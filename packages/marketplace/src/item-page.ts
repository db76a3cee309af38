import { load, type CheerioAPI } from 'cheerio';

import {
  DEFAULT_MARKETPLACE_ORIGIN,
  DETAIL_ONLY_FIELDS,
  toItemSummary,
  type ItemDetail,
  type ItemSummary
} from '@kaimono/core';

import { collapseWhitespace, nonEmpty, toAbsoluteUrl, type ParseDiagnostic } from './html.js';

export type DetailField = (typeof DETAIL_ONLY_FIELDS)[number];

export const ITEM_PAGE_SELECTORS: Readonly<Record<DetailField, string>> = {
  description: '[data-testid="description"]',
  condition: '[data-testid="商品の状態"]',
  categories: '[data-testid="item-detail-category"] a',
  images: '[data-testid="carousel"] img',
  sellerName: '[data-testid="seller-link"] [data-testid="seller-name"]',
  sellerRating: '[data-testid="seller-link"] .merRating',
  sellerRatingCount: '[data-testid="seller-link"] [data-testid="rating-count"]'
};

export interface ItemPageParseOptions {
  readonly origin?: string;
}

export interface ItemPageParseResult {
  readonly detail: ItemDetail;
  readonly matchedFields: readonly DetailField[];
  readonly diagnostics: readonly ParseDiagnostic[];
}

const firstText = ($: CheerioAPI, selector: string): string | undefined =>
  nonEmpty(collapseWhitespace($(selector).first().text()));

const readDescription = ($: CheerioAPI): string | undefined => nonEmpty($(ITEM_PAGE_SELECTORS.description).first().text());

const readCategories = ($: CheerioAPI): string[] =>
  $(ITEM_PAGE_SELECTORS.categories)
    .toArray()
    .map((element) => collapseWhitespace($(element).text()))
    .filter((label) => label.length > 0);

const readImages = ($: CheerioAPI, origin: string): string[] => {
  const urls = $(ITEM_PAGE_SELECTORS.images)
    .toArray()
    .map((element) => {
      const node = $(element);
      return toAbsoluteUrl(node.attr('src') ?? node.attr('data-src'), origin);
    })
    .filter((url): url is string => url !== undefined);
  return [...new Set(urls)];
};

export const parseItemDetail = (
  html: string,
  summary: ItemSummary,
  options: ItemPageParseOptions = {}
): ItemPageParseResult => {
  const origin = options.origin ?? DEFAULT_MARKETPLACE_ORIGIN;
  const $ = load(html);

  const description = readDescription($);
  const condition = firstText($, ITEM_PAGE_SELECTORS.condition);
  const categories = readCategories($);
  const images = readImages($, origin);
  const sellerName = firstText($, ITEM_PAGE_SELECTORS.sellerName);
  const sellerRating = nonEmpty($(ITEM_PAGE_SELECTORS.sellerRating).first().attr('aria-label'));
  const sellerRatingCount = firstText($, ITEM_PAGE_SELECTORS.sellerRatingCount);

  const found: Record<DetailField, boolean> = {
    description: description !== undefined,
    condition: condition !== undefined,
    categories: categories.length > 0,
    images: images.length > 0,
    sellerName: sellerName !== undefined,
    sellerRating: sellerRating !== undefined,
    sellerRatingCount: sellerRatingCount !== undefined
  };

  const fields: readonly DetailField[] = DETAIL_ONLY_FIELDS;
  const matchedFields = fields.filter((field) => found[field]);
  const diagnostics: ParseDiagnostic[] = fields
    .filter((field) => !found[field])
    .map((field) => ({ field, issue: 'missing' as const, detail: ITEM_PAGE_SELECTORS[field] }));

  const detail: ItemDetail = {
    ...toItemSummary(summary),
    categories,
    images,
    ...(description !== undefined ? { description } : {}),
    ...(condition !== undefined ? { condition } : {}),
    ...(sellerName !== undefined ? { sellerName } : {}),
    ...(sellerRating !== undefined ? { sellerRating } : {}),
    ...(sellerRatingCount !== undefined ? { sellerRatingCount } : {})
  };

  return { detail, matchedFields, diagnostics };
};
