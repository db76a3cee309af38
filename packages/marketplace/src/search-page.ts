import { load } from 'cheerio';

import { DEFAULT_MARKETPLACE_ORIGIN, type ItemSummary } from '@kaimono/core';

import { collapseWhitespace, nonEmpty, toAbsoluteUrl, type ParseDiagnostic } from './html.js';

export const SEARCH_PAGE_SELECTORS = {
  link: 'a[data-testid="thumbnail-link"]',
  thumbnail: 'div.merItemThumbnail',
  image: 'figure img'
} as const;

// Thumbnail labels read "<name>の画像 <price>".
const LABEL_SEPARATOR = 'の画像';
const UNKNOWN_PRICE = 'N/A';

export interface SearchPageParseOptions {
  readonly origin?: string;
  readonly limit?: number;
}

export interface SearchPageParseResult {
  readonly items: readonly ItemSummary[];
  readonly linkCount: number;
  readonly diagnostics: readonly ParseDiagnostic[];
}

const splitLabel = (label: string): { name: string; price?: string } => {
  const index = label.indexOf(LABEL_SEPARATOR);
  if (index < 0) {
    return { name: collapseWhitespace(label) };
  }
  return {
    name: collapseWhitespace(label.slice(0, index)),
    price: collapseWhitespace(label.slice(index + LABEL_SEPARATOR.length))
  };
};

export const parseSearchResults = (
  html: string,
  options: SearchPageParseOptions = {}
): SearchPageParseResult => {
  const origin = options.origin ?? DEFAULT_MARKETPLACE_ORIGIN;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const $ = load(html);
  const links = $(SEARCH_PAGE_SELECTORS.link).toArray();
  const items: ItemSummary[] = [];
  const diagnostics: ParseDiagnostic[] = [];

  for (const [index, element] of links.entries()) {
    if (items.length >= limit) {
      break;
    }

    const link = $(element);
    const thumbnail = link.find(SEARCH_PAGE_SELECTORS.thumbnail).first();
    const label = nonEmpty(thumbnail.attr('aria-label'));
    if (!thumbnail.length || !label) {
      diagnostics.push({ field: `items[${index}]`, issue: 'missing', detail: 'thumbnail label' });
      continue;
    }

    const { name, price } = splitLabel(label);
    if (price === undefined || price.length === 0) {
      diagnostics.push({ field: `items[${index}].price`, issue: 'missing' });
    }

    const imageNode = thumbnail.find(SEARCH_PAGE_SELECTORS.image).first();
    const image = toAbsoluteUrl(imageNode.attr('src') ?? imageNode.attr('data-src'), origin);
    const url = toAbsoluteUrl(link.attr('href'), origin);
    const itemId = nonEmpty(thumbnail.attr('id'));
    const itemType = nonEmpty(thumbnail.attr('itemtype'));

    if (!url) {
      diagnostics.push({ field: `items[${index}].url`, issue: 'missing' });
    }
    if (!itemId) {
      diagnostics.push({ field: `items[${index}].itemId`, issue: 'missing' });
    }

    items.push({
      name,
      price: price || UNKNOWN_PRICE,
      ...(image ? { image } : {}),
      ...(url ? { url } : {}),
      ...(itemId ? { itemId } : {}),
      ...(itemType ? { itemType } : {})
    });
  }

  return { items, linkCount: links.length, diagnostics };
};
