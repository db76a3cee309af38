export { createMarketplaceClient } from './client.js';
export type { DiagnosticsEvent, MarketplaceClient, MarketplaceClientOptions, RequestOptions } from './client.js';
export { MissingItemUrlError, PageStructureError, RenderError } from './errors.js';
export { collapseWhitespace, toAbsoluteUrl } from './html.js';
export type { ParseDiagnostic } from './html.js';
export { ITEM_PAGE_SELECTORS, parseItemDetail } from './item-page.js';
export type { DetailField, ItemPageParseOptions, ItemPageParseResult } from './item-page.js';
export { createFetchRenderer, createFirecrawlRenderer } from './renderer.js';
export type { FetchRendererOptions, FirecrawlRendererOptions, PageRenderer, RenderRequest } from './renderer.js';
export { parseSearchResults, SEARCH_PAGE_SELECTORS } from './search-page.js';
export type { SearchPageParseOptions, SearchPageParseResult } from './search-page.js';
