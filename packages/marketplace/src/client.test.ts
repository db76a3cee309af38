import { describe, expect, it, vi } from 'vitest';

import { loadItemDetailFixture, loadSearchResultsFixture, loadUnavailableItemFixture } from '@kaimono/fixtures';

import { createMarketplaceClient, type DiagnosticsEvent } from './client.js';
import { MissingItemUrlError, PageStructureError } from './errors.js';
import type { PageRenderer, RenderRequest } from './renderer.js';

const createStaticRenderer = (html: string) => {
  const requests: RenderRequest[] = [];
  const renderer: PageRenderer = {
    name: 'static',
    render: (request) => {
      requests.push(request);
      return Promise.resolve(html);
    }
  };
  return { renderer, requests };
};

describe('createMarketplaceClient', () => {
  it('renders the serialized search URL and parses up to the limit', async () => {
    const { renderer, requests } = createStaticRenderer(loadSearchResultsFixture().html);
    const client = createMarketplaceClient({ renderer, searchWaitMs: 2_500 });

    const items = await client.search({ keyword: 'iPhone 中古', priceMax: 15000 }, 5);

    expect(items).toHaveLength(5);
    expect(requests).toEqual([
      {
        url: 'https://jp.mercari.com/search?keyword=iPhone+%E4%B8%AD%E5%8F%A4&price_max=15000',
        waitForMs: 2_500,
        signal: undefined
      }
    ]);
  });

  it('does not render when the limit is zero', async () => {
    const { renderer, requests } = createStaticRenderer('');
    const client = createMarketplaceClient({ renderer });

    await expect(client.search({ keyword: 'bag' }, 0)).resolves.toEqual([]);
    expect(requests).toHaveLength(0);
  });

  it('surfaces parse diagnostics through the hook', async () => {
    const { renderer } = createStaticRenderer(loadSearchResultsFixture().html);
    const events: DiagnosticsEvent[] = [];
    const client = createMarketplaceClient({ renderer, onDiagnostics: (event) => events.push(event) });

    await client.search({ keyword: 'iPhone' }, 30);

    expect(events).toHaveLength(1);
    expect(events[0].page).toBe('search');
    expect(events[0].diagnostics).toHaveLength(2);
  });

  it('fetches details through the detail renderer', async () => {
    const fixture = loadItemDetailFixture();
    const search = createStaticRenderer('');
    const detail = createStaticRenderer(fixture.html);
    const onDiagnostics = vi.fn();
    const client = createMarketplaceClient({
      renderer: search.renderer,
      detailRenderer: detail.renderer,
      onDiagnostics
    });

    const result = await client.fetchDetail(fixture.summary);

    expect(result).toEqual(fixture.expected.detail);
    expect(detail.requests[0].url).toBe('https://jp.mercari.com/item/m10000000001');
    expect(search.requests).toHaveLength(0);
    expect(onDiagnostics).not.toHaveBeenCalled();
  });

  it('rejects items without a page URL', async () => {
    const { renderer } = createStaticRenderer('');
    const client = createMarketplaceClient({ renderer });

    await expect(client.fetchDetail({ name: 'x', price: '¥1', itemId: 'm1' })).rejects.toBeInstanceOf(
      MissingItemUrlError
    );
  });

  it('rejects pages that match no detail selector', async () => {
    const { renderer } = createStaticRenderer(loadUnavailableItemFixture().html);
    const client = createMarketplaceClient({ renderer });

    await expect(client.fetchDetail(loadItemDetailFixture().summary)).rejects.toBeInstanceOf(PageStructureError);
  });

  it('propagates renderer failures', async () => {
    const renderer: PageRenderer = {
      name: 'broken',
      render: () => Promise.reject(new Error('socket hang up'))
    };
    const client = createMarketplaceClient({ renderer });

    await expect(client.search({ keyword: 'bag' }, 10)).rejects.toThrow('socket hang up');
  });
});
