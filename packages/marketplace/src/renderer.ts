import { z } from 'zod';

import { RenderError } from './errors.js';

export interface RenderRequest {
  readonly url: string;
  readonly waitForMs?: number;
  readonly signal?: AbortSignal;
}

export interface PageRenderer {
  readonly name: string;
  render(request: RenderRequest): Promise<string>;
}

type FetchLike = typeof fetch;

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export interface FetchRendererOptions {
  readonly fetch?: FetchLike;
  readonly userAgent?: string;
}

export const createFetchRenderer = (options: FetchRendererOptions = {}): PageRenderer => {
  const fetchImpl = options.fetch ?? fetch;

  return {
    name: 'fetch',
    async render(request: RenderRequest): Promise<string> {
      let response: Response;
      try {
        response = await fetchImpl(request.url, {
          headers: {
            accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.1',
            'accept-language': 'ja,en;q=0.8',
            ...(options.userAgent ? { 'user-agent': options.userAgent } : {})
          },
          signal: request.signal
        });
      } catch (error) {
        throw new RenderError(request.url, describeError(error));
      }

      if (!response.ok) {
        throw new RenderError(request.url, `${response.status} ${response.statusText}`);
      }
      return response.text();
    }
  };
};

const FirecrawlResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      rawHtml: z.string().optional(),
      html: z.string().optional(),
      metadata: z
        .object({
          error: z.string().optional()
        })
        .passthrough()
        .optional()
    })
    .optional(),
  error: z.string().optional()
});

const FIRECRAWL_API_URL = 'https://api.firecrawl.dev/v2/scrape';

export interface FirecrawlRendererOptions {
  readonly apiKey: string;
  readonly endpoint?: string;
  readonly fetch?: FetchLike;
}

export const createFirecrawlRenderer = (options: FirecrawlRendererOptions): PageRenderer => {
  if (!options.apiKey.trim()) {
    throw new Error('Firecrawl API key must not be empty.');
  }
  const fetchImpl = options.fetch ?? fetch;
  const endpoint = options.endpoint ?? FIRECRAWL_API_URL;

  return {
    name: 'firecrawl',
    async render(request: RenderRequest): Promise<string> {
      let response: Response;
      try {
        response = await fetchImpl(endpoint, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${options.apiKey}`,
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({
            url: request.url,
            onlyMainContent: false,
            formats: ['rawHtml'],
            ...(request.waitForMs ? { waitFor: request.waitForMs } : {})
          }),
          signal: request.signal
        });
      } catch (error) {
        throw new RenderError(request.url, describeError(error));
      }

      const payload = FirecrawlResponseSchema.safeParse(await response.json().catch(() => undefined));
      if (!payload.success) {
        throw new RenderError(request.url, `unexpected Firecrawl response (${response.status} ${response.statusText})`);
      }

      const html = payload.data.data?.rawHtml ?? payload.data.data?.html;
      if (!response.ok || !payload.data.success || html === undefined) {
        const reason =
          payload.data.data?.metadata?.error ?? payload.data.error ?? `${response.status} ${response.statusText}`;
        throw new RenderError(request.url, `Firecrawl scrape failed: ${reason}`);
      }

      return html;
    }
  };
};
