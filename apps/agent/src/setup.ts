import {
  createFetchRenderer,
  createFirecrawlRenderer,
  createMarketplaceClient,
  type MarketplaceClient,
  type PageRenderer
} from '@kaimono/marketplace';

import { ShoppingAgent } from './agent/orchestrator.js';
import { requireOpenAIApiKey, type AppConfig } from './config.js';
import type { ChatModel } from './llm/chat-model.js';
import { createOpenAIChatModel } from './llm/openai-chat-model.js';
import type { Logger } from './logger.js';
import { loadPrompts, type PromptSet } from './prompts.js';

export const createRenderer = (config: AppConfig): PageRenderer =>
  config.firecrawlApiKey ? createFirecrawlRenderer({ apiKey: config.firecrawlApiKey }) : createFetchRenderer();

export const createMarketplace = (config: AppConfig, logger: Logger): MarketplaceClient => {
  const renderer = createRenderer(config);
  logger.debug('Marketplace renderer selected', { renderer: renderer.name });

  return createMarketplaceClient({
    renderer,
    origin: config.marketplaceOrigin,
    onDiagnostics: (event) =>
      logger.debug('Marketplace page parsed with gaps', {
        page: event.page,
        url: event.url,
        diagnostics: event.diagnostics
      })
  });
};

export interface ShoppingAgentOverrides {
  readonly chatModel?: ChatModel;
  readonly marketplace?: MarketplaceClient;
  readonly prompts?: PromptSet;
}

export const createShoppingAgent = (
  config: AppConfig,
  logger: Logger,
  overrides: ShoppingAgentOverrides = {}
): ShoppingAgent => {
  const chatModel =
    overrides.chatModel ?? createOpenAIChatModel({ apiKey: requireOpenAIApiKey(config), model: config.model });

  return new ShoppingAgent({
    chatModel,
    marketplace: overrides.marketplace ?? createMarketplace(config, logger),
    prompts: overrides.prompts ?? loadPrompts(),
    logger,
    limits: {
      maxRounds: config.maxRounds,
      recommendationCount: config.recommendationCount,
      searchLimit: config.searchLimit,
      detailConcurrency: config.detailConcurrency
    },
    timeouts: config.timeouts
  });
};
