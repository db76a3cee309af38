import type { ItemDetail, ItemSummary, SearchFilter } from '@kaimono/core';
import type { MarketplaceClient, RequestOptions } from '@kaimono/marketplace';

import type { ChatModel, CompletionRequest, ModelReply, ToolRoundRequest } from '../../llm/chat-model.js';
import type { Logger } from '../../logger.js';
import type { PromptSet } from '../../prompts.js';

export interface LogEntry {
  readonly level: 'debug' | 'info' | 'warn' | 'error';
  readonly message: string;
  readonly args?: Record<string, unknown>;
}

export const createRecordingLogger = (): Logger & { readonly entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message, args) => entries.push({ level: 'debug', message, args }),
    info: (message, args) => entries.push({ level: 'info', message, args }),
    warn: (message, args) => entries.push({ level: 'warn', message, args }),
    error: (message, args) => entries.push({ level: 'error', message, args })
  };
};

export const testPrompts: PromptSet = {
  version: 'test',
  assistant: 'assistant prompt',
  selector: (count) => `pick ${count}`,
  reminder: (userInput) => `reply in the language of: ${userInput}`
};

export interface ScriptedChatModel extends ChatModel {
  readonly respondRequests: ToolRoundRequest[];
  readonly completeRequests: CompletionRequest[];
}

export const createScriptedChatModel = (script: {
  readonly replies?: ReadonlyArray<ModelReply | Error | ((request: ToolRoundRequest) => Promise<ModelReply>)>;
  readonly completions?: ReadonlyArray<string | Error | ((request: CompletionRequest) => Promise<string>)>;
}): ScriptedChatModel => {
  const replies = [...(script.replies ?? [])];
  const completions = [...(script.completions ?? [])];
  const respondRequests: ToolRoundRequest[] = [];
  const completeRequests: CompletionRequest[] = [];

  return {
    respondRequests,
    completeRequests,
    async respond(request) {
      respondRequests.push({ ...request, conversation: [...request.conversation] });
      const next = replies.shift();
      if (next === undefined) {
        throw new Error('No scripted reply left');
      }
      if (next instanceof Error) {
        throw next;
      }
      return typeof next === 'function' ? next(request) : next;
    },
    async complete(request) {
      completeRequests.push({ ...request, conversation: [...request.conversation] });
      const next = completions.shift();
      if (next === undefined) {
        throw new Error('No scripted completion left');
      }
      if (next instanceof Error) {
        throw next;
      }
      return typeof next === 'function' ? next(request) : next;
    }
  };
};

export interface FakeMarketplace extends MarketplaceClient {
  readonly searches: SearchFilter[];
  readonly detailRequests: string[];
}

export interface FakeMarketplaceOptions {
  readonly results?: (filter: SearchFilter) => Promise<readonly ItemSummary[]>;
  readonly details?: (item: ItemSummary, options?: RequestOptions) => Promise<ItemDetail>;
}

export const createFakeMarketplace = (options: FakeMarketplaceOptions = {}): FakeMarketplace => {
  const searches: SearchFilter[] = [];
  const detailRequests: string[] = [];
  return {
    searches,
    detailRequests,
    async search(filter, limit) {
      searches.push(filter);
      const items = options.results ? await options.results(filter) : [];
      return items.slice(0, limit);
    },
    async fetchDetail(item, requestOptions) {
      detailRequests.push(item.itemId ?? item.name);
      if (!options.details) {
        throw new Error(`No detail page for ${item.itemId ?? item.name}`);
      }
      return options.details(item, requestOptions);
    }
  };
};

export const summary = (itemId: string, overrides: Partial<ItemSummary> = {}): ItemSummary => ({
  name: `Listing ${itemId}`,
  price: '¥1,000',
  url: `https://jp.mercari.com/item/${itemId}`,
  itemId,
  itemType: 'ITEM_TYPE_MERCARI',
  ...overrides
});

export const detailFor = (item: ItemSummary): ItemDetail => ({
  ...item,
  description: `Description of ${item.name}`,
  condition: '目立った傷や汚れなし',
  categories: ['家電・スマホ・カメラ'],
  images: [],
  sellerName: 'seller',
  sellerRating: '5',
  sellerRatingCount: '10'
});
