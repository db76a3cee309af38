import { randomUUID } from 'node:crypto';

import {
  decodeSearchArguments,
  type ItemDetail,
  type ItemSummary,
  type RecommendationResult,
  type SearchFilter
} from '@kaimono/core';
import type { MarketplaceClient } from '@kaimono/marketplace';

import { DEFAULT_TIMEOUTS, type AgentTimeouts } from '../config.js';
import { withDeadline } from '../deadline.js';
import { describeError } from '../errors.js';
import type { ChatModel, ConversationTurn, FunctionCallReply, ModelReply } from '../llm/chat-model.js';
import type { Logger } from '../logger.js';
import type { PromptSet } from '../prompts.js';
import { enrichItems } from './enrichment.js';
import { selectRecommendations } from './selector.js';
import { AGENT_TOOLS, SEARCH_TOOL_NAME } from './tools.js';

export const INCOMPLETE_MESSAGE =
  'Sorry, I could not finish looking for products this time. Please try again, perhaps with a more specific request.';

export const EMPTY_REQUEST_MESSAGE = 'What are you looking for? Tell me the item and any budget or condition you have in mind.';

export interface AgentLimits {
  readonly maxRounds: number;
  readonly recommendationCount: number;
  readonly searchLimit: number;
  readonly detailConcurrency: number;
}

export const DEFAULT_LIMITS: AgentLimits = {
  maxRounds: 6,
  recommendationCount: 3,
  searchLimit: 30,
  detailConcurrency: 5
};

export interface ShoppingAgentOptions {
  readonly chatModel: ChatModel;
  readonly marketplace: MarketplaceClient;
  readonly prompts: PromptSet;
  readonly logger: Logger;
  readonly limits?: Partial<AgentLimits>;
  readonly timeouts?: Partial<AgentTimeouts>;
}

export interface RecommendationAgent {
  respond(userInput: string): Promise<RecommendationResult>;
}

// Per-call state. Nothing here outlives one `respond` call.
interface RequestContext {
  readonly requestId: string;
  readonly userInput: string;
  readonly conversation: ConversationTurn[];
  products: readonly ItemDetail[];
}

interface ToolResult {
  readonly output: Record<string, unknown>;
  readonly products: readonly ItemDetail[];
}

type ToolHandler = (call: FunctionCallReply, context: RequestContext) => Promise<ToolResult>;

const emptyResult = (output: Record<string, unknown>): ToolResult => ({ output, products: [] });

export class ShoppingAgent implements RecommendationAgent {
  private readonly chatModel: ChatModel;
  private readonly marketplace: MarketplaceClient;
  private readonly prompts: PromptSet;
  private readonly logger: Logger;
  private readonly limits: AgentLimits;
  private readonly timeouts: AgentTimeouts;
  private readonly toolHandlers: ReadonlyMap<string, ToolHandler>;

  constructor(options: ShoppingAgentOptions) {
    this.chatModel = options.chatModel;
    this.marketplace = options.marketplace;
    this.prompts = options.prompts;
    this.logger = options.logger;
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };

    for (const [name, value] of Object.entries(this.limits)) {
      if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`Agent limit ${name} must be a positive integer, received ${value}.`);
      }
    }

    this.toolHandlers = new Map<string, ToolHandler>([
      [SEARCH_TOOL_NAME, (call, context) => this.runSearch(call, context)]
    ]);
  }

  async respond(userInput: string): Promise<RecommendationResult> {
    const trimmed = userInput.trim();
    if (!trimmed) {
      this.logger.info('Empty shopping request; asking for details');
      return { message: EMPTY_REQUEST_MESSAGE, products: [] };
    }

    const context: RequestContext = {
      requestId: randomUUID(),
      userInput: trimmed,
      conversation: [{ kind: 'user', content: trimmed }],
      products: []
    };
    this.logger.info('Shopping request received', { requestId: context.requestId });

    for (let round = 1; round <= this.limits.maxRounds; round += 1) {
      let reply: ModelReply;
      try {
        reply = await withDeadline(`chat round ${round}`, this.timeouts.llmMs, (signal) =>
          this.chatModel.respond({
            system: this.prompts.assistant,
            conversation: context.conversation,
            reminder: this.prompts.reminder(context.userInput),
            tools: AGENT_TOOLS,
            signal
          })
        );
      } catch (error) {
        this.logger.error('Language model call failed', {
          requestId: context.requestId,
          round,
          error: describeError(error)
        });
        return this.finish(context, INCOMPLETE_MESSAGE);
      }

      if (reply.type === 'final_message') {
        this.logger.info('Shopping request answered', {
          requestId: context.requestId,
          rounds: round,
          products: context.products.length
        });
        return this.finish(context, reply.text.trim() ? reply.text : INCOMPLETE_MESSAGE);
      }

      const handler = this.toolHandlers.get(reply.name);
      if (!handler) {
        this.logger.warn('Model requested an unknown tool', { requestId: context.requestId, tool: reply.name });
        return this.finish(context, INCOMPLETE_MESSAGE);
      }

      this.logger.debug('Running tool', { requestId: context.requestId, round, tool: reply.name });
      const result = await handler(reply, context);
      context.products = result.products;
      context.conversation.push(
        { kind: 'tool-call', callId: reply.callId, name: reply.name, arguments: reply.arguments },
        { kind: 'tool-output', callId: reply.callId, name: reply.name, output: JSON.stringify(result.output) }
      );
    }

    this.logger.warn('Round limit reached without a final answer', {
      requestId: context.requestId,
      maxRounds: this.limits.maxRounds
    });
    return this.finish(context, INCOMPLETE_MESSAGE);
  }

  private finish(context: RequestContext, message: string): RecommendationResult {
    return { message, products: context.products };
  }

  private async runSearch(call: FunctionCallReply, context: RequestContext): Promise<ToolResult> {
    const decoded = decodeSearchArguments(call.arguments);
    if (decoded.droppedFields.length > 0) {
      this.logger.debug('Ignored unusable search arguments', {
        requestId: context.requestId,
        fields: decoded.droppedFields
      });
    }
    if (!decoded.ok) {
      this.logger.warn('Search call rejected', { requestId: context.requestId, reason: decoded.reason });
      return emptyResult({ error: decoded.reason, recommendations: [] });
    }

    const { filter } = decoded;
    const candidates = await this.searchMarketplace(filter, context);
    if (candidates.length === 0) {
      return emptyResult({ filter, totalFound: 0, recommendations: [] });
    }

    const selection = await selectRecommendations(
      { userInput: context.userInput, candidates, count: this.limits.recommendationCount },
      { chatModel: this.chatModel, prompts: this.prompts, logger: this.logger, timeoutMs: this.timeouts.llmMs }
    );
    const products = await enrichItems(selection.products, {
      client: this.marketplace,
      logger: this.logger,
      concurrency: this.limits.detailConcurrency,
      timeoutMs: this.timeouts.detailMs
    });

    this.logger.info('Search round completed', {
      requestId: context.requestId,
      keyword: filter.keyword,
      found: candidates.length,
      recommended: products.length
    });
    return { output: { filter, totalFound: candidates.length, recommendations: products }, products };
  }

  private async searchMarketplace(filter: SearchFilter, context: RequestContext): Promise<readonly ItemSummary[]> {
    try {
      return await withDeadline('marketplace search', this.timeouts.searchMs, (signal) =>
        this.marketplace.search(filter, this.limits.searchLimit, { signal })
      );
    } catch (error) {
      this.logger.warn('Marketplace search failed', {
        requestId: context.requestId,
        keyword: filter.keyword,
        error: describeError(error)
      });
      return [];
    }
  }
}
