import type { ItemSummary } from '@kaimono/core';

import { withDeadline } from '../deadline.js';
import { describeError } from '../errors.js';
import type { ChatModel } from '../llm/chat-model.js';
import type { Logger } from '../logger.js';
import type { PromptSet } from '../prompts.js';

export interface SelectionRequest {
  readonly userInput: string;
  readonly candidates: readonly ItemSummary[];
  readonly count: number;
}

export interface SelectorDependencies {
  readonly chatModel: ChatModel;
  readonly prompts: PromptSet;
  readonly logger: Logger;
  readonly timeoutMs: number;
}

export interface SelectionResult {
  readonly message: string;
  readonly products: readonly ItemSummary[];
  readonly unmatchedIds: readonly string[];
}

const FENCED_BLOCK = /^```[\w-]*\s*\n?([\s\S]*?)\n?\s*```$/;

export const decodeIdList = (text: string): string[] => {
  const trimmed = text.trim();
  const body = FENCED_BLOCK.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return [];
  }

  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed
    // Numbers past 2^53 have already lost digits in JSON.parse and cannot match.
    .filter(
      (entry): entry is string | number =>
        typeof entry === 'string' || (typeof entry === 'number' && Number.isSafeInteger(entry))
    )
    .map((entry) => String(entry).trim())
    .filter((entry) => entry.length > 0);
};

export const reconcileSelection = (
  ids: readonly string[],
  candidates: readonly ItemSummary[],
  count: number
): { products: ItemSummary[]; unmatchedIds: string[] } => {
  const products: ItemSummary[] = [];
  const unmatchedIds: string[] = [];
  const seen = new Set<string>();

  for (const id of ids) {
    if (products.length >= count) {
      break;
    }
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);

    const match = candidates.find((candidate) => candidate.itemId === id);
    if (match) {
      products.push(match);
    } else {
      unmatchedIds.push(id);
    }
  }

  return { products, unmatchedIds };
};

const EMPTY_SELECTION: SelectionResult = { message: '', products: [], unmatchedIds: [] };

export const selectRecommendations = async (
  request: SelectionRequest,
  dependencies: SelectorDependencies
): Promise<SelectionResult> => {
  const { chatModel, prompts, logger, timeoutMs } = dependencies;
  if (request.count < 1 || request.candidates.length === 0) {
    return EMPTY_SELECTION;
  }

  let message: string;
  try {
    message = await withDeadline('recommendation selection', timeoutMs, (signal) =>
      chatModel.complete({
        system: prompts.selector(request.count),
        conversation: [
          { kind: 'user', content: request.userInput },
          { kind: 'user', content: `Candidate listings (JSON):\n${JSON.stringify(request.candidates)}` }
        ],
        signal
      })
    );
  } catch (error) {
    logger.warn('Recommendation selection failed', { error: describeError(error) });
    return EMPTY_SELECTION;
  }

  const ids = decodeIdList(message);
  if (ids.length === 0) {
    logger.warn('Selector reply did not contain an identifier list', { reply: message.slice(0, 200) });
  }

  const { products, unmatchedIds } = reconcileSelection(ids, request.candidates, request.count);
  if (unmatchedIds.length > 0) {
    logger.warn('Selector returned identifiers that match no candidate', { unmatchedIds });
  }

  return { message, products, unmatchedIds };
};
