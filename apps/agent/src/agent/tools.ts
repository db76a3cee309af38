import type { JSONSchema7 } from 'json-schema';

import { describeItemConditions, ITEM_CONDITION_IDS, SEARCH_ORDERS, SEARCH_SORTS } from '@kaimono/core';

import type { ToolDefinition } from '../llm/chat-model.js';

export const SEARCH_TOOL_NAME = 'search';

const SEARCH_PARAMETERS: JSONSchema7 = {
  type: 'object',
  properties: {
    keyword: {
      type: 'string',
      description: 'Search keyword in Japanese. Keep proper nouns in their original spelling.'
    },
    excludeKeyword: {
      type: 'string',
      description: 'Words that matching listings must not contain.'
    },
    sort: {
      type: 'string',
      enum: [...SEARCH_SORTS],
      description: 'Sort key. SORT_SCORE ranks by relevance.'
    },
    order: {
      type: 'string',
      enum: [...SEARCH_ORDERS],
      description: 'Sort direction.'
    },
    priceMin: {
      type: 'integer',
      minimum: 1,
      description: 'Minimum price in yen.'
    },
    priceMax: {
      type: 'integer',
      minimum: 1,
      description: 'Maximum price in yen.'
    },
    itemConditionId: {
      type: 'array',
      items: { type: 'string', enum: [...ITEM_CONDITION_IDS] },
      minItems: 1,
      description: `Accepted item conditions: ${describeItemConditions()}.`
    },
    categoryId: {
      type: 'array',
      items: { type: 'string' },
      minItems: 1,
      description: 'Marketplace category codes.'
    }
  },
  required: ['keyword'],
  additionalProperties: false
};

export const searchToolDefinition: ToolDefinition = {
  name: SEARCH_TOOL_NAME,
  description:
    'Search Mercari Japan listings. Returns a shortlist of the listings that best fit the request, with details. ' +
    'Only set filters the user actually asked for.',
  parameters: SEARCH_PARAMETERS
};

export const AGENT_TOOLS: readonly ToolDefinition[] = [searchToolDefinition];
