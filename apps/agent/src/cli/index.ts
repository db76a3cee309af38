import { Command, InvalidArgumentError } from 'commander';

import { decodeSearchArguments, type RecommendationResult } from '@kaimono/core';
import type { MarketplaceClient } from '@kaimono/marketplace';

import type { RecommendationAgent } from '../agent/orchestrator.js';

export interface CreateCliOptions {
  readonly createAgent: () => RecommendationAgent;
  readonly createMarketplace: () => MarketplaceClient;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

interface SearchCommandOptions {
  readonly exclude?: string;
  readonly sort?: string;
  readonly order?: string;
  readonly priceMin?: number;
  readonly priceMax?: number;
  readonly condition?: string[];
  readonly category?: string[];
  readonly limit: number;
}

const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const formatResult = (result: RecommendationResult): string => {
  const lines = [result.message];
  if (result.products.length > 0) {
    lines.push('', 'Products:');
    for (const product of result.products) {
      lines.push(`- ${product.name} (${product.price})${product.url ? ` ${product.url}` : ''}`);
    }
  }
  return `${lines.join('\n')}\n`;
};

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('kaimono').description('Shopping assistant for Mercari Japan listings');

  program
    .command('recommend <request...>')
    .description('Ask the shopping agent for recommendations')
    .option('--json', 'Print the result as JSON')
    .action(
      handle(async (request: string[], command: { json?: boolean }) => {
        const agent = options.createAgent();
        const result = await agent.respond(request.join(' '));
        if (command.json) {
          writeJson(result);
          return;
        }
        stdout.write(formatResult(result));
      })
    );

  program
    .command('search <keyword>')
    .description('Search marketplace listings without the language model')
    .option('--exclude <keyword>', 'Exclude listings containing this keyword')
    .option('--sort <sort>', 'created_time, score, price or num_likes')
    .option('--order <order>', 'asc or desc')
    .option('--price-min <yen>', 'Minimum price', parseInteger)
    .option('--price-max <yen>', 'Maximum price', parseInteger)
    .option('--condition <ids>', 'Comma-separated item condition ids (1-6)', parseList)
    .option('--category <ids>', 'Comma-separated category ids', parseList)
    .option('--limit <count>', 'Maximum number of listings', parseInteger, 30)
    .action(
      handle(async (keyword: string, command: SearchCommandOptions) => {
        const decoded = decodeSearchArguments({
          keyword,
          excludeKeyword: command.exclude,
          sort: command.sort ? `SORT_${command.sort.toUpperCase()}` : undefined,
          order: command.order ? `ORDER_${command.order.toUpperCase()}` : undefined,
          priceMin: command.priceMin,
          priceMax: command.priceMax,
          itemConditionId: command.condition,
          categoryId: command.category
        });
        if (!decoded.ok) {
          throw new Error(decoded.reason);
        }
        if (decoded.droppedFields.length > 0) {
          throw new Error(`Invalid search options: ${decoded.droppedFields.join(', ')}`);
        }

        const items = await options.createMarketplace().search(decoded.filter, command.limit);
        writeJson({ filter: decoded.filter, items });
      })
    );

  return program;
};
