import { z } from 'zod';

import { DEFAULT_MARKETPLACE_ORIGIN } from '@kaimono/core';

import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_OPENAI_MODEL } from './models.js';

export interface AgentTimeouts {
  readonly llmMs: number;
  readonly searchMs: number;
  readonly detailMs: number;
}

export const DEFAULT_TIMEOUTS: AgentTimeouts = {
  llmMs: 30_000,
  searchMs: 30_000,
  detailMs: 20_000
};

export interface AppConfig {
  readonly openaiApiKey?: string;
  readonly model: string;
  readonly firecrawlApiKey?: string;
  readonly logLevel: LogLevel;
  readonly maxRounds: number;
  readonly recommendationCount: number;
  readonly searchLimit: number;
  readonly detailConcurrency: number;
  readonly marketplaceOrigin: string;
  readonly timeouts: AgentTimeouts;
}

// Shells export unset variables as empty strings.
const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const optionalSecret = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());
const positiveInt = (fallback: number) => z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvironmentSchema = z.object({
  OPENAI_API_KEY: optionalSecret,
  FIRECRAWL_API_KEY: optionalSecret,
  KAIMONO_MODEL: z.preprocess(blankToUndefined, z.string().trim().min(1).default(DEFAULT_OPENAI_MODEL)),
  KAIMONO_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
  KAIMONO_MAX_ROUNDS: positiveInt(6),
  KAIMONO_RECOMMENDATIONS: positiveInt(3),
  KAIMONO_SEARCH_LIMIT: positiveInt(30),
  KAIMONO_DETAIL_CONCURRENCY: positiveInt(5),
  KAIMONO_MARKETPLACE_ORIGIN: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_MARKETPLACE_ORIGIN))
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    ...(values.OPENAI_API_KEY ? { openaiApiKey: values.OPENAI_API_KEY } : {}),
    ...(values.FIRECRAWL_API_KEY ? { firecrawlApiKey: values.FIRECRAWL_API_KEY } : {}),
    model: values.KAIMONO_MODEL,
    logLevel: values.KAIMONO_LOG_LEVEL,
    maxRounds: values.KAIMONO_MAX_ROUNDS,
    recommendationCount: values.KAIMONO_RECOMMENDATIONS,
    searchLimit: values.KAIMONO_SEARCH_LIMIT,
    detailConcurrency: values.KAIMONO_DETAIL_CONCURRENCY,
    marketplaceOrigin: values.KAIMONO_MARKETPLACE_ORIGIN,
    timeouts: DEFAULT_TIMEOUTS
  };
};

export const requireOpenAIApiKey = (config: AppConfig): string => {
  if (!config.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set; the shopping agent cannot reach the language model.');
  }
  return config.openaiApiKey;
};
