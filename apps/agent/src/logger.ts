import { PinoLogger } from '@mastra/loggers';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, args?: Record<string, unknown>): void;
  info(message: string, args?: Record<string, unknown>): void;
  warn(message: string, args?: Record<string, unknown>): void;
  error(message: string, args?: Record<string, unknown>): void;
}

export interface CreateLoggerOptions {
  readonly name?: string;
  readonly level?: LogLevel;
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger =>
  new PinoLogger({
    name: options.name ?? 'KaimonoAgent',
    level: options.level ?? 'info'
  });
