export * from './agent/index.js';
export * from './config.js';
export * from './errors.js';
export * from './logger.js';
export * from './models.js';
export * from './prompts.js';
export * from './setup.js';
export type * from './llm/chat-model.js';
export { createChatModel, createOpenAIChatModel, type OpenAIChatModelOptions } from './llm/openai-chat-model.js';
export { createCli, type CreateCliOptions } from './cli/index.js';
