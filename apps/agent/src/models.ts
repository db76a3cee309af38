export const DEFAULT_OPENAI_MODEL = 'gpt-4.1-mini';
