import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const PROMPT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../prompts');

export const PROMPT_VERSION = 'v1';

export type PromptId = 'shopping-assistant' | 'recommendation-selector' | 'language-reminder';

export interface PromptSet {
  readonly version: string;
  readonly assistant: string;
  readonly selector: (count: number) => string;
  readonly reminder: (userInput: string) => string;
}

export const renderTemplate = (template: string, values: Readonly<Record<string, string | number>>): string =>
  template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? String(values[name]) : placeholder
  );

export interface LoadPromptsOptions {
  readonly directory?: string;
  readonly version?: string;
}

export const loadPrompts = (options: LoadPromptsOptions = {}): PromptSet => {
  const directory = options.directory ?? PROMPT_ROOT;
  const version = options.version ?? PROMPT_VERSION;
  const read = (id: PromptId) => readFileSync(join(directory, `${id}.${version}.md`), 'utf8').trim();

  const assistant = read('shopping-assistant');
  const selector = read('recommendation-selector');
  const reminder = read('language-reminder');

  return {
    version,
    assistant,
    selector: (count) => renderTemplate(selector, { count }),
    reminder: (userInput) => renderTemplate(reminder, { userInput })
  };
};
