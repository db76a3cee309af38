import { describe, expect, it } from 'vitest';

import { loadPrompts, renderTemplate } from './prompts.js';

describe('renderTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(renderTemplate('Pick {{count}} for {{who}}', { count: 3 })).toBe('Pick 3 for {{who}}');
  });
});

describe('loadPrompts', () => {
  it('loads the bundled prompt set', () => {
    const prompts = loadPrompts();

    expect(prompts.version).toBe('v1');
    expect(prompts.assistant).toContain('`search`');
    expect(prompts.selector(3)).toContain('Pick the 3 listings');
    expect(prompts.reminder('gaming chair')).toBe(
      'Reply in the same language as the user\'s request. The request was: gaming chair'
    );
  });

  it('fails when a prompt version does not exist', () => {
    expect(() => loadPrompts({ version: 'v0' })).toThrow();
  });
});
