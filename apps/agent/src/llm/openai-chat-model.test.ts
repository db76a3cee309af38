import { MockLanguageModelV1 } from 'ai/test';
import { describe, expect, it } from 'vitest';

import { searchToolDefinition } from '../agent/tools.js';
import { createChatModel } from './openai-chat-model.js';

const usage = { promptTokens: 10, completionTokens: 5 };
const rawCall = { rawPrompt: null, rawSettings: {} };

const toolCallModel = (toolName: string, args: string) =>
  new MockLanguageModelV1({
    doGenerate: async () => ({
      rawCall,
      usage,
      finishReason: 'tool-calls',
      toolCalls: [{ toolCallType: 'function', toolCallId: 'call-1', toolName, args }]
    })
  });

const request = {
  system: 'assistant prompt',
  conversation: [{ kind: 'user', content: '中古のiPhone' }],
  reminder: 'reply in the language of: 中古のiPhone',
  tools: [searchToolDefinition]
} as const;

describe('createChatModel', () => {
  it('returns a function call for a known tool', async () => {
    const chatModel = createChatModel(toolCallModel('search', '{"keyword":"iPhone","priceMax":15000}'));

    await expect(chatModel.respond(request)).resolves.toEqual({
      type: 'function_call',
      name: 'search',
      callId: 'call-1',
      arguments: '{"keyword":"iPhone","priceMax":15000}'
    });
  });

  it('reports an unknown tool as a function call with its name', async () => {
    const chatModel = createChatModel(toolCallModel('checkout', '{}'));

    await expect(chatModel.respond(request)).resolves.toEqual({
      type: 'function_call',
      name: 'checkout',
      callId: 'unresolved',
      arguments: '{}'
    });
  });

  it('keeps the recoverable fields of truncated arguments', async () => {
    const chatModel = createChatModel(toolCallModel('search', '{"keyword":"iPhone",'));

    const reply = await chatModel.respond(request);

    expect(reply).toEqual({ type: 'function_call', name: 'search', callId: 'call-1', arguments: '{"keyword":"iPhone"}' });
  });

  it('falls back to empty arguments when nothing is recoverable', async () => {
    const chatModel = createChatModel(toolCallModel('search', '{"keyw'));

    const reply = await chatModel.respond(request);

    expect(reply).toEqual({ type: 'function_call', name: 'search', callId: 'call-1', arguments: '{}' });
  });

  it('returns a final message for a text reply', async () => {
    const chatModel = createChatModel(
      new MockLanguageModelV1({
        doGenerate: async () => ({ rawCall, usage, finishReason: 'stop', text: 'Here are three iPhones.' })
      })
    );

    await expect(chatModel.respond(request)).resolves.toEqual({
      type: 'final_message',
      text: 'Here are three iPhones.'
    });
  });

  it('sends the system prompt, conversation and reminder', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: async () => ({ rawCall, usage, finishReason: 'stop', text: '["m1"]' })
    });
    const chatModel = createChatModel(model);

    const text = await chatModel.complete({
      system: 'pick 3',
      conversation: [{ kind: 'user', content: 'a bag' }],
      reminder: 'reply in English'
    });

    expect(text).toBe('["m1"]');
    expect(model.doGenerateCalls[0].prompt).toEqual([
      { role: 'system', content: 'pick 3' },
      { role: 'user', content: [{ type: 'text', text: 'a bag' }] },
      { role: 'system', content: 'reply in English' }
    ]);
  });
});
