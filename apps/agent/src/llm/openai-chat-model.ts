import { createOpenAI } from '@ai-sdk/openai';
import { generateText, InvalidToolArgumentsError, jsonSchema, NoSuchToolError, tool, type LanguageModel } from 'ai';

import type { ChatModel, ToolDefinition } from './chat-model.js';
import { toCoreMessages } from './messages.js';
import { salvageToolArguments } from './tool-arguments.js';

export interface OpenAIChatModelOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly baseURL?: string;
}

// Tools carry no `execute`, so generateText stops after one step and hands the calls back.
const toToolSet = (definitions: readonly ToolDefinition[]) =>
  Object.fromEntries(
    definitions.map((definition) => [
      definition.name,
      tool({ description: definition.description, parameters: jsonSchema(definition.parameters) })
    ])
  );

export const createChatModel = (model: LanguageModel): ChatModel => ({
  async respond({ system, conversation, reminder, tools, signal }) {
    try {
      const result = await generateText({
        model,
        system,
        messages: toCoreMessages(conversation, reminder),
        tools: toToolSet(tools),
        abortSignal: signal,
        maxRetries: 1,
        // Malformed arguments still reach the agent with whatever fields survived.
        experimental_repairToolCall: async ({ toolCall, error }) =>
          InvalidToolArgumentsError.isInstance(error)
            ? { ...toolCall, args: salvageToolArguments(toolCall.args) }
            : null
      });

      const [call] = result.toolCalls;
      if (call) {
        return {
          type: 'function_call',
          name: call.toolName,
          callId: call.toolCallId,
          arguments: JSON.stringify(call.args ?? {})
        };
      }
      return { type: 'final_message', text: result.text };
    } catch (error) {
      if (NoSuchToolError.isInstance(error)) {
        return { type: 'function_call', name: error.toolName, callId: 'unresolved', arguments: '{}' };
      }
      throw error;
    }
  },

  async complete({ system, conversation, reminder, signal }) {
    const result = await generateText({
      model,
      system,
      messages: toCoreMessages(conversation, reminder),
      abortSignal: signal,
      maxRetries: 1
    });
    return result.text;
  }
});

export const createOpenAIChatModel = (options: OpenAIChatModelOptions): ChatModel => {
  const openai = createOpenAI({
    apiKey: options.apiKey,
    ...(options.baseURL ? { baseURL: options.baseURL } : {})
  });
  return createChatModel(openai(options.model, { parallelToolCalls: false }));
};
