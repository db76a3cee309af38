import type { CoreMessage } from 'ai';

import type { ConversationTurn } from './chat-model.js';

const parseJsonText = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

export const toCoreMessages = (conversation: readonly ConversationTurn[], reminder?: string): CoreMessage[] => {
  const messages: CoreMessage[] = conversation.map((turn): CoreMessage => {
    switch (turn.kind) {
      case 'user':
        return { role: 'user', content: turn.content };
      case 'tool-call':
        return {
          role: 'assistant',
          content: [
            { type: 'tool-call', toolCallId: turn.callId, toolName: turn.name, args: parseJsonText(turn.arguments) }
          ]
        };
      case 'tool-output':
        return {
          role: 'tool',
          content: [
            { type: 'tool-result', toolCallId: turn.callId, toolName: turn.name, result: parseJsonText(turn.output) }
          ]
        };
    }
  });

  if (reminder) {
    messages.push({ role: 'system', content: reminder });
  }
  return messages;
};
