import type { JSONSchema7 } from 'json-schema';

export type ConversationTurn =
  | { readonly kind: 'user'; readonly content: string }
  | {
      readonly kind: 'tool-call';
      readonly callId: string;
      readonly name: string;
      readonly arguments: string;
    }
  | {
      readonly kind: 'tool-output';
      readonly callId: string;
      readonly name: string;
      readonly output: string;
    };

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: JSONSchema7;
}

export interface FunctionCallReply {
  readonly type: 'function_call';
  readonly name: string;
  readonly callId: string;
  readonly arguments: string;
}

export interface FinalMessageReply {
  readonly type: 'final_message';
  readonly text: string;
}

export type ModelReply = FunctionCallReply | FinalMessageReply;

export interface CompletionRequest {
  readonly system: string;
  readonly conversation: readonly ConversationTurn[];
  readonly reminder?: string;
  readonly signal?: AbortSignal;
}

export interface ToolRoundRequest extends CompletionRequest {
  readonly tools: readonly ToolDefinition[];
}

export interface ChatModel {
  respond(request: ToolRoundRequest): Promise<ModelReply>;
  complete(request: CompletionRequest): Promise<string>;
}
