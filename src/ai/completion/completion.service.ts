import { Message, TokenUsage, ToolCallRequest } from '../types/conversation';

export const COMPLETION_SERVICE = Symbol('COMPLETION_SERVICE');

/**
 * One complete completion-service turn: final text (possibly empty when
 * only tools are requested), requested tool calls and token counters.
 */
export interface CompletionTurn {
  content: string;
  toolCalls: ToolCallRequest[];
  usage: TokenUsage;
}

/**
 * Zero or more `token` events followed by exactly one `turn` event.
 */
export type CompletionEvent =
  | { type: 'token'; text: string }
  | { type: 'turn'; turn: CompletionTurn };

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * The language-model backend behind the planning loop.
 */
export interface CompletionService {
  stream(
    messages: readonly Message[],
    options?: CompletionOptions,
  ): AsyncIterable<CompletionEvent>;
}
