/**
 * Conversation and tool-call types shared by the planning loop, the tool
 * registry, the completion adapter and the streaming emitter.
 *
 * Conversation state is an append-only list of readonly messages owned by a
 * single in-flight request.
 */

export type MessageRole = 'user' | 'assistant' | 'tool';

/**
 * A tool invocation requested by the completion service.
 */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>>;
  /** Argument text the model produced that did not parse; `args` is then empty */
  readonly rawArgs?: string;
}

export interface UserMessage {
  readonly role: 'user';
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: 'assistant';
  /** Null for tool-call-only turns */
  readonly content: string | null;
  readonly toolCalls: readonly ToolCallRequest[];
}

export interface ToolResultMessage {
  readonly role: 'tool';
  readonly content: string;
  readonly toolCallId: string;
  readonly toolName: string;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

/**
 * Named, URL-identified citation surfaced alongside an answer.
 */
export interface Source {
  readonly name: string;
  readonly url: string;
}

/**
 * Canonical tool output: the text fed back to the completion service plus
 * any citations extracted from the raw provider payload.
 *
 * Failures are encoded in `text` as sentinel strings; `isError` only
 * mirrors that for telemetry.
 */
export interface ToolOutput {
  readonly text: string;
  readonly citations: readonly Source[];
  readonly isError: boolean;
}

export function textOutput(
  text: string,
  citations: readonly Source[] = [],
): ToolOutput {
  return { text, citations, isError: false };
}

export function errorOutput(text: string): ToolOutput {
  return { text, citations: [], isError: true };
}

/**
 * Outcome of one dispatched tool call.
 */
export interface ToolResult extends ToolOutput {
  readonly toolCallId: string;
  readonly toolName: string;
}

export interface TokenUsage {
  readonly prompt: number;
  readonly completion: number;
}

export const EMPTY_USAGE: TokenUsage = { prompt: 0, completion: 0 };

export interface HistoryTurn {
  readonly role: 'user' | 'assistant';
  readonly content: string;
}

/**
 * Build a fresh conversation from optional prior turns plus the new message.
 * Blank history turns are skipped.
 */
export function buildConversation(
  message: string,
  history: readonly HistoryTurn[] = [],
): Message[] {
  const prior: Message[] = history
    .filter((turn) => turn.content.trim().length > 0)
    .map(
      (turn): Message =>
        turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content, toolCalls: [] },
    );
  return [...prior, { role: 'user', content: message }];
}
