import {
  TokenUsage,
  ToolCallRequest,
  ToolResult,
} from './conversation';

/**
 * Planning loop states. DONE and FAILED are terminal.
 */
export type LoopState = 'PLANNING' | 'DISPATCHING_TOOLS' | 'DONE' | 'FAILED';

export type AgentErrorCode =
  | 'EMPTY_ANSWER'
  | 'TOOL_LOOP_EXCEEDED'
  | 'DEADLINE_EXCEEDED'
  | 'COMPLETION_FAILED';

export class AgentError extends Error {
  constructor(
    readonly code: AgentErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

/**
 * Internal events produced by the planning loop. The streaming emitter maps
 * these to the wire protocol; the non-streaming path folds them into a
 * single response.
 */
export type AgentEvent =
  | { type: 'state'; state: LoopState; cycle: number }
  | { type: 'token'; text: string }
  | { type: 'tool-start'; call: ToolCallRequest }
  | { type: 'tool-end'; result: ToolResult; elapsedMs: number }
  | {
      type: 'done';
      answer: string;
      toolResults: readonly ToolResult[];
      usage: TokenUsage;
    }
  | { type: 'failed'; error: AgentError; toolResults: readonly ToolResult[] };
