/**
 * Scripted completion service for testing the planning loop without a
 * language model.
 *
 * Each `stream` call consumes the next scripted turn. Tokens are emitted
 * one event each, followed by the turn itself.
 */
import {
  CompletionEvent,
  CompletionOptions,
  CompletionService,
} from '../completion/completion.service';
import { EMPTY_USAGE, Message, TokenUsage } from '../types/conversation';

export interface ScriptedToolCall {
  id?: string;
  name: string;
  args: Record<string, unknown>;
  rawArgs?: string;
}

export interface ScriptedTurn {
  /** Final turn text; defaults to the joined tokens */
  content?: string;
  /** Streamed pieces; defaults to the whole content as one token */
  tokens?: string[];
  toolCalls?: ScriptedToolCall[];
  usage?: TokenUsage;
  /** Wait before streaming, honoring the abort signal */
  delayMs?: number;
}

export type ScriptStep = ScriptedTurn | Error;

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('Completion aborted'));
      },
      { once: true },
    );
  });
}

export class ScriptedCompletionService implements CompletionService {
  /** Conversation snapshot passed to each call */
  readonly calls: Message[][] = [];

  constructor(private readonly script: readonly ScriptStep[]) {}

  async *stream(
    messages: readonly Message[],
    options: CompletionOptions = {},
  ): AsyncGenerator<CompletionEvent> {
    this.calls.push([...messages]);
    const step = this.script[this.calls.length - 1];

    if (step === undefined) {
      throw new Error(`No scripted turn for call ${this.calls.length}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (step.delayMs) {
      await wait(step.delayMs, options.signal);
    }

    const tokens = step.tokens ?? (step.content ? [step.content] : []);
    for (const text of tokens) {
      yield { type: 'token', text };
    }

    yield {
      type: 'turn',
      turn: {
        content: step.content ?? tokens.join(''),
        toolCalls: (step.toolCalls ?? []).map((call) => ({
          id: call.id ?? '',
          name: call.name,
          args: call.args,
          ...(call.rawArgs === undefined ? {} : { rawArgs: call.rawArgs }),
        })),
        usage: step.usage ?? EMPTY_USAGE,
      },
    };
  }
}

/**
 * Turn that requests a single tool call and streams no text.
 */
export function toolCallTurn(
  name: string,
  args: Record<string, unknown>,
  id?: string,
): ScriptedTurn {
  return { content: '', tokens: [], toolCalls: [{ id, name, args }] };
}

/**
 * Terminal turn streaming `tokens` as the answer.
 */
export function answerTurn(tokens: string[], usage?: TokenUsage): ScriptedTurn {
  return { tokens, usage };
}
