import { AIMessageChunk } from '@langchain/core/messages';
import { Logger } from '@nestjs/common';
import { Message, ToolCallRequest } from '../types/conversation';
import {
  extractTextFromContent,
  toLangChainMessages,
} from '../utils/message-utils';
import { ToolCallingModel } from './chat-model.factory';
import {
  CompletionEvent,
  CompletionOptions,
  CompletionService,
  CompletionTurn,
} from './completion.service';

/**
 * Fold the aggregated stream into one turn. Tool calls whose argument text
 * did not parse are kept, carrying that text, so the registry can answer
 * them with a validation sentinel.
 */
export function toTurn(
  aggregate: AIMessageChunk | undefined,
  chunkToolCalls: ToolCallRequest[],
): CompletionTurn {
  const aggregatedCalls = [
    ...(aggregate?.tool_calls ?? []).map(
      (call): ToolCallRequest => ({
        id: call.id ?? '',
        name: call.name,
        args: call.args,
      }),
    ),
    ...(aggregate?.invalid_tool_calls ?? []).map(
      (call): ToolCallRequest => ({
        id: call.id ?? '',
        name: call.name ?? '',
        args: {},
        rawArgs: call.args ?? '',
      }),
    ),
  ];
  const usage = aggregate?.usage_metadata;

  return {
    content: extractTextFromContent(aggregate?.content),
    toolCalls: aggregatedCalls.length > 0 ? aggregatedCalls : chunkToolCalls,
    usage: {
      prompt: usage?.input_tokens ?? 0,
      completion: usage?.output_tokens ?? 0,
    },
  };
}

/**
 * CompletionService over a LangChain chat model with tools bound.
 *
 * Streams text chunks as they arrive and aggregates them into one turn.
 * Providers that emit complete tool calls on individual chunks instead of
 * incremental tool-call chunks are covered by collecting those directly.
 */
export class LangChainCompletionService implements CompletionService {
  private readonly logger = new Logger(LangChainCompletionService.name);

  constructor(
    private readonly model: ToolCallingModel,
    private readonly systemPrompt: string,
  ) {}

  async *stream(
    messages: readonly Message[],
    options: CompletionOptions = {},
  ): AsyncGenerator<CompletionEvent> {
    const input = toLangChainMessages(this.systemPrompt, messages);
    const stream = await this.model.stream(input, { signal: options.signal });

    let aggregate: AIMessageChunk | undefined;
    const chunkToolCalls: ToolCallRequest[] = [];

    for await (const chunk of stream) {
      aggregate = aggregate ? aggregate.concat(chunk) : chunk;

      if (!chunk.tool_call_chunks?.length) {
        for (const call of chunk.tool_calls ?? []) {
          chunkToolCalls.push({ id: call.id ?? '', name: call.name, args: call.args });
        }
      }

      const text = extractTextFromContent(chunk.content);
      if (text) {
        yield { type: 'token', text };
      }
    }

    const turn = toTurn(aggregate, chunkToolCalls);
    this.logger.debug(
      `Turn complete: ${turn.content.length} chars, ${turn.toolCalls.length} tool calls`,
    );
    yield { type: 'turn', turn };
  }
}
