import { Inject, Injectable, Logger } from '@nestjs/common';
import { performance } from 'node:perf_hooks';
import { AGENT_CONFIG, AgentConfig } from '../config/agent-config';
import {
  COMPLETION_SERVICE,
  CompletionService,
  CompletionTurn,
} from './completion/completion.service';
import { ChatRequestDto } from './dto/chat-request.dto';
import { ChatResponseDto } from './dto/chat-response.dto';
import { SseSink, SSEEmitter, StreamSummary } from './sse-emitter';
import { collectSources } from './sources/source-extractor';
import { LatencyTimer } from './telemetry/latency-timer';
import {
  preview,
  TelemetryService,
  TraceContext,
} from './telemetry/telemetry.service';
import { ToolRegistry } from './tools/tool-registry';
import {
  AgentError,
  AgentErrorCode,
  AgentEvent,
} from './types/agent-events';
import {
  buildConversation,
  EMPTY_USAGE,
  Message,
  TokenUsage,
  ToolCallRequest,
  ToolResult,
} from './types/conversation';

export interface RunOptions {
  trace: TraceContext;
  timer: LatencyTimer;
  /** Aborted when the client goes away */
  signal?: AbortSignal;
}

export interface AgentStatus {
  provider: string;
  model: string;
  ready: boolean;
}

type DoneEvent = Extract<AgentEvent, { type: 'done' }>;

const ABORTED = Symbol('aborted');

/**
 * Settle with `task`, or with ABORTED as soon as `signal` aborts. An
 * abandoned task keeps running; its outcome is ignored.
 */
function untilAborted<T>(
  task: Promise<T>,
  signal: AbortSignal,
): Promise<T | typeof ABORTED> {
  if (signal.aborted) {
    return Promise.resolve(ABORTED);
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    prompt: a.prompt + b.prompt,
    completion: a.completion + b.completion,
  };
}

/**
 * Planning loop: alternates completion turns with sequential tool dispatch
 * until the completion service answers without requesting tools.
 *
 * Bounded by the configured tool-cycle cap and per-request deadline.
 * Conversation state is a fresh list per request.
 */
@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);

  constructor(
    @Inject(COMPLETION_SERVICE) private readonly completion: CompletionService,
    private readonly registry: ToolRegistry,
    private readonly telemetry: TelemetryService,
    @Inject(AGENT_CONFIG) private readonly config: AgentConfig,
  ) {}

  /**
   * Provider and model in use. The service only exists once configuration
   * validated, so it is always ready.
   */
  getStatus(): AgentStatus {
    return {
      provider: this.config.aiProvider,
      model: this.config.model.name,
      ready: true,
    };
  }

  /**
   * Answer a chat request in one piece.
   *
   * @throws AgentError when the loop ends in FAILED
   */
  async answer(
    request: ChatRequestDto,
    trace: TraceContext,
  ): Promise<ChatResponseDto> {
    const timer = new LatencyTimer();
    const conversation = buildConversation(request.message, request.history);

    try {
      let done: DoneEvent | undefined;
      for await (const event of this.run(conversation, { trace, timer })) {
        if (event.type === 'failed') {
          throw event.error;
        }
        if (event.type === 'done') {
          done = event;
        }
      }
      if (!done) {
        throw new AgentError(
          'COMPLETION_FAILED',
          'Planning loop stopped without an answer',
        );
      }

      const response: ChatResponseDto = {
        answer: done.answer,
        sources: collectSources(done.toolResults, this.config.sources),
        latency_ms: timer.breakdown(),
        tokens: done.usage,
      };
      this.telemetry.requestCompleted(trace, response);
      return response;
    } catch (error) {
      this.logger.error(
        `Chat request ${trace.traceId} failed: ${error instanceof Error ? error.message : error}`,
      );
      this.telemetry.requestError(trace, error);
      throw error;
    }
  }

  /**
   * Answer a chat request as a stream of wire events written to `sink`.
   * Resolves once the stream ended or the client went away.
   */
  async streamChat(
    request: ChatRequestDto,
    trace: TraceContext,
    sink: SseSink,
    signal?: AbortSignal,
  ): Promise<StreamSummary> {
    const timer = new LatencyTimer();
    const emitter = new SSEEmitter(sink, this.telemetry, trace, {
      sourceCaps: this.config.sources,
      timer,
    });
    const conversation = buildConversation(request.message, request.history);

    return emitter.relay(this.run(conversation, { trace, timer, signal }));
  }

  /**
   * Run the planning loop, yielding state transitions, streamed tokens,
   * tool activity and exactly one terminal `done` or `failed` event. Ends
   * without a terminal event only if `signal` aborts.
   */
  async *run(
    conversation: readonly Message[],
    options: RunOptions,
  ): AsyncGenerator<AgentEvent> {
    const { maxToolCycles, requestTimeoutMs } = this.config.agent;
    const messages: Message[] = [...conversation];
    const toolResults: ToolResult[] = [];
    let usage: TokenUsage = EMPTY_USAGE;
    let cycle = 0;

    const controller = new AbortController();
    let deadlineExceeded = false;
    const deadline = setTimeout(() => {
      deadlineExceeded = true;
      controller.abort();
    }, requestTimeoutMs);
    const onClientAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onClientAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    const fail = (code: AgentErrorCode, message: string): AgentEvent[] => {
      this.logger.warn(`Trace ${options.trace.traceId} failed: ${code}`);
      return [
        { type: 'state', state: 'FAILED', cycle },
        { type: 'failed', error: new AgentError(code, message), toolResults },
      ];
    };
    const deadlineMessage = `Request exceeded the ${requestTimeoutMs} ms deadline`;

    try {
      while (true) {
        if (controller.signal.aborted) {
          if (deadlineExceeded) {
            yield* fail('DEADLINE_EXCEEDED', deadlineMessage);
          }
          return;
        }

        yield { type: 'state', state: 'PLANNING', cycle };
        const turn = yield* this.plan(messages, cycle, controller.signal, options);

        if (turn instanceof Error) {
          if (deadlineExceeded) {
            yield* fail('DEADLINE_EXCEEDED', deadlineMessage);
          } else if (!controller.signal.aborted) {
            yield* fail(
              'COMPLETION_FAILED',
              `Completion service failed: ${turn.message}`,
            );
          }
          return;
        }
        usage = addUsage(usage, turn.usage);

        if (turn.toolCalls.length === 0) {
          if (!turn.content.trim()) {
            yield* fail('EMPTY_ANSWER', 'The assistant returned an empty answer');
            return;
          }
          yield { type: 'state', state: 'DONE', cycle };
          yield { type: 'done', answer: turn.content, toolResults, usage };
          return;
        }

        if (cycle >= maxToolCycles) {
          yield* fail(
            'TOOL_LOOP_EXCEEDED',
            `Tool loop exceeded ${maxToolCycles} cycles`,
          );
          return;
        }

        cycle++;
        yield { type: 'state', state: 'DISPATCHING_TOOLS', cycle };

        const calls = turn.toolCalls.map(
          (call, index): ToolCallRequest =>
            call.id ? call : { ...call, id: `call_${cycle}_${index}` },
        );
        messages.push({
          role: 'assistant',
          content: turn.content || null,
          toolCalls: calls,
        });

        for (const call of calls) {
          if (controller.signal.aborted) {
            if (deadlineExceeded) {
              yield* fail('DEADLINE_EXCEEDED', deadlineMessage);
            }
            return;
          }

          yield { type: 'tool-start', call };
          const dispatched = await untilAborted(
            this.dispatch(call, options),
            controller.signal,
          );
          if (dispatched === ABORTED) {
            this.logger.warn(
              `Trace ${options.trace.traceId} abandoned ${call.name} (${call.id})`,
            );
            if (deadlineExceeded) {
              yield* fail('DEADLINE_EXCEEDED', deadlineMessage);
            }
            return;
          }
          const { result, elapsedMs } = dispatched;
          toolResults.push(result);
          messages.push({
            role: 'tool',
            content: result.text,
            toolCallId: call.id,
            toolName: call.name,
          });
          yield { type: 'tool-end', result, elapsedMs };
        }
      }
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onClientAbort);
    }
  }

  /**
   * One completion turn, relaying its tokens. Errors are returned rather
   * than thrown so the loop can classify them.
   */
  private async *plan(
    messages: readonly Message[],
    cycle: number,
    signal: AbortSignal,
    { trace, timer }: RunOptions,
  ): AsyncGenerator<AgentEvent, CompletionTurn | Error> {
    const started = performance.now();
    let turn: CompletionTurn | undefined;

    try {
      for await (const event of this.completion.stream(messages, { signal })) {
        if (event.type === 'token') {
          yield { type: 'token', text: event.text };
        } else {
          turn = event.turn;
        }
      }
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    } finally {
      const elapsed = performance.now() - started;
      timer.record('llm', elapsed);
      this.telemetry.emit('llm_call', trace, {
        cycle,
        elapsed_ms: Math.round(elapsed),
        tool_calls: turn?.toolCalls.length ?? 0,
        prompt_tokens: turn?.usage.prompt ?? 0,
        completion_tokens: turn?.usage.completion ?? 0,
      });
    }

    return turn ?? new Error('completion stream ended without a turn');
  }

  private async dispatch(
    call: ToolCallRequest,
    { trace, timer }: RunOptions,
  ): Promise<{ result: ToolResult; elapsedMs: number }> {
    this.telemetry.emit('tool_start', trace, {
      tool: call.name,
      tool_call_id: call.id,
      args: preview(call.args),
    });

    const started = performance.now();
    const result = await this.registry.dispatch(call);
    const elapsed = performance.now() - started;
    timer.record(this.registry.timingStep(call.name), elapsed);

    this.telemetry.emit('tool_end', trace, {
      tool: call.name,
      tool_call_id: call.id,
      elapsed_ms: Math.round(elapsed),
      is_error: result.isError,
      citations: result.citations.length,
      output_preview: preview(result.text),
    });

    return { result, elapsedMs: Math.round(elapsed) };
  }
}
