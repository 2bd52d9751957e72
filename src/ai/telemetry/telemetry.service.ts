import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { AgentConfig } from '../../config/agent-config';
import { ChatResponseDto } from '../dto/chat-response.dto';
import { splitReasoning } from '../utils/reasoning';

export const TRACE_SINK = Symbol('TRACE_SINK');

const traceSinkLogger = new Logger('TraceSink');

/**
 * Destination for trace events. A pino logger satisfies it.
 */
export interface TraceSink {
  info(payload: Record<string, unknown>): void;
}

export interface TraceContext {
  readonly traceId: string;
  readonly route: string;
}

export type TraceEvent =
  | 'request_received'
  | 'tool_start'
  | 'tool_end'
  | 'llm_call'
  | 'request_completed'
  | 'stream_completed'
  | 'stream_cancelled'
  | 'request_error';

export const PREVIEW_LIMIT = 320;
export const MESSAGE_PREVIEW_LIMIT = 160;

/**
 * Stringify a value for a trace event: newlines collapsed, truncated to
 * `limit` characters followed by `...`.
 */
export function preview(value: unknown, limit = PREVIEW_LIMIT): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  text = text.replace(/\r?\n/g, ' ');
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * pino sink writing JSON lines to stdout and, when a path is configured,
 * appending them to the trace log file.
 */
export function createTraceSink(config: AgentConfig): TraceSink {
  const streams: pino.StreamEntry[] = [{ stream: process.stdout }];
  const logPath = config.tracing.logPath;
  if (logPath) {
    const file = pino.destination({
      dest: logPath,
      append: true,
      mkdir: true,
      sync: false,
    });
    let fileFailed = false;
    file.on('error', (error: Error) => {
      if (!fileFailed) {
        fileFailed = true;
        traceSinkLogger.warn(
          `Trace file ${logPath} unavailable, tracing to stdout only: ${error.message}`,
        );
      }
    });
    streams.push({
      stream: {
        write: (line: string) => {
          if (!fileFailed) {
            file.write(line);
          }
        },
      },
    });
  }

  return pino(
    {
      enabled: config.tracing.enabled,
      base: null,
      timestamp: false,
    },
    pino.multistream(streams),
  );
}

/**
 * Structured per-request trace events.
 *
 * Emission never throws: sink failures fall back to the Nest logger.
 */
@Injectable()
export class TelemetryService {
  private readonly logger = new Logger(TelemetryService.name);

  constructor(@Inject(TRACE_SINK) private readonly sink: TraceSink) {}

  /**
   * Open a trace for an incoming request.
   */
  startTrace(route: string, message: string, historyTurns = 0): TraceContext {
    const trace: TraceContext = { traceId: randomUUID(), route };
    this.emit('request_received', trace, {
      route,
      message_chars: message.length,
      message_preview: preview(message, MESSAGE_PREVIEW_LIMIT),
      history_turns: historyTurns,
    });
    return trace;
  }

  /**
   * Summary event for a finished non-streaming request.
   */
  requestCompleted(trace: TraceContext, response: ChatResponseDto): void {
    const { reasoning, answer } = splitReasoning(response.answer);
    this.emit('request_completed', trace, {
      latency_ms: response.latency_ms,
      tokens: response.tokens,
      sources: response.sources.length,
      has_reasoning: reasoning !== null,
      answer_preview: preview(answer),
    });
  }

  requestError(trace: TraceContext, error: unknown): void {
    this.emit('request_error', trace, {
      error_type: error instanceof Error ? error.name : typeof error,
      error: preview(error instanceof Error ? error.message : error),
    });
  }

  emit(
    event: TraceEvent,
    trace: TraceContext,
    fields: Record<string, unknown> = {},
  ): void {
    const payload = {
      ts: new Date().toISOString(),
      event,
      trace_id: trace.traceId,
      ...fields,
    };

    try {
      this.sink.info(payload);
    } catch (sinkError) {
      this.logger.warn(
        `Trace sink failed (${sinkError}); ${preview(payload, Infinity)}`,
      );
    }
  }
}
