/**
 * SSE Emitter
 *
 * Relays planning-loop events to a client as `data: <json>\n\n` frames:
 * - `status` once, before anything else
 * - `delta` per streamed token, in order
 * - `error` when the loop fails or throws
 * - `done` last, with the collected sources
 *
 * Tool activity is recorded as telemetry only. The sink is polled after
 * every upstream event; once the client is gone the loop is abandoned and
 * nothing more is written.
 */
import { StreamWireEvent } from './dto/chat-response.dto';
import { collectSources, SourceCaps } from './sources/source-extractor';
import { LatencyTimer } from './telemetry/latency-timer';
import { TelemetryService, TraceContext } from './telemetry/telemetry.service';
import { AgentEvent } from './types/agent-events';
import { Source } from './types/conversation';

/**
 * Write side of a streaming response.
 */
export interface SseSink {
  write(chunk: string): void;
  isClosed(): boolean;
}

export interface StreamSummary {
  outcome: 'done' | 'error' | 'cancelled';
  deltaCount: number;
  deltaChars: number;
  toolCalls: number;
}

export interface SSEEmitterOptions {
  sourceCaps: SourceCaps;
  timer: LatencyTimer;
}

/**
 * Serialize one wire event as an SSE frame.
 */
export function formatSseEvent(event: StreamWireEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export class SSEEmitter {
  private deltaCount = 0;
  private deltaChars = 0;
  private toolCalls = 0;

  constructor(
    private readonly sink: SseSink,
    private readonly telemetry: TelemetryService,
    private readonly trace: TraceContext,
    private readonly options: SSEEmitterOptions,
  ) {}

  async relay(events: AsyncIterable<AgentEvent>): Promise<StreamSummary> {
    this.emit({ type: 'status', value: 'started' });

    try {
      for await (const event of events) {
        switch (event.type) {
          case 'token':
            if (event.text) {
              this.deltaCount++;
              this.deltaChars += event.text.length;
              this.emit({ type: 'delta', value: event.text });
            }
            break;

          case 'tool-start':
            this.toolCalls++;
            break;

          case 'done':
            return this.finish(
              'done',
              collectSources(event.toolResults, this.options.sourceCaps),
            );

          case 'failed':
            this.emit({ type: 'error', message: event.error.message });
            this.telemetry.requestError(this.trace, event.error);
            return this.finish(
              'error',
              collectSources(event.toolResults, this.options.sourceCaps),
            );

          case 'state':
          case 'tool-end':
            break;
        }

        if (this.sink.isClosed()) {
          return this.cancelled();
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.emit({ type: 'error', message });
      this.telemetry.requestError(this.trace, error);
      return this.finish('error', []);
    }

    // Loop ended without a terminal event: the client aborted it.
    return this.cancelled();
  }

  private finish(outcome: 'done' | 'error', sources: Source[]): StreamSummary {
    this.emit({ type: 'done', sources });
    const summary = this.summary(outcome);
    this.telemetry.emit('stream_completed', this.trace, {
      outcome,
      deltas: summary.deltaCount,
      delta_chars: summary.deltaChars,
      tool_calls: summary.toolCalls,
      sources: sources.length,
      latency_ms: this.options.timer.breakdown(),
    });
    return summary;
  }

  private cancelled(): StreamSummary {
    const summary = this.summary('cancelled');
    this.telemetry.emit('stream_cancelled', this.trace, {
      deltas: summary.deltaCount,
      delta_chars: summary.deltaChars,
      tool_calls: summary.toolCalls,
      elapsed_ms: Math.round(this.options.timer.elapsedMs()),
    });
    return summary;
  }

  private summary(outcome: StreamSummary['outcome']): StreamSummary {
    return {
      outcome,
      deltaCount: this.deltaCount,
      deltaChars: this.deltaChars,
      toolCalls: this.toolCalls,
    };
  }

  private emit(event: StreamWireEvent): void {
    if (this.sink.isClosed()) {
      return;
    }
    this.sink.write(formatSseEvent(event));
  }
}
