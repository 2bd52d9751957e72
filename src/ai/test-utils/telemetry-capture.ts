import { TelemetryService, TraceSink } from '../telemetry/telemetry.service';

export interface TelemetryCapture {
  telemetry: TelemetryService;
  /** Every payload written to the sink, in order */
  events: Record<string, unknown>[];
  /** Event names, in order */
  names(): unknown[];
  /** Payloads of one event type */
  ofType(event: string): Record<string, unknown>[];
}

/**
 * TelemetryService over an in-memory sink.
 */
export function createTelemetryCapture(): TelemetryCapture {
  const events: Record<string, unknown>[] = [];
  const sink: TraceSink = { info: (payload) => events.push(payload) };

  return {
    telemetry: new TelemetryService(sink),
    events,
    names: () => events.map((e) => e.event),
    ofType: (event) => events.filter((e) => e.event === event),
  };
}
