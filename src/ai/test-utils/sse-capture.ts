/**
 * SSE capture utilities for testing.
 *
 * Collects frames written to an SseSink and decodes them back into wire
 * events.
 */
import { SseSink } from '../sse-emitter';

export interface SseCapture {
  sink: SseSink;
  /** Raw frames, in write order */
  frames: string[];
  /** Decoded `data:` payloads */
  events(): unknown[];
  /** Concatenated `delta` values */
  text(): string;
  /** Close the sink as a disconnecting client would */
  close(): void;
}

function isDelta(event: unknown): event is { type: 'delta'; value: string } {
  return (
    typeof event === 'object' &&
    event !== null &&
    'type' in event &&
    event.type === 'delta' &&
    'value' in event &&
    typeof event.value === 'string'
  );
}

/**
 * Decode an SSE body into its `data:` payloads.
 */
export function parseSseFrames(body: string): unknown[] {
  return body
    .split('\n\n')
    .filter((frame) => frame.startsWith('data: '))
    .map((frame): unknown => JSON.parse(frame.slice('data: '.length)));
}

/**
 * @param closeAfterWrites - Close the sink once this many frames were written
 */
export function createSseCapture(
  closeAfterWrites = Number.POSITIVE_INFINITY,
): SseCapture {
  const frames: string[] = [];
  let closed = false;

  const events = () => parseSseFrames(frames.join(''));

  return {
    frames,
    sink: {
      write: (chunk) => {
        frames.push(chunk);
        if (frames.length >= closeAfterWrites) {
          closed = true;
        }
      },
      isClosed: () => closed,
    },
    events,
    text: () =>
      events()
        .filter(isDelta)
        .map((event) => event.value)
        .join(''),
    close: () => {
      closed = true;
    },
  };
}
