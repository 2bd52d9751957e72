import { Source, TokenUsage } from '../types/conversation';

/**
 * Wall-clock latency for one request, plus elapsed milliseconds per named
 * step (`llm`, `retrieve`, tool names). Steps never sum past `total`.
 */
export interface LatencyBreakdown {
  total: number;
  by_step: Record<string, number>;
}

/**
 * Response body of `POST /api/v1/chat`.
 */
export interface ChatResponseDto {
  /** Raw answer, including the embedded reasoning block */
  answer: string;
  sources: Source[];
  latency_ms: LatencyBreakdown;
  tokens: TokenUsage;
}

/**
 * Wire events of `POST /api/v1/chat/stream`, one per `data:` line.
 */
export type StreamWireEvent =
  | { type: 'status'; value: 'started' }
  | { type: 'delta'; value: string }
  | { type: 'error'; message: string }
  | { type: 'done'; sources: Source[] };
