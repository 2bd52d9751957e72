/**
 * AI Module Test Utilities
 *
 * ```typescript
 * import {
 *   ScriptedCompletionService,
 *   createToolHarness,
 *   createTestConfig,
 * } from './test-utils';
 * ```
 */

export {
  ScriptedCompletionService,
  answerTurn,
  toolCallTurn,
  type ScriptStep,
  type ScriptedToolCall,
  type ScriptedTurn,
} from './fake-completion';

export {
  MOCK_PASSAGES,
  MOCK_QUANTUM_ANSWER,
  MOCK_WEATHER_REPORT,
  createToolHarness,
  type ToolHarness,
} from './mock-tools';

export { createTestConfig, type TestConfigOverrides } from './test-config';

export {
  createSseCapture,
  parseSseFrames,
  type SseCapture,
} from './sse-capture';

export { createTelemetryCapture, type TelemetryCapture } from './telemetry-capture';
