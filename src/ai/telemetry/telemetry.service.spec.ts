/**
 * Unit tests for telemetry.service.ts
 */
import { Logger } from '@nestjs/common';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTestConfig, createTelemetryCapture } from '../test-utils';
import {
  createTraceSink,
  preview,
  TelemetryService,
  TraceSink,
} from './telemetry.service';

describe('preview', () => {
  it('should collapse newlines', () => {
    expect(preview('line one\nline two\r\nline three')).toBe(
      'line one line two line three',
    );
  });

  it('should truncate long values with an ellipsis', () => {
    expect(preview('x'.repeat(400))).toBe(`${'x'.repeat(320)}...`);
    expect(preview('abcdef', 3)).toBe('abc...');
  });

  it('should stringify non-string values', () => {
    expect(preview({ location: 'Cairo' })).toBe('{"location":"Cairo"}');
    expect(preview(undefined)).toBe('undefined');
  });
});

describe('TelemetryService', () => {
  it('should open a trace with a fresh identifier', () => {
    const capture = createTelemetryCapture();

    const first = capture.telemetry.startTrace('/api/v1/chat', 'hello');
    const second = capture.telemetry.startTrace('/api/v1/chat', 'hello');

    expect(first.traceId).not.toBe(second.traceId);
    expect(capture.events[0]).toEqual({
      ts: expect.any(String),
      event: 'request_received',
      trace_id: first.traceId,
      route: '/api/v1/chat',
      message_chars: 5,
      message_preview: 'hello',
      history_turns: 0,
    });
  });

  it('should preview the message at 160 characters', () => {
    const capture = createTelemetryCapture();

    capture.telemetry.startTrace('/api/v1/chat', 'm'.repeat(200), 2);

    expect(capture.events[0].message_preview).toBe(`${'m'.repeat(160)}...`);
    expect(capture.events[0].message_chars).toBe(200);
    expect(capture.events[0].history_turns).toBe(2);
  });

  it('should summarise completed requests with the reasoning flag', () => {
    const capture = createTelemetryCapture();
    const trace = { traceId: 'trace-1', route: '/api/v1/chat' };

    capture.telemetry.requestCompleted(trace, {
      answer: '<reasoning>warm</reasoning>Wear linen.',
      sources: [{ name: 'Linen', url: 'https://kb.test/linen' }],
      latency_ms: { total: 10, by_step: { retrieve: 2, llm: 5 } },
      tokens: { prompt: 12, completion: 4 },
    });

    expect(capture.ofType('request_completed')).toEqual([
      {
        ts: expect.any(String),
        event: 'request_completed',
        trace_id: 'trace-1',
        latency_ms: { total: 10, by_step: { retrieve: 2, llm: 5 } },
        tokens: { prompt: 12, completion: 4 },
        sources: 1,
        has_reasoning: true,
        answer_preview: 'Wear linen.',
      },
    ]);
  });

  it('should record request errors', () => {
    const capture = createTelemetryCapture();
    const trace = { traceId: 'trace-2', route: '/api/v1/chat' };

    capture.telemetry.requestError(trace, new TypeError('bad'));

    expect(capture.events[0]).toMatchObject({
      event: 'request_error',
      error_type: 'TypeError',
      error: 'bad',
    });
  });

  it('should never throw when the sink fails', () => {
    const sink: TraceSink = {
      info: () => {
        throw new Error('disk full');
      },
    };
    const telemetry = new TelemetryService(sink);

    expect(() => telemetry.startTrace('/api/v1/chat', 'hello')).not.toThrow();
  });
});

describe('createTraceSink', () => {
  it('should build a silent pino sink when tracing is disabled', () => {
    const sink = createTraceSink(
      createTestConfig({ tracing: { enabled: false, logPath: '' } }),
    );

    expect(() => sink.info({ event: 'request_received' })).not.toThrow();
  });

  describe('with a trace file that cannot be opened', () => {
    let dir: string;
    let stdoutWrite: jest.SpyInstance;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'trace-sink-'));
      writeFileSync(join(dir, 'afile'), 'not a directory');
      stdoutWrite = jest
        .spyOn(process.stdout, 'write')
        .mockImplementation(() => true);
    });

    afterEach(() => {
      jest.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    it('should warn once and keep tracing to stdout', async () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);
      const logPath = join(dir, 'afile', 'sub', 'tracing.log');
      const sink = createTraceSink(
        createTestConfig({ tracing: { enabled: true, logPath } }),
      );

      sink.info({ event: 'request_received' });
      for (let i = 0; i < 50 && warn.mock.calls.length === 0; i++) {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining(`Trace file ${logPath} unavailable`),
      );
      expect(() => sink.info({ event: 'request_completed' })).not.toThrow();
      expect(stdoutWrite).toHaveBeenCalledWith(
        expect.stringContaining('"event":"request_completed"'),
      );
    });
  });
});
