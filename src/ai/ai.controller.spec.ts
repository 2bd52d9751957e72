import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
} from '@nestjs/common';
import { AiController } from './ai.controller';
import { AgentService } from './agent.service';
import { ChatRequestDto } from './dto/chat-request.dto';
import { ChatResponseDto } from './dto/chat-response.dto';
import { SseSink, StreamSummary } from './sse-emitter';
import { TelemetryService, TraceContext } from './telemetry/telemetry.service';
import { createTelemetryCapture, TelemetryCapture } from './test-utils';
import { AgentError } from './types/agent-events';

const RESPONSE: ChatResponseDto = {
  answer: 'Wear linen.',
  sources: [{ name: 'Hot weather', url: 'https://kb.test/hot-weather' }],
  latency_ms: { total: 12, by_step: { retrieve: 2, llm: 8 } },
  tokens: { prompt: 10, completion: 5 },
};

const SUMMARY: StreamSummary = {
  outcome: 'done',
  deltaCount: 1,
  deltaChars: 11,
  toolCalls: 0,
};

function createMockResponse() {
  const writes: string[] = [];
  const closeListeners: Array<() => void> = [];
  const res = {
    writableEnded: false,
    setHeader: jest.fn(),
    flushHeaders: jest.fn(),
    write: jest.fn(),
    end: jest.fn(),
    on: jest.fn(),
  };
  res.write.mockImplementation((chunk: string) => {
    writes.push(chunk);
    return true;
  });
  res.end.mockImplementation(() => {
    res.writableEnded = true;
    return res;
  });
  res.on.mockImplementation((event: string, listener: () => void) => {
    if (event === 'close') {
      closeListeners.push(listener);
    }
    return res;
  });

  return {
    res,
    writes,
    disconnect: () => closeListeners.forEach((listener) => listener()),
  };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('AiController', () => {
  let controller: AiController;
  let capture: TelemetryCapture;
  let mockAgentService: {
    answer: jest.Mock;
    streamChat: jest.Mock;
    getStatus: jest.Mock;
  };

  beforeEach(async () => {
    capture = createTelemetryCapture();
    mockAgentService = {
      answer: jest.fn().mockResolvedValue(RESPONSE),
      streamChat: jest.fn().mockResolvedValue(SUMMARY),
      getStatus: jest.fn().mockReturnValue({
        provider: 'openai',
        model: 'test-model',
        ready: true,
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AiController],
      providers: [
        { provide: AgentService, useValue: mockAgentService },
        { provide: TelemetryService, useValue: capture.telemetry },
      ],
    }).compile();

    controller = module.get<AiController>(AiController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('getStatus', () => {
    it('should return the agent status', () => {
      expect(controller.getStatus()).toEqual({
        provider: 'openai',
        model: 'test-model',
        ready: true,
      });
    });
  });

  describe('chat', () => {
    it('should answer a validated request under a new trace', async () => {
      const result = await controller.chat({ message: 'What should I wear?' });

      expect(result).toEqual(RESPONSE);
      const [request, trace] = mockAgentService.answer.mock.calls[0];
      expect(request).toEqual({ message: 'What should I wear?', history: [] });
      expect(trace).toMatchObject({ route: '/api/v1/chat' });
      expect(capture.ofType('request_received')[0]).toMatchObject({
        route: '/api/v1/chat',
        message_preview: 'What should I wear?',
        history_turns: 0,
      });
    });

    it('should reject a blank message before the agent runs', async () => {
      await expect(controller.chat({ message: '   ' })).rejects.toThrow(
        new BadRequestException(
          'Invalid chat request: message: message must not be empty',
        ),
      );
      expect(mockAgentService.answer).not.toHaveBeenCalled();
      expect(capture.events).toHaveLength(0);
    });

    it('should reject a missing body', async () => {
      await expect(controller.chat(null)).rejects.toThrow(
        'Invalid chat request: body: Expected object, received null',
      );
    });

    it('should map a deadline failure to 504', async () => {
      mockAgentService.answer.mockRejectedValue(
        new AgentError('DEADLINE_EXCEEDED', 'Request exceeded the 20 ms deadline'),
      );

      const error = await rejectionOf(controller.chat({ message: 'Hi' }));

      expect(error).toBeInstanceOf(HttpException);
      expect(error instanceof HttpException && error.getStatus()).toBe(
        HttpStatus.GATEWAY_TIMEOUT,
      );
      expect(error instanceof HttpException && error.getResponse()).toEqual({
        statusCode: 504,
        message: 'Request exceeded the 20 ms deadline',
        error: 'DEADLINE_EXCEEDED',
      });
    });

    it('should map other loop failures to 500', async () => {
      mockAgentService.answer.mockRejectedValue(
        new AgentError('TOOL_LOOP_EXCEEDED', 'Tool loop exceeded 6 cycles'),
      );

      const error = await rejectionOf(controller.chat({ message: 'Hi' }));

      expect(error instanceof HttpException && error.getStatus()).toBe(
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    });

    it('should map unexpected errors to 500', async () => {
      mockAgentService.answer.mockRejectedValue(new Error('boom'));

      await expect(controller.chat({ message: 'Hi' })).rejects.toThrow(
        new InternalServerErrorException('boom'),
      );
    });
  });

  describe('stream', () => {
    it('should set SSE headers and relay writes to the response', async () => {
      const { res, writes } = createMockResponse();
      mockAgentService.streamChat.mockImplementation(
        async (
          _request: ChatRequestDto,
          _trace: TraceContext,
          sink: SseSink,
        ): Promise<StreamSummary> => {
          sink.write('data: {"type":"status","value":"started"}\n\n');
          return SUMMARY;
        },
      );

      await controller.stream({ message: 'Hello' }, res);

      expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream');
      expect(res.setHeader).toHaveBeenCalledWith('Cache-Control', 'no-cache');
      expect(res.setHeader).toHaveBeenCalledWith('Connection', 'keep-alive');
      expect(res.setHeader).toHaveBeenCalledWith('X-Accel-Buffering', 'no');
      expect(res.flushHeaders).toHaveBeenCalled();
      expect(writes).toEqual(['data: {"type":"status","value":"started"}\n\n']);
      expect(res.end).toHaveBeenCalledTimes(1);
      expect(capture.ofType('request_received')[0]).toMatchObject({
        route: '/api/v1/chat/stream',
      });
    });

    it('should reject invalid bodies before writing headers', async () => {
      const { res } = createMockResponse();

      await expect(controller.stream({ history: [] }, res)).rejects.toThrow(
        'Invalid chat request: message: message is required',
      );
      expect(res.setHeader).not.toHaveBeenCalled();
      expect(mockAgentService.streamChat).not.toHaveBeenCalled();
    });

    it('should abort the agent and close the sink when the client disconnects', async () => {
      const { res, disconnect } = createMockResponse();
      let closedBefore: boolean | undefined;
      let closedAfter: boolean | undefined;
      let aborted: boolean | undefined;

      mockAgentService.streamChat.mockImplementation(
        async (
          _request: ChatRequestDto,
          _trace: TraceContext,
          sink: SseSink,
          signal: AbortSignal,
        ): Promise<StreamSummary> => {
          closedBefore = sink.isClosed();
          disconnect();
          closedAfter = sink.isClosed();
          aborted = signal.aborted;
          return { ...SUMMARY, outcome: 'cancelled' };
        },
      );

      await controller.stream({ message: 'Hello' }, res);

      expect(closedBefore).toBe(false);
      expect(closedAfter).toBe(true);
      expect(aborted).toBe(true);
    });
  });
});
