import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { AgentService, AgentStatus } from './agent.service';
import { ChatRequestDto, ChatRequestSchema } from './dto/chat-request.dto';
import { ChatResponseDto } from './dto/chat-response.dto';
import { SseSink } from './sse-emitter';
import { TelemetryService } from './telemetry/telemetry.service';
import { AgentError } from './types/agent-events';

const CHAT_ROUTE = '/api/v1/chat';
const STREAM_ROUTE = '/api/v1/chat/stream';

/**
 * The parts of an Express response the streaming route writes to.
 */
export type SseResponse = Pick<
  Response,
  'setHeader' | 'flushHeaders' | 'write' | 'end' | 'on' | 'writableEnded'
>;

/**
 * Validate a chat request body.
 *
 * @throws BadRequestException listing every invalid field
 */
export function parseChatRequest(body: unknown): ChatRequestDto {
  const result = ChatRequestSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new BadRequestException(`Invalid chat request: ${issues}`);
  }
  return result.data;
}

function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof AgentError) {
    const status =
      error.code === 'DEADLINE_EXCEEDED'
        ? HttpStatus.GATEWAY_TIMEOUT
        : HttpStatus.INTERNAL_SERVER_ERROR;
    return new HttpException(
      { statusCode: status, message: error.message, error: error.code },
      status,
    );
  }
  return new InternalServerErrorException(
    error instanceof Error ? error.message : 'Chat processing failed',
  );
}

/**
 * Chat endpoints.
 *
 * Endpoints:
 * - POST /api/v1/chat: Answer in one JSON response
 * - POST /api/v1/chat/stream: Stream the answer as Server-Sent Events
 * - GET /api/v1/chat/status: Provider and readiness
 */
@Controller('api/v1/chat')
export class AiController {
  private readonly logger = new Logger(AiController.name);

  constructor(
    private readonly agentService: AgentService,
    private readonly telemetry: TelemetryService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async chat(@Body() body: unknown): Promise<ChatResponseDto> {
    const request = parseChatRequest(body);
    const trace = this.telemetry.startTrace(
      CHAT_ROUTE,
      request.message,
      request.history.length,
    );

    try {
      return await this.agentService.answer(request, trace);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Stream a chat response.
   *
   * Validation errors are returned as 400 before any SSE header is written.
   * Once streaming, failures arrive as `error` then `done` events.
   */
  @Post('stream')
  async stream(
    @Body() body: unknown,
    @Res() res: SseResponse,
  ): Promise<void> {
    const request = parseChatRequest(body);
    const trace = this.telemetry.startTrace(
      STREAM_ROUTE,
      request.message,
      request.history.length,
    );

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const abort = new AbortController();
    let closed = false;
    res.on('close', () => {
      closed = true;
      abort.abort();
    });

    const sink: SseSink = {
      write: (chunk) => {
        res.write(chunk);
      },
      isClosed: () => closed || res.writableEnded,
    };

    const summary = await this.agentService.streamChat(
      request,
      trace,
      sink,
      abort.signal,
    );
    this.logger.log(
      `Stream ${trace.traceId} ${summary.outcome}: ${summary.deltaCount} deltas, ${summary.toolCalls} tool calls`,
    );

    if (!res.writableEnded) {
      res.end();
    }
  }

  @Get('status')
  getStatus(): AgentStatus {
    return this.agentService.getStatus();
  }
}
