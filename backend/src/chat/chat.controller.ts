import { randomUUID } from 'node:crypto';
import {
  BadRequestException,
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  Logger,
  ParseIntPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { errorMessage, errorStack, httpStatusFor } from '../common/index.js';
import { ChatQueryError, toQueryFailure } from './chat.errors.js';
import {
  SSE_HEADERS,
  encodeSseEvent,
  sourcesEvent,
  type ChatSseEvent,
} from './chat-sse.js';
import { ChatService } from './chat.service.js';
import type { QueryFailure } from './chat.types.js';
import { chatRequestSchema } from './dto/chat-request.dto.js';

const EMPTY_ANSWER_FALLBACK =
  'The model returned an empty answer. Please retry or rephrase the question.';

const MAX_TURNS_PAGE = 100;

@Controller({
  path: 'api/v1/chat',
})
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @Get('turns')
  async listTurns(
    @Query('limit', new DefaultValuePipe(20), ParseIntPipe) limit: number,
  ) {
    if (limit < 1 || limit > MAX_TURNS_PAGE) {
      throw new BadRequestException(
        `limit must be between 1 and ${MAX_TURNS_PAGE}`,
      );
    }
    return { data: await this.chatService.listTurns(limit) };
  }

  @Post()
  async createChat(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const requestId = randomUUID();

    const parsed = chatRequestSchema.safeParse(body);
    if (!parsed.success) {
      const message = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
        .join('; ');
      this.logger.warn(`Chat request ${requestId} rejected: ${message}`);
      res.status(400).json({
        type: 'error',
        data: {
          code: 'CHAT_BAD_REQUEST',
          kind: 'input',
          retryable: false,
          message,
          requestId,
        },
      });
      return;
    }
    const payload = parsed.data;

    // a client that disconnects cancels retrieval and generation
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    this.logger.debug(
      `Chat request ${requestId} started (stream=${payload.stream}, topK=${payload.topK ?? 'default'})`,
    );

    if (!payload.stream) {
      try {
        const answer = await this.chatService.answer(payload, {
          signal: controller.signal,
        });
        res.status(200).json({ ...answer, requestId });
      } catch (error) {
        const failure = this.describeFailure(requestId, error);
        res.status(httpStatusFor(failure)).json({
          type: 'error',
          data: { ...failure, requestId },
        });
      }
      return;
    }

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders?.();

    const writeEvent = (event: ChatSseEvent) => {
      res.write(encodeSseEvent(event));
    };

    try {
      const session = await this.chatService.stream(payload, {
        signal: controller.signal,
      });
      const { sources, events } = session;

      writeEvent(sourcesEvent(session));

      let hasDelta = false;
      for await (const event of events) {
        if (event.type === 'delta') {
          if (event.text.trim().length > 0) {
            hasDelta = true;
          }
          writeEvent({ type: 'delta', data: event.text });
          continue;
        }

        if (!hasDelta) {
          this.logger.warn(
            `Chat request ${requestId} completed without deltas (sources: ${sources.length})`,
          );
          writeEvent({ type: 'delta', data: EMPTY_ANSWER_FALLBACK });
        }
        writeEvent({
          type: 'done',
          data: {
            turnId: event.turnId,
            finishReason: event.finishReason,
            attempts: event.attempts,
          },
        });
      }
    } catch (error) {
      const failure = this.describeFailure(requestId, error);
      writeEvent({ type: 'error', data: { ...failure, requestId } });
    } finally {
      res.end();
    }
  }

  private describeFailure(requestId: string, error: unknown): QueryFailure {
    if (error instanceof ChatQueryError) {
      this.logger.warn(
        `Chat request ${requestId} failed [${error.code}]: ${error.message}`,
      );
      return error.failure;
    }

    this.logger.error(
      `Chat request ${requestId} failed: ${errorMessage(error)}`,
      errorStack(error),
    );
    return toQueryFailure(error, 'generation');
  }
}
