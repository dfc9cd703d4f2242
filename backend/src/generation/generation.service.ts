import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AIService,
  type AiMessage,
  type AiStreamPart,
  type TokenUsage,
} from '../ai/index.js';
import {
  OperationCancelledError,
  errorMessage,
  errorStack,
} from '../common/index.js';
import { RagSettingsService, type GenerationSettings } from '../config/index.js';
import { AttemptScope } from './attempt-scope.js';
import { backoffDelay } from './backoff.js';
import { classifyGenerationError } from './classify-error.js';
import { GenerationRequest } from './generation-request.js';
import { GenerationStream } from './generation-stream.js';
import {
  GenerationFailedError,
  GenerationTimeoutError,
  NonRetryableGenerationError,
} from './generation.errors.js';
import {
  GENERATION_RUNTIME_TOKEN,
  type Answer,
  type GenerateOptions,
  type GenerationEvent,
  type GenerationRuntime,
} from './generation.types.js';

interface AttemptContext {
  request: GenerationRequest;
  settings: GenerationSettings;
  deadlineAt: number;
  signal?: AbortSignal;
}

/**
 * Calls the generative backend with retry, backoff and an overall deadline.
 *
 * Every request runs through pending -> in_flight -> succeeded | failed |
 * timed_out. Only transient failures are retried, and a streamed answer is
 * only retried while nothing has been emitted yet.
 */
@Injectable()
export class GenerationService {
  private readonly logger = new Logger(GenerationService.name);

  constructor(
    private readonly aiService: AIService,
    private readonly settings: RagSettingsService,
    @Inject(GENERATION_RUNTIME_TOKEN)
    private readonly runtime: GenerationRuntime,
  ) {}

  async generate(prompt: string, options: GenerateOptions = {}): Promise<Answer> {
    const context = this.openRequest(options);
    const { request, settings } = context;

    for (;;) {
      const scope = this.beginAttempt(context);
      try {
        const result = await this.aiService.generateText({
          model: settings.model,
          messages: toMessages(prompt),
          temperature: settings.temperature,
          maxTokens: settings.maxOutputTokens,
          abortSignal: scope.signal,
        });
        request.transition('succeeded');
        return {
          text: result.content,
          finishReason: result.finishReason,
          usage: result.usage,
          modelId: result.model,
          attempts: request.attempts,
        };
      } catch (error) {
        await this.handleFailure(context, scope, error, false);
      } finally {
        scope.dispose();
      }
    }
  }

  stream(prompt: string, options: GenerateOptions = {}): GenerationStream {
    const context = this.openRequest(options);
    return new GenerationStream(
      context.request,
      (signal) => this.runStream(prompt, { ...context, signal }),
      options.signal,
    );
  }

  private async *runStream(
    prompt: string,
    context: AttemptContext,
  ): AsyncGenerator<GenerationEvent> {
    const { request, settings } = context;

    try {
      for (;;) {
        const scope = this.beginAttempt(context);
        const iterator = this.aiService
          .streamText({
            model: settings.model,
            messages: toMessages(prompt),
            temperature: settings.temperature,
            maxTokens: settings.maxOutputTokens,
            abortSignal: scope.signal,
          })
          [Symbol.asyncIterator]();

        let emitted = false;
        let finishReason: string | null = null;
        let usage: TokenUsage | undefined;

        try {
          for (;;) {
            const next: IteratorResult<AiStreamPart> = await iterator.next();
            if (next.done) {
              break;
            }
            const part = next.value;
            if (part.type === 'text-delta') {
              if (part.text.length === 0) {
                continue;
              }
              emitted = true;
              yield { type: 'delta', text: part.text };
            } else {
              finishReason = part.finishReason;
              usage = part.usage;
            }
          }

          request.transition('succeeded');
          yield {
            type: 'done',
            finishReason,
            usage,
            modelId: settings.model ?? this.aiService.chatModel,
            attempts: request.attempts,
          };
          return;
        } catch (error) {
          await this.handleFailure(context, scope, error, emitted);
        } finally {
          scope.dispose();
          await iterator.return?.();
        }
      }
    } finally {
      // the consumer stopped early (break, return() or cancel())
      if (!request.settled) {
        request.transition('failed');
        this.logger.debug(`Generation ${request.id} closed by consumer`);
      }
    }
  }

  private openRequest(options: GenerateOptions): AttemptContext {
    const settings = options.settings ?? this.settings.current().generation;
    const request = new GenerationRequest(this.runtime.now());
    request.transition('in_flight');
    return {
      request,
      settings,
      deadlineAt: request.startedAt + settings.deadlineMs,
      signal: options.signal,
    };
  }

  private beginAttempt(context: AttemptContext): AttemptScope {
    const { request, settings, deadlineAt, signal } = context;

    if (signal?.aborted) {
      request.transition('failed');
      throw new OperationCancelledError('generation', { cause: signal.reason });
    }
    const remaining = deadlineAt - this.runtime.now();
    if (remaining <= 0) {
      request.transition('timed_out');
      throw new GenerationTimeoutError(settings.deadlineMs, request.attempts);
    }

    request.beginAttempt();
    return new AttemptScope(signal, remaining);
  }

  /**
   * Decides what a failed attempt means: rethrows a terminal error, or waits
   * out the backoff so the caller can start the next attempt.
   */
  private async handleFailure(
    context: AttemptContext,
    scope: AttemptScope,
    error: unknown,
    emitted: boolean,
  ): Promise<void> {
    const { request, settings, deadlineAt, signal } = context;
    const attempts = request.attempts;

    if (scope.timedOut) {
      request.transition('timed_out');
      throw new GenerationTimeoutError(settings.deadlineMs, attempts, { cause: error });
    }
    if (signal?.aborted) {
      request.transition('failed');
      throw new OperationCancelledError('generation', { cause: error });
    }

    if (classifyGenerationError(error) === 'permanent') {
      request.transition('failed');
      this.logger.error(
        `Generation ${request.id} failed permanently: ${errorMessage(error)}`,
        errorStack(error),
      );
      throw new NonRetryableGenerationError(
        `Generation rejected by backend: ${errorMessage(error)}`,
        { cause: error, attempts },
      );
    }

    if (emitted) {
      request.transition('failed');
      throw new GenerationFailedError(
        `Generation stream interrupted after output started: ${errorMessage(error)}`,
        { cause: error, attempts },
      );
    }

    if (attempts > settings.maxRetries) {
      request.transition('failed');
      this.logger.error(
        `Generation ${request.id} gave up after ${attempts} attempts: ${errorMessage(error)}`,
      );
      throw new GenerationFailedError(
        `Generation failed after ${attempts} attempts: ${errorMessage(error)}`,
        { cause: error, attempts },
      );
    }

    const delay = backoffDelay(attempts - 1, settings, () => this.runtime.random());
    if (this.runtime.now() + delay >= deadlineAt) {
      request.transition('timed_out');
      throw new GenerationTimeoutError(settings.deadlineMs, attempts, { cause: error });
    }

    this.logger.warn(
      `Generation ${request.id} attempt ${attempts} failed (${errorMessage(error)}), retrying in ${Math.round(delay)}ms`,
    );

    try {
      await this.runtime.sleep(delay, signal);
    } catch (sleepError) {
      request.transition('failed');
      throw sleepError instanceof OperationCancelledError
        ? sleepError
        : new OperationCancelledError('generation', { cause: sleepError });
    }
  }
}

function toMessages(prompt: string): AiMessage[] {
  return [{ role: 'user', content: prompt }];
}
