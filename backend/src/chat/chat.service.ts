import { randomUUID } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { AIService } from '../ai/index.js';
import { errorMessage, errorStack } from '../common/index.js';
import { RagSettingsService, type RagSettings } from '../config/index.js';
import { GenerationService, type Answer } from '../generation/index.js';
import {
  DOCUMENT_REPOSITORY_TOKEN,
  type DocumentRepository,
  type KnowledgeDocument,
} from '../knowledge/index.js';
import { PromptService, type BuiltPrompt } from '../prompt/index.js';
import {
  RetrievalService,
  type RetrievalResult,
} from '../retrieval/index.js';
import { ChatQueryError, toQueryFailure } from './chat.errors.js';
import type {
  ChatAnswer,
  ChatSource,
  ChatStreamChunk,
  ChatStreamSession,
  ConversationTurn,
  QueryStage,
} from './chat.types.js';
import {
  CONVERSATION_TURN_REPOSITORY_TOKEN,
  type ConversationTurnRepository,
} from './conversation-turn.repository.js';
import type { ChatRequestDto } from './dto/chat-request.dto.js';
import { buildContextAwareQuestion } from './follow-up-query.js';

export interface ChatOptions {
  signal?: AbortSignal;
}

interface PreparedQuery {
  question: string;
  settings: RagSettings;
  retrieval: RetrievalResult;
  prompt: BuiltPrompt;
  sources: ChatSource[];
  startedAt: number;
}

type QueryProgress = Pick<PreparedQuery, 'question' | 'settings' | 'startedAt'> &
  Partial<Pick<PreparedQuery, 'retrieval' | 'prompt'>>;

type TurnOutcome = Pick<
  ConversationTurn,
  'answerText' | 'modelId' | 'finishReason' | 'status' | 'errorCode'
>;

/**
 * Answers a question end to end: retrieve, assemble the prompt, generate,
 * and record the turn. One settings snapshot is taken per query so a reload
 * mid-flight never mixes configurations.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly retrieval: RetrievalService,
    private readonly prompt: PromptService,
    private readonly generation: GenerationService,
    private readonly settings: RagSettingsService,
    private readonly aiService: AIService,
    @Inject(DOCUMENT_REPOSITORY_TOKEN)
    private readonly documents: DocumentRepository,
    @Inject(CONVERSATION_TURN_REPOSITORY_TOKEN)
    private readonly turns: ConversationTurnRepository,
  ) {}

  async answer(
    request: ChatRequestDto,
    options: ChatOptions = {},
  ): Promise<ChatAnswer> {
    const prepared = await this.prepare(request, options.signal);

    let answer: Answer;
    try {
      answer = await this.generation.generate(prepared.prompt.text, {
        signal: options.signal,
        settings: prepared.settings.generation,
      });
    } catch (error) {
      throw await this.fail(prepared, 'generation', error, '');
    }

    const turn = await this.recordTurn(prepared, {
      answerText: answer.text,
      modelId: answer.modelId,
      finishReason: answer.finishReason,
      status: 'succeeded',
    });
    return {
      turnId: turn.id,
      answer: answer.text,
      sources: prepared.sources,
      degraded: prepared.retrieval.degraded,
      finishReason: answer.finishReason,
      usage: answer.usage,
      modelId: answer.modelId,
      attempts: answer.attempts,
    };
  }

  /**
   * Retrieval and prompt assembly happen before this resolves, so callers
   * can send sources first; generation starts when `events` is iterated.
   */
  async stream(
    request: ChatRequestDto,
    options: ChatOptions = {},
  ): Promise<ChatStreamSession> {
    const prepared = await this.prepare(request, options.signal);
    return {
      sources: prepared.sources,
      degraded: prepared.retrieval.degraded,
      events: this.relay(prepared, options.signal),
    };
  }

  listTurns(limit: number): Promise<ConversationTurn[]> {
    return this.turns.listRecent(limit);
  }

  private async *relay(
    prepared: PreparedQuery,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<ChatStreamChunk> {
    const generation = this.generation.stream(prepared.prompt.text, {
      signal,
      settings: prepared.settings.generation,
    });
    let answerText = '';
    let recorded = false;

    try {
      for await (const event of generation) {
        if (event.type === 'delta') {
          answerText += event.text;
          yield event;
          continue;
        }
        const turn = await this.recordTurn(prepared, {
          answerText,
          modelId: event.modelId,
          finishReason: event.finishReason,
          status: 'succeeded',
        });
        recorded = true;
        yield {
          type: 'done',
          turnId: turn.id,
          finishReason: event.finishReason,
          usage: event.usage,
          attempts: event.attempts,
        };
      }
    } catch (error) {
      recorded = true;
      throw await this.fail(prepared, 'generation', error, answerText);
    } finally {
      // consumer stopped reading before the answer completed
      if (!recorded) {
        await this.recordTurn(prepared, {
          answerText,
          modelId: this.modelIdFor(prepared.settings),
          finishReason: null,
          status: 'failed',
          errorCode: 'OPERATION_CANCELLED',
        });
      }
    }
  }

  private async prepare(
    request: ChatRequestDto,
    signal: AbortSignal | undefined,
  ): Promise<PreparedQuery> {
    const startedAt = Date.now();
    const settings = this.settings.current();
    const question = request.question.trim();
    const searchQuery = buildContextAwareQuestion(question, request.history);
    const k = request.topK ?? settings.retrieval.defaultTopK;
    const progress: QueryProgress = { question, settings, startedAt };

    let retrieval: RetrievalResult;
    try {
      retrieval = await this.retrieval.retrieve(searchQuery, k, {
        signal,
        settings: settings.retrieval,
      });
    } catch (error) {
      throw await this.fail(progress, 'retrieval', error, '');
    }

    let prompt: BuiltPrompt;
    try {
      const template = this.prompt.getTemplate(settings.prompt.templateId);
      prompt = this.prompt.buildPrompt(question, retrieval.results, template, {
        history: request.history,
        tokenBudget: settings.prompt.contextTokenBudget,
      });
    } catch (error) {
      throw await this.fail({ ...progress, retrieval }, 'prompt', error, '');
    }

    const sources = await this.buildSources(retrieval, prompt);
    this.logger.debug(
      `Prepared prompt with ${prompt.includedChunkIds.length}/${retrieval.results.length} chunks${prompt.truncated ? ' (truncated)' : ''}`,
    );

    return { question, settings, retrieval, prompt, sources, startedAt };
  }

  private async buildSources(
    retrieval: RetrievalResult,
    prompt: BuiltPrompt,
  ): Promise<ChatSource[]> {
    const included = new Set(prompt.includedChunkIds);
    const chunks = retrieval.results.filter((chunk) =>
      included.has(chunk.chunkId),
    );
    const documents = new Map<string, KnowledgeDocument>();
    for (const id of new Set(chunks.map((chunk) => chunk.documentId))) {
      const document = await this.documents.findById(id);
      if (document) {
        documents.set(id, document);
      }
    }

    return chunks.map((chunk, index) => {
      const document = documents.get(chunk.documentId);
      return {
        chunkId: chunk.chunkId,
        documentId: chunk.documentId,
        sourceUri: document?.sourceUri,
        title: document?.title,
        order: index + 1,
        score: chunk.score,
        source: chunk.source,
      };
    });
  }

  private async fail(
    progress: QueryProgress,
    stage: QueryStage,
    error: unknown,
    answerText: string,
  ): Promise<ChatQueryError> {
    const retrievedChunkIds =
      progress.retrieval?.results.map((chunk) => chunk.chunkId) ?? [];
    const failure = toQueryFailure(error, stage, retrievedChunkIds);

    if (failure.kind === 'internal') {
      this.logger.error(
        `Query failed during ${stage}: ${failure.message}`,
        errorStack(error),
      );
    } else {
      this.logger.warn(
        `Query failed during ${stage} (${failure.code}): ${failure.message}`,
      );
    }

    await this.recordTurn(progress, {
      answerText,
      modelId: this.modelIdFor(progress.settings),
      finishReason: null,
      status: 'failed',
      errorCode: failure.code,
    });
    return new ChatQueryError(failure, { cause: error });
  }

  private async recordTurn(
    progress: QueryProgress,
    outcome: TurnOutcome,
  ): Promise<ConversationTurn> {
    const turn: ConversationTurn = {
      id: randomUUID(),
      query: progress.question,
      retrievedChunkIds:
        progress.retrieval?.results.map((chunk) => chunk.chunkId) ?? [],
      promptText: progress.prompt?.text ?? '',
      latencyMs: Date.now() - progress.startedAt,
      createdAt: new Date(),
      ...outcome,
    };

    try {
      await this.turns.append(turn);
    } catch (error) {
      // answers are still delivered when the audit log is unavailable
      this.logger.error(
        `Failed to record conversation turn ${turn.id}: ${errorMessage(error)}`,
        errorStack(error),
      );
    }
    return turn;
  }

  private modelIdFor(settings: RagSettings): string {
    return settings.generation.model ?? this.aiService.chatModel;
  }
}
