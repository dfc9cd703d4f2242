import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AI_PROVIDER_TOKEN, AIService } from '../ai/index.js';
import { RagSettingsService } from '../config/index.js';
import { EmbeddingService } from '../embedding/index.js';
import {
  GENERATION_RUNTIME_TOKEN,
  GenerationService,
  systemRuntime,
} from '../generation/index.js';
import {
  DOCUMENT_REPOSITORY_TOKEN,
  INDEX_STORE_TOKEN,
  InMemoryDocumentRepository,
  InMemoryIndexStore,
  type IndexEntry,
} from '../knowledge/index.js';
import { PROMPT_TEMPLATES_TOKEN, PromptService } from '../prompt/index.js';
import {
  GROUNDED_ANSWER_TEMPLATE_ID,
  groundedAnswerTemplate,
} from '../prompt/templates/grounded-answer.js';
import { RetrievalService } from '../retrieval/index.js';
import { FakeAiProvider } from '../testing/fake-ai-provider.js';
import { createTestConfigService } from '../testing/test-config.js';
import { ChatQueryError } from './chat.errors.js';
import { ChatService } from './chat.service.js';
import type { ChatStreamChunk } from './chat.types.js';
import {
  CONVERSATION_TURN_REPOSITORY_TOKEN,
  InMemoryConversationTurnRepository,
} from './conversation-turn.repository.js';

type EmbedQueryFn = EmbeddingService['embedQuery'];

const entry = (
  chunkId: string,
  documentId: string,
  sequenceIndex: number,
  text: string,
  vector: number[],
): IndexEntry => ({
  chunkId,
  documentId,
  sequenceIndex,
  text,
  tokenSpan: { start: 0, end: text.split(' ').length },
  metadata: {},
  vector,
  modelId: 'model-a',
});

describe('ChatService', () => {
  let service: ChatService;
  let retrieval: RetrievalService;
  let provider: FakeAiProvider;
  let store: InMemoryIndexStore;
  let turns: InMemoryConversationTurnRepository;
  let embedding: { embedQuery: jest.MockedFunction<EmbedQueryFn>; modelId: string };

  beforeEach(async () => {
    provider = new FakeAiProvider();
    turns = new InMemoryConversationTurnRepository();
    store = new InMemoryIndexStore();
    await store.upsertMany([
      entry('e1', 'doc-1', 0, 'solar panels convert sunlight', [1, 0]),
      entry('e2', 'doc-1', 1, 'wind turbines spin', [0, 1]),
      entry('e3', 'doc-2', 0, 'solar heating water', [0.6, 0.8]),
    ]);

    const documents = new InMemoryDocumentRepository();
    await documents.save({
      id: 'doc-1',
      sourceUri: 'file:///energy.md',
      mimeType: 'text/markdown',
      contentHash: 'hash-1',
      version: 1,
      title: 'Energy notes',
      metadata: {},
      chunkCount: 2,
      ingestedAt: new Date('2026-01-01T00:00:00Z'),
    });

    embedding = {
      embedQuery: jest.fn<EmbedQueryFn>(),
      modelId: 'model-a',
    };
    embedding.embedQuery.mockResolvedValue([1, 0]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        RetrievalService,
        PromptService,
        GenerationService,
        RagSettingsService,
        AIService,
        { provide: AI_PROVIDER_TOKEN, useValue: provider },
        { provide: EmbeddingService, useValue: embedding },
        { provide: INDEX_STORE_TOKEN, useValue: store },
        { provide: DOCUMENT_REPOSITORY_TOKEN, useValue: documents },
        { provide: CONVERSATION_TURN_REPOSITORY_TOKEN, useValue: turns },
        {
          provide: PROMPT_TEMPLATES_TOKEN,
          useValue: new Map([[GROUNDED_ANSWER_TEMPLATE_ID, groundedAnswerTemplate]]),
        },
        { provide: GENERATION_RUNTIME_TOKEN, useValue: systemRuntime },
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
    retrieval = module.get<RetrievalService>(RetrievalService);
  });

  it('answers from retrieved context and records the turn', async () => {
    const answer = await service.answer({ question: '  solar power ', topK: 2 });

    expect(answer.answer).toBe('fake answer');
    expect(answer.modelId).toBe('fake-chat');
    expect(answer.attempts).toBe(1);
    expect(answer.degraded).toEqual([]);
    expect(
      answer.sources.map((source) => [
        source.chunkId,
        source.order,
        source.sourceUri,
        source.title,
      ]),
    ).toEqual([
      ['e3', 1, undefined, undefined],
      ['e1', 2, 'file:///energy.md', 'Energy notes'],
    ]);

    const prompt = provider.generateCalls[0]?.messages[0]?.content ?? '';
    expect(prompt).toContain('solar heating water');
    expect(prompt).toContain('=== Question ===\nsolar power');

    const [turn] = await turns.listRecent(10);
    expect(turn).toMatchObject({
      id: answer.turnId,
      query: 'solar power',
      retrievedChunkIds: ['e3', 'e1'],
      promptText: prompt,
      answerText: 'fake answer',
      modelId: 'fake-chat',
      finishReason: 'stop',
      status: 'succeeded',
    });
  });

  it('streams deltas after sources and finishes with the recorded turn id', async () => {
    const session = await service.stream({ question: 'solar power', topK: 2 });
    expect(session.sources.map((source) => source.chunkId)).toEqual(['e3', 'e1']);

    const events: ChatStreamChunk[] = [];
    for await (const event of session.events) {
      events.push(event);
    }

    const [turn] = await turns.listRecent(1);
    expect(events).toEqual([
      { type: 'delta', text: 'fake' },
      { type: 'delta', text: ' answer' },
      {
        type: 'done',
        turnId: turn?.id,
        finishReason: 'stop',
        usage: undefined,
        attempts: 1,
      },
    ]);
    expect(turn?.answerText).toBe('fake answer');
    expect(turn?.status).toBe('succeeded');
  });

  it('records a cancelled turn when the consumer stops reading', async () => {
    const session = await service.stream({ question: 'solar power', topK: 2 });

    for await (const event of session.events) {
      expect(event).toEqual({ type: 'delta', text: 'fake' });
      break;
    }

    const [turn] = await turns.listRecent(1);
    expect(turn).toMatchObject({
      answerText: 'fake',
      status: 'failed',
      errorCode: 'OPERATION_CANCELLED',
      finishReason: null,
    });
  });

  it('widens short follow-up questions with the previous user question', async () => {
    const retrieve = jest.spyOn(retrieval, 'retrieve');

    await service.answer({
      question: 'and wind?',
      topK: 2,
      history: [
        { role: 'user', content: 'How do solar panels work?' },
        { role: 'assistant', content: 'They convert sunlight.' },
      ],
    });

    expect(retrieve.mock.calls[0]?.[0]).toBe('How do solar panels work? and wind?');
    const prompt = provider.generateCalls[0]?.messages[0]?.content ?? '';
    expect(prompt).toContain('=== Question ===\nand wind?');
  });

  it('reports a retrieval failure with its stage', async () => {
    jest.spyOn(store, 'searchLexical').mockRejectedValue(new Error('fts down'));
    embedding.embedQuery.mockRejectedValue(new Error('embedder down'));

    const failure = await service.answer({ question: 'solar power' }).then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ChatQueryError);
    if (!(failure instanceof ChatQueryError)) {
      return;
    }
    expect(failure.failure).toMatchObject({
      code: 'RETRIEVAL_UNAVAILABLE',
      kind: 'backend_unavailable',
      provenance: { stage: 'retrieval', retrievedChunkIds: [] },
    });
    expect(provider.generateCalls).toHaveLength(0);

    const [turn] = await turns.listRecent(1);
    expect(turn).toMatchObject({
      status: 'failed',
      errorCode: 'RETRIEVAL_UNAVAILABLE',
      promptText: '',
    });
  });

  it('reports a rejected generation with the retrieved chunks', async () => {
    provider.generateBehaviour = () => Promise.reject(new Error('bad request'));

    const failure = await service.answer({ question: 'solar power', topK: 2 }).then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ChatQueryError);
    if (!(failure instanceof ChatQueryError)) {
      return;
    }
    expect(failure.code).toBe('GENERATION_NON_RETRYABLE');
    expect(failure.failure).toMatchObject({
      kind: 'input',
      retryable: false,
      provenance: { stage: 'generation', retrievedChunkIds: ['e3', 'e1'] },
    });
    expect(provider.generateCalls).toHaveLength(1);
  });
});
