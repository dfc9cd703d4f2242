import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { AI_PROVIDER_TOKEN, AIService } from '../ai/index.js';
import { ChunkerService } from '../chunker/index.js';
import { RagSettingsService } from '../config/index.js';
import { EmbeddingService } from '../embedding/index.js';
import { FORMAT_PARSERS_TOKEN, ParserService } from '../parser/index.js';
import { MarkdownParser } from '../parser/formats/markdown.parser.js';
import { PlainTextParser } from '../parser/formats/plain-text.parser.js';
import { FakeAiProvider } from '../testing/fake-ai-provider.js';
import { createTestConfigService } from '../testing/test-config.js';
import {
  DOCUMENT_REPOSITORY_TOKEN,
  InMemoryDocumentRepository,
} from './document.repository.js';
import { INDEX_STORE_TOKEN } from './index-store.js';
import { InMemoryIndexStore } from './in-memory-index.store.js';
import {
  InMemoryKnowledgeTransactionRunner,
  KNOWLEDGE_TRANSACTION_TOKEN,
} from './knowledge-transaction.js';
import {
  KnowledgeService,
  contentHashOf,
  documentIdFor,
} from './knowledge.service.js';

const encode = (text: string) => new TextEncoder().encode(text);

const FIRST_VERSION =
  'Alpha beta gamma. Delta epsilon zeta.\n\nEta theta iota kappa.';
const SECOND_VERSION = 'Lambda mu nu.';

describe('KnowledgeService', () => {
  let service: KnowledgeService;
  let provider: FakeAiProvider;
  let store: InMemoryIndexStore;
  let documents: InMemoryDocumentRepository;

  const createService = async (env: Record<string, string> = {}) => {
    provider = new FakeAiProvider(16);
    store = new InMemoryIndexStore();
    documents = new InMemoryDocumentRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KnowledgeService,
        ParserService,
        ChunkerService,
        EmbeddingService,
        AIService,
        RagSettingsService,
        {
          provide: FORMAT_PARSERS_TOKEN,
          useValue: [new PlainTextParser(), new MarkdownParser()],
        },
        { provide: AI_PROVIDER_TOKEN, useValue: provider },
        { provide: INDEX_STORE_TOKEN, useValue: store },
        { provide: DOCUMENT_REPOSITORY_TOKEN, useValue: documents },
        {
          provide: KNOWLEDGE_TRANSACTION_TOKEN,
          useValue: new InMemoryKnowledgeTransactionRunner(documents, store),
        },
        {
          provide: ConfigService,
          useValue: createTestConfigService({
            CHUNK_MAX_TOKENS: '8',
            CHUNK_OVERLAP_TOKENS: '2',
            ...env,
          }),
        },
      ],
    }).compile();

    service = module.get<KnowledgeService>(KnowledgeService);
  };

  beforeEach(async () => {
    await createService();
  });

  it('parses, chunks, embeds and indexes a document', async () => {
    const result = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
      title: 'Notes',
    });

    const expectedId = documentIdFor(
      'file:///notes.txt',
      contentHashOf(encode(FIRST_VERSION)),
    );
    expect(result).toEqual({
      documentId: expectedId,
      sourceUri: 'file:///notes.txt',
      status: 'accepted',
      version: 1,
      chunkCount: 3,
    });
    expect(store.size).toBe(3);
    expect(provider.embedCalls).toEqual([
      [
        'Alpha beta gamma.',
        'beta gamma. Delta epsilon zeta.',
        'epsilon zeta. Eta theta iota kappa.',
      ],
    ]);

    const [document] = await service.listDocuments();
    expect(document).toMatchObject({
      id: expectedId,
      title: 'Notes',
      version: 1,
      chunkCount: 3,
    });
  });

  it('treats re-ingesting unchanged bytes as a no-op', async () => {
    const input = {
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    };
    const first = await service.ingest(input);
    const second = await service.ingest(input);

    expect(second).toMatchObject({
      documentId: first.documentId,
      status: 'accepted',
      version: 1,
      chunkCount: 3,
      unchanged: true,
    });
    expect(provider.embedCalls).toHaveLength(1);
    expect(store.size).toBe(3);
  });

  it('supersedes the previous version of the same source', async () => {
    const first = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });
    const second = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(SECOND_VERSION),
    });

    expect(second.documentId).not.toBe(first.documentId);
    expect(second).toMatchObject({ status: 'accepted', version: 2, chunkCount: 1 });
    expect(store.size).toBe(1);
    await expect(documents.findById(first.documentId)).resolves.toBeNull();
    const listed = await service.listDocuments();
    expect(listed.map((document) => document.id)).toEqual([second.documentId]);
  });

  it('rejects one document without affecting the others', async () => {
    const results = await service.ingestMany([
      {
        sourceUri: 'file:///archive.zip',
        mimeType: 'application/zip',
        bytes: encode('PK'),
      },
      {
        sourceUri: 'file:///guide.md',
        mimeType: 'text/markdown',
        bytes: encode('# Guide\n\nRead me.'),
      },
    ]);

    expect(results[0]).toMatchObject({
      sourceUri: 'file:///archive.zip',
      status: 'rejected',
      code: 'PARSER_UNSUPPORTED_FORMAT',
      retryable: false,
    });
    expect(results[1]).toMatchObject({
      sourceUri: 'file:///guide.md',
      status: 'accepted',
      version: 1,
    });
    await expect(service.listDocuments()).resolves.toHaveLength(1);
  });

  it('keeps the indexed version when embedding fails', async () => {
    await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });
    provider.embedFailure = new Error('upstream unavailable');

    const result = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(SECOND_VERSION),
    });

    expect(result).toMatchObject({
      status: 'rejected',
      code: 'EMBEDDING_BACKEND_ERROR',
      retryable: true,
    });
    expect(store.size).toBe(3);
    const [document] = await service.listDocuments();
    expect(document?.version).toBe(1);
  });

  it('saves the document row before its entries and drops the old version last', async () => {
    const first = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });

    const calls: string[] = [];
    const save = documents.save.bind(documents);
    const remove = documents.remove.bind(documents);
    const replace = store.replaceDocumentEntries.bind(store);
    jest.spyOn(documents, 'save').mockImplementation(async (document) => {
      calls.push(`save ${document.id}`);
      return save(document);
    });
    jest.spyOn(documents, 'remove').mockImplementation(async (id) => {
      calls.push(`remove ${id}`);
      return remove(id);
    });
    jest
      .spyOn(store, 'replaceDocumentEntries')
      .mockImplementation(async (documentId, entries, options) => {
        calls.push(
          `replace ${documentId} superseding ${options?.supersededDocumentIds?.join(',') ?? ''}`,
        );
        return replace(documentId, entries, options);
      });

    const second = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(SECOND_VERSION),
    });

    expect(calls).toEqual([
      `save ${second.documentId}`,
      `replace ${second.documentId} superseding ${first.documentId}`,
      `remove ${first.documentId}`,
    ]);
  });

  it('rolls back the document row when writing its entries fails', async () => {
    const first = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });
    jest
      .spyOn(store, 'replaceDocumentEntries')
      .mockRejectedValue(new Error('disk full'));

    const result = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(SECOND_VERSION),
    });

    expect(result).toMatchObject({
      status: 'rejected',
      code: 'INGESTION_FAILED',
      reason: 'disk full',
    });
    const listed = await service.listDocuments();
    expect(listed.map((document) => document.id)).toEqual([first.documentId]);
    expect(store.size).toBe(3);
  });

  it('rejects documents above the size limit', async () => {
    await createService({ MAX_DOCUMENT_BYTES: '8' });

    const result = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });

    expect(result).toMatchObject({
      status: 'rejected',
      code: 'INGESTION_DOCUMENT_TOO_LARGE',
    });
    expect(provider.embedCalls).toHaveLength(0);
  });

  it('removes a document together with its entries', async () => {
    const { documentId } = await service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: encode(FIRST_VERSION),
    });

    await expect(service.removeDocument(documentId)).resolves.toBe(true);
    expect(store.size).toBe(0);
    await expect(service.removeDocument(documentId)).resolves.toBe(false);
  });
});
