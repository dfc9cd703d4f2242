import { beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import type { QueryResult, QueryResultRow } from 'pg';

import { AI_PROVIDER_TOKEN, AIService } from '../ai/index.js';
import { ChunkerService } from '../chunker/index.js';
import { RagSettingsService } from '../config/index.js';
import type { SqlExecutor } from '../database/index.js';
import { EmbeddingService } from '../embedding/index.js';
import { FORMAT_PARSERS_TOKEN, ParserService } from '../parser/index.js';
import { PlainTextParser } from '../parser/formats/plain-text.parser.js';
import { FakeAiProvider } from '../testing/fake-ai-provider.js';
import { createTestConfigService } from '../testing/test-config.js';
import { DOCUMENT_REPOSITORY_TOKEN } from './document.repository.js';
import { INDEX_STORE_TOKEN } from './index-store.js';
import { KNOWLEDGE_TRANSACTION_TOKEN } from './knowledge-transaction.js';
import { KnowledgeService } from './knowledge.service.js';
import { PostgresDocumentRepository } from './postgres-document.repository.js';
import { PostgresIndexStore } from './postgres-index.store.js';
import { PostgresKnowledgeTransactionRunner } from './postgres-knowledge-transaction.js';

/**
 * Records statements as "VERB table" and answers every query with no rows.
 * Transactions opened inside an open one join it, as on a pool client.
 */
class RecordingSql implements SqlExecutor {
  readonly statements: string[] = [];
  failOn?: string;
  private open = false;

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
  ): Promise<QueryResult<R>> {
    await Promise.resolve();
    const verb = text.trim().split(/\s+/)[0] ?? '';
    const statement = `${verb} ${/rag_\w+/.exec(text)?.[0] ?? ''}`;
    this.statements.push(statement);
    if (statement === this.failOn) {
      throw new Error(`${statement} failed`);
    }
    return { rows: [], rowCount: 0, command: verb, oid: 0, fields: [] };
  }

  async transaction<T>(work: (sql: SqlExecutor) => Promise<T>): Promise<T> {
    if (this.open) {
      return work(this);
    }
    this.open = true;
    this.statements.push('BEGIN');
    try {
      const result = await work(this);
      this.statements.push('COMMIT');
      return result;
    } catch (error) {
      this.statements.push('ROLLBACK');
      throw error;
    } finally {
      this.open = false;
    }
  }
}

describe('KnowledgeService on PostgreSQL', () => {
  let service: KnowledgeService;
  let sql: RecordingSql;

  beforeEach(async () => {
    sql = new RecordingSql();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KnowledgeService,
        ParserService,
        ChunkerService,
        EmbeddingService,
        AIService,
        RagSettingsService,
        { provide: FORMAT_PARSERS_TOKEN, useValue: [new PlainTextParser()] },
        { provide: AI_PROVIDER_TOKEN, useValue: new FakeAiProvider(8) },
        { provide: INDEX_STORE_TOKEN, useValue: new PostgresIndexStore(sql) },
        {
          provide: DOCUMENT_REPOSITORY_TOKEN,
          useValue: new PostgresDocumentRepository(sql),
        },
        {
          provide: KNOWLEDGE_TRANSACTION_TOKEN,
          useValue: new PostgresKnowledgeTransactionRunner(sql),
        },
        {
          provide: ConfigService,
          useValue: createTestConfigService({
            CHUNK_MAX_TOKENS: '8',
            CHUNK_OVERLAP_TOKENS: '2',
          }),
        },
      ],
    }).compile();

    service = module.get<KnowledgeService>(KnowledgeService);
  });

  const ingest = () =>
    service.ingest({
      sourceUri: 'file:///notes.txt',
      mimeType: 'text/plain',
      bytes: new TextEncoder().encode(
        'Alpha beta gamma. Delta epsilon zeta.\n\nEta theta iota kappa.',
      ),
    });

  it('inserts the document row before its chunks, in one transaction', async () => {
    const result = await ingest();

    expect(result).toMatchObject({ status: 'accepted', version: 1, chunkCount: 3 });
    expect(sql.statements).toEqual([
      'SELECT rag_documents',
      'SELECT rag_documents',
      'BEGIN',
      'INSERT rag_documents',
      'DELETE rag_chunks',
      'INSERT rag_chunks',
      'INSERT rag_chunks',
      'INSERT rag_chunks',
      'COMMIT',
    ]);
  });

  it('rolls the document row back when a chunk insert fails', async () => {
    sql.failOn = 'INSERT rag_chunks';

    const result = await ingest();

    expect(result).toMatchObject({
      status: 'rejected',
      code: 'INGESTION_FAILED',
      reason: 'INSERT rag_chunks failed',
    });
    expect(sql.statements.slice(2)).toEqual([
      'BEGIN',
      'INSERT rag_documents',
      'DELETE rag_chunks',
      'INSERT rag_chunks',
      'ROLLBACK',
    ]);
  });
});
