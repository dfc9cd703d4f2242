import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChunkerModule } from '../chunker/index.js';
import type { AppConfig, IndexConfig } from '../config/index.js';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import { EmbeddingModule } from '../embedding/index.js';
import { ParserModule } from '../parser/index.js';
import {
  DOCUMENT_REPOSITORY_TOKEN,
  InMemoryDocumentRepository,
  type DocumentRepository,
} from './document.repository.js';
import { INDEX_STORE_TOKEN, type IndexStore } from './index-store.js';
import { InMemoryIndexStore } from './in-memory-index.store.js';
import {
  InMemoryKnowledgeTransactionRunner,
  KNOWLEDGE_TRANSACTION_TOKEN,
  type KnowledgeTransactionRunner,
} from './knowledge-transaction.js';
import { KnowledgeController } from './knowledge.controller.js';
import { KnowledgeService } from './knowledge.service.js';
import { PostgresDocumentRepository } from './postgres-document.repository.js';
import { PostgresIndexStore } from './postgres-index.store.js';
import { PostgresKnowledgeTransactionRunner } from './postgres-knowledge-transaction.js';

const usePostgres = (configService: ConfigService<AppConfig>) =>
  configService.get<IndexConfig>('index')?.store === 'postgres';

@Module({
  imports: [DatabaseModule, ParserModule, ChunkerModule, EmbeddingModule],
  providers: [
    KnowledgeService,
    {
      provide: INDEX_STORE_TOKEN,
      useFactory: (
        configService: ConfigService<AppConfig>,
        database: DatabaseService,
      ): IndexStore =>
        usePostgres(configService)
          ? new PostgresIndexStore(database)
          : new InMemoryIndexStore(),
      inject: [ConfigService, DatabaseService],
    },
    {
      provide: DOCUMENT_REPOSITORY_TOKEN,
      useFactory: (
        configService: ConfigService<AppConfig>,
        database: DatabaseService,
      ): DocumentRepository =>
        usePostgres(configService)
          ? new PostgresDocumentRepository(database)
          : new InMemoryDocumentRepository(),
      inject: [ConfigService, DatabaseService],
    },
    {
      provide: KNOWLEDGE_TRANSACTION_TOKEN,
      useFactory: (
        configService: ConfigService<AppConfig>,
        database: DatabaseService,
        index: IndexStore,
        documents: DocumentRepository,
      ): KnowledgeTransactionRunner => {
        if (usePostgres(configService)) {
          return new PostgresKnowledgeTransactionRunner(database);
        }
        if (
          index instanceof InMemoryIndexStore &&
          documents instanceof InMemoryDocumentRepository
        ) {
          return new InMemoryKnowledgeTransactionRunner(documents, index);
        }
        throw new Error('In-memory transactions need the in-memory stores');
      },
      inject: [
        ConfigService,
        DatabaseService,
        INDEX_STORE_TOKEN,
        DOCUMENT_REPOSITORY_TOKEN,
      ],
    },
  ],
  controllers: [KnowledgeController],
  exports: [KnowledgeService, INDEX_STORE_TOKEN, DOCUMENT_REPOSITORY_TOKEN],
})
export class KnowledgeModule {}
