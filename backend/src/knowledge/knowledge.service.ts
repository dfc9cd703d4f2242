import { createHash } from 'node:crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChunkerService } from '../chunker/index.js';
import {
  OperationCancelledError,
  RagError,
  errorMessage,
  errorStack,
  mapWithConcurrency,
  throwIfAborted,
  toScalarMetadata,
} from '../common/index.js';
import {
  RagSettingsService,
  type AppConfig,
  type IngestionConfig,
} from '../config/index.js';
import { EmbeddingService } from '../embedding/index.js';
import { ParserService } from '../parser/index.js';
import {
  DOCUMENT_REPOSITORY_TOKEN,
  type DocumentRepository,
} from './document.repository.js';
import {
  KNOWLEDGE_TRANSACTION_TOKEN,
  type KnowledgeTransactionRunner,
} from './knowledge-transaction.js';
import type {
  IndexEntry,
  IngestionResult,
  KnowledgeDocument,
} from './knowledge.types.js';

export interface IngestDocumentInput {
  sourceUri: string;
  mimeType: string;
  bytes: Uint8Array;
  title?: string;
  metadata?: Record<string, unknown>;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export function contentHashOf(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function documentIdFor(sourceUri: string, contentHash: string): string {
  return createHash('sha256')
    .update(`${sourceUri}\n${contentHash}`)
    .digest('hex')
    .slice(0, 32);
}

/**
 * Ingestion path: parse, chunk, embed, index. Each document succeeds or is
 * rejected on its own; a rejection never touches what is already indexed.
 */
@Injectable()
export class KnowledgeService {
  private readonly logger = new Logger(KnowledgeService.name);
  private readonly ingestion: IngestionConfig;
  // ingestions of one sourceUri run one after another so versions stay linear
  private readonly sourceQueues = new Map<string, Promise<void>>();

  constructor(
    private readonly parser: ParserService,
    private readonly chunker: ChunkerService,
    private readonly embedding: EmbeddingService,
    private readonly settings: RagSettingsService,
    @Inject(DOCUMENT_REPOSITORY_TOKEN)
    private readonly documents: DocumentRepository,
    @Inject(KNOWLEDGE_TRANSACTION_TOKEN)
    private readonly transactions: KnowledgeTransactionRunner,
    configService: ConfigService<AppConfig>,
  ) {
    this.ingestion = configService.get<IngestionConfig>('ingestion') ?? {
      concurrency: 4,
      maxDocumentBytes: 20 * 1024 * 1024,
      ocrLang: 'eng',
    };
  }

  ingest(
    input: IngestDocumentInput,
    options: IngestOptions = {},
  ): Promise<IngestionResult> {
    const { sourceUri } = input;
    const previous = this.sourceQueues.get(sourceUri) ?? Promise.resolve();
    const run = previous.then(() => this.ingestNow(input, options));

    // callers see failures through `run`; the queue only needs to know it settled
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.sourceQueues.set(sourceUri, settled);
    void settled.then(() => {
      if (this.sourceQueues.get(sourceUri) === settled) {
        this.sourceQueues.delete(sourceUri);
      }
    });

    return run;
  }

  ingestMany(
    inputs: readonly IngestDocumentInput[],
    options: IngestOptions = {},
  ): Promise<IngestionResult[]> {
    return mapWithConcurrency(inputs, this.ingestion.concurrency, (input) =>
      this.ingest(input, options),
    );
  }

  listDocuments(): Promise<KnowledgeDocument[]> {
    return this.documents.list();
  }

  async removeDocument(documentId: string): Promise<boolean> {
    const [removedEntries, removed] = await this.transactions.run(
      async ({ documents, index }) => [
        await index.deleteByDocument(documentId),
        await documents.remove(documentId),
      ] as const,
    );
    if (removed) {
      this.logger.log(
        `Removed document ${documentId} with ${removedEntries} index entries`,
      );
    }
    return removed;
  }

  private async ingestNow(
    input: IngestDocumentInput,
    options: IngestOptions,
  ): Promise<IngestionResult> {
    const contentHash = contentHashOf(input.bytes);
    const documentId = documentIdFor(input.sourceUri, contentHash);

    try {
      throwIfAborted(options.signal, 'ingestion');

      if (input.bytes.byteLength > this.ingestion.maxDocumentBytes) {
        throw new RagError(
          'INGESTION_DOCUMENT_TOO_LARGE',
          'resource_exhausted',
          `Document is ${input.bytes.byteLength} bytes, above the limit of ${this.ingestion.maxDocumentBytes}`,
        );
      }

      const existing = await this.documents.findById(documentId);
      if (existing) {
        this.logger.debug(
          `Skipping ${input.sourceUri}: content unchanged (document ${documentId})`,
        );
        return {
          documentId,
          sourceUri: input.sourceUri,
          status: 'accepted',
          version: existing.version,
          chunkCount: existing.chunkCount,
          unchanged: true,
        };
      }

      const previous = await this.documents.findLatestBySourceUri(
        input.sourceUri,
      );
      const settings = this.settings.current();

      const blocks = await this.parser.parse({
        sourceUri: input.sourceUri,
        mimeType: input.mimeType,
        bytes: input.bytes,
      });
      const chunks = this.chunker.chunk(documentId, blocks, settings.chunking);
      throwIfAborted(options.signal, 'ingestion');

      const vectors = await this.embedding.embed(
        chunks.map((chunk) => chunk.text),
        { signal: options.signal },
      );
      const modelId = this.embedding.modelId;

      const entries: IndexEntry[] = chunks.map((chunk, index) => ({
        chunkId: chunk.id,
        documentId,
        sequenceIndex: chunk.sequenceIndex,
        text: chunk.text,
        tokenSpan: chunk.tokenSpan,
        metadata: chunk.metadata,
        vector: vectors[index] ?? [],
        modelId,
      }));

      throwIfAborted(options.signal, 'ingestion');
      // the document row goes first: index entries reference it
      const document = await this.transactions.run(async ({ documents, index }) => {
        const saved = await documents.save({
          id: documentId,
          sourceUri: input.sourceUri,
          mimeType: input.mimeType,
          contentHash,
          version: (previous?.version ?? 0) + 1,
          title: input.title,
          metadata: toScalarMetadata(input.metadata),
          chunkCount: chunks.length,
          ingestedAt: new Date(),
        });
        await index.replaceDocumentEntries(documentId, entries, {
          supersededDocumentIds: previous ? [previous.id] : [],
        });
        if (previous) {
          await documents.remove(previous.id);
        }
        return saved;
      });

      this.logger.log(
        `Indexed ${input.sourceUri} as ${documentId} (version ${document.version}, ${chunks.length} chunks)`,
      );

      return {
        documentId,
        sourceUri: input.sourceUri,
        status: 'accepted',
        version: document.version,
        chunkCount: chunks.length,
      };
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      return this.reject(input, documentId, error);
    }
  }

  private reject(
    input: IngestDocumentInput,
    documentId: string,
    error: unknown,
  ): IngestionResult {
    if (error instanceof RagError) {
      this.logger.warn(
        `Rejected ${input.sourceUri} [${error.code}]: ${error.message}`,
      );
      return {
        documentId,
        sourceUri: input.sourceUri,
        status: 'rejected',
        reason: error.message,
        code: error.code,
        retryable: error.retryable,
      };
    }

    this.logger.error(
      `Failed to ingest ${input.sourceUri}: ${errorMessage(error)}`,
      errorStack(error),
    );
    return {
      documentId,
      sourceUri: input.sourceUri,
      status: 'rejected',
      reason: errorMessage(error),
      code: 'INGESTION_FAILED',
      retryable: false,
    };
  }
}
