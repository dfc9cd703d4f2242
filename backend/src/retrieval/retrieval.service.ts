import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  OperationCancelledError,
  RagError,
  errorMessage,
  throwIfAborted,
} from '../common/index.js';
import { RagSettingsService, type RetrievalSettings } from '../config/index.js';
import {
  EmbeddingDimensionMismatchError,
  EmbeddingService,
} from '../embedding/index.js';
import {
  INDEX_STORE_TOKEN,
  type IndexEntry,
  type IndexStore,
  type SearchHit,
} from '../knowledge/index.js';
import { fuseHits, type RankKey } from './fusion.js';
import {
  InvalidRetrievalRequestError,
  RetrievalUnavailableError,
} from './retrieval.errors.js';
import type {
  DegradedSource,
  RetrievalResult,
  RetrieveOptions,
  RetrievedChunk,
} from './retrieval.types.js';

export interface RetrieveWithSettingsOptions extends RetrieveOptions {
  settings?: RetrievalSettings;
}

/**
 * Hybrid search: lexical and vector candidates are fetched concurrently,
 * normalized per list and fused with the configured weights.
 */
@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(
    @Inject(INDEX_STORE_TOKEN) private readonly indexStore: IndexStore,
    private readonly embedding: EmbeddingService,
    private readonly settings: RagSettingsService,
  ) {}

  async retrieve(
    query: string,
    k: number,
    options: RetrieveWithSettingsOptions = {},
  ): Promise<RetrievalResult> {
    const { signal } = options;
    const settings = options.settings ?? this.settings.current().retrieval;
    const trimmed = query.trim();

    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidRetrievalRequestError(`k must be a positive integer, got ${k}`);
    }
    if (trimmed.length === 0) {
      throw new InvalidRetrievalRequestError('query must not be empty');
    }
    throwIfAborted(signal, 'retrieval');

    const candidates = k * settings.candidateMultiplier;
    const [lexicalOutcome, semanticOutcome] = await Promise.allSettled([
      this.indexStore.searchLexical(trimmed, candidates),
      this.searchSemantic(trimmed, candidates, signal),
    ]);
    throwIfAborted(signal, 'retrieval');

    const degraded: DegradedSource[] = [];
    const lexical = this.settle('lexical', lexicalOutcome, degraded);
    const semantic = this.settle('semantic', semanticOutcome, degraded);

    if (lexical === null && semantic === null) {
      throw new RetrievalUnavailableError(degraded);
    }
    for (const note of degraded) {
      this.logger.warn(`Retrieval degraded, ${note.source} search failed: ${note.reason}`);
    }

    const candidateIds = [
      ...new Set([...(lexical ?? []), ...(semantic ?? [])].map((hit) => hit.chunkId)),
    ];
    const entries = await this.loadEntries(candidateIds, degraded);
    throwIfAborted(signal, 'retrieval');

    const entriesById = new Map(entries.map((entry) => [entry.chunkId, entry]));
    const keys = new Map<string, RankKey>(
      entries.map((entry) => [
        entry.chunkId,
        { sequenceIndex: entry.sequenceIndex, documentId: entry.documentId },
      ]),
    );

    const fused = fuseHits(lexical, semantic, settings, keys, k);
    const results: RetrievedChunk[] = [];
    for (const hit of fused) {
      const entry = entriesById.get(hit.chunkId);
      if (!entry) {
        continue;
      }
      results.push(
        Object.freeze({
          chunkId: entry.chunkId,
          documentId: entry.documentId,
          sequenceIndex: entry.sequenceIndex,
          text: entry.text,
          metadata: entry.metadata,
          score: hit.score,
          source: hit.source,
          ...(hit.lexicalScore !== undefined ? { lexicalScore: hit.lexicalScore } : {}),
          ...(hit.semanticScore !== undefined
            ? { semanticScore: hit.semanticScore }
            : {}),
        }),
      );
    }

    this.logger.debug(
      `Retrieved ${results.length}/${k} chunks for "${trimmed.slice(0, 60)}"`,
    );

    return Object.freeze({
      query: trimmed,
      results: Object.freeze(results),
      degraded: Object.freeze(degraded),
    });
  }

  private async searchSemantic(
    query: string,
    candidates: number,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    const vector = await this.embedding.embedQuery(query, { signal });
    const modelId = this.embedding.modelId;
    const indexDimensions = await this.indexStore.dimensions(modelId);
    if (indexDimensions !== null && indexDimensions !== vector.length) {
      throw new EmbeddingDimensionMismatchError(indexDimensions, vector.length);
    }
    return this.indexStore.searchVector(vector, candidates, { modelId });
  }

  private async loadEntries(
    chunkIds: readonly string[],
    degraded: readonly DegradedSource[],
  ): Promise<IndexEntry[]> {
    try {
      return await this.indexStore.getEntries(chunkIds);
    } catch (error) {
      throw new RetrievalUnavailableError([
        ...degraded,
        { source: 'index', reason: errorMessage(error) },
      ]);
    }
  }

  /**
   * Unwraps one search outcome. Cancellation and configuration errors are
   * rethrown; any other failure degrades that source.
   */
  private settle(
    source: DegradedSource['source'],
    outcome: PromiseSettledResult<SearchHit[]>,
    degraded: DegradedSource[],
  ): SearchHit[] | null {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }

    const error: unknown = outcome.reason;
    if (
      error instanceof OperationCancelledError ||
      error instanceof EmbeddingDimensionMismatchError
    ) {
      throw error;
    }

    const reason =
      error instanceof RagError ? `${error.code}: ${error.message}` : errorMessage(error);
    degraded.push({ source, reason });
    return null;
  }
}
