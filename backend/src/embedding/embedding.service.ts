import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/index.js';
import {
  OperationCancelledError,
  RagError,
  countTokens,
  createLimiter,
  errorMessage,
  throwIfAborted,
  type TaskLimiter,
} from '../common/index.js';
import type { AppConfig, EmbeddingConfig } from '../config/index.js';
import {
  EmbeddingBackendError,
  EmbeddingInputTooLargeError,
} from './embedding.errors.js';

export interface EmbedOptions {
  signal?: AbortSignal;
}

const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  batchSize: 64,
  concurrency: 2,
  dimensions: undefined,
  maxInputTokens: 8000,
};

/**
 * Turns texts into vectors with the configured embedding model.
 *
 * Inputs are sent in batches of at most `batchSize`; every caller shares the
 * same limiter, so no more than `concurrency` batches are in flight across
 * the process. A batch that fails or comes back malformed fails the whole
 * call.
 */
@Injectable()
export class EmbeddingService {
  private readonly logger = new Logger(EmbeddingService.name);
  private readonly config: EmbeddingConfig;
  private readonly limit: TaskLimiter;

  constructor(
    private readonly aiService: AIService,
    configService: ConfigService<AppConfig>,
  ) {
    this.config =
      configService.get<EmbeddingConfig>('embedding') ?? DEFAULT_EMBEDDING_CONFIG;
    this.limit = createLimiter(this.config.concurrency);
  }

  get modelId(): string {
    return this.aiService.embeddingModel;
  }

  /** Configured vector size, when the deployment pins one. */
  get dimensions(): number | undefined {
    return this.config.dimensions;
  }

  async embed(texts: readonly string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    texts.forEach((text, index) => {
      const tokens = countTokens(text);
      if (tokens > this.config.maxInputTokens) {
        throw new EmbeddingInputTooLargeError(
          index,
          tokens,
          this.config.maxInputTokens,
        );
      }
    });

    const batches: string[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.config.batchSize) {
      batches.push(texts.slice(offset, offset + this.config.batchSize));
    }

    const results = await Promise.all(
      batches.map((batch, index) =>
        this.limit(() => this.embedBatch(batch, index, options.signal)),
      ),
    );

    const vectors = results.flat();
    const expected = this.config.dimensions ?? vectors[0]?.length ?? 0;
    for (const vector of vectors) {
      if (vector.length !== expected) {
        throw new EmbeddingBackendError(
          `Embedding backend returned a ${vector.length}-dimensional vector, expected ${expected}`,
        );
      }
    }

    return vectors;
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options);
    if (!vector) {
      throw new EmbeddingBackendError('Embedding backend returned no vector');
    }
    return vector;
  }

  private async embedBatch(
    batch: string[],
    batchIndex: number,
    signal?: AbortSignal,
  ): Promise<number[][]> {
    throwIfAborted(signal, 'embedding');

    let embeddings: number[][];
    try {
      const result = await this.aiService.embedText({
        inputs: batch,
        abortSignal: signal,
      });
      embeddings = result.embeddings;
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('embedding', { cause: error });
      }
      if (error instanceof RagError) {
        throw error;
      }
      this.logger.error(
        `Embedding batch ${batchIndex} (${batch.length} inputs) failed: ${errorMessage(error)}`,
      );
      throw new EmbeddingBackendError(
        `Embedding backend failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (embeddings.length !== batch.length) {
      throw new EmbeddingBackendError(
        `Embedding backend returned ${embeddings.length} vectors for ${batch.length} inputs`,
      );
    }

    for (const vector of embeddings) {
      if (!vector.every((value) => Number.isFinite(value))) {
        throw new EmbeddingBackendError(
          'Embedding backend returned a vector with non-finite values',
        );
      }
    }

    return embeddings;
  }
}
