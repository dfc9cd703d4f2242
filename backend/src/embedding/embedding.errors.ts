import { RagError } from '../common/index.js';

export class EmbeddingBackendError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_BACKEND_ERROR', 'backend_unavailable', message, {
      retryable: true,
      cause: options?.cause,
    });
    this.name = 'EmbeddingBackendError';
  }
}

export class EmbeddingInputTooLargeError extends RagError {
  constructor(index: number, tokens: number, limit: number) {
    super(
      'EMBEDDING_INPUT_TOO_LARGE',
      'resource_exhausted',
      `Embedding input ${index} has ${tokens} tokens, above the limit of ${limit}`,
      { details: { index, tokens, limit } },
    );
    this.name = 'EmbeddingInputTooLargeError';
  }
}

export class EmbeddingDimensionMismatchError extends RagError {
  constructor(expected: number, actual: number) {
    super(
      'EMBEDDING_DIMENSION_MISMATCH',
      'input',
      `Query vector has ${actual} dimensions but the index holds ${expected}`,
      { details: { expected, actual } },
    );
    this.name = 'EmbeddingDimensionMismatchError';
  }
}
