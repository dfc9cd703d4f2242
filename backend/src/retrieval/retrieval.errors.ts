import { RagError } from '../common/index.js';
import type { DegradedSource } from './retrieval.types.js';

/** A search source, or the entry lookup that follows both searches. */
export interface RetrievalFailure {
  source: DegradedSource['source'] | 'index';
  reason: string;
}

export class RetrievalUnavailableError extends RagError {
  constructor(failures: readonly RetrievalFailure[]) {
    super(
      'RETRIEVAL_UNAVAILABLE',
      'backend_unavailable',
      `Retrieval failed: ${failures
        .map((failure) => `${failure.source} (${failure.reason})`)
        .join(', ')}`,
      { retryable: true, details: { failures } },
    );
    this.name = 'RetrievalUnavailableError';
  }
}

export class InvalidRetrievalRequestError extends RagError {
  constructor(message: string) {
    super('RETRIEVAL_INVALID_REQUEST', 'input', message);
    this.name = 'InvalidRetrievalRequestError';
  }
}
