import { RagError, errorMessage } from '../common/index.js';
import type { QueryFailure, QueryStage } from './chat.types.js';

export class ChatQueryError extends Error {
  public readonly code: string;
  public readonly failure: QueryFailure;
  public readonly cause?: Error;

  constructor(failure: QueryFailure, options?: { cause?: unknown }) {
    super(failure.message);
    this.code = failure.code;
    this.failure = failure;
    this.name = 'ChatQueryError';
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
    }
  }
}

export function toQueryFailure(
  error: unknown,
  stage: QueryStage,
  retrievedChunkIds: string[] = [],
): QueryFailure {
  const provenance = { stage, retrievedChunkIds };
  if (error instanceof RagError) {
    return {
      code: error.code,
      kind: error.kind,
      retryable: error.retryable,
      message: error.message,
      provenance,
    };
  }
  return {
    code: 'CHAT_INTERNAL_ERROR',
    kind: 'internal',
    retryable: false,
    message: errorMessage(error),
    provenance,
  };
}
