import { RagError } from '../common/index.js';
import type { GenerationState } from './generation.types.js';

export class NonRetryableGenerationError extends RagError {
  constructor(message: string, options?: { cause?: unknown; attempts?: number }) {
    super('GENERATION_NON_RETRYABLE', 'input', message, {
      cause: options?.cause,
      details: { attempts: options?.attempts },
    });
    this.name = 'NonRetryableGenerationError';
  }
}

export class GenerationFailedError extends RagError {
  constructor(message: string, options?: { cause?: unknown; attempts?: number }) {
    super('GENERATION_FAILED', 'backend_unavailable', message, {
      retryable: true,
      cause: options?.cause,
      details: { attempts: options?.attempts },
    });
    this.name = 'GenerationFailedError';
  }
}

export class GenerationTimeoutError extends RagError {
  constructor(deadlineMs: number, attempts: number, options?: { cause?: unknown }) {
    super(
      'GENERATION_TIMEOUT',
      'timeout',
      `Generation did not finish within ${deadlineMs}ms (${attempts} attempt(s))`,
      { retryable: true, cause: options?.cause, details: { deadlineMs, attempts } },
    );
    this.name = 'GenerationTimeoutError';
  }
}

export class IllegalStateTransitionError extends RagError {
  constructor(from: GenerationState, to: GenerationState) {
    super(
      'GENERATION_ILLEGAL_TRANSITION',
      'internal',
      `Generation request cannot move from ${from} to ${to}`,
      { details: { from, to } },
    );
    this.name = 'IllegalStateTransitionError';
  }
}
