import { APICallError } from 'ai';
import { RagError, errorMessage } from '../common/index.js';

export type GenerationErrorClass = 'transient' | 'permanent';

const TRANSIENT_STATUS = new Set([408, 409, 425, 429]);

const NETWORK_MARKERS = [
  'terminated',
  'fetch failed',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'socket hang up',
];

/**
 * Rate limits, server errors and dropped connections are worth another
 * attempt; bad requests and authentication failures are not.
 */
export function classifyGenerationError(error: unknown): GenerationErrorClass {
  if (error instanceof RagError) {
    return error.retryable ? 'transient' : 'permanent';
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status !== undefined && (TRANSIENT_STATUS.has(status) || status >= 500)) {
      return 'transient';
    }
    return error.isRetryable && status === undefined ? 'transient' : 'permanent';
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return 'transient';
    }
    const message = errorMessage(error);
    if (NETWORK_MARKERS.some((marker) => message.includes(marker))) {
      return 'transient';
    }
  }

  return 'permanent';
}
