export type RagErrorKind =
  | 'input'
  | 'backend_unavailable'
  | 'resource_exhausted'
  | 'timeout'
  | 'cancelled'
  | 'internal';

export interface RagErrorOptions {
  retryable?: boolean;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class for every failure the pipeline reports on purpose.
 *
 * `kind` groups errors by who is at fault and what the caller can do about
 * it; `retryable` tells the caller whether re-issuing the same request may
 * succeed.
 */
export class RagError extends Error {
  public readonly code: string;
  public readonly kind: RagErrorKind;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown>;
  public readonly cause?: Error;

  constructor(
    code: string,
    kind: RagErrorKind,
    message: string,
    options?: RagErrorOptions,
  ) {
    super(message);
    this.code = code;
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details ?? {};
    this.name = 'RagError';
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
    }
  }
}

export class OperationCancelledError extends RagError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super('OPERATION_CANCELLED', 'cancelled', `${operation} was cancelled`, {
      cause: options?.cause,
    });
    this.name = 'OperationCancelledError';
  }
}

export function throwIfAborted(
  signal: AbortSignal | undefined,
  operation: string,
): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, { cause: signal.reason });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
