import type { GenerationRequest } from './generation-request.js';
import type { GenerationEvent, GenerationState } from './generation.types.js';

/**
 * A single-use stream of generation events. Breaking out of iteration,
 * calling `return()` or `cancel()` aborts the backend call and releases its
 * stream.
 */
export class GenerationStream implements AsyncIterable<GenerationEvent> {
  private readonly controller = new AbortController();
  private started = false;

  constructor(
    private readonly request: GenerationRequest,
    private readonly start: (signal: AbortSignal) => AsyncGenerator<GenerationEvent>,
    private readonly parentSignal?: AbortSignal,
  ) {
    if (parentSignal?.aborted) {
      this.controller.abort(parentSignal.reason);
    } else {
      parentSignal?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get id(): string {
    return this.request.id;
  }

  get state(): GenerationState {
    return this.request.state;
  }

  cancel(reason?: unknown): void {
    this.controller.abort(reason);
  }

  [Symbol.asyncIterator](): AsyncGenerator<GenerationEvent> {
    if (this.started) {
      throw new Error('GenerationStream can only be iterated once');
    }
    this.started = true;
    return this.relay();
  }

  private async *relay(): AsyncGenerator<GenerationEvent> {
    try {
      yield* this.start(this.controller.signal);
    } finally {
      this.parentSignal?.removeEventListener('abort', this.onParentAbort);
    }
  }

  private readonly onParentAbort = () => {
    this.controller.abort(this.parentSignal?.reason);
  };
}
