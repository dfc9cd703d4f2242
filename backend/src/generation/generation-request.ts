import { randomUUID } from 'node:crypto';
import { IllegalStateTransitionError } from './generation.errors.js';
import type { GenerationState } from './generation.types.js';

const TRANSITIONS: Record<GenerationState, readonly GenerationState[]> = {
  pending: ['in_flight'],
  in_flight: ['succeeded', 'failed', 'timed_out'],
  succeeded: [],
  failed: [],
  timed_out: [],
};

export class GenerationRequest {
  readonly id = randomUUID();
  private current: GenerationState = 'pending';
  private attemptCount = 0;

  constructor(readonly startedAt: number) {}

  get state(): GenerationState {
    return this.current;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get settled(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  beginAttempt(): number {
    if (this.current !== 'in_flight') {
      throw new IllegalStateTransitionError(this.current, 'in_flight');
    }
    this.attemptCount += 1;
    return this.attemptCount;
  }

  transition(next: GenerationState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalStateTransitionError(this.current, next);
    }
    this.current = next;
  }
}
