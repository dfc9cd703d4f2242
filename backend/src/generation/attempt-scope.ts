/**
 * Abort scope for one backend attempt. It aborts when the caller's signal
 * aborts, when the time left before the deadline runs out, or on dispose().
 */
export class AttemptScope {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private expired = false;

  constructor(
    private readonly parent: AbortSignal | undefined,
    timeoutMs: number,
  ) {
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }

    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort(new Error('generation deadline reached'));
    }, Math.max(timeoutMs, 0));
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** True when the deadline, not the caller, ended the attempt. */
  get timedOut(): boolean {
    return this.expired;
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error('generation attempt closed'));
    }
  }

  private readonly onParentAbort = () => {
    this.controller.abort(this.parent?.reason);
  };
}
