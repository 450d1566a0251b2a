/**
 * One-way live -> cancelled flag shared between a subscription handle and its
 * bridge task. Built on `AbortController`, so waiters that register after the
 * transition still observe it.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private readonly whenCancelled: Promise<void>;

  constructor() {
    const signal = this.controller.signal;
    this.whenCancelled = new Promise<void>(resolve => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  /** Returns `false` when the token was already cancelled. Never blocks. */
  cancel(): boolean {
    if (this.controller.signal.aborted) return false;
    this.controller.abort();
    return true;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancelled(): Promise<void> {
    return this.whenCancelled;
  }

  /** Runs `listener` once on cancellation (immediately if already cancelled). */
  onCancel(listener: () => void): () => void {
    const signal = this.controller.signal;
    if (signal.aborted) {
      listener();
      return () => {};
    }
    signal.addEventListener('abort', listener, { once: true });
    return () => signal.removeEventListener('abort', listener);
  }

  /** A token cancelled together with this one, but cancellable on its own. */
  child(): CancellationToken {
    const child = new CancellationToken();
    const detach = this.onCancel(() => child.cancel());
    child.onCancel(detach);
    return child;
  }
}
