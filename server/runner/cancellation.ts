/**
 * Cooperative cancellation handed to one run's execution loop. The loop polls
 * `isCancellationRequested` at step boundaries; `signal` lets waits between
 * profiles end early.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private reasonText: string | null = null;

  get isCancellationRequested(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): string | null {
    return this.reasonText;
  }

  /** Returns false when cancellation had already been requested */
  cancel(reason: string = 'Stop requested'): boolean {
    if (this.isCancellationRequested) {
      return false;
    }
    this.reasonText = reason;
    this.controller.abort();
    return true;
  }
}
