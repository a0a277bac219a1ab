/**
 * @fileoverview Single-flight execution of an async operation.
 *
 * At most one run of the operation is in flight. Callers that `join` share
 * the current run (or the queued one). Callers that `rerun` get a fresh run:
 * started now when idle, otherwise queued behind the current run and shared
 * by every other `rerun` caller that arrives before it starts.
 *
 * @module tasks/singleFlight
 */

export class SingleFlight<T> {
  private inFlight: Promise<T> | undefined;
  private queued: Promise<T> | undefined;

  constructor(private readonly operation: () => Promise<T>) {}

  /** True while a run is in flight. */
  get isRunning(): boolean {
    return this.inFlight !== undefined;
  }

  /** The run a joining caller would share, if any. */
  get current(): Promise<T> | undefined {
    return this.queued ?? this.inFlight;
  }

  /**
   * Share the queued or in-flight run, or start one.
   */
  join(): Promise<T> {
    return this.current ?? this.start();
  }

  /**
   * Get a run that starts no earlier than now.
   */
  rerun(): Promise<T> {
    const running = this.inFlight;
    if (!running) {
      return this.start();
    }
    if (!this.queued) {
      // Wait for the run to settle; its own callers observe a failure.
      const settled = running.then(() => undefined, () => undefined);
      this.queued = settled.then(() => {
        this.queued = undefined;
        return this.start();
      });
    }
    return this.queued;
  }

  private start(): Promise<T> {
    const run = new Promise<T>((resolve) => resolve(this.operation()));
    this.inFlight = run;
    const clear = (): void => {
      if (this.inFlight === run) {
        this.inFlight = undefined;
      }
    };
    run.then(clear, clear);
    return run;
  }
}
