/**
 * @fileoverview Cooperative cancellation tokens.
 *
 * @module process/cancellation
 */

export interface Disposable {
  dispose(): void;
}

/**
 * Read side of a cancellation signal, handed to the code being cancelled.
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  /**
   * Run `listener` once cancellation is requested. Runs it immediately when
   * cancellation already happened.
   */
  onCancellationRequested(listener: () => void): Disposable;
}

/**
 * Owner side of a cancellation signal.
 */
export class CancellationTokenSource {
  private cancelled = false;
  private readonly listeners = new Set<() => void>();
  readonly token: CancellationToken;

  constructor() {
    const isCancelled = (): boolean => this.cancelled;
    const subscribe = (listener: () => void): Disposable => this.subscribe(listener);
    this.token = {
      get isCancellationRequested(): boolean {
        return isCancelled();
      },
      onCancellationRequested: subscribe,
    };
  }

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  /**
   * Request cancellation. Later calls do nothing.
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  private subscribe(listener: () => void): Disposable {
    if (this.cancelled) {
      listener();
      return { dispose: () => undefined };
    }
    this.listeners.add(listener);
    return { dispose: () => { this.listeners.delete(listener); } };
  }
}
