/**
 * @fileoverview Listener registry safe against changes during delivery.
 *
 * Delivery walks a snapshot of the registry and re-checks membership before
 * each call: a listener removed mid-delivery is skipped, one added
 * mid-delivery waits for the next delivery. A throwing listener is logged
 * and the remaining listeners still run.
 *
 * @module tasks/listenerRegistry
 */

import type { ILogger } from '../interfaces/ILogger';

export class ListenerRegistry<L, F = undefined> {
  private readonly entries = new Map<L, F>();

  constructor(private readonly log: ILogger) {}

  add(listener: L, filter: F): void {
    this.entries.set(listener, filter);
  }

  remove(listener: L): boolean {
    return this.entries.delete(listener);
  }

  has(listener: L): boolean {
    return this.entries.has(listener);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Call `invoke` for every listener registered now and still registered
   * when its turn comes.
   */
  forEach(invoke: (listener: L, filter: F) => void): void {
    for (const [listener, filter] of [...this.entries]) {
      if (!this.entries.has(listener)) {
        continue;
      }
      try {
        invoke(listener, filter);
      } catch (error) {
        this.log.error('Listener threw during delivery', error);
      }
    }
  }
}
