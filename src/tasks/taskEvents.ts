/**
 * @fileoverview Event bus for task lifecycle events.
 *
 * Events published while another event is being delivered are queued and
 * delivered afterwards, so every listener observes one task's events in
 * emission order even when a listener reacts by cancelling the task.
 *
 * @module tasks/taskEvents
 */

import type { ILogger } from '../interfaces/ILogger';
import { ListenerRegistry } from './listenerRegistry';
import type { TaskEvent, TaskEventListener } from './types';

export interface SubscribeOptions {
  /** Deliver only events of this task. */
  taskId?: string;
}

export class TaskEventBus {
  private readonly listeners: ListenerRegistry<TaskEventListener, string | undefined>;
  private readonly queue: TaskEvent[] = [];
  private delivering = false;

  constructor(log: ILogger) {
    this.listeners = new ListenerRegistry<TaskEventListener, string | undefined>(log);
  }

  /**
   * Register a listener. Registering the same function again replaces its filter.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: TaskEventListener, options: SubscribeOptions = {}): () => void {
    this.listeners.add(listener, options.taskId);
    return () => { this.listeners.remove(listener); };
  }

  unsubscribe(listener: TaskEventListener): boolean {
    return this.listeners.remove(listener);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  clear(): void {
    this.listeners.clear();
  }

  publish(event: TaskEvent): void {
    this.queue.push(event);
    if (this.delivering) {
      return;
    }
    this.delivering = true;
    try {
      let next = this.queue.shift();
      while (next) {
        const current = next;
        this.listeners.forEach((listener, taskId) => {
          if (taskId === undefined || taskId === current.taskId) {
            listener(current);
          }
        });
        next = this.queue.shift();
      }
    } finally {
      this.delivering = false;
    }
  }
}
