// Single-threaded queue for work that must run on the next event loop turn

import { logger, LogCategory } from '../../utils/Logger';

export type Task = () => void;

export class TaskQueue {
  private pending: Task[] = [];
  private scheduled = false;
  private idleWaiters: Array<() => void> = [];

  get size(): number {
    return this.pending.length;
  }

  enqueue(task: Task): void {
    this.pending.push(task);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  whenIdle(): Promise<void> {
    if (!this.scheduled && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    this.scheduled = false;
    // Tasks enqueued while draining wait for the following turn
    const tasks = this.pending;
    this.pending = [];

    for (const task of tasks) {
      try {
        task();
      } catch (error) {
        logger.error(LogCategory.APP, 'Deferred task failed', error);
      }
    }

    if (!this.scheduled && this.pending.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }
}
