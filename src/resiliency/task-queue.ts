/**
 * Background task queue for detached work (remote notifications).
 *
 * - Bounded concurrency and a bounded backlog (new tasks are dropped when full)
 * - Every task runs under its own timeout
 * - Failures are logged, never propagated to the enqueuer
 */

import type { Logger } from './logger.js';
import { withTimeout } from '../utils/async.js';
import { errorMessage } from '../utils/errors.js';

export interface BackgroundTask {
  label: string;
  run: () => Promise<void>;
}

export interface BackgroundTaskQueueOptions {
  concurrency: number;
  maxPending: number;
  timeoutMs: number;
  logger: Logger;
}

export class BackgroundTaskQueue {
  private readonly options: BackgroundTaskQueueOptions;
  private readonly pending: BackgroundTask[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: BackgroundTaskQueueOptions) {
    this.options = options;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  get activeCount(): number {
    return this.active;
  }

  /**
   * Returns false when the backlog is full and the task was dropped.
   */
  enqueue(task: BackgroundTask): boolean {
    if (this.pending.length >= this.options.maxPending) {
      this.options.logger.warn('Background queue full, dropping task', { task: task.label });
      return false;
    }
    this.pending.push(task);
    this.pump();
    return true;
  }

  /**
   * Resolves once nothing is running or queued.
   */
  drain(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.active < this.options.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) break;
      this.active++;
      this.execute(task)
        .catch((err: unknown) => {
          this.options.logger.error('Background task crashed', { task: task.label, error: errorMessage(err) });
        })
        .finally(() => {
          this.active--;
          this.pump();
          this.notifyIfIdle();
        });
    }
  }

  private async execute(task: BackgroundTask): Promise<void> {
    try {
      await withTimeout(task.run(), this.options.timeoutMs, task.label);
    } catch (err) {
      this.options.logger.warn('Background task failed', { task: task.label, error: errorMessage(err) });
    }
  }

  private notifyIfIdle(): void {
    if (this.active > 0 || this.pending.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
