/**
 * Tick source for the monitor loop: a clock plus an abortable sleep.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Scheduler {
  now(): number;
  /** Resolves after `ms`, or early (without throwing) once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }
}

/**
 * Virtual time: sleeping advances the clock instantly. Lets tests drive
 * whole cycles, settle waits and escalation pauses without wall-clock delay.
 */
export class VirtualScheduler implements Scheduler {
  private time: number;
  readonly sleeps: number[] = [];
  private readonly onSleep?: (ms: number, count: number) => void;

  constructor(options: { start?: number; onSleep?: (ms: number, count: number) => void } = {}) {
    this.time = options.start ?? 0;
    this.onSleep = options.onSleep;
  }

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.time += ms;
    this.onSleep?.(ms, this.sleeps.length);
    await Promise.resolve();
  }
}
