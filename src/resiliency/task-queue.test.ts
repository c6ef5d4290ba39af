import { describe, it, expect } from 'vitest';
import { BackgroundTaskQueue } from './task-queue.js';
import { captureLogger } from '../../test/fakes.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BackgroundTaskQueue', () => {
  it('runs at most `concurrency` tasks at once', async () => {
    const { logger } = captureLogger();
    const queue = new BackgroundTaskQueue({ concurrency: 2, maxPending: 10, timeoutMs: 1000, logger });
    const gates = [deferred(), deferred(), deferred()];
    const finished: number[] = [];

    gates.forEach((gate, i) => {
      queue.enqueue({
        label: `task-${i}`,
        run: async () => {
          await gate.promise;
          finished.push(i);
        },
      });
    });

    expect(queue.activeCount).toBe(2);
    expect(queue.pendingCount).toBe(1);

    gates[0].resolve();
    gates[1].resolve();
    gates[2].resolve();
    await queue.drain();

    expect(finished).toEqual([0, 1, 2]);
    expect(queue.activeCount).toBe(0);
    expect(queue.pendingCount).toBe(0);
  });

  it('drops new tasks once the backlog is full', async () => {
    const { logger, entries } = captureLogger();
    const queue = new BackgroundTaskQueue({ concurrency: 1, maxPending: 1, timeoutMs: 1000, logger });
    const gate = deferred();

    expect(queue.enqueue({ label: 'running', run: () => gate.promise })).toBe(true);
    expect(queue.enqueue({ label: 'waiting', run: async () => undefined })).toBe(true);
    expect(queue.enqueue({ label: 'overflow', run: async () => undefined })).toBe(false);

    const warning = entries.find((e) => e.message === 'Background queue full, dropping task');
    expect(warning?.task).toBe('overflow');

    gate.resolve();
    await queue.drain();
  });

  it('logs failures without propagating them', async () => {
    const { logger, entries } = captureLogger();
    const queue = new BackgroundTaskQueue({ concurrency: 1, maxPending: 5, timeoutMs: 1000, logger });
    const ran: string[] = [];

    queue.enqueue({
      label: 'webhook startup',
      run: async () => {
        throw new Error('HTTP 500');
      },
    });
    queue.enqueue({ label: 'desktop startup', run: async () => void ran.push('desktop') });
    await queue.drain();

    expect(ran).toEqual(['desktop']);
    const failure = entries.find((e) => e.message === 'Background task failed');
    expect(failure).toMatchObject({ level: 'warn', task: 'webhook startup', error: 'HTTP 500' });
  });

  it('abandons tasks that exceed the timeout', async () => {
    const { logger, entries } = captureLogger();
    const queue = new BackgroundTaskQueue({ concurrency: 1, maxPending: 5, timeoutMs: 20, logger });

    queue.enqueue({ label: 'slow', run: () => new Promise<void>(() => undefined) });
    await queue.drain();

    const failure = entries.find((e) => e.message === 'Background task failed');
    expect(failure?.error).toBe('Timeout after 20ms: slow');
  });

  it('drain resolves immediately when idle', async () => {
    const { logger } = captureLogger();
    const queue = new BackgroundTaskQueue({ concurrency: 1, maxPending: 1, timeoutMs: 20, logger });
    await expect(queue.drain()).resolves.toBeUndefined();
  });
});
