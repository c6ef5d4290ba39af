import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AlertDispatcher } from './alert-dispatcher.js';
import { Journal } from './journal.js';
import { BackgroundTaskQueue } from './task-queue.js';
import type { AlertNotification, NotificationSink } from './notification-sinks.js';
import { captureLogger, messages } from '../../test/fakes.js';

const START = Date.UTC(2026, 0, 15, 9, 30, 0);
const COOLDOWN = 1_800_000;

class RecordingSink implements NotificationSink {
  readonly received: AlertNotification[] = [];
  constructor(readonly name: string, private readonly fail = false) {}

  async send(alert: AlertNotification): Promise<void> {
    if (this.fail) throw new Error(`${this.name} unavailable`);
    this.received.push(alert);
  }
}

describe('AlertDispatcher', () => {
  let testDir: string;
  let now: number;

  beforeEach(async () => {
    testDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'watchdog-alerts-test-'));
    now = START;
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  function setup(sinks: NotificationSink[]) {
    const { logger, entries } = captureLogger(() => now);
    const journal = new Journal({ dir: testDir, now: () => now, logger });
    const queue = new BackgroundTaskQueue({ concurrency: 2, maxPending: 10, timeoutMs: 1000, logger });
    const dispatcher = new AlertDispatcher({ cooldownMs: COOLDOWN, now: () => now, logger, journal, queue, sinks });
    return { dispatcher, entries };
  }

  it('fires, logs, journals and fans out to every sink', async () => {
    const desktop = new RecordingSink('desktop');
    const remote = new RecordingSink('command:slack');
    const { dispatcher, entries } = setup([desktop, remote]);
    const ctx = { alerts: new Map<string, number>() };

    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 85% full', 'warning')).toBe(true);
    await dispatcher.drain();

    expect(ctx.alerts.get('disk_warning')).toBe(START);
    expect(messages(entries, 'alert')).toEqual(['ALERT [warning] disk_warning: Disk 85% full']);
    expect(fs.readFileSync(path.join(testDir, '2026-01-15.md'), 'utf-8')).toContain(
      '- [09:30] [warning] Disk 85% full\n'
    );
    const expected = { type: 'disk_warning', message: 'Disk 85% full', severity: 'warning', firedAt: START };
    expect(desktop.received).toEqual([expected]);
    expect(remote.received).toEqual([expected]);
  });

  it('suppresses repeats of one type inside the cooldown', async () => {
    const sink = new RecordingSink('desktop');
    const { dispatcher, entries } = setup([sink]);
    const ctx = { alerts: new Map<string, number>() };

    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 85% full')).toBe(true);
    now += COOLDOWN - 1;
    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 86% full')).toBe(false);
    await dispatcher.drain();

    expect(ctx.alerts.get('disk_warning')).toBe(START);
    expect(sink.received).toHaveLength(1);
    expect(messages(entries, 'debug')).toEqual(['Alert suppressed (cooldown): disk_warning']);

    now = START + COOLDOWN;
    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 87% full')).toBe(true);
    expect(ctx.alerts.get('disk_warning')).toBe(START + COOLDOWN);
  });

  it('tracks cooldowns per alert type', () => {
    const { dispatcher } = setup([]);
    const ctx = { alerts: new Map<string, number>() };

    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 85% full')).toBe(true);
    expect(dispatcher.notify(ctx, 'memory_warning', 'Memory 600MB')).toBe(true);
    expect(dispatcher.notify(ctx, 'disk_warning', 'Disk 85% full')).toBe(false);
  });

  it('sanitizes type and message before use', () => {
    const { dispatcher, entries } = setup([]);
    const ctx = { alerts: new Map<string, number>() };

    dispatcher.notify(ctx, 'disk;warning', 'Disk $(rm -rf) 85% "full"', 'critical');

    expect([...ctx.alerts.keys()]).toEqual(['diskwarning']);
    expect(messages(entries, 'alert')).toEqual(['ALERT [critical] diskwarning: Disk rm -rf 85% full']);
  });

  it('never lets a failing sink affect the caller or other sinks', async () => {
    const broken = new RecordingSink('webhook', true);
    const desktop = new RecordingSink('desktop');
    const { dispatcher, entries } = setup([broken, desktop]);
    const ctx = { alerts: new Map<string, number>() };

    expect(dispatcher.notify(ctx, 'gateway_down', 'Gateway down', 'critical')).toBe(true);
    await dispatcher.drain();

    expect(desktop.received).toHaveLength(1);
    const failure = entries.find((e) => e.message === 'Background task failed');
    expect(failure).toMatchObject({ task: 'webhook gateway_down', error: 'webhook unavailable' });
  });
});
