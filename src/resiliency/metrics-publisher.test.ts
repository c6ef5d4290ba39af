import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MetricsPublisher } from './metrics-publisher.js';
import { freezeSnapshot, type HealthSnapshot } from './types.js';

const NOW = Date.UTC(2026, 0, 15, 9, 30, 0);

const snapshot: HealthSnapshot = freezeSnapshot({
  capturedAt: NOW,
  processRunning: true,
  pid: 4242,
  httpHealthy: true,
  latencyMs: 120,
  memoryMb: 310,
  cpuPercent: 2.5,
  diskPercent: 47,
  backupMounted: false,
  apiReachable: true,
  recentErrorCount: 0,
});

describe('MetricsPublisher', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'watchdog-metrics-test-'));
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  it('writes the metrics record world-readable', () => {
    const file = path.join(testDir, 'metrics.json');
    new MetricsPublisher(file).publish(snapshot);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      timestamp: Math.floor(NOW / 1000),
      datetime: '2026-01-15T09:30:00.000Z',
      gateway: { pid: 4242, memory_mb: 310, cpu_percent: 2.5 },
      system: { disk_percent: 47, backup_drive_mounted: false },
      health: { gateway_running: true, gateway_healthy: true, api_reachable: true },
    });
    expect(fs.statSync(file).mode & 0o777).toBe(0o644);
  });

  it('publishes a null pid when the gateway is down', () => {
    const file = path.join(testDir, 'metrics.json');
    const record = new MetricsPublisher(file).publish(
      freezeSnapshot({ ...snapshot, processRunning: false, pid: null, httpHealthy: false, memoryMb: 0 })
    );

    expect(record.gateway).toEqual({ pid: null, memory_mb: 0, cpu_percent: 2.5 });
    expect(record.health.gateway_running).toBe(false);
  });

  it('replaces the previous record', () => {
    const file = path.join(testDir, 'metrics.json');
    const publisher = new MetricsPublisher(file);
    publisher.publish(snapshot);
    publisher.publish(freezeSnapshot({ ...snapshot, diskPercent: 81 }));

    expect(JSON.parse(fs.readFileSync(file, 'utf-8')).system.disk_percent).toBe(81);
    expect(fs.readdirSync(testDir)).toEqual(['metrics.json']);
  });
});
