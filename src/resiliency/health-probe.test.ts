import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { hashContent, tailLines } from './health-probe.js';
import { ConnectionError } from '../utils/errors.js';
import { createHarness, destroyHarness, START, type Harness } from '../../test/harness.js';
import { messages, ok } from '../../test/fakes.js';

describe('HealthProbe', () => {
  let h: Harness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await destroyHarness(h);
  });

  describe('checkProcess', () => {
    it('reports the matching process', async () => {
      expect(await h.loop.probe.checkProcess()).toEqual({ running: true, pid: 4242, memoryMb: 200, cpuPercent: 1.5 });
    });

    it('reports an absent process', async () => {
      h.os.process = null;
      expect(await h.loop.probe.checkProcess()).toEqual({ running: false, pid: null, memoryMb: 0, cpuPercent: 0 });
    });

    it('treats a failed process listing as absent', async () => {
      h.os.findProcess = async () => {
        throw new Error('process listing failed');
      };
      expect((await h.loop.probe.checkProcess()).running).toBe(false);
      expect(messages(h.entries, 'warn')).toEqual(['Process check failed']);
    });
  });

  describe('checkHttp', () => {
    it('is healthy on HTTP 200 and raises nothing when fast', async () => {
      const ctx = h.newContext();
      expect(await h.loop.probe.checkHttp(ctx)).toEqual({ healthy: true, latencyMs: 0, status: 200 });
      expect(h.alerts()).toEqual([]);
    });

    it('warns above 5s and is critical above 10s', async () => {
      const ctx = h.newContext();
      let delay = 6000;
      h.http.onGet = (url) => {
        if (url === h.urls.root) h.scheduler.advance(delay);
      };

      expect((await h.loop.probe.checkHttp(ctx)).latencyMs).toBe(6000);
      ctx.alerts.clear();
      delay = 10_001;
      await h.loop.probe.checkHttp(ctx);

      expect(h.alerts()).toEqual([
        'ALERT [warning] response_slow: Gateway response time slow: 6000ms',
        'ALERT [critical] response_slow: Gateway response time critical: 10001ms',
      ]);
    });

    it('is unhealthy on error statuses and connection failures', async () => {
      const ctx = h.newContext();
      h.http.routes.set(h.urls.root, { status: 503, body: '' });
      expect(await h.loop.probe.checkHttp(ctx)).toEqual({ healthy: false, latencyMs: 0, status: 503 });

      h.http.routes.delete(h.urls.root);
      expect(await h.loop.probe.checkHttp(ctx)).toEqual({ healthy: false, latencyMs: 0, status: null });
    });
  });

  describe('checkUpstream', () => {
    it('counts any HTTP response as reachable', async () => {
      expect(await h.loop.probe.checkUpstream()).toBe(true);
    });

    it('is unreachable when no response arrives', async () => {
      h.http.routes.set(h.urls.upstream, new ConnectionError('getaddrinfo ENOTFOUND'));
      expect(await h.loop.probe.checkUpstream()).toBe(false);
    });
  });

  describe('checkDisk', () => {
    const diskCases: Array<[number, string[]]> = [
      [79, []],
      [80, []],
      [85, ['ALERT [warning] disk_warning: Disk 85% full']],
      [95, ['ALERT [critical] disk_critical: Disk 95% full']],
    ];

    it.each(diskCases)('classifies %i%% usage', async (percent, expected) => {
      h.os.disk = percent;
      expect(await h.loop.probe.checkDisk(h.newContext())).toBe(percent);
      expect(h.alerts()).toEqual(expected);
    });

    it('reports 0 when usage cannot be read', async () => {
      h.os.diskError = new Error('statfs failed');
      expect(await h.loop.probe.checkDisk(h.newContext())).toBe(0);
      expect(h.alerts()).toEqual([]);
    });
  });

  describe('checkBackupVolume', () => {
    it('raises backup_drive when the volume is absent', async () => {
      h.os.mounted.clear();
      expect(await h.loop.probe.checkBackupVolume(h.newContext())).toBe(false);
      expect(h.alerts()).toEqual([
        `ALERT [critical] backup_drive: Backup drive ${h.config.backup.volume} is not mounted`,
      ]);
    });
  });

  describe('checkConfig', () => {
    const configsDir = () => path.join(h.config.backup.volume, 'gateway_backup', 'configs');

    it('tracks the content hash of a valid config', () => {
      const ctx = h.newContext();
      expect(h.loop.probe.checkConfig(ctx)).toEqual({ status: 'valid', restore: null });
      expect(ctx.configHash).toBe(hashContent('{"gateway":{"port":18789}}'));
      expect(h.alerts()).toEqual([]);
    });

    it('warns once about an external edit and takes no other action', () => {
      const ctx = h.newContext();
      h.loop.probe.checkConfig(ctx);
      fs.writeFileSync(h.config.paths.configFile, '{"gateway":{"port":18790}}');

      expect(h.loop.probe.checkConfig(ctx)).toEqual({ status: 'changed', restore: null });
      expect(h.loop.probe.checkConfig(ctx)).toEqual({ status: 'valid', restore: null });
      expect(h.alerts()).toEqual(['ALERT [warning] config_changed: Gateway config changed unexpectedly']);
      expect(fs.readFileSync(h.config.paths.configFile, 'utf-8')).toBe('{"gateway":{"port":18790}}');
    });

    it('restores an unparsable config from the newest backup', () => {
      const ctx = h.newContext();
      fs.mkdirSync(configsDir(), { recursive: true });
      fs.writeFileSync(path.join(configsDir(), 'gateway-20260114.json'), '{"restored":true}');
      fs.writeFileSync(h.config.paths.configFile, '{"gateway":');

      const result = h.loop.probe.checkConfig(ctx);

      expect(result.status).toBe('invalid');
      expect(result.restore).toEqual({ restored: true, source: path.join(configsDir(), 'gateway-20260114.json') });
      expect(fs.readFileSync(h.config.paths.configFile, 'utf-8')).toBe('{"restored":true}');
      expect(ctx.configHash).toBe(hashContent('{"restored":true}'));
      expect(h.alerts()).toEqual([
        'ALERT [critical] config_invalid: Gateway config is invalid JSON',
        'ALERT [warning] config_restored: Gateway config restored from backup',
      ]);
      expect(h.loop.probe.checkConfig(ctx).status).toBe('valid');
    });

    it('raises a critical alert when a missing config has no backup', () => {
      const ctx = h.newContext();
      fs.rmSync(h.config.paths.configFile);

      const result = h.loop.probe.checkConfig(ctx);

      expect(result.status).toBe('missing');
      expect(h.alerts()).toEqual([
        'ALERT [critical] config_missing: Gateway config file missing',
        `ALERT [critical] config_no_backup: Gateway config unusable and no valid backup: no config backup in ${configsDir()}`,
      ]);
      expect(messages(h.entries, 'critical')).toEqual(['Config file missing']);
    });
  });

  describe('checkScheduledJobs', () => {
    it('names jobs whose last run failed', async () => {
      h.http.routes.set(
        h.urls.jobs,
        ok(
          JSON.stringify({
            jobs: [
              { name: 'nightly-backup', lastRun: { status: 'failed' } },
              { name: 'digest', lastRun: { status: 'ok' } },
              { name: 'fresh', lastRun: null },
              { name: 'never-ran' },
              { name: 'sync', lastRun: { status: 'failed' } },
            ],
          })
        )
      );

      expect(await h.loop.probe.checkScheduledJobs(h.newContext())).toEqual(['nightly-backup', 'sync']);
      expect(h.alerts()).toEqual(['ALERT [warning] cron_failed: Scheduled job(s) failed: nightly-backup, sync']);
    });

    it('returns nothing for unusable responses', async () => {
      const ctx = h.newContext();
      h.http.routes.set(h.urls.jobs, ok('<html>'));
      expect(await h.loop.probe.checkScheduledJobs(ctx)).toEqual([]);
      h.http.routes.set(h.urls.jobs, { status: 404, body: '' });
      expect(await h.loop.probe.checkScheduledJobs(ctx)).toEqual([]);
      h.http.routes.delete(h.urls.jobs);
      expect(await h.loop.probe.checkScheduledJobs(ctx)).toEqual([]);
      expect(h.alerts()).toEqual([]);
    });
  });

  describe('checkErrorRate', () => {
    function writeErrorLog(recentErrors: number, mtimeMs: number): void {
      const lines: string[] = [];
      for (let i = 0; i < 20; i++) lines.push(`ERROR stale failure ${i}`);
      for (let i = 0; i < 100; i++) {
        if (i < recentErrors) {
          lines.push(i % 3 === 0 ? `Error: request ${i} failed` : i % 3 === 1 ? `Unhandled exception ${i}` : `FATAL ${i}`);
        } else {
          lines.push(`info: request ${i} ok`);
        }
      }
      fs.writeFileSync(h.config.paths.errorLog, `${lines.join('\n')}\n`);
      fs.utimesSync(h.config.paths.errorLog, mtimeMs / 1000, mtimeMs / 1000);
    }

    it('counts error lines in the tail of a fresh log', () => {
      writeErrorLog(11, START);
      expect(h.loop.probe.checkErrorRate(h.newContext())).toBe(11);
      expect(h.alerts()).toEqual(['ALERT [warning] error_rate: High error rate: 11 errors in recent log']);
    });

    it('does not alert at the threshold', () => {
      writeErrorLog(10, START);
      expect(h.loop.probe.checkErrorRate(h.newContext())).toBe(10);
      expect(h.alerts()).toEqual([]);
    });

    it('ignores a log not written in the last five minutes', () => {
      writeErrorLog(50, START - 5 * 60_000);
      expect(h.loop.probe.checkErrorRate(h.newContext())).toBe(0);
    });

    it('is zero without a log', () => {
      expect(h.loop.probe.measureErrorRate()).toBe(0);
    });
  });

  describe('probe', () => {
    it('returns a frozen snapshot without raising alerts', async () => {
      h.os.disk = 95;
      h.os.mounted.clear();

      const snapshot = await h.loop.probe.probe();

      expect(snapshot).toEqual({
        capturedAt: START,
        processRunning: true,
        pid: 4242,
        httpHealthy: true,
        latencyMs: 0,
        memoryMb: 200,
        cpuPercent: 1.5,
        diskPercent: 95,
        backupMounted: false,
        apiReachable: true,
        recentErrorCount: 0,
      });
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(h.alerts()).toEqual([]);
    });
  });
});

describe('tailLines', () => {
  it('returns the last lines without the trailing newline', async () => {
    const file = path.join(await fs.promises.mkdtemp(path.join(os.tmpdir(), 'watchdog-tail-')), 'log');
    fs.writeFileSync(file, 'a\nb\nc\n');
    expect(tailLines(file, 2)).toEqual(['b', 'c']);
    expect(tailLines(file, 10)).toEqual(['a', 'b', 'c']);
    fs.rmSync(path.dirname(file), { recursive: true, force: true });
  });
});
