/**
 * Health Probe
 *
 * Battery of independent checks against the gateway and the host. A check
 * that cannot complete reports a negative or zero result instead of
 * throwing. `check*` methods raise their threshold alerts through the
 * dispatcher; `measure*` methods and `probe()` only observe.
 */

import { createHash } from 'node:crypto';
import fs from 'node:fs';
import type { WatchdogConfig } from '../config/schemas.js';
import { ScheduledJobsResponseSchema } from '../config/schemas.js';
import type { AlertDispatcher } from './alert-dispatcher.js';
import type { WatchdogContext } from './context.js';
import type { HttpClient } from './http-client.js';
import type { Journal } from './journal.js';
import type { Logger } from './logger.js';
import type { OsFacade } from './os-facade.js';
import type { RestoreResult, SnapshotManager } from './snapshot-manager.js';
import { freezeSnapshot, type HealthSnapshot } from './types.js';
import { errorMessage } from '../utils/errors.js';

/** Volume whose usage is reported as disk_percent */
export const PRIMARY_VOLUME = '/';

const ERROR_LINE = /error|exception|fatal/i;
const TAIL_READ_BYTES = 256 * 1024;

export interface HealthProbeOptions {
  config: WatchdogConfig;
  os: OsFacade;
  http: HttpClient;
  dispatcher: AlertDispatcher;
  snapshots: SnapshotManager;
  journal: Journal;
  logger: Logger;
  now: () => number;
}

export interface ProcessStatus {
  running: boolean;
  pid: number | null;
  memoryMb: number;
  cpuPercent: number;
}

export interface HttpStatus {
  healthy: boolean;
  latencyMs: number;
  /** null when no response arrived */
  status: number | null;
}

export type ConfigStatus = 'valid' | 'changed' | 'invalid' | 'missing';

export interface ConfigCheckResult {
  status: ConfigStatus;
  /** Set when a restore was attempted (invalid or missing config) */
  restore: RestoreResult | null;
}

export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Last `count` lines of a text file, reading at most the trailing 256 KiB.
 */
export function tailLines(file: string, count: number): string[] {
  const fd = fs.openSync(file, 'r');
  try {
    const size = fs.fstatSync(fd).size;
    const length = Math.min(size, TAIL_READ_BYTES);
    const buffer = Buffer.alloc(length);
    fs.readSync(fd, buffer, 0, length, size - length);
    const lines = buffer.toString('utf-8').split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines.slice(-count);
  } finally {
    fs.closeSync(fd);
  }
}

export class HealthProbe {
  private readonly options: HealthProbeOptions;

  constructor(options: HealthProbeOptions) {
    this.options = options;
  }

  private get config(): WatchdogConfig {
    return this.options.config;
  }

  get gatewayRootUrl(): string {
    return new URL('/', this.config.gateway.url).toString();
  }

  async checkProcess(): Promise<ProcessStatus> {
    try {
      const proc = await this.options.os.findProcess(this.config.gateway.processPattern);
      if (!proc) {
        return { running: false, pid: null, memoryMb: 0, cpuPercent: 0 };
      }
      return { running: true, pid: proc.pid, memoryMb: proc.memoryMb, cpuPercent: proc.cpuPercent };
    } catch (err) {
      this.options.logger.warn('Process check failed', { error: errorMessage(err) });
      return { running: false, pid: null, memoryMb: 0, cpuPercent: 0 };
    }
  }

  /**
   * GET the gateway root. Healthy iff HTTP 200 within the timeout.
   */
  async measureHttp(): Promise<HttpStatus> {
    const { http, logger, now } = this.options;
    const start = now();
    let status: number | null = null;
    try {
      const response = await http.get(this.gatewayRootUrl, this.config.timeouts.healthMs);
      status = response.status;
    } catch (err) {
      logger.debug('Gateway health request failed', { error: errorMessage(err) });
    }
    return { healthy: status === 200, latencyMs: now() - start, status };
  }

  async checkHttp(ctx: WatchdogContext): Promise<HttpStatus> {
    const result = await this.measureHttp();
    const { responseCriticalMs, responseWarningMs } = this.config.thresholds;
    if (result.latencyMs > responseCriticalMs) {
      this.options.dispatcher.notify(ctx, 'response_slow', `Gateway response time critical: ${result.latencyMs}ms`, 'critical');
    } else if (result.latencyMs > responseWarningMs) {
      this.options.dispatcher.notify(ctx, 'response_slow', `Gateway response time slow: ${result.latencyMs}ms`, 'warning');
    }
    return result;
  }

  /**
   * Reachable iff any HTTP response arrives, error statuses included.
   */
  async checkUpstream(): Promise<boolean> {
    try {
      await this.options.http.get(this.config.gateway.upstreamUrl, this.config.timeouts.upstreamMs);
      return true;
    } catch (err) {
      this.options.logger.debug('Upstream API unreachable', { error: errorMessage(err) });
      return false;
    }
  }

  async measureDisk(): Promise<number> {
    try {
      return await this.options.os.diskUsagePercent(PRIMARY_VOLUME);
    } catch (err) {
      this.options.logger.warn('Disk check failed', { error: errorMessage(err) });
      return 0;
    }
  }

  async checkDisk(ctx: WatchdogContext): Promise<number> {
    const percent = await this.measureDisk();
    const { diskCriticalPercent, diskWarningPercent } = this.config.thresholds;
    if (percent > diskCriticalPercent) {
      this.options.dispatcher.notify(ctx, 'disk_critical', `Disk ${percent}% full`, 'critical');
    } else if (percent > diskWarningPercent) {
      this.options.dispatcher.notify(ctx, 'disk_warning', `Disk ${percent}% full`, 'warning');
    }
    return percent;
  }

  async measureBackupVolume(): Promise<boolean> {
    try {
      return await this.options.os.isVolumeMounted(this.config.backup.volume);
    } catch (err) {
      this.options.logger.warn('Backup drive check failed', { error: errorMessage(err) });
      return false;
    }
  }

  async checkBackupVolume(ctx: WatchdogContext): Promise<boolean> {
    const mounted = await this.measureBackupVolume();
    if (!mounted) {
      this.options.dispatcher.notify(
        ctx,
        'backup_drive',
        `Backup drive ${this.config.backup.volume} is not mounted`,
        'critical'
      );
    }
    return mounted;
  }

  /**
   * The config must exist and parse as JSON; otherwise it is restored from
   * backup. A changed but valid config is reported and left alone.
   */
  checkConfig(ctx: WatchdogContext): ConfigCheckResult {
    const { dispatcher, journal, logger } = this.options;
    const file = this.config.paths.configFile;

    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch {
      logger.critical('Config file missing', { file });
      dispatcher.notify(ctx, 'config_missing', 'Gateway config file missing', 'critical');
      return { status: 'missing', restore: this.restoreConfig(ctx) };
    }

    try {
      JSON.parse(content);
    } catch (err) {
      logger.critical('Config file is not valid JSON', { file, error: errorMessage(err) });
      dispatcher.notify(ctx, 'config_invalid', 'Gateway config is invalid JSON', 'critical');
      return { status: 'invalid', restore: this.restoreConfig(ctx) };
    }

    const hash = hashContent(content);
    const previous = ctx.configHash;
    ctx.configHash = hash;
    if (previous !== '' && previous !== hash) {
      logger.warn('Config file changed', { file });
      dispatcher.notify(ctx, 'config_changed', 'Gateway config changed unexpectedly', 'warning');
      journal.append('Config file changed');
      return { status: 'changed', restore: null };
    }
    return { status: 'valid', restore: null };
  }

  /**
   * Names of scheduled jobs whose last run failed; raises `cron_failed`.
   */
  async checkScheduledJobs(ctx: WatchdogContext): Promise<string[]> {
    const { http, logger, dispatcher } = this.options;
    const url = new URL(this.config.gateway.scheduledJobsPath, this.config.gateway.url).toString();

    let body: string;
    try {
      const response = await http.get(url, this.config.timeouts.gatewayApiMs);
      if (response.status !== 200) {
        logger.debug('Scheduled job status unavailable', { status: response.status });
        return [];
      }
      body = response.body;
    } catch (err) {
      logger.debug('Scheduled job status unavailable', { error: errorMessage(err) });
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      logger.warn('Scheduled job status is not JSON');
      return [];
    }
    const parsed = ScheduledJobsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Unexpected scheduled job status shape', { issues: parsed.error.issues.length });
      return [];
    }

    const failed = parsed.data.jobs.filter((job) => job.lastRun?.status === 'failed').map((job) => job.name);
    if (failed.length > 0) {
      dispatcher.notify(ctx, 'cron_failed', `Scheduled job(s) failed: ${failed.join(', ')}`, 'warning');
    }
    return failed;
  }

  /**
   * Error-looking lines in the tail of the gateway error log. Zero unless
   * the log was written recently.
   */
  measureErrorRate(): number {
    const { errorLog } = this.config.paths;
    const { errorLogMaxAgeMs, errorLogTailLines } = this.config.thresholds;
    try {
      const stat = fs.statSync(errorLog);
      if (this.options.now() - stat.mtimeMs >= errorLogMaxAgeMs) {
        return 0;
      }
      return tailLines(errorLog, errorLogTailLines).filter((line) => ERROR_LINE.test(line)).length;
    } catch {
      return 0;
    }
  }

  checkErrorRate(ctx: WatchdogContext): number {
    const count = this.measureErrorRate();
    if (count > this.config.thresholds.errorRateCount) {
      this.options.dispatcher.notify(ctx, 'error_rate', `High error rate: ${count} errors in recent log`, 'warning');
    }
    return count;
  }

  /**
   * Run the observing checks in sequence and freeze the result.
   */
  async probe(): Promise<HealthSnapshot> {
    const capturedAt = this.options.now();
    const proc = await this.checkProcess();
    const http = await this.measureHttp();
    const apiReachable = await this.checkUpstream();
    const diskPercent = await this.measureDisk();
    const backupMounted = await this.measureBackupVolume();
    const recentErrorCount = this.measureErrorRate();

    return freezeSnapshot({
      capturedAt,
      processRunning: proc.running,
      pid: proc.pid,
      httpHealthy: http.healthy,
      latencyMs: http.latencyMs,
      memoryMb: proc.memoryMb,
      cpuPercent: proc.cpuPercent,
      diskPercent,
      backupMounted,
      apiReachable,
      recentErrorCount,
    });
  }

  private restoreConfig(ctx: WatchdogContext): RestoreResult {
    const { dispatcher, snapshots } = this.options;
    const result = snapshots.restoreConfigFromBackup();
    if (result.restored) {
      dispatcher.notify(ctx, 'config_restored', 'Gateway config restored from backup', 'warning');
      try {
        ctx.configHash = hashContent(fs.readFileSync(this.config.paths.configFile, 'utf-8'));
      } catch (err) {
        this.options.logger.warn('Could not hash restored config', { error: errorMessage(err) });
      }
    } else {
      dispatcher.notify(ctx, 'config_no_backup', `Gateway config unusable and no valid backup: ${result.reason}`, 'critical');
    }
    return result;
  }
}
