/**
 * Monitor Loop
 *
 * Wires the engine together and runs one sequential check cycle per
 * interval until the abort signal fires:
 *   rotate log -> disk, backup, config (config failure ends the cycle)
 *   -> process and HTTP health (recovery ends the cycle)
 *   -> memory, error rate, upstream -> periodic scheduled jobs
 *   -> publish metrics, persist state -> sleep
 */

import fs from 'node:fs';
import type { WatchdogConfig } from '../config/schemas.js';
import { AlertDispatcher } from './alert-dispatcher.js';
import { createWatchdogContext, type WatchdogContext } from './context.js';
import { HealthProbe, type ProcessStatus } from './health-probe.js';
import type { HttpClient } from './http-client.js';
import { Journal } from './journal.js';
import type { Logger } from './logger.js';
import { MetricsPublisher } from './metrics-publisher.js';
import { CommandChannelSink, DesktopSink, WebhookSink, type NotificationSink } from './notification-sinks.js';
import type { OsFacade } from './os-facade.js';
import { RecoveryController, type RecoveryOutcome } from './recovery-controller.js';
import type { Scheduler } from './scheduler.js';
import { SnapshotManager } from './snapshot-manager.js';
import { StateStore } from './state-store.js';
import { BackgroundTaskQueue } from './task-queue.js';
import { freezeSnapshot, type HealthSnapshot } from './types.js';
import { errorMessage } from '../utils/errors.js';
import { ensureSecureDir, isOwnedBy } from '../utils/secure-fs.js';

export interface MonitorLoopDeps {
  config: WatchdogConfig;
  os: OsFacade;
  http: HttpClient;
  scheduler: Scheduler;
  logger: Logger;
  /** Defaults to the sinks enabled in `config.alerts` */
  sinks?: NotificationSink[];
}

export type CycleOutcome = 'healthy' | 'config_failure' | 'recovered' | 'recovery_failed' | 'exhausted';

export interface CycleResult {
  cycle: number;
  outcome: CycleOutcome;
  /** Published metrics, null when the cycle ended before publishing */
  snapshot: HealthSnapshot | null;
  recovery: RecoveryOutcome | null;
  pauseMs: number;
}

export function buildSinks(config: WatchdogConfig, os: OsFacade, http: HttpClient): NotificationSink[] {
  const sinks: NotificationSink[] = [];
  const { desktop, remote } = config.alerts;
  if (desktop) {
    sinks.push(new DesktopSink(os));
  }
  if (remote.enabled) {
    sinks.push(new CommandChannelSink(os, remote));
    if (remote.webhookUrl) {
      sinks.push(new WebhookSink(http, remote.webhookUrl, config.timeouts.notifyMs));
    }
  }
  return sinks;
}

export class MonitorLoop {
  readonly config: WatchdogConfig;
  readonly logger: Logger;
  readonly journal: Journal;
  readonly dispatcher: AlertDispatcher;
  readonly snapshots: SnapshotManager;
  readonly probe: HealthProbe;
  readonly recovery: RecoveryController;
  readonly stateStore: StateStore;
  readonly metrics: MetricsPublisher;
  private readonly os: OsFacade;
  private readonly scheduler: Scheduler;

  constructor(deps: MonitorLoopDeps) {
    const { config, os, http, scheduler, logger } = deps;
    const now = () => scheduler.now();
    this.config = config;
    this.os = os;
    this.scheduler = scheduler;
    this.logger = logger;

    this.journal = new Journal({ dir: config.paths.memoryDir, now, logger });
    const queue = new BackgroundTaskQueue({
      concurrency: config.alerts.maxConcurrentDispatches,
      maxPending: config.alerts.maxPendingDispatches,
      timeoutMs: config.timeouts.notifyMs,
      logger,
    });
    this.dispatcher = new AlertDispatcher({
      cooldownMs: config.alerts.cooldownMs,
      now,
      logger,
      journal: this.journal,
      queue,
      sinks: deps.sinks ?? buildSinks(config, os, http),
    });
    this.snapshots = new SnapshotManager({
      snapshotDir: config.paths.snapshotDir,
      memoryDir: config.paths.memoryDir,
      gatewayHome: config.paths.gatewayHome,
      configFile: config.paths.configFile,
      sessionsUrl: new URL(config.gateway.sessionsPath, config.gateway.url).toString(),
      gatewayApiTimeoutMs: config.timeouts.gatewayApiMs,
      backupVolume: config.backup.volume,
      backupSubdir: config.backup.subdir,
      configPrefix: config.backup.configPrefix,
      retain: config.snapshots.retain,
      http,
      os,
      logger,
      journal: this.journal,
      now,
    });
    this.probe = new HealthProbe({
      config,
      os,
      http,
      dispatcher: this.dispatcher,
      snapshots: this.snapshots,
      journal: this.journal,
      logger,
      now,
    });
    this.recovery = new RecoveryController({
      config,
      os,
      probe: this.probe,
      snapshots: this.snapshots,
      dispatcher: this.dispatcher,
      journal: this.journal,
      logger,
      scheduler,
    });
    this.stateStore = new StateStore(config.paths.stateFile, logger);
    this.metrics = new MetricsPublisher(config.paths.metricsFile);
  }

  /**
   * Prepare directories, load persisted state and announce startup.
   */
  start(): WatchdogContext {
    const { paths, thresholds, gateway } = this.config;
    ensureSecureDir(paths.watchdogDir);
    ensureSecureDir(paths.snapshotDir);
    fs.mkdirSync(paths.memoryDir, { recursive: true });

    const uid = this.os.currentUid();
    const user = this.os.currentUser();
    const ctx = createWatchdogContext(this.stateStore.load(uid), {
      memoryWindowSize: thresholds.memoryWindowSize,
      memoryLeakMb: thresholds.memoryLeakMb,
    });

    if (fs.existsSync(paths.configFile) && !isOwnedBy(paths.configFile, uid)) {
      this.logger.security('Gateway config is not a regular file owned by the current user', {
        file: paths.configFile,
        user,
      });
      this.dispatcher.notify(
        ctx,
        'security_violation',
        `Gateway config ${paths.configFile} is not owned by ${user}`,
        'critical'
      );
    }

    this.logger.info('=========================================');
    this.logger.info('Gateway watchdog started');
    this.logger.info(`Gateway: ${gateway.url}`);
    this.logger.info(`PID: ${process.pid}`);
    this.logger.info(`User: ${user}`);
    this.logger.info('=========================================');

    this.journal.append('Watchdog started');
    this.dispatcher.notify(ctx, 'startup', 'Watchdog started', 'info');
    return ctx;
  }

  /**
   * One full check cycle. Never throws for check failures; an unexpected
   * error still gets the heartbeat line before propagating.
   */
  async runCycle(ctx: WatchdogContext, signal?: AbortSignal): Promise<CycleResult> {
    ctx.cycle += 1;
    const cycle = ctx.cycle;
    try {
      return await this.cycleBody(ctx, signal);
    } finally {
      if (cycle % this.config.schedule.heartbeatEveryCycles === 0) {
        this.logger.info(`Heartbeat: cycle ${cycle}, gateway ${ctx.recoveryState}`);
      }
    }
  }

  /**
   * Run cycles until `signal` aborts, then wait for pending notifications.
   */
  async run(signal: AbortSignal): Promise<void> {
    const ctx = this.start();

    while (!signal.aborted) {
      let pauseMs = 0;
      try {
        pauseMs = (await this.runCycle(ctx, signal)).pauseMs;
      } catch (err) {
        this.logger.logError(err, 'Check cycle failed', { cycle: ctx.cycle });
      }
      if (signal.aborted) break;

      if (pauseMs > 0) {
        this.logger.warn(`Pausing checks for ${Math.round(pauseMs / 1000)}s`);
        await this.scheduler.sleep(pauseMs, signal);
      }
      await this.scheduler.sleep(this.config.schedule.checkIntervalMs, signal);
    }

    this.logger.info('Gateway watchdog stopping');
    await this.dispatcher.drain();
  }

  private async cycleBody(ctx: WatchdogContext, signal?: AbortSignal): Promise<CycleResult> {
    const { probe, recovery, dispatcher } = this;
    const cycle = ctx.cycle;

    this.rotateLog();
    const diskPercent = await probe.checkDisk(ctx);
    const backupMounted = await probe.checkBackupVolume(ctx);
    const configCheck = probe.checkConfig(ctx);
    if (configCheck.status === 'invalid' || configCheck.status === 'missing') {
      this.persist(ctx, null);
      return { cycle, outcome: 'config_failure', snapshot: null, recovery: null, pauseMs: 0 };
    }

    const proc = await probe.checkProcess();
    if (!proc.running || proc.pid === null) {
      return this.finishRecovery(ctx, await recovery.handleProcessDown(ctx, signal));
    }

    const http = await probe.checkHttp(ctx);
    if (!http.healthy) {
      return this.finishRecovery(ctx, await recovery.handleUnhealthy(ctx, proc.pid, signal));
    }

    const memoryRestart = await this.checkMemory(ctx, proc, signal);
    const recentErrorCount = probe.checkErrorRate(ctx);
    const apiReachable = await probe.checkUpstream();
    if (!apiReachable) {
      dispatcher.notify(ctx, 'api_unreachable', 'Upstream API unreachable', 'warning');
    }
    if (this.scheduledJobsDue(ctx)) {
      ctx.jobsCheckedCycle = cycle;
      await probe.checkScheduledJobs(ctx);
    }

    if (memoryRestart !== null) {
      // The restart changed the gateway; publish what it looks like now.
      const snapshot = await probe.probe();
      this.persist(ctx, snapshot);
      const outcome: CycleOutcome = memoryRestart ? 'healthy' : 'recovery_failed';
      return { cycle, outcome, snapshot, recovery: null, pauseMs: 0 };
    }

    recovery.markRecovered(ctx);
    const snapshot = freezeSnapshot({
      capturedAt: this.scheduler.now(),
      processRunning: true,
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
    this.persist(ctx, snapshot);
    return { cycle, outcome: 'healthy', snapshot, recovery: null, pauseMs: 0 };
  }

  private scheduledJobsDue(ctx: WatchdogContext): boolean {
    const last = ctx.jobsCheckedCycle;
    return last === null || ctx.cycle - last >= this.config.schedule.scheduledJobsEveryCycles;
  }

  /**
   * Memory alerts, plus a graceful restart when usage is critical.
   * Returns whether that restart recovered the gateway, or null when none ran.
   */
  private async checkMemory(
    ctx: WatchdogContext,
    proc: ProcessStatus,
    signal?: AbortSignal
  ): Promise<boolean | null> {
    const { dispatcher, recovery } = this;
    const { memoryCriticalMb, memoryWarningMb } = this.config.thresholds;
    const memoryMb = proc.memoryMb;

    const leak = ctx.memory.observe(memoryMb);
    if (leak) {
      dispatcher.notify(
        ctx,
        'memory_leak',
        `Possible memory leak: grew ${leak.growthMb}MB over ${leak.windowSize} checks`,
        'warning'
      );
    }

    if (memoryMb > memoryCriticalMb) {
      dispatcher.notify(ctx, 'memory_critical', `Gateway using ${memoryMb}MB RAM`, 'critical');
      if (proc.pid !== null) {
        return recovery.handleMemoryCritical(ctx, proc.pid, memoryMb, signal);
      }
    } else if (memoryMb > memoryWarningMb) {
      dispatcher.notify(ctx, 'memory_warning', `Gateway using ${memoryMb}MB RAM`, 'warning');
    }
    return null;
  }

  private async finishRecovery(ctx: WatchdogContext, outcome: RecoveryOutcome): Promise<CycleResult> {
    const snapshot = await this.probe.probe();
    this.persist(ctx, snapshot);
    return {
      cycle: ctx.cycle,
      outcome: outcome.recovered ? 'recovered' : outcome.state === 'exhausted' ? 'exhausted' : 'recovery_failed',
      snapshot,
      recovery: outcome,
      pauseMs: outcome.pauseMs,
    };
  }

  private rotateLog(): void {
    try {
      this.logger.rotateIfNeeded();
    } catch (err) {
      this.logger.error('Log rotation failed', { error: errorMessage(err) });
    }
  }

  private persist(ctx: WatchdogContext, snapshot: HealthSnapshot | null): void {
    if (snapshot) {
      try {
        this.metrics.publish(snapshot);
      } catch (err) {
        this.logger.error('Failed to publish metrics', { error: errorMessage(err) });
      }
    }
    try {
      this.stateStore.save(ctx, this.scheduler.now());
    } catch (err) {
      this.logger.error('Failed to save state', { error: errorMessage(err) });
    }
  }
}
