/**
 * Recovery Controller
 *
 * Escalation ladder for an unhealthy gateway:
 *   healthy -> degraded -> graceful_restart_attempted -> hard_restart_attempted -> exhausted
 * Any confirmed recovery returns to healthy and clears the attempt counter.
 * Reaching the attempt ceiling raises a manual-intervention alert, clears
 * the counter and asks the loop for an extended pause.
 */

import type { WatchdogConfig } from '../config/schemas.js';
import type { AlertDispatcher } from './alert-dispatcher.js';
import type { WatchdogContext } from './context.js';
import type { HealthProbe } from './health-probe.js';
import type { Journal } from './journal.js';
import type { Logger } from './logger.js';
import { isSignalName, type OsFacade } from './os-facade.js';
import type { Scheduler } from './scheduler.js';
import type { SnapshotManager } from './snapshot-manager.js';
import type { RecoveryState } from './types.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

export interface RecoveryControllerOptions {
  config: WatchdogConfig;
  os: OsFacade;
  probe: HealthProbe;
  snapshots: SnapshotManager;
  dispatcher: AlertDispatcher;
  journal: Journal;
  logger: Logger;
  scheduler: Scheduler;
}

export interface RecoveryOutcome {
  recovered: boolean;
  state: RecoveryState;
  /** Extra wait requested before the next cycle (non-zero only when exhausted) */
  pauseMs: number;
}

type CeilingAlert = 'gateway_down' | 'gateway_unresponsive';

const CEILING_MESSAGES: Record<CeilingAlert, string> = {
  gateway_down: 'Gateway down and restart attempts exhausted. Manual intervention needed.',
  gateway_unresponsive: 'Gateway unresponsive and restart attempts exhausted. Manual intervention needed.',
};

export class RecoveryController {
  private readonly options: RecoveryControllerOptions;
  private readonly gracefulSignal: NodeJS.Signals;

  constructor(options: RecoveryControllerOptions) {
    this.options = options;
    const signal = options.config.gateway.gracefulSignal;
    if (!isSignalName(signal)) {
      throw new ConfigError('gateway.gracefulSignal', [`unknown signal ${signal}`]);
    }
    this.gracefulSignal = signal;
  }

  /**
   * Process absent: check the network, then go straight to a hard restart.
   */
  async handleProcessDown(ctx: WatchdogContext, signal?: AbortSignal): Promise<RecoveryOutcome> {
    const { probe, dispatcher, logger } = this.options;
    ctx.recoveryState = 'degraded';
    logger.warn('Gateway process not found');

    if (!(await probe.checkUpstream())) {
      dispatcher.notify(ctx, 'network_issue', 'Gateway down and upstream API unreachable', 'critical');
    }
    return this.escalate(ctx, 'gateway_down', signal);
  }

  /**
   * Process present but failing its health check: graceful first, then hard.
   */
  async handleUnhealthy(ctx: WatchdogContext, pid: number, signal?: AbortSignal): Promise<RecoveryOutcome> {
    ctx.recoveryState = 'degraded';
    this.options.logger.warn('Gateway not responding', { pid });

    if (await this.gracefulRestart(ctx, pid, 'Health check failed', signal)) {
      return { recovered: true, state: ctx.recoveryState, pauseMs: 0 };
    }
    return this.escalate(ctx, 'gateway_unresponsive', signal);
  }

  /**
   * Memory critical: graceful restart only, no hard escalation.
   */
  async handleMemoryCritical(
    ctx: WatchdogContext,
    pid: number,
    memoryMb: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    return this.gracefulRestart(ctx, pid, `Memory critical: ${memoryMb}MB`, signal);
  }

  async gracefulRestart(ctx: WatchdogContext, pid: number, reason: string, signal?: AbortSignal): Promise<boolean> {
    const { os, probe, dispatcher, journal, logger, scheduler, config } = this.options;
    logger.info(`Attempting graceful restart via ${this.gracefulSignal}: ${reason}`);
    ctx.recoveryState = 'graceful_restart_attempted';

    await this.captureSnapshot();
    try {
      os.sendSignal(pid, this.gracefulSignal);
    } catch (err) {
      logger.warn('Graceful restart signal failed', { pid, error: errorMessage(err) });
      return false;
    }

    await scheduler.sleep(config.schedule.gracefulSettleMs, signal);
    const health = await probe.checkHttp(ctx);
    if (!health.healthy) {
      logger.warn('Graceful restart failed');
      return false;
    }

    logger.info('Graceful restart successful');
    journal.append('Graceful restart successful');
    dispatcher.notify(ctx, 'restart_success', 'Graceful restart completed', 'info');
    this.markRecovered(ctx);
    return true;
  }

  async hardRestart(ctx: WatchdogContext, signal?: AbortSignal): Promise<boolean> {
    const { os, probe, snapshots, dispatcher, journal, logger, scheduler, config } = this.options;
    const attempt = ctx.restart.attempts + 1;
    logger.warn(`Attempting hard restart (attempt ${attempt}/${config.recovery.maxRestartAttempts})`);
    journal.append(`Hard restart attempt ${attempt}`);
    ctx.recoveryState = 'hard_restart_attempted';

    await this.captureSnapshot();
    await snapshots.emergencyBackup();

    try {
      await os.runSupervisorRestart(config.gateway.serviceId);
    } catch (err) {
      logger.error('Supervisor restart failed', { serviceId: config.gateway.serviceId, error: errorMessage(err) });
    }

    await scheduler.sleep(config.schedule.hardSettleMs, signal);
    const health = await probe.checkHttp(ctx);
    if (health.healthy) {
      logger.info('Gateway recovered');
      journal.append('Gateway recovered');
      dispatcher.notify(ctx, 'recovery', 'Gateway recovered after hard restart', 'success');
      this.markRecovered(ctx);
      return true;
    }

    ctx.restart.attempts = attempt;
    logger.warn('Hard restart failed', { attempts: ctx.restart.attempts });
    return false;
  }

  markRecovered(ctx: WatchdogContext): void {
    ctx.restart.attempts = 0;
    ctx.recoveryState = 'healthy';
  }

  private async escalate(ctx: WatchdogContext, ceiling: CeilingAlert, signal?: AbortSignal): Promise<RecoveryOutcome> {
    const max = this.options.config.recovery.maxRestartAttempts;
    if (ctx.restart.attempts >= max) {
      return this.exhaust(ctx, ceiling);
    }
    if (await this.hardRestart(ctx, signal)) {
      return { recovered: true, state: ctx.recoveryState, pauseMs: 0 };
    }
    if (ctx.restart.attempts >= max) {
      return this.exhaust(ctx, ceiling);
    }
    return { recovered: false, state: ctx.recoveryState, pauseMs: 0 };
  }

  private exhaust(ctx: WatchdogContext, ceiling: CeilingAlert): RecoveryOutcome {
    const { dispatcher, logger, config } = this.options;
    logger.critical('Restart attempts exhausted, pausing checks', { alert: ceiling });
    dispatcher.notify(ctx, ceiling, CEILING_MESSAGES[ceiling], 'critical');
    ctx.restart.attempts = 0;
    ctx.recoveryState = 'exhausted';
    return { recovered: false, state: 'exhausted', pauseMs: config.alerts.cooldownMs };
  }

  private async captureSnapshot(): Promise<void> {
    try {
      await this.options.snapshots.capture();
    } catch (err) {
      this.options.logger.error('Snapshot capture failed', { error: errorMessage(err) });
    }
  }
}
