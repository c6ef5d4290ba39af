/**
 * Gateway Monitor-and-Recovery Engine
 *
 * Polls the gateway's liveness and quality signals, detects degradation,
 * escalates through graceful and hard restarts, and notifies the operator
 * through rate-limited alerts.
 *
 * Usage:
 *
 * ```ts
 * import { MonitorLoop, SystemOsFacade, FetchHttpClient, SystemScheduler, createLogger } from 'gateway-watchdog';
 *
 * const loop = new MonitorLoop({
 *   config,
 *   os: new SystemOsFacade({ commandTimeoutMs: 10_000, systemTimeoutMs: 5_000 }),
 *   http: new FetchHttpClient(),
 *   scheduler: new SystemScheduler(),
 *   logger: createLogger('watchdog', { file: config.paths.logFile }),
 * });
 * await loop.run(controller.signal);
 * ```
 */

export { AlertDispatcher, type AlertDispatcherOptions } from './alert-dispatcher.js';
export { createWatchdogContext, type WatchdogContext, type ContextOptions } from './context.js';
export {
  HealthProbe,
  PRIMARY_VOLUME,
  hashContent,
  tailLines,
  type HealthProbeOptions,
  type ProcessStatus,
  type HttpStatus,
  type ConfigStatus,
  type ConfigCheckResult,
} from './health-probe.js';
export { FetchHttpClient, type HttpClient, type HttpResponse } from './http-client.js';
export { Journal, JOURNAL_HEADING } from './journal.js';
export { Logger, createLogger, type LogLevel, type LogEntry, type LoggerConfig } from './logger.js';
export { MemoryTrendTracker } from './memory-trend.js';
export { MetricsPublisher, toMetricsRecord } from './metrics-publisher.js';
export {
  MonitorLoop,
  buildSinks,
  type MonitorLoopDeps,
  type CycleOutcome,
  type CycleResult,
} from './monitor-loop.js';
export {
  CommandChannelSink,
  DesktopSink,
  WebhookSink,
  desktopSound,
  formatRemoteMessage,
  type AlertNotification,
  type NotificationSink,
} from './notification-sinks.js';
export {
  SystemOsFacade,
  isSignalName,
  type OsFacade,
  type ProcessInfo,
  type DesktopNotification,
} from './os-facade.js';
export { RecoveryController, type RecoveryControllerOptions, type RecoveryOutcome } from './recovery-controller.js';
export { SystemScheduler, VirtualScheduler, type Scheduler } from './scheduler.js';
export { SnapshotManager, type SnapshotManagerOptions, type RestoreResult } from './snapshot-manager.js';
export { StateStore } from './state-store.js';
export { BackgroundTaskQueue, type BackgroundTask, type BackgroundTaskQueueOptions } from './task-queue.js';
export {
  freezeSnapshot,
  type AlertSeverity,
  type HealthSnapshot,
  type RecoveryState,
  type RestartState,
  type SnapshotRecord,
  type LeakSignal,
} from './types.js';
