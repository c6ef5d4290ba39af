import { z } from 'zod';

const positiveMs = z.number().int().positive();
const percent = z.number().min(0).max(100);

export const PathsConfigSchema = z.object({
  /** The gateway's home directory (copied by emergency backups) */
  gatewayHome: z.string().min(1),
  watchdogDir: z.string().min(1),
  logFile: z.string().min(1),
  metricsFile: z.string().min(1),
  stateFile: z.string().min(1),
  snapshotDir: z.string().min(1),
  /** Memory workspace: snapshotted before restarts, holds the daily journals */
  memoryDir: z.string().min(1),
  configFile: z.string().min(1),
  errorLog: z.string().min(1),
});

export const GatewayConfigSchema = z.object({
  url: z.string().url(),
  sessionsPath: z.string().startsWith('/'),
  scheduledJobsPath: z.string().startsWith('/'),
  /** Matched against the full command line of running processes */
  processPattern: z.string().min(1),
  /** Service label handed to the OS process supervisor */
  serviceId: z.string().min(1),
  gracefulSignal: z.string().regex(/^SIG[A-Z0-9]+$/),
  upstreamUrl: z.string().url(),
});

export const BackupConfigSchema = z.object({
  volume: z.string().min(1),
  subdir: z.string().min(1),
  configPrefix: z.string().min(1),
});

export const ScheduleConfigSchema = z.object({
  checkIntervalMs: positiveMs,
  heartbeatEveryCycles: z.number().int().positive(),
  scheduledJobsEveryCycles: z.number().int().positive(),
  gracefulSettleMs: z.number().int().nonnegative(),
  hardSettleMs: z.number().int().nonnegative(),
});

export const TimeoutsConfigSchema = z.object({
  healthMs: positiveMs,
  upstreamMs: positiveMs,
  gatewayApiMs: positiveMs,
  commandMs: positiveMs,
  systemMs: positiveMs,
  notifyMs: positiveMs,
});

export const ThresholdsConfigSchema = z.object({
  memoryWarningMb: z.number().positive(),
  memoryCriticalMb: z.number().positive(),
  memoryLeakMb: z.number().positive(),
  memoryWindowSize: z.number().int().min(2),
  diskWarningPercent: percent,
  diskCriticalPercent: percent,
  errorRateCount: z.number().int().nonnegative(),
  errorLogTailLines: z.number().int().positive(),
  errorLogMaxAgeMs: positiveMs,
  responseWarningMs: positiveMs,
  responseCriticalMs: positiveMs,
});

export const RemoteChannelConfigSchema = z.object({
  enabled: z.boolean(),
  /** Gateway CLI used as the message-send primitive */
  command: z.string().min(1),
  channel: z.string().min(1),
  recipient: z.string().min(1),
  webhookUrl: z.string().url().optional(),
});

export const AlertsConfigSchema = z.object({
  cooldownMs: positiveMs,
  desktop: z.boolean(),
  remote: RemoteChannelConfigSchema,
  maxConcurrentDispatches: z.number().int().positive(),
  maxPendingDispatches: z.number().int().positive(),
});

export const WatchdogConfigSchema = z
  .object({
    paths: PathsConfigSchema,
    gateway: GatewayConfigSchema,
    backup: BackupConfigSchema,
    schedule: ScheduleConfigSchema,
    timeouts: TimeoutsConfigSchema,
    thresholds: ThresholdsConfigSchema,
    alerts: AlertsConfigSchema,
    recovery: z.object({
      maxRestartAttempts: z.number().int().positive(),
    }),
    snapshots: z.object({
      retain: z.number().int().positive(),
    }),
    log: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'critical']),
      maxFileSizeBytes: z.number().int().positive(),
      maxFiles: z.number().int().positive(),
      console: z.boolean(),
    }),
  })
  .refine((c) => c.thresholds.memoryCriticalMb > c.thresholds.memoryWarningMb, {
    message: 'memoryCriticalMb must exceed memoryWarningMb',
    path: ['thresholds', 'memoryCriticalMb'],
  })
  .refine((c) => c.thresholds.diskCriticalPercent > c.thresholds.diskWarningPercent, {
    message: 'diskCriticalPercent must exceed diskWarningPercent',
    path: ['thresholds', 'diskCriticalPercent'],
  })
  .refine((c) => c.thresholds.responseCriticalMs > c.thresholds.responseWarningMs, {
    message: 'responseCriticalMs must exceed responseWarningMs',
    path: ['thresholds', 'responseCriticalMs'],
  });

export type WatchdogConfig = z.infer<typeof WatchdogConfigSchema>;

/**
 * Persisted state (owner-only). Field names are the on-disk contract.
 */
export const PersistedStateSchema = z.object({
  restart_attempts: z.number().int().nonnegative(),
  last_check: z.number().int().nonnegative(),
  last_memory_mb: z.number().nonnegative(),
  memory_history: z.array(z.number().nonnegative()),
  config_hash: z.string(),
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;

/**
 * Published metrics (world-readable). Read by the status-display client.
 */
export const MetricsRecordSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  datetime: z.string(),
  gateway: z.object({
    pid: z.number().int().positive().nullable(),
    memory_mb: z.number().nonnegative(),
    cpu_percent: z.number().nonnegative(),
  }),
  system: z.object({
    disk_percent: percent,
    backup_drive_mounted: z.boolean(),
  }),
  health: z.object({
    gateway_running: z.boolean(),
    gateway_healthy: z.boolean(),
    api_reachable: z.boolean(),
  }),
});

export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;

/**
 * Response of the gateway's scheduled-job status endpoint. Unknown fields are ignored.
 */
export const ScheduledJobsResponseSchema = z.object({
  jobs: z
    .array(
      z.object({
        name: z.string(),
        lastRun: z
          .object({
            status: z.string(),
          })
          .nullish(),
      })
    )
    .default([]),
});

export type ScheduledJobsResponse = z.infer<typeof ScheduledJobsResponseSchema>;
