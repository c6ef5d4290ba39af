/**
 * Watchdog configuration: defaults, optional JSON file, environment overrides.
 * The merged result is validated by WatchdogConfigSchema.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { WatchdogConfigSchema, type WatchdogConfig } from './schemas.js';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_SCHEDULE_CONFIG = {
  checkIntervalMs: 60_000,
  heartbeatEveryCycles: 10,
  scheduledJobsEveryCycles: 10,
  gracefulSettleMs: 5_000,
  hardSettleMs: 10_000,
} as const;

export const DEFAULT_TIMEOUTS_CONFIG = {
  healthMs: 10_000,
  upstreamMs: 10_000,
  gatewayApiMs: 5_000,
  commandMs: 10_000,
  systemMs: 5_000,
  notifyMs: 10_000,
} as const;

export const DEFAULT_THRESHOLDS_CONFIG = {
  memoryWarningMb: 500,
  memoryCriticalMb: 800,
  memoryLeakMb: 50,
  memoryWindowSize: 10,
  diskWarningPercent: 80,
  diskCriticalPercent: 90,
  errorRateCount: 10,
  errorLogTailLines: 100,
  errorLogMaxAgeMs: 5 * 60_000,
  responseWarningMs: 5_000,
  responseCriticalMs: 10_000,
} as const;

/** Alert cooldown; also the pause after the restart ceiling is reached */
export const DEFAULT_ALERT_COOLDOWN_MS = 30 * 60_000;
export const DEFAULT_MAX_RESTART_ATTEMPTS = 3;
export const DEFAULT_SNAPSHOT_RETENTION = 10;
export const DEFAULT_LOG_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_LOG_MAX_FILES = 5;

export const DEFAULT_GATEWAY_URL = 'http://127.0.0.1:18789';
export const DEFAULT_UPSTREAM_URL = 'https://api.anthropic.com';

export const CONFIG_FILE_NAME = 'watchdog.json';

export function createDefaultConfig(homeDir: string = os.homedir()): WatchdogConfig {
  const gatewayHome = path.join(homeDir, '.gateway');
  const watchdogDir = path.join(gatewayHome, 'watchdog');

  return {
    paths: {
      gatewayHome,
      watchdogDir,
      logFile: path.join(watchdogDir, 'watchdog.log'),
      metricsFile: path.join(watchdogDir, 'metrics.json'),
      stateFile: path.join(watchdogDir, 'state.json'),
      snapshotDir: path.join(watchdogDir, 'snapshots'),
      memoryDir: path.join(gatewayHome, 'workspace', 'memory'),
      configFile: path.join(gatewayHome, 'gateway.json'),
      errorLog: path.join(os.tmpdir(), 'gateway', 'gateway-stderr.log'),
    },
    gateway: {
      url: DEFAULT_GATEWAY_URL,
      sessionsPath: '/api/sessions',
      scheduledJobsPath: '/api/cron/status',
      processPattern: 'gateway-server',
      serviceId: 'gateway',
      gracefulSignal: 'SIGUSR1',
      upstreamUrl: DEFAULT_UPSTREAM_URL,
    },
    backup: {
      volume: '/Volumes/Backup',
      subdir: 'gateway_backup',
      configPrefix: 'gateway',
    },
    schedule: { ...DEFAULT_SCHEDULE_CONFIG },
    timeouts: { ...DEFAULT_TIMEOUTS_CONFIG },
    thresholds: { ...DEFAULT_THRESHOLDS_CONFIG },
    alerts: {
      cooldownMs: DEFAULT_ALERT_COOLDOWN_MS,
      desktop: true,
      remote: {
        enabled: false,
        command: 'gateway',
        channel: 'slack',
        recipient: 'operator',
      },
      maxConcurrentDispatches: 2,
      maxPendingDispatches: 50,
    },
    recovery: {
      maxRestartAttempts: DEFAULT_MAX_RESTART_ATTEMPTS,
    },
    snapshots: {
      retain: DEFAULT_SNAPSHOT_RETENTION,
    },
    log: {
      level: 'info',
      maxFileSizeBytes: DEFAULT_LOG_MAX_FILE_SIZE_BYTES,
      maxFiles: DEFAULT_LOG_MAX_FILES,
      console: true,
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`. Objects merge key by key; anything else replaces.
 */
export function mergeDeep(base: unknown, override: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeDeep(base[key], value);
  }
  return merged;
}

function parseBoolean(raw: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Map WATCHDOG_* environment variables onto a partial config tree.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const gateway: Record<string, unknown> = {};
  const backup: Record<string, unknown> = {};
  const schedule: Record<string, unknown> = {};
  const remote: Record<string, unknown> = {};
  const log: Record<string, unknown> = {};

  if (env.WATCHDOG_GATEWAY_URL) gateway.url = env.WATCHDOG_GATEWAY_URL;
  if (env.WATCHDOG_UPSTREAM_URL) gateway.upstreamUrl = env.WATCHDOG_UPSTREAM_URL;
  if (env.WATCHDOG_PROCESS_PATTERN) gateway.processPattern = env.WATCHDOG_PROCESS_PATTERN;
  if (env.WATCHDOG_SERVICE_ID) gateway.serviceId = env.WATCHDOG_SERVICE_ID;
  if (env.WATCHDOG_BACKUP_VOLUME) backup.volume = env.WATCHDOG_BACKUP_VOLUME;
  if (env.WATCHDOG_CHECK_INTERVAL_MS) schedule.checkIntervalMs = Number(env.WATCHDOG_CHECK_INTERVAL_MS);
  if (env.WATCHDOG_LOG_LEVEL) log.level = env.WATCHDOG_LOG_LEVEL.toLowerCase();
  if (env.WATCHDOG_REMOTE_ENABLED) remote.enabled = parseBoolean(env.WATCHDOG_REMOTE_ENABLED);
  if (env.WATCHDOG_REMOTE_CHANNEL) remote.channel = env.WATCHDOG_REMOTE_CHANNEL;
  if (env.WATCHDOG_REMOTE_RECIPIENT) remote.recipient = env.WATCHDOG_REMOTE_RECIPIENT;
  if (env.WATCHDOG_WEBHOOK_URL) remote.webhookUrl = env.WATCHDOG_WEBHOOK_URL;

  return {
    gateway,
    backup,
    schedule,
    alerts: { remote },
    log,
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; otherwise WATCHDOG_CONFIG, then <watchdogDir>/watchdog.json */
  configPath?: string;
  homeDir?: string;
}

export interface LoadedWatchdogConfig {
  config: WatchdogConfig;
  /** The JSON file that contributed, if any */
  configPath: string | null;
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(configPath, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
}

export function loadWatchdogConfig(options: LoadConfigOptions = {}): LoadedWatchdogConfig {
  const env = options.env ?? process.env;
  const defaults = createDefaultConfig(options.homeDir);

  const explicitPath = options.configPath ?? env.WATCHDOG_CONFIG;
  const candidate = explicitPath ?? path.join(defaults.paths.watchdogDir, CONFIG_FILE_NAME);
  const configPath = (explicitPath || fs.existsSync(candidate)) ? candidate : null;

  let merged: unknown = defaults;
  if (configPath) {
    const fileConfig = readConfigFile(configPath);
    if (!isPlainObject(fileConfig)) {
      throw new ConfigError(configPath, ['top-level value must be an object']);
    }
    merged = mergeDeep(merged, fileConfig);
  }
  merged = mergeDeep(merged, envOverrides(env));

  const result = WatchdogConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(configPath ?? 'defaults+env', issues);
  }
  return { config: result.data, configPath };
}
