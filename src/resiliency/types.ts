/**
 * Shared types for the monitor-and-recovery engine.
 */

export type AlertSeverity = 'info' | 'success' | 'warning' | 'critical';

/**
 * Point-in-time result of the probe battery. Frozen on creation.
 */
export interface HealthSnapshot {
  readonly capturedAt: number;
  readonly processRunning: boolean;
  readonly pid: number | null;
  readonly httpHealthy: boolean;
  readonly latencyMs: number;
  readonly memoryMb: number;
  readonly cpuPercent: number;
  readonly diskPercent: number;
  readonly backupMounted: boolean;
  readonly apiReachable: boolean;
  readonly recentErrorCount: number;
}

export type RecoveryState =
  | 'healthy'
  | 'degraded'
  | 'graceful_restart_attempted'
  | 'hard_restart_attempted'
  | 'exhausted';

export interface RestartState {
  /** Failed hard restarts since the last confirmed recovery */
  attempts: number;
  /** Unix seconds of the last completed check */
  lastCheck: number;
}

export interface SnapshotRecord {
  stamp: string;
  createdAt: number;
  /** null when the gateway returned no session data */
  sessionsFile: string | null;
  /** null when the memory workspace could not be copied */
  memoryDir: string | null;
}

export interface LeakSignal {
  growthMb: number;
  oldestMb: number;
  latestMb: number;
  windowSize: number;
}

export function freezeSnapshot(snapshot: HealthSnapshot): HealthSnapshot {
  return Object.freeze({ ...snapshot });
}
