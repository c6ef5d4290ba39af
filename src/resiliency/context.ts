import { MemoryTrendTracker } from './memory-trend.js';
import type { PersistedState } from '../config/schemas.js';
import type { RecoveryState, RestartState } from './types.js';

/**
 * All mutable runtime state of the watchdog, owned by the monitor loop and
 * passed explicitly to every component call that reads or changes it.
 */
export interface WatchdogContext {
  /** 1-based number of the cycle in progress */
  cycle: number;
  restart: RestartState;
  recoveryState: RecoveryState;
  /** Last-fired time (ms) per alert type */
  alerts: Map<string, number>;
  memory: MemoryTrendTracker;
  /** Content hash of the gateway config seen on the last check ('' if unknown) */
  configHash: string;
  /** Cycle of the last scheduled-job check, null before the first */
  jobsCheckedCycle: number | null;
}

export interface ContextOptions {
  memoryWindowSize: number;
  memoryLeakMb: number;
}

export function createWatchdogContext(persisted: PersistedState | null, options: ContextOptions): WatchdogContext {
  return {
    cycle: 0,
    restart: {
      attempts: persisted?.restart_attempts ?? 0,
      lastCheck: persisted?.last_check ?? 0,
    },
    recoveryState: 'healthy',
    alerts: new Map(),
    memory: new MemoryTrendTracker({
      capacity: options.memoryWindowSize,
      thresholdMb: options.memoryLeakMb,
      history: persisted?.memory_history ?? [],
    }),
    configHash: persisted?.config_hash ?? '',
    jobsCheckedCycle: null,
  };
}
