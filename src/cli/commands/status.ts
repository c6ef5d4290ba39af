import fs from 'node:fs';
import { MetricsRecordSchema, type MetricsRecord, type PersistedState, type WatchdogConfig } from '../../config/schemas.js';
import type { Logger } from '../../resiliency/logger.js';
import { StateStore } from '../../resiliency/state-store.js';
import { formatDateTime } from '../../utils/time.js';

export interface StatusInput {
  metrics: MetricsRecord | null;
  state: PersistedState | null;
  now: number;
}

export function readMetrics(file: string): MetricsRecord | null {
  try {
    const parsed = MetricsRecordSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function formatAge(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function formatStatus({ metrics, state, now }: StatusInput): string[] {
  const lines = ['Gateway Watchdog Status', '═══════════════════════', ''];

  if (!metrics) {
    lines.push('No metrics published yet');
  } else {
    const { gateway, system, health } = metrics;
    const running = health.gateway_running ? `running (pid ${gateway.pid ?? 'unknown'})` : 'not running';
    const publishedAt = metrics.timestamp * 1000;
    lines.push(`Gateway:      ${running}, ${health.gateway_healthy ? 'healthy' : 'unhealthy'}`);
    lines.push(`Memory:       ${gateway.memory_mb} MB, CPU ${gateway.cpu_percent}%`);
    lines.push(`Disk:         ${system.disk_percent}% used`);
    lines.push(`Backup drive: ${system.backup_drive_mounted ? 'mounted' : 'NOT mounted'}`);
    lines.push(`Upstream API: ${health.api_reachable ? 'reachable' : 'unreachable'}`);
    lines.push(`Updated:      ${formatDateTime(publishedAt)} (${formatAge(now - publishedAt)} ago)`);
  }

  lines.push('');
  if (!state) {
    lines.push('No saved state');
  } else {
    lines.push(`Restart attempts: ${state.restart_attempts}`);
    lines.push(`Memory history:   ${state.memory_history.length > 0 ? state.memory_history.join(', ') + ' MB' : 'empty'}`);
  }
  return lines;
}

export function runStatus(config: WatchdogConfig, logger: Logger, uid: number): void {
  const lines = formatStatus({
    metrics: readMetrics(config.paths.metricsFile),
    state: new StateStore(config.paths.stateFile, logger).load(uid),
    now: Date.now(),
  });
  for (const line of lines) {
    console.log(line);
  }
}
