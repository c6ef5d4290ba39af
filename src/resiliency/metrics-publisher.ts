/**
 * Publishes the latest HealthSnapshot for the status-display client.
 * The file is world-readable and always replaced atomically.
 */

import { MetricsRecordSchema, type MetricsRecord } from '../config/schemas.js';
import type { HealthSnapshot } from './types.js';
import { writeFileAtomic, WORLD_READABLE_FILE } from '../utils/secure-fs.js';
import { toUnixSeconds } from '../utils/time.js';

export function toMetricsRecord(snapshot: HealthSnapshot): MetricsRecord {
  return MetricsRecordSchema.parse({
    timestamp: toUnixSeconds(snapshot.capturedAt),
    datetime: new Date(snapshot.capturedAt).toISOString(),
    gateway: {
      pid: snapshot.pid,
      memory_mb: snapshot.memoryMb,
      cpu_percent: snapshot.cpuPercent,
    },
    system: {
      disk_percent: snapshot.diskPercent,
      backup_drive_mounted: snapshot.backupMounted,
    },
    health: {
      gateway_running: snapshot.processRunning,
      gateway_healthy: snapshot.httpHealthy,
      api_reachable: snapshot.apiReachable,
    },
  });
}

export class MetricsPublisher {
  constructor(private readonly file: string) {}

  get filePath(): string {
    return this.file;
  }

  publish(snapshot: HealthSnapshot): MetricsRecord {
    const record = toMetricsRecord(snapshot);
    writeFileAtomic(this.file, JSON.stringify(record, null, 2), WORLD_READABLE_FILE);
    return record;
  }
}
