/**
 * Persistent watchdog state (restart counter, memory history, config hash).
 * Read once at startup, rewritten atomically after every cycle.
 */

import fs from 'node:fs';
import type { WatchdogContext } from './context.js';
import type { Logger } from './logger.js';
import { PersistedStateSchema, type PersistedState } from '../config/schemas.js';
import { errorMessage } from '../utils/errors.js';
import { isOwnedBy, writeFileAtomic, OWNER_ONLY_FILE } from '../utils/secure-fs.js';
import { toUnixSeconds } from '../utils/time.js';

export class StateStore {
  private readonly file: string;
  private readonly logger: Logger;

  constructor(file: string, logger: Logger) {
    this.file = file;
    this.logger = logger;
  }

  get filePath(): string {
    return this.file;
  }

  exists(): boolean {
    return fs.existsSync(this.file);
  }

  /**
   * Returns null when there is no usable state: missing, not owned by `uid`,
   * unparsable or failing validation.
   */
  load(uid: number): PersistedState | null {
    if (!this.exists()) {
      return null;
    }
    if (!isOwnedBy(this.file, uid)) {
      this.logger.security('State file not owned by current user, ignoring it', { file: this.file });
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.file, 'utf-8'));
    } catch (err) {
      this.logger.warn('Failed to read state file, starting fresh', { file: this.file, error: errorMessage(err) });
      return null;
    }

    const parsed = PersistedStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('State file failed validation, starting fresh', {
        file: this.file,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  /**
   * Persist the context and stamp `ctx.restart.lastCheck`.
   */
  save(ctx: WatchdogContext, now: number): PersistedState {
    const record = PersistedStateSchema.parse({
      restart_attempts: ctx.restart.attempts,
      last_check: toUnixSeconds(now),
      last_memory_mb: ctx.memory.latest ?? 0,
      memory_history: ctx.memory.samples(),
      config_hash: ctx.configHash,
    });
    writeFileAtomic(this.file, JSON.stringify(record, null, 2), OWNER_ONLY_FILE);
    ctx.restart.lastCheck = record.last_check;
    return record;
  }
}
