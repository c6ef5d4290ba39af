/**
 * Snapshot Manager
 *
 * Pre-restart capture of in-flight sessions and the memory workspace,
 * emergency backups of the gateway home, and config restore from backup.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { HttpClient } from './http-client.js';
import type { Journal } from './journal.js';
import type { Logger } from './logger.js';
import type { OsFacade } from './os-facade.js';
import type { SnapshotRecord } from './types.js';
import { OwnershipError, errorMessage } from '../utils/errors.js';
import {
  assertOwnedBy,
  chmodTree,
  ensureSecureDir,
  writeFileAtomic,
  OWNER_ONLY_DIR,
  OWNER_ONLY_FILE,
} from '../utils/secure-fs.js';
import { formatStamp } from '../utils/time.js';

export interface SnapshotManagerOptions {
  snapshotDir: string;
  memoryDir: string;
  gatewayHome: string;
  configFile: string;
  sessionsUrl: string;
  gatewayApiTimeoutMs: number;
  backupVolume: string;
  backupSubdir: string;
  configPrefix: string;
  retain: number;
  http: HttpClient;
  os: OsFacade;
  logger: Logger;
  journal: Journal;
  now: () => number;
}

export type RestoreResult =
  | { restored: true; source: string }
  | { restored: false; reason: string; untrusted: boolean };

type SnapshotKind = 'sessions' | 'memory';

const SNAPSHOT_KINDS: readonly SnapshotKind[] = ['sessions', 'memory'];

interface Entry {
  name: string;
  fullPath: string;
  mtimeMs: number;
}

/** Sockets, FIFOs and device nodes are left out of copies */
function isCopyable(source: string): boolean {
  const stat = fs.lstatSync(source);
  return stat.isFile() || stat.isDirectory() || stat.isSymbolicLink();
}

/**
 * Recursive copy locked down to owner-only modes. A failed copy leaves
 * nothing behind at `dest`.
 */
function copyTreeOwnerOnly(source: string, dest: string): void {
  try {
    fs.cpSync(source, dest, { recursive: true, force: true, filter: isCopyable });
    chmodTree(dest, OWNER_ONLY_DIR);
  } catch (err) {
    fs.rmSync(dest, { recursive: true, force: true });
    throw err;
  }
}

/** Newest first; equal times fall back to the (stamped) name */
function newestFirst(a: Entry, b: Entry): number {
  if (b.mtimeMs !== a.mtimeMs) return b.mtimeMs - a.mtimeMs;
  return b.name.localeCompare(a.name);
}

function listEntries(dir: string, accept: (name: string) => boolean): Entry[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter(accept)
    .map((name) => {
      const fullPath = path.join(dir, name);
      return { name, fullPath, mtimeMs: fs.lstatSync(fullPath).mtimeMs };
    })
    .sort(newestFirst);
}

export class SnapshotManager {
  private readonly options: SnapshotManagerOptions;

  constructor(options: SnapshotManagerOptions) {
    this.options = options;
  }

  get backupRoot(): string {
    return path.join(this.options.backupVolume, this.options.backupSubdir);
  }

  /**
   * Capture sessions and the memory workspace under one stamp, then prune.
   */
  async capture(): Promise<SnapshotRecord> {
    const { snapshotDir, logger } = this.options;
    const createdAt = this.options.now();
    const stamp = formatStamp(createdAt);
    ensureSecureDir(snapshotDir);

    const sessionsFile = await this.captureSessions(stamp);
    const memoryDir = this.captureMemory(stamp);
    this.prune();

    logger.info('Snapshot captured', { stamp, sessions: sessionsFile !== null, memory: memoryDir !== null });
    return { stamp, createdAt, sessionsFile, memoryDir };
  }

  /**
   * Keep the `retain` newest snapshots of each kind.
   */
  prune(): void {
    for (const kind of SNAPSHOT_KINDS) {
      const stale = listEntries(this.options.snapshotDir, (name) => this.isKind(name, kind)).slice(
        this.options.retain
      );
      for (const entry of stale) {
        fs.rmSync(entry.fullPath, { recursive: true, force: true });
      }
    }
  }

  listSnapshots(kind: SnapshotKind): string[] {
    return listEntries(this.options.snapshotDir, (name) => this.isKind(name, kind)).map((e) => e.name);
  }

  /**
   * Copy the whole gateway home onto the backup volume. Returns the backup
   * path, or null when the volume is absent or the copy failed.
   */
  async emergencyBackup(): Promise<string | null> {
    const { os, logger, journal, gatewayHome, backupVolume } = this.options;

    let mounted = false;
    try {
      mounted = await os.isVolumeMounted(backupVolume);
    } catch (err) {
      logger.warn('Could not check backup drive', { error: errorMessage(err) });
    }
    if (!mounted) {
      logger.warn('Backup drive not mounted, skipping emergency backup', { volume: backupVolume });
      return null;
    }

    const name = `emergency-${formatStamp(this.options.now())}`;
    const dest = path.join(this.backupRoot, name);
    try {
      fs.mkdirSync(this.backupRoot, { recursive: true });
      copyTreeOwnerOnly(gatewayHome, dest);
    } catch (err) {
      logger.error('Emergency backup failed', { dest, error: errorMessage(err) });
      return null;
    }

    logger.info('Emergency backup created', { dest });
    journal.append(`Emergency backup created: ${name}`);
    return dest;
  }

  /**
   * Restore the live config from the newest backup, which must be a regular
   * file owned by the current user.
   */
  restoreConfigFromBackup(): RestoreResult {
    const { os, logger, configFile, configPrefix } = this.options;
    const configsDir = path.join(this.backupRoot, 'configs');

    let candidates: Entry[];
    try {
      candidates = listEntries(configsDir, (name) => name.startsWith(`${configPrefix}-`) && name.endsWith('.json'));
    } catch (err) {
      return { restored: false, reason: `cannot list ${configsDir}: ${errorMessage(err)}`, untrusted: false };
    }
    const newest = candidates[0];
    if (!newest) {
      return { restored: false, reason: `no config backup in ${configsDir}`, untrusted: false };
    }

    try {
      assertOwnedBy(newest.fullPath, os.currentUid());
    } catch (err) {
      if (err instanceof OwnershipError) {
        logger.security(`Refusing to restore config: ${err.message}`);
        return { restored: false, reason: err.message, untrusted: true };
      }
      return { restored: false, reason: errorMessage(err), untrusted: false };
    }

    try {
      writeFileAtomic(configFile, fs.readFileSync(newest.fullPath, 'utf-8'), OWNER_ONLY_FILE);
    } catch (err) {
      return { restored: false, reason: `copy failed: ${errorMessage(err)}`, untrusted: false };
    }

    logger.info('Config restored from backup', { source: newest.fullPath });
    return { restored: true, source: newest.fullPath };
  }

  private isKind(name: string, kind: SnapshotKind): boolean {
    return kind === 'sessions' ? name.startsWith('sessions-') && name.endsWith('.json') : name.startsWith('memory-');
  }

  private async captureSessions(stamp: string): Promise<string | null> {
    const { http, logger, sessionsUrl, gatewayApiTimeoutMs, snapshotDir } = this.options;
    try {
      const response = await http.get(sessionsUrl, gatewayApiTimeoutMs);
      const body = response.body.trim();
      if (response.status !== 200 || body === '' || body === 'null') {
        logger.debug('No session data to snapshot', { status: response.status });
        return null;
      }
      const file = path.join(snapshotDir, `sessions-${stamp}.json`);
      writeFileAtomic(file, body, OWNER_ONLY_FILE);
      logger.info('Session snapshot saved', { file });
      return file;
    } catch (err) {
      logger.warn('Session snapshot skipped', { error: errorMessage(err) });
      return null;
    }
  }

  private captureMemory(stamp: string): string | null {
    const { memoryDir, snapshotDir, logger } = this.options;
    if (!fs.existsSync(memoryDir)) {
      return null;
    }
    const dest = path.join(snapshotDir, `memory-${stamp}`);
    try {
      copyTreeOwnerOnly(memoryDir, dest);
      logger.info('Memory snapshot saved', { dir: dest });
      return dest;
    } catch (err) {
      logger.warn('Memory snapshot failed', { error: errorMessage(err) });
      return null;
    }
  }
}
