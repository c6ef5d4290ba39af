/**
 * Filesystem helpers for files an external reader polls or the watchdog
 * later trusts.
 *
 * - Atomic writes (temp file in the same directory, then rename)
 * - Explicit modes, independent of the process umask
 * - Ownership verification for files the watchdog will act on
 */

import fs from 'node:fs';
import path from 'node:path';
import { OwnershipError } from './errors.js';

export const OWNER_ONLY_FILE = 0o600;
export const OWNER_ONLY_DIR = 0o700;
export const WORLD_READABLE_FILE = 0o644;

let tmpCounter = 0;

export function writeFileAtomic(filePath: string, content: string, mode: number = OWNER_ONLY_FILE): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  tmpCounter += 1;
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${tmpCounter}.tmp`);
  try {
    fs.writeFileSync(tmpPath, content, { encoding: 'utf-8', mode });
    fs.chmodSync(tmpPath, mode);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function ensureSecureDir(dirPath: string, mode: number = OWNER_ONLY_DIR): void {
  fs.mkdirSync(dirPath, { recursive: true, mode });
  fs.chmodSync(dirPath, mode);
}

/**
 * Recursively apply a mode to a directory tree (files and directories alike).
 * Symlinks are left untouched.
 */
export function chmodTree(target: string, mode: number): void {
  const stat = fs.lstatSync(target);
  if (stat.isSymbolicLink()) return;
  fs.chmodSync(target, mode);
  if (stat.isDirectory()) {
    for (const entry of fs.readdirSync(target)) {
      chmodTree(path.join(target, entry), mode);
    }
  }
}

/**
 * Throws OwnershipError unless the path is a regular file owned by `uid`.
 */
export function assertOwnedBy(filePath: string, uid: number): void {
  const stat = fs.lstatSync(filePath);
  if (stat.isSymbolicLink()) {
    throw new OwnershipError(filePath, 'is a symlink');
  }
  if (!stat.isFile()) {
    throw new OwnershipError(filePath, 'is not a regular file');
  }
  if (stat.uid !== uid) {
    throw new OwnershipError(filePath, `owned by uid ${stat.uid}, expected ${uid}`);
  }
}

export function isOwnedBy(filePath: string, uid: number): boolean {
  try {
    assertOwnedBy(filePath, uid);
    return true;
  } catch {
    return false;
  }
}
