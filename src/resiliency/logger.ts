/**
 * Structured Logger
 *
 * Line-oriented logging for the watchdog daemon.
 * - `[YYYY-MM-DD HH:MM:SS] [LEVEL] message` lines, context appended as JSON
 * - Log levels with filtering (alert and security lines are never filtered)
 * - Size-based rotation, keeping a fixed number of rotated files
 * - Every entry is emitted as a `log` event for observers
 */

import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';
import { formatDateTime } from '../utils/time.js';
import { ensureSecureDir, OWNER_ONLY_FILE } from '../utils/secure-fs.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical' | 'alert' | 'security';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  file?: string; // Log file path
  maxFileSize: number; // Max file size in bytes before rotation
  maxFiles: number; // Rotated files to keep (file.1 .. file.N)
  console: boolean; // Mirror lines to stdout
  now: () => number;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
  alert: 5,
  security: 5,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  console: true,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  now: () => Date.now(),
};

export class Logger extends EventEmitter {
  private config: LoggerConfig;
  private component: string;

  constructor(component: string, config: Partial<LoggerConfig> = {}) {
    super();
    this.component = component;
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.file) {
      ensureSecureDir(path.dirname(this.config.file));
    }
  }

  get filePath(): string | undefined {
    return this.config.file;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: Record<string, unknown>): void {
    this.log('critical', message, context);
  }

  /**
   * One line per fired (non-suppressed) alert
   */
  alert(message: string, context?: Record<string, unknown>): void {
    this.log('alert', message, context);
  }

  security(message: string, context?: Record<string, unknown>): void {
    this.log('security', message, context);
  }

  /**
   * Log an error with its name and message
   */
  logError(error: unknown, message: string, context?: Record<string, unknown>): void {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.log('error', message, { ...context, error: detail });
  }

  /**
   * Rotate the log file when it has grown past maxFileSize.
   * Returns true when a rotation happened.
   */
  rotateIfNeeded(): boolean {
    const file = this.config.file;
    if (!file) return false;

    let size: number;
    try {
      size = fs.statSync(file).size;
    } catch {
      return false;
    }
    if (size <= this.config.maxFileSize) return false;

    this.info(`Rotating logs (size: ${Math.floor(size / 1024 / 1024)}MB)`);

    // Shift file.N-1 -> file.N, ..., file.1 -> file.2; file.N is overwritten
    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${file}.${i}`;
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, `${file}.${i + 1}`);
      }
    }

    fs.renameSync(file, `${file}.1`);
    fs.writeFileSync(file, '', { mode: OWNER_ONLY_FILE });
    fs.chmodSync(file, OWNER_ONLY_FILE);
    fs.rmSync(`${file}.${this.config.maxFiles + 1}`, { force: true });
    return true;
  }

  formatLine(entry: LogEntry): string {
    const { timestamp, level, component: _c, message, ...contextFields } = entry;
    let line = `[${formatDateTime(timestamp)}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(contextFields).length > 0) {
      line += ` ${JSON.stringify(contextFields)}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      ...context,
      timestamp: this.config.now(),
      level,
      component: this.component,
      message,
    };

    this.emit('log', entry);

    const line = this.formatLine(entry);

    if (this.config.console) {
      process.stdout.write(`${line}\n`);
    }

    if (this.config.file) {
      this.writeFile(this.config.file, line);
    }
  }

  private writeFile(file: string, line: string): void {
    try {
      fs.appendFileSync(file, `${line}\n`, { encoding: 'utf-8', mode: OWNER_ONLY_FILE });
    } catch (err) {
      // fall back to stderr
      process.stderr.write(`[logger] failed to write ${file}: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}

export function createLogger(component: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(component, config);
}
