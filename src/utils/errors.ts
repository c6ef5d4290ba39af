/**
 * Error Types for the Gateway Watchdog
 *
 * Single source of truth for typed error classes. Checks convert these into
 * negative results or alerts; none of them is allowed to stop the loop.
 */

export class WatchdogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WatchdogError';
  }
}

export class TimeoutError extends WatchdogError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class ConnectionError extends WatchdogError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class ConfigError extends WatchdogError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid watchdog configuration (${source}): ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class OwnershipError extends WatchdogError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Untrusted file ${filePath}: ${reason}`);
    this.name = 'OwnershipError';
    this.filePath = filePath;
  }
}

export class CommandError extends WatchdogError {
  constructor(command: string, reason: string) {
    super(`Command "${command}" failed: ${reason}`);
    this.name = 'CommandError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
