/**
 * OS Facade
 *
 * The only place the watchdog touches processes, mounts, signals and the
 * OS process supervisor. Everything above this interface is testable with
 * an in-memory double.
 */

import { execFile } from 'node:child_process';
import os from 'node:os';
import { promisify } from 'node:util';
import * as si from 'systeminformation';
import { withTimeout } from '../utils/async.js';
import { CommandError, errorMessage } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

export interface ProcessInfo {
  pid: number;
  command: string;
  memoryMb: number;
  cpuPercent: number;
}

export interface DesktopNotification {
  title: string;
  message: string;
  sound: string;
}

export interface OsFacade {
  /** First process (other than this one) whose command line contains `pattern` */
  findProcess(pattern: string): Promise<ProcessInfo | null>;
  isVolumeMounted(mountPoint: string): Promise<boolean>;
  /** Percent used of the volume mounted at `mountPoint` */
  diskUsagePercent(mountPoint: string): Promise<number>;
  sendSignal(pid: number, signal: NodeJS.Signals): void;
  runSupervisorRestart(serviceId: string): Promise<void>;
  notifyDesktop(notification: DesktopNotification): Promise<void>;
  runCommand(command: string, args: string[]): Promise<void>;
  currentUid(): number;
  currentUser(): string;
}

export function isSignalName(name: string): name is NodeJS.Signals {
  return Object.prototype.hasOwnProperty.call(os.constants.signals, name);
}

export interface SystemOsFacadeOptions {
  /** Bound for subprocess invocations */
  commandTimeoutMs: number;
  /** Bound for process/filesystem queries */
  systemTimeoutMs: number;
  platform?: NodeJS.Platform;
}

export class SystemOsFacade implements OsFacade {
  private readonly options: SystemOsFacadeOptions;
  private readonly platform: NodeJS.Platform;

  constructor(options: SystemOsFacadeOptions) {
    this.options = options;
    this.platform = options.platform ?? process.platform;
  }

  async findProcess(pattern: string): Promise<ProcessInfo | null> {
    const snapshot = await withTimeout(si.processes(), this.options.systemTimeoutMs, 'process listing');
    const match = snapshot.list.find(
      (p) => p.pid !== process.pid && `${p.command} ${p.params}`.includes(pattern)
    );
    if (!match) return null;
    return {
      pid: match.pid,
      command: `${match.command} ${match.params}`.trim(),
      memoryMb: Math.floor((match.memRss || 0) / 1024), // KB -> MB
      cpuPercent: Math.round((match.cpu || 0) * 10) / 10,
    };
  }

  async isVolumeMounted(mountPoint: string): Promise<boolean> {
    const volumes = await withTimeout(si.fsSize(), this.options.systemTimeoutMs, 'mount listing');
    return volumes.some((v) => v.mount === mountPoint);
  }

  async diskUsagePercent(mountPoint: string): Promise<number> {
    const volumes = await withTimeout(si.fsSize(), this.options.systemTimeoutMs, 'disk usage');
    const volume = volumes.find((v) => v.mount === mountPoint);
    if (!volume) {
      throw new Error(`No volume mounted at ${mountPoint}`);
    }
    return Math.round(volume.use);
  }

  sendSignal(pid: number, signal: NodeJS.Signals): void {
    process.kill(pid, signal);
  }

  async runSupervisorRestart(serviceId: string): Promise<void> {
    if (this.platform === 'darwin') {
      await this.runCommand('launchctl', ['kickstart', '-k', `gui/${this.currentUid()}/${serviceId}`]);
      return;
    }
    if (this.platform === 'linux') {
      await this.runCommand('systemctl', ['--user', 'restart', serviceId]);
      return;
    }
    throw new CommandError('supervisor restart', `unsupported platform ${this.platform}`);
  }

  async notifyDesktop(notification: DesktopNotification): Promise<void> {
    if (this.platform === 'darwin') {
      const script =
        `display notification "${notification.message}" ` +
        `with title "${notification.title}" sound name "${notification.sound}"`;
      await this.runCommand('osascript', ['-e', script]);
      return;
    }
    if (this.platform === 'linux') {
      await this.runCommand('notify-send', [notification.title, notification.message]);
    }
  }

  async runCommand(command: string, args: string[]): Promise<void> {
    try {
      await execFileAsync(command, args, { timeout: this.options.commandTimeoutMs });
    } catch (err) {
      throw new CommandError(command, errorMessage(err));
    }
  }

  currentUid(): number {
    return process.getuid ? process.getuid() : -1;
  }

  currentUser(): string {
    return os.userInfo().username;
  }
}
