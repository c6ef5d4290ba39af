import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SystemOsFacade, isSignalName } from './os-facade.js';

interface MockProcess {
  pid: number;
  command: string;
  params: string;
  memRss: number;
  cpu: number;
}

interface MockVolume {
  mount: string;
  use: number;
}

const mocks = vi.hoisted(() => {
  const processList: MockProcess[] = [];
  const volumes: MockVolume[] = [];
  return { processList, volumes };
});

vi.mock('systeminformation', () => ({
  processes: async () => ({ list: mocks.processList }),
  fsSize: async () => mocks.volumes,
}));

function facade(platform: NodeJS.Platform = 'linux'): SystemOsFacade {
  return new SystemOsFacade({ commandTimeoutMs: 1000, systemTimeoutMs: 1000, platform });
}

describe('isSignalName', () => {
  it('accepts known signals only', () => {
    expect(isSignalName('SIGUSR1')).toBe(true);
    expect(isSignalName('SIGTERM')).toBe(true);
    expect(isSignalName('SIGBOGUS')).toBe(false);
  });
});

describe('SystemOsFacade', () => {
  beforeEach(() => {
    mocks.processList.length = 0;
    mocks.volumes.length = 0;
  });

  describe('findProcess', () => {
    it('matches the full command line and converts memory to MB', async () => {
      mocks.processList.push(
        { pid: 100, command: 'node', params: '/opt/tools/other.js', memRss: 10_240, cpu: 0 },
        { pid: 4242, command: 'node', params: '/opt/gateway/gateway-server.js --port 18789', memRss: 315_392, cpu: 2.34 }
      );

      expect(await facade().findProcess('gateway-server')).toEqual({
        pid: 4242,
        command: 'node /opt/gateway/gateway-server.js --port 18789',
        memoryMb: 308,
        cpuPercent: 2.3,
      });
    });

    it('never matches the watchdog itself', async () => {
      mocks.processList.push({ pid: process.pid, command: 'node', params: 'gateway-server', memRss: 1024, cpu: 0 });
      expect(await facade().findProcess('gateway-server')).toBeNull();
    });
  });

  describe('volumes', () => {
    it('reports mounts and usage', async () => {
      mocks.volumes.push({ mount: '/', use: 84.6 }, { mount: '/Volumes/Backup', use: 12 });
      const os = facade();

      expect(await os.isVolumeMounted('/Volumes/Backup')).toBe(true);
      expect(await os.isVolumeMounted('/Volumes/Other')).toBe(false);
      expect(await os.diskUsagePercent('/')).toBe(85);
      await expect(os.diskUsagePercent('/Volumes/Other')).rejects.toThrow('No volume mounted at /Volumes/Other');
    });
  });

  describe('runSupervisorRestart', () => {
    it('kickstarts the launchd job on macOS', async () => {
      const os = facade('darwin');
      const run = vi.spyOn(os, 'runCommand').mockResolvedValue(undefined);

      await os.runSupervisorRestart('gateway');

      expect(run).toHaveBeenCalledWith('launchctl', ['kickstart', '-k', `gui/${os.currentUid()}/gateway`]);
    });

    it('restarts the user unit on Linux', async () => {
      const os = facade('linux');
      const run = vi.spyOn(os, 'runCommand').mockResolvedValue(undefined);

      await os.runSupervisorRestart('gateway');

      expect(run).toHaveBeenCalledWith('systemctl', ['--user', 'restart', 'gateway']);
    });

    it('rejects other platforms', async () => {
      await expect(facade('win32').runSupervisorRestart('gateway')).rejects.toThrow(
        'Command "supervisor restart" failed: unsupported platform win32'
      );
    });
  });

  describe('notifyDesktop', () => {
    it('uses osascript with a sound on macOS', async () => {
      const os = facade('darwin');
      const run = vi.spyOn(os, 'runCommand').mockResolvedValue(undefined);

      await os.notifyDesktop({ title: 'Gateway Watchdog [critical]', message: 'Gateway down', sound: 'Sosumi' });

      expect(run).toHaveBeenCalledWith('osascript', [
        '-e',
        'display notification "Gateway down" with title "Gateway Watchdog [critical]" sound name "Sosumi"',
      ]);
    });

    it('uses notify-send on Linux', async () => {
      const os = facade('linux');
      const run = vi.spyOn(os, 'runCommand').mockResolvedValue(undefined);

      await os.notifyDesktop({ title: 'Gateway Watchdog [info]', message: 'Watchdog started', sound: 'Basso' });

      expect(run).toHaveBeenCalledWith('notify-send', ['Gateway Watchdog [info]', 'Watchdog started']);
    });
  });

  it('wraps subprocess failures in CommandError', async () => {
    await expect(facade().runCommand('definitely-not-a-real-binary-xyz', [])).rejects.toThrow(
      'Command "definitely-not-a-real-binary-xyz" failed'
    );
  });
});
