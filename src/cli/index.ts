#!/usr/bin/env node
/**
 * Gateway Watchdog CLI
 * Runs the monitor loop, a one-off probe, or prints the published status.
 */

import { Command } from 'commander';
import { loadWatchdogConfig } from '../config/watchdog-config.js';
import type { WatchdogConfig } from '../config/schemas.js';
import { FetchHttpClient } from '../resiliency/http-client.js';
import { createLogger, type Logger } from '../resiliency/logger.js';
import { MonitorLoop } from '../resiliency/monitor-loop.js';
import { SystemOsFacade } from '../resiliency/os-facade.js';
import { SystemScheduler } from '../resiliency/scheduler.js';
import { ConfigError } from '../utils/errors.js';
import { runStatus } from './commands/status.js';

const VERSION = '0.1.0';

interface GlobalOptions {
  config?: string;
}

interface Runtime {
  config: WatchdogConfig;
  logger: Logger;
  os: SystemOsFacade;
  loop: MonitorLoop;
}

function createRuntime(options: GlobalOptions, consoleOutput: boolean): Runtime {
  const { config } = loadWatchdogConfig({ configPath: options.config });
  const logger = createLogger('watchdog', {
    level: config.log.level,
    file: config.paths.logFile,
    maxFileSize: config.log.maxFileSizeBytes,
    maxFiles: config.log.maxFiles,
    console: consoleOutput && config.log.console,
  });
  const os = new SystemOsFacade({
    commandTimeoutMs: config.timeouts.commandMs,
    systemTimeoutMs: config.timeouts.systemMs,
  });
  const loop = new MonitorLoop({
    config,
    os,
    http: new FetchHttpClient(),
    scheduler: new SystemScheduler(),
    logger,
  });
  return { config, logger, os, loop };
}

const program = new Command();

program
  .name('gateway-watchdog')
  .description('Monitor the gateway service and recover it when it fails')
  .version(VERSION)
  .option('-c, --config <path>', 'Watchdog config file (JSON)');

program
  .command('run', { isDefault: true })
  .description('Run the monitor loop until SIGINT or SIGTERM')
  .action(async () => {
    const { loop } = createRuntime(program.opts<GlobalOptions>(), true);
    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
    await loop.run(controller.signal);
  });

program
  .command('check')
  .description('Run the probe battery once and print the health snapshot as JSON')
  .action(async () => {
    const { loop } = createRuntime(program.opts<GlobalOptions>(), false);
    const snapshot = await loop.probe.probe();
    console.log(JSON.stringify(snapshot, null, 2));
  });

program
  .command('status')
  .description('Print the last published metrics and saved state')
  .action(() => {
    const { config, logger, os } = createRuntime(program.opts<GlobalOptions>(), false);
    runStatus(config, logger, os.currentUid());
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error('Watchdog failed:', err);
  }
  process.exitCode = 1;
});
