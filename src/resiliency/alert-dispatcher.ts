/**
 * Alert Dispatcher
 *
 * Deduplicates alerts per type with a cooldown, records fired alerts in the
 * log and the journal, and fans them out to the configured sinks on the
 * background queue so a slow channel never holds up a cycle.
 */

import type { WatchdogContext } from './context.js';
import type { Journal } from './journal.js';
import type { Logger } from './logger.js';
import type { NotificationSink, AlertNotification } from './notification-sinks.js';
import type { BackgroundTaskQueue } from './task-queue.js';
import type { AlertSeverity } from './types.js';
import { sanitize } from '../utils/sanitize.js';

export interface AlertDispatcherOptions {
  cooldownMs: number;
  now: () => number;
  logger: Logger;
  journal: Journal;
  queue: BackgroundTaskQueue;
  sinks: NotificationSink[];
}

export class AlertDispatcher {
  private readonly options: AlertDispatcherOptions;

  constructor(options: AlertDispatcherOptions) {
    this.options = options;
  }

  /**
   * Returns true when the alert fired, false when it was inside its cooldown.
   */
  notify(
    ctx: Pick<WatchdogContext, 'alerts'>,
    type: string,
    message: string,
    severity: AlertSeverity = 'warning'
  ): boolean {
    const { logger, journal, queue, cooldownMs } = this.options;
    const safeType = sanitize(type);
    const safeMessage = sanitize(message);
    const now = this.options.now();

    const lastFired = ctx.alerts.get(safeType);
    if (lastFired !== undefined && now - lastFired < cooldownMs) {
      logger.debug(`Alert suppressed (cooldown): ${safeType}`);
      return false;
    }

    ctx.alerts.set(safeType, now);
    logger.alert(`ALERT [${severity}] ${safeType}: ${safeMessage}`);
    journal.append(`[${severity}] ${safeMessage}`);

    const alert: AlertNotification = { type: safeType, message: safeMessage, severity, firedAt: now };
    for (const sink of this.options.sinks) {
      queue.enqueue({ label: `${sink.name} ${safeType}`, run: () => sink.send(alert) });
    }
    return true;
  }

  /**
   * Wait for queued deliveries (used on shutdown and in tests).
   */
  drain(): Promise<void> {
    return this.options.queue.drain();
  }
}
