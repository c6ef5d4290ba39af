/**
 * Notification sinks. Each sink delivers one fired alert over one channel;
 * the dispatcher decides whether an alert fires and runs sinks off the loop.
 */

import type { HttpClient } from './http-client.js';
import type { OsFacade } from './os-facade.js';
import type { AlertSeverity } from './types.js';
import { WatchdogError } from '../utils/errors.js';

export interface AlertNotification {
  type: string;
  message: string;
  severity: AlertSeverity;
  firedAt: number;
}

export interface NotificationSink {
  readonly name: string;
  send(alert: AlertNotification): Promise<void>;
}

const SEVERITY_EMOJI: Record<AlertSeverity, string> = {
  warning: '⚠️',
  critical: '🚨',
  info: 'ℹ️',
  success: '✅',
};

export function formatRemoteMessage(alert: Pick<AlertNotification, 'message' | 'severity'>): string {
  return `${SEVERITY_EMOJI[alert.severity]} *Watchdog [${alert.severity}]*: ${alert.message}`;
}

export function desktopSound(severity: AlertSeverity): string {
  return severity === 'critical' ? 'Sosumi' : 'Basso';
}

export class DesktopSink implements NotificationSink {
  readonly name = 'desktop';

  constructor(private readonly os: OsFacade) {}

  async send(alert: AlertNotification): Promise<void> {
    await this.os.notifyDesktop({
      title: `Gateway Watchdog [${alert.severity}]`,
      message: alert.message,
      sound: desktopSound(alert.severity),
    });
  }
}

export interface CommandChannelOptions {
  command: string;
  channel: string;
  recipient: string;
}

/**
 * Sends through the gateway's own message-send CLI.
 */
export class CommandChannelSink implements NotificationSink {
  readonly name: string;

  constructor(
    private readonly os: OsFacade,
    private readonly options: CommandChannelOptions
  ) {
    this.name = `command:${options.channel}`;
  }

  async send(alert: AlertNotification): Promise<void> {
    await this.os.runCommand(this.options.command, [
      'message',
      'send',
      '--channel',
      this.options.channel,
      '--to',
      this.options.recipient,
      '--message',
      formatRemoteMessage(alert),
      '--best-effort',
    ]);
  }
}

/**
 * Slack-compatible incoming webhook.
 */
export class WebhookSink implements NotificationSink {
  readonly name = 'webhook';

  constructor(
    private readonly http: HttpClient,
    private readonly url: string,
    private readonly timeoutMs: number
  ) {}

  async send(alert: AlertNotification): Promise<void> {
    const response = await this.http.postJson(this.url, { text: formatRemoteMessage(alert) }, this.timeoutMs);
    if (response.status >= 400) {
      throw new WatchdogError(`Webhook responded with HTTP ${response.status}`);
    }
  }
}
