import type { Alert, AlertRule, NotificationChannel, NotificationConfig } from '../types/index.js';
import { NotificationError } from '../errors.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { sendJson, toNotificationError } from './http.js';
import { severityEmoji, summaryLine } from './format.js';
import type { NotificationDriver, SendResult } from './types.js';

interface SlackText {
  type: 'mrkdwn' | 'plain_text';
  text: string;
}

export type SlackBlock =
  | { type: 'header'; text: SlackText }
  | { type: 'section'; text?: SlackText; fields?: SlackText[] }
  | { type: 'divider' }
  | { type: 'context'; elements: SlackText[] };

export interface SlackMessage {
  text: string;
  blocks?: SlackBlock[];
}

const md = (text: string): SlackText => ({ type: 'mrkdwn', text });

export function buildSlackMessage(alert: Alert, rule: AlertRule): SlackMessage {
  return {
    text: summaryLine(alert),
    blocks: [
      {
        type: 'header',
        text: { type: 'plain_text', text: `🚨 ${alert.severity} Alert` },
      },
      { type: 'section', text: md(`*${alert.title}*`) },
      { type: 'divider' },
      {
        type: 'section',
        fields: [
          md(`*Rule:*\n${rule.name}`),
          md(`*Severity:*\n${severityEmoji(alert.severity)} ${alert.severity}`),
          md(`*Status:*\n${alert.status}`),
          md(`*Service:*\n${alert.service ?? 'N/A'}`),
          md(`*Created:*\n${alert.createdAt}`),
          md(`*Alert ID:*\n${alert.id}`),
        ],
      },
      {
        type: 'context',
        elements: [md('Sent by alertctl anomaly monitoring')],
      },
    ],
  };
}

export interface SlackDriverOptions {
  fetchFn?: typeof fetch;
  log?: Logger;
}

export class SlackDriver implements NotificationDriver {
  readonly type = 'SLACK';
  private readonly log: Logger;

  constructor(
    private readonly config: NotificationConfig['slack'],
    private readonly opts: SlackDriverOptions = {},
  ) {
    this.log = opts.log ?? silentLogger;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async send(alert: Alert, rule: AlertRule, channel: NotificationChannel): Promise<SendResult> {
    try {
      const url = this.webhookUrl(channel);
      await sendJson('SLACK', url, buildSlackMessage(alert, rule), {
        timeoutMs: this.config.timeoutMs,
        fetchFn: this.opts.fetchFn,
      });
      this.log.info(`Slack notification sent for alert ${alert.id}`, { channel: channel.name });
      return { success: true, attempts: 1 };
    } catch (err) {
      const error = toNotificationError('SLACK', err);
      this.log.error(`Slack notification failed for alert ${alert.id}`, {
        channel: channel.name,
        error: error.message,
      });
      return { success: false, attempts: 1, error };
    }
  }

  async testConnection(channel: NotificationChannel): Promise<boolean> {
    try {
      await sendJson(
        'SLACK',
        this.webhookUrl(channel),
        { text: `✅ Test message from alertctl. Channel "${channel.name}" is configured correctly.` },
        { timeoutMs: this.config.timeoutMs, fetchFn: this.opts.fetchFn },
      );
      return true;
    } catch (err) {
      this.log.warn(`Slack test failed for channel ${channel.name}`, {
        error: toNotificationError('SLACK', err).message,
      });
      return false;
    }
  }

  private webhookUrl(channel: NotificationChannel): string {
    const cfg = channel.configuration;
    if (cfg.type !== 'SLACK' || !cfg.webhookUrl) {
      throw new NotificationError('SLACK', `Channel ${channel.name} has no Slack webhook URL configured`);
    }
    return cfg.webhookUrl;
  }
}
