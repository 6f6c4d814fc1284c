import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import type {
  Alert,
  AlertRule,
  NotificationChannel,
  NotificationConfig,
  WebhookChannelConfig,
} from '../types/index.js';
import { NotificationError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { sendJson, toNotificationError } from './http.js';
import type { NotificationDriver, SendResult, Sleep } from './types.js';

export const WEBHOOK_SOURCE = 'alertctl';
export const WEBHOOK_PAYLOAD_VERSION = '1.0';

export interface WebhookPayload {
  alert_id: string;
  title: string;
  description: string;
  severity: string;
  status: string;
  created_at: string;
  alert_rule: { id: string; name: string; type: string };
  service?: string;
  anomaly?: { detection_id?: string; log_id?: string };
  context?: unknown;
  metadata: { source: string; version: string; timestamp: string };
}

const HeadersSchema = z.record(z.string());

/** Custom headers from the channel's JSON string. Anything malformed yields no headers. */
export function parseHeaders(raw: string | undefined, log: Logger = silentLogger): Record<string, string> {
  if (!raw || raw.trim() === '') return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn('Ignoring malformed webhook headers', { error: errorMessage(err) });
    return {};
  }
  const result = HeadersSchema.safeParse(parsed);
  if (!result.success) {
    log.warn('Ignoring webhook headers that are not a string map');
    return {};
  }
  return result.data;
}

export function buildWebhookPayload(
  alert: Alert,
  rule: AlertRule,
  now: Date = new Date(),
  log: Logger = silentLogger,
): WebhookPayload {
  const payload: WebhookPayload = {
    alert_id: alert.id,
    title: alert.title,
    description: alert.description,
    severity: alert.severity,
    status: alert.status,
    created_at: alert.createdAt,
    alert_rule: { id: rule.id, name: rule.name, type: rule.type },
    metadata: {
      source: WEBHOOK_SOURCE,
      version: WEBHOOK_PAYLOAD_VERSION,
      timestamp: now.toISOString(),
    },
  };

  if (alert.service) payload.service = alert.service;
  if (alert.anomalyDetectionId || alert.logId) {
    payload.anomaly = { detection_id: alert.anomalyDetectionId, log_id: alert.logId };
  }
  if (alert.context) {
    try {
      payload.context = JSON.parse(alert.context);
    } catch {
      log.warn(`Alert ${alert.id} context is not valid JSON; sending it as a string`);
      payload.context = alert.context;
    }
  }
  return payload;
}

export interface WebhookDriverOptions {
  retry: NotificationConfig['retry'];
  fetchFn?: typeof fetch;
  sleep?: Sleep;
  log?: Logger;
}

export class WebhookDriver implements NotificationDriver {
  readonly type = 'WEBHOOK';
  private readonly log: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: NotificationConfig['webhook'],
    private readonly opts: WebhookDriverOptions,
  ) {
    this.log = opts.log ?? silentLogger;
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async send(alert: Alert, rule: AlertRule, channel: NotificationChannel): Promise<SendResult> {
    let cfg: WebhookChannelConfig;
    let url: string;
    try {
      cfg = this.channelConfig(channel);
      url = this.url(channel, cfg);
    } catch (err) {
      return { success: false, attempts: 0, error: toNotificationError('WEBHOOK', err) };
    }

    const payload = buildWebhookPayload(alert, rule, new Date(), this.log);
    const headers = parseHeaders(cfg.headers, this.log);
    const retry = cfg.retryOnFailure ?? this.config.retryOnFailure;
    const maxAttempts = retry ? this.opts.retry.maxAttempts : 1;

    let lastError: NotificationError | undefined;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await sendJson('WEBHOOK', url, payload, {
          method: cfg.method,
          headers,
          timeoutMs: this.config.timeoutMs,
          fetchFn: this.opts.fetchFn,
        });
        this.log.info(`Webhook notification sent for alert ${alert.id}`, {
          channel: channel.name,
          attempt,
        });
        return { success: true, attempts: attempt };
      } catch (err) {
        lastError = toNotificationError('WEBHOOK', err);
        if (!lastError.retryable || attempt === maxAttempts) {
          this.log.error(`Webhook notification failed for alert ${alert.id}`, {
            channel: channel.name,
            attempts: attempt,
            error: lastError.message,
          });
          return { success: false, attempts: attempt, error: lastError };
        }
        const wait = this.opts.retry.backoffDelayMs * 2 ** (attempt - 1);
        this.log.warn(`Webhook attempt ${attempt}/${maxAttempts} failed, retrying in ${wait}ms`, {
          channel: channel.name,
          error: lastError.message,
        });
        await this.sleep(wait);
      }
    }
    // maxAttempts is at least 1, so the loop always returns
    return {
      success: false,
      attempts: maxAttempts,
      error: lastError ?? new NotificationError('WEBHOOK', 'No attempts made'),
    };
  }

  async testConnection(channel: NotificationChannel): Promise<boolean> {
    try {
      const cfg = this.channelConfig(channel);
      await sendJson(
        'WEBHOOK',
        this.url(channel, cfg),
        {
          test: true,
          message: 'Test notification from alertctl',
          timestamp: new Date().toISOString(),
        },
        {
          method: cfg.method,
          headers: parseHeaders(cfg.headers, this.log),
          timeoutMs: this.config.timeoutMs,
          fetchFn: this.opts.fetchFn,
        },
      );
      return true;
    } catch (err) {
      this.log.warn(`Webhook test failed for channel ${channel.name}`, {
        error: toNotificationError('WEBHOOK', err).message,
      });
      return false;
    }
  }

  private channelConfig(channel: NotificationChannel): WebhookChannelConfig {
    const cfg = channel.configuration;
    if (cfg.type !== 'WEBHOOK') {
      throw new NotificationError('WEBHOOK', `Channel ${channel.name} is not a webhook channel`);
    }
    return cfg;
  }

  private url(channel: NotificationChannel, cfg: WebhookChannelConfig): string {
    if (!cfg.url) {
      throw new NotificationError('WEBHOOK', `Channel ${channel.name} has no webhook URL configured`);
    }
    return cfg.url;
  }
}
