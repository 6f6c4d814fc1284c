import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { Alert, AlertRule, NotificationChannel, NotificationConfig } from '../types/index.js';
import { NotificationError, TransportTimeoutError } from '../errors.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { toNotificationError } from './http.js';
import { severityColor, summaryLine } from './format.js';
import type { NotificationDriver, SendResult } from './types.js';

/** The slice of a nodemailer Transporter the driver uses. */
export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
  verify(): Promise<boolean>;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildEmailSubject(alert: Alert): string {
  return summaryLine(alert);
}

export function buildEmailHtml(alert: Alert, rule: AlertRule): string {
  const color = severityColor(alert.severity);
  const rows: Array<[string, string]> = [
    ['Rule', rule.name],
    ['Severity', alert.severity],
    ['Status', alert.status],
    ['Service', alert.service ?? 'N/A'],
    ['Created', alert.createdAt],
  ];
  if (alert.anomalyDetectionId) rows.push(['Anomaly ID', alert.anomalyDetectionId]);
  rows.push(['Alert ID', alert.id]);

  const tableRows = rows
    .map(
      ([label, value]) =>
        `<tr><td style="padding:4px 12px 4px 0;font-weight:bold">${label}</td><td style="padding:4px 0">${escapeHtml(value)}</td></tr>`,
    )
    .join('\n');

  return `<!DOCTYPE html>
<html>
<body style="font-family:Arial,sans-serif;color:#333">
<div style="border-left:6px solid ${color};padding:12px 16px;max-width:640px">
<h2 style="color:${color};margin:0 0 8px">${escapeHtml(alert.title)}</h2>
<table style="border-collapse:collapse;font-size:14px">
${tableRows}
</table>
<h3 style="margin:16px 0 4px">Description</h3>
<pre style="white-space:pre-wrap;font-family:inherit;margin:0">${escapeHtml(alert.description)}</pre>
<p style="color:#888;font-size:12px;margin-top:16px">Sent by alertctl anomaly monitoring</p>
</div>
</body>
</html>
`;
}

// Bounds the whole exchange; nodemailer's own timeouts only cover one stage each.
async function withDeadline<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TransportTimeoutError('EMAIL', timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface EmailDriverOptions {
  transport?: MailTransport;
  log?: Logger;
}

export class EmailDriver implements NotificationDriver {
  readonly type = 'EMAIL';
  private readonly transport: MailTransport;
  private readonly log: Logger;

  constructor(
    private readonly config: NotificationConfig['email'],
    opts: EmailDriverOptions = {},
  ) {
    this.log = opts.log ?? silentLogger;
    this.transport =
      opts.transport ??
      nodemailer.createTransport({
        host: config.smtp.host,
        port: config.smtp.port,
        secure: config.smtp.secure,
        auth: config.smtp.user ? { user: config.smtp.user, pass: config.smtp.pass } : undefined,
        connectionTimeout: config.timeoutMs,
        greetingTimeout: config.timeoutMs,
        socketTimeout: config.timeoutMs,
      });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  async send(alert: Alert, rule: AlertRule, channel: NotificationChannel): Promise<SendResult> {
    try {
      const recipients = this.recipients(channel);
      const subject = buildEmailSubject(alert);
      const html = buildEmailHtml(alert, rule);
      // One message per recipient so addresses are not disclosed to each other
      await withDeadline(
        Promise.all(recipients.map((to) => this.transport.sendMail({ from: this.from(), to, subject, html }))),
        this.config.timeoutMs,
      );
      this.log.info(`Email notification sent for alert ${alert.id}`, {
        channel: channel.name,
        recipients: recipients.length,
      });
      return { success: true, attempts: 1 };
    } catch (err) {
      const error = toNotificationError('EMAIL', err);
      this.log.error(`Email notification failed for alert ${alert.id}`, {
        channel: channel.name,
        error: error.message,
      });
      return { success: false, attempts: 1, error };
    }
  }

  async testConnection(channel: NotificationChannel): Promise<boolean> {
    try {
      this.recipients(channel);
      return await withDeadline(this.transport.verify(), this.config.timeoutMs);
    } catch (err) {
      this.log.warn(`Email test failed for channel ${channel.name}`, {
        error: toNotificationError('EMAIL', err).message,
      });
      return false;
    }
  }

  private from(): string {
    return `"${this.config.fromName}" <${this.config.from}>`;
  }

  private recipients(channel: NotificationChannel): string[] {
    const cfg = channel.configuration;
    if (cfg.type !== 'EMAIL' || cfg.recipients.length === 0) {
      throw new NotificationError('EMAIL', `Channel ${channel.name} has no email recipients configured`);
    }
    return cfg.recipients;
  }
}
