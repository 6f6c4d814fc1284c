import { describe, expect, it, vi } from 'vitest';
import {
  EmailDriver,
  SlackDriver,
  buildEmailHtml,
  buildEmailSubject,
  buildSlackMessage,
} from '../notify/index.js';
import type { MailTransport } from '../notify/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { TransportTimeoutError } from '../errors.js';
import { makeAlert, makeChannel, makeRule, scriptedFetch } from './helpers.js';

const slackChannel = makeChannel({
  id: 'chan-slack',
  name: 'ops-slack',
  type: 'SLACK',
  configuration: { type: 'SLACK', webhookUrl: 'https://slack.example.test/hook' },
});

const emailChannel = makeChannel({
  id: 'chan-email',
  name: 'ops-email',
  type: 'EMAIL',
  configuration: { type: 'EMAIL', recipients: ['oncall@example.test', 'lead@example.test'] },
});

describe('buildSlackMessage', () => {
  it('carries a summary fallback and a block layout', () => {
    const msg = buildSlackMessage(makeAlert(), makeRule());

    expect(msg.text).toBe('[HIGH] checkout-anomalies - Anomaly Detected: checkout-anomalies - checkout');
    expect(msg.blocks?.map((b) => b.type)).toEqual(['header', 'section', 'divider', 'section', 'context']);
    expect(msg.blocks?.[0]).toEqual({ type: 'header', text: { type: 'plain_text', text: '🚨 HIGH Alert' } });
    expect(msg.blocks?.[3]).toMatchObject({
      fields: expect.arrayContaining([{ type: 'mrkdwn', text: '*Severity:*\n🟠 HIGH' }]),
    });
  });

  it('shows N/A for a missing service', () => {
    const msg = buildSlackMessage(makeAlert({ service: undefined }), makeRule());
    expect(msg.blocks?.[3]).toMatchObject({
      fields: expect.arrayContaining([{ type: 'mrkdwn', text: '*Service:*\nN/A' }]),
    });
  });
});

describe('SlackDriver', () => {
  it('posts the message to the channel webhook', async () => {
    const { fetchFn, calls } = scriptedFetch([200]);
    const driver = new SlackDriver(DEFAULT_CONFIG.notification.slack, { fetchFn });

    const result = await driver.send(makeAlert(), makeRule(), slackChannel);

    expect(result).toEqual({ success: true, attempts: 1 });
    expect(calls[0]?.url).toBe('https://slack.example.test/hook');
    expect(calls[0]?.init?.method).toBe('POST');
  });

  it('reports a non-2xx response as a failure', async () => {
    const { fetchFn } = scriptedFetch([404]);
    const driver = new SlackDriver(DEFAULT_CONFIG.notification.slack, { fetchFn });

    const result = await driver.send(makeAlert(), makeRule(), slackChannel);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('HTTP 404: upstream error');
  });

  it('fails without a request when no webhook URL is configured', async () => {
    const { fetchFn, calls } = scriptedFetch([200]);
    const driver = new SlackDriver(DEFAULT_CONFIG.notification.slack, { fetchFn });
    const channel = makeChannel({ type: 'SLACK', configuration: { type: 'SLACK' } });

    const result = await driver.send(makeAlert(), makeRule(), channel);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Channel ops-webhook has no Slack webhook URL configured');
    expect(calls).toHaveLength(0);
  });

  it('testConnection is false when the post fails', async () => {
    const { fetchFn } = scriptedFetch([new Error('connect ECONNREFUSED')]);
    const driver = new SlackDriver(DEFAULT_CONFIG.notification.slack, { fetchFn });
    await expect(driver.testConnection(slackChannel)).resolves.toBe(false);
  });
});

describe('email content', () => {
  it('uses the summary line as subject', () => {
    expect(buildEmailSubject(makeAlert({ severity: 'CRITICAL' }))).toBe(
      '[CRITICAL] checkout-anomalies - Anomaly Detected: checkout-anomalies - checkout',
    );
  });

  it('escapes alert text and uses the severity colour', () => {
    const html = buildEmailHtml(makeAlert({ description: '<script>alert(1)</script>' }), makeRule());
    expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
    expect(html).toContain('border-left:6px solid #f57c00');
  });
});

describe('EmailDriver', () => {
  function transport(): MailTransport & { sendMail: ReturnType<typeof vi.fn>; verify: ReturnType<typeof vi.fn> } {
    return {
      sendMail: vi.fn().mockResolvedValue({ messageId: 'm-1' }),
      verify: vi.fn().mockResolvedValue(true),
    };
  }

  it('sends one message per recipient', async () => {
    const t = transport();
    const driver = new EmailDriver(DEFAULT_CONFIG.notification.email, { transport: t });

    const result = await driver.send(makeAlert(), makeRule(), emailChannel);

    expect(result).toEqual({ success: true, attempts: 1 });
    expect(t.sendMail).toHaveBeenCalledTimes(2);
    expect(t.sendMail.mock.calls.map((c) => c[0].to)).toEqual(['oncall@example.test', 'lead@example.test']);
    expect(t.sendMail.mock.calls[0]?.[0].from).toBe('"alertctl" <alerts@localhost>');
  });

  it('fails when the channel has no recipients', async () => {
    const t = transport();
    const driver = new EmailDriver(DEFAULT_CONFIG.notification.email, { transport: t });
    const channel = makeChannel({ type: 'EMAIL', configuration: { type: 'EMAIL', recipients: [] } });

    const result = await driver.send(makeAlert(), makeRule(), channel);

    expect(result.success).toBe(false);
    expect(t.sendMail).not.toHaveBeenCalled();
  });

  it('reports a transport error as a failure', async () => {
    const t = transport();
    t.sendMail.mockRejectedValue(new Error('SMTP 421 service not available'));
    const driver = new EmailDriver(DEFAULT_CONFIG.notification.email, { transport: t });

    const result = await driver.send(makeAlert(), makeRule(), emailChannel);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('SMTP 421 service not available');
  });

  it('gives up on a server that never answers after timeoutMs', async () => {
    vi.useFakeTimers();
    try {
      const t = transport();
      t.sendMail.mockReturnValue(new Promise(() => undefined));
      const driver = new EmailDriver(DEFAULT_CONFIG.notification.email, { transport: t });

      const pending = driver.send(makeAlert(), makeRule(), emailChannel);
      await vi.advanceTimersByTimeAsync(10_000);
      const result = await pending;

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(TransportTimeoutError);
        expect(result.error.message).toBe('Request timed out after 10000ms');
      }
      expect(t.sendMail).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it('testConnection verifies the transport', async () => {
    const t = transport();
    const driver = new EmailDriver(DEFAULT_CONFIG.notification.email, { transport: t });
    await expect(driver.testConnection(emailChannel)).resolves.toBe(true);
    expect(t.verify).toHaveBeenCalledOnce();
  });
});
