/**
 * Dispatcher end to end over JSON stores in a temp dir, with real drivers
 * and an in-process fetch stand-in routed by URL.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Dispatcher } from '../dispatch/index.js';
import { RateLimiter } from '../ratelimit/index.js';
import { createDrivers } from '../notify/index.js';
import { resolveRuleInput } from '../rules/index.js';
import { JsonAlertStore, JsonChannelStore, JsonRuleStore } from '../store/index.js';
import { getAuditStore } from '../audit/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { AlertRule, Config, CreateAlertRuleInput, NotificationChannel } from '../types/index.js';
import { NotFoundError, UpstreamUnavailableError } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import { makeAnomaly, makeTempDir, testConfig } from './helpers.js';

const SLACK_URL = 'https://slack.example.test/hook';
const WEBHOOK_URL = 'https://hooks.example.test/alerts';

describe('Dispatcher', () => {
  let cleanup: () => Promise<void>;
  let rules: JsonRuleStore;
  let channels: JsonChannelStore;
  let alerts: JsonAlertStore;
  let routes: Map<string, number | Error>;
  let requests: string[];
  let slack: NotificationChannel;
  let webhook: NotificationChannel;

  const fetchFn: typeof fetch = async (input) => {
    const url = String(input);
    requests.push(url);
    const route = routes.get(url) ?? 404;
    if (route instanceof Error) throw route;
    return new Response('', { status: route });
  };

  function dispatcher(config: Config = DEFAULT_CONFIG): Dispatcher {
    return new Dispatcher({
      stores: { rules, channels, alerts },
      limiter: new RateLimiter(config.rateLimit),
      drivers: createDrivers(config.notification, {
        log: silentLogger,
        fetchFn,
        sleep: async () => undefined,
      }),
    });
  }

  async function rule(input: Partial<CreateAlertRuleInput> = {}): Promise<AlertRule> {
    return rules.create(
      resolveRuleInput(
        { name: 'checkout-rule', type: 'ANOMALY_DETECTION', cooldownMinutes: 0, ...input },
        DEFAULT_CONFIG.rules,
      ),
    );
  }

  beforeEach(async () => {
    const tmp = await makeTempDir();
    cleanup = tmp.cleanup;
    rules = new JsonRuleStore(tmp.dir);
    channels = new JsonChannelStore(rules, tmp.dir);
    alerts = new JsonAlertStore(tmp.dir);
    routes = new Map([
      [SLACK_URL, 200],
      [WEBHOOK_URL, 200],
    ]);
    requests = [];
    slack = await channels.create({ name: 'ops-slack', configuration: { type: 'SLACK', webhookUrl: SLACK_URL } });
    webhook = await channels.create({
      name: 'ops-webhook',
      configuration: { type: 'WEBHOOK', url: WEBHOOK_URL, retryOnFailure: false },
    });
  });

  afterEach(async () => {
    await cleanup();
  });

  it('creates an OPEN alert with the rule severity and notifies', async () => {
    const r = await rule({ anomalyThreshold: 0.7, severity: 'HIGH', channelIds: [webhook.id] });

    const result = await dispatcher().handleTrigger(r, makeAnomaly({ logId: 'log-42', confidence: 0.85 }));

    expect(result.status).toBe('created');
    expect(result.outcomes).toEqual([
      { channelId: webhook.id, channelName: 'ops-webhook', channelType: 'WEBHOOK', success: true, attempts: 1 },
    ]);
    const alert = await alerts.findById(result.alertId ?? '');
    expect(alert).toMatchObject({
      status: 'OPEN',
      severity: 'HIGH',
      title: 'Anomaly Detected: checkout-rule - checkout',
      anomalyDetectionId: 'log-42',
      logId: 'log-42',
      notificationSent: true,
      notificationFailureCount: 0,
    });
    expect(alert?.description).toBe(
      [
        'An anomaly was detected by the ML service.',
        '',
        'Confidence: 85.00%',
        'Anomaly Score: 0.50',
        '',
        'Log Message: payment gateway returned 502',
        'Log Level: ERROR',
        '',
        'Detected At: 2026-01-15T10:00:00.000Z',
      ].join('\n'),
    );
    expect((await rules.findById(r.id))?.triggerCount).toBe(1);
    expect((await channels.findById(webhook.id))?.successCount).toBe(1);
  });

  it('returns duplicate for the same rule and anomaly without notifying again', async () => {
    const r = await rule({ channelIds: [webhook.id] });
    const d = dispatcher();

    const first = await d.handleTrigger(r, makeAnomaly());
    const second = await d.handleTrigger(r, makeAnomaly());

    expect(second).toEqual({ status: 'duplicate', alertId: first.alertId, outcomes: [] });
    expect(await alerts.list()).toHaveLength(1);
    expect(requests).toEqual([WEBHOOK_URL]);
  });

  it('creates one alert when the same trigger races itself', async () => {
    const r = await rule();
    const d = dispatcher();

    const results = await Promise.all([d.handleTrigger(r, makeAnomaly()), d.handleTrigger(r, makeAnomaly())]);

    expect(results.map((x) => x.status).sort()).toEqual(['created', 'duplicate']);
    expect(await alerts.list()).toHaveLength(1);
  });

  it('keeps the alert and other channels when one channel fails', async () => {
    routes.set(SLACK_URL, new Error('connect ECONNREFUSED'));
    const r = await rule({ channelIds: [slack.id, webhook.id] });

    const result = await dispatcher().handleTrigger(r, makeAnomaly());

    expect(result.status).toBe('created_with_failures');
    expect(result.outcomes.map((o) => [o.channelName, o.success])).toEqual([
      ['ops-slack', false],
      ['ops-webhook', true],
    ]);
    const alert = await alerts.findById(result.alertId ?? '');
    expect(alert?.notificationSent).toBe(false);
    expect(alert?.notificationFailureCount).toBe(1);
    expect(alert?.lastNotificationError).toBe('Request failed: connect ECONNREFUSED');
    expect((await channels.findById(slack.id))?.failureCount).toBe(1);
    expect((await channels.findById(webhook.id))?.successCount).toBe(1);
  });

  it('suppresses the 11th alert in the window and audits it', async () => {
    const r = await rule();
    const d = dispatcher();

    for (let i = 1; i <= 10; i++) {
      expect((await d.handleTrigger(r, makeAnomaly({ logId: `log-${i}` }))).status).toBe('created');
    }
    const eleventh = await d.handleTrigger(r, makeAnomaly({ logId: 'log-11' }));

    expect(eleventh).toEqual({ status: 'suppressed', suppression: 'rate_limit', outcomes: [] });
    expect(await alerts.list({ limit: 100 })).toHaveLength(10);
    const suppressed = await getAuditStore().query({ action: 'alert.suppressed', limit: 10 });
    expect(suppressed.map((e) => e.detail)).toEqual([{ anomalyId: 'log-11', reason: 'rate_limit' }]);
  });

  it('does not count alerts the store failed to save against the limit', async () => {
    const r = await rule();
    const d = dispatcher();
    const create = vi.spyOn(alerts, 'create');
    for (let i = 1; i <= 10; i++) {
      create.mockRejectedValueOnce(new UpstreamUnavailableError('alert store', 'connection reset'));
    }

    for (let i = 1; i <= 10; i++) {
      await expect(d.handleTrigger(r, makeAnomaly({ logId: `log-${i}` }))).rejects.toBeInstanceOf(
        UpstreamUnavailableError,
      );
    }
    const afterRecovery = await d.handleTrigger(r, makeAnomaly({ logId: 'log-1' }));

    expect(afterRecovery.status).toBe('created');
    expect(await alerts.list({ limit: 100 })).toHaveLength(1);
  });

  it('still creates a CRITICAL alert over the limit', async () => {
    const r = await rule({ severity: 'CRITICAL' });
    const d = dispatcher();

    for (let i = 1; i <= 10; i++) await d.handleTrigger(r, makeAnomaly({ logId: `log-${i}` }));
    const eleventh = await d.handleTrigger(r, makeAnomaly({ logId: 'log-11' }));

    expect(eleventh.status).toBe('created');
    expect(await alerts.list({ limit: 100 })).toHaveLength(11);
  });

  it('suppresses a second alert inside the rule cooldown', async () => {
    const r = await rule({ cooldownMinutes: 15 });
    const d = dispatcher();

    await d.handleTrigger(r, makeAnomaly({ logId: 'log-1' }));
    const second = await d.handleTrigger(r, makeAnomaly({ logId: 'log-2' }));

    expect(second).toEqual({ status: 'suppressed', suppression: 'cooldown', outcomes: [] });
  });

  it('ignores the rule cooldown for CRITICAL rules', async () => {
    const r = await rule({ cooldownMinutes: 15, severity: 'CRITICAL' });
    const d = dispatcher();

    await d.handleTrigger(r, makeAnomaly({ logId: 'log-1' }));
    const second = await d.handleTrigger(r, makeAnomaly({ logId: 'log-2' }));

    expect(second.status).toBe('created');
  });

  it('skips a channel whose driver is disabled without touching its counters', async () => {
    const config = testConfig((c) => {
      c.notification.slack.enabled = false;
    });
    const r = await rule({ channelIds: [slack.id] });

    const result = await dispatcher(config).handleTrigger(r, makeAnomaly());

    expect(result.status).toBe('created_with_failures');
    expect(result.outcomes[0]).toMatchObject({ success: false, attempts: 0, error: 'SLACK notifications are disabled' });
    expect(requests).toEqual([]);
    expect((await channels.findById(slack.id))?.failureCount).toBe(0);
  });

  it('creates a manual alert without an anomaly', async () => {
    const r = await rule({ channelIds: [webhook.id] });

    const result = await dispatcher().createManualAlert(r.id, {
      title: 'Checkout latency',
      description: 'Reported by support',
      actor: 'alice',
    });

    expect(result.status).toBe('created');
    const alert = await alerts.findById(result.alertId ?? '');
    expect(alert?.anomalyDetectionId).toBeUndefined();
    expect(alert?.severity).toBe('HIGH');
    const created = await getAuditStore().query({ action: 'alert.create', limit: 10 });
    expect(created[0]?.actor).toBe('alice');
  });

  it('retries notifications that failed earlier', async () => {
    routes.set(WEBHOOK_URL, 500);
    const r = await rule({ channelIds: [webhook.id] });
    const d = dispatcher();
    const first = await d.handleTrigger(r, makeAnomaly());
    expect(first.status).toBe('created_with_failures');

    routes.set(WEBHOOK_URL, 200);
    const retried = await d.retryNotifications(first.alertId ?? '');

    expect(retried.status).toBe('created');
    const alert = await alerts.findById(first.alertId ?? '');
    expect(alert?.notificationSent).toBe(true);
    expect(alert?.notificationFailureCount).toBe(1);
  });

  it('testChannel sends a test message and leaves counters alone', async () => {
    const ok = await dispatcher().testChannel(webhook.id, 'alice');

    expect(ok).toBe(true);
    expect(requests).toEqual([WEBHOOK_URL]);
    expect((await channels.findById(webhook.id))?.successCount).toBe(0);
    const tests = await getAuditStore().query({ action: 'channel.test', limit: 10 });
    expect(tests).toHaveLength(1);
  });

  it('throws NotFoundError for an unknown channel', async () => {
    await expect(dispatcher().testChannel('missing')).rejects.toBeInstanceOf(NotFoundError);
  });
});
