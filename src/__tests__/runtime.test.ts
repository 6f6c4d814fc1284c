/**
 * The wired runtime over a temp state directory: anomaly file in, alert and
 * webhook call out.
 */
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createRuntime, warmRateLimiter } from '../runtime.js';
import { RateLimiter } from '../ratelimit/index.js';
import { JsonAlertStore } from '../store/index.js';
import { resolveRuleInput } from '../rules/index.js';
import { silentLogger } from '../logging/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { NewAlert } from '../types/index.js';
import { makeAnomaly, makeTempDir, scriptedFetch, testConfig } from './helpers.js';

describe('createRuntime', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('runs a monitor tick from the anomaly file through to a webhook', async () => {
    const { fetchFn, calls } = scriptedFetch([200]);
    const rt = await createRuntime({
      config: testConfig(),
      dir,
      log: silentLogger,
      driverDeps: { fetchFn },
      now: () => new Date('2026-01-15T10:30:00.000Z'),
    });
    const channel = await rt.stores.channels.create({
      name: 'ops-webhook',
      configuration: { type: 'WEBHOOK', url: 'https://hooks.example.test/alerts' },
    });
    await rt.stores.rules.create(
      resolveRuleInput(
        { name: 'checkout', type: 'ANOMALY_DETECTION', services: ['checkout'], channelIds: [channel.id] },
        rt.config.rules,
      ),
    );
    await writeFile(
      join(dir, 'anomalies.json'),
      JSON.stringify([
        makeAnomaly({ logId: 'a-1', detectedAt: '2026-01-15T10:20:00.000Z' }),
        makeAnomaly({ logId: 'a-2', service: 'search', detectedAt: '2026-01-15T10:21:00.000Z' }),
      ]),
    );
    await rt.scheduler.resetWatermark(new Date('2026-01-15T10:15:00.000Z'));

    const summary = await rt.scheduler.tick();

    expect(summary).toMatchObject({ fetched: 2, processed: 2, alertsCreated: 1, aborted: false });
    expect(calls.map((c) => c.url)).toEqual(['https://hooks.example.test/alerts']);
    const [alert] = await rt.alerts.list();
    expect(alert?.anomalyDetectionId).toBe('a-1');
    expect(await rt.stores.watermark.get()).toBe('2026-01-15T10:21:00.000Z');
  });

  it('getMatchingRules is a dry run', async () => {
    const rt = await createRuntime({ config: testConfig(), dir, log: silentLogger });
    await rt.stores.rules.create(resolveRuleInput({ name: 'any', type: 'ANOMALY_DETECTION' }, rt.config.rules));

    const matched = await rt.service.getMatchingRules(makeAnomaly());

    expect(matched.map((r) => r.name)).toEqual(['any']);
    expect(await rt.alerts.list()).toEqual([]);
  });

  it('evaluateAnomalyRules raises one alert per matching rule and anomaly', async () => {
    const rt = await createRuntime({ config: testConfig(), dir, log: silentLogger });
    await rt.stores.rules.create(resolveRuleInput({ name: 'any', type: 'ANOMALY_DETECTION' }, rt.config.rules));

    const first = await rt.service.evaluateAnomalyRules(makeAnomaly());
    const again = await rt.service.evaluateAnomalyRules(makeAnomaly());

    expect(first.map((r) => r.name)).toEqual(['any']);
    expect(again.map((r) => r.name)).toEqual(['any']);
    const alerts = await rt.alerts.list();
    expect(alerts.map((a) => a.anomalyDetectionId)).toEqual(['log-1']);
  });

  it('testRule returns the trace without dispatching', async () => {
    const rt = await createRuntime({ config: testConfig(), dir, log: silentLogger });
    const rule = await rt.stores.rules.create(
      resolveRuleInput({ name: 'search-only', type: 'ANOMALY_DETECTION', services: ['search'] }, rt.config.rules),
    );

    const trace = rt.service.testRule(rule, makeAnomaly());

    expect(trace.triggered).toBe(false);
    expect(trace.checks.find((c) => c.check === 'service')?.passed).toBe(false);
    expect(await rt.alerts.list()).toEqual([]);
  });
});

describe('warmRateLimiter', () => {
  it('seeds the limiter with alerts still inside the window', async () => {
    const { dir, cleanup } = await makeTempDir();
    try {
      const alerts = new JsonAlertStore(dir);
      const base: NewAlert = {
        alertRuleId: 'r1',
        alertRuleName: 'checkout',
        title: 'Anomaly Detected: checkout - checkout',
        description: 'test',
        severity: 'HIGH',
      };
      for (let i = 0; i < 3; i++) await alerts.create(base);
      const config = testConfig((c) => {
        c.rateLimit.maxAlertsPerRule = 3;
      });
      const limiter = new RateLimiter(config.rateLimit);

      const now = new Date();
      await warmRateLimiter(limiter, alerts, config, now);

      expect(limiter.getStatus('r1', now).alertsInWindow).toBe(3);
      expect(limiter.tryAcquire('r1', 'HIGH', now)).toBe('suppressed');
    } finally {
      await cleanup();
    }
  });

  it('does nothing when rate limiting is off', async () => {
    const limiter = new RateLimiter({ ...DEFAULT_CONFIG.rateLimit, enabled: false });
    const { dir, cleanup } = await makeTempDir();
    try {
      const alerts = new JsonAlertStore(dir);
      await alerts.create({
        alertRuleId: 'r1',
        alertRuleName: 'checkout',
        title: 'Anomaly Detected: checkout - checkout',
        description: 'test',
        severity: 'HIGH',
      });
      await warmRateLimiter(limiter, alerts, testConfig((c) => {
        c.rateLimit.enabled = false;
      }), new Date());
      expect(limiter.getStatus('r1').alertsInWindow).toBe(0);
    } finally {
      await cleanup();
    }
  });
});
