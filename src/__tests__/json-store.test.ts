import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  JsonAlertStore,
  JsonChannelStore,
  JsonRuleStore,
  JsonWatermarkStore,
  filterAlerts,
} from '../store/index.js';
import { resolveRuleInput } from '../rules/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { DuplicateAlertError, UpstreamUnavailableError, ValidationError } from '../errors.js';
import { makeAlert, makeTempDir } from './helpers.js';

describe('JSON stores', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('rules survive a new store instance', async () => {
    const created = await new JsonRuleStore(dir).create(
      resolveRuleInput({ name: 'checkout', type: 'ANOMALY_DETECTION' }, DEFAULT_CONFIG.rules),
    );
    expect(await new JsonRuleStore(dir).findById(created.id)).toEqual(created);
  });

  it('rejects an invalid rule update and keeps the stored rule', async () => {
    const rules = new JsonRuleStore(dir);
    const rule = await rules.create(
      resolveRuleInput({ name: 'checkout', type: 'ANOMALY_DETECTION' }, DEFAULT_CONFIG.rules),
    );

    await expect(rules.update(rule.id, { anomalyThreshold: 2 })).rejects.toBeInstanceOf(ValidationError);
    expect((await rules.findById(rule.id))?.anomalyThreshold).toBe(0.7);
  });

  it('updates and disables a rule', async () => {
    const rules = new JsonRuleStore(dir);
    const rule = await rules.create(
      resolveRuleInput({ name: 'checkout', type: 'ANOMALY_DETECTION' }, DEFAULT_CONFIG.rules),
    );

    const updated = await rules.update(rule.id, { enabled: false, severity: 'LOW' });

    expect(updated).toMatchObject({ enabled: false, severity: 'LOW' });
    expect(await rules.findEnabledByType('ANOMALY_DETECTION')).toEqual([]);
  });

  it('returns undefined when updating an unknown rule', async () => {
    await expect(new JsonRuleStore(dir).update('missing', { enabled: false })).resolves.toBeUndefined();
  });

  it('rejects malformed webhook headers at channel creation', async () => {
    const channels = new JsonChannelStore(new JsonRuleStore(dir), dir);
    await expect(
      channels.create({
        name: 'bad',
        configuration: { type: 'WEBHOOK', url: 'https://hooks.example.test/a', headers: '["a"]' },
      }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('derives the channel type from its configuration', async () => {
    const channels = new JsonChannelStore(new JsonRuleStore(dir), dir);
    const channel = await channels.create({
      name: 'mail',
      configuration: { type: 'EMAIL', recipients: ['oncall@example.test'] },
    });
    expect(channel.type).toBe('EMAIL');
    expect(channel.successCount).toBe(0);
  });

  it('refuses a duplicate alert for the same rule and anomaly', async () => {
    const alerts = new JsonAlertStore(dir);
    const input = {
      alertRuleId: 'r1',
      alertRuleName: 'checkout',
      title: 'Anomaly Detected: checkout - checkout',
      description: 'test',
      severity: 'HIGH' as const,
      anomalyDetectionId: 'log-1',
    };
    const first = await alerts.create(input);

    await expect(alerts.create(input)).rejects.toThrow(
      new DuplicateAlertError('r1', 'log-1', first.id),
    );
  });

  it('keeps the newest watermark', async () => {
    const watermark = new JsonWatermarkStore(dir);
    await watermark.advance('2026-01-15T10:00:00.000Z');
    expect(await watermark.advance('2026-01-15T09:00:00.000Z')).toBe('2026-01-15T10:00:00.000Z');
    await watermark.reset('2026-01-15T09:00:00.000Z');
    expect(await watermark.get()).toBe('2026-01-15T09:00:00.000Z');
  });

  it('reports an unreadable file as upstream unavailable', async () => {
    await writeFile(join(dir, 'rules.json'), '{ not json');
    await expect(new JsonRuleStore(dir).list()).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });
});

describe('filterAlerts', () => {
  const alerts = [
    makeAlert({ id: 'a', status: 'OPEN', createdAt: '2026-01-15T10:00:00.000Z' }),
    makeAlert({ id: 'b', status: 'RESOLVED', createdAt: '2026-01-15T11:00:00.000Z' }),
    makeAlert({ id: 'c', status: 'OPEN', service: 'search', createdAt: '2026-01-15T12:00:00.000Z' }),
  ];

  it('sorts newest first', () => {
    expect(filterAlerts(alerts).map((a) => a.id)).toEqual(['c', 'b', 'a']);
  });

  it('combines filters', () => {
    expect(filterAlerts(alerts, { status: 'OPEN', service: 'checkout' }).map((a) => a.id)).toEqual(['a']);
    expect(filterAlerts(alerts, { since: '2026-01-15T11:00:00.000Z' }).map((a) => a.id)).toEqual(['c', 'b']);
    expect(filterAlerts(alerts, { limit: 1 }).map((a) => a.id)).toEqual(['c']);
  });
});
