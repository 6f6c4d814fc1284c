import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../config/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { makeTempDir } from './helpers.js';

describe('loadConfig', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let previousHome: string | undefined;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    previousHome = process.env.ALERTCTL_HOME;
    process.env.ALERTCTL_HOME = dir;
  });

  afterEach(async () => {
    process.env.ALERTCTL_HOME = previousHome;
    await cleanup();
  });

  it('writes and returns the defaults on first run', async () => {
    const config = await loadConfig({});

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.rateLimit).toEqual({ enabled: true, maxAlertsPerRule: 10, timeWindowMinutes: 60, cooldownMinutes: 15 });
    const written: unknown = JSON.parse(await readFile(join(dir, 'config.json'), 'utf-8'));
    expect(written).toEqual(DEFAULT_CONFIG);
  });

  it('fills in defaults around a partial file', async () => {
    await writeFile(join(dir, 'config.json'), JSON.stringify({ rateLimit: { maxAlertsPerRule: 5 } }));

    const config = await loadConfig({});

    expect(config.rateLimit.maxAlertsPerRule).toBe(5);
    expect(config.rateLimit.timeWindowMinutes).toBe(60);
    expect(config.notification.retry).toEqual({ maxAttempts: 3, backoffDelayMs: 2000 });
  });

  it('rejects a file that is not JSON', async () => {
    await writeFile(join(dir, 'config.json'), '{ oops');
    await expect(loadConfig({})).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects out-of-range values', async () => {
    await writeFile(join(dir, 'config.json'), JSON.stringify({ rules: { defaultAnomalyThreshold: 1.5 } }));
    await expect(loadConfig({})).rejects.toThrow(/rules\.defaultAnomalyThreshold/);
  });

  it('applies environment overrides', async () => {
    const config = await loadConfig({
      ALERTCTL_STORAGE: 'dynamodb',
      ALERTCTL_FEED_URL: 'http://detector.test/api/anomalies',
      ALERTCTL_MONITOR_INTERVAL_MS: '30000',
    });

    expect(config.storage).toBe('dynamodb');
    expect(config.feed).toMatchObject({ source: 'http', url: 'http://detector.test/api/anomalies' });
    expect(config.monitoring.intervalMs).toBe(30_000);
  });
});
