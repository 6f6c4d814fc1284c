import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HttpAnomalyFeed, JsonAnomalyFeed, createFeed } from '../feed/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { UpstreamUnavailableError, ValidationError } from '../errors.js';
import { makeAnomaly, makeTempDir } from './helpers.js';

describe('JsonAnomalyFeed', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('returns nothing when the file does not exist', async () => {
    await expect(new JsonAnomalyFeed(dir).fetchUnprocessed('2026-01-01T00:00:00.000Z', 10)).resolves.toEqual([]);
  });

  it('filters by since, sorts ascending and applies the limit', async () => {
    const anomalies = [
      makeAnomaly({ logId: 'late', detectedAt: '2026-01-15T10:30:00.000Z' }),
      makeAnomaly({ logId: 'old', detectedAt: '2026-01-15T09:00:00.000Z' }),
      makeAnomaly({ logId: 'edge', detectedAt: '2026-01-15T10:00:00.000Z' }),
      makeAnomaly({ logId: 'mid', detectedAt: '2026-01-15T10:10:00.000Z' }),
    ];
    await writeFile(join(dir, 'anomalies.json'), JSON.stringify(anomalies));

    const batch = await new JsonAnomalyFeed(dir).fetchUnprocessed('2026-01-15T10:00:00.000Z', 2);

    expect(batch.map((a) => a.logId)).toEqual(['edge', 'mid']);
  });

  it('orders timestamps of mixed precision by instant', async () => {
    const anomalies = [
      makeAnomaly({ logId: 'millis', detectedAt: '2026-01-15T10:00:05.123Z' }),
      makeAnomaly({ logId: 'whole', detectedAt: '2026-01-15T10:00:05Z' }),
      makeAnomaly({ logId: 'micros', detectedAt: '2026-01-15T10:00:05.100250Z' }),
    ];
    await writeFile(join(dir, 'anomalies.json'), JSON.stringify(anomalies));

    const batch = await new JsonAnomalyFeed(dir).fetchUnprocessed('2026-01-15T10:00:00.000Z', 10);

    expect(batch.map((a) => a.logId)).toEqual(['whole', 'micros', 'millis']);
    expect(batch.map((a) => a.detectedAt)).toEqual([
      '2026-01-15T10:00:05.000Z',
      '2026-01-15T10:00:05.100Z',
      '2026-01-15T10:00:05.123Z',
    ]);
  });
});

describe('HttpAnomalyFeed', () => {
  it('passes since and limit as query parameters', async () => {
    const urls: string[] = [];
    const fetchFn: typeof fetch = async (input) => {
      urls.push(String(input));
      return Response.json({ anomalies: [makeAnomaly()] });
    };
    const feed = new HttpAnomalyFeed({ url: 'http://detector.test/api/anomalies', timeoutMs: 1000, fetchFn });

    const batch = await feed.fetchUnprocessed('2026-01-15T10:00:00.000Z', 25);

    expect(batch.map((a) => a.logId)).toEqual(['log-1']);
    expect(urls).toEqual([
      'http://detector.test/api/anomalies?since=2026-01-15T10%3A00%3A00.000Z&limit=25',
    ]);
  });

  it('maps a non-2xx response to UpstreamUnavailableError', async () => {
    const fetchFn: typeof fetch = async () => new Response('busy', { status: 503 });
    const feed = new HttpAnomalyFeed({ url: 'http://detector.test/api/anomalies', timeoutMs: 1000, fetchFn });

    await expect(feed.fetchUnprocessed('2026-01-15T10:00:00.000Z', 10)).rejects.toThrow(
      new UpstreamUnavailableError('Anomaly feed http://detector.test', new Error('HTTP 503')),
    );
  });

  it('rejects a malformed body', async () => {
    const fetchFn: typeof fetch = async () => Response.json([{ logId: 'x' }]);
    const feed = new HttpAnomalyFeed({ url: 'http://detector.test/api/anomalies', timeoutMs: 1000, fetchFn });

    await expect(feed.fetchUnprocessed('2026-01-15T10:00:00.000Z', 10)).rejects.toBeInstanceOf(
      UpstreamUnavailableError,
    );
  });
});

describe('createFeed', () => {
  it('requires a url for the http source', () => {
    expect(() => createFeed({ ...DEFAULT_CONFIG.feed, source: 'http' })).toThrow(ValidationError);
  });

  it('builds an http feed when configured', () => {
    expect(createFeed({ ...DEFAULT_CONFIG.feed, source: 'http', url: 'http://detector.test' })).toBeInstanceOf(
      HttpAnomalyFeed,
    );
  });
});
