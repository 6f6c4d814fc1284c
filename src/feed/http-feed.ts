import { z } from 'zod';
import { AnomalyDetectionSchema } from '../types/index.js';
import type { AnomalyDetection } from '../types/index.js';
import { UpstreamUnavailableError } from '../errors.js';
import type { AnomalyFeed } from './feed.js';

const ResponseSchema = z.union([
  z.array(AnomalyDetectionSchema),
  z.object({ anomalies: z.array(AnomalyDetectionSchema) }).transform((r) => r.anomalies),
]);

export interface HttpAnomalyFeedOptions {
  url: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

/** `GET <url>?since=<iso>&limit=<n>` returning an array (or `{ anomalies }`). */
export class HttpAnomalyFeed implements AnomalyFeed {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly opts: HttpAnomalyFeedOptions) {
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async fetchUnprocessed(since: string, limit: number): Promise<AnomalyDetection[]> {
    const url = new URL(this.opts.url);
    url.searchParams.set('since', since);
    url.searchParams.set('limit', String(limit));

    let body: unknown;
    try {
      const res = await this.fetchFn(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      body = await res.json();
    } catch (err) {
      throw new UpstreamUnavailableError(`Anomaly feed ${url.origin}`, err);
    }

    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(`Anomaly feed ${url.origin}`, parsed.error.message);
    }
    return [...parsed.data].sort((a, b) => a.detectedAt.localeCompare(b.detectedAt)).slice(0, limit);
  }
}
