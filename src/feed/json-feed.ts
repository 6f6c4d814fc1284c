import { z } from 'zod';
import { AnomalyDetectionSchema } from '../types/index.js';
import type { AnomalyDetection } from '../types/index.js';
import { JsonFile } from '../store/json-file.js';
import type { AnomalyFeed } from './feed.js';

const AnomaliesFileSchema = z.array(AnomalyDetectionSchema);

/** Feed backed by `anomalies.json`, written by a local detector or by hand. */
export class JsonAnomalyFeed implements AnomalyFeed {
  private readonly file: JsonFile<AnomalyDetection[]>;

  constructor(dir?: string) {
    this.file = new JsonFile('anomalies.json', (raw) => AnomaliesFileSchema.parse(raw), () => [], dir);
  }

  async fetchUnprocessed(since: string, limit: number): Promise<AnomalyDetection[]> {
    const anomalies = await this.file.read();
    return anomalies
      .filter((a) => a.detectedAt >= since)
      .sort((a, b) => a.detectedAt.localeCompare(b.detectedAt))
      .slice(0, limit);
  }
}
