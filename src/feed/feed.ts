import type { AnomalyDetection } from '../types/index.js';

/**
 * Read-only view of the upstream detector's output. Results are ordered by
 * `detectedAt` ascending. Records may be returned more than once; alert
 * creation is idempotent per anomaly.
 */
export interface AnomalyFeed {
  fetchUnprocessed(since: string, limit: number): Promise<AnomalyDetection[]>;
}
