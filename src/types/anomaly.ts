import { z } from 'zod';

/**
 * An ISO-8601 UTC instant, rewritten to `toISOString()` form (millisecond
 * precision) so timestamps order correctly as strings.
 */
export const IsoTimestampSchema = z
  .string()
  .datetime()
  .transform((s) => new Date(s).toISOString());

/**
 * An anomaly record produced by the upstream detector. Read-only here:
 * the feed owns its lifecycle and alerts only refer back to it by `logId`.
 */
export const AnomalyDetectionSchema = z.object({
  logId: z.string().min(1),
  isAnomaly: z.boolean(),
  confidence: z.number().min(0).max(1),
  anomalyScore: z.number().optional(),
  service: z.string().optional(),
  level: z.string().optional(),
  message: z.string().optional(),
  modelVersion: z.string().optional(),
  detectedAt: IsoTimestampSchema,
});

export type AnomalyDetection = z.infer<typeof AnomalyDetectionSchema>;
