import { z } from 'zod';
import { IsoTimestampSchema } from './anomaly.js';
import { Severity } from './rule.js';

export const AlertStatus = z.enum(['OPEN', 'ACKNOWLEDGED', 'RESOLVED', 'FALSE_POSITIVE']);
export type AlertStatus = z.infer<typeof AlertStatus>;

export const AlertSchema = z.object({
  id: z.string().min(1),
  alertRuleId: z.string().min(1),
  /** Rule name at creation time, for display without a rule lookup */
  alertRuleName: z.string(),
  title: z.string().min(1).max(200),
  description: z.string(),
  severity: Severity,
  status: AlertStatus,
  service: z.string().optional(),
  anomalyDetectionId: z.string().optional(),
  logId: z.string().optional(),
  /** Opaque JSON blob; not guaranteed to parse */
  context: z.string().optional(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  acknowledgedAt: z.string().datetime().optional(),
  acknowledgedBy: z.string().optional(),
  resolvedAt: z.string().datetime().optional(),
  resolvedBy: z.string().optional(),
  notes: z.string().optional(),
  notificationSent: z.boolean().default(false),
  notificationSentAt: z.string().datetime().optional(),
  notificationFailureCount: z.number().int().nonnegative().default(0),
  lastNotificationError: z.string().optional(),
});

export type Alert = z.infer<typeof AlertSchema>;

export const NewAlertSchema = AlertSchema.pick({
  alertRuleId: true,
  alertRuleName: true,
  title: true,
  description: true,
  severity: true,
  service: true,
  anomalyDetectionId: true,
  logId: true,
  context: true,
});

export type NewAlert = z.infer<typeof NewAlertSchema>;

export const AlertFilterSchema = z.object({
  status: AlertStatus.optional(),
  alertRuleId: z.string().optional(),
  service: z.string().optional(),
  since: IsoTimestampSchema.optional(),
  limit: z.number().int().positive().default(50),
});

export type AlertFilter = z.input<typeof AlertFilterSchema>;
