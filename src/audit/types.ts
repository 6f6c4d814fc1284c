import { z } from 'zod';
import { IsoTimestampSchema } from '../types/anomaly.js';

export const AuditAction = z.enum([
  'rule.add',
  'rule.update',
  'rule.remove',
  'channel.add',
  'channel.test',
  'alert.create',
  'alert.suppressed',
  'alert.notify',
  'alert.acknowledge',
  'alert.resolve',
  'alert.false_positive',
  'monitor.tick',
  'monitor.reset',
]);

export type AuditAction = z.infer<typeof AuditAction>;

export const AuditEntrySchema = z.object({
  id: z.string().uuid(),
  timestamp: z.string().datetime(),
  action: AuditAction,
  actor: z.string().default('system'),
  ruleId: z.string().optional(),
  alertId: z.string().optional(),
  channelId: z.string().optional(),
  detail: z.record(z.unknown()).optional(),
  success: z.boolean(),
  error: z.string().optional(),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const AuditQuerySchema = z.object({
  action: AuditAction.optional(),
  ruleId: z.string().optional(),
  alertId: z.string().optional(),
  since: IsoTimestampSchema.optional(),
  limit: z.number().int().positive().default(50),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
