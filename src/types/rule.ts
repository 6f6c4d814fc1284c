import { z } from 'zod';

export const RuleType = z.enum([
  'ANOMALY_DETECTION',
  'THRESHOLD',
  'PATTERN_MATCH',
  'ERROR_RATE',
  'CUSTOM',
]);
export type RuleType = z.infer<typeof RuleType>;

export const Severity = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO']);
export type Severity = z.infer<typeof Severity>;

const confidence = z.number().min(0, 'Must be between 0 and 1').max(1, 'Must be between 0 and 1');

export const AlertRuleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  type: RuleType,
  severity: Severity,
  enabled: z.boolean().default(true),
  /** Minimum anomaly confidence; an anomaly exactly at the threshold matches */
  anomalyThreshold: confidence.optional(),
  services: z.array(z.string()).default([]),
  logLevels: z.array(z.string()).default([]),
  cooldownMinutes: z.number().int().nonnegative().default(15),
  notifyOnRecovery: z.boolean().default(false),
  channelIds: z.array(z.string()).default([]),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  lastTriggeredAt: z.string().datetime().optional(),
  triggerCount: z.number().int().nonnegative().default(0),
});

export type AlertRule = z.infer<typeof AlertRuleSchema>;

export const CreateAlertRuleInputSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500).optional(),
  type: RuleType,
  severity: Severity.optional(),
  enabled: z.boolean().default(true),
  anomalyThreshold: confidence.optional(),
  services: z.array(z.string()).default([]),
  logLevels: z.array(z.string()).default([]),
  cooldownMinutes: z.number().int().nonnegative().default(15),
  notifyOnRecovery: z.boolean().default(false),
  channelIds: z.array(z.string()).default([]),
});

export type CreateAlertRuleInput = z.input<typeof CreateAlertRuleInputSchema>;

export const UpdateAlertRuleInputSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  description: z.string().max(500).optional(),
  severity: Severity.optional(),
  enabled: z.boolean().optional(),
  anomalyThreshold: confidence.optional(),
  services: z.array(z.string()).optional(),
  logLevels: z.array(z.string()).optional(),
  cooldownMinutes: z.number().int().nonnegative().optional(),
  notifyOnRecovery: z.boolean().optional(),
  channelIds: z.array(z.string()).optional(),
});

export type UpdateAlertRuleInput = z.infer<typeof UpdateAlertRuleInputSchema>;
