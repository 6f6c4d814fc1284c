import { z } from 'zod';
import { Severity } from './rule.js';

const MonitoringConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().positive().default(60_000),
  lookbackMinutes: z.number().int().nonnegative().default(5),
  batchSize: z.number().int().positive().default(100),
  concurrency: z.number().int().positive().default(4),
  criticalConfidence: z.number().min(0).max(1).default(0.8),
  criticalScore: z.number().min(0).default(0.8),
});

const RulesConfigSchema = z.object({
  defaultSeverity: z
    .object({
      ANOMALY_DETECTION: Severity.default('HIGH'),
      THRESHOLD: Severity.default('MEDIUM'),
      PATTERN_MATCH: Severity.default('MEDIUM'),
      ERROR_RATE: Severity.default('HIGH'),
      CUSTOM: Severity.default('INFO'),
    })
    .default({}),
  defaultAnomalyThreshold: z.number().min(0).max(1).default(0.7),
});

const RateLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  maxAlertsPerRule: z.number().int().positive().default(10),
  timeWindowMinutes: z.number().int().positive().default(60),
  cooldownMinutes: z.number().int().nonnegative().default(15),
});

const NotificationConfigSchema = z.object({
  email: z
    .object({
      enabled: z.boolean().default(true),
      from: z.string().default('alerts@localhost'),
      fromName: z.string().default('alertctl'),
      timeoutMs: z.number().int().positive().default(10_000),
      smtp: z
        .object({
          host: z.string().default('localhost'),
          port: z.number().int().positive().default(587),
          secure: z.boolean().default(false),
          user: z.string().optional(),
          pass: z.string().optional(),
        })
        .default({}),
    })
    .default({}),
  slack: z
    .object({
      enabled: z.boolean().default(true),
      timeoutMs: z.number().int().positive().default(5_000),
    })
    .default({}),
  webhook: z
    .object({
      enabled: z.boolean().default(true),
      timeoutMs: z.number().int().positive().default(10_000),
      retryOnFailure: z.boolean().default(true),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      backoffDelayMs: z.number().int().nonnegative().default(2_000),
    })
    .default({}),
});

const FeedConfigSchema = z.object({
  source: z.enum(['json', 'http']).default('json'),
  url: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const ConfigSchema = z.object({
  storage: z.enum(['json', 'dynamodb']).default('json'),
  awsProfile: z.string().default('default'),
  awsRegion: z.string().default('us-east-1'),
  dynamoTablePrefix: z.string().default('alertctl'),
  monitoring: MonitoringConfigSchema.default({}),
  rules: RulesConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  notification: NotificationConfigSchema.default({}),
  feed: FeedConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type MonitoringConfig = Config['monitoring'];
export type RateLimitConfig = Config['rateLimit'];
export type NotificationConfig = Config['notification'];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
