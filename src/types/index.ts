export { RuleType, Severity, AlertRuleSchema, CreateAlertRuleInputSchema, UpdateAlertRuleInputSchema } from './rule.js';
export type { AlertRule, CreateAlertRuleInput, UpdateAlertRuleInput } from './rule.js';

export { AnomalyDetectionSchema, IsoTimestampSchema } from './anomaly.js';
export type { AnomalyDetection } from './anomaly.js';

export { AlertStatus, AlertSchema, NewAlertSchema, AlertFilterSchema } from './alert.js';
export type { Alert, NewAlert, AlertFilter } from './alert.js';

export {
  ChannelType,
  WebhookMethod,
  ChannelConfigSchema,
  NotificationChannelSchema,
  CreateChannelInputSchema,
} from './channel.js';
export type {
  ChannelConfig,
  EmailChannelConfig,
  SlackChannelConfig,
  WebhookChannelConfig,
  NotificationChannel,
  CreateChannelInput,
} from './channel.js';

export { ConfigSchema, DEFAULT_CONFIG } from './config.js';
export type { Config, MonitoringConfig, RateLimitConfig, NotificationConfig } from './config.js';
