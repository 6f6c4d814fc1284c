export * from './types/index.js';
export * from './errors.js';
export { RuleEngine, evaluate, traceRule, resolveRuleInput } from './rules/index.js';
export type { EvaluationTrace, RuleCheck, RuleCheckName } from './rules/index.js';
export { RateLimiter } from './ratelimit/index.js';
export type { RateLimitDecision, RateLimitStatus } from './ratelimit/index.js';
export { Dispatcher, alertFromAnomaly } from './dispatch/index.js';
export type {
  ChannelOutcome,
  DispatchResult,
  DispatchStatus,
  DispatcherDeps,
  ManualAlertInput,
  SuppressionReason,
} from './dispatch/index.js';
export { AlertService, TRANSITIONS, canTransition, assertTransition, isTerminal } from './alerts/index.js';
export type { AlertStatistics } from './alerts/index.js';
export {
  createDrivers,
  EmailDriver,
  SlackDriver,
  WebhookDriver,
  buildEmailHtml,
  buildSlackMessage,
  buildWebhookPayload,
} from './notify/index.js';
export type { DriverRegistry, MailTransport, NotificationDriver, SendResult } from './notify/index.js';
export { AnomalyMonitorScheduler } from './monitor/index.js';
export type { MonitorStatus, SchedulerDeps, TickSummary } from './monitor/index.js';
export { createFeed, HttpAnomalyFeed, JsonAnomalyFeed } from './feed/index.js';
export type { AnomalyFeed } from './feed/index.js';
export {
  createStores,
  JsonRuleStore,
  JsonChannelStore,
  JsonAlertStore,
  JsonWatermarkStore,
  DynamoTable,
  DynamoRuleStore,
  DynamoChannelStore,
  DynamoAlertStore,
  DynamoWatermarkStore,
} from './store/index.js';
export type {
  AlertingStores,
  AlertStore,
  ChannelStore,
  NotificationRecord,
  ResolvedRuleInput,
  RuleStore,
  WatermarkStore,
} from './store/index.js';
export { audit, getAuditStore, setAuditStore, JsonAuditStore, DynamoAuditStore } from './audit/index.js';
export type { AuditStore, AuditEntry, AuditQuery } from './audit/index.js';
export { loadConfig, saveConfig, getConfigPath, getAlertctlDir } from './config/index.js';
export { ConsoleLogger, getLogger, silentLogger } from './logging/index.js';
export type { Logger, LogLevel } from './logging/index.js';
export { AlertingService } from './service.js';
export { createRuntime, warmRateLimiter } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
