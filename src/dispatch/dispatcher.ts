import type {
  Alert,
  AlertRule,
  AnomalyDetection,
  ChannelType,
  NewAlert,
  NotificationChannel,
} from '../types/index.js';
import type { AlertingStores } from '../store/index.js';
import type { RateLimiter } from '../ratelimit/index.js';
import type { DriverRegistry } from '../notify/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { audit } from '../audit/index.js';
import { DuplicateAlertError, NotFoundError, errorMessage } from '../errors.js';
import { alertFromAnomaly } from './content.js';

export type DispatchStatus = 'created' | 'created_with_failures' | 'suppressed' | 'duplicate';

export type SuppressionReason = 'rate_limit' | 'cooldown';

export interface ChannelOutcome {
  channelId: string;
  channelName: string;
  channelType: ChannelType;
  success: boolean;
  attempts: number;
  error?: string;
}

export interface DispatchResult {
  status: DispatchStatus;
  alertId?: string;
  suppression?: SuppressionReason;
  outcomes: ChannelOutcome[];
}

export interface ManualAlertInput {
  title: string;
  description: string;
  service?: string;
  actor?: string;
}

export interface DispatcherDeps {
  stores: Pick<AlertingStores, 'rules' | 'channels' | 'alerts'>;
  limiter: RateLimiter;
  drivers: DriverRegistry;
  log?: Logger;
  now?: () => Date;
}

type Committed =
  | { kind: 'created'; alert: Alert }
  | { kind: 'duplicate'; alertId: string }
  | { kind: 'suppressed'; reason: SuppressionReason };

const MINUTE_MS = 60_000;

/**
 * Turns a triggered rule into at most one alert per (rule, anomaly) and fans
 * it out to the rule's channels. Alert creation is the commit point; failed
 * notifications never undo it.
 */
export class Dispatcher {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: DispatcherDeps) {
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async handleTrigger(rule: AlertRule, anomaly: AnomalyDetection): Promise<DispatchResult> {
    const committed = await this.deps.limiter.runExclusive(rule.id, () =>
      this.commit(rule, anomaly),
    );

    switch (committed.kind) {
      case 'duplicate':
        return { status: 'duplicate', alertId: committed.alertId, outcomes: [] };
      case 'suppressed':
        return { status: 'suppressed', suppression: committed.reason, outcomes: [] };
      case 'created':
        return this.notify(committed.alert, rule);
    }
  }

  /** Operator-raised alert against a rule. Not rate limited. */
  async createManualAlert(ruleId: string, input: ManualAlertInput): Promise<DispatchResult> {
    const rule = await this.deps.stores.rules.findById(ruleId);
    if (!rule) throw new NotFoundError('Rule', ruleId);

    const alert = await this.deps.stores.alerts.create({
      alertRuleId: rule.id,
      alertRuleName: rule.name,
      title: input.title,
      description: input.description,
      severity: rule.severity,
      service: input.service,
    });
    await this.deps.stores.rules.recordTrigger(rule.id, alert.createdAt);
    this.log.info(`Manual alert ${alert.id} created for rule ${rule.name}`);
    await audit('alert.create', {
      ruleId: rule.id,
      alertId: alert.id,
      actor: input.actor,
      detail: { manual: true, severity: alert.severity },
    });
    return this.notify(alert, rule);
  }

  /** Re-send an alert whose earlier fan-out did not fully succeed. */
  async retryNotifications(alertId: string): Promise<DispatchResult> {
    const alert = await this.deps.stores.alerts.findById(alertId);
    if (!alert) throw new NotFoundError('Alert', alertId);
    if (alert.notificationSent) {
      this.log.info(`Alert ${alert.id} notifications already sent; nothing to retry`);
      return { status: 'created', alertId: alert.id, outcomes: [] };
    }
    const rule = await this.deps.stores.rules.findById(alert.alertRuleId);
    if (!rule) throw new NotFoundError('Rule', alert.alertRuleId);
    this.log.info(`Retrying notifications for alert ${alert.id}`);
    return this.notify(alert, rule);
  }

  async testChannel(channelId: string, actor?: string): Promise<boolean> {
    const channel = await this.deps.stores.channels.findById(channelId);
    if (!channel) throw new NotFoundError('Channel', channelId);
    const driver = this.deps.drivers.get(channel.type);
    const ok = driver ? await driver.testConnection(channel) : false;
    await audit('channel.test', {
      channelId: channel.id,
      actor,
      success: ok,
      detail: { type: channel.type, name: channel.name },
    });
    return ok;
  }

  // Runs under the rule's lock: the limiter decision and the alert write
  // happen together.
  private async commit(rule: AlertRule, anomaly: AnomalyDetection): Promise<Committed> {
    const { alerts, rules } = this.deps.stores;

    const existing = await alerts.findByRuleAndAnomaly(rule.id, anomaly.logId);
    if (existing) {
      this.log.debug(`Alert ${existing.id} already exists for rule ${rule.name} and anomaly ${anomaly.logId}`);
      return { kind: 'duplicate', alertId: existing.id };
    }

    const now = this.now();
    if (rule.severity !== 'CRITICAL' && rule.cooldownMinutes > 0) {
      const latest = await alerts.findLatestForRule(rule.id);
      if (latest && now.getTime() - Date.parse(latest.createdAt) < rule.cooldownMinutes * MINUTE_MS) {
        this.log.info(`Rule ${rule.name} is in its ${rule.cooldownMinutes}m cooldown`, {
          lastAlert: latest.id,
        });
        await this.auditSuppressed(rule, anomaly, 'cooldown');
        return { kind: 'suppressed', reason: 'cooldown' };
      }
    }

    const decision = this.deps.limiter.tryAcquire(rule.id, rule.severity, now);
    if (decision === 'suppressed') {
      await this.auditSuppressed(rule, anomaly, 'rate_limit');
      return { kind: 'suppressed', reason: 'rate_limit' };
    }

    const input: NewAlert = alertFromAnomaly(rule, anomaly);
    let alert: Alert;
    try {
      alert = await alerts.create(input);
    } catch (err) {
      this.deps.limiter.release(rule.id, now);
      if (err instanceof DuplicateAlertError) return { kind: 'duplicate', alertId: err.existingAlertId };
      throw err;
    }
    await rules.recordTrigger(rule.id, alert.createdAt);

    this.log.info(`Alert ${alert.id} created for rule ${rule.name}`, {
      severity: alert.severity,
      anomaly: anomaly.logId,
      bypass: decision === 'override_bypass' ? true : undefined,
    });
    await audit('alert.create', {
      ruleId: rule.id,
      alertId: alert.id,
      detail: { anomalyId: anomaly.logId, severity: alert.severity, rateLimit: decision },
    });
    return { kind: 'created', alert };
  }

  private async auditSuppressed(
    rule: AlertRule,
    anomaly: AnomalyDetection,
    reason: SuppressionReason,
  ): Promise<void> {
    await audit('alert.suppressed', {
      ruleId: rule.id,
      detail: { anomalyId: anomaly.logId, reason },
    });
  }

  private async notify(alert: Alert, rule: AlertRule): Promise<DispatchResult> {
    const channels = await this.deps.stores.channels.findEnabledByAlertRuleId(rule.id);
    if (channels.length === 0) {
      this.log.debug(`Rule ${rule.name} has no enabled channels`);
      return { status: 'created', alertId: alert.id, outcomes: [] };
    }

    const outcomes = await Promise.all(channels.map((channel) => this.sendOne(alert, rule, channel)));
    const failures = outcomes.filter((o) => !o.success);
    const at = this.now().toISOString();

    await this.deps.stores.alerts.recordNotification(alert.id, {
      sent: failures.length === 0,
      failures: failures.length,
      lastError: failures.at(-1)?.error,
      at,
    });
    await audit('alert.notify', {
      ruleId: rule.id,
      alertId: alert.id,
      success: failures.length === 0,
      detail: {
        channels: outcomes.length,
        failed: failures.map((f) => f.channelName),
      },
    });

    return {
      status: failures.length === 0 ? 'created' : 'created_with_failures',
      alertId: alert.id,
      outcomes,
    };
  }

  // Never rejects: each channel's failure stays in its own outcome.
  private async sendOne(
    alert: Alert,
    rule: AlertRule,
    channel: NotificationChannel,
  ): Promise<ChannelOutcome> {
    const base = { channelId: channel.id, channelName: channel.name, channelType: channel.type };
    const driver = this.deps.drivers.get(channel.type);
    if (!driver || !driver.isEnabled()) {
      this.log.warn(`${channel.type} notifications are disabled; skipping channel ${channel.name}`);
      return { ...base, success: false, attempts: 0, error: `${channel.type} notifications are disabled` };
    }

    let outcome: ChannelOutcome;
    try {
      const result = await driver.send(alert, rule, channel);
      outcome = result.success
        ? { ...base, success: true, attempts: result.attempts }
        : { ...base, success: false, attempts: result.attempts, error: result.error.message };
    } catch (err) {
      this.log.error(`Driver for ${channel.type} threw while sending alert ${alert.id}`, {
        error: errorMessage(err),
      });
      outcome = { ...base, success: false, attempts: 1, error: errorMessage(err) };
    }

    try {
      await this.deps.stores.channels.recordOutcome(channel.id, outcome.success, this.now().toISOString());
    } catch (err) {
      this.log.warn(`Could not record outcome for channel ${channel.name}`, { error: errorMessage(err) });
    }
    return outcome;
  }
}
