import { randomUUID } from 'node:crypto';
import { PutItemCommand, TransactWriteItemsCommand, UpdateItemCommand } from '@aws-sdk/client-dynamodb';
import {
  AlertRuleSchema,
  AlertSchema,
  CreateChannelInputSchema,
  NotificationChannelSchema,
} from '../types/index.js';
import type {
  Alert,
  AlertFilter,
  AlertRule,
  AlertStatus,
  CreateChannelInput,
  NewAlert,
  NotificationChannel,
  RuleType,
  UpdateAlertRuleInput,
} from '../types/index.js';
import { assertTransition, transitionFields } from '../alerts/lifecycle.js';
import {
  DuplicateAlertError,
  InvalidTransitionError,
  NotFoundError,
  UpstreamUnavailableError,
  ValidationError,
} from '../errors.js';
import { DynamoTable, PK, SK, isConditionalFailure } from './dynamo-table.js';
import { filterAlerts } from './json-store.js';
import type {
  AlertStore,
  ChannelStore,
  NotificationRecord,
  ResolvedRuleInput,
  RuleStore,
  WatermarkStore,
} from './store.js';

const RULE = 'RULE';
const CHANNEL = 'CHANNEL';
const ALERT = 'ALERT';
const ALERT_KEY = 'ALERT_KEY'; // sk: "<ruleId>#<anomalyId>", one per anomaly-sourced alert
const WATERMARK = 'WATERMARK';

const parseRule = (raw: unknown): AlertRule => AlertRuleSchema.parse(raw);
const parseChannel = (raw: unknown): NotificationChannel => NotificationChannelSchema.parse(raw);
const parseAlert = (raw: unknown): Alert => AlertSchema.parse(raw);

export class DynamoRuleStore implements RuleStore {
  constructor(private readonly table: DynamoTable) {}

  async list(): Promise<AlertRule[]> {
    return this.table.listEntities(RULE, parseRule);
  }

  async findById(id: string): Promise<AlertRule | undefined> {
    const found = await this.table.getEntity(RULE, id, parseRule);
    if (found) return found.value;
    const rules = await this.list();
    return rules.find((r) => r.name === id);
  }

  async findEnabledByType(type: RuleType): Promise<AlertRule[]> {
    const rules = await this.list();
    return rules.filter((r) => r.enabled && r.type === type);
  }

  async create(input: ResolvedRuleInput): Promise<AlertRule> {
    const rules = await this.list();
    if (rules.some((r) => r.name === input.name)) {
      throw new ValidationError(`Rule name already in use: ${input.name}`);
    }
    const now = new Date().toISOString();
    const rule = AlertRuleSchema.parse({
      ...input,
      id: randomUUID(),
      createdAt: now,
      updatedAt: now,
      triggerCount: 0,
    });
    await this.table.putNew(RULE, rule.id, rule);
    return rule;
  }

  async update(id: string, input: UpdateAlertRuleInput): Promise<AlertRule | undefined> {
    const rule = await this.findById(id);
    if (!rule) return undefined;
    return this.table.mutate(RULE, rule.id, parseRule, (current) => {
      const parsed = AlertRuleSchema.safeParse({
        ...current,
        ...input,
        updatedAt: new Date().toISOString(),
      });
      if (!parsed.success) throw ValidationError.fromZod('rule update', parsed.error);
      return parsed.data;
    });
  }

  async remove(id: string): Promise<boolean> {
    const rule = await this.findById(id);
    if (!rule) return false;
    return this.table.deleteItem(RULE, rule.id);
  }

  async recordTrigger(id: string, at: string): Promise<void> {
    const updated = await this.table.mutate(RULE, id, parseRule, (current) => ({
      ...current,
      triggerCount: current.triggerCount + 1,
      lastTriggeredAt: at,
    }));
    if (!updated) throw new NotFoundError('Rule', id);
  }
}

export class DynamoChannelStore implements ChannelStore {
  constructor(
    private readonly table: DynamoTable,
    private readonly rules: RuleStore,
  ) {}

  async list(): Promise<NotificationChannel[]> {
    return this.table.listEntities(CHANNEL, parseChannel);
  }

  async findById(id: string): Promise<NotificationChannel | undefined> {
    const found = await this.table.getEntity(CHANNEL, id, parseChannel);
    if (found) return found.value;
    const channels = await this.list();
    return channels.find((c) => c.name === id);
  }

  async findEnabledByAlertRuleId(ruleId: string): Promise<NotificationChannel[]> {
    const rule = await this.rules.findById(ruleId);
    if (!rule || rule.channelIds.length === 0) return [];
    const channels = await Promise.all(
      rule.channelIds.map((id) => this.table.getEntity(CHANNEL, id, parseChannel)),
    );
    return channels
      .map((c) => c?.value)
      .filter((c): c is NotificationChannel => c !== undefined && c.enabled);
  }

  async create(input: CreateChannelInput): Promise<NotificationChannel> {
    const parsed = CreateChannelInputSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromZod('channel', parsed.error);
    const now = new Date().toISOString();
    const channel = NotificationChannelSchema.parse({
      ...parsed.data,
      id: randomUUID(),
      createdAt: now,
      updatedAt: now,
    });
    await this.table.putNew(CHANNEL, channel.id, channel);
    return channel;
  }

  async recordOutcome(id: string, success: boolean, at: string): Promise<void> {
    const updated = await this.table.mutate(CHANNEL, id, parseChannel, (c) =>
      success
        ? { ...c, successCount: c.successCount + 1, lastSuccessAt: at }
        : { ...c, failureCount: c.failureCount + 1, lastFailureAt: at },
    );
    if (!updated) throw new NotFoundError('Channel', id);
  }
}

export class DynamoAlertStore implements AlertStore {
  constructor(private readonly table: DynamoTable) {}

  async create(input: NewAlert): Promise<Alert> {
    const now = new Date().toISOString();
    const alert = AlertSchema.parse({
      ...input,
      id: randomUUID(),
      status: 'OPEN',
      createdAt: now,
      updatedAt: now,
    });
    const alertItem = this.table.entityItem(ALERT, alert.id, alert, 1, { status: { S: alert.status } });

    const anomalyId = alert.anomalyDetectionId;
    if (anomalyId === undefined) {
      await this.table.putNew(ALERT, alert.id, alert, { status: { S: alert.status } });
      return alert;
    }

    // Alert and its (rule, anomaly) key are written together or not at all.
    const dedupeKey = `${alert.alertRuleId}#${anomalyId}`;
    try {
      await this.table.call(() =>
        this.table.client.send(
          new TransactWriteItemsCommand({
            TransactItems: [
              {
                Put: {
                  TableName: this.table.tableName,
                  Item: alertItem,
                  ConditionExpression: `attribute_not_exists(${PK})`,
                },
              },
              {
                Put: {
                  TableName: this.table.tableName,
                  Item: {
                    [PK]: { S: ALERT_KEY },
                    [SK]: { S: dedupeKey },
                    alertId: { S: alert.id },
                  },
                  ConditionExpression: `attribute_not_exists(${PK})`,
                },
              },
            ],
          }),
        ),
      );
    } catch (err) {
      if (err instanceof Error && err.name === 'TransactionCanceledException') {
        const existing = await this.table.getItem(ALERT_KEY, dedupeKey);
        const existingId = existing?.alertId?.S;
        if (existingId) throw new DuplicateAlertError(alert.alertRuleId, anomalyId, existingId);
        throw new UpstreamUnavailableError(`DynamoDB table ${this.table.tableName}`, err);
      }
      throw err;
    }
    return alert;
  }

  async findById(id: string): Promise<Alert | undefined> {
    return (await this.table.getEntity(ALERT, id, parseAlert))?.value;
  }

  async findByRuleAndAnomaly(ruleId: string, anomalyId: string): Promise<Alert | undefined> {
    const key = await this.table.getItem(ALERT_KEY, `${ruleId}#${anomalyId}`);
    const alertId = key?.alertId?.S;
    return alertId ? this.findById(alertId) : undefined;
  }

  // Full partition read; fine for the alert volumes a rule limiter allows.
  async findLatestForRule(ruleId: string): Promise<Alert | undefined> {
    const alerts = await this.table.listEntities(ALERT, parseAlert);
    let latest: Alert | undefined;
    for (const a of alerts) {
      if (a.alertRuleId === ruleId && (!latest || a.createdAt > latest.createdAt)) latest = a;
    }
    return latest;
  }

  async transitionStatus(
    id: string,
    from: AlertStatus,
    to: AlertStatus,
    actor: string,
    notes?: string,
  ): Promise<Alert> {
    const updated = await this.table.mutate(
      ALERT,
      id,
      parseAlert,
      (current) => {
        if (current.status !== from) throw new InvalidTransitionError(current.status, to, id);
        assertTransition(from, to, id);
        return { ...current, ...transitionFields(to, actor, notes, new Date().toISOString()) };
      },
      (next) => ({ status: { S: next.status } }),
    );
    if (!updated) throw new NotFoundError('Alert', id);
    return updated;
  }

  async recordNotification(id: string, record: NotificationRecord): Promise<void> {
    const updated = await this.table.mutate(
      ALERT,
      id,
      parseAlert,
      (current) => ({
        ...current,
        notificationSent: current.notificationSent || record.sent,
        notificationSentAt: record.sent ? record.at : current.notificationSentAt,
        notificationFailureCount: current.notificationFailureCount + record.failures,
        lastNotificationError: record.lastError ?? current.lastNotificationError,
        updatedAt: record.at,
      }),
      (next) => ({ status: { S: next.status } }),
    );
    if (!updated) throw new NotFoundError('Alert', id);
  }

  async list(filter?: AlertFilter): Promise<Alert[]> {
    return filterAlerts(await this.table.listEntities(ALERT, parseAlert), filter);
  }

  async countByStatus(): Promise<Record<AlertStatus, number>> {
    const alerts = await this.table.listEntities(ALERT, parseAlert);
    const counts: Record<AlertStatus, number> = {
      OPEN: 0,
      ACKNOWLEDGED: 0,
      RESOLVED: 0,
      FALSE_POSITIVE: 0,
    };
    for (const a of alerts) counts[a.status]++;
    return counts;
  }
}

export class DynamoWatermarkStore implements WatermarkStore {
  constructor(
    private readonly table: DynamoTable,
    private readonly feedName = 'anomalies',
  ) {}

  async get(): Promise<string | undefined> {
    const item = await this.table.getItem(WATERMARK, this.feedName);
    return item?.watermark?.S;
  }

  async advance(to: string): Promise<string> {
    try {
      await this.table.call(() =>
        this.table.client.send(
          new UpdateItemCommand({
            TableName: this.table.tableName,
            Key: { [PK]: { S: WATERMARK }, [SK]: { S: this.feedName } },
            UpdateExpression: 'SET watermark = :to',
            ConditionExpression: 'attribute_not_exists(watermark) OR watermark < :to',
            ExpressionAttributeValues: { ':to': { S: to } },
          }),
        ),
      );
      return to;
    } catch (err) {
      if (!isConditionalFailure(err)) throw err;
      // Another instance is already further along.
      return (await this.get()) ?? to;
    }
  }

  async reset(to: string): Promise<void> {
    await this.table.call(() =>
      this.table.client.send(
        new PutItemCommand({
          TableName: this.table.tableName,
          Item: {
            [PK]: { S: WATERMARK },
            [SK]: { S: this.feedName },
            watermark: { S: to },
          },
        }),
      ),
    );
  }
}
