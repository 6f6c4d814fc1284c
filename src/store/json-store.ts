import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  AlertFilterSchema,
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
  NewAlert,
  NotificationChannel,
  RuleType,
  UpdateAlertRuleInput,
  CreateChannelInput,
} from '../types/index.js';
import { assertTransition, transitionFields } from '../alerts/lifecycle.js';
import { DuplicateAlertError, InvalidTransitionError, NotFoundError, ValidationError } from '../errors.js';
import { JsonFile } from './json-file.js';
import type {
  AlertStore,
  ChannelStore,
  NotificationRecord,
  ResolvedRuleInput,
  RuleStore,
  WatermarkStore,
} from './store.js';

const RulesFileSchema = z.array(AlertRuleSchema);
const ChannelsFileSchema = z.array(NotificationChannelSchema);
const AlertsFileSchema = z.array(AlertSchema);
const WatermarkFileSchema = z.object({ watermark: z.string().datetime().optional() });

export class JsonRuleStore implements RuleStore {
  private readonly file: JsonFile<AlertRule[]>;

  constructor(dir?: string) {
    this.file = new JsonFile('rules.json', (raw) => RulesFileSchema.parse(raw), () => [], dir);
  }

  async list(): Promise<AlertRule[]> {
    return this.file.read();
  }

  async findById(id: string): Promise<AlertRule | undefined> {
    const rules = await this.file.read();
    return rules.find((r) => r.id === id || r.name === id);
  }

  async findEnabledByType(type: RuleType): Promise<AlertRule[]> {
    const rules = await this.file.read();
    return rules.filter((r) => r.enabled && r.type === type);
  }

  async create(input: ResolvedRuleInput): Promise<AlertRule> {
    return this.file.update((rules) => {
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
      return { next: [...rules, rule], result: rule };
    });
  }

  async update(id: string, input: UpdateAlertRuleInput): Promise<AlertRule | undefined> {
    return this.file.update<AlertRule | undefined>((rules) => {
      const index = rules.findIndex((r) => r.id === id);
      if (index === -1) return { result: undefined };
      const parsed = AlertRuleSchema.safeParse({
        ...rules[index],
        ...input,
        updatedAt: new Date().toISOString(),
      });
      if (!parsed.success) throw ValidationError.fromZod('rule update', parsed.error);
      const next = [...rules];
      next[index] = parsed.data;
      return { next, result: parsed.data };
    });
  }

  async remove(id: string): Promise<boolean> {
    return this.file.update<boolean>((rules) => {
      const next = rules.filter((r) => r.id !== id);
      return next.length === rules.length ? { result: false } : { next, result: true };
    });
  }

  async recordTrigger(id: string, at: string): Promise<void> {
    await this.file.update((rules) => {
      const index = rules.findIndex((r) => r.id === id);
      if (index === -1) return { result: undefined };
      const next = [...rules];
      next[index] = {
        ...rules[index],
        triggerCount: rules[index].triggerCount + 1,
        lastTriggeredAt: at,
      };
      return { next, result: undefined };
    });
  }
}

export class JsonChannelStore implements ChannelStore {
  private readonly file: JsonFile<NotificationChannel[]>;

  constructor(
    private readonly rules: RuleStore,
    dir?: string,
  ) {
    this.file = new JsonFile('channels.json', (raw) => ChannelsFileSchema.parse(raw), () => [], dir);
  }

  async list(): Promise<NotificationChannel[]> {
    return this.file.read();
  }

  async findById(id: string): Promise<NotificationChannel | undefined> {
    const channels = await this.file.read();
    return channels.find((c) => c.id === id || c.name === id);
  }

  async findEnabledByAlertRuleId(ruleId: string): Promise<NotificationChannel[]> {
    const rule = await this.rules.findById(ruleId);
    if (!rule || rule.channelIds.length === 0) return [];
    const channels = await this.file.read();
    return channels.filter((c) => c.enabled && rule.channelIds.includes(c.id));
  }

  async create(input: CreateChannelInput): Promise<NotificationChannel> {
    const parsed = CreateChannelInputSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromZod('channel', parsed.error);
    return this.file.update((channels) => {
      const now = new Date().toISOString();
      const channel = NotificationChannelSchema.parse({
        ...parsed.data,
        id: randomUUID(),
        createdAt: now,
        updatedAt: now,
      });
      return { next: [...channels, channel], result: channel };
    });
  }

  async recordOutcome(id: string, success: boolean, at: string): Promise<void> {
    await this.file.update((channels) => {
      const index = channels.findIndex((c) => c.id === id);
      if (index === -1) throw new NotFoundError('Channel', id);
      const channel = channels[index];
      const next = [...channels];
      next[index] = success
        ? { ...channel, successCount: channel.successCount + 1, lastSuccessAt: at }
        : { ...channel, failureCount: channel.failureCount + 1, lastFailureAt: at };
      return { next, result: undefined };
    });
  }
}

export function filterAlerts(alerts: Alert[], filter: AlertFilter = {}): Alert[] {
  const f = AlertFilterSchema.parse(filter);
  return alerts
    .filter((a) => !f.status || a.status === f.status)
    .filter((a) => !f.alertRuleId || a.alertRuleId === f.alertRuleId)
    .filter((a) => !f.service || a.service === f.service)
    .filter((a) => !f.since || a.createdAt >= f.since)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
    .slice(0, f.limit);
}

export class JsonAlertStore implements AlertStore {
  private readonly file: JsonFile<Alert[]>;

  constructor(dir?: string) {
    this.file = new JsonFile('alerts.json', (raw) => AlertsFileSchema.parse(raw), () => [], dir);
  }

  async create(input: NewAlert): Promise<Alert> {
    return this.file.update((alerts) => {
      const anomalyId = input.anomalyDetectionId;
      if (anomalyId !== undefined) {
        const existing = alerts.find(
          (a) => a.alertRuleId === input.alertRuleId && a.anomalyDetectionId === anomalyId,
        );
        if (existing) throw new DuplicateAlertError(input.alertRuleId, anomalyId, existing.id);
      }
      const now = new Date().toISOString();
      const alert = AlertSchema.parse({
        ...input,
        id: randomUUID(),
        status: 'OPEN',
        createdAt: now,
        updatedAt: now,
      });
      return { next: [...alerts, alert], result: alert };
    });
  }

  async findById(id: string): Promise<Alert | undefined> {
    const alerts = await this.file.read();
    return alerts.find((a) => a.id === id);
  }

  async findByRuleAndAnomaly(ruleId: string, anomalyId: string): Promise<Alert | undefined> {
    const alerts = await this.file.read();
    return alerts.find((a) => a.alertRuleId === ruleId && a.anomalyDetectionId === anomalyId);
  }

  async findLatestForRule(ruleId: string): Promise<Alert | undefined> {
    const alerts = await this.file.read();
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
    return this.file.update((alerts) => {
      const index = alerts.findIndex((a) => a.id === id);
      if (index === -1) throw new NotFoundError('Alert', id);
      const current = alerts[index];
      // Lost-update guard: someone else moved it since the caller looked.
      if (current.status !== from) throw new InvalidTransitionError(current.status, to, id);
      assertTransition(from, to, id);
      const updated: Alert = {
        ...current,
        ...transitionFields(to, actor, notes, new Date().toISOString()),
      };
      const next = [...alerts];
      next[index] = updated;
      return { next, result: updated };
    });
  }

  async recordNotification(id: string, record: NotificationRecord): Promise<void> {
    await this.file.update((alerts) => {
      const index = alerts.findIndex((a) => a.id === id);
      if (index === -1) throw new NotFoundError('Alert', id);
      const current = alerts[index];
      const next = [...alerts];
      next[index] = {
        ...current,
        notificationSent: current.notificationSent || record.sent,
        notificationSentAt: record.sent ? record.at : current.notificationSentAt,
        notificationFailureCount: current.notificationFailureCount + record.failures,
        lastNotificationError: record.lastError ?? current.lastNotificationError,
        updatedAt: record.at,
      };
      return { next, result: undefined };
    });
  }

  async list(filter?: AlertFilter): Promise<Alert[]> {
    return filterAlerts(await this.file.read(), filter);
  }

  async countByStatus(): Promise<Record<AlertStatus, number>> {
    const alerts = await this.file.read();
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

export class JsonWatermarkStore implements WatermarkStore {
  private readonly file: JsonFile<{ watermark?: string }>;

  constructor(dir?: string) {
    this.file = new JsonFile('watermark.json', (raw) => WatermarkFileSchema.parse(raw), () => ({}), dir);
  }

  async get(): Promise<string | undefined> {
    return (await this.file.read()).watermark;
  }

  async advance(to: string): Promise<string> {
    return this.file.update((state) => {
      if (state.watermark && state.watermark >= to) return { result: state.watermark };
      return { next: { watermark: to }, result: to };
    });
  }

  async reset(to: string): Promise<void> {
    await this.file.update(() => ({ next: { watermark: to }, result: undefined }));
  }
}
