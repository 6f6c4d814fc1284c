import type {
  Alert,
  AlertFilter,
  AlertRule,
  AlertStatus,
  NewAlert,
  NotificationChannel,
  RuleType,
  Severity,
  UpdateAlertRuleInput,
} from '../types/index.js';
import type { CreateChannelInput } from '../types/index.js';

/** Rule input after defaults are applied; see resolveRuleInput(). */
export interface ResolvedRuleInput {
  name: string;
  description?: string;
  type: RuleType;
  severity: Severity;
  enabled: boolean;
  anomalyThreshold?: number;
  services: string[];
  logLevels: string[];
  cooldownMinutes: number;
  notifyOnRecovery: boolean;
  channelIds: string[];
}

export interface RuleStore {
  list(): Promise<AlertRule[]>;
  findById(id: string): Promise<AlertRule | undefined>;
  findEnabledByType(type: RuleType): Promise<AlertRule[]>;
  create(input: ResolvedRuleInput): Promise<AlertRule>;
  update(id: string, input: UpdateAlertRuleInput): Promise<AlertRule | undefined>;
  remove(id: string): Promise<boolean>;
  /** Bump triggerCount and lastTriggeredAt after an alert is created. */
  recordTrigger(id: string, at: string): Promise<void>;
}

export interface ChannelStore {
  list(): Promise<NotificationChannel[]>;
  findById(id: string): Promise<NotificationChannel | undefined>;
  /** Enabled channels referenced by the rule's channelIds. */
  findEnabledByAlertRuleId(ruleId: string): Promise<NotificationChannel[]>;
  create(input: CreateChannelInput): Promise<NotificationChannel>;
  /** Increment the success or failure counter and stamp the matching time. */
  recordOutcome(id: string, success: boolean, at: string): Promise<void>;
}

export interface NotificationRecord {
  /** True when every channel accepted the alert */
  sent: boolean;
  failures: number;
  lastError?: string;
  at: string;
}

export interface AlertStore {
  /**
   * Persist a new OPEN alert. Throws DuplicateAlertError when an alert for
   * the same rule and anomaly already exists.
   */
  create(alert: NewAlert): Promise<Alert>;
  findById(id: string): Promise<Alert | undefined>;
  findByRuleAndAnomaly(ruleId: string, anomalyId: string): Promise<Alert | undefined>;
  findLatestForRule(ruleId: string): Promise<Alert | undefined>;
  /**
   * Check-and-set status change. Fails with InvalidTransitionError when the
   * stored status is not `from` or the move is not allowed.
   */
  transitionStatus(
    id: string,
    from: AlertStatus,
    to: AlertStatus,
    actor: string,
    notes?: string,
  ): Promise<Alert>;
  recordNotification(id: string, record: NotificationRecord): Promise<void>;
  list(filter?: AlertFilter): Promise<Alert[]>;
  countByStatus(): Promise<Record<AlertStatus, number>>;
}

/** Last-processed position in the anomaly feed. */
export interface WatermarkStore {
  get(): Promise<string | undefined>;
  /** Move forward to `to`; never moves backwards. Returns the stored value. */
  advance(to: string): Promise<string>;
  /** Operator override; may move backwards. */
  reset(to: string): Promise<void>;
}

export interface AlertingStores {
  rules: RuleStore;
  channels: ChannelStore;
  alerts: AlertStore;
  watermark: WatermarkStore;
}
