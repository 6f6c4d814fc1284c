import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AlertRuleSchema, AlertSchema, DEFAULT_CONFIG, NotificationChannelSchema } from '../types/index.js';
import type { Alert, AlertRule, AnomalyDetection, Config, NotificationChannel } from '../types/index.js';
import type { AuditEntry, AuditQuery, AuditStore } from '../audit/index.js';
import type { Logger } from '../logging/index.js';

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'alertctl-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

const T0 = '2026-01-15T10:00:00.000Z';

export function makeRule(overrides: Partial<AlertRule> = {}): AlertRule {
  return AlertRuleSchema.parse({
    id: 'rule-1',
    name: 'checkout-anomalies',
    type: 'ANOMALY_DETECTION',
    severity: 'HIGH',
    anomalyThreshold: 0.7,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  });
}

export function makeAnomaly(overrides: Partial<AnomalyDetection> = {}): AnomalyDetection {
  return {
    logId: 'log-1',
    isAnomaly: true,
    confidence: 0.85,
    anomalyScore: 0.5,
    service: 'checkout',
    level: 'ERROR',
    message: 'payment gateway returned 502',
    detectedAt: T0,
    ...overrides,
  };
}

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return AlertSchema.parse({
    id: 'alert-1',
    alertRuleId: 'rule-1',
    alertRuleName: 'checkout-anomalies',
    title: 'Anomaly Detected: checkout-anomalies - checkout',
    description: 'An anomaly was detected by the ML service.',
    severity: 'HIGH',
    status: 'OPEN',
    service: 'checkout',
    anomalyDetectionId: 'log-1',
    logId: 'log-1',
    context: '{"confidence":0.85}',
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  });
}

export function makeChannel(overrides: Partial<NotificationChannel> = {}): NotificationChannel {
  return NotificationChannelSchema.parse({
    id: 'chan-1',
    name: 'ops-webhook',
    type: 'WEBHOOK',
    configuration: { type: 'WEBHOOK', url: 'https://hooks.example.test/alerts' },
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  });
}

export function testConfig(patch: (c: Config) => void = () => undefined): Config {
  const config = structuredClone(DEFAULT_CONFIG);
  patch(config);
  return config;
}

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  detail?: Record<string, unknown>;
}

/** Logger that keeps every line for assertions. */
export class CapturingLogger implements Logger {
  readonly lines: LogLine[] = [];

  debug(message: string, detail?: Record<string, unknown>): void {
    this.lines.push({ level: 'debug', message, detail });
  }
  info(message: string, detail?: Record<string, unknown>): void {
    this.lines.push({ level: 'info', message, detail });
  }
  warn(message: string, detail?: Record<string, unknown>): void {
    this.lines.push({ level: 'warn', message, detail });
  }
  error(message: string, detail?: Record<string, unknown>): void {
    this.lines.push({ level: 'error', message, detail });
  }

  at(level: LogLine['level']): LogLine[] {
    return this.lines.filter((l) => l.level === level);
  }
}

export class MemoryAuditStore implements AuditStore {
  readonly entries: AuditEntry[] = [];

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    return [...this.entries]
      .reverse()
      .filter((e) => !query.action || e.action === query.action)
      .filter((e) => !query.ruleId || e.ruleId === query.ruleId)
      .filter((e) => !query.alertId || e.alertId === query.alertId)
      .filter((e) => !query.since || e.timestamp >= query.since)
      .slice(0, query.limit);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    return this.entries.find((e) => e.id === id);
  }
}

/** A fetch stand-in that replays scripted responses in order. */
export function scriptedFetch(
  steps: Array<number | Error>,
): { fetchFn: typeof fetch; calls: Array<{ url: string; init?: RequestInit }> } {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  let i = 0;
  const fetchFn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const step = steps[Math.min(i++, steps.length - 1)];
    if (step instanceof Error) throw step;
    return new Response(step >= 200 && step < 300 ? 'ok' : 'upstream error', { status: step });
  };
  return { fetchFn, calls };
}
