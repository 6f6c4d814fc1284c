import type { RateLimitConfig, Severity } from '../types/index.js';
import { KeyedLock } from '../concurrency/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';

export type RateLimitDecision = 'allowed' | 'suppressed' | 'override_bypass';

export interface RateLimitStatus {
  ruleId: string;
  inCooldown: boolean;
  cooldownUntil?: Date;
  alertsInWindow: number;
  maxAlertsPerRule: number;
}

interface RuleWindow {
  /** Alert times in ms, oldest first */
  timestamps: number[];
  cooldownUntil?: number;
}

const MINUTE_MS = 60_000;

/**
 * Per-rule rolling window with a cooldown after the limit is hit. State is
 * process-local; run one dispatching instance per rule set.
 */
export class RateLimiter {
  private readonly windows = new Map<string, RuleWindow>();
  private readonly locks = new KeyedLock();

  constructor(
    private readonly config: RateLimitConfig,
    private readonly log: Logger = silentLogger,
  ) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  tryAcquire(ruleId: string, severity: Severity, now: Date = new Date()): RateLimitDecision {
    if (!this.config.enabled) return 'allowed';

    const t = now.getTime();
    const window = this.prune(ruleId, t);
    const inCooldown = window.cooldownUntil !== undefined && t < window.cooldownUntil;
    const overLimit = window.timestamps.length >= this.config.maxAlertsPerRule;

    if (!inCooldown && !overLimit) {
      window.timestamps.push(t);
      return 'allowed';
    }

    if (overLimit) {
      // Start or extend the cooldown
      window.cooldownUntil = t + this.config.cooldownMinutes * MINUTE_MS;
    }

    if (severity === 'CRITICAL') {
      window.timestamps.push(t);
      this.log.warn(`Rate limit bypassed for critical alert on rule ${ruleId}`, {
        alertsInWindow: window.timestamps.length,
      });
      return 'override_bypass';
    }

    this.log.warn(`Rate limit exceeded for rule ${ruleId}`, {
      alertsInWindow: window.timestamps.length,
      cooldownUntil: window.cooldownUntil ? new Date(window.cooldownUntil).toISOString() : undefined,
    });
    return 'suppressed';
  }

  /**
   * Seed a rule's window with alerts created before this process started, so
   * a restart does not reset the count. Cooldowns are not restored.
   */
  hydrate(ruleId: string, createdAt: Date[], now: Date = new Date()): void {
    const window = this.prune(ruleId, now.getTime());
    const cutoff = now.getTime() - this.config.timeWindowMinutes * MINUTE_MS;
    const seeded = createdAt.map((d) => d.getTime()).filter((t) => t > cutoff && t <= now.getTime());
    window.timestamps = [...window.timestamps, ...seeded].sort((a, b) => a - b);
  }

  /**
   * Give back a slot taken by tryAcquire when the alert it was for was never
   * stored, so failed writes do not use up the rule's budget.
   */
  release(ruleId: string, now: Date): void {
    const window = this.windows.get(ruleId);
    if (!window) return;
    const i = window.timestamps.lastIndexOf(now.getTime());
    if (i >= 0) window.timestamps.splice(i, 1);
  }

  /** Serialize work for one rule so the decision and alert commit happen together. */
  runExclusive<T>(ruleId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(ruleId, fn);
  }

  /** Drop the rule's cooldown; the window counts stay. */
  clearCooldown(ruleId: string): boolean {
    const window = this.windows.get(ruleId);
    if (!window || window.cooldownUntil === undefined) return false;
    window.cooldownUntil = undefined;
    this.log.info(`Cooldown cleared for rule ${ruleId}`);
    return true;
  }

  getStatus(ruleId: string, now: Date = new Date()): RateLimitStatus {
    if (!this.windows.has(ruleId)) {
      return { ruleId, inCooldown: false, alertsInWindow: 0, maxAlertsPerRule: this.config.maxAlertsPerRule };
    }
    const t = now.getTime();
    const window = this.prune(ruleId, t);
    const inCooldown = window.cooldownUntil !== undefined && t < window.cooldownUntil;
    return {
      ruleId,
      inCooldown,
      cooldownUntil: window.cooldownUntil !== undefined ? new Date(window.cooldownUntil) : undefined,
      alertsInWindow: window.timestamps.length,
      maxAlertsPerRule: this.config.maxAlertsPerRule,
    };
  }

  getConfiguration(): Readonly<RateLimitConfig> {
    return { ...this.config };
  }

  private prune(ruleId: string, t: number): RuleWindow {
    let window = this.windows.get(ruleId);
    if (!window) {
      window = { timestamps: [] };
      this.windows.set(ruleId, window);
    }
    const cutoff = t - this.config.timeWindowMinutes * MINUTE_MS;
    while (window.timestamps.length > 0 && window.timestamps[0] <= cutoff) {
      window.timestamps.shift();
    }
    if (window.cooldownUntil !== undefined && t >= window.cooldownUntil) {
      window.cooldownUntil = undefined;
    }
    return window;
  }
}
