import type { AlertRule, AnomalyDetection } from '../types/index.js';
import type { RuleStore } from '../store/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { NotFoundError } from '../errors.js';
import type { EvaluationTrace, RuleCheck } from './types.js';

type CheckFn = (rule: AlertRule, anomaly: AnomalyDetection) => RuleCheck | null;

function fmt(n: number): string {
  return n.toFixed(2);
}

// Order matters: evaluate() stops at the first failing check.
const CHECKS: CheckFn[] = [
  (_rule, anomaly) => ({
    check: 'anomaly_flag',
    expected: 'true',
    actual: String(anomaly.isAnomaly),
    passed: anomaly.isAnomaly,
  }),
  (rule, anomaly) => {
    if (rule.anomalyThreshold === undefined) return null;
    return {
      check: 'confidence',
      expected: `>= ${fmt(rule.anomalyThreshold)}`,
      actual: fmt(anomaly.confidence),
      passed: !(anomaly.confidence < rule.anomalyThreshold),
    };
  },
  (rule, anomaly) => {
    if (rule.services.length === 0) return null;
    return {
      check: 'service',
      expected: `in [${rule.services.join(', ')}]`,
      actual: anomaly.service ?? '(none)',
      passed: anomaly.service !== undefined && rule.services.includes(anomaly.service),
    };
  },
  (rule, anomaly) => {
    if (rule.logLevels.length === 0) return null;
    return {
      check: 'log_level',
      expected: `in [${rule.logLevels.join(', ')}]`,
      actual: anomaly.level ?? '(none)',
      passed: anomaly.level !== undefined && rule.logLevels.includes(anomaly.level),
    };
  },
];

/**
 * Decide whether a rule matches an anomaly. Pure; the first failing check
 * short-circuits the rest.
 */
export function evaluate(rule: AlertRule, anomaly: AnomalyDetection): boolean {
  for (const check of CHECKS) {
    const result = check(rule, anomaly);
    if (result && !result.passed) return false;
  }
  return true;
}

/** Like evaluate(), but runs every configured check and reports each one. */
export function traceRule(rule: AlertRule, anomaly: AnomalyDetection): EvaluationTrace {
  const checks = CHECKS.map((check) => check(rule, anomaly)).filter(
    (c): c is RuleCheck => c !== null,
  );
  return {
    ruleId: rule.id,
    ruleName: rule.name,
    anomalyId: anomaly.logId,
    triggered: checks.every((c) => c.passed),
    checks,
  };
}

export class RuleEngine {
  constructor(
    private readonly rules: RuleStore,
    private readonly log: Logger = silentLogger,
  ) {}

  evaluate(rule: AlertRule, anomaly: AnomalyDetection): boolean {
    const matched = evaluate(rule, anomaly);
    if (!matched) {
      this.log.debug(`Rule ${rule.name} did not match anomaly ${anomaly.logId}`);
    }
    return matched;
  }

  /**
   * All enabled ANOMALY_DETECTION rules that match the anomaly. One pass over
   * the enabled rule set per anomaly.
   */
  async evaluateBatch(anomaly: AnomalyDetection): Promise<AlertRule[]> {
    const rules = await this.rules.findEnabledByType('ANOMALY_DETECTION');
    const matched = rules.filter((rule) => this.evaluate(rule, anomaly));
    if (matched.length > 0) {
      this.log.info(`Anomaly ${anomaly.logId} matched ${matched.length} rule(s)`, {
        rules: matched.map((r) => r.name),
      });
    }
    return matched;
  }

  /** Evaluate one stored rule by id. Disabled and non-anomaly rules never match. */
  async evaluateRule(ruleId: string, anomaly: AnomalyDetection): Promise<boolean> {
    const rule = await this.rules.findById(ruleId);
    if (!rule) throw new NotFoundError('Rule', ruleId);
    if (!rule.enabled) {
      this.log.debug(`Rule ${rule.name} is disabled`);
      return false;
    }
    if (rule.type !== 'ANOMALY_DETECTION') {
      this.log.warn(`Rule ${rule.name} is not an anomaly detection rule`);
      return false;
    }
    return this.evaluate(rule, anomaly);
  }

  test(rule: AlertRule, anomaly: AnomalyDetection): EvaluationTrace {
    return traceRule(rule, anomaly);
  }
}
