/**
 * Rule evaluation types.
 *
 * A trace lists each predicate a rule applies to an anomaly, in evaluation
 * order, with the values compared. Only predicates the rule configures
 * appear (a rule without a threshold has no confidence check).
 */

export type RuleCheckName = 'anomaly_flag' | 'confidence' | 'service' | 'log_level';

export interface RuleCheck {
  /** Which predicate ran */
  check: RuleCheckName;
  /** What the rule requires, rendered for display */
  expected: string;
  /** What the anomaly carried */
  actual: string;
  passed: boolean;
}

export interface EvaluationTrace {
  ruleId: string;
  ruleName: string;
  anomalyId: string;
  triggered: boolean;
  checks: RuleCheck[];
}
