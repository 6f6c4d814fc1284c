import type { AlertRule, AnomalyDetection } from './types/index.js';
import type { RuleEngine, EvaluationTrace } from './rules/index.js';
import type { Dispatcher, DispatchResult } from './dispatch/index.js';
import type { AlertService } from './alerts/index.js';

/**
 * The surface a thin service boundary (an HTTP handler, the CLI, a job)
 * calls into. Lifecycle operations are on `alerts`.
 */
export class AlertingService {
  constructor(
    private readonly engine: RuleEngine,
    private readonly dispatcher: Dispatcher,
    readonly alerts: AlertService,
  ) {}

  /** Evaluate and dispatch: every matching rule gets a trigger. */
  async evaluateAnomalyRules(anomaly: AnomalyDetection): Promise<AlertRule[]> {
    const rules = await this.engine.evaluateBatch(anomaly);
    for (const rule of rules) {
      await this.dispatcher.handleTrigger(rule, anomaly);
    }
    return rules;
  }

  /** Dry run: which rules would trigger. No alerts, no notifications. */
  getMatchingRules(anomaly: AnomalyDetection): Promise<AlertRule[]> {
    return this.engine.evaluateBatch(anomaly);
  }

  testRule(rule: AlertRule, anomaly: AnomalyDetection): EvaluationTrace {
    return this.engine.test(rule, anomaly);
  }

  dispatch(rule: AlertRule, anomaly: AnomalyDetection): Promise<DispatchResult> {
    return this.dispatcher.handleTrigger(rule, anomaly);
  }

  testChannel(channelId: string, actor?: string): Promise<boolean> {
    return this.dispatcher.testChannel(channelId, actor);
  }
}
