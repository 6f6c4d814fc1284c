import type { AlertRule, AnomalyDetection, NewAlert } from '../types/index.js';

const UNKNOWN_SERVICE = 'Unknown Service';
const TITLE_MAX = 200;

export function alertTitle(rule: AlertRule, anomaly: AnomalyDetection): string {
  const title = `Anomaly Detected: ${rule.name} - ${anomaly.service ?? UNKNOWN_SERVICE}`;
  return title.length > TITLE_MAX ? `${title.slice(0, TITLE_MAX - 3)}...` : title;
}

export function alertDescription(anomaly: AnomalyDetection): string {
  const lines = [
    'An anomaly was detected by the ML service.',
    '',
    `Confidence: ${(anomaly.confidence * 100).toFixed(2)}%`,
  ];
  if (anomaly.anomalyScore !== undefined) {
    lines.push(`Anomaly Score: ${anomaly.anomalyScore.toFixed(2)}`);
  }
  if (anomaly.message) lines.push('', `Log Message: ${anomaly.message}`);
  if (anomaly.level) lines.push(`Log Level: ${anomaly.level}`);
  lines.push('', `Detected At: ${anomaly.detectedAt}`);
  return lines.join('\n');
}

/** The alert a triggered rule produces for an anomaly. */
export function alertFromAnomaly(rule: AlertRule, anomaly: AnomalyDetection): NewAlert {
  return {
    alertRuleId: rule.id,
    alertRuleName: rule.name,
    title: alertTitle(rule, anomaly),
    description: alertDescription(anomaly),
    severity: rule.severity,
    service: anomaly.service,
    anomalyDetectionId: anomaly.logId,
    logId: anomaly.logId,
    context: JSON.stringify({
      confidence: anomaly.confidence,
      anomalyScore: anomaly.anomalyScore,
      level: anomaly.level,
      modelVersion: anomaly.modelVersion,
      detectedAt: anomaly.detectedAt,
    }),
  };
}
