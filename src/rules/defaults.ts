import { CreateAlertRuleInputSchema } from '../types/index.js';
import type { Config } from '../types/index.js';
import type { ResolvedRuleInput } from '../store/index.js';
import { ValidationError } from '../errors.js';

/**
 * Validate a new rule (a CreateAlertRuleInput, or raw CLI/API input) and fill
 * in configured defaults: severity by rule type, and the confidence threshold
 * for anomaly rules that omit one.
 */
export function resolveRuleInput(
  input: unknown,
  defaults: Config['rules'],
): ResolvedRuleInput {
  const parsed = CreateAlertRuleInputSchema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod('rule', parsed.error);
  const rule = parsed.data;

  return {
    ...rule,
    severity: rule.severity ?? defaults.defaultSeverity[rule.type],
    anomalyThreshold:
      rule.type === 'ANOMALY_DETECTION'
        ? (rule.anomalyThreshold ?? defaults.defaultAnomalyThreshold)
        : rule.anomalyThreshold,
  };
}
