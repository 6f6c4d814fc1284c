export { RuleEngine, evaluate, traceRule } from './engine.js';
export { resolveRuleInput } from './defaults.js';
export type { EvaluationTrace, RuleCheck, RuleCheckName } from './types.js';
