/**
 * Classification Module
 * Verdict table and outcome overrides
 */

export { ClassificationEngine, downgradeOnce } from './ClassificationEngine.js';
export type { ClassificationContext, ClassificationResult } from './ClassificationEngine.js';
export { VERDICT_RULES, DEFAULT_RULE, matchesPattern } from './VerdictRules.js';
export type { FlagPattern, VerdictRule } from './VerdictRules.js';
