/**
 * Classification Engine
 * Flags → verdict through the ordered rule table, then the outcome overrides
 */

import { Verdict, type Color, type PlayerFlags } from '../types/index.js';
import { DEFAULT_RULE, VERDICT_RULES, matchesPattern, type VerdictRule } from './VerdictRules.js';

export interface ClassificationContext {
  flags: PlayerFlags;
  color: Color;
  /** Absent for a draw */
  winner?: Color;
}

export interface ClassificationResult {
  verdict: Verdict;
  /** Verdict straight from the table, before overrides */
  tableVerdict: Verdict;
  rule: VerdictRule;
  downgraded: boolean;
}

export class ClassificationEngine {
  /**
   * Main entry point
   */
  classify(ctx: ClassificationContext): ClassificationResult {
    const rule = this.matchRule(ctx.flags);
    const verdict = this.applyOverrides(rule.verdict, ctx);

    return {
      verdict,
      tableVerdict: rule.verdict,
      rule,
      downgraded: verdict !== rule.verdict,
    };
  }

  /**
   * First matching row of the table
   */
  matchRule(flags: PlayerFlags): VerdictRule {
    return VERDICT_RULES.find((rule) => matchesPattern(flags, rule.when)) ?? DEFAULT_RULE;
  }

  /**
   * A hold alert is trusted as is. A player who did not win (draws included)
   * keeps the table verdict. A winner without a hold alert gets one step of leniency.
   */
  applyOverrides(verdict: Verdict, ctx: ClassificationContext): Verdict {
    if (ctx.flags.suspiciousHoldAlert) return verdict;
    if (ctx.winner !== ctx.color) return verdict;
    return downgradeOnce(verdict);
  }
}

/**
 * One severity step down for the two cheating verdicts; the rest stay
 */
export function downgradeOnce(verdict: Verdict): Verdict {
  switch (verdict) {
    case Verdict.Cheating:
      return Verdict.LikelyCheating;
    case Verdict.LikelyCheating:
      return Verdict.Unclear;
    case Verdict.Unclear:
    case Verdict.UnlikelyCheating:
    case Verdict.NotCheating:
      return verdict;
    default: {
      const unreachable: never = verdict;
      return unreachable;
    }
  }
}
