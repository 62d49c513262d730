/**
 * Verdict Rules
 * Ordered decision table over the eight flags. First match wins, so the
 * order of rows is part of the contract: overlapping rows resolve to the earlier one.
 *
 * A flag left out of a pattern is a wildcard.
 */

import { FLAG_NAMES, Verdict, type PlayerFlags } from '../types/index.js';

export type FlagPattern = Partial<Record<keyof PlayerFlags, boolean>>;

export interface VerdictRule {
  /** 1-based position in the table */
  id: number;
  when: FlagPattern;
  verdict: Verdict;
  reason: string;
}

export const VERDICT_RULES: readonly VerdictRule[] = [
  {
    id: 1,
    when: { highAccuracy: true, highBlurRate: true, noFastMoves: true },
    verdict: Verdict.Cheating,
    reason: 'high accuracy, high blurs, no fast moves',
  },
  {
    id: 2,
    when: { highAccuracy: true, moderateBlurRate: true },
    verdict: Verdict.Cheating,
    reason: 'high accuracy, moderate blurs',
  },
  {
    id: 3,
    when: { highAccuracy: true, highlyConsistentMoveTimes: true },
    verdict: Verdict.Cheating,
    reason: 'high accuracy, highly consistent move times',
  },
  {
    id: 4,
    when: { highBlurRate: true, highlyConsistentMoveTimes: true },
    verdict: Verdict.Cheating,
    reason: 'high blurs, highly consistent move times',
  },
  {
    id: 5,
    when: { moderateBlurRate: true, moderatelyConsistentMoveTimes: true },
    verdict: Verdict.LikelyCheating,
    reason: 'moderate blurs, consistent move times',
  },
  {
    id: 6,
    when: { highAccuracy: true, suspiciousHoldAlert: true },
    verdict: Verdict.LikelyCheating,
    reason: 'high accuracy, suspicious holds',
  },
  {
    id: 7,
    when: { advantageAlwaysHeld: true, suspiciousHoldAlert: true },
    verdict: Verdict.LikelyCheating,
    reason: 'always has advantage, suspicious holds',
  },
  {
    id: 8,
    when: { highlyConsistentMoveTimes: true },
    verdict: Verdict.LikelyCheating,
    reason: 'very consistent move times',
  },
  {
    id: 9,
    when: { advantageAlwaysHeld: true, highBlurRate: true },
    verdict: Verdict.LikelyCheating,
    reason: 'always has advantage, high blurs',
  },
  {
    id: 10,
    when: { advantageAlwaysHeld: true, moderatelyConsistentMoveTimes: true, noFastMoves: true },
    verdict: Verdict.Unclear,
    reason: 'always has advantage, consistent move times, no fast moves',
  },
  {
    id: 11,
    when: { highAccuracy: true, moderatelyConsistentMoveTimes: true, noFastMoves: true },
    verdict: Verdict.Unclear,
    reason: 'high accuracy, consistent move times, no fast moves',
  },
  {
    id: 12,
    when: {
      highAccuracy: true,
      moderateBlurRate: false,
      moderatelyConsistentMoveTimes: false,
      noFastMoves: true,
    },
    verdict: Verdict.Unclear,
    reason: "high accuracy, no fast moves, but doesn't blur or flat line",
  },
  {
    id: 13,
    when: { highAccuracy: true, noFastMoves: false },
    verdict: Verdict.UnlikelyCheating,
    reason: 'high accuracy, but has fast moves',
  },
  {
    id: 14,
    when: { highAccuracy: false, advantageAlwaysHeld: false },
    verdict: Verdict.NotCheating,
    reason: "low accuracy, doesn't hold advantage",
  },
];

/**
 * Applies when no row matches
 */
export const DEFAULT_RULE: VerdictRule = {
  id: 15,
  when: {},
  verdict: Verdict.NotCheating,
  reason: 'no suspicious combination',
};

export function matchesPattern(flags: PlayerFlags, pattern: FlagPattern): boolean {
  return FLAG_NAMES.every((name) => {
    const expected = pattern[name];
    return expected === undefined || flags[name] === expected;
  });
}
