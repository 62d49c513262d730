/**
 * Assessment Assembler
 * Builds the immutable evidence record for one player in one game
 */

import type {
  AssessmentBasics,
  Color,
  PlayerAssessment,
  PlayerObservation,
  Verdict,
} from '../types/index.js';
import type { SignalResult } from '../signals/index.js';
import { intAvgSd, roundTenths } from '../statistics/index.js';
import { TC_FACTORS } from './AssessmentThresholds.js';

export interface AssemblyInput {
  observation: PlayerObservation;
  signals: SignalResult;
  verdict: Verdict;
  /** Supplied by the caller so records stay reproducible */
  createdAt: Date;
}

export function assessmentId(gameId: string, color: Color): string {
  return `${gameId}/${color}`;
}

export class AssessmentAssembler {
  assemble({ observation, signals, verdict, createdAt }: AssemblyInput): PlayerAssessment {
    const { gameId, userId, color, speed } = observation;
    const { flags, evidence } = signals;

    const basics: AssessmentBasics = {
      moveTimes: Object.freeze(intAvgSd(observation.moveTimes.map(roundTenths))),
      hold: flags.suspiciousHoldAlert,
      blurs: evidence.blurPercent,
      ...(evidence.densestBlurChunk > 0 ? { blurStreak: evidence.densestBlurChunk } : {}),
      ...(evidence.moveTimeStreak ? { mtStreak: true as const } : {}),
    };

    return Object.freeze({
      id: assessmentId(gameId, color),
      gameId,
      userId,
      color,
      verdict,
      createdAt: createdAt.toISOString(),
      basics: Object.freeze(basics),
      analysis: Object.freeze(intAvgSd(evidence.centipawnLosses)),
      flags: Object.freeze({ ...flags }),
      tcFactor: TC_FACTORS[speed],
    });
  }
}
