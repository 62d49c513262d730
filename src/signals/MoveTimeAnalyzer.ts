/**
 * Move Time Analyzer
 * Looks for unnaturally even pacing and for the absence of reflex moves
 */

import type { ClockConfig, PlayerObservation } from '../types/index.js';
import {
  cvIndicatesFlatTimes,
  moveTimeCoefVariation,
  noFastMoves,
  slidingMoveTimeCvs,
} from '../statistics/index.js';
import { SIGNAL_THRESHOLDS } from './SignalThresholds.js';

export interface MoveTimeResult {
  highlyConsistentMoveTimes: boolean;
  moderatelyConsistentMoveTimes: boolean;
  /** A single window was flat enough on its own */
  highlyConsistentStreak: boolean;
  noFastMoves: boolean;
}

export class MoveTimeAnalyzer {
  analyze(observation: PlayerObservation): MoveTimeResult {
    const { moveTimes, speed } = observation;
    const fastMovesAbsent = noFastMoves(moveTimes, SIGNAL_THRESHOLDS.REFLEX_MOVE_CENTIS[speed]);

    // Too short for timing statistics to mean anything
    if (!this.isLongEnough(observation.clock)) {
      return {
        highlyConsistentMoveTimes: false,
        moderatelyConsistentMoveTimes: false,
        highlyConsistentStreak: false,
        noFastMoves: fastMovesAbsent,
      };
    }

    const cv = moveTimeCoefVariation(moveTimes);
    const highlyConsistentGlobal = cv !== undefined && cvIndicatesFlatTimes(cv, 'highlyFlat');
    const highlyConsistentStreak = slidingMoveTimeCvs(moveTimes).some((windowCv) =>
      cvIndicatesFlatTimes(windowCv, 'highlyFlatForStreaks')
    );

    return {
      highlyConsistentMoveTimes: highlyConsistentGlobal || highlyConsistentStreak,
      moderatelyConsistentMoveTimes: cv !== undefined && cvIndicatesFlatTimes(cv, 'moderatelyFlat'),
      highlyConsistentStreak,
      noFastMoves: fastMovesAbsent,
    };
  }

  /**
   * Estimated total clock time (initial + 40 increments) over the minimum
   */
  isLongEnough(clock: ClockConfig | undefined): boolean {
    if (!clock) return false;
    return estimateTotalSeconds(clock) > SIGNAL_THRESHOLDS.MIN_ESTIMATED_CLOCK_SECONDS;
  }
}

export function estimateTotalSeconds(clock: ClockConfig): number {
  return clock.initialSeconds + SIGNAL_THRESHOLDS.ESTIMATED_MOVES_PER_GAME * clock.incrementSeconds;
}
