/**
 * Signal Extractor
 * Main orchestrator: one player's observation in, eight independent flags out
 *
 * Each signal is weak on its own; only their combination in the
 * classification table carries weight.
 */

import { SPEEDS, type PlayerFlags, type PlayerObservation, type Speed } from '../types/index.js';
import { InvalidObservationError } from '../utils/errors.js';
import { AccuracyAnalyzer } from './AccuracyAnalyzer.js';
import { BlurAnalyzer } from './BlurAnalyzer.js';
import { MoveTimeAnalyzer } from './MoveTimeAnalyzer.js';

/**
 * Intermediate values the assessment record reports alongside the flags
 */
export interface SignalEvidence {
  centipawnLosses: number[];
  blurPercent: number;
  densestBlurChunk: number;
  moveTimeStreak: boolean;
}

export interface SignalResult {
  flags: PlayerFlags;
  evidence: SignalEvidence;
}

function isSpeed(value: string): value is Speed {
  return (SPEEDS as readonly string[]).includes(value);
}

export class SignalExtractor {
  private _accuracyAnalyzer = new AccuracyAnalyzer();
  private _blurAnalyzer = new BlurAnalyzer();
  private _moveTimeAnalyzer = new MoveTimeAnalyzer();

  /**
   * Main entry point
   *
   * @throws InvalidObservationError when the observation breaks a precondition
   */
  extract(observation: PlayerObservation): SignalResult {
    this.validate(observation);

    const { color, evaluations, speed } = observation;

    const centipawnLosses = this._accuracyAnalyzer.centipawnLosses(evaluations, color);
    const blurRates = this._blurAnalyzer.rates(observation);
    const blurSummary = this._blurAnalyzer.summarize(observation);
    const moveTimes = this._moveTimeAnalyzer.analyze(observation);

    const flags: PlayerFlags = {
      highAccuracy: this._accuracyAnalyzer.hasHighAccuracy(centipawnLosses, speed),
      advantageAlwaysHeld: this._accuracyAnalyzer.alwaysHasAdvantage(evaluations, color),
      highBlurRate: blurRates.highBlurRate,
      moderateBlurRate: blurRates.moderateBlurRate,
      highlyConsistentMoveTimes: moveTimes.highlyConsistentMoveTimes,
      moderatelyConsistentMoveTimes: moveTimes.moderatelyConsistentMoveTimes,
      noFastMoves: moveTimes.noFastMoves,
      suspiciousHoldAlert: observation.holdAlert?.suspicious === true,
    };

    return {
      flags,
      evidence: {
        centipawnLosses,
        blurPercent: blurSummary.percent,
        densestBlurChunk: blurSummary.densestChunk,
        moveTimeStreak: moveTimes.highlyConsistentStreak,
      },
    };
  }

  /**
   * Reject malformed observations outright; nothing is truncated or padded
   */
  validate(observation: PlayerObservation): void {
    const { gameId, blurs, moveTimes, speed, turns } = observation;

    if (blurs.length !== moveTimes.length) {
      throw new InvalidObservationError(
        `Blur bitmap has ${blurs.length} entries but there are ${moveTimes.length} move times`,
        { gameId, blurs: blurs.length, moveTimes: moveTimes.length }
      );
    }

    if (!isSpeed(speed)) {
      throw new InvalidObservationError(`Unknown speed tier: ${String(speed)}`, { gameId, speed });
    }

    if (!Number.isInteger(turns) || turns < 0) {
      throw new InvalidObservationError(`Invalid number of turns: ${turns}`, { gameId, turns });
    }

    const badIndex = moveTimes.findIndex((t) => !Number.isFinite(t) || t < 0);
    if (badIndex !== -1) {
      throw new InvalidObservationError(`Invalid move time at index ${badIndex}`, {
        gameId,
        index: badIndex,
        value: moveTimes[badIndex],
      });
    }
  }
}
