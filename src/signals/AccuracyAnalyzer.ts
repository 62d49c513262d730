/**
 * Accuracy Analyzer
 * Turns the engine's position scores into per-move centipawn losses
 * and reads the two accuracy signals from them
 */

import type { Color, Score, Speed } from '../types/index.js';
import { average } from '../statistics/index.js';
import { SIGNAL_THRESHOLDS } from './SignalThresholds.js';

type Evaluation = Score | null;

export class AccuracyAnalyzer {
  /**
   * Centipawn loss of each of the player's scored moves, in move order.
   * Moves with an unscored position on either side produce no sample.
   */
  centipawnLosses(evaluations: readonly Evaluation[], color: Color): number[] {
    // White moves first: pair the start position with white's first move
    const positions: Evaluation[] =
      color === 'white'
        ? [{ type: 'cp', value: SIGNAL_THRESHOLDS.INITIAL_POSITION_CP }, ...evaluations]
        : [...evaluations];

    const losses: number[] = [];
    for (let i = 0; i + 1 < positions.length; i += 2) {
      const before = positions[i];
      const after = positions[i + 1];
      if (!before || !after) continue;

      const diff = this._scoreDiff(before, after);
      losses.push(Math.max(0, color === 'white' ? -diff : diff));
    }
    return losses;
  }

  /**
   * Average loss under the speed threshold. No scored moves means no signal.
   */
  hasHighAccuracy(losses: readonly number[], speed: Speed): boolean {
    const avgLoss = average(losses);
    if (avgLoss === undefined) return false;
    return avgLoss < SIGNAL_THRESHOLDS.HIGH_ACCURACY_MAX_AVG_LOSS[speed];
  }

  /**
   * True when no scored position was ever clearly bad for the player.
   * A single excursion is enough to break it; no scored positions means no signal.
   */
  alwaysHasAdvantage(evaluations: readonly Evaluation[], color: Color): boolean {
    const scored = evaluations.filter((e): e is Score => e !== null);
    if (scored.length === 0) return false;
    return !scored.some((score) => this._isDisadvantage(score, color));
  }

  /**
   * Evaluation change across a move, white's perspective
   */
  private _scoreDiff(before: Score, after: Score): number {
    return this._toCentipawns(after) - this._toCentipawns(before);
  }

  /**
   * Capped centipawns; a mate counts by its sign only
   */
  private _toCentipawns(score: Score): number {
    const max = SIGNAL_THRESHOLDS.MAX_SCORE_CP;
    if (score.type === 'mate') return Math.sign(score.value) * max;
    return Math.min(max, Math.max(-max, score.value));
  }

  private _isDisadvantage(score: Score, color: Color): boolean {
    const playerValue = color === 'white' ? score.value : -score.value;
    if (score.type === 'mate') return playerValue < 0;
    return playerValue < -SIGNAL_THRESHOLDS.ADVANTAGE_MARGIN_CP;
  }
}
