/**
 * Blur Analyzer
 * Window focus loss during the player's own moves
 */

import type { PlayerObservation } from '../types/index.js';
import { densestBooleanWindow } from '../statistics/index.js';
import { SIGNAL_THRESHOLDS } from './SignalThresholds.js';

export interface BlurRates {
  highBlurRate: boolean;
  moderateBlurRate: boolean;
}

export interface BlurSummary {
  /** Own-move blur percentage, truncated */
  percent: number;
  /** Most blurs in any 12-move chunk */
  densestChunk: number;
}

export class BlurAnalyzer {
  rates(observation: PlayerObservation): BlurRates {
    // Simul players switch boards all the time; their blurs mean nothing
    if (observation.isSimul) {
      return { highBlurRate: false, moderateBlurRate: false };
    }

    const { percent, densestChunk } = this.summarize(observation);
    return {
      highBlurRate:
        percent > SIGNAL_THRESHOLDS.HIGH_BLUR_PERCENT ||
        densestChunk >= SIGNAL_THRESHOLDS.HIGH_CHUNK_BLURS,
      moderateBlurRate:
        percent > SIGNAL_THRESHOLDS.MODERATE_BLUR_PERCENT ||
        densestChunk >= SIGNAL_THRESHOLDS.MODERATE_CHUNK_BLURS,
    };
  }

  /**
   * Figures reported in the record, simul or not
   */
  summarize(observation: PlayerObservation): BlurSummary {
    return {
      percent: this.blurPercent(observation),
      densestChunk: densestBooleanWindow(observation.blurs, SIGNAL_THRESHOLDS.BLUR_CHUNK_SIZE),
    };
  }

  blurPercent(observation: PlayerObservation): number {
    const ownMoves = observation.blurs.length;
    if (observation.turns <= SIGNAL_THRESHOLDS.MIN_TURNS_FOR_BLUR_RATE || ownMoves === 0) {
      return 0;
    }
    const blurs = observation.blurs.filter(Boolean).length;
    return Math.floor((blurs * 100) / ownMoves);
  }
}
