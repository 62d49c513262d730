/**
 * Signal Thresholds
 * Speed-dependent limits for each behavioral signal
 *
 * Centipawn values are from the mover's perspective (100cp = 1 pawn).
 * Move times are in centiseconds.
 */

import type { Speed } from '../types/index.js';

export const SIGNAL_THRESHOLDS = {
  // ===========================================
  // Accuracy
  // ===========================================

  /** Average centipawn loss below this is abnormally accurate */
  HIGH_ACCURACY_MAX_AVG_LOSS: {
    ultraBullet: 25,
    bullet: 25,
    blitz: 20,
    rapid: 15,
    classical: 15,
    correspondence: 15,
  } satisfies Record<Speed, number>,

  /** Evaluation of the starting position */
  INITIAL_POSITION_CP: 15,

  /** Scores are capped here; mates count as this, by sign */
  MAX_SCORE_CP: 1000,

  /** Falling further than this below equal breaks "always has advantage" */
  ADVANTAGE_MARGIN_CP: 100,

  // ===========================================
  // Blurs
  // ===========================================

  /** Blur percent is 0 until the game has more plies than this */
  MIN_TURNS_FOR_BLUR_RATE: 5,

  HIGH_BLUR_PERCENT: 90,
  MODERATE_BLUR_PERCENT: 70,

  BLUR_CHUNK_SIZE: 12,
  HIGH_CHUNK_BLURS: 11,
  MODERATE_CHUNK_BLURS: 8,

  // ===========================================
  // Move Times
  // ===========================================

  /** Estimated game duration must exceed this for timing signals */
  MIN_ESTIMATED_CLOCK_SECONDS: 60,

  /** Moves assumed when estimating total clock time from the increment */
  ESTIMATED_MOVES_PER_GAME: 40,

  /** A move quicker than this is a reflex move */
  REFLEX_MOVE_CENTIS: {
    ultraBullet: 50,
    bullet: 50,
    blitz: 50,
    rapid: 50,
    classical: 50,
    correspondence: 50,
  } satisfies Record<Speed, number>,
} as const;
