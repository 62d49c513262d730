/**
 * Statistics Thresholds
 * Bounds used to read move-time variation as "flat"
 *
 * All move times are in centiseconds.
 */

export const STATISTICS_THRESHOLDS = {
  // ===========================================
  // Coefficient of Variation
  // ===========================================

  /** Fewer samples than this never produce a CV */
  MIN_CV_SAMPLES: 2,

  /** Upper CV bounds, by strictness */
  FLAT_CV: {
    highlyFlat: 0.25,
    /** Tighter: evaluated per window, not over the whole game */
    highlyFlatForStreaks: 0.14,
    moderatelyFlat: 0.4,
  },

  // ===========================================
  // Move Times
  // ===========================================

  /** Added to every move time so bullet games don't look wildly variable */
  MOVE_TIME_OFFSET: 50,

  /** Moves per sliding window when hunting for flat streaks */
  STREAK_WINDOW_SIZE: 14,

  /** A window with this many zero-time moves is premove noise, not a streak */
  MAX_INSTANT_MOVES_PER_WINDOW: 4,

  /** Fast moves tolerated: one per this many moves... */
  FAST_MOVE_TOLERANCE_DIVISOR: 20,

  /** ...plus this many */
  FAST_MOVE_TOLERANCE_BASE: 2,
} as const;

export type FlatTimesStrictness = keyof typeof STATISTICS_THRESHOLDS.FLAT_CV;
