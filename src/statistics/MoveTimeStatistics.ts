/**
 * Move-time specific statistics (centiseconds)
 */

import { STATISTICS_THRESHOLDS } from './StatisticsThresholds.js';
import { coefficientOfVariation, slidingWindows } from './Statistics.js';

const INSTANTANEOUS = 0;

function offsetCoefVariation(times: readonly number[]): number | undefined {
  return coefficientOfVariation(times.map((t) => t + STATISTICS_THRESHOLDS.MOVE_TIME_OFFSET));
}

/**
 * CV over the whole game. The first move is dropped: it is always instantaneous.
 */
export function moveTimeCoefVariation(times: readonly number[]): number | undefined {
  return offsetCoefVariation(times.slice(1));
}

/**
 * CV of each 14-move window, trimmed of its fastest and slowest move.
 * Windows dominated by premoves are skipped.
 */
export function slidingMoveTimeCvs(times: readonly number[]): number[] {
  const cvs: number[] = [];

  for (const window of slidingWindows(times, STATISTICS_THRESHOLDS.STREAK_WINDOW_SIZE)) {
    const trimmed = [...window].sort((a, b) => a - b).slice(1, -1);
    const instantMoves = trimmed.filter((t) => t === INSTANTANEOUS).length;
    if (instantMoves >= STATISTICS_THRESHOLDS.MAX_INSTANT_MOVES_PER_WINDOW) continue;

    const cv = offsetCoefVariation(trimmed);
    if (cv !== undefined) cvs.push(cv);
  }

  return cvs;
}

/**
 * True when reflex-speed moves are rare enough to count as absent.
 * No moves means no signal.
 */
export function noFastMoves(times: readonly number[], reflexCentis: number): boolean {
  if (times.length === 0) return false;
  const fastMoves = times.filter((t) => t < reflexCentis).length;
  const tolerance =
    Math.floor(times.length / STATISTICS_THRESHOLDS.FAST_MOVE_TOLERANCE_DIVISOR) +
    STATISTICS_THRESHOLDS.FAST_MOVE_TOLERANCE_BASE;
  return fastMoves <= tolerance;
}

/**
 * Centiseconds to whole tenths of a second
 */
export function roundTenths(centis: number): number {
  return centis > 0 ? Math.trunc((centis + 5) / 10) : 0;
}
