/**
 * Generic numeric summaries
 * Empty samples yield undefined: callers treat that as "no signal", never as zero
 */

import type { IntAvgSd } from '../types/index.js';
import { STATISTICS_THRESHOLDS, type FlatTimesStrictness } from './StatisticsThresholds.js';

export function average(xs: readonly number[]): number | undefined {
  if (xs.length === 0) return undefined;
  let sum = 0;
  for (const x of xs) sum += x;
  return sum / xs.length;
}

/**
 * Population standard deviation
 */
export function standardDeviation(xs: readonly number[]): number | undefined {
  const mean = average(xs);
  if (mean === undefined) return undefined;
  let sumSquares = 0;
  for (const x of xs) sumSquares += (x - mean) ** 2;
  return Math.sqrt(sumSquares / xs.length);
}

/**
 * Standard deviation over mean. Undefined for tiny samples or a zero mean.
 */
export function coefficientOfVariation(xs: readonly number[]): number | undefined {
  if (xs.length < STATISTICS_THRESHOLDS.MIN_CV_SAMPLES) return undefined;
  const mean = average(xs);
  const sd = standardDeviation(xs);
  if (mean === undefined || sd === undefined || mean === 0) return undefined;
  return sd / mean;
}

/**
 * Truncated integer average and deviation, { 0, 0 } for an empty sample
 */
export function intAvgSd(xs: readonly number[]): IntAvgSd {
  return {
    avg: Math.trunc(average(xs) ?? 0),
    sd: Math.trunc(standardDeviation(xs) ?? 0),
  };
}

/**
 * Every contiguous run of `windowSize` elements, in order.
 * Yields nothing when the input is shorter than the window.
 */
export function* slidingWindows<T>(
  xs: readonly T[],
  windowSize: number
): Generator<T[], void, undefined> {
  if (windowSize < 1) return;
  for (let start = 0; start + windowSize <= xs.length; start++) {
    yield xs.slice(start, start + windowSize);
  }
}

/**
 * Highest count of `true` in any window; 0 when no window fits
 */
export function densestBooleanWindow(bits: readonly boolean[], windowSize: number): number {
  let densest = 0;
  for (const window of slidingWindows(bits, windowSize)) {
    const count = window.filter(Boolean).length;
    if (count > densest) densest = count;
  }
  return densest;
}

export function cvIndicatesFlatTimes(cv: number, strictness: FlatTimesStrictness): boolean {
  return cv < STATISTICS_THRESHOLDS.FLAT_CV[strictness];
}
