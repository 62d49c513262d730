/**
 * Statistics Module
 * Numeric primitives with no knowledge of chess
 */

export {
  average,
  standardDeviation,
  coefficientOfVariation,
  intAvgSd,
  slidingWindows,
  densestBooleanWindow,
  cvIndicatesFlatTimes,
} from './Statistics.js';
export {
  moveTimeCoefVariation,
  slidingMoveTimeCvs,
  noFastMoves,
  roundTenths,
} from './MoveTimeStatistics.js';
export { STATISTICS_THRESHOLDS, type FlatTimesStrictness } from './StatisticsThresholds.js';
