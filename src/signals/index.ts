/**
 * Signals Module
 * Independent behavioral flags for one player in one game
 */

export { SignalExtractor } from './SignalExtractor.js';
export type { SignalEvidence, SignalResult } from './SignalExtractor.js';
export { AccuracyAnalyzer } from './AccuracyAnalyzer.js';
export { BlurAnalyzer, type BlurRates, type BlurSummary } from './BlurAnalyzer.js';
export { MoveTimeAnalyzer, estimateTotalSeconds, type MoveTimeResult } from './MoveTimeAnalyzer.js';
export { SIGNAL_THRESHOLDS } from './SignalThresholds.js';
