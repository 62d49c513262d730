/**
 * Type definitions for player assessment
 */

export type Color = 'white' | 'black';

export const COLORS = ['white', 'black'] as const;

/**
 * Time control classification, fastest first
 */
export const SPEEDS = [
  'ultraBullet',
  'bullet',
  'blitz',
  'rapid',
  'classical',
  'correspondence',
] as const;

export type Speed = (typeof SPEEDS)[number];

/**
 * Evaluation score - either centipawns or mate in N
 * Always from WHITE's perspective, as the engine reports it
 */
export type Score =
  | { type: 'cp'; value: number }
  | { type: 'mate'; value: number };

export interface ClockConfig {
  initialSeconds: number;
  incrementSeconds: number;
}

export interface HoldAlert {
  suspicious: boolean;
}

/**
 * Everything known about one player's side of a finished game
 */
export interface PlayerObservation {
  readonly gameId: string;
  readonly userId: string;
  readonly color: Color;
  readonly speed: Speed;
  /** Absent for untimed games */
  readonly clock?: ClockConfig;
  /** Plies played in the whole game */
  readonly turns: number;
  readonly isSimul: boolean;
  /** Absent for draws */
  readonly winner?: Color;
  /** This player's move durations in centiseconds, ordered by ply */
  readonly moveTimes: readonly number[];
  /** One entry per own move: did the window lose focus during it */
  readonly blurs: readonly boolean[];
  /** Engine score after each ply; null where the ply was not analysed */
  readonly evaluations: readonly (Score | null)[];
  readonly holdAlert: HoldAlert | null;
}

/**
 * The eight independent signals fed to the decision table
 */
export interface PlayerFlags {
  readonly highAccuracy: boolean;
  readonly advantageAlwaysHeld: boolean;
  readonly highBlurRate: boolean;
  readonly moderateBlurRate: boolean;
  readonly highlyConsistentMoveTimes: boolean;
  readonly moderatelyConsistentMoveTimes: boolean;
  readonly noFastMoves: boolean;
  readonly suspiciousHoldAlert: boolean;
}

export const FLAG_NAMES = [
  'highAccuracy',
  'advantageAlwaysHeld',
  'highBlurRate',
  'moderateBlurRate',
  'highlyConsistentMoveTimes',
  'moderatelyConsistentMoveTimes',
  'noFastMoves',
  'suspiciousHoldAlert',
] as const satisfies readonly (keyof PlayerFlags)[];

/**
 * Cheating likelihood, ordered from least to most severe
 */
export enum Verdict {
  NotCheating = 1,
  UnlikelyCheating = 2,
  Unclear = 3,
  LikelyCheating = 4,
  Cheating = 5,
}

export const VERDICT_LABELS: Record<Verdict, string> = {
  [Verdict.NotCheating]: 'Not cheating',
  [Verdict.UnlikelyCheating]: 'Unlikely cheating',
  [Verdict.Unclear]: 'Unclear',
  [Verdict.LikelyCheating]: 'Likely cheating',
  [Verdict.Cheating]: 'Cheating',
};

/**
 * Integer average and standard deviation
 */
export interface IntAvgSd {
  readonly avg: number;
  readonly sd: number;
}

/**
 * Summary available without computer analysis
 */
export interface AssessmentBasics {
  readonly moveTimes: IntAvgSd;
  readonly hold: boolean;
  /** Own-move blur percentage */
  readonly blurs: number;
  /** Densest 12-move blur chunk, only when positive */
  readonly blurStreak?: number;
  /** Present only when a flat move-time streak was found */
  readonly mtStreak?: true;
}

/**
 * Evidence record for one player in one game
 */
export interface PlayerAssessment {
  /** `${gameId}/${color}` */
  readonly id: string;
  readonly gameId: string;
  readonly userId: string;
  readonly color: Color;
  readonly verdict: Verdict;
  /** ISO 8601 timestamp */
  readonly createdAt: string;
  readonly basics: AssessmentBasics;
  readonly analysis: IntAvgSd;
  readonly flags: PlayerFlags;
  readonly tcFactor: number;
}

// ═══════════════════════════════════════════════════════════════════════
// API Types
// ═══════════════════════════════════════════════════════════════════════

/**
 * Assessment as returned over HTTP
 */
export interface AssessmentResponse extends PlayerAssessment {
  verdictLabel: string;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  uptime: number;
  version: string;
}
