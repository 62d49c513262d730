/**
 * Time-control scaling applied when assessments are aggregated
 */

import type { Speed } from '../types/index.js';

export const TC_FACTORS = {
  ultraBullet: 1.0,
  bullet: 1.25,
  blitz: 1.25,
  rapid: 1.0,
  classical: 0.6,
  correspondence: 1.0,
} as const satisfies Record<Speed, number>;
