/**
 * Shared observation builders for tests
 */

import type { PlayerObservation, Score } from '../types/index.js';

export function cp(value: number): Score {
  return { type: 'cp', value };
}

export function mate(value: number): Score {
  return { type: 'mate', value };
}

export function makeObservation(overrides: Partial<PlayerObservation> = {}): PlayerObservation {
  return {
    gameId: 'game0001',
    userId: 'test-player',
    color: 'white',
    speed: 'blitz',
    clock: { initialSeconds: 180, incrementSeconds: 2 },
    turns: 40,
    isSimul: false,
    winner: undefined,
    moveTimes: [],
    blurs: [],
    evaluations: [],
    holdAlert: null,
    ...overrides,
  };
}

/**
 * Engine trace in which white loses exactly `losses[i]` on its i-th move.
 * Positions reached by black's moves sit at `level`.
 */
export function whiteTrace(losses: readonly number[], level: number): Score[] {
  const evaluations: Score[] = [];
  losses.forEach((loss, i) => {
    if (i === 0) {
      evaluations.push(cp(15 - loss));
      return;
    }
    evaluations.push(cp(level), cp(level - loss));
  });
  return evaluations;
}

export function repeat<T>(value: T, times: number): T[] {
  return Array.from({ length: times }, () => value);
}
