import { describe, it, expect } from 'vitest';
import type { PlayerObservation } from '../../types/index.js';
import { MoveTimeAnalyzer, estimateTotalSeconds } from '../MoveTimeAnalyzer.js';
import { makeObservation, repeat } from '../../__tests__/fixtures.js';

const analyzer = new MoveTimeAnalyzer();

function withTimes(moveTimes: number[], overrides: Partial<PlayerObservation> = {}) {
  return makeObservation({ moveTimes, blurs: repeat(false, moveTimes.length), ...overrides });
}

describe('MoveTimeAnalyzer', () => {
  it('estimates the clock from the initial time and 40 increments', () => {
    expect(estimateTotalSeconds({ initialSeconds: 180, incrementSeconds: 2 })).toBe(260);
    expect(estimateTotalSeconds({ initialSeconds: 0, incrementSeconds: 2 })).toBe(80);
  });

  describe('duration gate', () => {
    it('requires more than 60 estimated seconds', () => {
      expect(analyzer.isLongEnough({ initialSeconds: 60, incrementSeconds: 0 })).toBe(false);
      expect(analyzer.isLongEnough({ initialSeconds: 61, incrementSeconds: 0 })).toBe(true);
      expect(analyzer.isLongEnough(undefined)).toBe(false);
    });

    it('suppresses consistency flags in short games, however flat', () => {
      const result = analyzer.analyze(
        withTimes(repeat(200, 30), { clock: { initialSeconds: 40, incrementSeconds: 0 } })
      );
      expect(result.highlyConsistentMoveTimes).toBe(false);
      expect(result.moderatelyConsistentMoveTimes).toBe(false);
      expect(result.highlyConsistentStreak).toBe(false);
    });
  });

  it('flags perfectly even move times', () => {
    expect(analyzer.analyze(withTimes(repeat(100, 30)))).toEqual({
      highlyConsistentMoveTimes: true,
      moderatelyConsistentMoveTimes: true,
      highlyConsistentStreak: true,
      noFastMoves: true,
    });
  });

  it('catches a flat streak inside an otherwise erratic game', () => {
    const erratic = [100, 3000, 100, 3000, 100, 3000, 100, 3000, 100, 3000];
    const result = analyzer.analyze(withTimes([0, ...erratic, ...repeat(300, 14)]));
    expect(result.highlyConsistentStreak).toBe(true);
    expect(result.highlyConsistentMoveTimes).toBe(true);
    expect(result.moderatelyConsistentMoveTimes).toBe(false);
  });

  it('does not flag natural variation', () => {
    const times = [0, 100, 900, 250, 1800, 400, 60, 1200, 300, 2500, 150, 700, 90, 3300, 500, 1100];
    const result = analyzer.analyze(withTimes(times));
    expect(result.highlyConsistentMoveTimes).toBe(false);
    expect(result.moderatelyConsistentMoveTimes).toBe(false);
  });

  it('has no consistency signal for zero or one move', () => {
    for (const times of [[], [250]]) {
      const result = analyzer.analyze(withTimes(times));
      expect(result.highlyConsistentMoveTimes).toBe(false);
      expect(result.moderatelyConsistentMoveTimes).toBe(false);
    }
  });

  it('reports no fast-move signal for an untimed game without move times', () => {
    const result = analyzer.analyze(
      withTimes([], { speed: 'correspondence', clock: undefined })
    );
    expect(result.noFastMoves).toBe(false);
  });

  it('reports reflex moves whatever the clock', () => {
    const short = { clock: { initialSeconds: 15, incrementSeconds: 0 } };
    expect(analyzer.analyze(withTimes(repeat(10, 20), short)).noFastMoves).toBe(false);
    expect(analyzer.analyze(withTimes(repeat(80, 20), short)).noFastMoves).toBe(true);
  });
});
