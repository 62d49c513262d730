/**
 * End-to-end assessment of full observations
 */

import { describe, it, expect } from 'vitest';
import { AssessmentService } from '../AssessmentService.js';
import { InvalidObservationError } from '../../utils/errors.js';
import { Verdict, type PlayerObservation } from '../../types/index.js';
import { cp, makeObservation, repeat, whiteTrace } from '../../__tests__/fixtures.js';

const service = new AssessmentService();
const now = new Date('2024-05-10T08:30:00.000Z');

/**
 * Bullet game: accurate (18cp average loss), 95% blurs, no reflex moves,
 * clock too short for timing signals, never comfortably ahead
 */
function scenarioA(overrides: Partial<PlayerObservation> = {}): PlayerObservation {
  return makeObservation({
    gameId: 'scenarioA',
    speed: 'bullet',
    clock: { initialSeconds: 60, incrementSeconds: 0 },
    turns: 40,
    winner: 'black',
    moveTimes: Array.from({ length: 20 }, (_, i) => (i % 2 === 0 ? 80 : 250)),
    blurs: [false, ...repeat(true, 19)],
    evaluations: whiteTrace(repeat(18, 20), -150),
    ...overrides,
  });
}

describe('AssessmentService', () => {
  it('convicts a losing player on accuracy, blurs and no fast moves', () => {
    const assessment = service.assess(scenarioA(), now);

    expect(assessment.flags).toEqual({
      highAccuracy: true,
      advantageAlwaysHeld: false,
      highBlurRate: true,
      moderateBlurRate: true,
      highlyConsistentMoveTimes: false,
      moderatelyConsistentMoveTimes: false,
      noFastMoves: true,
      suspiciousHoldAlert: false,
    });
    expect(assessment.verdict).toBe(Verdict.Cheating);
    expect(assessment).toMatchObject({
      id: 'scenarioA/white',
      createdAt: '2024-05-10T08:30:00.000Z',
      basics: { moveTimes: { avg: 16, sd: 8 }, hold: false, blurs: 95, blurStreak: 12 },
      analysis: { avg: 18, sd: 0 },
      tcFactor: 1.25,
    });
    expect('mtStreak' in assessment.basics).toBe(false);
  });

  it('downgrades the same player by one step when they won', () => {
    expect(service.assess(scenarioA({ winner: 'white' }), now).verdict).toBe(Verdict.LikelyCheating);
  });

  it('does not soften a winner with a suspicious hold', () => {
    const assessment = service.assess(
      scenarioA({
        winner: 'white',
        blurs: repeat(false, 20),
        moveTimes: repeat(10, 20),
        holdAlert: { suspicious: true },
      }),
      now
    );

    expect(assessment.flags).toMatchObject({
      highAccuracy: true,
      highBlurRate: false,
      moderateBlurRate: false,
      noFastMoves: false,
      suspiciousHoldAlert: true,
    });
    expect(assessment.verdict).toBe(Verdict.LikelyCheating);
    expect(assessment.basics.hold).toBe(true);
  });

  it('clears an inaccurate player whatever the blurs', () => {
    const assessment = service.assess(
      scenarioA({ evaluations: whiteTrace(repeat(60, 20), -150) }),
      now
    );
    expect(assessment.flags.highAccuracy).toBe(false);
    expect(assessment.flags.highBlurRate).toBe(true);
    expect(assessment.verdict).toBe(Verdict.NotCheating);
  });

  it('ignores flat move times in a game under a minute', () => {
    const assessment = service.assess(
      makeObservation({
        clock: { initialSeconds: 40, incrementSeconds: 0 },
        moveTimes: repeat(200, 30),
        blurs: repeat(false, 30),
      }),
      now
    );
    expect(assessment.flags.highlyConsistentMoveTimes).toBe(false);
    expect(assessment.flags.moderatelyConsistentMoveTimes).toBe(false);
    expect('mtStreak' in assessment.basics).toBe(false);
  });

  it('flags flat move times in a longer game and marks the streak', () => {
    const assessment = service.assess(
      makeObservation({ moveTimes: repeat(200, 30), blurs: repeat(false, 30), winner: 'black' }),
      now
    );
    expect(assessment.flags.highlyConsistentMoveTimes).toBe(true);
    expect(assessment.basics.mtStreak).toBe(true);
    expect(assessment.verdict).toBe(Verdict.LikelyCheating);
  });

  it('reads no fast-move signal from an untimed game without move times', () => {
    const assessment = service.assess(
      makeObservation({
        speed: 'correspondence',
        clock: undefined,
        moveTimes: [],
        blurs: [],
        evaluations: repeat(cp(0), 40),
      }),
      now
    );
    expect(assessment.flags).toMatchObject({
      highAccuracy: true,
      advantageAlwaysHeld: true,
      noFastMoves: false,
    });
    expect(assessment.verdict).toBe(Verdict.UnlikelyCheating);
  });

  it('treats a draw like a loss', () => {
    expect(service.assess(scenarioA({ winner: undefined }), now).verdict).toBe(Verdict.Cheating);
  });

  it('is deterministic', () => {
    const observation = scenarioA();
    expect(service.assess(observation, now)).toEqual(service.assess(observation, now));
  });

  it('rejects malformed observations', () => {
    expect(() => service.assess(scenarioA({ blurs: repeat(true, 19) }), now)).toThrow(
      InvalidObservationError
    );
  });
});
