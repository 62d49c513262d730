/**
 * Assessment Service - Orchestrates one player assessment
 * observation → flags → verdict → record
 */

import type { PlayerAssessment, PlayerObservation } from '../types/index.js';
import { VERDICT_LABELS } from '../types/index.js';
import { SignalExtractor } from '../signals/index.js';
import { ClassificationEngine } from '../classification/index.js';
import { AssessmentAssembler } from '../assessment/index.js';
import { createChildLogger } from '../utils/logger.js';

const assessmentLogger = createChildLogger('assessment');

export class AssessmentService {
  private readonly signalExtractor = new SignalExtractor();
  private readonly classificationEngine = new ClassificationEngine();
  private readonly assembler = new AssessmentAssembler();

  /**
   * Assess one player's side of a finished game.
   * Same observation and `now` always give an equal record.
   *
   * @throws InvalidObservationError on malformed input
   */
  assess(observation: PlayerObservation, now: Date): PlayerAssessment {
    const signals = this.signalExtractor.extract(observation);

    const classification = this.classificationEngine.classify({
      flags: signals.flags,
      color: observation.color,
      winner: observation.winner,
    });

    assessmentLogger.debug(
      { gameId: observation.gameId, color: observation.color, flags: signals.flags },
      'Signals extracted'
    );

    const assessment = this.assembler.assemble({
      observation,
      signals,
      verdict: classification.verdict,
      createdAt: now,
    });

    assessmentLogger.info(
      {
        id: assessment.id,
        userId: assessment.userId,
        rule: classification.rule.id,
        tableVerdict: VERDICT_LABELS[classification.tableVerdict],
        verdict: VERDICT_LABELS[assessment.verdict],
        downgraded: classification.downgraded,
      },
      'Player assessed'
    );

    return assessment;
  }
}

export const assessmentService = new AssessmentService();
