/**
 * Assessment controller - Handles player assessment requests
 */

import { Request, Response } from 'express';
import { observationSchema, validateRequest } from '../../utils/validation.js';
import { AssessmentService, assessmentService as defaultAssessmentService } from '../../services/AssessmentService.js';
import { logger } from '../../utils/logger.js';
import { AssessmentResponse, PlayerAssessment, VERDICT_LABELS } from '../../types/index.js';

const assessmentLogger = logger.child({ controller: 'assessment' });

export function toAssessmentResponse(assessment: PlayerAssessment): AssessmentResponse {
  return {
    ...assessment,
    verdictLabel: VERDICT_LABELS[assessment.verdict],
  };
}

export class AssessmentController {
  constructor(
    private readonly assessmentService: AssessmentService = defaultAssessmentService,
    /** Source of `createdAt`; the service itself never reads the clock */
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Assess one player from a posted observation
   */
  assess(req: Request, res: Response): void {
    const validation = validateRequest(observationSchema, req.body);

    // The error handler turns a ZodError into a VALIDATION_ERROR response
    if (!validation.success) {
      throw validation.errors;
    }

    const observation = validation.data;
    assessmentLogger.debug(
      { gameId: observation.gameId, color: observation.color },
      'Assessing player'
    );

    // InvalidObservationError propagates to the error handler
    const assessment = this.assessmentService.assess(observation, this.clock());

    res.status(201).json(toAssessmentResponse(assessment));
  }
}

export const assessmentController = new AssessmentController();
