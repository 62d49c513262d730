/**
 * Player assessment routes
 */

import { Router } from 'express';
import { AssessmentController, assessmentController } from '../controllers/assessment.controller.js';

export function createAssessmentRoutes(controller: AssessmentController = assessmentController) {
  const router = Router();

  /**
   * POST /api/v1/assessments
   * Assess one player's side of a finished game
   */
  router.post('/', (req, res, next) => {
    try {
      controller.assess(req, res);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
