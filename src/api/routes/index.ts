/**
 * API routes index
 */

import { Router } from 'express';
import healthRoutes from './health.routes.js';
import { createAssessmentRoutes } from './assessment.routes.js';
import type { AssessmentController } from '../controllers/assessment.controller.js';

export function createApiRoutes(assessmentController?: AssessmentController) {
  const router = Router();

  // Mount routes
  router.use('/health', healthRoutes);
  router.use('/assessments', createAssessmentRoutes(assessmentController));

  return router;
}
