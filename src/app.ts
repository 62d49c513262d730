/**
 * Express application setup
 */

import express from 'express';
import helmet from 'helmet';
import { corsMiddleware } from './api/middleware/cors.middleware.js';
import { createApiError, errorHandler } from './api/middleware/errorHandler.js';
import { createApiRoutes } from './api/routes/index.js';
import { AssessmentController } from './api/controllers/assessment.controller.js';
import { API_VERSION } from './api/routes/health.routes.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  assessmentController?: AssessmentController;
}

export function createApp(options: AppOptions = {}) {
  const app = express();

  // Security headers
  app.use(helmet());

  // CORS
  app.use(corsMiddleware);

  // Body parsing
  app.use(express.json({ limit: config.maxBodySize }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${duration}ms`,
        },
        'Request completed'
      );
    });

    next();
  });

  // API routes
  app.use('/api/v1', createApiRoutes(options.assessmentController));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Fair-play Assessment API',
      version: API_VERSION,
      status: 'running',
    });
  });

  // 404 handler
  app.use((req, _res, next) => {
    next(createApiError(`Not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND'));
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}

export default createApp();
