/**
 * Health check routes
 */

import { Router, Request, Response } from 'express';
import { HealthResponse } from '../../types/index.js';

export const API_VERSION = '1.0.0';

const router = Router();
const startTime = Date.now();

router.get('/', (_req: Request, res: Response) => {
  const response: HealthResponse = {
    status: 'healthy',
    uptime: Math.floor((Date.now() - startTime) / 1000),
    version: API_VERSION,
  };

  res.status(200).json(response);
});

export default router;
