/**
 * CORS middleware - Only moderation tools on whitelisted origins may call the API
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { createApiError } from './errorHandler.js';

const corsLogger = logger.child({ middleware: 'cors' });

/**
 * Exact match, any localhost port for a localhost entry, or a subdomain of an https entry
 */
export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (allowed.startsWith('http://localhost')) {
      return origin.startsWith('http://localhost');
    }
    if (origin === allowed) return true;
    return allowed.startsWith('https://') && origin.endsWith(allowed.replace('https://', '.'));
  });
}

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Server-to-server callers send no origin
    if (!origin || isOriginAllowed(origin, config.allowedOrigins)) {
      callback(null, true);
      return;
    }

    corsLogger.warn({ origin }, 'Blocked request from unauthorized origin');
    callback(createApiError('Not allowed by CORS', 403, 'CORS_FORBIDDEN'));
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type'],
  maxAge: 86400, // 24 hours
});
