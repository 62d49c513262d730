/**
 * Environment configuration
 */

const nodeEnv = process.env.NODE_ENV || 'development';
const isProduction = nodeEnv === 'production';
const isTest = nodeEnv === 'test';

export const config = {
  // Server
  nodeEnv,
  port: parseInt(process.env.PORT || '3001', 10),
  isProduction,
  isTest,

  // Logging
  logLevel: process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug'),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),

  // Body parsing (move lists and evaluations of long games)
  maxBodySize: process.env.MAX_BODY_SIZE || '1mb',
} as const;

export type Config = typeof config;

export function validateConfig(): void {
  if (!Number.isInteger(config.port) || config.port <= 0) {
    console.warn(`Warning: PORT is not a valid port number, got ${process.env.PORT}`);
  }

  if (config.isProduction && config.allowedOrigins.some((o) => o.startsWith('http://localhost'))) {
    console.warn('Warning: ALLOWED_ORIGINS includes localhost in production');
  }
}
