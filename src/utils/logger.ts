/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';
import { loadEnvConfig } from '@/core/env';

const redactPaths = [
  'apiKey',
  'api_key',
  'polygonApiKey',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.Authorization',
];

const env = loadEnvConfig();
const nodeEnv = env.nodeEnv;

export const logger = pino({
  level: process.env.LOG_LEVEL ? env.logLevel : nodeEnv === 'test' ? 'silent' : 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
