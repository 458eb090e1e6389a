/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'finnhubApiKey',
  'token',
  '*.apiKey',
  '*.token',
  'url',
  'headers.authorization',
  'headers.Authorization',
];

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
