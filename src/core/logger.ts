/**
 * Structured logging with pino. API keys never reach the log.
 */

import { pino, type Logger } from 'pino';

const redactPaths = [
  'apiKey',
  'token',
  'authorization',
  '*.apiKey',
  '*.token',
  'headers.authorization',
  'headers["x-finnhub-token"]',
];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// An unknown LOG_LEVEL falls back to info here; loadConfig reports it
const envLevel = process.env.LOG_LEVEL;

export const logger: Logger = pino({
  name: 'finkpi',
  level: isLogLevel(envLevel) ? envLevel : 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
});

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
