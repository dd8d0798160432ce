/**
 * Structured logging
 */

import pino, { type Logger } from 'pino';

const rootLogger = pino({
  name: 'risk-engine',
  level: process.env.LOG_LEVEL || 'info',
});

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
