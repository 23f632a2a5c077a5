/**
 * Structured Logger Utility
 * Uses Pino for the command-line tools
 */

import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create logger instance; pretty output on a terminal, JSON lines otherwise
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // JSON lines in production and tests
  ...(process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      }),
});

export type CliLogger = Logger;

/**
 * Create child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): CliLogger {
  return logger.child(context);
}
