/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 * Logs go to stderr so that CLI output on stdout stays clean.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const destination = NODE_ENV === 'development'
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: 2,
      },
    })
  : pino.destination(2);

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'vconvert',
    env: NODE_ENV,
  },
}, destination);

export type Logger = typeof logger;

// pino children copy the parent's level when created
const children = new Set<Logger>();

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.add(child);
  return child;
}

/**
 * Set the level of the root logger and of every logger from createLogger
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
