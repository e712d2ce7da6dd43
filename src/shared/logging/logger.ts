/**
 * Structured logging for dirlock.
 * Uses pino for JSON output with configurable levels.
 *
 * Usage:
 *   import { createLogger } from './shared/logging/logger.js';
 *   const log = createLogger('lock');
 *   log.debug({ path }, 'lock busy');
 */

import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const rootLogger = pino({
  name: 'dirlock',
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger scoped to a module.
 * @param module - Module name (e.g. 'lock', 'heartbeat', 'cli')
 */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

/** Root logger for top-level use (CLI startup, shutdown). */
export const logger = rootLogger;
