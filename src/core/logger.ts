/**
 * Centralized pino logger factory for flagstack.
 *
 * Singleton pattern. Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * flagstack runs inside someone else's CLI, so stdout is never used: all
 * diagnostics go to stderr unless initLogger() is given a destination.
 */

import pino from 'pino';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/** Environment variable holding the fallback log level. */
export const LOG_LEVEL_ENV = 'FLAGSTACK_LOG_LEVEL';

export interface LoggerConfig {
  level: string;
  /** File descriptor or path; defaults to stderr. */
  destination?: number | string;
}

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

/**
 * Initialize the root logger. Call once at startup.
 *
 * @returns The root pino logger instance
 */
export function initLogger(config: LoggerConfig): pino.Logger {
  rootLogger = pino(
    {
      level: config.level,
      formatters,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: config.destination ?? 2, sync: true }),
  );
  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so library code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'loader', 'bind', 'store')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino(
      {
        level: process.env[LOG_LEVEL_ENV] ?? 'warn',
        formatters,
      },
      pino.destination({ dest: 2, sync: true }),
    );
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/**
 * Flush and drop the root logger.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
