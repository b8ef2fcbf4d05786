import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(value: string | undefined): string {
  const level = value?.toLowerCase();
  return level && LEVELS.includes(level) ? level : 'info';
}

/**
 * Create the root logger. Logs are JSON on stderr: stdout carries tap messages.
 */
export function createLogger(level: string | undefined = process.env.LOG_LEVEL): Logger {
  return pino(
    {
      level: resolveLevel(level),
      base: { service: 'opendata-tap' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** Main logger instance. */
export const logger = createLogger();

/** Create a child logger with additional context. */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
