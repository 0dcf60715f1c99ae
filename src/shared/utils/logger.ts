/**
 * Structured JSON logger for the cloud-sweep CLI.
 *
 * Uses Pino for JSON logging. Logs are written to stderr so that stdout only
 * ever carries formatted records and can be piped into jq, csvkit and friends.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error', 'silent']);

const loggers = new Set<pino.Logger>();

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not recognised.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'cloud-sweep', level?: string): pino.Logger {
  const requested = level?.toLowerCase() || process.env.LOG_LEVEL?.toLowerCase() || 'info';
  const logLevel: LogLevel = isLogLevel(requested) ? requested : 'info';

  const logger = pino(
    {
      name,
      level: logLevel,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    process.stderr
  );
  loggers.add(logger);
  return logger;
}

/**
 * Changes the level of every logger created so far.
 *
 * Module loggers are created at import time, before the CLI has read its
 * configuration, so a configured `log_level` is applied after the fact.
 *
 * @returns false when the level is not recognised (loggers are left untouched)
 */
export function setLogLevel(level: string): boolean {
  const normalized = level.toLowerCase();
  if (!isLogLevel(normalized)) {
    return false;
  }
  for (const logger of loggers) {
    logger.level = normalized;
  }
  return true;
}
