import type { TransformableInfo } from 'logform';
import type { Logger } from 'winston';
import { createLogger, format, transports } from 'winston';

export const LOG_LEVELS = [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ] as const;

/**
 * Different log levels, from most important to least important.
 */
export type LogLevel = typeof LOG_LEVELS[number];

const loggers = new Map<string, Logger>();

let globalLogLevel: LogLevel = 'info';

/**
 * Changes the level of every logger created so far, and of those that will be created later.
 */
export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}

/**
 * Returns the logger for the given label, creating it on first use.
 * Output goes to stderr so it never mixes with decoded statements on stdout.
 */
export function getLogger(label: string): Logger {
  const existing = loggers.get(label);
  if (existing) {
    return existing;
  }

  const logger = createLogger({
    level: globalLogLevel,
    format: format.combine(
      format.label({ label }),
      format.colorize(),
      format.timestamp(),
      format.metadata({ fillExcept: [ 'level', 'label', 'message' ]}),
      format.printf(
        ({ level: levelInner, message, label: labelInner }: TransformableInfo): string =>
          `[${String(labelInner)}] ${levelInner}: ${String(message)}`,
      ),
    ),
    transports: [ new transports.Console({ stderrLevels: [ ...LOG_LEVELS ]}) ],
  });

  loggers.set(label, logger);

  return logger;
}
