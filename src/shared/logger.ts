/**
 * Logging
 *
 * One pino logger per module, all writing to stderr so that stdout carries
 * nothing but extracted matches.
 */

import pino, { type Logger } from 'pino';

export type { Logger };

const destination = pino.destination({ dest: 2, sync: true });
const loggers = new Map<string, Logger>();

let currentLevel = process.env['LOG_LEVEL'] || 'warn';

/**
 * Get or create the logger for a module.
 */
export function createLogger(module: string): Logger {
  const existing = loggers.get(module);
  if (existing) return existing;

  const logger = pino({ name: `sift:${module}`, level: currentLevel }, destination);
  loggers.set(module, logger);
  return logger;
}

/**
 * Change the level of every logger, including ones created later.
 */
export function setLogLevel(level: string): void {
  currentLevel = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}

export function getLogLevel(): string {
  return currentLevel;
}
