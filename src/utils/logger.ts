/**
 * Logger factory
 *
 * One pino logger per module, all sharing the level taken from LOG_LEVEL.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const loggers = new Map<string, Logger>();

function isLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

function resolveLevel(): LevelWithSilent {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLevel(level) ? level : 'info';
}

/**
 * Create (or reuse) the logger for a module
 */
export function createLogger(module: string): Logger {
  const existing = loggers.get(module);
  if (existing) return existing;

  const logger = pino({ name: `plan-locator:${module}`, level: resolveLevel() });
  loggers.set(module, logger);
  return logger;
}

/**
 * Change the level of every logger created so far and of those created later
 */
export function setLogLevel(level: LevelWithSilent): void {
  process.env.LOG_LEVEL = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}
