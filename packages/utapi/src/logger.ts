import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { ConfigError } from './errors.js';

export const LOG_LEVEL_ENV = 'UTAPI_LOG_LEVEL';

/** File descriptor for stderr, for callers whose stdout carries data */
export const STDERR_FD = 2;

function getEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function resolveLevel(level?: string): string {
  const value = level ?? getEnv(LOG_LEVEL_ENV, 'warn');
  if (value !== 'silent' && !Object.hasOwn(pino.levels.values, value)) {
    const known = [...Object.keys(pino.levels.values), 'silent'].join(', ');
    throw new ConfigError(`${LOG_LEVEL_ENV} must be one of: ${known} (got "${value}")`);
  }
  return value;
}

/**
 * Create a root logger named utapi.
 *
 * Level comes from UTAPI_LOG_LEVEL (default: warn) unless given.
 * Output goes to stdout unless a destination stream or file descriptor
 * is given; a descriptor is written synchronously so lines survive
 * process.exit.
 */
export function createLogger(level?: string, destination?: DestinationStream | number): Logger {
  const options = { name: 'utapi', level: resolveLevel(level) };
  if (destination === undefined) {
    return pino(options);
  }
  const stream =
    typeof destination === 'number'
      ? pino.destination({ dest: destination, sync: true })
      : destination;
  return pino(options, stream);
}

let defaultLogger: Logger | undefined;

/** Shared root logger for callers that pass none; created on first use */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

export type { DestinationStream, Logger };
