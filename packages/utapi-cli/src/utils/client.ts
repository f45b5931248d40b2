/**
 * Client factory for CLI commands.
 *
 * Config comes from the environment and ./.env (see utapi's config module).
 * Logs go to stderr: stdout carries command output, including --json.
 */

import chalk from 'chalk';
import { STDERR_FD, createLogger, createUtApi, type Logger, type UtApi } from 'utapi';

export interface ClientOverrides {
  /** Path of the dotenv file. Default: .env */
  envPath?: string;
  fetchFn?: typeof fetch;
}

let logger: Logger | undefined;

export function getLogger(): Logger {
  logger ??= createLogger(undefined, STDERR_FD);
  return logger;
}

export function getClient(overrides?: ClientOverrides): UtApi {
  return createUtApi({
    envPath: overrides?.envPath,
    fetchFn: overrides?.fetchFn,
    logger: getLogger(),
  });
}

/** Print an error and exit with status 1 */
export function fail(error: unknown): never {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
}
