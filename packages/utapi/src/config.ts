/**
 * Environment-based configuration for the UploadThing client.
 *
 * Resolution order for every value:
 * 1. Variables already set in the process environment
 * 2. Variables read from the dotenv file (default: ./.env)
 * 3. Built-in defaults (host and version only)
 *
 * Environment variables:
 * - UPLOADTHING_SECRET: API key (required)
 * - UPLOADTHING_API_URL: API host (default: https://api.uploadthing.com)
 * - UPLOADTHING_VERSION: x-uploadthing-version header (default: 7.6.0)
 */

import { config as loadDotenv } from 'dotenv';
import { API_KEY_ENV, DEFAULT_HOST, DEFAULT_VERSION } from './constants.js';
import { ConfigError } from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';

export interface UploadthingConfig {
  /** API host, without trailing slash */
  host: string;
  /** Value of the x-uploadthing-api-key header */
  apiKey: string;
  /** Value of the x-uploadthing-version header */
  version: string;
}

export interface ConfigLoadOptions {
  /** Path of the dotenv file. Default: .env */
  envPath?: string;
  logger?: Logger;
}

function getEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Load variables from a dotenv file into process.env.
 * Returns false when the file could not be read.
 */
export function loadEnvFile(envPath = '.env', logger?: Logger): boolean {
  const result = loadDotenv({ path: envPath });
  if (result.error) {
    (logger ?? getDefaultLogger()).warn(
      { envPath, err: result.error.message },
      'Failed to load environment variables from .env file',
    );
    return false;
  }
  return true;
}

/**
 * Throw a ConfigError naming the first variable that is unset or empty.
 */
export function validateEnvironmentVariables(keys: readonly string[]): void {
  for (const key of keys) {
    if (!process.env[key]) {
      throw new ConfigError(`${key} is not set`);
    }
  }
}

/**
 * Build the client configuration from the environment.
 *
 * A missing or unreadable dotenv file is not fatal: it is logged at warn
 * and the process environment alone is used. Only an unset
 * UPLOADTHING_SECRET throws (ConfigError).
 */
export function getUploadthingConfig(options?: ConfigLoadOptions): UploadthingConfig {
  loadEnvFile(options?.envPath, options?.logger);
  validateEnvironmentVariables([API_KEY_ENV]);

  return {
    host: getEnv('UPLOADTHING_API_URL', DEFAULT_HOST).replace(/\/+$/, ''),
    apiKey: getEnv(API_KEY_ENV, ''),
    version: getEnv('UPLOADTHING_VERSION', DEFAULT_VERSION),
  };
}
