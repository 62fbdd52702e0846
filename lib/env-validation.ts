import 'dotenv/config';

import os from 'os';
import path from 'path';

import { z } from 'zod';

import { InvalidInputError } from './errors';
import { log, logLevelSchema } from './observability/logger';

export const APP_DIR_NAME = 'clipstash';
export const DATABASE_FILE_NAME = 'history.db';
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

// Define the schema for environment variables
const envSchema = z.object({
  // Storage location overrides
  CLIPSTASH_DATA_DIR: z.string().min(1, 'CLIPSTASH_DATA_DIR must not be empty').optional(),
  CLIPSTASH_DB_PATH: z.string().min(1, 'CLIPSTASH_DB_PATH must not be empty').optional(),

  // How long a writer waits on another process's lock before failing
  CLIPSTASH_BUSY_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'CLIPSTASH_BUSY_TIMEOUT_MS must be a number')
    .optional(),

  LOG_LEVEL: logLevelSchema.optional(),
});

export interface ClipStashConfig {
  databasePath: string;
  busyTimeoutMs: number;
}

// Validation result type
export interface EnvValidationResult {
  valid: boolean;
  errors?: string[];
  warnings?: string[];
}

/**
 * Validates environment variables and returns validation result
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const warnings: string[] = [];

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
    };
  }

  const config = parsed.data;

  if (config.CLIPSTASH_DB_PATH && config.CLIPSTASH_DATA_DIR) {
    warnings.push('CLIPSTASH_DB_PATH is set, CLIPSTASH_DATA_DIR will be ignored');
  }

  if (config.CLIPSTASH_BUSY_TIMEOUT_MS !== undefined && Number(config.CLIPSTASH_BUSY_TIMEOUT_MS) === 0) {
    warnings.push('CLIPSTASH_BUSY_TIMEOUT_MS is 0, concurrent invocations will fail immediately on a lock');
  }

  return {
    valid: true,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}

/**
 * Per-user application data directory for the current platform
 */
export function resolveDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  if (env.CLIPSTASH_DATA_DIR) {
    return env.CLIPSTASH_DATA_DIR;
  }

  switch (platform) {
    case 'darwin':
      return path.join(homeDir, 'Library', 'Application Support', APP_DIR_NAME);
    case 'win32':
      return path.join(env.APPDATA ?? path.join(homeDir, 'AppData', 'Roaming'), APP_DIR_NAME);
    default:
      return path.join(env.XDG_DATA_HOME ?? path.join(homeDir, '.local', 'share'), APP_DIR_NAME);
  }
}

export function resolveDatabasePath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir()
): string {
  if (env.CLIPSTASH_DB_PATH) {
    return env.CLIPSTASH_DB_PATH;
  }
  return path.join(resolveDataDir(env, platform, homeDir), DATABASE_FILE_NAME);
}

/**
 * Validated runtime configuration
 * Throws InvalidInputError listing every problem when the environment is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClipStashConfig {
  const result = validateEnv(env);
  if (!result.valid) {
    throw new InvalidInputError(`invalid environment (${(result.errors ?? []).join('; ')})`);
  }
  for (const warning of result.warnings ?? []) {
    log.warn(warning);
  }

  const timeout = env.CLIPSTASH_BUSY_TIMEOUT_MS;

  return {
    databasePath: resolveDatabasePath(env),
    busyTimeoutMs: timeout !== undefined ? Number(timeout) : DEFAULT_BUSY_TIMEOUT_MS,
  };
}
