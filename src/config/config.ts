import fs from 'fs';
import path from 'path';
import envPaths from 'env-paths';
import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import { isLogLevel, type LogLevel, type Logger } from '../lib/logger';
import {
  DEFAULT_NEW_BRANCH,
  DEFAULT_SOURCE_BRANCH,
  LOG_LEVEL_ENV_VAR,
  TOKEN_ENV_VARS
} from './constants';

const ConfigSchema = z.object({
  token: z.string().optional(),
  sourceBranch: z.string().min(1).optional(),
  newBranch: z.string().min(1).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional()
});

export type ConfigShape = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

/**
 * Settings every command runs with, after env, config file and defaults
 * have been merged
 */
export interface Settings {
  sourceBranch: string;
  newBranch: string;
  logLevel: LogLevel;
}

const paths = envPaths('gh-graft', { suffix: '' });
const configFile = path.join(paths.config, 'config.json');

/**
 * Gets the absolute path to the configuration file
 *
 * @returns Absolute path to config.json in the user's config directory
 */
export function getConfigPath(): string {
  return configFile;
}

/**
 * Reads the configuration file from disk
 *
 * Returns an empty object if the file doesn't exist, isn't JSON, or doesn't
 * match the expected shape. The failure is logged at debug level when a
 * logger is given.
 *
 * @param file - Path to read, defaults to {@link getConfigPath}
 * @param logger - Optional logger for read/parse failures
 * @example
 * ```typescript
 * const config = readConfig();
 * if (config.sourceBranch) {
 *   console.log(`Replacing ${config.sourceBranch}`);
 * }
 * ```
 */
export function readConfig(file: string = configFile, logger?: Logger): ConfigShape {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    logger?.debug('Failed to read config file', { file, error });
    return {};
  }
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger?.debug('Ignoring invalid config file', { file, issues: parsed.error.issues });
    return {};
  }
  return parsed.data;
}

/**
 * Retrieves the GitHub token from environment variables
 *
 * Checks GH_ACCESS_TOKEN, GITHUB_TOKEN and GH_TOKEN in that order.
 */
export function getTokenFromEnv(env: Env = process.env): string | undefined {
  for (const name of TOKEN_ENV_VARS) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

/**
 * Resolves the access token from the environment, falling back to the
 * config file.
 *
 * @throws {ConfigError} If no token is available
 */
export function getAuthToken(env: Env, config: ConfigShape): string {
  const token = getTokenFromEnv(env) || config.token;
  if (!token) {
    throw new ConfigError(
      'Token missing. Please put your API token in the GH_ACCESS_TOKEN environment variable'
    );
  }
  return token;
}

/**
 * Merges environment, config file and built-in defaults
 */
export function resolveSettings(env: Env, config: ConfigShape): Settings {
  const envLevel = env[LOG_LEVEL_ENV_VAR]?.toLowerCase();
  return {
    sourceBranch: config.sourceBranch ?? DEFAULT_SOURCE_BRANCH,
    newBranch: config.newBranch ?? DEFAULT_NEW_BRANCH,
    logLevel: envLevel && isLogLevel(envLevel) ? envLevel : config.logLevel ?? 'info'
  };
}
