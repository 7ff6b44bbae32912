/**
 * Environment variable configuration loading for the Backblaze B2 storage driver
 * @module backblaze-b2/config/env
 */

import { ConfigError } from '../errors/index.js';
import type { B2Config, NormalizedB2Config } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names for B2 configuration.
 */
export const ENV_VARS = {
  APPLICATION_KEY_ID: 'B2_APPLICATION_KEY_ID',
  APPLICATION_KEY: 'B2_APPLICATION_KEY',
  AUTH_HOST: 'B2_AUTH_HOST',
  API_VERSION: 'B2_API_VERSION',
  TIMEOUT_MS: 'B2_TIMEOUT_MS',
  DOWNLOAD_CHUNK_SIZE: 'B2_DOWNLOAD_CHUNK_SIZE',
} as const;

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { variable: name },
    });
  }

  return parsed;
}

/**
 * Creates B2 configuration from environment variables.
 *
 * Environment variables:
 * - B2_APPLICATION_KEY_ID (required)
 * - B2_APPLICATION_KEY (required)
 * - B2_AUTH_HOST (optional): host serving b2_authorize_account
 * - B2_API_VERSION (optional): e.g. v1
 * - B2_TIMEOUT_MS (optional): request timeout in milliseconds
 * - B2_DOWNLOAD_CHUNK_SIZE (optional): streamed download chunk size in bytes
 *
 * @param env - Variables to read, `process.env` by default
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedB2Config {
  const config: Partial<B2Config> = {
    applicationKeyId: optionalEnv(env, ENV_VARS.APPLICATION_KEY_ID),
    applicationKey: optionalEnv(env, ENV_VARS.APPLICATION_KEY),
    authHost: optionalEnv(env, ENV_VARS.AUTH_HOST),
    apiVersion: optionalEnv(env, ENV_VARS.API_VERSION),
    timeout: parseIntEnv(optionalEnv(env, ENV_VARS.TIMEOUT_MS), ENV_VARS.TIMEOUT_MS),
    downloadChunkSize: parseIntEnv(
      optionalEnv(env, ENV_VARS.DOWNLOAD_CHUNK_SIZE),
      ENV_VARS.DOWNLOAD_CHUNK_SIZE
    ),
  };

  if (!config.applicationKeyId || !config.applicationKey) {
    throw ConfigError.missingCredentials(
      `${ENV_VARS.APPLICATION_KEY_ID} and ${ENV_VARS.APPLICATION_KEY} must be set`
    );
  }

  return normalizeConfig(config);
}
