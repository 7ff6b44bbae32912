/**
 * Configuration validation and normalization for the Backblaze B2 storage driver
 * @module backblaze-b2/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { B2Config, NormalizedB2Config } from './types.js';
import {
  DEFAULT_AUTH_HOST,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
} from './defaults.js';

/**
 * Host name with an optional port, no scheme or path.
 */
const hostSchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, 'must be a host name without scheme or path');

const configSchema = z.object({
  applicationKeyId: z.string().trim().min(1, 'is required'),
  applicationKey: z.string().trim().min(1, 'is required'),
  authHost: hostSchema.optional(),
  apiVersion: z.string().regex(/^v\d+$/, 'must look like v1, v2, ...').optional(),
  timeout: z.number().int().positive().optional(),
  downloadChunkSize: z.number().int().positive().optional(),
});

/**
 * Validates B2 configuration.
 *
 * @returns The validated configuration
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: Partial<B2Config>): B2Config {
  if (!config.applicationKeyId || !config.applicationKey) {
    throw ConfigError.missingCredentials();
  }

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const paramName = issue?.path.join('.') ?? 'config';
    throw ConfigError.invalidConfig(
      paramName,
      `Invalid configuration parameter ${paramName}: ${issue?.message ?? 'invalid value'}`
    );
  }

  return result.data;
}

/**
 * Normalizes B2 configuration by validating and applying defaults.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<B2Config>): NormalizedB2Config {
  const valid = validateConfig(config);

  return {
    applicationKeyId: valid.applicationKeyId,
    applicationKey: valid.applicationKey,
    authHost: valid.authHost ?? DEFAULT_AUTH_HOST,
    apiVersion: valid.apiVersion ?? DEFAULT_API_VERSION,
    timeout: valid.timeout ?? DEFAULT_TIMEOUT,
    downloadChunkSize: valid.downloadChunkSize ?? DEFAULT_DOWNLOAD_CHUNK_SIZE,
  };
}
