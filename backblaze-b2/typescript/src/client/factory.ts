/**
 * Factory functions for creating B2 drivers
 * @module backblaze-b2/client
 */

import type { B2Config } from '../config/index.js';
import { normalizeConfig, createConfigFromEnv } from '../config/index.js';
import type { NormalizedB2Config } from '../config/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import { BackblazeB2Driver } from '../driver/index.js';

/**
 * Collaborators that replace the defaults
 */
export interface DriverFactoryOptions {
  /** Defaults to a fetch transport with the configured timeout */
  transport?: HttpTransport;
  /** Defaults to a no-op logger */
  logger?: Logger;
}

function buildDriver(config: NormalizedB2Config, options: DriverFactoryOptions): BackblazeB2Driver {
  return new BackblazeB2Driver({
    config,
    transport: options.transport ?? createFetchTransport(config.timeout),
    logger: options.logger,
  });
}

/**
 * Creates a B2 driver from a configuration object.
 *
 * No request is made until the first operation.
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const driver = createDriver({
 *   applicationKeyId: 'my-key-id',
 *   applicationKey: 'my-key',
 * });
 *
 * try {
 *   const containers = await driver.listContainers();
 * } finally {
 *   await driver.close();
 * }
 * ```
 */
export function createDriver(
  config: B2Config,
  options: DriverFactoryOptions = {}
): BackblazeB2Driver {
  return buildDriver(normalizeConfig(config), options);
}

/**
 * Creates a B2 driver from environment variables.
 *
 * Reads the following:
 * - B2_APPLICATION_KEY_ID (required)
 * - B2_APPLICATION_KEY (required)
 * - B2_AUTH_HOST (optional): Control host for the handshake
 * - B2_API_VERSION (optional): e.g. v1
 * - B2_TIMEOUT_MS (optional): Request timeout in milliseconds
 * - B2_DOWNLOAD_CHUNK_SIZE (optional): Default stream chunk size in bytes
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createDriverFromEnv(
  options: DriverFactoryOptions & { env?: Record<string, string | undefined> } = {}
): BackblazeB2Driver {
  return buildDriver(createConfigFromEnv(options.env), options);
}
