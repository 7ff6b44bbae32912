/**
 * Fluent configuration builder for the Backblaze B2 storage driver
 * @module backblaze-b2/config/builder
 */

import type { B2Config, NormalizedB2Config } from './types.js';
import { normalizeConfig } from './validation.js';
import { createConfigFromEnv } from './env.js';

/**
 * Builder for B2 configuration.
 *
 * @example
 * ```typescript
 * const config = new B2ConfigBuilder()
 *   .credentials('key-id', 'application-key')
 *   .timeout(60000)
 *   .build();
 * ```
 */
export class B2ConfigBuilder {
  private config: Partial<B2Config> = {};

  /**
   * Sets application key ID and application key.
   */
  credentials(applicationKeyId: string, applicationKey: string): this {
    this.config.applicationKeyId = applicationKeyId;
    this.config.applicationKey = applicationKey;
    return this;
  }

  authHost(host: string): this {
    this.config.authHost = host;
    return this;
  }

  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  downloadChunkSize(bytes: number): this {
    this.config.downloadChunkSize = bytes;
    return this;
  }

  /**
   * Loads configuration from environment variables.
   * Values set afterwards override the environment.
   */
  fromEnv(env?: Record<string, string | undefined>): this {
    this.config = { ...createConfigFromEnv(env) };
    return this;
  }

  /**
   * Validates and normalizes the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedB2Config {
    return normalizeConfig(this.config);
  }
}
