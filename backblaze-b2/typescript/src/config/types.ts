/**
 * Configuration type definitions for the Backblaze B2 storage driver
 * @module backblaze-b2/config/types
 */

/**
 * Core B2 configuration parameters.
 */
export interface B2Config {
  /**
   * Application key ID (or the master account ID).
   */
  applicationKeyId: string;

  /**
   * Application key.
   */
  applicationKey: string;

  /**
   * Host serving b2_authorize_account.
   * @default 'api.backblaze.com'
   */
  authHost?: string;

  /**
   * API version segment used in `/b2api/<version>/` paths.
   * @default 'v1'
   */
  apiVersion?: string;

  /**
   * Request timeout in milliseconds.
   * @default 300000 (5 minutes)
   */
  timeout?: number;

  /**
   * Chunk size in bytes for streamed downloads.
   * @default 8192
   */
  downloadChunkSize?: number;
}

/**
 * Configuration with all defaults applied.
 */
export type NormalizedB2Config = Required<B2Config>;
