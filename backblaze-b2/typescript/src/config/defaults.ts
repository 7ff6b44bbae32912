/**
 * Default configuration values for the Backblaze B2 storage driver
 * @module backblaze-b2/config/defaults
 */

/**
 * Control host serving b2_authorize_account.
 */
export const DEFAULT_AUTH_HOST = 'api.backblaze.com';

export const DEFAULT_API_VERSION = 'v1';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT = 300000;

/**
 * Default chunk size for streamed downloads in bytes.
 */
export const DEFAULT_DOWNLOAD_CHUNK_SIZE = 8192;

/**
 * Content type that asks B2 to pick one from the file name.
 */
export const DEFAULT_CONTENT_TYPE = 'b2/x-auto';

/**
 * Most `X-Bz-Info-*` headers B2 accepts on one upload.
 */
export const MAX_FILE_INFO_ITEMS = 10;
