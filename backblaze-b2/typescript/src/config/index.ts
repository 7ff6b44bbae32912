/**
 * Configuration module for the Backblaze B2 storage driver
 * @module backblaze-b2/config
 */

export type { B2Config, NormalizedB2Config } from './types.js';

export {
  DEFAULT_AUTH_HOST,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
  DEFAULT_CONTENT_TYPE,
  MAX_FILE_INFO_ITEMS,
} from './defaults.js';

export { validateConfig, normalizeConfig } from './validation.js';

export { B2ConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
