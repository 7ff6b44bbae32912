/**
 * Per-object metadata headers for uploads
 * @module backblaze-b2/objects/metadata
 */

import { ValidationError } from '../errors/index.js';
import { MAX_FILE_INFO_ITEMS } from '../config/index.js';
import type { ObjectMetadata } from '../types/index.js';

export const FILE_INFO_HEADER_PREFIX = 'X-Bz-Info-';

/**
 * Characters B2 accepts in a file info name.
 */
const INFO_KEY_PATTERN = /^[A-Za-z0-9_-]{1,50}$/;

/**
 * Percent-encodes a file name or header value the way B2 expects: UTF-8,
 * with `/` left as is.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(/%2F/g, '/');
}

/**
 * @throws {ValidationError} On too many items or a key B2 would reject
 */
export function validateMetadata(metaData: ObjectMetadata): void {
  const keys = Object.keys(metaData);

  if (keys.length > MAX_FILE_INFO_ITEMS) {
    throw new ValidationError({
      message: `At most ${MAX_FILE_INFO_ITEMS} metadata items are allowed, got ${keys.length}`,
      code: 'TOO_MANY_METADATA_ITEMS',
      details: { count: keys.length },
    });
  }

  for (const key of keys) {
    if (!INFO_KEY_PATTERN.test(key)) {
      throw new ValidationError({
        message: `Invalid metadata key "${key}": use 1-50 letters, digits, "-" or "_"`,
        code: 'INVALID_METADATA_KEY',
        details: { key },
      });
    }
  }
}

/**
 * Validates metadata and turns it into `X-Bz-Info-*` headers.
 *
 * @throws {ValidationError} If the metadata is invalid
 */
export function buildMetadataHeaders(metaData: ObjectMetadata): Record<string, string> {
  validateMetadata(metaData);

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(metaData)) {
    headers[FILE_INFO_HEADER_PREFIX + key] = percentEncode(value);
  }
  return headers;
}
