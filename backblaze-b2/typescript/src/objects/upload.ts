/**
 * Upload helpers: payload buffering, content hash and upload headers
 * @module backblaze-b2/objects/upload
 */

import { readFile } from 'fs/promises';
import { sha1 } from '@noble/hashes/sha1';
import { bytesToHex } from '@noble/hashes/utils';
import { collectBody, omitHeaders } from '../transport/index.js';
import { DEFAULT_CONTENT_TYPE } from '../config/index.js';
import type { UploadObjectOptions, UploadSource } from '../types/index.js';
import { buildMetadataHeaders, percentEncode } from './metadata.js';

/**
 * Reads an upload source fully into memory.
 * Filesystem errors for a path source propagate unchanged.
 */
export async function readUploadSource(source: UploadSource): Promise<Uint8Array> {
  if (typeof source === 'string') {
    return readFile(source);
  }
  if (source instanceof Uint8Array) {
    // owned copy: the posted bytes must be the hashed bytes
    return source.slice();
  }
  return collectBody(source);
}

/**
 * Hex-encoded SHA-1 of the payload.
 */
export function sha1Hex(data: Uint8Array): string {
  return bytesToHex(sha1(data));
}

/**
 * Splits an upload URL into the host and the path the POST goes to.
 */
export function parseUploadUrl(uploadUrl: string): { host: string; path: string } {
  const url = new URL(uploadUrl);
  return { host: url.host, path: url.pathname + url.search };
}

/**
 * Headers for the upload POST.
 *
 * Caller headers that name a header the driver sets are dropped, whatever
 * their case.
 *
 * @throws {ValidationError} If the metadata is invalid
 */
export function buildUploadHeaders(
  objectName: string,
  contentSha1: string,
  options: UploadObjectOptions = {}
): Record<string, string> {
  const own: Record<string, string> = {
    'X-Bz-File-Name': percentEncode(objectName),
    'Content-Type': options.contentType ?? DEFAULT_CONTENT_TYPE,
    'X-Bz-Content-Sha1': contentSha1,
    ...buildMetadataHeaders(options.metaData ?? {}),
  };
  const extra = omitHeaders(options.headers ?? {}, ['Authorization', ...Object.keys(own)]);
  return { ...extra, ...own };
}
