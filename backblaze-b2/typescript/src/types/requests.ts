/**
 * Operation options for the Backblaze B2 storage driver
 * @module backblaze-b2/types/requests
 */

import type { ObjectMetadata } from './common.js';

/**
 * Bytes to upload: a local file path, an in-memory buffer, or a byte stream.
 * The whole source is read into memory before the request is sent, since the
 * SHA-1 header must precede the body.
 */
export type UploadSource = string | Uint8Array | AsyncIterable<Uint8Array>;

export interface UploadObjectOptions {
  /** Defaults to `b2/x-auto` */
  contentType?: string;
  /** At most 10 items; keys limited to letters, digits, `-` and `_` */
  metaData?: ObjectMetadata;
  /** Extra headers sent with the upload */
  headers?: Record<string, string>;
}

export interface DownloadObjectOptions {
  /** Replace an existing destination file. Default false. */
  overwriteExisting?: boolean;
  /** Remove a partially written file when the download fails. Default true. */
  deleteOnFailure?: boolean;
}

export interface ListObjectsOptions {
  startFileName?: string;
  maxFileCount?: number;
}

export interface ListObjectVersionsOptions {
  startFileName?: string;
  startFileId?: string;
  maxFileCount?: number;
}
