/**
 * Domain entities exposed by the Backblaze B2 storage driver
 * @module backblaze-b2/types/common
 */

import type { StorageDriver } from '../driver/interface.js';

/**
 * Bucket visibility.
 */
export type BucketType = 'allPrivate' | 'allPublic' | 'snapshot';

/**
 * User metadata attached to an object (B2 `fileInfo`).
 */
export type ObjectMetadata = Record<string, string>;

export interface ContainerExtra {
  /** B2 bucketId */
  readonly id: string;
  readonly bucketType: string;
}

/**
 * A named namespace of objects (B2 bucket).
 *
 * Containers are views rebuilt from each response; they hold no network
 * resources.
 */
export interface Container {
  readonly name: string;
  readonly extra: ContainerExtra;
  readonly driver: StorageDriver;
}

export interface ObjectExtra {
  /** B2 fileId, identifies one version of a file */
  readonly fileId: string;
  /** Milliseconds since the epoch */
  readonly uploadTimestamp?: number;
  /** `upload`, `hide`, `start` or `folder` */
  readonly action?: string;
  readonly contentType?: string;
}

/**
 * A stored file version.
 */
export interface StorageObject {
  readonly name: string;
  /** Size in bytes, absent when B2 reported none */
  readonly size?: number;
  /** Hex SHA-1 of the content */
  readonly hash?: string;
  readonly metaData: ObjectMetadata;
  readonly extra: ObjectExtra;
  /** Absent for objects fetched by id or by bucket id alone */
  readonly container?: Container;
  readonly driver: StorageDriver;
}

/**
 * Credential and endpoint pair scoping one upload to one bucket.
 * Fetched per upload, never cached.
 */
export interface UploadTicket {
  readonly bucketId: string;
  readonly uploadUrl: string;
  readonly uploadAuthToken: string;
}

/**
 * One page of a listing plus the cursor for the next page.
 * The cursor fields are undefined once the listing is complete.
 */
export interface ObjectListing {
  readonly objects: StorageObject[];
  readonly nextFileName?: string;
  readonly nextFileId?: string;
}
