/**
 * Conversion of B2 records into containers and objects
 * @module backblaze-b2/mapping/resources
 */

import type { StorageDriver } from '../driver/interface.js';
import type { Container, ObjectListing, StorageObject } from '../types/index.js';
import {
  bucketRecordSchema,
  fileRecordSchema,
  listBucketsSchema,
  listFilesSchema,
} from '../types/index.js';
import { parsePayload } from './payload.js';

/**
 * B2 reports this instead of a digest for files assembled from parts.
 */
const NO_SHA1 = 'none';

/**
 * Builds Container and StorageObject views bound to one driver.
 */
export class ResourceMapper {
  constructor(private readonly driver: StorageDriver) {}

  toContainer(item: unknown): Container {
    const record = parsePayload(bucketRecordSchema, item, 'bucket record');
    return {
      name: record.bucketName,
      extra: {
        id: record.bucketId,
        bucketType: record.bucketType,
      },
      driver: this.driver,
    };
  }

  /**
   * Maps a `{buckets: [...]}` payload, preserving order.
   */
  toContainers(data: unknown): Container[] {
    const payload = parsePayload(listBucketsSchema, data, 'b2_list_buckets');
    return payload.buckets.map((item) => this.toContainer(item));
  }

  toObject(item: unknown, container?: Container): StorageObject {
    const record = parsePayload(fileRecordSchema, item, 'file record');
    const hash =
      record.contentSha1 !== undefined && record.contentSha1 !== null && record.contentSha1 !== NO_SHA1
        ? record.contentSha1
        : undefined;

    return {
      name: record.fileName,
      size: record.size ?? record.contentLength,
      hash,
      metaData: record.fileInfo ?? {},
      extra: {
        fileId: record.fileId,
        uploadTimestamp: record.uploadTimestamp,
        action: record.action,
        contentType: record.contentType ?? undefined,
      },
      container,
      driver: this.driver,
    };
  }

  /**
   * Maps a `{files: [...]}` payload, preserving order.
   */
  toObjects(data: unknown, container?: Container): StorageObject[] {
    return this.toListing(data, container).objects;
  }

  /**
   * Maps a `{files, nextFileName, nextFileId}` payload into a listing page.
   */
  toListing(data: unknown, container?: Container): ObjectListing {
    const payload = parsePayload(listFilesSchema, data, 'file listing');
    return {
      objects: payload.files.map((item) => this.toObject(item, container)),
      nextFileName: payload.nextFileName ?? undefined,
      nextFileId: payload.nextFileId ?? undefined,
    };
  }
}
