/**
 * Type definitions for the Backblaze B2 storage driver
 * @module backblaze-b2/types
 */

export type {
  BucketType,
  ObjectMetadata,
  Container,
  ContainerExtra,
  StorageObject,
  ObjectExtra,
  UploadTicket,
  ObjectListing,
} from './common.js';

export type {
  UploadSource,
  UploadObjectOptions,
  DownloadObjectOptions,
  ListObjectsOptions,
  ListObjectVersionsOptions,
} from './requests.js';

export {
  authorizeAccountSchema,
  bucketRecordSchema,
  listBucketsSchema,
  fileRecordSchema,
  listFilesSchema,
  uploadUrlSchema,
  type AuthorizeAccountRecord,
  type BucketRecord,
  type FileRecord,
  type ListFilesRecord,
} from './records.js';
