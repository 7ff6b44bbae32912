/**
 * Uniform object-storage interface
 * @module backblaze-b2/driver/interface
 */

import type {
  BucketType,
  Container,
  DownloadObjectOptions,
  ListObjectsOptions,
  ObjectListing,
  StorageObject,
  UploadObjectOptions,
  UploadSource,
} from '../types/index.js';

/**
 * Container and object operations every storage driver provides.
 */
export interface StorageDriver {
  /** Human-readable provider name */
  readonly name: string;

  /** Digest algorithm of `StorageObject.hash` */
  readonly hashType: string;

  listContainers(): Promise<Container[]>;

  /**
   * @throws {ContainerNotFoundError} If no container has that name
   */
  getContainer(containerName: string): Promise<Container>;

  /**
   * Lists one page of objects. Pass `nextFileName` back as `startFileName`
   * to read the next page.
   */
  listContainerObjects(container: Container, options?: ListObjectsOptions): Promise<ObjectListing>;

  createContainer(containerName: string, bucketType?: BucketType): Promise<Container>;

  /**
   * Resolves false when the provider refuses, e.g. for a non-empty container.
   */
  deleteContainer(container: Container): Promise<boolean>;

  uploadObject(
    source: UploadSource,
    container: Container,
    objectName: string,
    options?: UploadObjectOptions
  ): Promise<StorageObject>;

  /**
   * Saves an object to a local file. Resolves false when the transfer was
   * incomplete.
   */
  downloadObject(
    object: StorageObject,
    destinationPath: string,
    options?: DownloadObjectOptions
  ): Promise<boolean>;

  /**
   * Streams an object as chunks of `chunkSize` bytes. The iterator can be
   * consumed once.
   */
  downloadObjectAsStream(
    object: StorageObject,
    chunkSize?: number
  ): Promise<AsyncIterableIterator<Uint8Array>>;

  deleteObject(object: StorageObject): Promise<boolean>;
}
