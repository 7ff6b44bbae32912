/**
 * Backblaze B2 storage driver
 * @module backblaze-b2/driver/b2-driver
 */

import type { NormalizedB2Config } from '../config/index.js';
import type { HttpResponse, HttpTransport, StreamingHttpResponse } from '../transport/index.js';
import { releaseBody } from '../transport/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { AuthSession, type SessionInfo } from '../auth/index.js';
import { RequestRouter, type QueryParams, type RequestTarget } from '../routing/index.js';
import { ResourceMapper, parseJson, parsePayload } from '../mapping/index.js';
import {
  ContainerNotFoundError,
  DownloadError,
  ObjectNotFoundError,
  UploadError,
  ValidationError,
  decodeBody,
  expectSuccess,
} from '../errors/index.js';
import {
  assertChunkSize,
  buildUploadHeaders,
  parseUploadUrl,
  percentEncode,
  readInChunks,
  readUploadSource,
  resolveDestination,
  saveToFile,
  sha1Hex,
  validateMetadata,
} from '../objects/index.js';
import { uploadUrlSchema } from '../types/index.js';
import type {
  BucketType,
  Container,
  DownloadObjectOptions,
  ListObjectVersionsOptions,
  ListObjectsOptions,
  ObjectListing,
  StorageObject,
  UploadObjectOptions,
  UploadSource,
  UploadTicket,
} from '../types/index.js';
import type { StorageDriver } from './interface.js';

type ApiTarget = Extract<RequestTarget, { kind: 'api' }>;

export interface BackblazeB2DriverOptions {
  config: NormalizedB2Config;
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * Storage driver for the Backblaze B2 native API.
 *
 * Every call goes through one {@link RequestRouter}, which authenticates
 * lazily and picks the API, download or upload host for the call.
 *
 * @example
 * ```typescript
 * const driver = createDriver({ applicationKeyId: 'key-id', applicationKey: 'app-key' });
 * const container = await driver.createContainer('reports');
 * await driver.uploadObject('./q3.pdf', container, 'q3.pdf');
 * ```
 */
export class BackblazeB2Driver implements StorageDriver {
  readonly name = 'Backblaze B2';
  readonly hashType = 'sha1';

  private readonly config: NormalizedB2Config;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly session: AuthSession;
  private readonly router: RequestRouter;
  private readonly mapper: ResourceMapper;

  constructor(options: BackblazeB2DriverOptions) {
    this.config = options.config;
    this.transport = options.transport;
    this.logger = options.logger ?? new NoopLogger();

    const routing = {
      authHost: this.config.authHost,
      apiVersion: this.config.apiVersion,
    };

    this.session = new AuthSession({
      credentials: {
        applicationKeyId: this.config.applicationKeyId,
        applicationKey: this.config.applicationKey,
      },
      routing,
      transport: this.transport,
      logger: this.logger,
    });
    this.router = new RequestRouter({
      session: this.session,
      transport: this.transport,
      routing,
      logger: this.logger,
    });
    this.mapper = new ResourceMapper(this);
  }

  /**
   * Performs the account handshake now instead of on the first call.
   */
  async authenticate(force: boolean = false): Promise<SessionInfo> {
    return this.session.authenticate(force);
  }

  async listContainers(): Promise<Container[]> {
    const data = await this.callApi({
      kind: 'api',
      method: 'GET',
      action: 'b2_list_buckets',
      includeAccountId: true,
    });
    return this.mapper.toContainers(data);
  }

  async getContainer(containerName: string): Promise<Container> {
    const containers = await this.listContainers();
    const match = containers.find((container) => container.name === containerName);
    if (!match) {
      throw new ContainerNotFoundError(containerName);
    }
    return match;
  }

  async listContainerObjects(
    container: Container,
    options: ListObjectsOptions = {}
  ): Promise<ObjectListing> {
    const data = await this.callApi({
      kind: 'api',
      method: 'GET',
      action: 'b2_list_file_names',
      params: {
        bucketId: container.extra.id,
        startFileName: options.startFileName,
        maxFileCount: options.maxFileCount,
      },
    });
    return this.mapper.toListing(data, container);
  }

  async createContainer(
    containerName: string,
    bucketType: BucketType = 'allPrivate'
  ): Promise<Container> {
    const data = await this.callApi({
      kind: 'api',
      method: 'POST',
      action: 'b2_create_bucket',
      data: { bucketName: containerName, bucketType },
      includeAccountId: true,
    });
    return this.mapper.toContainer(data);
  }

  async deleteContainer(container: Container): Promise<boolean> {
    const response = await this.router.request({
      kind: 'api',
      method: 'POST',
      action: 'b2_delete_bucket',
      data: { bucketId: container.extra.id },
      includeAccountId: true,
    });
    return response.status === 200;
  }

  async deleteObject(object: StorageObject): Promise<boolean> {
    const response = await this.router.request({
      kind: 'api',
      method: 'POST',
      action: 'b2_delete_file_version',
      data: { fileName: object.name, fileId: object.extra.fileId },
    });
    return response.status === 200;
  }

  /**
   * Fetches one file version by its B2 file id.
   */
  async getObjectById(fileId: string): Promise<StorageObject> {
    const data = await this.callApi({
      kind: 'api',
      method: 'GET',
      action: 'b2_get_file_info',
      params: { fileId },
    });
    return this.mapper.toObject(data);
  }

  /**
   * Hides a file so it no longer shows up in name listings. Resolves to the
   * hide marker B2 creates.
   */
  async hideObject(containerId: string, objectName: string): Promise<StorageObject> {
    const data = await this.callApi({
      kind: 'api',
      method: 'POST',
      action: 'b2_hide_file',
      data: { bucketId: containerId, fileName: objectName },
    });
    return this.mapper.toObject(data);
  }

  /**
   * Lists one page of file versions. Cursor parameters are sent only when
   * given.
   */
  async listObjectVersions(
    containerId: string,
    options: ListObjectVersionsOptions = {}
  ): Promise<ObjectListing> {
    const params: QueryParams = { bucketId: containerId };
    if (options.startFileName) {
      params.startFileName = options.startFileName;
    }
    if (options.startFileId) {
      params.startFileId = options.startFileId;
    }
    if (options.maxFileCount) {
      params.maxFileCount = options.maxFileCount;
    }

    const data = await this.callApi({
      kind: 'api',
      method: 'GET',
      action: 'b2_list_file_versions',
      params,
    });
    return this.mapper.toListing(data);
  }

  /**
   * Fetches a fresh upload URL and token for one bucket.
   */
  async getUploadTicket(containerId: string): Promise<UploadTicket> {
    const operation = 'b2_get_upload_url';
    const response = await this.router.request({ kind: 'uploadTicketFetch', bucketId: containerId });
    expectSuccess(response, operation);

    const record = parsePayload(uploadUrlSchema, parseJson(response.body, operation), operation);
    return {
      bucketId: record.bucketId,
      uploadUrl: record.uploadUrl,
      uploadAuthToken: record.authorizationToken,
    };
  }

  async getUploadUrl(containerId: string): Promise<string> {
    const ticket = await this.getUploadTicket(containerId);
    return ticket.uploadUrl;
  }

  /**
   * Uploads an object, replacing the current version of the same name.
   *
   * The source is read fully into memory so its SHA-1 can go in the request
   * headers. Then an upload ticket is fetched and the bytes are posted to the
   * ticket's host with the ticket's token.
   *
   * @throws {ValidationError} If the metadata is invalid
   * @throws {UploadError} If the upload host answers with anything but 200
   */
  async uploadObject(
    source: UploadSource,
    container: Container,
    objectName: string,
    options: UploadObjectOptions = {}
  ): Promise<StorageObject> {
    validateMetadata(options.metaData ?? {});

    const data = await readUploadSource(source);
    const contentSha1 = sha1Hex(data);
    const headers = buildUploadHeaders(objectName, contentSha1, options);

    const ticket = await this.getUploadTicket(container.extra.id);
    const { host, path } = parseUploadUrl(ticket.uploadUrl);

    this.logger.info('Uploading object', {
      container: container.name,
      objectName,
      size: data.byteLength,
      contentSha1,
    });

    const response = await this.router.request(
      { kind: 'uploadPut', host, path, token: ticket.uploadAuthToken, body: data },
      headers
    );

    if (response.status !== 200) {
      const body = decodeBody(response.body);
      this.logger.error('Upload failed', { objectName, status: response.status });
      throw new UploadError(response.status, body, objectName);
    }

    return this.mapper.toObject(parseJson(response.body, 'upload'), container);
  }

  async downloadObject(
    object: StorageObject,
    destinationPath: string,
    options: DownloadObjectOptions = {}
  ): Promise<boolean> {
    const response = await this.openDownload(object);

    let filePath: string;
    try {
      filePath = await resolveDestination(destinationPath, object.name);
    } catch (error) {
      await releaseBody(response.body);
      throw error;
    }

    const saved = await saveToFile(response.body, filePath, {
      overwriteExisting: options.overwriteExisting ?? false,
      deleteOnFailure: options.deleteOnFailure ?? true,
      expectedSize: object.size,
    });

    if (saved) {
      this.logger.info('Downloaded object', { objectName: object.name, filePath });
    } else {
      this.logger.warn('Incomplete download', { objectName: object.name, filePath });
    }
    return saved;
  }

  async downloadObjectAsStream(
    object: StorageObject,
    chunkSize: number = this.config.downloadChunkSize
  ): Promise<AsyncIterableIterator<Uint8Array>> {
    assertChunkSize(chunkSize);
    const response = await this.openDownload(object);
    return readInChunks(response.body, chunkSize);
  }

  /**
   * Closes the underlying transport.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  private async callApi(target: ApiTarget): Promise<unknown> {
    const response: HttpResponse = await this.router.request(target);
    expectSuccess(response, target.action);
    return parseJson(response.body, target.action);
  }

  private async openDownload(object: StorageObject): Promise<StreamingHttpResponse> {
    const container = object.container;
    if (!container) {
      throw ValidationError.invalidArgument(
        'object',
        `Object ${object.name} is not bound to a container`
      );
    }

    const response = await this.router.stream({
      kind: 'download',
      action: downloadPath(container, object),
    });

    if (response.status !== 200) {
      await releaseBody(response.body);
      if (response.status === 404) {
        throw new ObjectNotFoundError(object.name, container.name);
      }
      throw DownloadError.unexpectedStatus(object.name, response.status);
    }
    return response;
  }
}

/**
 * Path of an object below /file/ on the download host.
 */
export function downloadPath(container: Container, object: StorageObject): string {
  return `${container.name}/${percentEncode(object.name)}`;
}
