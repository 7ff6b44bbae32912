/**
 * In-process B2 service for tests and local development
 * @module backblaze-b2/simulation
 */

import { z } from 'zod';
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from '../transport/index.js';
import { getHeader } from '../transport/index.js';
import { FILE_INFO_HEADER_PREFIX, sha1Hex } from '../objects/index.js';
import { FILE_PATH_PREFIX, apiPathPrefix } from '../routing/index.js';
import { DEFAULT_API_VERSION, DEFAULT_AUTH_HOST } from '../config/index.js';
import { jsonResponse, rawResponse, streamBody } from './scripted-transport.js';

export interface SimulatedB2BackendOptions {
  applicationKeyId?: string;
  applicationKey?: string;
  accountId?: string;
  authHost?: string;
  apiHost?: string;
  downloadHost?: string;
  uploadHost?: string;
  apiVersion?: string;
  /** Size of the chunks download bodies are streamed in */
  streamChunkSize?: number;
  /** Page size when a listing sets no maxFileCount */
  defaultMaxFileCount?: number;
}

/**
 * One stored file version, or a hide marker.
 */
export interface SimulatedFileVersion {
  fileId: string;
  fileName: string;
  action: 'upload' | 'hide';
  data: Uint8Array;
  contentSha1: string;
  contentType: string;
  fileInfo: Record<string, string>;
  uploadTimestamp: number;
}

export interface SimulatedBucket {
  bucketId: string;
  bucketName: string;
  bucketType: string;
  /** Upload order, oldest first */
  versions: SimulatedFileVersion[];
}

type Handler = (url: URL, request: HttpRequest) => HttpResponse;

const jsonBodySchema = z.record(z.unknown());

const decoder = new TextDecoder();
const encoder = new TextEncoder();

function errorResponse(status: number, code: string, message: string): HttpResponse {
  return jsonResponse(status, { status, code, message });
}

function readJsonBody(request: HttpRequest): Record<string, unknown> {
  if (request.body === undefined) {
    return {};
  }
  const text = typeof request.body === 'string' ? request.body : decoder.decode(request.body);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return {};
  }
  const result = jsonBodySchema.safeParse(raw);
  return result.success ? result.data : {};
}

function stringField(source: Record<string, unknown>, name: string): string | undefined {
  const value = source[name];
  return typeof value === 'string' ? value : undefined;
}

function bodyBytes(request: HttpRequest): Uint8Array {
  if (request.body === undefined) {
    return new Uint8Array(0);
  }
  return typeof request.body === 'string' ? encoder.encode(request.body) : request.body;
}

function compareVersions(a: SimulatedFileVersion, b: SimulatedFileVersion): number {
  if (a.fileName !== b.fileName) {
    return a.fileName < b.fileName ? -1 : 1;
  }
  return b.uploadTimestamp - a.uploadTimestamp;
}

/**
 * Transport that serves the B2 native API from memory.
 *
 * Covers the handshake, bucket and file listings, upload tickets and uploads
 * (with SHA-1 verification), hide, delete and downloads. Tokens can be
 * revoked to exercise re-authentication.
 *
 * Usage:
 * ```typescript
 * const backend = new SimulatedB2Backend();
 * const driver = createDriver(
 *   { applicationKeyId: backend.applicationKeyId, applicationKey: backend.applicationKey },
 *   { transport: backend }
 * );
 * ```
 */
export class SimulatedB2Backend implements HttpTransport {
  readonly applicationKeyId: string;
  readonly applicationKey: string;
  readonly accountId: string;
  readonly authHost: string;
  readonly apiHost: string;
  readonly downloadHost: string;
  readonly uploadHost: string;

  /** Every request received, in order */
  readonly requests: HttpRequest[] = [];

  private readonly prefix: string;
  private readonly streamChunkSize: number;
  private readonly defaultMaxFileCount: number;
  private readonly buckets = new Map<string, SimulatedBucket>();
  private readonly accountTokens = new Set<string>();
  private readonly uploadTokens = new Map<string, string>();
  private readonly apiHandlers: Record<string, Handler>;
  private counter = 0;
  private clock = 1_700_000_000_000;

  constructor(options: SimulatedB2BackendOptions = {}) {
    this.applicationKeyId = options.applicationKeyId ?? 'test-key-id';
    this.applicationKey = options.applicationKey ?? 'test-secret';
    this.accountId = options.accountId ?? 'test-account';
    this.authHost = options.authHost ?? DEFAULT_AUTH_HOST;
    this.apiHost = options.apiHost ?? 'api001.backblazeb2.test';
    this.downloadHost = options.downloadHost ?? 'f001.backblazeb2.test';
    this.uploadHost = options.uploadHost ?? 'pod-001.backblaze.test';
    this.prefix = apiPathPrefix(options.apiVersion ?? DEFAULT_API_VERSION);
    this.streamChunkSize = options.streamChunkSize ?? 4096;
    this.defaultMaxFileCount = options.defaultMaxFileCount ?? 100;

    this.apiHandlers = {
      b2_list_buckets: (url) => this.listBuckets(url),
      b2_create_bucket: (url, request) => this.createBucket(readJsonBody(request)),
      b2_delete_bucket: (url, request) => this.deleteBucket(readJsonBody(request)),
      b2_list_file_names: (url) => this.listFileNames(url),
      b2_list_file_versions: (url) => this.listFileVersions(url),
      b2_get_file_info: (url) => this.getFileInfo(url),
      b2_hide_file: (url, request) => this.hideFile(readJsonBody(request)),
      b2_delete_file_version: (url, request) => this.deleteFileVersion(readJsonBody(request)),
      b2_get_upload_url: (url) => this.getUploadUrl(url),
    };
  }

  // ========================================
  // Transport
  // ========================================

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handle(request);
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    this.requests.push(request);
    const response = this.handle(request);
    return {
      status: response.status,
      headers: response.headers,
      body: streamBody(response.body, this.streamChunkSize),
    };
  }

  async close(): Promise<void> {
    // nothing to release
  }

  // ========================================
  // Testing Utilities
  // ========================================

  /**
   * Invalidates every issued account token, as if they had expired.
   */
  revokeTokens(): void {
    this.accountTokens.clear();
  }

  getBucket(bucketName: string): SimulatedBucket | undefined {
    for (const bucket of this.buckets.values()) {
      if (bucket.bucketName === bucketName) {
        return bucket;
      }
    }
    return undefined;
  }

  /**
   * Requests whose path ends with the given action.
   */
  requestsFor(action: string): HttpRequest[] {
    return this.requests.filter((request) => new URL(request.url).pathname.endsWith(`/${action}`));
  }

  // ========================================
  // Dispatch
  // ========================================

  private handle(request: HttpRequest): HttpResponse {
    const url = new URL(request.url);

    if (url.host === this.authHost && url.pathname === `${this.prefix}b2_authorize_account`) {
      return this.authorizeAccount(request);
    }

    if (url.host === this.apiHost && url.pathname.startsWith(this.prefix)) {
      if (!this.hasAccountToken(request)) {
        return errorResponse(401, 'expired_auth_token', 'Authorization token has expired');
      }
      const handler = this.apiHandlers[url.pathname.slice(this.prefix.length)];
      if (!handler) {
        return errorResponse(400, 'bad_request', `Unknown API: ${url.pathname}`);
      }
      return handler(url, request);
    }

    if (url.host === this.uploadHost) {
      return this.uploadFile(request, url);
    }

    if (url.host === this.downloadHost && url.pathname.startsWith(FILE_PATH_PREFIX)) {
      if (!this.hasAccountToken(request)) {
        return errorResponse(401, 'expired_auth_token', 'Authorization token has expired');
      }
      return this.downloadFile(url);
    }

    return errorResponse(404, 'not_found', `No route for ${request.method} ${request.url}`);
  }

  private hasAccountToken(request: HttpRequest): boolean {
    const token = getHeader(request.headers, 'authorization');
    return token !== undefined && this.accountTokens.has(token);
  }

  private nextId(prefix: string): string {
    this.counter += 1;
    return `${prefix}-${this.counter}`;
  }

  // ========================================
  // Account and buckets
  // ========================================

  private authorizeAccount(request: HttpRequest): HttpResponse {
    const expected = `Basic ${Buffer.from(`${this.applicationKeyId}:${this.applicationKey}`).toString('base64')}`;
    if (getHeader(request.headers, 'authorization') !== expected) {
      return errorResponse(401, 'unauthorized', 'Invalid application key');
    }

    const token = this.nextId('account-token');
    this.accountTokens.add(token);
    return jsonResponse(200, {
      accountId: this.accountId,
      apiUrl: `https://${this.apiHost}`,
      downloadUrl: `https://${this.downloadHost}`,
      authorizationToken: token,
    });
  }

  private bucketRecord(bucket: SimulatedBucket): Record<string, unknown> {
    return {
      accountId: this.accountId,
      bucketId: bucket.bucketId,
      bucketName: bucket.bucketName,
      bucketType: bucket.bucketType,
    };
  }

  private listBuckets(url: URL): HttpResponse {
    if (url.searchParams.get('accountId') !== this.accountId) {
      return errorResponse(400, 'bad_request', 'accountId is required');
    }
    const buckets = [...this.buckets.values()]
      .sort((a, b) => a.bucketName.localeCompare(b.bucketName))
      .map((bucket) => this.bucketRecord(bucket));
    return jsonResponse(200, { buckets });
  }

  private createBucket(body: Record<string, unknown>): HttpResponse {
    const bucketName = stringField(body, 'bucketName');
    const bucketType = stringField(body, 'bucketType');
    if (stringField(body, 'accountId') !== this.accountId || !bucketName || !bucketType) {
      return errorResponse(400, 'bad_request', 'accountId, bucketName and bucketType are required');
    }
    if (this.getBucket(bucketName)) {
      return errorResponse(400, 'duplicate_bucket_name', `Bucket name is already in use: ${bucketName}`);
    }

    const bucket: SimulatedBucket = {
      bucketId: this.nextId('bucket'),
      bucketName,
      bucketType,
      versions: [],
    };
    this.buckets.set(bucket.bucketId, bucket);
    return jsonResponse(200, this.bucketRecord(bucket));
  }

  private deleteBucket(body: Record<string, unknown>): HttpResponse {
    const bucket = this.buckets.get(stringField(body, 'bucketId') ?? '');
    if (!bucket) {
      return errorResponse(400, 'bad_request', 'Bucket does not exist');
    }
    if (bucket.versions.length > 0) {
      return errorResponse(400, 'cannot_delete_non_empty_bucket', 'Cannot delete non-empty bucket');
    }
    this.buckets.delete(bucket.bucketId);
    return jsonResponse(200, this.bucketRecord(bucket));
  }

  // ========================================
  // Files
  // ========================================

  private fileRecord(version: SimulatedFileVersion): Record<string, unknown> {
    return {
      fileId: version.fileId,
      fileName: version.fileName,
      action: version.action,
      size: version.data.byteLength,
      contentSha1: version.contentSha1,
      contentType: version.contentType,
      fileInfo: version.fileInfo,
      uploadTimestamp: version.uploadTimestamp,
    };
  }

  private maxFileCount(url: URL): number {
    const raw = url.searchParams.get('maxFileCount');
    return raw ? Number.parseInt(raw, 10) : this.defaultMaxFileCount;
  }

  private listFileNames(url: URL): HttpResponse {
    const bucket = this.buckets.get(url.searchParams.get('bucketId') ?? '');
    if (!bucket) {
      return errorResponse(400, 'bad_request', 'Invalid bucketId');
    }

    const startFileName = url.searchParams.get('startFileName') ?? '';
    const latest = new Map<string, SimulatedFileVersion>();
    for (const version of bucket.versions) {
      latest.set(version.fileName, version);
    }
    const visible = [...latest.values()]
      .filter((version) => version.action === 'upload' && version.fileName >= startFileName)
      .sort(compareVersions);

    const limit = this.maxFileCount(url);
    const page = visible.slice(0, limit);
    const next = visible[limit];
    return jsonResponse(200, {
      files: page.map((version) => this.fileRecord(version)),
      nextFileName: next ? next.fileName : null,
    });
  }

  private listFileVersions(url: URL): HttpResponse {
    const bucket = this.buckets.get(url.searchParams.get('bucketId') ?? '');
    if (!bucket) {
      return errorResponse(400, 'bad_request', 'Invalid bucketId');
    }

    const startFileName = url.searchParams.get('startFileName') ?? '';
    const startFileId = url.searchParams.get('startFileId');
    let all = [...bucket.versions]
      .sort(compareVersions)
      .filter((version) => version.fileName >= startFileName);

    if (startFileId) {
      const index = all.findIndex((version) => version.fileId === startFileId);
      if (index >= 0) {
        all = all.slice(index);
      }
    }

    const limit = this.maxFileCount(url);
    const page = all.slice(0, limit);
    const next = all[limit];
    return jsonResponse(200, {
      files: page.map((version) => this.fileRecord(version)),
      nextFileName: next ? next.fileName : null,
      nextFileId: next ? next.fileId : null,
    });
  }

  private findVersion(fileId: string): SimulatedFileVersion | undefined {
    for (const bucket of this.buckets.values()) {
      const match = bucket.versions.find((version) => version.fileId === fileId);
      if (match) {
        return match;
      }
    }
    return undefined;
  }

  private getFileInfo(url: URL): HttpResponse {
    const version = this.findVersion(url.searchParams.get('fileId') ?? '');
    if (!version) {
      return errorResponse(404, 'not_found', 'File not present');
    }
    return jsonResponse(200, this.fileRecord(version));
  }

  private hideFile(body: Record<string, unknown>): HttpResponse {
    const bucket = this.buckets.get(stringField(body, 'bucketId') ?? '');
    const fileName = stringField(body, 'fileName');
    if (!bucket || !fileName) {
      return errorResponse(400, 'bad_request', 'bucketId and fileName are required');
    }
    if (!bucket.versions.some((version) => version.fileName === fileName)) {
      return errorResponse(400, 'no_such_file', `File not present: ${fileName}`);
    }

    const marker = this.addVersion(bucket, {
      fileName,
      action: 'hide',
      data: new Uint8Array(0),
      contentType: 'application/x-bz-hide-marker',
      fileInfo: {},
    });
    return jsonResponse(200, this.fileRecord(marker));
  }

  private deleteFileVersion(body: Record<string, unknown>): HttpResponse {
    const fileId = stringField(body, 'fileId');
    const fileName = stringField(body, 'fileName');
    for (const bucket of this.buckets.values()) {
      const index = bucket.versions.findIndex(
        (version) => version.fileId === fileId && version.fileName === fileName
      );
      if (index >= 0) {
        bucket.versions.splice(index, 1);
        return jsonResponse(200, { fileId, fileName });
      }
    }
    return errorResponse(400, 'file_not_present', `File not present: ${fileName ?? ''} ${fileId ?? ''}`);
  }

  private addVersion(
    bucket: SimulatedBucket,
    fields: Omit<SimulatedFileVersion, 'fileId' | 'contentSha1' | 'uploadTimestamp'>
  ): SimulatedFileVersion {
    this.clock += 1000;
    const version: SimulatedFileVersion = {
      ...fields,
      fileId: this.nextId('file'),
      contentSha1: sha1Hex(fields.data),
      uploadTimestamp: this.clock,
    };
    bucket.versions.push(version);
    return version;
  }

  // ========================================
  // Uploads and downloads
  // ========================================

  private getUploadUrl(url: URL): HttpResponse {
    const bucketId = url.searchParams.get('bucketId') ?? '';
    if (!this.buckets.has(bucketId)) {
      return errorResponse(400, 'bad_request', 'Invalid bucketId');
    }
    const token = this.nextId('upload-token');
    this.uploadTokens.set(token, bucketId);
    return jsonResponse(200, {
      bucketId,
      uploadUrl: `https://${this.uploadHost}${this.prefix}b2_upload_file/${bucketId}/${this.counter}`,
      authorizationToken: token,
    });
  }

  private uploadFile(request: HttpRequest, url: URL): HttpResponse {
    const uploadPrefix = `${this.prefix}b2_upload_file/`;
    if (request.method !== 'POST' || !url.pathname.startsWith(uploadPrefix)) {
      return errorResponse(404, 'not_found', `No route for ${request.method} ${request.url}`);
    }

    const bucketId = url.pathname.slice(uploadPrefix.length).split('/')[0] ?? '';
    const token = getHeader(request.headers, 'authorization') ?? '';
    if (this.uploadTokens.get(token) !== bucketId) {
      return errorResponse(401, 'bad_auth_token', 'Invalid upload authorization token');
    }
    const bucket = this.buckets.get(bucketId);
    if (!bucket) {
      return errorResponse(400, 'bad_request', 'Bucket does not exist');
    }

    const encodedName = getHeader(request.headers, 'x-bz-file-name');
    const expectedSha1 = getHeader(request.headers, 'x-bz-content-sha1');
    if (!encodedName || !expectedSha1) {
      return errorResponse(400, 'bad_request', 'X-Bz-File-Name and X-Bz-Content-Sha1 are required');
    }

    const data = bodyBytes(request);
    if (sha1Hex(data) !== expectedSha1) {
      return errorResponse(400, 'bad_request', 'Sha1 did not match data received');
    }

    const fileInfo: Record<string, string> = {};
    const infoPrefix = FILE_INFO_HEADER_PREFIX.toLowerCase();
    for (const [key, value] of Object.entries(request.headers)) {
      if (key.toLowerCase().startsWith(infoPrefix)) {
        fileInfo[key.slice(infoPrefix.length)] = decodeURIComponent(value);
      }
    }

    const version = this.addVersion(bucket, {
      fileName: decodeURIComponent(encodedName),
      action: 'upload',
      data,
      contentType: getHeader(request.headers, 'content-type') ?? 'application/octet-stream',
      fileInfo,
    });
    return jsonResponse(200, { ...this.fileRecord(version), bucketId, accountId: this.accountId });
  }

  private downloadFile(url: URL): HttpResponse {
    const rest = url.pathname.slice(FILE_PATH_PREFIX.length);
    const separator = rest.indexOf('/');
    const bucketName = separator >= 0 ? rest.slice(0, separator) : rest;
    const fileName = separator >= 0 ? decodeURIComponent(rest.slice(separator + 1)) : '';

    const bucket = this.getBucket(bucketName);
    const versions = bucket?.versions.filter((version) => version.fileName === fileName) ?? [];
    const latest = versions[versions.length - 1];
    if (!latest || latest.action !== 'upload') {
      return errorResponse(404, 'not_found', `File not present: ${fileName}`);
    }

    return rawResponse(200, latest.data, {
      'content-type': latest.contentType,
      'content-length': String(latest.data.byteLength),
      'x-bz-file-id': latest.fileId,
      'x-bz-content-sha1': latest.contentSha1,
    });
  }
}
