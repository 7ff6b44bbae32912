/**
 * End-to-end tests for the B2 driver against the in-process backend
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { BackblazeB2Driver, downloadPath } from '../index.js';
import { createDriver } from '../../client/index.js';
import {
  AuthenticationError,
  ContainerNotFoundError,
  ObjectNotFoundError,
  UploadError,
  ValidationError,
} from '../../errors/index.js';
import { InMemoryLogger, LogLevel } from '../../observability/index.js';
import { getHeader, type HttpTransport } from '../../transport/index.js';
import {
  ScriptedTransport,
  SimulatedB2Backend,
  TrackedBody,
  jsonResponse,
  rawResponse,
} from '../../simulation/index.js';
import type { Container, StorageObject } from '../../types/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

async function sizes(iterator: AsyncIterable<Uint8Array>): Promise<number[]> {
  const result: number[] = [];
  for await (const chunk of iterator) {
    result.push(chunk.byteLength);
  }
  return result;
}

describe('BackblazeB2Driver', () => {
  let backend: SimulatedB2Backend;
  let logger: InMemoryLogger;
  let driver: BackblazeB2Driver;

  beforeEach(() => {
    backend = new SimulatedB2Backend({ streamChunkSize: 3 });
    logger = new InMemoryLogger();
    driver = createDriver(
      { applicationKeyId: backend.applicationKeyId, applicationKey: backend.applicationKey },
      { transport: backend, logger }
    );
  });

  it('should not contact B2 until the first operation', () => {
    expect(backend.requests).toHaveLength(0);
  });

  it('should authorize once across operations', async () => {
    await driver.listContainers();
    await driver.createContainer('photos');
    await driver.listContainers();

    expect(backend.requestsFor('b2_authorize_account')).toHaveLength(1);
  });

  it('should authorize eagerly on request', async () => {
    const session = await driver.authenticate();

    expect(session.accountId).toBe('test-account');
    expect(session.apiHost).toBe('api001.backblazeb2.test');
    expect(session.downloadHost).toBe('f001.backblazeb2.test');
  });

  describe('containers', () => {
    it('should create a private container by default', async () => {
      const container = await driver.createContainer('photos');

      expect(container.name).toBe('photos');
      expect(container.extra.bucketType).toBe('allPrivate');
      expect(container.extra.id).toBe(backend.getBucket('photos')?.bucketId);
      expect(container.driver).toBe(driver);

      const [request] = backend.requestsFor('b2_create_bucket');
      expect(request?.method).toBe('POST');
      expect(request?.body).toBe('{"bucketName":"photos","bucketType":"allPrivate","accountId":"test-account"}');
    });

    it('should create a public container', async () => {
      const container = await driver.createContainer('site', 'allPublic');

      expect(container.extra.bucketType).toBe('allPublic');
    });

    it('should list containers with the account id in the query', async () => {
      await driver.createContainer('zeta');
      await driver.createContainer('alpha');

      const containers = await driver.listContainers();

      expect(containers.map((c) => c.name)).toEqual(['alpha', 'zeta']);
      const [request] = backend.requestsFor('b2_list_buckets');
      expect(request?.url).toBe(
        'https://api001.backblazeb2.test/b2api/v1/b2_list_buckets?accountId=test-account'
      );
    });

    it('should find a container by name', async () => {
      await driver.createContainer('photos');

      const container = await driver.getContainer('photos');

      expect(container.name).toBe('photos');
    });

    it('should raise ContainerNotFoundError for an unknown name', async () => {
      await expect(driver.getContainer('missing')).rejects.toBeInstanceOf(ContainerNotFoundError);
    });

    it('should raise the B2 error for a duplicate name', async () => {
      await driver.createContainer('photos');

      await expect(driver.createContainer('photos')).rejects.toMatchObject({
        status: 400,
        code: 'duplicate_bucket_name',
      });
    });

    it('should delete an empty container', async () => {
      const container = await driver.createContainer('photos');

      expect(await driver.deleteContainer(container)).toBe(true);
      expect(backend.getBucket('photos')).toBeUndefined();
    });

    it('should resolve false for a non-empty container', async () => {
      const container = await driver.createContainer('photos');
      await driver.uploadObject(encoder.encode('x'), container, 'a.txt');

      expect(await driver.deleteContainer(container)).toBe(false);
    });
  });

  describe('uploads', () => {
    let container: Container;

    beforeEach(async () => {
      container = await driver.createContainer('docs');
    });

    it('should upload with the content digest and default content type', async () => {
      const object = await driver.uploadObject(encoder.encode('hello'), container, 'greeting.txt');

      expect(object.name).toBe('greeting.txt');
      expect(object.size).toBe(5);
      expect(object.hash).toBe('aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d');
      expect(object.container).toBe(container);
      expect(object.extra.action).toBe('upload');

      const upload = backend.requests.find((r) => new URL(r.url).host === backend.uploadHost);
      expect(upload?.method).toBe('POST');
      expect(upload?.headers).toMatchObject({
        'X-Bz-File-Name': 'greeting.txt',
        'Content-Type': 'b2/x-auto',
        'X-Bz-Content-Sha1': 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d',
      });
    });

    it('should fetch a fresh upload ticket per upload', async () => {
      await driver.uploadObject(encoder.encode('a'), container, 'a.txt');
      await driver.uploadObject(encoder.encode('b'), container, 'b.txt');

      const tickets = backend.requestsFor('b2_get_upload_url');
      expect(tickets).toHaveLength(2);
      expect(tickets[0]?.url).toBe(
        `https://api001.backblazeb2.test/b2api/v1/b2_get_upload_url?bucketId=${container.extra.id}`
      );
    });

    it('should send the upload ticket token, not the session token', async () => {
      await driver.uploadObject(encoder.encode('a'), container, 'a.txt');

      const upload = backend.requests.find((r) => new URL(r.url).host === backend.uploadHost);
      expect(getHeader(upload?.headers ?? {}, 'authorization')).toMatch(/^upload-token-/);
    });

    it('should store metadata and encoded names', async () => {
      const object = await driver.uploadObject(encoder.encode('data'), container, 'dir/my file.txt', {
        contentType: 'text/plain',
        metaData: { author: 'Sam Lee' },
      });

      expect(object.name).toBe('dir/my file.txt');
      expect(object.metaData).toEqual({ author: 'Sam Lee' });
      expect(object.extra.contentType).toBe('text/plain');
    });

    it('should upload from a stream', async () => {
      async function* source(): AsyncGenerator<Uint8Array> {
        yield encoder.encode('hello ');
        yield encoder.encode('world');
      }

      const object = await driver.uploadObject(source(), container, 'stream.txt');

      expect(object.hash).toBe('2aae6c35c94fcfb415dbe95f408b9ce91ee846ed');
      expect(object.size).toBe(11);
    });

    it('should reject invalid metadata before any request', async () => {
      const before = backend.requests.length;

      await expect(
        driver.uploadObject(encoder.encode('x'), container, 'a.txt', { metaData: { 'bad key': 'x' } })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(backend.requests).toHaveLength(before);
    });

    it('should return the upload URL for a container', async () => {
      const url = await driver.getUploadUrl(container.extra.id);

      expect(url.startsWith(`https://${backend.uploadHost}/b2api/v1/b2_upload_file/${container.extra.id}/`)).toBe(true);
    });

    it('should log the upload', async () => {
      await driver.uploadObject(encoder.encode('hello'), container, 'greeting.txt');

      const entry = logger.getEntriesAtLevel(LogLevel.INFO).find((e) => e.message === 'Uploading object');
      expect(entry?.context).toEqual({
        container: 'docs',
        objectName: 'greeting.txt',
        size: 5,
        contentSha1: 'aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d',
      });
    });
  });

  describe('listings', () => {
    let container: Container;

    beforeEach(async () => {
      container = await driver.createContainer('docs');
      for (const name of ['c.txt', 'a.txt', 'b.txt']) {
        await driver.uploadObject(encoder.encode(name), container, name);
      }
    });

    it('should list objects by name', async () => {
      const listing = await driver.listContainerObjects(container);

      expect(listing.objects.map((o) => o.name)).toEqual(['a.txt', 'b.txt', 'c.txt']);
      expect(listing.objects[0]?.container).toBe(container);
      expect(listing.nextFileName).toBeUndefined();
    });

    it('should page with maxFileCount and startFileName', async () => {
      const first = await driver.listContainerObjects(container, { maxFileCount: 2 });
      expect(first.objects.map((o) => o.name)).toEqual(['a.txt', 'b.txt']);
      expect(first.nextFileName).toBe('c.txt');

      const second = await driver.listContainerObjects(container, {
        startFileName: first.nextFileName,
        maxFileCount: 2,
      });
      expect(second.objects.map((o) => o.name)).toEqual(['c.txt']);
      expect(second.nextFileName).toBeUndefined();
    });

    it('should hide an object from name listings but not from versions', async () => {
      const marker = await driver.hideObject(container.extra.id, 'b.txt');
      expect(marker.extra.action).toBe('hide');
      expect(marker.name).toBe('b.txt');

      const listing = await driver.listContainerObjects(container);
      expect(listing.objects.map((o) => o.name)).toEqual(['a.txt', 'c.txt']);

      const versions = await driver.listObjectVersions(container.extra.id);
      expect(versions.objects.map((o) => `${o.name}:${o.extra.action ?? ''}`)).toEqual([
        'a.txt:upload',
        'b.txt:hide',
        'b.txt:upload',
        'c.txt:upload',
      ]);
    });

    it('should send only the version cursor fields that are set', async () => {
      await driver.listObjectVersions(container.extra.id, { startFileName: 'b.txt' });

      const [request] = backend.requestsFor('b2_list_file_versions');
      expect(request?.url).toBe(
        `https://api001.backblazeb2.test/b2api/v1/b2_list_file_versions?bucketId=${container.extra.id}&startFileName=b.txt`
      );
    });

    it('should page through versions with both cursor fields', async () => {
      const first = await driver.listObjectVersions(container.extra.id, { maxFileCount: 1 });
      expect(first.objects.map((o) => o.name)).toEqual(['a.txt']);
      expect(first.nextFileName).toBe('b.txt');

      const second = await driver.listObjectVersions(container.extra.id, {
        startFileName: first.nextFileName,
        startFileId: first.nextFileId,
        maxFileCount: 5,
      });
      expect(second.objects.map((o) => o.name)).toEqual(['b.txt', 'c.txt']);
      expect(second.nextFileId).toBeUndefined();
    });

    it('should fetch an object by id', async () => {
      const listing = await driver.listContainerObjects(container);
      const target = listing.objects[1];

      const object = await driver.getObjectById(target?.extra.fileId ?? '');

      expect(object.name).toBe('b.txt');
      expect(object.hash).toBe(target?.hash);
      expect(object.container).toBeUndefined();
      expect(backend.requestsFor('b2_get_file_info')[0]?.method).toBe('GET');
    });

    it('should raise the B2 error for an unknown id', async () => {
      await expect(driver.getObjectById('nope')).rejects.toMatchObject({ status: 404, code: 'not_found' });
    });

    it('should delete a version once', async () => {
      const [first] = (await driver.listContainerObjects(container)).objects;
      if (!first) {
        throw new Error('expected an object');
      }

      expect(await driver.deleteObject(first)).toBe(true);
      expect(await driver.deleteObject(first)).toBe(false);

      const listing = await driver.listContainerObjects(container);
      expect(listing.objects.map((o) => o.name)).toEqual(['b.txt', 'c.txt']);
    });
  });

  describe('downloads', () => {
    let container: Container;
    let object: StorageObject;
    let dir: string;

    beforeEach(async () => {
      container = await driver.createContainer('docs');
      object = await driver.uploadObject(encoder.encode('0123456789'), container, 'digits.txt');
      dir = await mkdtemp(path.join(tmpdir(), 'b2-driver-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should build the download path from container and encoded name', () => {
      expect(downloadPath(container, { ...object, name: 'a b/c.txt' })).toBe('docs/a%20b/c.txt');
    });

    it('should stream in the requested chunk size', async () => {
      const stream = await driver.downloadObjectAsStream(object, 4);

      expect(await sizes(stream)).toEqual([4, 4, 2]);
      const [request] = backend.requests.filter((r) => new URL(r.url).host === backend.downloadHost);
      expect(request?.url).toBe('https://f001.backblazeb2.test/file/docs/digits.txt');
    });

    it('should stream with the configured default chunk size', async () => {
      const stream = await driver.downloadObjectAsStream(object);
      const parts: string[] = [];
      for await (const chunk of stream) {
        parts.push(decoder.decode(chunk));
      }

      expect(parts).toEqual(['0123456789']);
    });

    it('should reject an invalid chunk size before any request', async () => {
      const before = backend.requests.length;

      await expect(driver.downloadObjectAsStream(object, 0)).rejects.toBeInstanceOf(ValidationError);
      expect(backend.requests).toHaveLength(before);
    });

    it('should raise ObjectNotFoundError for a missing object', async () => {
      await expect(
        driver.downloadObjectAsStream({ ...object, name: 'missing.txt' })
      ).rejects.toBeInstanceOf(ObjectNotFoundError);
    });

    it('should require an object bound to a container', async () => {
      await expect(
        driver.downloadObjectAsStream({ ...object, container: undefined })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should save into a directory under the object name', async () => {
      expect(await driver.downloadObject(object, dir)).toBe(true);

      expect(await readFile(path.join(dir, 'digits.txt'), 'utf8')).toBe('0123456789');
    });

    it('should refuse to overwrite an existing file by default', async () => {
      await driver.downloadObject(object, dir);

      await expect(driver.downloadObject(object, dir)).rejects.toMatchObject({ code: 'FILE_EXISTS' });
      expect(await driver.downloadObject(object, dir, { overwriteExisting: true })).toBe(true);
    });

    it('should resolve false when the size does not match', async () => {
      const target = path.join(dir, 'out.txt');

      expect(await driver.downloadObject({ ...object, size: 99 }, target)).toBe(false);
      expect(logger.getMessages()).toContain('Incomplete download');
    });
  });

  describe('session expiry', () => {
    it('should surface a 401 and authenticate again on the next call', async () => {
      await driver.createContainer('photos');
      backend.revokeTokens();

      const error = await driver.listContainers().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ code: 'expired_auth_token' });

      const containers = await driver.listContainers();
      expect(containers.map((c) => c.name)).toEqual(['photos']);
      expect(backend.requestsFor('b2_authorize_account')).toHaveLength(2);
    });
  });
});

describe('BackblazeB2Driver with a scripted transport', () => {
  const authorize = {
    accountId: 'acct-1',
    apiUrl: 'https://api001.backblazeb2.com',
    downloadUrl: 'https://f001.backblazeb2.com',
    authorizationToken: 'session-token',
  };

  function createScripted(uploadStatus: number, onTicket?: () => void): ScriptedTransport {
    return new ScriptedTransport((request) => {
      const url = new URL(request.url);
      if (url.pathname.endsWith('/b2_authorize_account')) {
        return jsonResponse(200, authorize);
      }
      if (url.pathname.endsWith('/b2_get_upload_url')) {
        onTicket?.();
        return jsonResponse(200, {
          bucketId: 'b1',
          uploadUrl: 'https://pod-000.backblaze.com/b2api/v1/b2_upload_file/b1/c001',
          authorizationToken: 'upload-token',
        });
      }
      if (url.host === 'pod-000.backblaze.com') {
        return rawResponse(uploadStatus, '{"code":"service_unavailable"}');
      }
      return jsonResponse(404, {});
    });
  }

  const container = (driver: BackblazeB2Driver): Container => ({
    name: 'docs',
    extra: { id: 'b1', bucketType: 'allPrivate' },
    driver,
  });

  it('should raise UploadError with status and body on a failed upload', async () => {
    const transport = createScripted(503);
    const driver = createDriver(
      { applicationKeyId: 'test-key-id', applicationKey: 'test-secret' },
      { transport }
    );

    const error = await driver
      .uploadObject(encoder.encode('hello'), container(driver), 'a.txt')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({
      status: 503,
      message: 'Upload failed. status_code=503, body={"code":"service_unavailable"}',
    });
  });

  it('should post to the ticket host and path verbatim', async () => {
    const transport = createScripted(503);
    const driver = createDriver(
      { applicationKeyId: 'test-key-id', applicationKey: 'test-secret' },
      { transport }
    );

    await driver.uploadObject(encoder.encode('hello'), container(driver), 'a.txt').catch(() => undefined);

    const upload = transport.requests[transport.requests.length - 1];
    expect(upload?.url).toBe('https://pod-000.backblaze.com/b2api/v1/b2_upload_file/b1/c001');
    expect(upload?.headers.Authorization).toBe('upload-token');
  });

  it('should hash and post the same bytes when the caller reuses its buffer', async () => {
    const payload = encoder.encode('hello');
    const transport = createScripted(503, () => payload.set(encoder.encode('HELLO')));
    const driver = createDriver(
      { applicationKeyId: 'test-key-id', applicationKey: 'test-secret' },
      { transport }
    );

    await driver.uploadObject(payload, container(driver), 'a.txt').catch(() => undefined);

    const upload = transport.requests[transport.requests.length - 1];
    const body = upload?.body;
    expect(body instanceof Uint8Array ? decoder.decode(body) : body).toBe('hello');
    expect(upload?.headers['X-Bz-Content-Sha1']).toBe('aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d');
  });

  describe('download bodies', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'b2-release-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    function downloading(status: number, body: TrackedBody): BackblazeB2Driver {
      const scripted = createScripted(200);
      const transport: HttpTransport = {
        send: (request) => scripted.send(request),
        sendStreaming: async () => ({ status, headers: {}, body }),
        close: () => scripted.close(),
      };
      return createDriver(
        { applicationKeyId: 'test-key-id', applicationKey: 'test-secret' },
        { transport }
      );
    }

    function objectIn(driver: BackblazeB2Driver): StorageObject {
      return {
        name: 'a.txt',
        size: 5,
        metaData: {},
        extra: { fileId: 'file-1' },
        container: container(driver),
        driver,
      };
    }

    it('should release the body of a 404', async () => {
      const body = new TrackedBody(encoder.encode('{"code":"not_found"}'));
      const driver = downloading(404, body);

      await expect(driver.downloadObjectAsStream(objectIn(driver))).rejects.toBeInstanceOf(
        ObjectNotFoundError
      );
      expect(body.released).toBe(true);
    });

    it('should release the body of an unexpected status', async () => {
      const body = new TrackedBody(encoder.encode('busy'));
      const driver = downloading(503, body);

      await expect(driver.downloadObject(objectIn(driver), dir)).rejects.toMatchObject({
        code: 'UNEXPECTED_STATUS',
      });
      expect(body.released).toBe(true);
    });

    it('should release the body when the destination cannot be resolved', async () => {
      const body = new TrackedBody(encoder.encode('hello'));
      const driver = downloading(200, body);
      const file = path.join(dir, 'plain.txt');
      await writeFile(file, 'x');

      await expect(
        driver.downloadObject(objectIn(driver), path.join(file, 'out.txt'))
      ).rejects.toMatchObject({ code: 'ENOTDIR' });
      expect(body.released).toBe(true);
    });

    it('should release the body when the destination exists', async () => {
      const body = new TrackedBody(encoder.encode('hello'));
      const driver = downloading(200, body);
      await writeFile(path.join(dir, 'a.txt'), 'old');

      await expect(driver.downloadObject(objectIn(driver), dir)).rejects.toMatchObject({
        code: 'FILE_EXISTS',
      });
      expect(body.released).toBe(true);
    });

    it('should read the body to the end on success', async () => {
      const body = new TrackedBody(encoder.encode('hel'), encoder.encode('lo'));
      const driver = downloading(200, body);

      expect(await driver.downloadObject(objectIn(driver), dir)).toBe(true);
      expect(await readFile(path.join(dir, 'a.txt'), 'utf8')).toBe('hello');
      expect(body.released).toBe(false);
    });
  });

  it('should close the transport', async () => {
    const transport = createScripted(200);
    const driver = createDriver(
      { applicationKeyId: 'test-key-id', applicationKey: 'test-secret' },
      { transport }
    );

    await driver.close();

    expect(transport.closed).toBe(true);
  });
});
