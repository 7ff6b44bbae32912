/**
 * Tests for the fetch transport
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport, collectBody, getHeader } from '../index.js';
import { NetworkError } from '../../errors/index.js';

const decoder = new TextDecoder();

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return the status and body without throwing on errors', async () => {
    const fetchMock = vi.fn(async () =>
      new Response('{"code":"bad_request"}', { status: 400, headers: { 'X-Bz-Request-Id': 'r1' } })
    );
    vi.stubGlobal('fetch', fetchMock);
    const transport = new FetchTransport({ timeout: 1000 });

    const response = await transport.send({
      method: 'POST',
      url: 'https://api001.backblazeb2.com/b2api/v1/b2_delete_bucket',
      headers: { Authorization: 'session-token' },
      body: '{}',
    });

    expect(response.status).toBe(400);
    expect(decoder.decode(response.body)).toBe('{"code":"bad_request"}');
    expect(response.headers['x-bz-request-id']).toBe('r1');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should stream the response body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('streamed')));
    const transport = new FetchTransport({ timeout: 1000 });

    const response = await transport.sendStreaming({
      method: 'GET',
      url: 'https://f001.backblazeb2.com/file/docs/a.txt',
      headers: {},
    });

    expect(decoder.decode(await collectBody(response.body))).toBe('streamed');
  });

  it('should map failures to NetworkError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    const transport = new FetchTransport({ timeout: 1000 });

    const error = await transport
      .send({ method: 'GET', url: 'https://api.backblaze.com/', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: 'CONNECTION_FAILED', message: 'Connection failed: fetch failed' });
  });

  it('should map aborts to a timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        const abort = new Error('aborted');
        abort.name = 'AbortError';
        throw abort;
      })
    );
    const transport = new FetchTransport({ timeout: 50 });

    await expect(
      transport.send({ method: 'GET', url: 'https://api.backblaze.com/', headers: {} })
    ).rejects.toMatchObject({ code: 'TIMEOUT', message: 'Request timed out after 50ms' });
  });
});

describe('getHeader', () => {
  it('should match names case-insensitively', () => {
    expect(getHeader({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
    expect(getHeader({}, 'content-type')).toBeUndefined();
  });
});
