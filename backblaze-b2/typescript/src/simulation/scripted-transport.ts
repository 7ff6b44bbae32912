/**
 * Scripted transport for unit tests
 * @module backblaze-b2/simulation
 */

import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  StreamingHttpResponse,
} from '../transport/index.js';

/**
 * Produces the response for one request.
 */
export type ScriptedHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

const encoder = new TextEncoder();

/**
 * Builds a JSON response.
 */
export function jsonResponse(
  status: number,
  payload: unknown,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json', ...headers },
    body: encoder.encode(JSON.stringify(payload)),
  };
}

/**
 * Builds a response with a raw body.
 */
export function rawResponse(
  status: number,
  body: Uint8Array | string,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    status,
    headers,
    body: typeof body === 'string' ? encoder.encode(body) : body,
  };
}

/**
 * Splits a body into a stream of chunks of at most `chunkSize` bytes.
 */
export async function* streamBody(
  body: Uint8Array,
  chunkSize: number
): AsyncGenerator<Uint8Array> {
  for (let offset = 0; offset < body.byteLength; offset += chunkSize) {
    yield body.slice(offset, offset + chunkSize);
  }
}

/**
 * One-shot body that records whether its reader released it early.
 */
export class TrackedBody implements AsyncIterableIterator<Uint8Array> {
  released = false;
  private pending: Uint8Array[];

  constructor(...chunks: Uint8Array[]) {
    this.pending = chunks;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Uint8Array> {
    return this;
  }

  async next(): Promise<IteratorResult<Uint8Array>> {
    const chunk = this.released ? undefined : this.pending.shift();
    return chunk === undefined ? { done: true, value: undefined } : { done: false, value: chunk };
  }

  async return(): Promise<IteratorResult<Uint8Array>> {
    this.released = true;
    this.pending = [];
    return { done: true, value: undefined };
  }
}

/**
 * Transport that answers every request through a handler and records what
 * it was sent.
 *
 * Usage:
 * ```typescript
 * const transport = new ScriptedTransport(() => jsonResponse(200, { buckets: [] }));
 * // ... exercise the code under test
 * expect(transport.requests[0]?.url).toBe('https://...');
 * ```
 */
export class ScriptedTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  closed = false;

  constructor(
    private handler: ScriptedHandler,
    private readonly streamChunkSize: number = 4
  ) {}

  /**
   * Replaces the handler for subsequent requests.
   */
  respondWith(handler: ScriptedHandler): void {
    this.handler = handler;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handler(request);
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.send(request);
    return {
      status: response.status,
      headers: response.headers,
      body: streamBody(response.body, this.streamChunkSize),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
