/**
 * HTTP transport type definitions for the Backblaze B2 storage driver
 */

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body, sent as-is */
  body?: Uint8Array | string;
}

export type HttpMethod = 'GET' | 'POST';

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP response with streaming body
 */
export interface StreamingHttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body as a one-shot byte stream */
  body: AsyncIterable<Uint8Array>;
}

/**
 * HTTP transport interface
 *
 * Implementations return every response regardless of status; classifying
 * statuses is left to the caller.
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns buffered response
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Sends an HTTP request and returns streaming response
   *
   * Use for object downloads, where the body may not fit in memory.
   */
  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Drains a streaming body into a single buffer
 */
export async function collectBody(body: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    total += chunk.byteLength;
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Releases a streaming body that will not be read, so the underlying
 * connection is freed. A body already consumed is left as it is.
 */
export async function releaseBody(body: AsyncIterable<Uint8Array>): Promise<void> {
  await body[Symbol.asyncIterator]().return?.();
}

/**
 * Copy of `headers` without the given names, compared case-insensitively
 */
export function omitHeaders(
  headers: Record<string, string>,
  names: Iterable<string>
): Record<string, string> {
  const omitted = new Set<string>();
  for (const name of names) {
    omitted.add(name.toLowerCase());
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (!omitted.has(key.toLowerCase())) {
      result[key] = value;
    }
  }
  return result;
}
