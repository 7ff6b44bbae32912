/**
 * Fetch-based HTTP transport implementation for the Backblaze B2 storage driver
 */

import type {
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';
import { NetworkError } from '../errors/index.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Request timeout in milliseconds */
  timeout: number;
}

async function* emptyBody(): AsyncGenerator<Uint8Array> {
  // yields nothing
}

/**
 * Fetch-based HTTP transport implementation
 *
 * Uses the global Fetch API. The timeout covers the whole buffered exchange;
 * for streaming responses it covers the time until the headers arrive.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await this.makeFetchRequest(request, controller.signal);
      const arrayBuffer = await response.arrayBuffer();

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: new Uint8Array(arrayBuffer),
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await this.makeFetchRequest(request, controller.signal);

      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body: response.body ?? emptyBody(),
      };
    } catch (error) {
      throw this.handleError(error, request);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {
    // Fetch API doesn't require explicit cleanup
  }

  private async makeFetchRequest(
    request: HttpRequest,
    signal: AbortSignal
  ): Promise<Response> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal,
    };

    if (request.body !== undefined) {
      init.body = request.body;
    }

    return fetch(request.url, init);
  }

  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key.toLowerCase()] = value;
    });
    return result;
  }

  private handleError(error: unknown, request: HttpRequest): Error {
    if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
      return NetworkError.timeout(this.options.timeout, request.url);
    }
    return NetworkError.connectionFailed(request.url, error);
  }
}

/**
 * Creates a fetch-based HTTP transport
 */
export function createFetchTransport(timeout: number = 300000): HttpTransport {
  return new FetchTransport({ timeout });
}
