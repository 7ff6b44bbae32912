/**
 * HTTP transport layer for the Backblaze B2 storage driver
 */

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './types.js';

export { getHeader, collectBody, releaseBody, omitHeaders } from './types.js';

export {
  FetchTransport,
  createFetchTransport,
  type FetchTransportOptions,
} from './fetch-transport.js';
