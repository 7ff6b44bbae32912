/**
 * Backblaze B2 Storage Driver
 *
 * A TypeScript driver for Backblaze B2 over its native JSON API:
 * - Container (bucket) listing, creation and deletion
 * - Object upload with SHA-1 verification and per-object metadata
 * - Downloads to a file or as a chunked stream
 * - Object lookup by id, hiding and version listings
 * - Lazy, single-flight account authorization with re-authentication on 401
 * - In-process B2 backend for testing
 *
 * @module backblaze-b2
 * @example
 * ```typescript
 * import { createDriver } from 'backblaze-b2-driver';
 *
 * const driver = createDriver({
 *   applicationKeyId: 'my-key-id',
 *   applicationKey: 'my-key',
 * });
 *
 * const container = await driver.getContainer('my-bucket');
 * const object = await driver.uploadObject('./report.csv', container, 'reports/report.csv');
 * await driver.downloadObject(object, '/tmp/report.csv', { overwriteExisting: true });
 *
 * await driver.close();
 * ```
 */

// ============================================================================
// Driver
// ============================================================================

export type { StorageDriver } from './driver/index.js';
export { BackblazeB2Driver, downloadPath, type BackblazeB2DriverOptions } from './driver/index.js';
export { createDriver, createDriverFromEnv, type DriverFactoryOptions } from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type { B2Config, NormalizedB2Config } from './config/index.js';

export {
  DEFAULT_AUTH_HOST,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_DOWNLOAD_CHUNK_SIZE,
  DEFAULT_CONTENT_TYPE,
  MAX_FILE_INFO_ITEMS,
  validateConfig,
  normalizeConfig,
  B2ConfigBuilder,
  createConfigFromEnv,
  ENV_VARS,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  BucketType,
  ObjectMetadata,
  Container,
  ContainerExtra,
  StorageObject,
  ObjectExtra,
  UploadTicket,
  ObjectListing,
  UploadSource,
  UploadObjectOptions,
  DownloadObjectOptions,
  ListObjectsOptions,
  ListObjectVersionsOptions,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  B2Error,
  AuthenticationError,
  ConfigError,
  ContainerNotFoundError,
  DownloadError,
  NetworkError,
  ObjectNotFoundError,
  TransportError,
  UploadError,
  ValidationError,
  isB2Error,
  type B2ErrorParams,
} from './errors/index.js';

// ============================================================================
// Auth and Routing
// ============================================================================

export { AuthSession, type SessionInfo, type SessionState } from './auth/index.js';
export { RequestRouter, type RequestTarget, type RoutingContext } from './routing/index.js';
export { ResourceMapper } from './mapping/index.js';

// ============================================================================
// Transport
// ============================================================================

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  StreamingHttpResponse,
  HttpTransport,
} from './transport/index.js';

export { FetchTransport, createFetchTransport } from './transport/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  type Logger,
  type LogEntry,
} from './observability/index.js';

// ============================================================================
// Testing
// ============================================================================

export {
  ScriptedTransport,
  SimulatedB2Backend,
  jsonResponse,
  rawResponse,
  type SimulatedB2BackendOptions,
} from './simulation/index.js';
