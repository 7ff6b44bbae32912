/**
 * Error system for the Backblaze B2 storage driver
 * @module backblaze-b2/errors
 */

// Base error class
export { B2Error, type B2ErrorParams } from './error.js';

// Error categories
export {
  AuthenticationError,
  ConfigError,
  ContainerNotFoundError,
  DownloadError,
  NetworkError,
  ObjectNotFoundError,
  TransportError,
  UploadError,
  ValidationError,
} from './categories.js';

// Response classification
export {
  classifyResponse,
  decodeBody,
  expectSuccess,
  isB2Error,
  isSuccessStatus,
  parseErrorBody,
  type B2ErrorBody,
  type ResponseClass,
} from './mapping.js';
