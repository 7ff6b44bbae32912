/**
 * Specific error categories for the Backblaze B2 storage driver
 * @module backblaze-b2/errors/categories
 */

import { B2Error, type B2ErrorParams } from './error.js';

type CategoryParams = Omit<B2ErrorParams, 'type'>;

/**
 * Configuration and initialization errors
 */
export class ConfigError extends B2Error {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'config_error' });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }

  /**
   * Missing application key ID or application key
   */
  static missingCredentials(message?: string): ConfigError {
    return new ConfigError({
      message: message ?? 'Application key ID and application key are required',
      code: 'MISSING_CREDENTIALS',
    });
  }
}

/**
 * Authentication failures: rejected handshake or a 401 on any call
 */
export class AuthenticationError extends B2Error {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'auth_error' });
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  /**
   * b2_authorize_account returned a non-success status
   */
  static handshakeFailed(status: number, message: string, code?: string): AuthenticationError {
    return new AuthenticationError({
      message: `Failed to authenticate: ${message}`,
      status,
      code: code ?? 'HANDSHAKE_FAILED',
    });
  }

  /**
   * b2_authorize_account returned a payload we could not read
   */
  static invalidResponse(reason: string): AuthenticationError {
    return new AuthenticationError({
      message: `Invalid authorization response: ${reason}`,
      code: 'INVALID_AUTH_RESPONSE',
    });
  }

  /**
   * A call was rejected with 401
   */
  static unauthorized(message: string, code?: string): AuthenticationError {
    return new AuthenticationError({
      message,
      status: 401,
      code: code ?? 'unauthorized',
    });
  }
}

/**
 * Unclassified non-success responses and unreadable response payloads
 */
export class TransportError extends B2Error {
  /**
   * Raw response body, when one was received
   */
  readonly body?: string;

  constructor(params: CategoryParams & { body?: string }) {
    super({ ...params, type: 'transport_error' });
    this.name = 'TransportError';
    this.body = params.body;
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static unexpectedStatus(
    operation: string,
    status: number,
    body: string,
    code?: string
  ): TransportError {
    return new TransportError({
      message: `${operation} failed with status ${status}: ${body}`,
      status,
      code,
      body,
      details: { operation },
    });
  }

  static invalidResponse(operation: string, reason: string): TransportError {
    return new TransportError({
      message: `${operation} returned an invalid response: ${reason}`,
      code: 'INVALID_RESPONSE',
      details: { operation },
    });
  }
}

/**
 * Failures below HTTP: DNS, connection, timeout
 */
export class NetworkError extends B2Error {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'network_error' });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number, url: string): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs, url },
    });
  }

  static connectionFailed(url: string, cause: unknown): NetworkError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new NetworkError({
      message: `Connection failed: ${reason}`,
      code: 'CONNECTION_FAILED',
      details: { url },
      cause,
    });
  }
}

/**
 * Non-200 response from the upload host
 */
export class UploadError extends B2Error {
  /**
   * Raw response body
   */
  readonly body: string;

  constructor(status: number, body: string, objectName: string) {
    super({
      type: 'upload_error',
      message: `Upload failed. status_code=${status}, body=${body}`,
      status,
      code: 'UPLOAD_FAILED',
      details: { objectName },
    });
    this.name = 'UploadError';
    this.body = body;
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * Download failures other than a missing object
 */
export class DownloadError extends B2Error {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'download_error' });
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }

  static fileExists(path: string): DownloadError {
    return new DownloadError({
      message: `File ${path} already exists, but overwriteExisting is false`,
      code: 'FILE_EXISTS',
      details: { path },
    });
  }

  static unexpectedStatus(objectName: string, status: number): DownloadError {
    return new DownloadError({
      message: `Unexpected status code ${status} while downloading ${objectName}`,
      status,
      code: 'UNEXPECTED_STATUS',
      details: { objectName },
    });
  }
}

export class ObjectNotFoundError extends B2Error {
  constructor(objectName: string, containerName?: string) {
    super({
      type: 'object_error',
      message: `Object ${objectName} does not exist`,
      status: 404,
      code: 'OBJECT_NOT_FOUND',
      details: { objectName, containerName },
    });
    this.name = 'ObjectNotFoundError';
    Object.setPrototypeOf(this, ObjectNotFoundError.prototype);
  }
}

export class ContainerNotFoundError extends B2Error {
  constructor(containerName: string) {
    super({
      type: 'container_error',
      message: `Container ${containerName} does not exist`,
      code: 'CONTAINER_NOT_FOUND',
      details: { containerName },
    });
    this.name = 'ContainerNotFoundError';
    Object.setPrototypeOf(this, ContainerNotFoundError.prototype);
  }
}

/**
 * Invalid arguments, rejected before any request is sent
 */
export class ValidationError extends B2Error {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'validation_error' });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static invalidArgument(name: string, message: string): ValidationError {
    return new ValidationError({
      message,
      code: 'INVALID_ARGUMENT',
      details: { argument: name },
    });
  }
}
