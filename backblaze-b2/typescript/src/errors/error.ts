/**
 * Base error class for the Backblaze B2 storage driver
 * @module backblaze-b2/errors/error
 */

/**
 * Parameters for creating a B2Error
 */
export interface B2ErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * B2 error code, or a driver-level code
   */
  readonly code?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying cause
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all B2 operations
 *
 * Carries the error category, the HTTP status and B2 error code when the
 * failure came from a response, and structured details for the rest.
 */
export class B2Error extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * B2 error code
   */
  readonly code?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: B2ErrorParams) {
    super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, B2Error.prototype);

    this.name = 'B2Error';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, B2Error);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
