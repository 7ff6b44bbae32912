/**
 * Response classification for the Backblaze B2 storage driver
 * @module backblaze-b2/errors/mapping
 */

import { z } from 'zod';
import type { HttpResponse } from '../transport/types.js';
import { B2Error } from './error.js';
import { AuthenticationError, TransportError } from './categories.js';

/**
 * Statuses B2 uses for a successful call
 */
const SUCCESS_STATUSES: ReadonlySet<number> = new Set([200, 201, 202]);

/**
 * Error envelope returned by every B2 endpoint
 */
const errorBodySchema = z.object({
  status: z.number().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
});

export type B2ErrorBody = z.infer<typeof errorBodySchema>;

/**
 * Outcome of classifying a response
 */
export type ResponseClass =
  | { kind: 'success' }
  | { kind: 'auth_failure'; message: string; code?: string }
  | { kind: 'failure'; status: number; body: string; code?: string };

const decoder = new TextDecoder();

export function decodeBody(body: Uint8Array): string {
  return decoder.decode(body);
}

/**
 * Parses the B2 error envelope out of a response body.
 * Returns an empty object when the body is not a JSON error envelope.
 */
export function parseErrorBody(text: string): B2ErrorBody {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return {};
  }
  const result = errorBodySchema.safeParse(raw);
  return result.success ? result.data : {};
}

export function isSuccessStatus(status: number): boolean {
  return SUCCESS_STATUSES.has(status);
}

/**
 * Maps a response to success, authentication failure or generic failure.
 */
export function classifyResponse(response: HttpResponse): ResponseClass {
  if (isSuccessStatus(response.status)) {
    return { kind: 'success' };
  }

  const body = decodeBody(response.body);
  const parsed = parseErrorBody(body);

  if (response.status === 401) {
    return {
      kind: 'auth_failure',
      message: parsed.message ?? body,
      code: parsed.code,
    };
  }

  return { kind: 'failure', status: response.status, body, code: parsed.code };
}

/**
 * Throws unless the response is a success.
 *
 * @throws {AuthenticationError} On 401
 * @throws {TransportError} On any other non-success status
 */
export function expectSuccess(response: HttpResponse, operation: string): void {
  const outcome = classifyResponse(response);
  switch (outcome.kind) {
    case 'success':
      return;
    case 'auth_failure':
      throw AuthenticationError.unauthorized(outcome.message, outcome.code);
    case 'failure':
      throw TransportError.unexpectedStatus(operation, outcome.status, outcome.body, outcome.code);
  }
}

export function isB2Error(error: unknown): error is B2Error {
  return error instanceof B2Error;
}
