/**
 * JSON payload decoding with schema validation
 * @module backblaze-b2/mapping/payload
 */

import type { z } from 'zod';
import { TransportError, decodeBody } from '../errors/index.js';

/**
 * Decodes a JSON response body.
 *
 * @throws {TransportError} If the body is not valid JSON
 */
export function parseJson(body: Uint8Array, operation: string): unknown {
  const text = decodeBody(body);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw TransportError.invalidResponse(
      operation,
      error instanceof Error ? error.message : 'body is not JSON'
    );
  }
}

/**
 * Validates a decoded payload against a schema.
 *
 * @throws {TransportError} If the payload does not match
 */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  operation: string
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw TransportError.invalidResponse(operation, `${where}${issue?.message ?? 'unexpected shape'}`);
  }
  return result.data;
}
