/**
 * Error types for Polaris API operations
 */

import { isBlank } from '../utils/text.js';

/**
 * Non-success HTTP response from the Polaris API.
 * `body` holds the parsed JSON error payload, when there was one.
 */
export class PolarisApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'PolarisApiError';
  }
}

/**
 * A named resource (table, project) does not exist
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Pull a human-readable message out of a Polaris error payload.
 *
 * Two shapes are in use:
 *   { "code": 400, "message": "Unable to process JSON" }
 *   { "error": { "code": "AlreadyExists", "message": "A table with name [x] already exists" } }
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  if (typeof body.message === 'string' && !isBlank(body.message)) {
    return body.message;
  }
  const error = body.error;
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.message === 'string' && !isBlank(error.message)) {
    return error.message;
  }
  if (typeof error.code === 'string' && !isBlank(error.code)) {
    return error.code;
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
