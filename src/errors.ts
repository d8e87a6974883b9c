/**
 * Error taxonomy for RT API calls. Every failure raised by the client is an RTError.
 *
 * @module errors
 */

import type { JsonValue } from "./types.js";

export class RTError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Connection refused, DNS or TLS failure, or timeout. */
export class NetworkError extends RTError {
  constructor(
    message: string,
    readonly timeout = false
  ) {
    super(message);
  }
}

/** 401 */
export class AuthenticationError extends RTError {}

/** 403 */
export class AuthorizationError extends RTError {}

/** 404 */
export class NotFoundError extends RTError {}

/** 422 */
export class ValidationError extends RTError {}

/** 409 or 412, e.g. a stale If-Match token. */
export class ConflictError extends RTError {}

/** Any other non-success status. */
export class APIError extends RTError {
  constructor(
    readonly statusCode: number,
    readonly detail: string,
    readonly responseBody: JsonValue | null = null
  ) {
    super(`RT API Error ${statusCode}: ${detail}`);
  }
}
