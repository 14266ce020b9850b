/**
 * Error mapping for service responses.
 * Converts status-carrying transport errors into the typed taxonomy.
 */

import {
  ApiError,
  AuthenticationError,
  ConflictError,
  NotFoundError,
} from '@vectorscope/core';

/** Entity a request addressed, used to name it in errors */
export interface ErrorTarget {
  /** Kind of entity, e.g. "collection" or "tenant" */
  readonly resource: string;
  readonly name: string;
}

/**
 * Convert a failed request's error to the typed taxonomy.
 *
 * Maps plain ApiError statuses:
 * - 401, 403 → AuthenticationError
 * - 404 → NotFoundError for the target
 * - 409 → ConflictError for the target
 * - Anything else (including non-ApiError values) → returned unchanged
 *
 * @param error - Error thrown by executeRequest
 * @param target - Entity the request addressed; omit for server-level calls
 *
 * @example
 * ```typescript
 * try {
 *   await executeRequest(transport, spec);
 * } catch (error) {
 *   throw mapServiceError(error, { resource: 'collection', name: 'docs' });
 * }
 * ```
 */
export function mapServiceError(
  error: unknown,
  target?: ErrorTarget | undefined
): unknown {
  // Already-typed subclasses pass through
  if (!(error instanceof ApiError) || error.constructor !== ApiError) {
    return error;
  }

  const status = error.status;
  if (status === 401 || status === 403) {
    return new AuthenticationError(status);
  }
  if (target === undefined) {
    return error;
  }
  if (status === 404) {
    return new NotFoundError(target.resource, target.name);
  }
  if (status === 409) {
    return new ConflictError(target.resource, target.name);
  }
  return error;
}
