/**
 * Lifecycle error classification
 *
 * The engine performs no retries of its own, so anything other than the
 * service's "resource does not exist" signal is fatal.
 */

import { ApiRequestError } from '../../api/errors.js';
import type { ErrorClass } from './types.js';

const MAX_CAUSE_DEPTH = 8;

/**
 * Find an ApiRequestError in an error or its cause chain
 */
export function findApiRequestError(error: unknown): ApiRequestError | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (current instanceof ApiRequestError) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Classify a failed remote call
 *
 * @returns `not_found` exactly when the service reported a missing resource,
 *   `fatal` for every other service or transport error
 */
export function classifyError(error: unknown): ErrorClass {
  const apiError = findApiRequestError(error);
  if (apiError?.isNotFound()) {
    return 'not_found';
  }
  return 'fatal';
}

/**
 * Whether the error means the resource no longer exists
 */
export function isNotFound(error: unknown): boolean {
  return classifyError(error) === 'not_found';
}
