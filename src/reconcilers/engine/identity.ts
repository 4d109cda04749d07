/**
 * Resource handle codec
 *
 * A handle joins the owning scope id and the remote resource id with a
 * reserved separator, e.g. `proj-1,org-9`. Handles are built once at create
 * or import time and re-asserted on every read.
 */

import { InvalidFragmentError, MalformedHandleError } from './errors.js';

/**
 * Reserved separator; never allowed inside a fragment
 */
export const HANDLE_SEPARATOR = ',';

/**
 * Decoded handle fragments
 */
export interface HandleParts {
  scopeId: string;
  resourceId: string;
}

/**
 * Validate a single fragment
 *
 * @throws InvalidFragmentError if the fragment is empty or contains the separator
 */
export function assertFragment(fragment: string, position: 'scope' | 'resource'): void {
  if (fragment.length === 0) {
    throw new InvalidFragmentError(fragment, position, 'must not be empty');
  }
  if (fragment.includes(HANDLE_SEPARATOR)) {
    throw new InvalidFragmentError(
      fragment,
      position,
      `must not contain the separator "${HANDLE_SEPARATOR}"`
    );
  }
}

/**
 * Build a handle from its fragments
 *
 * @example
 * buildHandle('proj-1', 'org-9') // 'proj-1,org-9'
 */
export function buildHandle(scopeId: string, resourceId: string): string {
  assertFragment(scopeId, 'scope');
  assertFragment(resourceId, 'resource');
  return `${scopeId}${HANDLE_SEPARATOR}${resourceId}`;
}

/**
 * Split a handle into its fragments
 *
 * @throws MalformedHandleError unless there are exactly two non-empty fragments
 */
export function decodeHandle(handle: string): HandleParts {
  const parts = handle.split(HANDLE_SEPARATOR);
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new MalformedHandleError(handle, HANDLE_SEPARATOR);
  }
  const [scopeId, resourceId] = parts;
  return { scopeId, resourceId };
}

/**
 * Whether a raw identifier looks like a composite handle
 */
export function isCompositeHandle(identifier: string): boolean {
  return identifier.includes(HANDLE_SEPARATOR);
}
