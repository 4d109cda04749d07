/**
 * Error classes for the reconciliation engine
 *
 * Identity and mapping errors carry enough context (which fragment, which
 * field) to diagnose a failure without re-running with tracing enabled.
 */

import type { ErrorClass, LifecycleOperation } from './types.js';

export type ReconcileErrorCode =
  | 'INVALID_FRAGMENT'
  | 'MALFORMED_HANDLE'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FORMAT'
  | 'INVALID_DESCRIPTOR'
  | 'UNSUPPORTED_OPERATION'
  | 'IMMUTABLE_FIELD'
  | 'LIFECYCLE_FATAL';

/**
 * Base error class for reconciliation errors
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly context: Record<string, unknown> = {},
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * A handle fragment is empty or contains the separator
 */
export class InvalidFragmentError extends ReconcileError {
  constructor(
    public readonly fragment: string,
    public readonly position: 'scope' | 'resource',
    reason: string
  ) {
    super(
      `Invalid ${position} fragment ${JSON.stringify(fragment)}: ${reason}`,
      'INVALID_FRAGMENT',
      { fragment, position }
    );
    this.name = 'InvalidFragmentError';
  }
}

/**
 * A handle does not split into exactly two non-empty fragments
 */
export class MalformedHandleError extends ReconcileError {
  constructor(public readonly handle: string, separator: string) {
    super(
      `Malformed resource handle ${JSON.stringify(handle)}: expected [scope_id]${separator}[resource_id]`,
      'MALFORMED_HANDLE',
      { handle }
    );
    this.name = 'MalformedHandleError';
  }
}

/**
 * A remote response lacks a field the mapping cannot do without
 */
export class MissingRequiredFieldError extends ReconcileError {
  constructor(
    public readonly kind: string,
    public readonly field: string
  ) {
    super(
      `${kind} response is missing required field "${field}"`,
      'MISSING_REQUIRED_FIELD',
      { kind, field }
    );
    this.name = 'MissingRequiredFieldError';
  }
}

/**
 * An import identifier cannot be turned into a handle
 */
export class InvalidFormatError extends ReconcileError {
  constructor(
    public readonly identifier: string,
    separator: string
  ) {
    super(
      `Expected import identifier with format [scope_id]${separator}[resource_id]. Got: ${JSON.stringify(identifier)}`,
      'INVALID_FORMAT',
      { identifier },
      'Pass the composite identifier, or pass the scope id separately together with a bare resource id'
    );
    this.name = 'InvalidFormatError';
  }
}

/**
 * A resource descriptor violates an engine invariant
 */
export class InvalidDescriptorError extends ReconcileError {
  constructor(kind: string, reason: string) {
    super(`Invalid descriptor for ${kind}: ${reason}`, 'INVALID_DESCRIPTOR', { kind });
    this.name = 'InvalidDescriptorError';
  }
}

/**
 * The resource type does not support a lifecycle operation
 */
export class UnsupportedOperationError extends ReconcileError {
  constructor(
    public readonly kind: string,
    public readonly operation: LifecycleOperation
  ) {
    super(`${operation} not supported`, 'UNSUPPORTED_OPERATION', { kind, operation });
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Desired state changes attributes that are fixed after create
 */
export class ImmutableFieldError extends ReconcileError {
  constructor(
    public readonly kind: string,
    public readonly fields: readonly string[]
  ) {
    super(
      `${fields.join(', ')} cannot be changed after create`,
      'IMMUTABLE_FIELD',
      { kind, fields },
      `Delete and re-create the ${kind} to change ${fields.length === 1 ? 'this attribute' : 'these attributes'}`
    );
    this.name = 'ImmutableFieldError';
  }
}

/**
 * Terminal failure of a lifecycle operation
 *
 * The message keeps the failed operation, the attribute group (if any), the
 * handle and the underlying error text verbatim.
 */
export class LifecycleError extends ReconcileError {
  public readonly operation: LifecycleOperation;
  public readonly kind: string;
  public readonly group?: string;
  public readonly handle?: string;
  public readonly classification: ErrorClass;

  constructor(
    operation: LifecycleOperation,
    kind: string,
    cause: Error,
    options: { group?: string; handle?: string; classification?: ErrorClass } = {}
  ) {
    const where = [
      options.handle ? `"${options.handle}"` : undefined,
      options.group ? `in group "${options.group}"` : undefined,
    ].filter((part): part is string => part !== undefined);
    super(
      `${operation} ${kind}${where.length > 0 ? ` ${where.join(' ')}` : ''} failed: ${cause.message}`,
      'LIFECYCLE_FATAL',
      { operation, kind, group: options.group, handle: options.handle },
      cause instanceof ReconcileError ? cause.suggestion : undefined,
      { cause }
    );
    this.name = 'LifecycleError';
    this.operation = operation;
    this.kind = kind;
    this.group = options.group;
    this.handle = options.handle;
    this.classification = options.classification ?? 'fatal';
  }
}

/**
 * Type guard to check if an error is a ReconcileError
 */
export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isReconcileError(error)) {
    return error.toUserMessage();
  }
  return `Error: ${toError(error).message}`;
}
