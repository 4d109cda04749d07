/**
 * State mapper: wire response -> state record, and state -> mutation payload
 */

import type {
  Attributes,
  DesiredAttributes,
  FieldKind,
  FieldSpec,
  FieldTable,
  FieldValue,
  MappingHint,
  MutationPayload,
  ResourceDescriptor,
  ResourceState,
} from './types.js';
import { MissingRequiredFieldError } from './errors.js';
import { buildHandle } from './identity.js';

// =============================================================================
// Field Table Helpers
// =============================================================================

/**
 * Attribute names of a field table in declaration order
 */
export function fieldNames<F extends string, R>(table: FieldTable<F, R>): F[] {
  return Object.keys(table).filter((name): name is F => name in table);
}

/**
 * Build a complete attribute record by computing every field of a table
 */
export function mapAttributes<F extends string, R>(
  table: FieldTable<F, R>,
  value: (field: F, spec: FieldSpec<R>) => FieldValue
): Attributes<F> {
  const result: Record<string, FieldValue> = {};
  for (const field of fieldNames(table)) {
    result[field] = value(field, table[field]);
  }
  // Every key of the table was assigned above
  return result as Attributes<F>;
}

/**
 * Read-only attribute documentation table
 */
export function describeFields<F extends string, R>(
  table: FieldTable<F, R>
): Readonly<Record<F, string>> {
  return Object.freeze(mapDescriptions(table));
}

function mapDescriptions<F extends string, R>(table: FieldTable<F, R>): Record<F, string> {
  const result: Record<string, string> = {};
  for (const field of fieldNames(table)) {
    result[field] = table[field].description;
  }
  return result as Record<F, string>;
}

// =============================================================================
// Value Conversion
// =============================================================================

/**
 * Convert a wire value to a state value; anything absent or mistyped is unset
 */
export function toFieldValue(value: unknown, kind: FieldKind): FieldValue {
  switch (kind) {
    case 'string':
      return typeof value === 'string' ? value : null;
    case 'bool':
      return typeof value === 'boolean' ? value : null;
    case 'timestamp':
      return toTimestamp(value);
  }
}

/**
 * Render a timestamp as canonical ISO-8601 text
 */
function toTimestamp(value: unknown): FieldValue {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

/**
 * Read a desired value; a missing key is unset
 */
export function desiredValue<F extends string>(
  desired: DesiredAttributes<F>,
  field: F
): FieldValue {
  return desired[field] ?? null;
}

// =============================================================================
// Response -> State
// =============================================================================

/**
 * Resolve the resource id per the descriptor's identity policy
 *
 * @throws MissingRequiredFieldError when neither the response nor (where the
 *   policy allows it) the handle supplies one
 */
export function resolveResourceId<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  response: R,
  hint: MappingHint
): string {
  const { idSource, idFromHandle } = descriptor.identity;
  const value = response[idSource];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (idFromHandle && hint.resourceId !== undefined && hint.resourceId.length > 0) {
    return hint.resourceId;
  }
  throw new MissingRequiredFieldError(descriptor.kind, idSource);
}

/**
 * Resolve the scope id per the descriptor's identity policy
 */
export function resolveScopeId<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  response: R,
  hint: MappingHint
): string {
  const { scopeField, scopeSource } = descriptor.identity;
  const source = descriptor.fields[scopeField].source;
  if (scopeSource === 'response' && source !== undefined) {
    const value = response[source];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return hint.scopeId;
}

/**
 * Project a remote response onto a state record
 *
 * The handle is recomputed from the scope id and the response's resource id
 * on every call, so a stale handle never survives a read. The attribute
 * sourced from the identity property always equals the handle's resource id.
 *
 * @param hint - Identifiers already known locally
 * @param prior - Previous state; only consulted for write-only and local-only fields
 * @throws MissingRequiredFieldError if the resource id or a required field is absent
 * @throws InvalidFragmentError if the resolved fragments cannot form a handle
 */
export function toState<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  response: R,
  hint: MappingHint,
  prior?: ResourceState<F>
): ResourceState<F> {
  const resourceId = resolveResourceId(descriptor, response, hint);
  const scopeId = resolveScopeId(descriptor, response, hint);
  const { scopeField, idSource } = descriptor.identity;

  const attributes = mapAttributes(descriptor.fields, (field, spec) => {
    if (field === scopeField) {
      return scopeId;
    }
    if (spec.source === idSource) {
      return resourceId;
    }
    const kept = prior?.attributes[field] ?? null;
    if (spec.source === undefined) {
      return kept;
    }
    const value = toFieldValue(response[spec.source], spec.kind);
    if (value === null && spec.required) {
      throw new MissingRequiredFieldError(descriptor.kind, spec.source);
    }
    if (value === null && spec.writeOnly) {
      return kept;
    }
    return value;
  });

  return {
    handle: buildHandle(scopeId, resourceId),
    attributes,
  };
}

/**
 * Merge one group's mutation response into state
 *
 * Only the group's own fields (and its declared computed fields) that the
 * response actually carries are overwritten; everything else keeps its value.
 */
export function mergeGroupResponse<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  state: ResourceState<F>,
  groupFields: readonly F[],
  response: R
): ResourceState<F> {
  const touched = new Set<F>(groupFields);
  const attributes = mapAttributes(descriptor.fields, (field, spec) => {
    const current = state.attributes[field];
    if (!touched.has(field) || spec.source === undefined) {
      return current;
    }
    const raw = response[spec.source];
    return raw === undefined ? current : toFieldValue(raw, spec.kind);
  });
  return { handle: state.handle, attributes };
}

// =============================================================================
// State -> Payload
// =============================================================================

/**
 * Build a mutation payload restricted to the given fields
 *
 * Unset fields are omitted so the remote keeps its value (unset is not the
 * same as explicitly cleared).
 */
export function toMutationPayload<F extends string>(
  attributes: DesiredAttributes<F>,
  fields: readonly F[]
): MutationPayload<F> {
  const payload: MutationPayload<F> = {};
  for (const field of fields) {
    const value = desiredValue(attributes, field);
    if (value !== null) {
      payload[field] = value;
    }
  }
  return payload;
}

/**
 * Read a string from a payload
 */
export function payloadString<F extends string>(
  payload: MutationPayload<F>,
  field: F
): string | undefined {
  const value = payload[field];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a boolean from a payload
 */
export function payloadBoolean<F extends string>(
  payload: MutationPayload<F>,
  field: F
): boolean | undefined {
  const value = payload[field];
  return typeof value === 'boolean' ? value : undefined;
}
