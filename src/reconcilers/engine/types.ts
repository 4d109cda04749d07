/**
 * Types for the generic resource reconciliation engine
 *
 * A resource type is described once by a {@link ResourceDescriptor}: its
 * field-mapping table, identity policy, attribute groups and remote
 * operations. The engine itself holds no per-type logic.
 */

import type { CallOptions, RegionScope } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import type { LifecycleError } from './errors.js';

// =============================================================================
// Attribute Values
// =============================================================================

/**
 * A single attribute value. `null` means unset, which is distinct from an
 * empty string or `false`.
 */
export type FieldValue = string | boolean | null;

/**
 * How a response property is copied into state
 */
export type FieldKind = 'string' | 'bool' | 'timestamp';

/**
 * Complete attribute record of a resource type
 */
export type Attributes<F extends string> = { [K in F]: FieldValue };

/**
 * Desired attributes as supplied by configuration; a missing key is unset
 */
export type DesiredAttributes<F extends string> = { [K in F]?: FieldValue };

/**
 * Mutation payload keyed by attribute name; never contains unset values
 */
export type MutationPayload<F extends string> = { [K in F]?: string | boolean };

/**
 * Locally persisted state of one resource
 */
export interface ResourceState<F extends string> {
  /** Composite handle `scopeId,resourceId` */
  handle: string;
  attributes: Attributes<F>;
}

// =============================================================================
// Descriptor
// =============================================================================

/**
 * Mapping of one attribute from the wire response
 */
export interface FieldSpec<R> {
  /** Response property the value is copied from; omitted for local-only fields */
  source?: keyof R & string;
  kind: FieldKind;
  /** Attribute documentation */
  description: string;
  /** Mapping fails with MissingRequiredField when the response omits it */
  required?: boolean;
  /** Only returned at creation; later responses keep the prior value */
  writeOnly?: boolean;
}

/**
 * Field-mapping table; the key order is the attribute order
 */
export type FieldTable<F extends string, R> = { readonly [K in F]: FieldSpec<R> };

/**
 * Where the scope fragment of the handle comes from when mapping a response
 *
 * - `hint`: the scope id already known locally always wins
 * - `response`: the response's scope property wins; the hint is the fallback
 *   for response shapes that omit it
 */
export type ScopeSource = 'hint' | 'response';

/**
 * Per-resource-type identity policy
 */
export interface IdentityPolicy<F extends string, R> {
  /** Response property that forms the resource fragment of the handle */
  idSource: keyof R & string;
  /** Attribute that carries the scope id */
  scopeField: F;
  scopeSource: ScopeSource;
  /**
   * When the response omits `idSource`, take the resource id from the handle
   * that addressed the call instead of failing
   */
  idFromHandle?: boolean;
}

/**
 * Identifiers already known locally when a response is mapped
 */
export interface MappingHint {
  scopeId: string;
  /** Resource id of the handle that addressed the call; unknown at create */
  resourceId?: string;
}

/**
 * Address of one remote resource
 */
export interface RemoteTarget extends CallOptions {
  scope: RegionScope;
  resourceId: string;
}

/**
 * Independently mutable subset of attributes bound to one remote endpoint
 */
export interface AttributeGroup<F extends string, R> {
  name: string;
  /** Mutable attributes; groups of one descriptor never share a field */
  fields: readonly F[];
  /** Read-only attributes refreshed from this group's mutation response */
  computed?: readonly F[];
  mutate(target: RemoteTarget, payload: MutationPayload<F>): Promise<R>;
}

/**
 * Remote operations of a resource type; a missing operation is unsupported
 */
export interface RemoteOperations<F extends string, R> {
  create?(scope: RegionScope, payload: MutationPayload<F>, options: CallOptions): Promise<R>;
  get(target: RemoteTarget): Promise<R>;
  delete?(target: RemoteTarget): Promise<void>;
}

/**
 * Everything the engine needs to reconcile one resource type
 */
export interface ResourceDescriptor<F extends string, R> {
  /** Resource type name, e.g. `organization` */
  kind: string;
  description: string;
  fields: FieldTable<F, R>;
  identity: IdentityPolicy<F, R>;
  /** Attributes sent with the create call */
  createFields: readonly F[];
  /** Attribute groups in evaluation order (core before dependent groups) */
  groups: readonly AttributeGroup<F, R>[];
  /** Update is rejected instead of reconciled */
  immutable?: boolean;
  remote: RemoteOperations<F, R>;
}

// =============================================================================
// Drift
// =============================================================================

/**
 * A single attribute that differs from desired state
 */
export interface FieldChange<F extends string> {
  field: F;
  observed: FieldValue;
  desired: FieldValue;
}

/**
 * Changes of one attribute group
 */
export interface GroupDrift<F extends string> {
  group: string;
  changes: FieldChange<F>[];
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Classification of a failed remote call
 */
export type ErrorClass = 'not_found' | 'transient' | 'fatal';

export type LifecycleOperation = 'create' | 'read' | 'update' | 'delete' | 'import';

/**
 * Per-invocation context supplied by the host
 */
export interface LifecycleContext {
  region: string;
  logger?: ApiLogger;
  /** Cancellation signal propagated to every remote call */
  signal?: AbortSignal;
}

/**
 * Terminal failure; `state` holds whatever was applied before the failure
 */
export interface FatalOutcome<F extends string> {
  status: 'fatal';
  error: LifecycleError;
  state?: ResourceState<F>;
}

export type CreateOutcome<F extends string> =
  | { status: 'created'; state: ResourceState<F> }
  | FatalOutcome<F>;

export type ReadOutcome<F extends string> =
  | { status: 'present'; state: ResourceState<F> }
  | { status: 'removed'; handle: string }
  | FatalOutcome<F>;

export type UpdateOutcome<F extends string> =
  | { status: 'updated'; state: ResourceState<F>; appliedGroups: string[] }
  | FatalOutcome<F>;

export type DeleteOutcome<F extends string> =
  | { status: 'deleted'; handle: string; alreadyAbsent: boolean }
  | FatalOutcome<F>;

export type ImportOutcome<F extends string> = ReadOutcome<F>;
