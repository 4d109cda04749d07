/**
 * Generic reconciliation engine exports
 *
 * Resource types plug in through a ResourceDescriptor; see the
 * organization, organization-manager and platform reconcilers.
 */

export type {
  FieldValue,
  FieldKind,
  Attributes,
  DesiredAttributes,
  MutationPayload,
  ResourceState,
  FieldSpec,
  FieldTable,
  ScopeSource,
  IdentityPolicy,
  MappingHint,
  RemoteTarget,
  AttributeGroup,
  RemoteOperations,
  ResourceDescriptor,
  FieldChange,
  GroupDrift,
  ErrorClass,
  LifecycleOperation,
  LifecycleContext,
  FatalOutcome,
  CreateOutcome,
  ReadOutcome,
  UpdateOutcome,
  DeleteOutcome,
  ImportOutcome,
} from './types.js';

export {
  ReconcileError,
  InvalidFragmentError,
  MalformedHandleError,
  MissingRequiredFieldError,
  InvalidFormatError,
  InvalidDescriptorError,
  UnsupportedOperationError,
  ImmutableFieldError,
  LifecycleError,
  isReconcileError,
  toError,
  formatError,
} from './errors.js';

export type { ReconcileErrorCode } from './errors.js';

export {
  HANDLE_SEPARATOR,
  assertFragment,
  buildHandle,
  decodeHandle,
  isCompositeHandle,
} from './identity.js';

export type { HandleParts } from './identity.js';

export {
  fieldNames,
  mapAttributes,
  describeFields,
  toFieldValue,
  desiredValue,
  resolveResourceId,
  resolveScopeId,
  toState,
  mergeGroupResponse,
  toMutationPayload,
  payloadString,
  payloadBoolean,
} from './mapper.js';

export {
  compareGroup,
  computeDrift,
  fixedFields,
  computeFixedDrift,
  reconcileDrift,
  formatDriftSummary,
} from './drift.js';

export type { DriftResult } from './drift.js';

export { classifyError, findApiRequestError, isNotFound } from './classify.js';

export { defineResource } from './descriptor.js';

export {
  createResource,
  readResource,
  resolveImportHandle,
  importResource,
  updateResource,
  deleteResource,
} from './lifecycle.js';

export type { ImportOptions } from './lifecycle.js';
