/**
 * Lifecycle orchestration: create, read, update, delete and import
 *
 * Every entry point is stateless: desired and observed state come in as
 * values, the new state goes out in the outcome, and the caller persists it.
 * Remote failures never throw out of these functions; they end in a `fatal`
 * outcome (or `removed`/`deleted` when the resource is gone).
 */

import type {
  CreateOutcome,
  DeleteOutcome,
  DesiredAttributes,
  FatalOutcome,
  ImportOutcome,
  LifecycleContext,
  LifecycleOperation,
  MappingHint,
  ReadOutcome,
  RemoteTarget,
  ResourceDescriptor,
  ResourceState,
  UpdateOutcome,
} from './types.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { classifyError } from './classify.js';
import { computeFixedDrift, reconcileDrift } from './drift.js';
import {
  ImmutableFieldError,
  InvalidFormatError,
  LifecycleError,
  UnsupportedOperationError,
  toError,
} from './errors.js';
import {
  HANDLE_SEPARATOR,
  assertFragment,
  buildHandle,
  decodeHandle,
  isCompositeHandle,
} from './identity.js';
import { desiredValue, toMutationPayload, toState } from './mapper.js';

/**
 * Options for import
 */
export interface ImportOptions {
  /** Scope id supplied out of band, for identifiers that carry only the resource id */
  scopeId?: string;
}

// =============================================================================
// Helpers
// =============================================================================

function operationLogger(
  ctx: LifecycleContext,
  kind: string,
  operation: LifecycleOperation,
  handle?: string
): ApiLogger {
  return (ctx.logger ?? defaultLogger).child({
    kind,
    operation,
    ...(handle !== undefined && { handle }),
  });
}

function targetFor(handle: string, ctx: LifecycleContext): RemoteTarget {
  const { scopeId, resourceId } = decodeHandle(handle);
  return {
    scope: { projectId: scopeId, region: ctx.region },
    resourceId,
    signal: ctx.signal,
  };
}

function hintFor(target: RemoteTarget): MappingHint {
  return { scopeId: target.scope.projectId, resourceId: target.resourceId };
}

function fatal<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  operation: LifecycleOperation,
  err: unknown,
  log: ApiLogger,
  options: { handle?: string; group?: string; state?: ResourceState<F> } = {}
): FatalOutcome<F> {
  const cause = toError(err);
  const error = new LifecycleError(operation, descriptor.kind, cause, {
    group: options.group,
    handle: options.handle,
    classification: classifyError(cause),
  });
  log.error(`Error during ${operation} of ${descriptor.kind}`, error);
  return { status: 'fatal', error, state: options.state };
}

// =============================================================================
// Create
// =============================================================================

/**
 * Create a resource from desired state
 *
 * Issues the create call, then one call per attribute group whose supplied
 * fields were not part of the create payload, then reads the resource back.
 * A failure after the create call still returns the state known so far, so
 * the caller can track the resource that now exists.
 */
export async function createResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  desired: DesiredAttributes<F>,
  ctx: LifecycleContext
): Promise<CreateOutcome<F>> {
  const log = operationLogger(ctx, descriptor.kind, 'create');
  const { create } = descriptor.remote;
  if (!create) {
    return fatal(descriptor, 'create', new UnsupportedOperationError(descriptor.kind, 'create'), log);
  }

  const scopeValue = desiredValue(desired, descriptor.identity.scopeField);
  const scopeId = typeof scopeValue === 'string' ? scopeValue : '';
  try {
    assertFragment(scopeId, 'scope');
  } catch (err) {
    return fatal(descriptor, 'create', err, log);
  }

  const scope = { projectId: scopeId, region: ctx.region };
  let created: ResourceState<F>;
  try {
    const response = await create(scope, toMutationPayload(desired, descriptor.createFields), {
      signal: ctx.signal,
    });
    created = toState(descriptor, response, { scopeId });
  } catch (err) {
    return fatal(descriptor, 'create', err, log);
  }

  const handle = created.handle;
  const target = targetFor(handle, ctx);
  log.debug('Resource created, applying dependent groups', { handle });

  for (const group of descriptor.groups) {
    const fields = group.fields.filter((field) => !descriptor.createFields.includes(field));
    const payload = toMutationPayload(desired, fields);
    if (Object.keys(payload).length === 0) {
      continue;
    }
    try {
      await group.mutate(target, payload);
    } catch (err) {
      return fatal(descriptor, 'create', err, log, { handle, group: group.name, state: created });
    }
  }

  try {
    const response = await descriptor.remote.get(target);
    const state = toState(descriptor, response, hintFor(target), created);
    log.info(`${descriptor.kind} created`, { handle: state.handle });
    return { status: 'created', state };
  } catch (err) {
    return fatal(descriptor, 'create', err, log, { handle, state: created });
  }
}

// =============================================================================
// Read / Import
// =============================================================================

async function readHandle<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  operation: LifecycleOperation,
  handle: string,
  ctx: LifecycleContext,
  prior?: ResourceState<F>
): Promise<ReadOutcome<F>> {
  const log = operationLogger(ctx, descriptor.kind, operation, handle);

  let target: RemoteTarget;
  try {
    target = targetFor(handle, ctx);
  } catch (err) {
    return fatal(descriptor, operation, err, log, { handle });
  }

  let response: R;
  try {
    response = await descriptor.remote.get(target);
  } catch (err) {
    if (classifyError(err) === 'not_found') {
      log.info(`${descriptor.kind} no longer exists, removing from state`);
      return { status: 'removed', handle };
    }
    return fatal(descriptor, operation, err, log, { handle });
  }

  try {
    const state = toState(descriptor, response, hintFor(target), prior);
    log.info(`read ${descriptor.kind} ${state.handle}`);
    return { status: 'present', state };
  } catch (err) {
    return fatal(descriptor, operation, err, log, { handle });
  }
}

/**
 * Refresh state from the remote
 *
 * @param prior - Last persisted state, used to keep write-only attributes
 */
export async function readResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  handle: string,
  ctx: LifecycleContext,
  prior?: ResourceState<F>
): Promise<ReadOutcome<F>> {
  return readHandle(descriptor, 'read', handle, ctx, prior);
}

/**
 * Resolve an external identifier to a handle
 *
 * @throws MalformedHandleError for a composite identifier with bad fragments
 * @throws InvalidFormatError for a bare resource id without an out-of-band scope id
 */
export function resolveImportHandle(identifier: string, options: ImportOptions = {}): string {
  if (isCompositeHandle(identifier)) {
    const { scopeId, resourceId } = decodeHandle(identifier);
    return buildHandle(scopeId, resourceId);
  }
  if (options.scopeId === undefined || options.scopeId === '') {
    throw new InvalidFormatError(identifier, HANDLE_SEPARATOR);
  }
  return buildHandle(options.scopeId, identifier);
}

/**
 * Bring an existing remote resource under management
 */
export async function importResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  identifier: string,
  ctx: LifecycleContext,
  options: ImportOptions = {}
): Promise<ImportOutcome<F>> {
  let handle: string;
  try {
    handle = resolveImportHandle(identifier, options);
  } catch (err) {
    return fatal(descriptor, 'import', err, operationLogger(ctx, descriptor.kind, 'import'), {
      handle: identifier,
    });
  }
  return readHandle(descriptor, 'import', handle, ctx);
}

// =============================================================================
// Update
// =============================================================================

/**
 * Reconcile desired state against a fresh read of the remote
 *
 * A set desired value that differs on an attribute no group can change fails
 * the update before any mutation is issued.
 *
 * @param observed - Last persisted state; returned unchanged on rejection
 */
export async function updateResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  handle: string,
  desired: DesiredAttributes<F>,
  observed: ResourceState<F>,
  ctx: LifecycleContext
): Promise<UpdateOutcome<F>> {
  const log = operationLogger(ctx, descriptor.kind, 'update', handle);

  if (descriptor.immutable) {
    return fatal(descriptor, 'update', new UnsupportedOperationError(descriptor.kind, 'update'), log, {
      handle,
      state: observed,
    });
  }

  let target: RemoteTarget;
  let fresh: ResourceState<F>;
  try {
    target = targetFor(handle, ctx);
    const response = await descriptor.remote.get(target);
    fresh = toState(descriptor, response, hintFor(target), observed);
  } catch (err) {
    return fatal(descriptor, 'update', err, log, { handle, state: observed });
  }

  const fixed = computeFixedDrift(descriptor, desired, fresh);
  if (fixed.length > 0) {
    const fields = fixed.map((change) => change.field);
    return fatal(descriptor, 'update', new ImmutableFieldError(descriptor.kind, fields), log, {
      handle,
      state: fresh,
    });
  }

  const result = await reconcileDrift(descriptor, target, desired, fresh, log);
  if (!result.ok) {
    return fatal(descriptor, 'update', result.error, log, {
      handle,
      group: result.failedGroup,
      state: result.state,
    });
  }

  if (result.appliedGroups.length === 0) {
    log.info(`${descriptor.kind} already up to date`);
  } else {
    log.info(`${descriptor.kind} updated`, { groups: result.appliedGroups });
  }
  return { status: 'updated', state: result.state, appliedGroups: result.appliedGroups };
}

// =============================================================================
// Delete
// =============================================================================

/**
 * Delete a resource; a resource that is already gone counts as deleted
 */
export async function deleteResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  handle: string,
  ctx: LifecycleContext
): Promise<DeleteOutcome<F>> {
  const log = operationLogger(ctx, descriptor.kind, 'delete', handle);
  const remove = descriptor.remote.delete;
  if (!remove) {
    return fatal(descriptor, 'delete', new UnsupportedOperationError(descriptor.kind, 'delete'), log, {
      handle,
    });
  }

  try {
    await remove(targetFor(handle, ctx));
  } catch (err) {
    if (classifyError(err) === 'not_found') {
      log.info(`${descriptor.kind} already deleted`);
      return { status: 'deleted', handle, alreadyAbsent: true };
    }
    return fatal(descriptor, 'delete', err, log, { handle });
  }

  log.info(`${descriptor.kind} deleted`);
  return { status: 'deleted', handle, alreadyAbsent: false };
}
