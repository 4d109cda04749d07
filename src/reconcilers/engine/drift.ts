/**
 * Drift detection and correction for the update path
 *
 * Attribute groups are evaluated in descriptor order. Each group that
 * differs gets exactly one mutation call, and only that group's returned
 * fields are merged back. A failing group stops the run; groups applied
 * before it are not rolled back, so the caller re-runs update to finish.
 */

import type {
  AttributeGroup,
  DesiredAttributes,
  FieldChange,
  GroupDrift,
  RemoteTarget,
  ResourceDescriptor,
  ResourceState,
} from './types.js';
import type { ApiLogger } from '../../api/logger.js';
import { desiredValue, fieldNames, mergeGroupResponse, toMutationPayload } from './mapper.js';
import { toError } from './errors.js';

/**
 * Result of applying drift corrections
 */
export type DriftResult<F extends string> =
  | { ok: true; state: ResourceState<F>; appliedGroups: string[] }
  | {
      ok: false;
      /** State including every group applied before the failure */
      state: ResourceState<F>;
      appliedGroups: string[];
      failedGroup: string;
      error: Error;
    };

/**
 * Compare one group between desired and observed state
 *
 * An unset desired value is never drift.
 */
export function compareGroup<F extends string, R>(
  group: AttributeGroup<F, R>,
  desired: DesiredAttributes<F>,
  observed: ResourceState<F>
): FieldChange<F>[] {
  const changes: FieldChange<F>[] = [];
  for (const field of group.fields) {
    const want = desiredValue(desired, field);
    const have = observed.attributes[field];
    if (want !== null && want !== have) {
      changes.push({ field, observed: have, desired: want });
    }
  }
  return changes;
}

/**
 * Compute the drift of every group, in evaluation order; groups without
 * changes are left out
 */
export function computeDrift<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  desired: DesiredAttributes<F>,
  observed: ResourceState<F>
): GroupDrift<F>[] {
  const drifts: GroupDrift<F>[] = [];
  for (const group of descriptor.groups) {
    const changes = compareGroup(group, desired, observed);
    if (changes.length > 0) {
      drifts.push({ group: group.name, changes });
    }
  }
  return drifts;
}

/**
 * Attributes no group can change: neither mutable nor refreshed by a mutation
 *
 * For an immutable descriptor this is every attribute.
 */
export function fixedFields<F extends string, R>(descriptor: ResourceDescriptor<F, R>): F[] {
  const owned = new Set<F>();
  for (const group of descriptor.groups) {
    group.fields.forEach((field) => owned.add(field));
    group.computed?.forEach((field) => owned.add(field));
  }
  return fieldNames(descriptor.fields).filter((field) => !owned.has(field));
}

/**
 * Set desired values of fixed attributes that differ from observed state
 *
 * These changes cannot be applied in place and must be reported, not dropped.
 */
export function computeFixedDrift<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  desired: DesiredAttributes<F>,
  observed: ResourceState<F>
): FieldChange<F>[] {
  const changes: FieldChange<F>[] = [];
  for (const field of fixedFields(descriptor)) {
    const want = desiredValue(desired, field);
    const have = observed.attributes[field];
    if (want !== null && want !== have) {
      changes.push({ field, observed: have, desired: want });
    }
  }
  return changes;
}

/**
 * Apply corrections for every drifted group against freshly observed state
 *
 * @param observed - State from the guard read just before this call
 */
export async function reconcileDrift<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  target: RemoteTarget,
  desired: DesiredAttributes<F>,
  observed: ResourceState<F>,
  log?: ApiLogger
): Promise<DriftResult<F>> {
  let state = observed;
  const appliedGroups: string[] = [];

  for (const group of descriptor.groups) {
    const changes = compareGroup(group, desired, state);
    if (changes.length === 0) {
      continue;
    }

    const payload = toMutationPayload(desired, group.fields);
    log?.debug(`Applying group ${group.name}`, {
      fields: changes.map((change) => change.field),
    });

    try {
      const response = await group.mutate(target, payload);
      state = mergeGroupResponse(
        descriptor,
        state,
        [...group.fields, ...(group.computed ?? [])],
        response
      );
      appliedGroups.push(group.name);
    } catch (err) {
      return {
        ok: false,
        state,
        appliedGroups,
        failedGroup: group.name,
        error: toError(err),
      };
    }
  }

  return { ok: true, state, appliedGroups };
}

/**
 * Format drift for display
 */
export function formatDriftSummary<F extends string>(drifts: GroupDrift<F>[]): string {
  if (drifts.length === 0) {
    return 'No drift detected';
  }
  const lines: string[] = [];
  for (const drift of drifts) {
    lines.push(`${drift.group}:`);
    for (const change of drift.changes) {
      lines.push(`  ~ ${change.field}: ${formatValue(change.observed)} -> ${formatValue(change.desired)}`);
    }
  }
  return lines.join('\n');
}

function formatValue(value: unknown): string {
  return value === null ? '(unset)' : JSON.stringify(value);
}
