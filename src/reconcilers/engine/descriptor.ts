/**
 * Resource descriptor validation
 */

import type { ResourceDescriptor } from './types.js';
import { InvalidDescriptorError } from './errors.js';
import { fieldNames } from './mapper.js';

/**
 * Validate a descriptor and return it unchanged
 *
 * Checks that groups are non-empty and disjoint, and that every referenced
 * attribute exists in the field table.
 *
 * @throws InvalidDescriptorError on the first violation
 */
export function defineResource<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>
): ResourceDescriptor<F, R> {
  const known = new Set<string>(fieldNames(descriptor.fields));
  const { kind } = descriptor;

  const requireKnown = (field: string, where: string): void => {
    if (!known.has(field)) {
      throw new InvalidDescriptorError(kind, `${where} references unknown field "${field}"`);
    }
  };

  requireKnown(descriptor.identity.scopeField, 'identity.scopeField');
  descriptor.createFields.forEach((field) => requireKnown(field, 'createFields'));

  const owner = new Map<string, string>();
  const names = new Set<string>();
  for (const group of descriptor.groups) {
    if (names.has(group.name)) {
      throw new InvalidDescriptorError(kind, `duplicate group "${group.name}"`);
    }
    names.add(group.name);

    if (group.fields.length === 0) {
      throw new InvalidDescriptorError(kind, `group "${group.name}" has no fields`);
    }
    for (const field of group.fields) {
      requireKnown(field, `group "${group.name}"`);
      const existing = owner.get(field);
      if (existing !== undefined) {
        throw new InvalidDescriptorError(
          kind,
          `field "${field}" belongs to both "${existing}" and "${group.name}"`
        );
      }
      owner.set(field, group.name);
    }
  }

  for (const group of descriptor.groups) {
    for (const field of group.computed ?? []) {
      requireKnown(field, `group "${group.name}" computed`);
      if (owner.has(field)) {
        throw new InvalidDescriptorError(
          kind,
          `computed field "${field}" of "${group.name}" is mutable in "${owner.get(field)}"`
        );
      }
    }
  }

  if (descriptor.immutable && descriptor.groups.length > 0) {
    throw new InvalidDescriptorError(kind, 'immutable resources cannot declare attribute groups');
  }

  return descriptor;
}
