/**
 * Registry of reconciled resource types
 */

import type { ScfClient } from '../api/client.js';
import type { ResourceDescriptor } from './engine/types.js';
import { organizationResource, ORGANIZATION_KIND } from './organization/resource.js';
import {
  organizationManagerResource,
  ORGANIZATION_MANAGER_KIND,
} from './organization-manager/resource.js';
import { platformResource, PLATFORM_KIND } from './platform/resource.js';

export const RESOURCE_KINDS = [ORGANIZATION_KIND, ORGANIZATION_MANAGER_KIND, PLATFORM_KIND] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

/**
 * Callback that works with any descriptor
 */
export interface DescriptorVisitor<T> {
  <F extends string, R>(descriptor: ResourceDescriptor<F, R>): T;
}

export function isResourceKind(value: string): value is ResourceKind {
  return RESOURCE_KINDS.some((kind) => kind === value);
}

/**
 * Build the descriptor for a kind and hand it to a visitor
 */
export function withDescriptor<T>(
  kind: ResourceKind,
  client: ScfClient,
  visit: DescriptorVisitor<T>
): T {
  switch (kind) {
    case 'organization':
      return visit(organizationResource(client));
    case 'organization_manager':
      return visit(organizationManagerResource(client));
    case 'platform':
      return visit(platformResource(client));
  }
}
