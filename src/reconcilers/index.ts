/**
 * Reconcilers module - lifecycle management for SCF resources
 *
 * The generic engine lives in ./engine; each resource type is a descriptor.
 *
 * @module reconcilers
 */

export * as engine from './engine/index.js';
export * as organization from './organization/index.js';
export * as organizationManager from './organization-manager/index.js';
export * as platform from './platform/index.js';

export {
  RESOURCE_KINDS,
  isResourceKind,
  withDescriptor,
} from './registry.js';

export type { ResourceKind, DescriptorVisitor } from './registry.js';
