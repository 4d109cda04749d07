/**
 * Organization manager reconciler exports
 */

export type { OrganizationManagerField } from './resource.js';

export {
  ORGANIZATION_MANAGER_KIND,
  ORGANIZATION_MANAGER_FIELDS,
  organizationManagerDescriptions,
  organizationManagerResource,
} from './resource.js';
