/**
 * Organization reconciler exports
 */

export type { OrganizationField } from './resource.js';

export {
  ORGANIZATION_KIND,
  ORGANIZATION_FIELDS,
  organizationDescriptions,
  organizationResource,
} from './resource.js';
