/**
 * Organization reconciler
 *
 * Mutable in two independent groups: the core fields (name, suspended) go
 * through the organization update endpoint, the quota assignment through its
 * own sub-resource. Core is evaluated first since the quota references the
 * organization.
 */

import type { ScfClient } from '../../api/client.js';
import type { Organization } from '../../api/types.js';
import type { FieldTable, ResourceDescriptor } from '../engine/types.js';
import { defineResource } from '../engine/descriptor.js';
import { describeFields, payloadBoolean, payloadString } from '../engine/mapper.js';

export type OrganizationField =
  | 'project_id'
  | 'org_id'
  | 'name'
  | 'platform_id'
  | 'quota_id'
  | 'region'
  | 'status'
  | 'suspended'
  | 'created_at'
  | 'updated_at';

export const ORGANIZATION_KIND = 'organization';

export const ORGANIZATION_FIELDS: FieldTable<OrganizationField, Organization> = {
  project_id: {
    source: 'projectId',
    kind: 'string',
    description: 'The ID of the project associated with the organization',
  },
  org_id: {
    source: 'guid',
    kind: 'string',
    description: 'The globally unique identifier of the organization',
  },
  name: {
    source: 'name',
    kind: 'string',
    description: 'The name of the organization',
  },
  platform_id: {
    source: 'platformId',
    kind: 'string',
    description: 'The ID of the platform associated with the organization',
  },
  quota_id: {
    source: 'quotaId',
    kind: 'string',
    description: 'The ID of the quota associated with the organization',
  },
  region: {
    source: 'region',
    kind: 'string',
    description: 'The region where the organization is located',
  },
  status: {
    source: 'status',
    kind: 'string',
    description: 'The status of the organization (e.g., deleting, delete_failed)',
  },
  suspended: {
    source: 'suspended',
    kind: 'bool',
    description: 'A boolean indicating whether the organization is suspended',
  },
  created_at: {
    source: 'createdAt',
    kind: 'timestamp',
    description: 'The time when the organization was created',
  },
  updated_at: {
    source: 'updatedAt',
    kind: 'timestamp',
    description: 'The time when the organization was last updated',
  },
};

/**
 * Attribute documentation
 */
export const organizationDescriptions = describeFields(ORGANIZATION_FIELDS);

/**
 * Build the organization descriptor bound to a client
 */
export function organizationResource(
  client: ScfClient
): ResourceDescriptor<OrganizationField, Organization> {
  return defineResource<OrganizationField, Organization>({
    kind: ORGANIZATION_KIND,
    description: 'Cloud Foundry organization. The handle is structured as "project_id,org_id".',
    fields: ORGANIZATION_FIELDS,
    identity: {
      idSource: 'guid',
      scopeField: 'project_id',
      // The organization reports its own project; the create response does not
      scopeSource: 'response',
    },
    createFields: ['name', 'platform_id'],
    groups: [
      {
        name: 'core',
        fields: ['name', 'suspended'],
        computed: ['status', 'updated_at'],
        mutate: (target, payload) =>
          client.organizations.update(
            target.scope,
            target.resourceId,
            {
              name: payloadString(payload, 'name'),
              suspended: payloadBoolean(payload, 'suspended'),
            },
            { signal: target.signal }
          ),
      },
      {
        name: 'quota',
        fields: ['quota_id'],
        computed: ['updated_at'],
        mutate: (target, payload) =>
          client.organizations.assignQuota(
            target.scope,
            target.resourceId,
            { quotaId: payloadString(payload, 'quota_id') },
            { signal: target.signal }
          ),
      },
    ],
    remote: {
      async create(scope, payload, options) {
        const created = await client.organizations.create(
          scope,
          {
            name: payloadString(payload, 'name'),
            platformId: payloadString(payload, 'platform_id'),
          },
          options
        );
        return { guid: created.guid };
      },
      get: (target) =>
        client.organizations.get(target.scope, target.resourceId, { signal: target.signal }),
      delete: (target) =>
        client.organizations.delete(target.scope, target.resourceId, { signal: target.signal }),
    },
  });
}
