/**
 * Organization manager reconciler
 *
 * The manager is a generated user, one per organization, addressed through
 * its organization. It cannot be changed after creation, and its password is
 * only returned once, by the create call.
 */

import type { ScfClient } from '../../api/client.js';
import type { OrgManager } from '../../api/types.js';
import type { FieldTable, ResourceDescriptor } from '../engine/types.js';
import { defineResource } from '../engine/descriptor.js';
import { describeFields, payloadString } from '../engine/mapper.js';

export type OrganizationManagerField =
  | 'project_id'
  | 'org_id'
  | 'platform_id'
  | 'region'
  | 'user_id'
  | 'username'
  | 'password'
  | 'created_at'
  | 'updated_at';

export const ORGANIZATION_MANAGER_KIND = 'organization_manager';

export const ORGANIZATION_MANAGER_FIELDS: FieldTable<OrganizationManagerField, OrgManager> = {
  project_id: {
    source: 'projectId',
    kind: 'string',
    description: 'The ID of the project associated with the organization of the organization manager',
  },
  org_id: {
    source: 'orgId',
    kind: 'string',
    description: 'The ID of the organization',
  },
  platform_id: {
    source: 'platformId',
    kind: 'string',
    description: 'The ID of the platform associated with the organization of the organization manager',
  },
  region: {
    source: 'region',
    kind: 'string',
    description: 'The region where the organization of the organization manager is located',
  },
  user_id: {
    source: 'guid',
    kind: 'string',
    description: 'The ID of the organization manager user',
    required: true,
  },
  username: {
    source: 'username',
    kind: 'string',
    description: 'An auto-generated organization manager user name',
  },
  password: {
    source: 'password',
    kind: 'string',
    description: 'An auto-generated password',
    writeOnly: true,
  },
  created_at: {
    source: 'createdAt',
    kind: 'timestamp',
    description: 'The time when the organization manager was created',
  },
  updated_at: {
    source: 'updatedAt',
    kind: 'timestamp',
    description: 'The time when the organization manager was last updated',
  },
};

export const organizationManagerDescriptions = describeFields(ORGANIZATION_MANAGER_FIELDS);

/**
 * Build the organization manager descriptor bound to a client
 */
export function organizationManagerResource(
  client: ScfClient
): ResourceDescriptor<OrganizationManagerField, OrgManager> {
  return defineResource<OrganizationManagerField, OrgManager>({
    kind: ORGANIZATION_MANAGER_KIND,
    description:
      'Cloud Foundry organization manager. The handle is structured as "project_id,org_id" ' +
      'since the API addresses the manager through its organization.',
    fields: ORGANIZATION_MANAGER_FIELDS,
    identity: {
      idSource: 'orgId',
      scopeField: 'project_id',
      scopeSource: 'hint',
      // Reads address the manager by organization; the org id is already known
      idFromHandle: true,
    },
    createFields: ['org_id'],
    groups: [],
    immutable: true,
    remote: {
      async create(scope, payload, options) {
        const orgId = payloadString(payload, 'org_id');
        if (orgId === undefined) {
          throw new Error('org_id is required to create an organization manager');
        }
        return client.organizationManagers.create(scope, orgId, options);
      },
      get: (target) =>
        client.organizationManagers.get(target.scope, target.resourceId, { signal: target.signal }),
      delete: (target) =>
        client.organizationManagers.delete(target.scope, target.resourceId, {
          signal: target.signal,
        }),
    },
  });
}
