/**
 * Platform reconciler (read-only)
 *
 * Platforms are provisioned by the provider; they can be read and imported
 * but never created, changed or deleted.
 */

import type { ScfClient } from '../../api/client.js';
import type { Platform } from '../../api/types.js';
import type { FieldTable, ResourceDescriptor } from '../engine/types.js';
import { defineResource } from '../engine/descriptor.js';
import { describeFields } from '../engine/mapper.js';

export type PlatformField =
  | 'project_id'
  | 'platform_id'
  | 'system_id'
  | 'display_name'
  | 'region'
  | 'api_url'
  | 'console_url';

export const PLATFORM_KIND = 'platform';

export const PLATFORM_FIELDS: FieldTable<PlatformField, Platform> = {
  // Platform responses carry no project; it always comes from the handle
  project_id: {
    kind: 'string',
    description: 'The ID of the project associated with the platform',
  },
  platform_id: {
    source: 'guid',
    kind: 'string',
    description: 'The unique id of the platform',
  },
  system_id: {
    source: 'systemId',
    kind: 'string',
    description: 'The ID of the platform System',
  },
  display_name: {
    source: 'displayName',
    kind: 'string',
    description: 'The name of the platform',
  },
  region: {
    source: 'region',
    kind: 'string',
    description: 'The region where the platform is located',
  },
  api_url: {
    source: 'api',
    kind: 'string',
    description: 'The CF API Url of the platform',
  },
  console_url: {
    source: 'console',
    kind: 'string',
    description: 'The Stratos URL of the platform',
  },
};

export const platformDescriptions = describeFields(PLATFORM_FIELDS);

/**
 * Build the platform descriptor bound to a client
 */
export function platformResource(client: ScfClient): ResourceDescriptor<PlatformField, Platform> {
  return defineResource<PlatformField, Platform>({
    kind: PLATFORM_KIND,
    description: 'Cloud Foundry platform. The handle is structured as "project_id,platform_id".',
    fields: PLATFORM_FIELDS,
    identity: {
      idSource: 'guid',
      scopeField: 'project_id',
      scopeSource: 'hint',
    },
    createFields: [],
    groups: [],
    immutable: true,
    remote: {
      get: (target) =>
        client.platforms.get(target.scope, target.resourceId, { signal: target.signal }),
    },
  });
}
