/**
 * Unit Tests: State Mapper
 *
 * Response -> state projection, group merges and mutation payloads.
 */

import { describe, it, expect } from 'vitest';
import {
  describeFields,
  fieldNames,
  mergeGroupResponse,
  toFieldValue,
  toMutationPayload,
  toState,
} from '../../src/reconcilers/engine/mapper.js';
import { MissingRequiredFieldError } from '../../src/reconcilers/engine/errors.js';
import {
  organizationResource,
  type OrganizationField,
} from '../../src/reconcilers/organization/index.js';
import { organizationManagerResource } from '../../src/reconcilers/organization-manager/index.js';
import { platformResource } from '../../src/reconcilers/platform/index.js';
import { createMockClient, organization, orgManager, platform } from './helpers.js';

const client = createMockClient();
const orgDescriptor = organizationResource(client);
const managerDescriptor = organizationManagerResource(client);
const platformDescriptor = platformResource(client);

describe('toFieldValue', () => {
  it('keeps strings and booleans of the right kind', () => {
    expect(toFieldValue('acme', 'string')).toBe('acme');
    expect(toFieldValue(false, 'bool')).toBe(false);
    expect(toFieldValue('', 'string')).toBe('');
  });

  it('treats absent or mistyped values as unset', () => {
    expect(toFieldValue(undefined, 'string')).toBeNull();
    expect(toFieldValue('true', 'bool')).toBeNull();
    expect(toFieldValue(1, 'string')).toBeNull();
  });

  it('renders timestamps as ISO-8601', () => {
    expect(toFieldValue('2024-01-02T03:04:05Z', 'timestamp')).toBe('2024-01-02T03:04:05.000Z');
    expect(toFieldValue(new Date(Date.UTC(2024, 0, 2)), 'timestamp')).toBe('2024-01-02T00:00:00.000Z');
    expect(toFieldValue(undefined, 'timestamp')).toBeNull();
  });

  it('keeps an unparseable timestamp verbatim', () => {
    expect(toFieldValue('yesterday-ish', 'timestamp')).toBe('yesterday-ish');
  });
});

describe('toState', () => {
  it('maps a sparse response with unset fields and a composite handle', () => {
    const state = toState(orgDescriptor, { guid: 'g1', name: 'acme' }, { scopeId: 'proj-1' });

    expect(state.handle).toBe('proj-1,g1');
    expect(state.attributes).toEqual({
      project_id: 'proj-1',
      org_id: 'g1',
      name: 'acme',
      platform_id: null,
      quota_id: null,
      region: null,
      status: null,
      suspended: null,
      created_at: null,
      updated_at: null,
    });
  });

  it('returns attributes in field table order', () => {
    const state = toState(orgDescriptor, organization(), { scopeId: 'proj-1' });
    expect(Object.keys(state.attributes)).toEqual(fieldNames(orgDescriptor.fields));
  });

  it('is idempotent for the same response', () => {
    const response = organization({ suspended: true });
    const first = toState(orgDescriptor, response, { scopeId: 'proj-1' });
    const second = toState(orgDescriptor, response, { scopeId: 'proj-1' }, first);
    expect(second).toEqual(first);
  });

  it('prefers the response project for organizations', () => {
    const state = toState(orgDescriptor, organization({ projectId: 'proj-2' }), { scopeId: 'proj-1' });
    expect(state.handle).toBe('proj-2,org-9');
    expect(state.attributes.project_id).toBe('proj-2');
  });

  it('falls back to the hint when the response carries no project', () => {
    const state = toState(orgDescriptor, organization({ projectId: undefined }), { scopeId: 'proj-1' });
    expect(state.handle).toBe('proj-1,org-9');
  });

  it('always uses the hint for organization managers', () => {
    const state = toState(managerDescriptor, orgManager({ projectId: 'proj-2' }), { scopeId: 'proj-1' });
    expect(state.handle).toBe('proj-1,org-9');
    expect(state.attributes.project_id).toBe('proj-1');
    expect(state.attributes.user_id).toBe('user-5');
  });

  it('takes the manager org id from the handle when the response omits it', () => {
    const state = toState(managerDescriptor, orgManager({ orgId: undefined }), {
      scopeId: 'proj-1',
      resourceId: 'org-9',
    });
    expect(state.handle).toBe('proj-1,org-9');
    expect(state.attributes.org_id).toBe('org-9');
    expect(state.attributes.user_id).toBe('user-5');
  });

  it('fails when a manager response has no org id and no handle', () => {
    expect(() => toState(managerDescriptor, orgManager({ orgId: undefined }), { scopeId: 'proj-1' })).toThrow(
      'organization_manager response is missing required field "orgId"'
    );
  });

  it('fails when the resource id is missing', () => {
    expect(() => toState(orgDescriptor, { name: 'acme' }, { scopeId: 'proj-1' })).toThrow(
      'organization response is missing required field "guid"'
    );
  });

  it('fails when a required field is missing', () => {
    expect(() => toState(managerDescriptor, orgManager({ guid: undefined }), { scopeId: 'proj-1' })).toThrow(
      MissingRequiredFieldError
    );
  });

  it('keeps a write-only value the response no longer returns', () => {
    const created = toState(managerDescriptor, orgManager({ password: 'test-secret' }), { scopeId: 'proj-1' });
    const refreshed = toState(managerDescriptor, orgManager(), { scopeId: 'proj-1' }, created);
    expect(created.attributes.password).toBe('test-secret');
    expect(refreshed.attributes.password).toBe('test-secret');
  });

  it('takes local-only fields from the handle for platforms', () => {
    const state = toState(platformDescriptor, platform(), { scopeId: 'proj-1' });
    expect(state.handle).toBe('proj-1,plat-1');
    expect(state.attributes.project_id).toBe('proj-1');
    expect(state.attributes.api_url).toBe('https://api.cf.test');
  });

  it('rejects a scope hint containing the separator', () => {
    expect(() => toState(platformDescriptor, platform(), { scopeId: 'a,b' })).toThrow('Invalid scope fragment');
  });
});

describe('mergeGroupResponse', () => {
  it('overwrites only fields the group owns and the response carries', () => {
    const state = toState(orgDescriptor, organization(), { scopeId: 'proj-1' });
    const merged = mergeGroupResponse(
      orgDescriptor,
      state,
      ['quota_id', 'updated_at'],
      { quotaId: 'quota-large', name: 'renamed', updatedAt: '2024-02-01T00:00:00Z' }
    );

    expect(merged.attributes.quota_id).toBe('quota-large');
    expect(merged.attributes.updated_at).toBe('2024-02-01T00:00:00.000Z');
    expect(merged.attributes.name).toBe('acme');
    expect(merged.handle).toBe(state.handle);
  });

  it('keeps owned fields the response omits', () => {
    const state = toState(orgDescriptor, organization(), { scopeId: 'proj-1' });
    const merged = mergeGroupResponse(orgDescriptor, state, ['name', 'suspended'], { suspended: true });
    expect(merged.attributes.name).toBe('acme');
    expect(merged.attributes.suspended).toBe(true);
  });
});

describe('toMutationPayload', () => {
  it('omits unset and foreign fields', () => {
    const payload = toMutationPayload<OrganizationField>(
      { name: 'acme', suspended: null, quota_id: 'q1' },
      ['name', 'suspended']
    );
    expect(payload).toEqual({ name: 'acme' });
  });

  it('keeps false and empty string', () => {
    expect(toMutationPayload({ name: '', suspended: false }, ['name', 'suspended'])).toEqual({
      name: '',
      suspended: false,
    });
  });
});

describe('describeFields', () => {
  it('documents every attribute', () => {
    const descriptions = describeFields(orgDescriptor.fields);
    expect(Object.keys(descriptions)).toEqual(fieldNames(orgDescriptor.fields));
    expect(descriptions.quota_id).toBe('The ID of the quota associated with the organization');
    expect(Object.isFrozen(descriptions)).toBe(true);
  });
});
