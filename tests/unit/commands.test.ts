/**
 * Unit Tests: CLI Commands
 *
 * Commands run against an in-memory client and a temporary state directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  applyCommand,
  deleteCommand,
  describeCommand,
  importCommand,
  readCommand,
} from '../../src/commands/index.js';
import type { ScfClient } from '../../src/api/client.js';
import type { CommandContext } from '../../src/types.js';
import { resolveSettings } from '../../src/config/index.js';
import {
  captureLogger,
  createMockClient,
  notFound,
  organization,
  orgManager,
  type MockClientOverrides,
} from './helpers.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'scf-cmd-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function context(client: ScfClient): CommandContext {
  return {
    options: { json: true, verbose: false },
    outputFormat: 'json',
    settings: resolveSettings({ configPath: join(dir, 'none.yaml') }, {}),
    client,
    logger: captureLogger().logger,
  };
}

function contextWith(overrides: MockClientOverrides): CommandContext {
  return context(createMockClient(overrides));
}

function writeDesired(body: string): string {
  const path = join(dir, 'org.yaml');
  writeFileSync(path, body);
  return path;
}

function readStateFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

const desiredOrg = 'kind: organization\nattributes:\n  project_id: proj-1\n  name: acme\n  platform_id: plat-1\n';
const desiredManager = 'kind: organization_manager\nattributes:\n  project_id: proj-1\n  org_id: org-9\n';

describe('applyCommand', () => {
  it('creates the resource and writes state when none exists', async () => {
    const file = writeDesired(desiredOrg);
    const state = join(dir, 'org.json');
    const ctx = contextWith({
      organizations: {
        create: vi.fn().mockResolvedValue({ guid: 'org-9' }),
        get: vi.fn().mockResolvedValue(organization()),
      },
    });

    const result = await applyCommand(ctx, { file, state });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Created organization proj-1,org-9');
    expect(readStateFile(state)).toMatchObject({
      kind: 'organization',
      handle: 'proj-1,org-9',
      attributes: { name: 'acme', quota_id: 'quota-default' },
    });
  });

  it('updates drifted groups of an existing resource', async () => {
    const state = join(dir, 'org.json');
    const ctx = contextWith({
      organizations: {
        create: vi.fn().mockResolvedValue({ guid: 'org-9' }),
        get: vi.fn().mockResolvedValue(organization()),
        update: vi.fn().mockResolvedValue(organization({ name: 'acme-2' })),
      },
    });
    await applyCommand(ctx, { file: writeDesired(desiredOrg), state });

    const file = writeDesired(desiredOrg.replace('name: acme', 'name: acme-2'));
    const result = await applyCommand(ctx, { file, state });

    expect(result.success).toBe(true);
    expect(result.data?.appliedGroups).toEqual(['core']);
    expect(readStateFile(state)).toMatchObject({ attributes: { name: 'acme-2' } });
  });

  it('plans without mutating in dry-run mode', async () => {
    const state = join(dir, 'org.json');
    const update = vi.fn();
    const ctx = contextWith({
      organizations: {
        create: vi.fn().mockResolvedValue({ guid: 'org-9' }),
        get: vi.fn().mockResolvedValue(organization()),
        update,
      },
    });
    await applyCommand(ctx, { file: writeDesired(desiredOrg), state });

    const file = writeDesired(desiredOrg.replace('name: acme', 'name: acme-2'));
    const result = await applyCommand(ctx, { file, state, dryRun: true });

    expect(result.message).toBe('1 group(s) would be updated');
    expect(result.data?.drift).toEqual([
      { group: 'core', changes: [{ field: 'name', observed: 'acme', desired: 'acme-2' }] },
    ]);
    expect(update).not.toHaveBeenCalled();
  });

  it('keeps partial state when a dependent group fails', async () => {
    const state = join(dir, 'org.json');
    const ctx = contextWith({
      organizations: {
        create: vi.fn().mockResolvedValue({ guid: 'org-9' }),
        assignQuota: vi.fn().mockRejectedValue(new Error('quota is exhausted')),
      },
    });

    const result = await applyCommand(ctx, {
      file: writeDesired(desiredOrg + '  quota_id: quota-large\n'),
      state,
    });

    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'create organization "proj-1,org-9" in group "quota" failed: quota is exhausted',
    ]);
    expect(readStateFile(state)).toMatchObject({ handle: 'proj-1,org-9' });
  });

  it('plans the removal of a resource that no longer exists', async () => {
    const state = join(dir, 'org.json');
    writeFileSync(state, JSON.stringify({ kind: 'organization', handle: 'proj-1,org-9', attributes: {} }));
    const ctx = contextWith({ organizations: { get: vi.fn().mockRejectedValue(notFound()) } });

    const result = await applyCommand(ctx, { file: writeDesired(desiredOrg), state, dryRun: true });

    expect(result).toEqual({
      success: true,
      message: 'organization proj-1,org-9 no longer exists and would be discarded',
      data: { kind: 'organization', handle: 'proj-1,org-9', status: 'removed' },
    });
    expect(existsSync(state)).toBe(true);
  });

  it('fails on a change to an attribute fixed at create', async () => {
    const state = join(dir, 'org.json');
    const update = vi.fn();
    const ctx = contextWith({
      organizations: {
        create: vi.fn().mockResolvedValue({ guid: 'org-9' }),
        get: vi.fn().mockResolvedValue(organization()),
        update,
      },
    });
    await applyCommand(ctx, { file: writeDesired(desiredOrg), state });

    const file = writeDesired(desiredOrg.replace('platform_id: plat-1', 'platform_id: plat-2'));
    const plan = await applyCommand(ctx, { file, state, dryRun: true });
    const result = await applyCommand(ctx, { file, state });

    expect(plan.success).toBe(false);
    expect(plan.message).toBe('Update would be rejected: platform_id cannot be changed after create');
    expect(plan.data?.rejected).toEqual([{ field: 'platform_id', observed: 'plat-1', desired: 'plat-2' }]);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'update organization "proj-1,org-9" failed: platform_id cannot be changed after create',
    ]);
    expect(update).not.toHaveBeenCalled();
  });

  it('re-applies an unchanged organization manager without updating it', async () => {
    const state = join(dir, 'manager.json');
    const ctx = contextWith({
      organizationManagers: {
        create: vi.fn().mockResolvedValue(orgManager({ password: 'test-secret' })),
        get: vi.fn().mockResolvedValue(orgManager()),
      },
    });
    const file = writeDesired(desiredManager);
    await applyCommand(ctx, { file, state });

    const plan = await applyCommand(ctx, { file, state, dryRun: true });
    const result = await applyCommand(ctx, { file, state });

    expect(plan.message).toBe('No drift detected');
    expect(result).toEqual({
      success: true,
      message: 'organization_manager proj-1,org-9 is up to date',
      data: { kind: 'organization_manager', handle: 'proj-1,org-9', status: 'present', appliedGroups: [] },
    });
    expect(readStateFile(state)).toMatchObject({ attributes: { password: 'test-secret' } });
  });

  it('rejects moving an organization manager to another organization', async () => {
    const state = join(dir, 'manager.json');
    const ctx = contextWith({
      organizationManagers: {
        create: vi.fn().mockResolvedValue(orgManager()),
        get: vi.fn().mockResolvedValue(orgManager()),
      },
    });
    await applyCommand(ctx, { file: writeDesired(desiredManager), state });

    const file = writeDesired(desiredManager.replace('org_id: org-9', 'org_id: org-10'));
    const plan = await applyCommand(ctx, { file, state, dryRun: true });
    const result = await applyCommand(ctx, { file, state });

    expect(plan.data?.rejected).toEqual([{ field: 'org_id', observed: 'org-9', desired: 'org-10' }]);
    expect(result.success).toBe(false);
    expect(result.errors).toEqual([
      'update organization_manager "proj-1,org-9" failed: update not supported',
    ]);
  });

  it('rejects an unknown kind', async () => {
    const file = writeDesired('kind: space\nattributes: {}\n');
    await expect(applyCommand(context(createMockClient()), { file, state: join(dir, 's.json') })).rejects.toThrow(
      'Unknown resource kind "space". Supported: organization, organization_manager, platform'
    );
  });
});

describe('readCommand', () => {
  it('discards state of a resource that no longer exists', async () => {
    const state = join(dir, 'org.json');
    writeFileSync(state, JSON.stringify({ kind: 'organization', handle: 'proj-1,org-9', attributes: {} }));
    const ctx = contextWith({ organizations: { get: vi.fn().mockRejectedValue(notFound()) } });

    const result = await readCommand(ctx, { state });

    expect(result).toEqual({
      success: true,
      message: 'organization proj-1,org-9 no longer exists',
      data: { kind: 'organization', handle: 'proj-1,org-9', status: 'removed' },
    });
    expect(existsSync(state)).toBe(false);
  });
});

describe('importCommand', () => {
  it('writes state for an imported resource', async () => {
    const state = join(dir, 'org.json');
    const ctx = contextWith({ organizations: { get: vi.fn().mockResolvedValue(organization()) } });

    const result = await importCommand(ctx, { kind: 'organization', identifier: 'org-9', scope: 'proj-1', state });

    expect(result.success).toBe(true);
    expect(readStateFile(state)).toMatchObject({ kind: 'organization', handle: 'proj-1,org-9' });
  });

  it('refuses to overwrite existing state', async () => {
    const state = join(dir, 'org.json');
    writeFileSync(state, '{}');

    await expect(
      importCommand(context(createMockClient()), { kind: 'organization', identifier: 'proj-1,org-9', state })
    ).rejects.toThrow('state file already exists');
  });
});

describe('deleteCommand', () => {
  it('removes state after deleting', async () => {
    const state = join(dir, 'org.json');
    writeFileSync(state, JSON.stringify({ kind: 'organization', handle: 'proj-1,org-9', attributes: {} }));
    const ctx = contextWith({ organizations: { delete: vi.fn().mockRejectedValue(notFound()) } });

    const result = await deleteCommand(ctx, { state });

    expect(result.message).toBe('organization proj-1,org-9 was already gone');
    expect(result.data?.alreadyAbsent).toBe(true);
    expect(existsSync(state)).toBe(false);
  });
});

describe('describeCommand', () => {
  it('documents every resource type', () => {
    const result = describeCommand(context(createMockClient()));
    expect(result.data?.map((entry) => entry.kind)).toEqual([
      'organization',
      'organization_manager',
      'platform',
    ]);
  });

  it('documents the attributes of one kind', () => {
    const result = describeCommand(context(createMockClient()), 'platform');
    expect(result.data?.[0].attributes.console_url).toBe('The Stratos URL of the platform');
  });
});
