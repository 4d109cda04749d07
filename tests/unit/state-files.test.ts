/**
 * Unit Tests: Desired-State and State Files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  StateFileError,
  loadState,
  parseDesired,
  parseKindDocument,
  parseState,
  readKindDocument,
  readStateKind,
  removeState,
  saveState,
} from '../../src/state/index.js';
import { toState } from '../../src/reconcilers/engine/mapper.js';
import { organizationResource } from '../../src/reconcilers/organization/index.js';
import { createMockClient, organization } from './helpers.js';

const descriptor = organizationResource(createMockClient());

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'scf-state-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('parseKindDocument', () => {
  it('splits kind and attributes', () => {
    expect(parseKindDocument({ kind: 'organization', attributes: { name: 'acme' } }, 'org.yaml')).toEqual({
      kind: 'organization',
      attributes: { name: 'acme' },
    });
  });

  it('requires a kind', () => {
    expect(() => parseKindDocument({ attributes: {} }, 'org.yaml')).toThrow('org.yaml: missing "kind"');
  });
});

describe('parseDesired', () => {
  it('keeps only supplied attributes', () => {
    expect(parseDesired(descriptor, { name: 'acme', suspended: false, quota_id: null }, 'org.yaml')).toEqual({
      name: 'acme',
      suspended: false,
      quota_id: null,
    });
  });

  it('rejects unknown attributes', () => {
    expect(() => parseDesired(descriptor, { name: 'acme', owner: 'x', size: 1 }, 'org.yaml')).toThrow(
      'org.yaml: unknown organization attribute(s): owner, size'
    );
  });

  it('rejects unsupported values', () => {
    expect(() => parseDesired(descriptor, { name: 42 }, 'org.yaml')).toThrow(
      'attribute "name" must be a string, boolean or null'
    );
  });
});

describe('readKindDocument', () => {
  it('reads YAML', () => {
    const path = join(dir, 'org.yaml');
    writeFileSync(path, 'kind: organization\nattributes:\n  project_id: proj-1\n  name: acme\n  suspended: false\n');

    expect(readKindDocument(path)).toEqual({
      kind: 'organization',
      attributes: { project_id: 'proj-1', name: 'acme', suspended: false },
    });
  });

  it('reports a missing file', () => {
    expect(() => readKindDocument(join(dir, 'missing.yaml'))).toThrow(StateFileError);
  });
});

describe('state round trip', () => {
  it('saves and loads state', () => {
    const path = join(dir, 'nested', 'org.json');
    const state = toState(descriptor, organization(), { scopeId: 'proj-1' });

    saveState(path, 'organization', state);

    expect(readStateKind(path)).toBe('organization');
    expect(loadState(descriptor, path)).toEqual(state);
    expect(readFileSync(path, 'utf-8').endsWith('}\n')).toBe(true);
  });

  it('returns null for missing state', () => {
    expect(loadState(descriptor, join(dir, 'none.json'))).toBeNull();
  });

  it('removes state', () => {
    const path = join(dir, 'org.json');
    saveState(path, 'organization', toState(descriptor, organization(), { scopeId: 'proj-1' }));
    removeState(path);
    expect(existsSync(path)).toBe(false);
  });
});

describe('parseState', () => {
  it('rejects state of another kind', () => {
    expect(() =>
      parseState(descriptor, { kind: 'platform', handle: 'proj-1,plat-1', attributes: {} }, 'org.json')
    ).toThrow('org.json: state belongs to kind platform, not organization');
  });

  it('rejects a malformed handle', () => {
    expect(() => parseState(descriptor, { kind: 'organization', handle: 'org-9' }, 'org.json')).toThrow(
      'Malformed resource handle'
    );
  });

  it('fills missing attributes with null', () => {
    const state = parseState(
      descriptor,
      { kind: 'organization', handle: 'proj-1,org-9', attributes: { name: 'acme' } },
      'org.json'
    );
    expect(state.attributes.name).toBe('acme');
    expect(state.attributes.quota_id).toBeNull();
  });
});
