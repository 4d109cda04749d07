/**
 * Desired-state and persisted-state files
 *
 * The engine never persists anything; the CLI keeps one JSON state file per
 * resource, keyed by its handle, and reads desired state from YAML:
 *
 * ```yaml
 * kind: organization
 * attributes:
 *   project_id: 6f1c...
 *   name: acme
 * ```
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  DesiredAttributes,
  FieldValue,
  ResourceDescriptor,
  ResourceState,
} from '../reconcilers/engine/types.js';
import { fieldNames, mapAttributes } from '../reconcilers/engine/mapper.js';
import { decodeHandle } from '../reconcilers/engine/identity.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A document naming its resource kind
 */
export interface KindDocument {
  kind: string;
  attributes: Record<string, unknown>;
}

/**
 * Persisted state file format
 */
export interface StateFile {
  kind: string;
  handle: string;
  attributes: Record<string, FieldValue>;
}

/**
 * Error thrown when a desired or state file is unreadable or invalid
 */
export class StateFileError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`${path}: ${reason}`);
    this.name = 'StateFileError';
  }
}

// =============================================================================
// Parsing
// =============================================================================

function toRecord(value: unknown, path: string, what: string): Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new StateFileError(path, `${what} must be a mapping`);
  }
  return Object.fromEntries(Object.entries(value));
}

function toFieldValue(value: unknown, path: string, field: string): FieldValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  throw new StateFileError(path, `attribute "${field}" must be a string, boolean or null`);
}

/**
 * Split a parsed document into kind and raw attributes
 */
export function parseKindDocument(raw: unknown, path: string): KindDocument {
  const record = toRecord(raw, path, 'document');
  if (typeof record.kind !== 'string' || record.kind === '') {
    throw new StateFileError(path, 'missing "kind"');
  }
  const attributes = record.attributes === undefined ? {} : toRecord(record.attributes, path, '"attributes"');
  return { kind: record.kind, attributes };
}

/**
 * Validate raw attributes against a descriptor's field table
 *
 * @throws StateFileError on unknown attributes or unsupported values
 */
export function parseDesired<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  attributes: Record<string, unknown>,
  path: string
): DesiredAttributes<F> {
  const names = fieldNames(descriptor.fields);
  const unknown = Object.keys(attributes).filter((key) => !names.some((name) => name === key));
  if (unknown.length > 0) {
    throw new StateFileError(
      path,
      `unknown ${descriptor.kind} attribute(s): ${unknown.join(', ')}`
    );
  }

  const desired: DesiredAttributes<F> = {};
  for (const field of names) {
    if (field in attributes) {
      desired[field] = toFieldValue(attributes[field], path, field);
    }
  }
  return desired;
}

/**
 * Rebuild persisted state for a descriptor
 */
export function parseState<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  raw: unknown,
  path: string
): ResourceState<F> {
  const record = toRecord(raw, path, 'state');
  if (record.kind !== descriptor.kind) {
    throw new StateFileError(path, `state belongs to kind ${String(record.kind)}, not ${descriptor.kind}`);
  }
  if (typeof record.handle !== 'string') {
    throw new StateFileError(path, 'missing "handle"');
  }
  decodeHandle(record.handle);

  const attributes = toRecord(record.attributes ?? {}, path, '"attributes"');
  return {
    handle: record.handle,
    attributes: mapAttributes(descriptor.fields, (field) =>
      toFieldValue(attributes[field] ?? null, path, field)
    ),
  };
}

// =============================================================================
// Files
// =============================================================================

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new StateFileError(path, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Read a YAML (or JSON) document naming its kind
 */
export function readKindDocument(path: string): KindDocument {
  let parsed: unknown;
  try {
    parsed = parseYaml(readText(path));
  } catch (err) {
    if (err instanceof StateFileError) throw err;
    throw new StateFileError(path, err instanceof Error ? err.message : String(err));
  }
  return parseKindDocument(parsed, path);
}

function readJson(path: string): unknown {
  const text = readText(path);
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StateFileError(path, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Read only the kind of a persisted state file
 */
export function readStateKind(path: string): string {
  const record = toRecord(readJson(path), path, 'state');
  if (typeof record.kind !== 'string' || record.kind === '') {
    throw new StateFileError(path, 'missing "kind"');
  }
  return record.kind;
}

/**
 * Load persisted state; a missing file yields null
 */
export function loadState<F extends string, R>(
  descriptor: ResourceDescriptor<F, R>,
  path: string
): ResourceState<F> | null {
  if (!existsSync(path)) {
    return null;
  }
  return parseState(descriptor, readJson(path), path);
}

/**
 * Build the persisted representation of a state
 */
export function toStateFile<F extends string>(kind: string, state: ResourceState<F>): StateFile {
  return {
    kind,
    handle: state.handle,
    attributes: { ...state.attributes },
  };
}

/**
 * Write persisted state as JSON
 */
export function saveState<F extends string>(path: string, kind: string, state: ResourceState<F>): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(toStateFile(kind, state), null, 2) + '\n', 'utf-8');
}

/**
 * Discard persisted state
 */
export function removeState(path: string): void {
  rmSync(path, { force: true });
}
