/**
 * Connection settings resolution
 *
 * Priority for every setting:
 * 1. Explicit option (CLI flag)
 * 2. Environment variable (SCF_API_URL, SCF_REGION, SCF_TOKEN, SCF_TIMEOUT_MS)
 * 3. Settings file (SCF_CONFIG or ~/.scf-reconcile/config.yaml)
 * 4. Default
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';

// =============================================================================
// Types
// =============================================================================

/**
 * Contents of the YAML settings file
 */
export interface SettingsFile {
  api_url?: string;
  region?: string;
  token?: string;
  timeout_ms?: number;
}

/**
 * Explicit overrides, usually from CLI flags
 */
export interface SettingsOverrides {
  apiUrl?: string;
  region?: string;
  token?: string;
  timeoutMs?: number;
  /** Settings file to read instead of the default location */
  configPath?: string;
}

export type SettingSource = 'option' | 'env' | 'file' | 'default';

/**
 * Fully resolved settings
 */
export interface ScfSettings {
  apiUrl: string;
  region: string;
  token?: string;
  timeoutMs: number;
  /** Where each setting came from */
  sources: {
    apiUrl: SettingSource;
    region: SettingSource;
    token: SettingSource | 'none';
    timeoutMs: SettingSource;
  };
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_API_URL = 'https://scf.api.stackit.cloud';
export const DEFAULT_REGION = 'eu01';
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Error thrown when the settings file cannot be read or parsed
 */
export class SettingsFileError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid settings file ${path}: ${reason}`);
    this.name = 'SettingsFileError';
  }
}

// =============================================================================
// Settings File
// =============================================================================

/**
 * Default settings file location
 */
export function getDefaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SCF_CONFIG ?? join(homedir(), '.scf-reconcile', 'config.yaml');
}

function optionalString(record: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new SettingsFileError(path, `"${key}" must be a string`);
  }
  return value;
}

/**
 * Parse settings file content
 *
 * @throws SettingsFileError if the content is not a mapping or has mistyped keys
 */
export function parseSettingsFile(content: string, path: string): SettingsFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new SettingsFileError(path, err instanceof Error ? err.message : String(err));
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new SettingsFileError(path, 'expected a mapping at the top level');
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  const timeout = record.timeout_ms;
  if (timeout !== undefined && timeout !== null && (typeof timeout !== 'number' || timeout <= 0)) {
    throw new SettingsFileError(path, '"timeout_ms" must be a positive number');
  }

  return {
    api_url: optionalString(record, 'api_url', path),
    region: optionalString(record, 'region', path),
    token: optionalString(record, 'token', path),
    timeout_ms: typeof timeout === 'number' ? timeout : undefined,
  };
}

/**
 * Load the settings file; a missing file yields null
 */
export function loadSettingsFile(path: string): SettingsFile | null {
  if (!existsSync(path)) {
    return null;
  }
  return parseSettingsFile(readFileSync(path, 'utf-8'), path);
}

// =============================================================================
// Resolution
// =============================================================================

function pick<T>(
  option: T | undefined,
  env: T | undefined,
  file: T | undefined,
  fallback: T
): [T, SettingSource] {
  if (option !== undefined) return [option, 'option'];
  if (env !== undefined) return [env, 'env'];
  if (file !== undefined) return [file, 'file'];
  return [fallback, 'default'];
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Resolve connection settings
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ScfSettings {
  const file = loadSettingsFile(overrides.configPath ?? getDefaultSettingsPath(env)) ?? {};

  const [apiUrl, apiUrlSource] = pick(overrides.apiUrl, env.SCF_API_URL, file.api_url, DEFAULT_API_URL);
  const [region, regionSource] = pick(overrides.region, env.SCF_REGION, file.region, DEFAULT_REGION);
  const [timeoutMs, timeoutSource] = pick(
    overrides.timeoutMs,
    parseTimeout(env.SCF_TIMEOUT_MS),
    file.timeout_ms,
    DEFAULT_TIMEOUT_MS
  );

  let token: string | undefined;
  let tokenSource: SettingSource | 'none' = 'none';
  if (overrides.token) {
    [token, tokenSource] = [overrides.token, 'option'];
  } else if (env.SCF_TOKEN) {
    [token, tokenSource] = [env.SCF_TOKEN, 'env'];
  } else if (file.token) {
    [token, tokenSource] = [file.token, 'file'];
  }

  return {
    apiUrl,
    region,
    token,
    timeoutMs,
    sources: {
      apiUrl: apiUrlSource,
      region: regionSource,
      token: tokenSource,
      timeoutMs: timeoutSource,
    },
  };
}
