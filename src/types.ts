/**
 * Shared types and interfaces for the scf-reconcile CLI
 */

import type { ScfClient } from './api/client.js';
import type { ApiLogger } from './api/logger.js';
import type { ScfSettings } from './config/settings.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Region every call is scoped to */
  region?: string;
  /** API base URL */
  apiUrl?: string;
  /** Settings file path */
  config?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  settings: ScfSettings;
  client: ScfClient;
  logger: ApiLogger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
