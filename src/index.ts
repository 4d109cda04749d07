/**
 * scf-reconcile library entry point
 *
 * The CLI lives in ./cli.ts; this module exposes the client, the
 * reconciliation engine and the resource descriptors for programmatic use.
 */

export * from './api/index.js';
export * from './reconcilers/index.js';
export * from './config/index.js';
export * from './state/index.js';
export type { CommandContext, CommandResult, GlobalOptions, OutputFormat } from './types.js';
