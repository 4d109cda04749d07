/**
 * Helpers shared by the lifecycle commands
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { FatalOutcome, LifecycleContext } from '../reconcilers/engine/types.js';
import { isResourceKind, RESOURCE_KINDS, type ResourceKind } from '../reconcilers/registry.js';
import { saveState } from '../state/files.js';
import { error, info, warn } from '../utils/output.js';

/**
 * Data returned by lifecycle commands
 */
export interface LifecycleData {
  kind: string;
  handle?: string;
  status: string;
}

/**
 * Validate a resource kind from user input
 *
 * @throws Error naming the supported kinds
 */
export function requireKind(kind: string): ResourceKind {
  if (!isResourceKind(kind)) {
    throw new Error(`Unknown resource kind "${kind}". Supported: ${RESOURCE_KINDS.join(', ')}`);
  }
  return kind;
}

/**
 * Per-invocation lifecycle context from the command context
 */
export function lifecycleContext(ctx: CommandContext): LifecycleContext {
  return { region: ctx.settings.region, logger: ctx.logger };
}

/**
 * Turn a fatal outcome into a command result, persisting any partial state
 */
export function fatalResult<F extends string>(
  ctx: CommandContext,
  kind: string,
  outcome: FatalOutcome<F>,
  statePath?: string
): CommandResult<LifecycleData> {
  if (outcome.state && statePath) {
    saveState(statePath, kind, outcome.state);
    if (ctx.outputFormat === 'human') {
      warn(`Partial state for ${outcome.state.handle} written to ${statePath}`);
    }
  }
  if (ctx.outputFormat === 'human') {
    error(outcome.error.message);
    if (outcome.error.suggestion) {
      info(outcome.error.suggestion);
    }
  }
  return {
    success: false,
    message: outcome.error.message,
    data: { kind, handle: outcome.error.handle, status: outcome.status },
    errors: [outcome.error.message],
  };
}
