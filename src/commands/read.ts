/**
 * read command - refresh persisted state from the remote
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ResourceDescriptor } from '../reconcilers/engine/types.js';
import { readResource } from '../reconcilers/engine/lifecycle.js';
import { withDescriptor } from '../reconcilers/registry.js';
import { loadState, readStateKind, removeState, saveState, StateFileError } from '../state/files.js';
import { printState, warn } from '../utils/output.js';
import { fatalResult, lifecycleContext, requireKind, type LifecycleData } from './shared.js';

export interface ReadCommandOptions {
  state: string;
}

export async function readCommand(
  ctx: CommandContext,
  options: ReadCommandOptions
): Promise<CommandResult<LifecycleData>> {
  const kind = requireKind(readStateKind(options.state));
  return withDescriptor(kind, ctx.client, <F extends string, R>(descriptor: ResourceDescriptor<F, R>) =>
    readWith(ctx, descriptor, options)
  );
}

async function readWith<F extends string, R>(
  ctx: CommandContext,
  descriptor: ResourceDescriptor<F, R>,
  options: ReadCommandOptions
): Promise<CommandResult<LifecycleData>> {
  const { kind } = descriptor;
  const prior = loadState(descriptor, options.state);
  if (!prior) {
    throw new StateFileError(options.state, 'no such state file');
  }

  const outcome = await readResource(descriptor, prior.handle, lifecycleContext(ctx), prior);
  switch (outcome.status) {
    case 'fatal':
      return fatalResult(ctx, kind, outcome);
    case 'removed':
      removeState(options.state);
      if (ctx.outputFormat === 'human') {
        warn(`${kind} ${outcome.handle} no longer exists; state discarded`);
      }
      return {
        success: true,
        message: `${kind} ${outcome.handle} no longer exists`,
        data: { kind, handle: outcome.handle, status: outcome.status },
      };
    case 'present':
      saveState(options.state, kind, outcome.state);
      if (ctx.outputFormat === 'human') {
        printState(kind, outcome.state);
      }
      return {
        success: true,
        message: `Refreshed ${kind} ${outcome.state.handle}`,
        data: { kind, handle: outcome.state.handle, status: outcome.status },
      };
  }
}
