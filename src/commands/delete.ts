/**
 * delete command - delete a managed resource and discard its state
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ResourceDescriptor } from '../reconcilers/engine/types.js';
import { deleteResource } from '../reconcilers/engine/lifecycle.js';
import { withDescriptor } from '../reconcilers/registry.js';
import { loadState, readStateKind, removeState, StateFileError } from '../state/files.js';
import { dryRunNotice, success } from '../utils/output.js';
import { fatalResult, lifecycleContext, requireKind, type LifecycleData } from './shared.js';

export interface DeleteCommandOptions {
  state: string;
  dryRun?: boolean;
}

export interface DeleteData extends LifecycleData {
  alreadyAbsent?: boolean;
}

export async function deleteCommand(
  ctx: CommandContext,
  options: DeleteCommandOptions
): Promise<CommandResult<DeleteData>> {
  const kind = requireKind(readStateKind(options.state));
  return withDescriptor(kind, ctx.client, <F extends string, R>(descriptor: ResourceDescriptor<F, R>) =>
    deleteWith(ctx, descriptor, options)
  );
}

async function deleteWith<F extends string, R>(
  ctx: CommandContext,
  descriptor: ResourceDescriptor<F, R>,
  options: DeleteCommandOptions
): Promise<CommandResult<DeleteData>> {
  const { kind } = descriptor;
  const prior = loadState(descriptor, options.state);
  if (!prior) {
    throw new StateFileError(options.state, 'no such state file');
  }

  if (options.dryRun) {
    if (ctx.outputFormat === 'human') dryRunNotice();
    return {
      success: true,
      message: `Would delete ${kind} ${prior.handle}`,
      data: { kind, handle: prior.handle, status: 'plan' },
    };
  }

  const outcome = await deleteResource(descriptor, prior.handle, lifecycleContext(ctx));
  if (outcome.status === 'fatal') {
    return fatalResult(ctx, kind, outcome);
  }

  removeState(options.state);
  const message = outcome.alreadyAbsent
    ? `${kind} ${outcome.handle} was already gone`
    : `Deleted ${kind} ${outcome.handle}`;
  if (ctx.outputFormat === 'human') {
    success(message);
  }
  return {
    success: true,
    message,
    data: { kind, handle: outcome.handle, status: outcome.status, alreadyAbsent: outcome.alreadyAbsent },
  };
}
