/**
 * import command - bring an existing resource under management
 *
 * The identifier is either a composite `scope_id,resource_id` handle or a
 * bare resource id together with `--scope`.
 */

import { existsSync } from 'node:fs';
import type { CommandContext, CommandResult } from '../types.js';
import type { ResourceDescriptor } from '../reconcilers/engine/types.js';
import { importResource } from '../reconcilers/engine/lifecycle.js';
import { withDescriptor } from '../reconcilers/registry.js';
import { saveState, StateFileError } from '../state/files.js';
import { printState, success } from '../utils/output.js';
import { fatalResult, lifecycleContext, requireKind, type LifecycleData } from './shared.js';

export interface ImportCommandOptions {
  kind: string;
  identifier: string;
  state: string;
  /** Scope id for a bare resource id */
  scope?: string;
  /** Overwrite an existing state file */
  force?: boolean;
}

export async function importCommand(
  ctx: CommandContext,
  options: ImportCommandOptions
): Promise<CommandResult<LifecycleData>> {
  const kind = requireKind(options.kind);
  if (!options.force && existsSync(options.state)) {
    throw new StateFileError(options.state, 'state file already exists (use --force to overwrite)');
  }
  return withDescriptor(kind, ctx.client, <F extends string, R>(descriptor: ResourceDescriptor<F, R>) =>
    importWith(ctx, descriptor, options)
  );
}

async function importWith<F extends string, R>(
  ctx: CommandContext,
  descriptor: ResourceDescriptor<F, R>,
  options: ImportCommandOptions
): Promise<CommandResult<LifecycleData>> {
  const { kind } = descriptor;
  const outcome = await importResource(descriptor, options.identifier, lifecycleContext(ctx), {
    scopeId: options.scope,
  });

  switch (outcome.status) {
    case 'fatal':
      return fatalResult(ctx, kind, outcome);
    case 'removed':
      return {
        success: false,
        message: `${kind} ${outcome.handle} does not exist`,
        data: { kind, handle: outcome.handle, status: outcome.status },
        errors: [`${kind} ${outcome.handle} does not exist`],
      };
    case 'present':
      saveState(options.state, kind, outcome.state);
      if (ctx.outputFormat === 'human') {
        success(`Imported ${kind} ${outcome.state.handle}`);
        printState(kind, outcome.state);
      }
      return {
        success: true,
        message: `Imported ${kind} ${outcome.state.handle}`,
        data: { kind, handle: outcome.state.handle, status: outcome.status },
      };
  }
}
