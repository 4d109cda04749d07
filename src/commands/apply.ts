/**
 * apply command - create or update a resource from a desired-state file
 *
 * Without a state file the resource is created; with one it is reconciled
 * against a fresh read of the remote.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type {
  DesiredAttributes,
  FieldChange,
  GroupDrift,
  ResourceDescriptor,
  ResourceState,
} from '../reconcilers/engine/types.js';
import { createResource, readResource, updateResource } from '../reconcilers/engine/lifecycle.js';
import { computeDrift, computeFixedDrift } from '../reconcilers/engine/drift.js';
import { withDescriptor } from '../reconcilers/registry.js';
import {
  loadState,
  parseDesired,
  readKindDocument,
  removeState,
  saveState,
  type KindDocument,
} from '../state/files.js';
import {
  dryRunNotice,
  info,
  printDrift,
  printRejected,
  printState,
  success,
  warn,
} from '../utils/output.js';
import { fatalResult, lifecycleContext, requireKind, type LifecycleData } from './shared.js';

export interface ApplyCommandOptions {
  /** Desired-state YAML file */
  file: string;
  /** Persisted state JSON file */
  state: string;
  /** Only show what would change */
  dryRun?: boolean;
}

export interface ApplyData extends LifecycleData {
  appliedGroups?: string[];
  drift?: GroupDrift<string>[];
  /** Changes to attributes that are fixed after create */
  rejected?: FieldChange<string>[];
}

export async function applyCommand(
  ctx: CommandContext,
  options: ApplyCommandOptions
): Promise<CommandResult<ApplyData>> {
  const doc = readKindDocument(options.file);
  const kind = requireKind(doc.kind);
  return withDescriptor(kind, ctx.client, <F extends string, R>(descriptor: ResourceDescriptor<F, R>) =>
    applyWith(ctx, descriptor, doc, options)
  );
}

async function applyWith<F extends string, R>(
  ctx: CommandContext,
  descriptor: ResourceDescriptor<F, R>,
  doc: KindDocument,
  options: ApplyCommandOptions
): Promise<CommandResult<ApplyData>> {
  const { kind } = descriptor;
  const desired = parseDesired(descriptor, doc.attributes, options.file);
  const prior = loadState(descriptor, options.state);
  const human = ctx.outputFormat === 'human';

  if (options.dryRun) {
    if (human) dryRunNotice();
    if (!prior) {
      return { success: true, message: `Would create ${kind}`, data: { kind, status: 'plan' } };
    }
    return planUpdate(ctx, descriptor, desired, prior);
  }

  if (!prior) {
    const outcome = await createResource(descriptor, desired, lifecycleContext(ctx));
    if (outcome.status === 'fatal') {
      return fatalResult(ctx, kind, outcome, options.state);
    }
    saveState(options.state, kind, outcome.state);
    if (human) {
      success(`Created ${kind} ${outcome.state.handle}`);
      printState(kind, outcome.state);
    }
    return {
      success: true,
      message: `Created ${kind} ${outcome.state.handle}`,
      data: { kind, handle: outcome.state.handle, status: outcome.status },
    };
  }

  if (descriptor.immutable) {
    const current = await readResource(descriptor, prior.handle, lifecycleContext(ctx), prior);
    if (current.status === 'fatal') {
      return fatalResult(ctx, kind, current);
    }
    if (current.status === 'removed') {
      return goneResult(ctx, kind, current.handle, options.state);
    }
    if (computeFixedDrift(descriptor, desired, current.state).length === 0) {
      saveState(options.state, kind, current.state);
      return upToDate(ctx, kind, current.state.handle, current.status);
    }
  }

  const outcome = await updateResource(descriptor, prior.handle, desired, prior, lifecycleContext(ctx));
  if (outcome.status === 'fatal') {
    return fatalResult(ctx, kind, outcome, options.state);
  }
  saveState(options.state, kind, outcome.state);

  if (outcome.appliedGroups.length === 0) {
    return upToDate(ctx, kind, outcome.state.handle, outcome.status);
  }
  const message = `Updated ${kind} ${outcome.state.handle} (${outcome.appliedGroups.join(', ')})`;
  if (human) {
    success(message);
  }
  return {
    success: true,
    message,
    data: {
      kind,
      handle: outcome.state.handle,
      status: outcome.status,
      appliedGroups: outcome.appliedGroups,
    },
  };
}

function upToDate(
  ctx: CommandContext,
  kind: string,
  handle: string,
  status: string
): CommandResult<ApplyData> {
  const message = `${kind} ${handle} is up to date`;
  if (ctx.outputFormat === 'human') {
    success(message);
  }
  return { success: true, message, data: { kind, handle, status, appliedGroups: [] } };
}

/**
 * The tracked resource disappeared; its state is discarded so the next apply creates it
 */
function goneResult(
  ctx: CommandContext,
  kind: string,
  handle: string,
  statePath: string
): CommandResult<ApplyData> {
  removeState(statePath);
  const message = `${kind} ${handle} no longer exists; state discarded`;
  if (ctx.outputFormat === 'human') {
    warn(message);
  }
  return { success: false, message, data: { kind, handle, status: 'removed' }, errors: [message] };
}

/**
 * Read the remote and report drift without mutating anything
 */
async function planUpdate<F extends string, R>(
  ctx: CommandContext,
  descriptor: ResourceDescriptor<F, R>,
  desired: DesiredAttributes<F>,
  prior: ResourceState<F>
): Promise<CommandResult<ApplyData>> {
  const { kind } = descriptor;
  const current = await readResource(descriptor, prior.handle, lifecycleContext(ctx), prior);
  if (current.status === 'fatal') {
    return fatalResult(ctx, kind, current);
  }
  if (current.status === 'removed') {
    const message = `${kind} ${current.handle} no longer exists and would be discarded`;
    if (ctx.outputFormat === 'human') {
      warn(message);
    }
    return { success: true, message, data: { kind, handle: current.handle, status: 'removed' } };
  }

  const { handle } = current.state;
  const drift = computeDrift(descriptor, desired, current.state);
  const rejected = computeFixedDrift(descriptor, desired, current.state);

  if (ctx.outputFormat === 'human') {
    info(`${kind} ${handle}`);
    printDrift(drift);
    printRejected(rejected);
  }

  if (rejected.length > 0) {
    const message = `Update would be rejected: ${rejected.map((change) => change.field).join(', ')} cannot be changed after create`;
    return {
      success: false,
      message,
      data: { kind, handle, status: 'plan', drift, rejected },
      errors: [message],
    };
  }
  return {
    success: true,
    message: drift.length === 0 ? 'No drift detected' : `${drift.length} group(s) would be updated`,
    data: { kind, handle, status: 'plan', drift },
  };
}
