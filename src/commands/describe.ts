/**
 * describe command - print attribute documentation of a resource type
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ResourceDescriptor } from '../reconcilers/engine/types.js';
import { describeFields } from '../reconcilers/engine/mapper.js';
import { RESOURCE_KINDS, withDescriptor } from '../reconcilers/registry.js';
import { printDescriptions } from '../utils/output.js';
import { requireKind } from './shared.js';

export interface DescribeData {
  kind: string;
  description: string;
  attributes: Record<string, string>;
}

export function describeCommand(ctx: CommandContext, kindName?: string): CommandResult<DescribeData[]> {
  const kinds = kindName === undefined ? [...RESOURCE_KINDS] : [requireKind(kindName)];

  const data = kinds.map((kind) =>
    withDescriptor(kind, ctx.client, <F extends string, R>(descriptor: ResourceDescriptor<F, R>) => ({
      kind: descriptor.kind,
      description: descriptor.description,
      attributes: { ...describeFields(descriptor.fields) },
    }))
  );

  if (ctx.outputFormat === 'human') {
    for (const entry of data) {
      printDescriptions(entry.kind, entry.description, entry.attributes);
    }
  }

  return {
    success: true,
    message: `${data.length} resource type(s)`,
    data,
  };
}
