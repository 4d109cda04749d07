#!/usr/bin/env node
/**
 * scf-reconcile CLI - Manage SCF organizations declaratively
 *
 * Commands:
 * - apply: Create or update a resource from a desired-state file
 * - read: Refresh a state file from the remote
 * - import: Start managing an existing resource
 * - delete: Delete a managed resource
 * - describe: Show the attributes of each resource type
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  applyCommand,
  deleteCommand,
  describeCommand,
  importCommand,
  readCommand,
} from './commands/index.js';
import { printResult, error, info } from './utils/output.js';
import { resolveSettings } from './config/index.js';
import { createClient } from './api/client.js';
import { createLogger } from './api/logger.js';
import { isReconcileError } from './reconcilers/engine/errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 * Resolves connection settings from options, env, and the settings file
 */
function createContext(options: GlobalOptions): CommandContext {
  const settings = resolveSettings({
    apiUrl: options.apiUrl,
    region: options.region,
    configPath: options.config,
  });

  const logger = createLogger({
    level: options.verbose ? 'debug' : 'warn',
    json: options.json,
  });

  if (settings.sources.token === 'none') {
    logger.warn('No API token configured; requests are sent unauthenticated');
  }
  logger.debug('Resolved settings', {
    apiUrl: settings.apiUrl,
    region: settings.region,
    sources: settings.sources,
  });

  const client = createClient({
    baseUrl: settings.apiUrl,
    token: settings.token,
    timeout: settings.timeoutMs,
    userAgent: VERSION,
    logger,
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    client,
    logger,
  };
}

/**
 * Run a command and exit with its status
 */
async function run<T>(
  label: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>> | CommandResult<T>
): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();

  try {
    const ctx = createContext(globalOpts);
    const result = await execute(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (globalOpts.json) {
      printResult({ success: false, message: `${label} failed`, errors: [message] }, 'json');
    } else {
      error(`${label} failed: ${message}`);
      if (isReconcileError(err) && err.suggestion) {
        info(err.suggestion);
      }
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('scf-reconcile')
  .description('Declarative lifecycle management for SCF organizations')
  .version(VERSION)
  .addOption(new Option('--region <region>', 'Region every call is scoped to'))
  .addOption(new Option('--api-url <url>', 'SCF API base URL'))
  .addOption(new Option('--config <path>', 'Settings file').env('SCF_CONFIG'))
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

/**
 * apply command - Create or update a resource
 */
program
  .command('apply')
  .description('Create or update a resource from a desired-state file')
  .requiredOption('-f, --file <path>', 'Desired-state YAML file')
  .requiredOption('-s, --state <path>', 'State file to read and write')
  .option('--dry-run', 'Show what would change without making changes', false)
  .action(async (cmdOpts: { file: string; state: string; dryRun: boolean }) => {
    await run('Apply', (ctx) =>
      applyCommand(ctx, { file: cmdOpts.file, state: cmdOpts.state, dryRun: cmdOpts.dryRun })
    );
  });

/**
 * read command - Refresh state
 */
program
  .command('read')
  .description('Refresh a state file from the remote resource')
  .requiredOption('-s, --state <path>', 'State file to refresh')
  .action(async (cmdOpts: { state: string }) => {
    await run('Read', (ctx) => readCommand(ctx, { state: cmdOpts.state }));
  });

/**
 * import command - Adopt an existing resource
 */
program
  .command('import')
  .description('Bring an existing resource under management')
  .argument('<kind>', 'Resource kind')
  .argument('<identifier>', 'Composite "scope_id,resource_id" or a bare resource id with --scope')
  .requiredOption('-s, --state <path>', 'State file to write')
  .option('--scope <id>', 'Scope (project) id for a bare resource id')
  .option('--force', 'Overwrite an existing state file', false)
  .action(
    async (
      kind: string,
      identifier: string,
      cmdOpts: { state: string; scope?: string; force: boolean }
    ) => {
      await run('Import', (ctx) =>
        importCommand(ctx, {
          kind,
          identifier,
          state: cmdOpts.state,
          scope: cmdOpts.scope,
          force: cmdOpts.force,
        })
      );
    }
  );

/**
 * delete command - Remove a managed resource
 */
program
  .command('delete')
  .description('Delete a managed resource and discard its state')
  .requiredOption('-s, --state <path>', 'State file of the resource')
  .option('--dry-run', 'Show what would be deleted', false)
  .action(async (cmdOpts: { state: string; dryRun: boolean }) => {
    await run('Delete', (ctx) => deleteCommand(ctx, { state: cmdOpts.state, dryRun: cmdOpts.dryRun }));
  });

/**
 * describe command - Attribute documentation
 */
program
  .command('describe')
  .description('Show the attributes of a resource type')
  .argument('[kind]', 'Resource kind (all kinds when omitted)')
  .action(async (kind: string | undefined) => {
    await run('Describe', (ctx) => describeCommand(ctx, kind));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
