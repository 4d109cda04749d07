/**
 * Output formatting utilities for consistent CLI output
 *
 * Results go to stdout; notices go to stderr so JSON output stays parseable.
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { FieldChange, GroupDrift, ResourceState } from '../reconcilers/engine/types.js';
import { redactRecord } from '../api/logger.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a resource state; sensitive attributes are masked
 */
export function printState<F extends string>(kind: string, state: ResourceState<F>): void {
  console.log(chalk.bold(`\n${kind} ${chalk.cyan(state.handle)}\n`));
  const shown = redactRecord({ ...state.attributes });
  for (const [field, value] of Object.entries(shown)) {
    console.log(`  ${chalk.gray(field + ':')} ${formatValue(value)}`);
  }
}

/**
 * Print drift grouped by attribute group
 */
export function printDrift<F extends string>(drifts: GroupDrift<F>[]): void {
  if (drifts.length === 0) {
    console.log(chalk.gray('No drift detected'));
    return;
  }

  console.log(chalk.bold(`\n${drifts.length} group(s) drifted:\n`));
  for (const drift of drifts) {
    console.log(chalk.yellow(`~ ${drift.group}`));
    for (const change of drift.changes) {
      console.log(chalk.red(`    - ${change.field}: ${formatValue(change.observed)}`));
      console.log(chalk.green(`    + ${change.field}: ${formatValue(change.desired)}`));
    }
  }
}

/**
 * Print changes to attributes that cannot be updated in place
 */
export function printRejected<F extends string>(changes: FieldChange<F>[]): void {
  if (changes.length === 0) {
    return;
  }
  console.log(chalk.red.bold(`\n${changes.length} attribute(s) cannot be changed after create:\n`));
  for (const change of changes) {
    console.log(chalk.red(`  ! ${change.field}: ${formatValue(change.observed)} -> ${formatValue(change.desired)}`));
  }
}

/**
 * Print attribute documentation
 */
export function printDescriptions(kind: string, description: string, fields: Record<string, string>): void {
  console.log(chalk.bold(`\n${kind}`));
  console.log(chalk.gray(description) + '\n');
  for (const [field, text] of Object.entries(fields)) {
    console.log(`  ${chalk.cyan(field)}  ${text}`);
  }
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.error(chalk.green('✓'), message);
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.error(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.error(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.error(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(unset)');
  }
  if (typeof value === 'string') {
    return value.length > 60 ? value.slice(0, 60) + '...' : value;
  }
  return String(value);
}
