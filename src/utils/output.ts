/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import { describeMutation, formatChange, formatReport } from '../reconcile/report.js';
import type { Mutation, SyncReport } from '../reconcile/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
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
 * Print a sync report, one mutation per line
 */
export function printReport(report: SyncReport): void {
  for (const line of formatReport(report)) {
    console.log(colorLine(line));
  }
}

/**
 * Print planned mutations with their field changes
 */
export function printPlan(mutations: Mutation[], warnings: string[]): void {
  if (mutations.length === 0) {
    console.log(chalk.gray('No changes: account matches the declaration'));
  }

  for (const mutation of mutations) {
    const color = mutation.action === 'create'
      ? chalk.green
      : mutation.action === 'delete'
        ? chalk.red
        : chalk.yellow;
    console.log(color(`${ACTION_ICONS[mutation.action]} ${describeMutation(mutation)}`), chalk.gray(mutation.reason));
    for (const change of mutation.changes ?? []) {
      console.log(chalk.gray(`    ${formatChange(change)}`));
    }
  }

  for (const message of warnings) {
    warn(message);
  }
}

const ACTION_ICONS: Record<Mutation['action'], string> = {
  create: '+',
  update: '~',
  delete: '-',
};

function colorLine(line: string): string {
  const trimmed = line.trimStart();
  if (trimmed.startsWith('✓')) return chalk.green(line);
  if (trimmed.startsWith('✗') || trimmed.startsWith('error:')) return chalk.red(line);
  if (trimmed.startsWith('⊘') || trimmed.startsWith('!')) return chalk.yellow(line);
  if (trimmed.startsWith('~')) return chalk.cyan(line);
  if (line === trimmed) return chalk.bold(line);
  return chalk.gray(line);
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}
