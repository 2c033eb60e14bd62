/**
 * Plain-text rendering of mutations and sync reports
 */

import type { FieldChange } from '../model/monitor.js';
import type { FieldValue } from '../model/settings.js';
import type { Mutation, SyncReport } from './types.js';

export function formatValue(value: FieldValue | undefined): string {
  if (value === undefined) return '(unset)';
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

export function formatChange(change: FieldChange): string {
  return `${change.field}: ${formatValue(change.oldValue)} → ${formatValue(change.newValue)}`;
}

/**
 * One-line description, e.g. `update monitor Homepage (#7001)`
 */
export function describeMutation(mutation: Mutation): string {
  const id = mutation.remoteId ? ` (#${mutation.remoteId})` : '';
  return `${mutation.action} ${mutation.entity} ${mutation.target}${id}`;
}

type MutationStatus = 'planned' | 'done' | 'failed' | 'blocked';

const STATUS_SYMBOLS: Record<MutationStatus, string> = {
  planned: '~',
  done: '✓',
  failed: '✗',
  blocked: '⊘',
};

function mutationStatus(report: SyncReport, mutation: Mutation): MutationStatus {
  if (report.dryRun) return 'planned';
  const failure = report.failures.find((f) => f.mutation.id === mutation.id);
  if (!failure) return 'done';
  return failure.error.code === 'DEPENDENCY_BLOCKED' ? 'blocked' : 'failed';
}

/**
 * Render a report as lines of text, one mutation per line followed by its
 * field changes and errors
 */
export function formatReport(report: SyncReport): string[] {
  const lines: string[] = [report.dryRun ? 'Planned changes (dry run):' : 'Sync results:'];

  if (report.planned.length === 0) {
    lines.push('  No changes: account matches the declaration');
  }

  for (const mutation of report.planned) {
    const symbol = STATUS_SYMBOLS[mutationStatus(report, mutation)];
    lines.push(`  ${symbol} ${describeMutation(mutation)}: ${mutation.reason}`);
    for (const change of mutation.changes ?? []) {
      lines.push(`      ${formatChange(change)}`);
    }
    const failure = report.failures.find((f) => f.mutation.id === mutation.id);
    if (failure) {
      lines.push(`      error: ${failure.error.message}`);
    }
  }

  for (const warning of report.warnings) {
    lines.push(`  ! ${warning}`);
  }

  const { summary } = report;
  lines.push(
    `Summary: ${summary.planned} planned, ${summary.created} created, ${summary.updated} updated, ` +
      `${summary.deleted} deleted, ${summary.failed} failed, ${summary.blocked} blocked`
  );

  return lines;
}
