/**
 * sync command - Reconcile the account with a declaration file
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, printReport, verbose } from '../utils/output.js';
import { loadDeclaration } from '../manifest/loader.js';
import { UptimeConfig } from '../registry/config.js';
import type { SyncReport } from '../reconcile/types.js';
import { validationFailure } from './result.js';

export interface SyncCommandOptions {
  /** Declaration file (YAML or JSON) */
  file: string;
  /** Report the plan without applying it */
  dryRun: boolean;
  /** Refuse to delete more than this many contacts and monitors */
  maxRemovals?: number;
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncCommandOptions
): Promise<CommandResult<SyncReport>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Loading declaration from ${options.file}`, globalOpts.verbose);
  if (options.maxRemovals !== undefined) {
    verbose(`Removal limit: ${options.maxRemovals}`, globalOpts.verbose);
  }

  try {
    const config = new UptimeConfig({
      api: ctx.createApi(),
      logger: ctx.logger,
      maxRemovals: options.maxRemovals,
    });
    await loadDeclaration(config, options.file);

    if (outputFormat === 'human') {
      header('Sync');
      if (options.dryRun) dryRunNotice();
    }

    const report = await config.sync({ dryRun: options.dryRun });

    if (outputFormat === 'human') {
      printReport(report);
    }

    const { summary } = report;
    return {
      success: report.success,
      message: report.dryRun
        ? `${summary.planned} change(s) planned`
        : report.success
          ? `Sync complete: ${summary.created} created, ${summary.updated} updated, ${summary.deleted} deleted`
          : `Sync finished with ${summary.failed} failed and ${summary.blocked} blocked mutation(s)`,
      data: report,
      errors: report.failures.map((failure) => `${failure.mutation.id}: ${failure.error.message}`),
    };
  } catch (err) {
    return validationFailure(err);
  }
}
