/**
 * plan command - Show what a sync would change without calling any mutating endpoint
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printPlan, verbose } from '../utils/output.js';
import { loadDeclaration } from '../manifest/loader.js';
import { UptimeConfig } from '../registry/config.js';
import type { Mutation } from '../reconcile/types.js';
import { validationFailure } from './result.js';

export interface PlanOptions {
  /** Declaration file (YAML or JSON) */
  file: string;
}

export interface PlanData {
  mutations: Mutation[];
  warnings: string[];
}

/**
 * Execute the plan command
 */
export async function planCommand(
  ctx: CommandContext,
  options: PlanOptions
): Promise<CommandResult<PlanData>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Loading declaration from ${options.file}`, globalOpts.verbose);

  try {
    const config = new UptimeConfig({ api: ctx.createApi(), logger: ctx.logger });
    await loadDeclaration(config, options.file);

    const declared = config.desiredState();
    verbose(
      `Declared ${declared.contacts.length} contact(s) and ${declared.monitors.length} monitor(s)`,
      globalOpts.verbose
    );

    if (outputFormat === 'human') {
      header('Plan');
      info('Comparing declaration with account state...');
    }

    const { operations, mutations } = await config.plan();

    if (outputFormat === 'human') {
      printPlan(mutations, operations.warnings);
    }

    return {
      success: true,
      message:
        mutations.length === 0
          ? 'Account matches the declaration'
          : `${mutations.length} change(s) planned`,
      data: { mutations, warnings: operations.warnings },
    };
  } catch (err) {
    return validationFailure(err);
  }
}
