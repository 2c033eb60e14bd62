#!/usr/bin/env node
/**
 * uptime-sync CLI - Manage Uptime Robot contacts and monitors as code
 *
 * Commands:
 * - plan: Show what would change between a declaration and the account
 * - sync: Apply a declaration to the account
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { planCommand, syncCommand } from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { resolveSettings } from './config/settings.js';
import { createClient } from './api/client.js';
import { logger } from './api/logger.js';
import { errorMessage } from './errors.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
    createApi: () => {
      const settings = resolveSettings({ apiKey: options.apiKey, baseUrl: options.baseUrl });
      verboseLog(
        `Using API key from ${settings.apiKeySource}, base URL ${settings.baseUrl}`,
        options.verbose
      );
      return createClient({
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
        debug: options.verbose,
      });
    },
  };
}

function parseRemovalLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return limit;
}

/**
 * Print the result and exit with its status
 */
function finish<T>(ctx: CommandContext, result: CommandResult<T>): never {
  printResult(result, ctx.outputFormat);
  process.exit(result.success ? 0 : 1);
}

function fail(ctx: CommandContext, command: string, err: unknown): never {
  if (ctx.outputFormat === 'json') {
    printResult({ success: false, message: `${command} failed: ${errorMessage(err)}` }, 'json');
  } else {
    error(`${command} failed: ${errorMessage(err)}`);
  }
  process.exit(1);
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('uptime-sync')
  .description('Declare Uptime Robot alert contacts and monitors, then sync the account to match')
  .version(VERSION)
  // Global options available to all commands
  .addOption(new Option('--api-key <key>', 'Uptime Robot main API key'))
  .addOption(new Option('--base-url <url>', 'API base URL'))
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * plan command - Show what would change
 */
program
  .command('plan')
  .description('Show the changes a sync would make')
  .argument('<file>', 'Declaration file (YAML or JSON)')
  .action(async (file: string) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(ctx, await planCommand(ctx, { file }));
    } catch (err) {
      fail(ctx, 'Plan', err);
    }
  });

/**
 * sync command - Apply the declaration
 */
program
  .command('sync')
  .description('Create, update and delete contacts and monitors to match the declaration')
  .argument('<file>', 'Declaration file (YAML or JSON)')
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--max-removals <n>', 'Abort if the sync would delete more than n contacts and monitors')
      .argParser(parseRemovalLimit)
  )
  .action(async (file: string, cmdOpts: { dryRun: boolean; maxRemovals?: number }) => {
    const ctx = createContext(program.opts<GlobalOptions>());

    try {
      finish(
        ctx,
        await syncCommand(ctx, {
          file,
          dryRun: cmdOpts.dryRun,
          maxRemovals: cmdOpts.maxRemovals,
        })
      );
    } catch (err) {
      fail(ctx, 'Sync', err);
    }
  });

// Parse and execute
await program.parseAsync();
