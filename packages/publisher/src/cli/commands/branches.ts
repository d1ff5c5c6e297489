/**
 * Branches Commands
 *
 * Operator tooling for staging branches. Preserved branches are never removed
 * automatically; they stay until discarded here.
 *
 * Usage:
 *   data-product-publisher branches list [--all]
 *   data-product-publisher branches discard <name> [--force]
 */

import type { Command } from 'commander';
import { BranchNotFoundError, toError } from '../../core/errors.js';
import { stagingBranchPrefix } from '../../orchestrator/staging-branch.js';
import { createLocalRuntime } from '../../runtime.js';
import {
  createCommandContext,
  EXIT_CODES,
  type CommandContext,
  type ExitCode,
  type GlobalOptions,
} from '../context.js';

export interface ListOptions {
  /** Every branch, not just this user's staging branches */
  readonly all?: boolean;
}

export interface DiscardOptions {
  /** Allow discarding a branch that is not a staging branch */
  readonly force?: boolean;
}

export function registerBranchesCommands(program: Command): void {
  const branches = program
    .command('branches')
    .description('Inspect and discard staging branches');

  branches
    .command('list')
    .description('List staging branches of the configured user')
    .option('--all', 'List every branch')
    .action(async (options: ListOptions, command: Command) => {
      const context = await createCommandContext(command.optsWithGlobals<GlobalOptions>());
      process.exitCode = await executeListBranches(options, context);
    });

  branches
    .command('discard')
    .description('Delete a preserved staging branch')
    .argument('<name>', 'Branch name')
    .option('--force', 'Allow deleting a branch that is not a staging branch')
    .action(async (name: string, options: DiscardOptions, command: Command) => {
      const context = await createCommandContext(command.optsWithGlobals<GlobalOptions>());
      process.exitCode = await executeDiscardBranch(name, options, context);
    });
}

export async function executeListBranches(
  options: ListOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, io } = context;
  const runtime = createLocalRuntime(config, { logger: context.logger });
  try {
    const prefix = options.all
      ? undefined
      : stagingBranchPrefix(config.catalog.user, config.staging.prefix);
    const names = await runtime.catalog.listBranches(prefix);
    for (const name of names) {
      io.out(name);
    }
    return EXIT_CODES.SUCCESS;
  } finally {
    runtime.close();
  }
}

export async function executeDiscardBranch(
  name: string,
  options: DiscardOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, io } = context;
  const prefix = stagingBranchPrefix(config.catalog.user, config.staging.prefix);
  if (!options.force && !name.startsWith(prefix)) {
    io.err(`Refusing to discard ${name}: not a staging branch (expected prefix ${prefix})`);
    return EXIT_CODES.ERRORS;
  }

  const runtime = createLocalRuntime(config, { logger: context.logger });
  try {
    await runtime.catalog.deleteBranch(name);
    io.out(`Discarded ${name}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    io.err(err instanceof BranchNotFoundError ? err.message : `Error: ${err.message}`);
    return EXIT_CODES.ERRORS;
  } finally {
    runtime.close();
  }
}
