/**
 * Publish Command
 *
 * Run one Write-Audit-Publish attempt against the configured local catalog,
 * exactly as the scheduled trigger does, and print its summary.
 *
 * Usage:
 *   data-product-publisher publish [descriptor]
 */

import type { Command } from 'commander';
import { executeScheduledPublish, type TriggerOutcome } from '../../orchestrator/trigger.js';
import { createLocalRuntime } from '../../runtime.js';
import {
  createCommandContext,
  EXIT_CODES,
  type CommandContext,
  type ExitCode,
  type GlobalOptions,
} from '../context.js';

const OUTCOME_EXIT_CODES: Readonly<Record<TriggerOutcome, ExitCode>> = {
  MERGED: EXIT_CODES.SUCCESS,
  PRESERVED: EXIT_CODES.PRESERVED,
  ABORTED: EXIT_CODES.CONTRACT_ERROR,
};

export function registerPublishCommand(program: Command): void {
  program
    .command('publish')
    .description('Stage, run, verify and publish the data product once')
    .argument('[descriptor]', 'Descriptor file or directory (default: configured contract source)')
    .action(async (descriptor: string | undefined, _options: unknown, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const context = await createCommandContext(globals);
      process.exitCode = await executePublish(descriptor, context);
    });
}

export async function executePublish(
  descriptor: string | undefined,
  context: CommandContext
): Promise<ExitCode> {
  const runtime = createLocalRuntime(context.config, { logger: context.logger });
  try {
    const result = await executeScheduledPublish({
      orchestrator: runtime.orchestrator,
      source: descriptor,
      logger: context.logger,
    });

    context.io.out(JSON.stringify(result.summary, null, 2));
    if (result.attempt?.error) {
      context.io.err(`Staging branch kept: ${result.attempt.stagingBranch}`);
      context.io.err(`Reason: ${result.attempt.error.message}`);
    }

    return OUTCOME_EXIT_CODES[result.summary.data.outcome];
  } finally {
    runtime.close();
  }
}
