/**
 * Compile Command
 *
 * Load a descriptor and show the assertions its quality rules compile to.
 * Touches neither the catalog nor the project directory.
 *
 * Usage:
 *   data-product-publisher compile <descriptor> [--json]
 */

import type { Command } from 'commander';
import { ContractLoader } from '../../contract/contract-loader.js';
import { describeQualityRule } from '../../contract/quality-rules.js';
import { RuleCompiler, describeVerification } from '../../compiler/rule-compiler.js';
import { ContractParseError, isFatalPublisherError, toError } from '../../core/errors.js';
import {
  createCommandContext,
  EXIT_CODES,
  type CommandContext,
  type ExitCode,
  type GlobalOptions,
} from '../context.js';

export interface CompileOptions {
  readonly json?: boolean;
}

export function registerCompileCommand(program: Command): void {
  program
    .command('compile')
    .description('Compile a descriptor\'s quality rules and print the assertions')
    .argument('<descriptor>', 'Descriptor file or directory containing it')
    .option('--json', 'Output as JSON')
    .action(async (descriptor: string, options: CompileOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const context = await createCommandContext(globals);
      process.exitCode = await executeCompile(descriptor, options, context);
    });
}

export async function executeCompile(
  descriptor: string,
  options: CompileOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { config, io } = context;

  try {
    const loader = new ContractLoader({
      projectsRoot: config.contract.projectsRoot,
      inputNamespace: config.contract.inputNamespace,
    });
    const { contract, projectDir } = await loader.load(descriptor);
    const verification = new RuleCompiler({
      freshnessParameter: config.run.freshnessParameter,
    }).compile(contract);

    if (options.json) {
      io.out(
        JSON.stringify(
          {
            name: verification.name,
            tableName: verification.tableName,
            freshnessParameter: verification.freshnessParameter,
            projectDir,
            imports: verification.imports,
            assertions: verification.assertions.map((assertion) => ({
              name: assertion.name,
              scope: assertion.scope,
              column: assertion.column,
              rule: describeQualityRule(assertion.rule),
              description: assertion.description,
            })),
          },
          null,
          2
        )
      );
    } else {
      io.out(`${verification.name} (${verification.assertions.length} assertion(s))`);
      for (const line of describeVerification(verification)) {
        io.out(`  ${line}`);
      }
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const err = toError(error);
    io.err(err instanceof ContractParseError ? err.toLogString() : `Error: ${err.message}`);
    return isFatalPublisherError(err) ? EXIT_CODES.CONTRACT_ERROR : EXIT_CODES.ERRORS;
  }
}
