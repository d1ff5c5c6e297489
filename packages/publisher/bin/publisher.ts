#!/usr/bin/env tsx
/**
 * Data Product Publisher CLI Entry Point
 *
 * @module data-product-publisher-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import { EXIT_CODES } from '../src/cli/context.js';
import { isPublisherError } from '../src/core/errors.js';

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const result = z
    .object({ version: z.string() })
    .safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return result.success ? result.data.version : '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('data-product-publisher')
    .description('Compile data product contracts and publish them with Write-Audit-Publish')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--config <path>', 'Path to config file (default: .publisherrc)')
    .option('--user <name>', 'Acting catalog user (default: CATALOG_USER)')
    .option('--storage <kind>', 'Local catalog storage: memory|sqlite')
    .option('--db <path>', 'SQLite catalog file');

  registerCommands(program);

  program.on('command:*', (operands: string[]) => {
    console.error(`Unknown command: ${operands.join(' ')}`);
    process.exit(EXIT_CODES.UNKNOWN_COMMAND);
  });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (isPublisherError(error) && error.code === 'CONFIGURATION') {
      console.error(`Configuration error: ${message}`);
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    console.error(`Error: ${message}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
