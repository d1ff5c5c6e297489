/**
 * CLI command registration
 */

import type { Command } from 'commander';
import { registerBranchesCommands } from './branches.js';
import { registerCompileCommand } from './compile.js';
import { registerPublishCommand } from './publish.js';

export function registerCommands(program: Command): void {
  registerCompileCommand(program);
  registerPublishCommand(program);
  registerBranchesCommands(program);
}

export { executeCompile } from './compile.js';
export { executePublish } from './publish.js';
export { executeListBranches, executeDiscardBranch } from './branches.js';
