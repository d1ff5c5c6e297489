/**
 * CLI context: exit codes, global options and output sinks shared by commands
 */

import {
  loadPublisherConfig,
  type CatalogStorageKind,
  type PublisherConfig,
} from '../core/config.js';
import { createLogger, type Logger } from '../core/utils/logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Publish attempt ended in PRESERVED */
  PRESERVED: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  CONTRACT_ERROR: 4,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global Options
// ============================================================================

// Type alias: commander's OptionValues requires an index signature
export type GlobalOptions = {
  readonly config?: string;
  readonly user?: string;
  readonly storage?: string;
  readonly db?: string;
  readonly verbose?: boolean;
};

/**
 * Where command output goes; tests capture it instead of the console
 */
export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CommandContext {
  readonly config: PublisherConfig;
  readonly logger: Logger;
  readonly io: CommandIO;
}

function parseStorage(value: string | undefined): CatalogStorageKind | undefined {
  if (value === undefined) return undefined;
  if (value === 'memory' || value === 'sqlite') return value;
  throw new Error(`--storage must be 'memory' or 'sqlite', got '${value}'`);
}

/**
 * Resolve configuration for a command from global CLI options
 *
 * @throws ConfigurationError / Error on invalid configuration or options
 */
export async function createCommandContext(
  options: GlobalOptions,
  io: CommandIO = consoleIO
): Promise<CommandContext> {
  const config = await loadPublisherConfig({
    configPath: options.config,
    overrides: {
      user: options.user,
      storage: parseStorage(options.storage),
      databasePath: options.db,
      logLevel: options.verbose ? 'debug' : undefined,
    },
  });

  return {
    config,
    logger: createLogger({ module: 'cli', level: config.logLevel }),
    io,
  };
}
