/**
 * Publisher Configuration
 *
 * Loads configuration from .publisherrc (YAML or JSON) with environment
 * variable overrides and defaults. The resolved value is passed explicitly to
 * the orchestrator and runtime factory; nothing reads configuration at import
 * time.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (CLI flags, tests)
 * 2. Environment variables (PUBLISHER_*, CATALOG_API_KEY, CATALOG_USER)
 * 3. Config file (.publisherrc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type CatalogStorageKind = 'memory' | 'sqlite';

export interface CatalogConfig {
  /** Acting user; prefixes staging branch names */
  readonly user: string;
  /**
   * Credential for a remote catalog service (`CATALOG_API_KEY`). Resolved here
   * for embedders that build their own catalog client; the local runtime does
   * not authenticate and ignores it.
   */
  readonly apiKey: string | null;
  /** Storage backing the local reference catalog */
  readonly storage: CatalogStorageKind;
  /** SQLite file for `storage: sqlite` */
  readonly databasePath: string;
  /** Root branch created in an empty local catalog */
  readonly defaultBranch: string;
}

export interface ContractConfig {
  /** Descriptor file or the directory containing it */
  readonly source: string;
  /** Directory (relative to the descriptor) holding pipeline projects */
  readonly projectsRoot: string;
  /** Namespace the product reads from; must match the output namespace */
  readonly inputNamespace: string | null;
}

export interface RunConfig {
  /** Pipeline run timeout in milliseconds */
  readonly timeoutMs: number;
  /** Run parameter carrying the date checked by freshness rules */
  readonly freshnessParameter: string;
  /** Extra parameters passed to every run */
  readonly parameters: Readonly<Record<string, string>>;
}

export interface StagingConfig {
  /** Staging branches are named `<user>.<prefix>_<product>_<suffix>` */
  readonly prefix: string;
}

export interface PublisherConfig {
  readonly version: number;
  readonly catalog: CatalogConfig;
  readonly contract: ContractConfig;
  readonly run: RunConfig;
  readonly staging: StagingConfig;
  readonly logLevel: LogLevel;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    catalog: z
      .object({
        user: z.string().optional(),
        storage: z.enum(['memory', 'sqlite']).optional(),
        database_path: z.string().optional(),
        default_branch: z.string().optional(),
      })
      .optional(),
    contract: z
      .object({
        source: z.string().optional(),
        projects_root: z.string().optional(),
        input_namespace: z.string().optional(),
      })
      .optional(),
    run: z
      .object({
        timeout_ms: z.number().int().optional(),
        freshness_parameter: z.string().optional(),
        parameters: z.record(z.string()).optional(),
      })
      .optional(),
    staging: z
      .object({
        prefix: z.string().optional(),
      })
      .optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<PublisherConfig, 'configPath'> = {
  version: 1,

  catalog: {
    user: 'local',
    apiKey: null,
    storage: 'sqlite',
    databasePath: './.publisher/catalog.db',
    defaultBranch: 'main',
  },

  contract: {
    source: '.',
    projectsRoot: 'src',
    inputNamespace: null,
  },

  run: {
    timeoutMs: 500_000,
    freshnessParameter: 'run_date',
    parameters: {},
  },

  staging: {
    prefix: 'staging',
  },

  logLevel: 'info',
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.publisherrc',
  '.publisherrc.yaml',
  '.publisherrc.yml',
  '.publisherrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML parser also handles JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? '';
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${field ? `${field}: ` : ''}${issue?.message ?? 'invalid'}`,
      field || undefined
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`PUBLISHER_${name}`];
  return value === '' ? undefined : value;
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new ConfigurationError(`PUBLISHER_${name} must be an integer, got '${value}'`, name);
  }
  return num;
}

function getEnvStorage(env: Env): CatalogStorageKind | undefined {
  const value = getEnvVar(env, 'CATALOG_STORAGE');
  if (value === undefined) return undefined;
  if (value !== 'memory' && value !== 'sqlite') {
    throw new ConfigurationError(
      `PUBLISHER_CATALOG_STORAGE must be 'memory' or 'sqlite', got '${value}'`,
      'catalog.storage'
    );
  }
  return value;
}

function getEnvLogLevel(env: Env): LogLevel | undefined {
  const value = env.LOG_LEVEL?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${value}'`,
      'logLevel'
    );
  }
  return value;
}

export interface ConfigOverrides {
  readonly user?: string;
  readonly contractSource?: string;
  readonly inputNamespace?: string;
  readonly timeoutMs?: number;
  readonly storage?: CatalogStorageKind;
  readonly databasePath?: string;
  readonly logLevel?: LogLevel;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
  /** Environment to read (default: process.env) */
  readonly env?: Env;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError on unreadable or invalid configuration
 */
export async function loadPublisherConfig(
  options: LoadConfigOptions = {}
): Promise<PublisherConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, 'configPath');
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  // Relative paths in a config file are relative to that file
  const baseDir = configPath ? resolve(configPath, '..') : cwd;

  const config: PublisherConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    catalog: {
      user:
        overrides.user ??
        env.CATALOG_USER ??
        fileConfig.catalog?.user ??
        DEFAULT_CONFIG.catalog.user,
      apiKey: env.CATALOG_API_KEY ?? DEFAULT_CONFIG.catalog.apiKey,
      storage:
        overrides.storage ??
        getEnvStorage(env) ??
        fileConfig.catalog?.storage ??
        DEFAULT_CONFIG.catalog.storage,
      databasePath: resolve(
        baseDir,
        overrides.databasePath ??
          getEnvVar(env, 'CATALOG_DB') ??
          fileConfig.catalog?.database_path ??
          DEFAULT_CONFIG.catalog.databasePath
      ),
      defaultBranch: fileConfig.catalog?.default_branch ?? DEFAULT_CONFIG.catalog.defaultBranch,
    },

    contract: {
      source: resolve(
        baseDir,
        overrides.contractSource ??
          getEnvVar(env, 'CONTRACT') ??
          fileConfig.contract?.source ??
          DEFAULT_CONFIG.contract.source
      ),
      projectsRoot:
        getEnvVar(env, 'PROJECTS_ROOT') ??
        fileConfig.contract?.projects_root ??
        DEFAULT_CONFIG.contract.projectsRoot,
      inputNamespace:
        overrides.inputNamespace ??
        getEnvVar(env, 'INPUT_NAMESPACE') ??
        fileConfig.contract?.input_namespace ??
        DEFAULT_CONFIG.contract.inputNamespace,
    },

    run: {
      timeoutMs:
        overrides.timeoutMs ??
        getEnvNumber(env, 'TIMEOUT_MS') ??
        fileConfig.run?.timeout_ms ??
        DEFAULT_CONFIG.run.timeoutMs,
      freshnessParameter:
        getEnvVar(env, 'FRESHNESS_PARAMETER') ??
        fileConfig.run?.freshness_parameter ??
        DEFAULT_CONFIG.run.freshnessParameter,
      parameters: fileConfig.run?.parameters ?? DEFAULT_CONFIG.run.parameters,
    },

    staging: {
      prefix: fileConfig.staging?.prefix ?? DEFAULT_CONFIG.staging.prefix,
    },

    logLevel:
      overrides.logLevel ?? getEnvLogLevel(env) ?? fileConfig.log_level ?? DEFAULT_CONFIG.logLevel,

    configPath,
  };

  validateConfig(config);
  return config;
}

// Branch names travel into catalog APIs; keep them to a conservative charset
const BRANCH_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: PublisherConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(
      `Unsupported config version: ${config.version}. Expected 1.`,
      'version'
    );
  }

  if (!BRANCH_SEGMENT.test(config.catalog.user)) {
    throw new ConfigurationError(
      `Catalog user '${config.catalog.user}' is not usable in a branch name`,
      'catalog.user'
    );
  }

  if (!BRANCH_SEGMENT.test(config.catalog.defaultBranch)) {
    throw new ConfigurationError(
      `Invalid default branch name '${config.catalog.defaultBranch}'`,
      'catalog.defaultBranch'
    );
  }

  if (!/^[A-Za-z0-9_-]+$/.test(config.staging.prefix)) {
    throw new ConfigurationError(
      `Invalid staging prefix '${config.staging.prefix}'`,
      'staging.prefix'
    );
  }

  if (!Number.isInteger(config.run.timeoutMs) || config.run.timeoutMs <= 0) {
    throw new ConfigurationError('Run timeout must be a positive integer', 'run.timeoutMs');
  }

  if (config.run.freshnessParameter.trim() === '') {
    throw new ConfigurationError(
      'Freshness parameter name must not be empty',
      'run.freshnessParameter'
    );
  }

  if (config.run.freshnessParameter in config.run.parameters) {
    throw new ConfigurationError(
      `Run parameter '${config.run.freshnessParameter}' is reserved for freshness checks`,
      'run.parameters'
    );
  }
}
