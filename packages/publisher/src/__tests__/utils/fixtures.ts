/**
 * Test Fixture Factories
 *
 * Descriptor builders, temporary project directories and small in-process
 * pipeline projects. Every builder returns a fresh object.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { PublisherConfig } from '../../core/config.js';
import { DEFAULT_CONFIG } from '../../core/config.js';
import { Logger } from '../../core/utils/logger.js';
import type { PipelineProject } from '../../executor/pipeline-project.js';
import type { TableData } from '../../core/types/index.js';

// ============================================================================
// Descriptors
// ============================================================================

export interface DescriptorOptions {
  readonly productName?: string;
  readonly tableName?: string;
  readonly namespace?: string;
  readonly branch?: string;
  readonly projectFolder?: string;
  /** Entries as written in the descriptor (thresholds may be strings) */
  readonly tableQuality?: readonly Readonly<Record<string, unknown>>[];
  /** Column -> rules; `undefined` rules leave out the `quality` key */
  readonly properties?: Readonly<Record<string, readonly Readonly<Record<string, unknown>>[] | undefined>>;
  readonly inputNamespace?: string;
  /** Leave out a required part to build a malformed descriptor */
  readonly omit?: 'outputPorts' | 'tableQuality';
}

/**
 * Descriptor in the shape a product team writes it
 */
export function buildDescriptor(options: DescriptorOptions = {}): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const declared = options.properties ?? {
    trip_id: [{ rule: 'duplicateCount', mustBeEqualTo: 0 }],
    on_scene_datetime: [{ rule: 'null', mustBeEqualTo: 0 }],
    fare: undefined,
  };
  for (const [column, rules] of Object.entries(declared)) {
    properties[column] = rules === undefined ? { type: 'number' } : { type: 'string', quality: rules };
  }

  const table: Record<string, unknown> = { properties };
  if (options.omit !== 'tableQuality') {
    table.quality = options.tableQuality ?? [{ rule: 'freshness', unit: 'day', mustBeLessThan: 1 }];
  }
  if (options.tableName) table.name = options.tableName;

  const outputPorts = [
    {
      name: 'trips-output',
      promises: {
        api: {
          definition: {
            schema: {
              databaseName: options.productName ?? 'trips_summary',
              tables: [table],
            },
            services: {
              production: {
                catalogInfo: {
                  namespace: options.namespace ?? 'rides',
                  branch: options.branch ?? 'main',
                },
              },
            },
          },
        },
      },
    },
  ];

  return {
    dataProductDescriptor: '0.0.1',
    info: { title: 'Trips', owner: 'data-team' },
    interfaceComponents: {
      ...(options.omit === 'outputPorts' ? {} : { outputPorts }),
      ...(options.inputNamespace
        ? {
            inputPorts: [
              {
                promises: {
                  api: {
                    definition: {
                      services: {
                        production: { catalogInfo: { namespace: options.inputNamespace } },
                      },
                    },
                  },
                },
              },
            ],
          }
        : {}),
    },
    internalComponents: {
      applicationComponents: [
        { configs: { project_folder: options.projectFolder ?? 'trips_pipeline' } },
      ],
    },
  };
}

// ============================================================================
// Temporary Directories
// ============================================================================

export interface TempProject {
  readonly root: string;
  readonly descriptorPath: string;
  readonly projectDir: string;
  cleanup(): Promise<void>;
}

/**
 * Write a descriptor plus an empty `src/<project_folder>` into a fresh temp dir
 */
export async function createTempProject(options: DescriptorOptions = {}): Promise<TempProject> {
  const root = await mkdtemp(join(tmpdir(), 'publisher-test-'));
  const projectDir = join(root, 'src', options.projectFolder ?? 'trips_pipeline');
  await mkdir(projectDir, { recursive: true });

  const descriptorPath = join(root, 'data-product-descriptor.json');
  await writeFile(descriptorPath, JSON.stringify(buildDescriptor(options), null, 2), 'utf-8');

  return {
    root,
    descriptorPath,
    projectDir,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export async function createTempDir(): Promise<{ dir: string; cleanup(): Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'publisher-test-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

// ============================================================================
// Config & Logging
// ============================================================================

export function buildConfig(overrides: {
  readonly user?: string;
  readonly timeoutMs?: number;
  readonly parameters?: Readonly<Record<string, string>>;
  readonly freshnessParameter?: string;
} = {}): PublisherConfig {
  return {
    ...DEFAULT_CONFIG,
    catalog: {
      ...DEFAULT_CONFIG.catalog,
      user: overrides.user ?? 'tester',
      storage: 'memory',
    },
    run: {
      timeoutMs: overrides.timeoutMs ?? DEFAULT_CONFIG.run.timeoutMs,
      freshnessParameter: overrides.freshnessParameter ?? DEFAULT_CONFIG.run.freshnessParameter,
      parameters: overrides.parameters ?? {},
    },
    configPath: null,
  };
}

/**
 * Logger whose methods are spies; nothing reaches the console
 */
export function createSilentLogger(): Logger {
  const logger = new Logger({ level: 'debug', service: 'test', pretty: true });
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  vi.spyOn(logger, 'error').mockImplementation(() => undefined);
  vi.spyOn(logger, 'child').mockReturnValue(logger);
  return logger;
}

// ============================================================================
// Tables & Pipeline Projects
// ============================================================================

export function buildTable(
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, string | number | boolean | null>>>
): TableData {
  return { columns, rows };
}

export const TRIP_COLUMNS = ['trip_id', 'on_scene_datetime', 'fare'] as const;

/**
 * Single-model project appending `raw_trips` rows to `trips_summary`.
 * `failWith` makes the transform throw.
 */
export function buildTripsProject(options: { readonly failWith?: string } = {}): PipelineProject {
  return {
    name: 'trips_pipeline',
    models: [
      {
        name: 'trips_summary',
        inputs: ['raw_trips'],
        materialization: 'APPEND',
        transform: (inputs) => {
          if (options.failWith) {
            throw new Error(options.failWith);
          }
          const raw = inputs.raw_trips;
          return {
            columns: [...TRIP_COLUMNS],
            rows: raw.rows.map((row) => ({
              trip_id: row.trip_id,
              on_scene_datetime: row.on_scene_datetime,
              fare: row.fare,
            })),
          };
        },
      },
    ],
  };
}
