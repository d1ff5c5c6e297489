/**
 * Pipeline Projects
 *
 * A pipeline project is the implementation side of a data product: an ordered
 * list of models, each reading tables from the run's namespace and
 * materializing one output table on the run's ref.
 *
 * Projects are either registered in-process or loaded from `pipeline.js` /
 * `pipeline.mjs` in the project directory (default export, or a named
 * `project` export).
 */

import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type {
  Materialization,
  RunParameters,
  TableData,
} from '../core/types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ModelContext {
  readonly ref: string;
  readonly namespace: string;
  readonly parameters: RunParameters;
  readonly now: Date;
}

export interface PipelineModel {
  /** Output table name */
  readonly name: string;
  /** Tables read from the run namespace, passed to `transform` by name */
  readonly inputs?: readonly string[];
  /** Default: REPLACE */
  readonly materialization?: Materialization;
  readonly transform: (
    inputs: Readonly<Record<string, TableData>>,
    context: ModelContext
  ) => TableData | Promise<TableData>;
}

export interface PipelineProject {
  readonly name?: string;
  readonly models: readonly PipelineModel[];
}

export const PIPELINE_MODULE_NAMES = ['pipeline.js', 'pipeline.mjs'] as const;

// ============================================================================
// Type Guards
// ============================================================================

export function isPipelineModel(value: unknown): value is PipelineModel {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string' || value.name.length === 0) {
    return false;
  }
  if (!('transform' in value) || typeof value.transform !== 'function') return false;
  if ('inputs' in value && value.inputs !== undefined) {
    const inputs: unknown = value.inputs;
    if (!Array.isArray(inputs) || !inputs.every((input: unknown) => typeof input === 'string')) {
      return false;
    }
  }
  if ('materialization' in value && value.materialization !== undefined) {
    return value.materialization === 'REPLACE' || value.materialization === 'APPEND';
  }
  return true;
}

export function isPipelineProject(value: unknown): value is PipelineProject {
  return (
    typeof value === 'object' &&
    value !== null &&
    'models' in value &&
    Array.isArray(value.models) &&
    value.models.every(isPipelineModel)
  );
}

// ============================================================================
// Registry
// ============================================================================

/**
 * In-process projects keyed by absolute project directory
 */
export class PipelineProjectRegistry {
  private readonly projects = new Map<string, PipelineProject>();

  register(projectDir: string, project: PipelineProject): this {
    this.projects.set(resolve(projectDir), project);
    return this;
  }

  get(projectDir: string): PipelineProject | null {
    return this.projects.get(resolve(projectDir)) ?? null;
  }
}

/**
 * Import the project module from `projectDir`
 *
 * @returns null when the directory has no pipeline module
 * @throws Error when the module exists but exports no valid project
 */
export async function importPipelineProject(projectDir: string): Promise<PipelineProject | null> {
  for (const fileName of PIPELINE_MODULE_NAMES) {
    const modulePath = join(resolve(projectDir), fileName);
    const exists = await access(modulePath).then(
      () => true,
      () => false
    );
    if (!exists) continue;

    const loaded: unknown = await import(pathToFileURL(modulePath).href);
    const candidate = pickExport(loaded);
    if (!isPipelineProject(candidate)) {
      throw new Error(`${modulePath} does not export a pipeline project ({ models: [...] })`);
    }
    return candidate;
  }
  return null;
}

function pickExport(loaded: unknown): unknown {
  if (typeof loaded !== 'object' || loaded === null) return undefined;
  if ('default' in loaded && isPipelineProject(loaded.default)) return loaded.default;
  if ('project' in loaded) return loaded.project;
  return 'default' in loaded ? loaded.default : undefined;
}
