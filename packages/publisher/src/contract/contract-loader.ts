/**
 * Contract Loader
 *
 * Reads a data product descriptor (JSON or YAML) and turns it into an immutable
 * `DataProductContract` plus the path of the pipeline project implementing it.
 *
 * Only the first output port, first table and first application component are
 * read; a product publishes exactly one table.
 *
 * Side effects: read access to the descriptor file, nothing else.
 *
 * @module contract/contract-loader
 */

import { readFile, stat } from 'node:fs/promises';
import { dirname, extname, isAbsolute, join, relative, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import type {
  ColumnQualityRules,
  DataProductContract,
  LoadedContract,
} from '../core/types/index.js';
import {
  ContractParseError,
  NamespaceMismatchError,
  type ContractIssue,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { deepFreeze } from '../core/utils/freeze.js';
import { DataProductDescriptorSchema, type DataProductDescriptor } from './descriptor-schema.js';
import { toQualityRule } from './quality-rules.js';

const log = createLogger({ module: 'contract-loader' });

/**
 * Descriptor file names looked up when the source is a directory
 */
export const DESCRIPTOR_FILE_NAMES = [
  'data-product-descriptor.json',
  'data-product-descriptor.yaml',
  'data-product-descriptor.yml',
] as const;

export interface ContractLoaderOptions {
  /** Directory (relative to the descriptor) holding pipeline projects */
  readonly projectsRoot: string;
  /** Namespace the product reads from, when known outside the descriptor */
  readonly inputNamespace?: string | null;
}

export class ContractLoader {
  private readonly options: ContractLoaderOptions;

  constructor(options: ContractLoaderOptions) {
    this.options = options;
  }

  /**
   * Load a descriptor file, or the descriptor inside a directory
   *
   * @throws ContractParseError - unreadable, malformed or incomplete descriptor
   * @throws NamespaceMismatchError - input and output namespaces differ
   */
  async load(source: string): Promise<LoadedContract> {
    const descriptorPath = await resolveDescriptorPath(source);

    let content: string;
    try {
      content = await readFile(descriptorPath, 'utf-8');
    } catch (error) {
      throw new ContractParseError(
        `Cannot read descriptor: ${error instanceof Error ? error.message : String(error)}`,
        [],
        descriptorPath
      );
    }

    const document = parseDocument(content, descriptorPath);
    const loaded = this.parse(document, descriptorPath);

    log.info('Contract loaded', {
      product: loaded.contract.productName,
      table: loaded.contract.tableName,
      namespace: loaded.contract.output.namespace,
      branch: loaded.contract.output.branch,
      tableRules: loaded.contract.tableRules.length,
      columnRules: loaded.contract.columnRules.reduce((sum, c) => sum + c.rules.length, 0),
      projectDir: loaded.projectDir,
    });

    return loaded;
  }

  /**
   * Build a contract from an already-parsed descriptor document
   */
  parse(document: unknown, descriptorPath: string): LoadedContract {
    const result = DataProductDescriptorSchema.safeParse(document);
    if (!result.success) {
      const issues = result.error.issues.map(toContractIssue);
      throw new ContractParseError(
        `Descriptor is missing required fields (${issues.length} issue${issues.length === 1 ? '' : 's'})`,
        issues,
        descriptorPath
      );
    }

    const descriptor = result.data;
    const contract = buildContract(descriptor, this.options.inputNamespace ?? null);
    this.checkNamespaces(contract);

    const projectDir = this.resolveProjectDir(descriptor, descriptorPath);

    return deepFreeze({
      contract,
      projectDir,
      descriptorPath,
    });
  }

  private checkNamespaces(contract: DataProductContract): void {
    for (const inputNamespace of contract.inputNamespaces) {
      if (inputNamespace !== contract.output.namespace) {
        throw new NamespaceMismatchError(inputNamespace, contract.output.namespace);
      }
    }
  }

  private resolveProjectDir(descriptor: DataProductDescriptor, descriptorPath: string): string {
    const folder = descriptor.internalComponents.applicationComponents[0].configs.project_folder;
    const root = resolve(dirname(descriptorPath), this.options.projectsRoot);
    const projectDir = resolve(root, folder);

    const rel = relative(root, projectDir);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new ContractParseError(
        `project_folder '${folder}' must name a directory inside ${root}`,
        [
          {
            path: 'internalComponents.applicationComponents.0.configs.project_folder',
            message: 'Must be a relative path below the projects root',
          },
        ],
        descriptorPath
      );
    }

    return projectDir;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function buildContract(
  descriptor: DataProductDescriptor,
  configuredInputNamespace: string | null
): DataProductContract {
  const definition = descriptor.interfaceComponents.outputPorts[0].promises.api.definition;
  const table = definition.schema.tables[0];
  const catalogInfo = definition.services.production.catalogInfo;

  const columnRules: ColumnQualityRules[] = [];
  for (const [column, property] of Object.entries(table.properties)) {
    const rules = property.quality ?? [];
    if (rules.length > 0) {
      columnRules.push({ column, rules: rules.map(toQualityRule) });
    }
  }

  // Configured namespace first so a mismatch names it before any port's
  const inputNamespaces: string[] = [];
  const declared = [
    configuredInputNamespace,
    ...(descriptor.interfaceComponents.inputPorts ?? []).map(
      (port) => port.promises?.api?.definition?.services?.production?.catalogInfo?.namespace
    ),
  ];
  for (const namespace of declared) {
    if (namespace && !inputNamespaces.includes(namespace)) {
      inputNamespaces.push(namespace);
    }
  }

  return {
    productName: definition.schema.databaseName,
    tableName: table.name ?? definition.schema.databaseName,
    columns: Object.keys(table.properties),
    columnRules,
    tableRules: table.quality.map(toQualityRule),
    output: {
      namespace: catalogInfo.namespace,
      branch: catalogInfo.branch,
    },
    inputNamespaces,
  };
}

async function resolveDescriptorPath(source: string): Promise<string> {
  const absolute = resolve(source);
  const info = await stat(absolute).catch((error: unknown) => {
    throw new ContractParseError(
      `Descriptor source not readable: ${error instanceof Error ? error.message : String(error)}`,
      [],
      absolute
    );
  });

  if (!info.isDirectory()) {
    return absolute;
  }

  for (const fileName of DESCRIPTOR_FILE_NAMES) {
    const candidate = join(absolute, fileName);
    const candidateInfo = await stat(candidate).catch(() => null);
    if (candidateInfo?.isFile()) {
      return candidate;
    }
  }

  throw new ContractParseError(
    `No descriptor found in ${absolute} (looked for ${DESCRIPTOR_FILE_NAMES.join(', ')})`,
    [],
    absolute
  );
}

function parseDocument(content: string, descriptorPath: string): unknown {
  const extension = extname(descriptorPath).toLowerCase();
  const isYaml = extension === '.yaml' || extension === '.yml';
  try {
    return isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ContractParseError(
      `Descriptor is not valid ${isYaml ? 'YAML' : 'JSON'}: ${error instanceof Error ? error.message : String(error)}`,
      [],
      descriptorPath
    );
  }
}

function toContractIssue(issue: ZodIssue): ContractIssue {
  return {
    path: issue.path.join('.'),
    message: issue.message,
  };
}
