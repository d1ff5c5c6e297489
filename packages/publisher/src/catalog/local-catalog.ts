/**
 * Local Versioned Catalog
 *
 * In-process catalog with git-like branches over immutable table versions.
 * Implements the client interface the orchestrator consumes, plus the table
 * store the local pipeline executor reads and writes through.
 *
 * MERGE MODEL:
 * A branch remembers the parent's version map at fork time (`base`). Merging
 * `source` into `into` applies every table whose version in `source` differs
 * from `base`. If `into` moved the same table since the fork, the merge is
 * refused with MergeConflictError and nothing changes.
 */

import { randomUUID } from 'node:crypto';
import type {
  BranchHandle,
  Materialization,
  TableData,
  TableRef,
  TableStore,
  VersionedCatalogClient,
} from '../core/types/index.js';
import {
  BranchExistsError,
  BranchNotFoundError,
  MergeConflictError,
} from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import {
  parseTableKey,
  tableKey,
  type BranchRecord,
  type CatalogStorage,
  type VersionMap,
} from './storage.js';

export interface LocalCatalogOptions {
  readonly storage: CatalogStorage;
  /** Created empty when missing (default: main) */
  readonly defaultBranch?: string;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  readonly logger?: Logger;
}

export class LocalVersionedCatalog implements VersionedCatalogClient, TableStore {
  private readonly storage: CatalogStorage;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly log: Logger;
  readonly defaultBranch: string;

  constructor(options: LocalCatalogOptions) {
    this.storage = options.storage;
    this.defaultBranch = options.defaultBranch ?? 'main';
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.log = options.logger ?? createLogger({ module: 'local-catalog' });

    if (!this.storage.getBranch(this.defaultBranch)) {
      this.storage.putBranch({
        name: this.defaultBranch,
        fromRef: this.defaultBranch,
        createdAt: this.clock().toISOString(),
        base: {},
        head: {},
      });
    }
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  async hasBranch(name: string): Promise<boolean> {
    return this.storage.getBranch(name) !== null;
  }

  /**
   * @throws BranchExistsError
   * @throws BranchNotFoundError - `fromRef` does not exist
   */
  async createBranch(name: string, fromRef: string): Promise<BranchHandle> {
    const record = this.storage.transaction(() => {
      if (this.storage.getBranch(name)) {
        throw new BranchExistsError(name);
      }
      const parent = this.requireBranch(fromRef);
      const created: BranchRecord = {
        name,
        fromRef,
        createdAt: this.clock().toISOString(),
        base: { ...parent.head },
        head: { ...parent.head },
      };
      this.storage.putBranch(created);
      return created;
    });

    this.log.debug('Branch created', { branch: name, fromRef });
    return { name: record.name, fromRef: record.fromRef, createdAt: new Date(record.createdAt) };
  }

  /**
   * @throws BranchNotFoundError
   */
  async deleteBranch(name: string): Promise<void> {
    if (name === this.defaultBranch) {
      throw new Error(`Refusing to delete the default branch ${name}`);
    }
    if (!this.storage.deleteBranch(name)) {
      throw new BranchNotFoundError(name);
    }
    this.log.debug('Branch deleted', { branch: name });
  }

  /**
   * @throws BranchNotFoundError
   * @throws MergeConflictError
   */
  async mergeBranch(source: string, into: string): Promise<void> {
    const applied = this.storage.transaction(() => {
      const from = this.requireBranch(source);
      const target = this.requireBranch(into);

      const changed = changedKeys(from.base, from.head);
      const conflicts = changed.filter(
        (key) => target.head[key] !== from.base[key] && target.head[key] !== from.head[key]
      );
      if (conflicts.length > 0) {
        throw new MergeConflictError(source, into, conflicts);
      }

      const head: Record<string, string> = { ...target.head };
      for (const key of changed) {
        const version = from.head[key];
        if (version === undefined) {
          delete head[key];
        } else {
          head[key] = version;
        }
      }

      this.storage.putBranch({ ...target, head });
      // Later merges of the same source only carry newer changes
      this.storage.putBranch({ ...from, base: { ...head } });
      return changed;
    });

    this.log.debug('Branch merged', { source, into, tables: applied });
  }

  async listBranches(prefix?: string): Promise<readonly string[]> {
    return this.storage
      .listBranches()
      .map((branch) => branch.name)
      .filter((name) => prefix === undefined || name.startsWith(prefix))
      .sort();
  }

  // ==========================================================================
  // Tables
  // ==========================================================================

  async readTable(ref: string, namespace: string, table: string): Promise<TableData | null> {
    const branch = this.requireBranch(ref);
    const versionId = branch.head[tableKey(namespace, table)];
    if (versionId === undefined) return null;

    const version = this.storage.getTableVersion(versionId);
    if (!version) {
      throw new Error(`Table version ${versionId} of ${namespace}.${table} is missing`);
    }
    return { columns: version.columns, rows: version.rows };
  }

  /**
   * Write a new table version on `ref`
   *
   * REPLACE stores `data` as is. APPEND adds `data.rows` after the current
   * rows; columns are the union, current columns first.
   */
  async writeTable(
    ref: string,
    namespace: string,
    table: string,
    data: TableData,
    mode: Materialization
  ): Promise<void> {
    if (namespace.includes('.')) {
      throw new Error(`Namespace must not contain '.': ${namespace}`);
    }

    const key = tableKey(namespace, table);
    this.storage.transaction(() => {
      const branch = this.requireBranch(ref);
      let columns = data.columns;
      let rows = data.rows;

      const currentId = branch.head[key];
      if (mode === 'APPEND' && currentId !== undefined) {
        const current = this.storage.getTableVersion(currentId);
        if (current) {
          columns = [...current.columns, ...data.columns.filter((c) => !current.columns.includes(c))];
          rows = [...current.rows, ...data.rows];
        }
      }

      const id = this.idGenerator();
      this.storage.putTableVersion({
        id,
        namespace,
        table,
        columns,
        rows,
        createdAt: this.clock().toISOString(),
      });
      this.storage.putBranch({ ...branch, head: { ...branch.head, [key]: id } });
    });

    this.log.debug('Table written', { ref, table: key, mode, rows: data.rows.length });
  }

  async listTables(ref: string, namespace?: string): Promise<readonly TableRef[]> {
    const branch = this.requireBranch(ref);
    return Object.keys(branch.head)
      .map(parseTableKey)
      .filter((t) => namespace === undefined || t.namespace === namespace)
      .sort((a, b) => tableKey(a.namespace, a.table).localeCompare(tableKey(b.namespace, b.table)));
  }

  close(): void {
    this.storage.close();
  }

  private requireBranch(name: string): BranchRecord {
    const branch = this.storage.getBranch(name);
    if (!branch) {
      throw new BranchNotFoundError(name);
    }
    return branch;
  }
}

/**
 * Keys whose version differs between two maps (added, changed or removed)
 */
function changedKeys(base: VersionMap, head: VersionMap): string[] {
  const keys = new Set([...Object.keys(base), ...Object.keys(head)]);
  return [...keys].filter((key) => base[key] !== head[key]).sort();
}
