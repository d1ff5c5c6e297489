/**
 * Catalog Storage
 *
 * Persistence seam under the local versioned catalog. Adapters are synchronous;
 * the catalog wraps them in its async client interface.
 *
 * Branches do not own table data. A branch maps table keys
 * (`<namespace>.<table>`) to immutable table versions, so forking a branch
 * copies a map and never a table.
 */

import type { TableRow } from '../core/types/index.js';

// ============================================================================
// Records
// ============================================================================

/**
 * Table key -> table version id
 */
export type VersionMap = Readonly<Record<string, string>>;

export interface BranchRecord {
  readonly name: string;
  readonly fromRef: string;
  /** ISO-8601 */
  readonly createdAt: string;
  /** Parent head at fork time (or last merge); used for conflict detection */
  readonly base: VersionMap;
  readonly head: VersionMap;
}

export interface TableVersionRecord {
  readonly id: string;
  readonly namespace: string;
  readonly table: string;
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
  /** ISO-8601 */
  readonly createdAt: string;
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface CatalogStorage {
  getBranch(name: string): BranchRecord | null;
  listBranches(): readonly BranchRecord[];
  /** Insert or replace */
  putBranch(branch: BranchRecord): void;
  /** @returns false when no such branch existed */
  deleteBranch(name: string): boolean;

  getTableVersion(id: string): TableVersionRecord | null;
  putTableVersion(version: TableVersionRecord): void;

  /** Run `fn` atomically; a throw leaves storage unchanged */
  transaction<T>(fn: () => T): T;

  close(): void;
}

export function tableKey(namespace: string, table: string): string {
  return `${namespace}.${table}`;
}

/**
 * Split a table key on its first dot (namespaces never contain one)
 */
export function parseTableKey(key: string): { namespace: string; table: string } {
  const index = key.indexOf('.');
  return index === -1
    ? { namespace: '', table: key }
    : { namespace: key.slice(0, index), table: key.slice(index + 1) };
}
