/**
 * In-Memory Catalog Storage
 *
 * Map-backed adapter for tests and one-shot local runs. Nothing survives the
 * process.
 *
 * Versions are copied on the way in and on the way out, so no caller holds a
 * reference into stored table data.
 */

import type { BranchRecord, CatalogStorage, TableVersionRecord } from '../storage.js';

export class InMemoryCatalogStorage implements CatalogStorage {
  private branches = new Map<string, BranchRecord>();
  private versions = new Map<string, TableVersionRecord>();

  getBranch(name: string): BranchRecord | null {
    return this.branches.get(name) ?? null;
  }

  listBranches(): readonly BranchRecord[] {
    return [...this.branches.values()];
  }

  putBranch(branch: BranchRecord): void {
    this.branches.set(branch.name, branch);
  }

  deleteBranch(name: string): boolean {
    return this.branches.delete(name);
  }

  getTableVersion(id: string): TableVersionRecord | null {
    const version = this.versions.get(id);
    return version ? copyVersion(version) : null;
  }

  putTableVersion(version: TableVersionRecord): void {
    this.versions.set(version.id, copyVersion(version));
  }

  transaction<T>(fn: () => T): T {
    const branches = new Map(this.branches);
    const versions = new Map(this.versions);
    try {
      return fn();
    } catch (error) {
      this.branches = branches;
      this.versions = versions;
      throw error;
    }
  }

  close(): void {
    this.branches.clear();
    this.versions.clear();
  }
}

function copyVersion(version: TableVersionRecord): TableVersionRecord {
  return {
    ...version,
    columns: [...version.columns],
    rows: version.rows.map((row) => ({ ...row })),
  };
}
