/**
 * SQLite Catalog Storage
 *
 * better-sqlite3 adapter for a catalog that outlives the process, so preserved
 * staging branches can be inspected and discarded later.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, matching the synchronous storage interface
 * - WAL mode so the CLI can read while a publish is running
 * - Version maps and rows stored as JSON, validated with zod on read
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { BranchRecord, CatalogStorage, TableVersionRecord } from '../storage.js';

// ============================================================================
// Types
// ============================================================================

export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

interface BranchRow {
  readonly name: string;
  readonly from_ref: string;
  readonly created_at: string;
  readonly base_json: string;
  readonly head_json: string;
}

interface TableVersionRow {
  readonly id: string;
  readonly namespace: string;
  readonly table_name: string;
  readonly columns_json: string;
  readonly rows_json: string;
  readonly created_at: string;
}

const VersionMapSchema = z.record(z.string());
const ColumnsSchema = z.array(z.string());
const RowsSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE branches (
          name TEXT PRIMARY KEY,
          from_ref TEXT NOT NULL,
          created_at TEXT NOT NULL,
          base_json TEXT NOT NULL,
          head_json TEXT NOT NULL
        );

        CREATE TABLE table_versions (
          id TEXT PRIMARY KEY,
          namespace TEXT NOT NULL,
          table_name TEXT NOT NULL,
          columns_json TEXT NOT NULL,
          rows_json TEXT NOT NULL,
          created_at TEXT NOT NULL
        );

        CREATE INDEX idx_table_versions_table ON table_versions(namespace, table_name);
      `);
    },
  },
];

// ============================================================================
// Adapter
// ============================================================================

export class SqliteCatalogStorage implements CatalogStorage {
  private readonly db: Database.Database;

  constructor(dbPath: string = '.publisher/catalog.db') {
    this.db = new Database(dbPath);

    // Enable WAL mode for concurrent reads
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
  }

  /**
   * Apply pending migrations. Call once before first use.
   */
  runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const current = this.getDatabaseVersion();
    const apply = this.db.transaction(() => {
      for (const migration of MIGRATIONS) {
        if (migration.version > current) {
          migration.up(this.db);
          this.db
            .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
            .run(migration.version, migration.name);
        }
      }
    });
    apply();
  }

  getDatabaseVersion(): number {
    const row = this.db
      .prepare('SELECT MAX(version) as version FROM schema_migrations')
      .get() as { version: number | null } | undefined;
    return row?.version ?? 0;
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  getBranch(name: string): BranchRecord | null {
    const row = this.db
      .prepare('SELECT * FROM branches WHERE name = ?')
      .get(name) as BranchRow | undefined;
    return row ? toBranchRecord(row) : null;
  }

  listBranches(): readonly BranchRecord[] {
    const rows = this.db.prepare('SELECT * FROM branches ORDER BY name').all() as BranchRow[];
    return rows.map(toBranchRecord);
  }

  putBranch(branch: BranchRecord): void {
    this.db
      .prepare(
        `INSERT INTO branches (name, from_ref, created_at, base_json, head_json)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(name) DO UPDATE SET
           from_ref = excluded.from_ref,
           created_at = excluded.created_at,
           base_json = excluded.base_json,
           head_json = excluded.head_json`
      )
      .run(
        branch.name,
        branch.fromRef,
        branch.createdAt,
        JSON.stringify(branch.base),
        JSON.stringify(branch.head)
      );
  }

  deleteBranch(name: string): boolean {
    return this.db.prepare('DELETE FROM branches WHERE name = ?').run(name).changes > 0;
  }

  // ==========================================================================
  // Table Versions
  // ==========================================================================

  getTableVersion(id: string): TableVersionRecord | null {
    const row = this.db
      .prepare('SELECT * FROM table_versions WHERE id = ?')
      .get(id) as TableVersionRow | undefined;
    if (!row) return null;

    return {
      id: row.id,
      namespace: row.namespace,
      table: row.table_name,
      columns: ColumnsSchema.parse(JSON.parse(row.columns_json)),
      rows: RowsSchema.parse(JSON.parse(row.rows_json)),
      createdAt: row.created_at,
    };
  }

  putTableVersion(version: TableVersionRecord): void {
    this.db
      .prepare(
        `INSERT INTO table_versions (id, namespace, table_name, columns_json, rows_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        version.id,
        version.namespace,
        version.table,
        JSON.stringify(version.columns),
        JSON.stringify(version.rows),
        version.createdAt
      );
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

function toBranchRecord(row: BranchRow): BranchRecord {
  return {
    name: row.name,
    fromRef: row.from_ref,
    createdAt: row.created_at,
    base: VersionMapSchema.parse(JSON.parse(row.base_json)),
    head: VersionMapSchema.parse(JSON.parse(row.head_json)),
  };
}
