/**
 * Catalog storage factory
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CatalogStorageKind } from '../../core/config.js';
import type { CatalogStorage } from '../storage.js';
import { InMemoryCatalogStorage } from './in-memory.js';
import { SqliteCatalogStorage } from './sqlite.js';

export interface CatalogStorageOptions {
  readonly storage: CatalogStorageKind;
  /** SQLite file (ignored for `memory`); `:memory:` is accepted */
  readonly databasePath: string;
}

export function createCatalogStorage(options: CatalogStorageOptions): CatalogStorage {
  switch (options.storage) {
    case 'memory':
      return new InMemoryCatalogStorage();
    case 'sqlite': {
      if (options.databasePath !== ':memory:') {
        mkdirSync(dirname(options.databasePath), { recursive: true });
      }
      const storage = new SqliteCatalogStorage(options.databasePath);
      storage.runMigrations();
      return storage;
    }
  }
}
