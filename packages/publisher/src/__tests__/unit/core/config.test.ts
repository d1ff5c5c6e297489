/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  loadPublisherConfig,
  validateConfig,
} from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';
import { buildConfig, createTempDir } from '../../utils/fixtures.js';

const RC_YAML = `
catalog:
  user: ana
  storage: memory
  database_path: data/catalog.db
run:
  timeout_ms: 60000
  parameters:
    region: north
staging:
  prefix: sandbox
log_level: warn
`;

describe('loadPublisherConfig', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('falls back to defaults without a config file', async () => {
    const config = await loadPublisherConfig({ env: {}, cwd: dir });

    expect(config.configPath).toBeNull();
    expect(config.catalog.user).toBe('local');
    expect(config.catalog.storage).toBe('sqlite');
    expect(config.catalog.databasePath).toBe(join(dir, '.publisher/catalog.db'));
    expect(config.contract.source).toBe(dir);
    expect(config.run).toEqual(DEFAULT_CONFIG.run);
    expect(config.staging.prefix).toBe('staging');
    expect(config.logLevel).toBe('info');
  });

  it('reads .publisherrc and resolves paths against its directory', async () => {
    await writeFile(join(dir, '.publisherrc'), RC_YAML, 'utf-8');

    const config = await loadPublisherConfig({ env: {}, cwd: dir });

    expect(config.configPath).toBe(join(dir, '.publisherrc'));
    expect(config.catalog.user).toBe('ana');
    expect(config.catalog.storage).toBe('memory');
    expect(config.catalog.databasePath).toBe(join(dir, 'data/catalog.db'));
    expect(config.run.timeoutMs).toBe(60_000);
    expect(config.run.parameters).toEqual({ region: 'north' });
    expect(config.staging.prefix).toBe('sandbox');
    expect(config.logLevel).toBe('warn');
  });

  it('lets the environment win over the file', async () => {
    await writeFile(join(dir, '.publisherrc'), RC_YAML, 'utf-8');

    const config = await loadPublisherConfig({
      cwd: dir,
      env: {
        CATALOG_USER: 'bo',
        CATALOG_API_KEY: 'test-secret',
        PUBLISHER_TIMEOUT_MS: '1000',
        PUBLISHER_CATALOG_STORAGE: 'sqlite',
        LOG_LEVEL: 'DEBUG',
      },
    });

    expect(config.catalog.user).toBe('bo');
    expect(config.catalog.apiKey).toBe('test-secret');
    expect(config.catalog.storage).toBe('sqlite');
    expect(config.run.timeoutMs).toBe(1000);
    expect(config.logLevel).toBe('debug');
  });

  it('lets explicit overrides win over the environment', async () => {
    const config = await loadPublisherConfig({
      cwd: dir,
      env: { CATALOG_USER: 'bo', PUBLISHER_TIMEOUT_MS: '1000' },
      overrides: { user: 'cy', timeoutMs: 2000, logLevel: 'error' },
    });

    expect(config.catalog.user).toBe('cy');
    expect(config.run.timeoutMs).toBe(2000);
    expect(config.logLevel).toBe('error');
  });

  it('ignores empty PUBLISHER_ variables', async () => {
    const config = await loadPublisherConfig({ cwd: dir, env: { PUBLISHER_TIMEOUT_MS: '' } });

    expect(config.run.timeoutMs).toBe(500_000);
  });

  it('loads an explicit JSON config file', async () => {
    const path = join(dir, 'publisher.json');
    await writeFile(path, JSON.stringify({ catalog: { user: 'dee' } }), 'utf-8');

    const config = await loadPublisherConfig({ env: {}, cwd: dir, configPath: 'publisher.json' });

    expect(config.configPath).toBe(path);
    expect(config.catalog.user).toBe('dee');
  });

  it('rejects a missing explicit config file', async () => {
    await expect(
      loadPublisherConfig({ env: {}, cwd: dir, configPath: 'absent.yaml' })
    ).rejects.toThrow(`Config file not found: ${join(dir, 'absent.yaml')}`);
  });

  it('rejects unknown keys in the config file', async () => {
    const path = join(dir, '.publisherrc');
    await writeFile(path, 'catalog:\n  user: ana\nretries: 3\n', 'utf-8');

    await expect(loadPublisherConfig({ env: {}, cwd: dir })).rejects.toThrow(
      `Invalid config file ${path}: Unrecognized key(s) in object: 'retries'`
    );
  });

  it('reports the invalid field of the config file', async () => {
    await writeFile(join(dir, '.publisherrc'), 'run:\n  timeout_ms: soon\n', 'utf-8');

    try {
      await loadPublisherConfig({ env: {}, cwd: dir });
      expect.unreachable('config should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.field : null).toBe('run.timeout_ms');
    }
  });

  it('rejects a non-numeric timeout from the environment', async () => {
    await expect(
      loadPublisherConfig({ cwd: dir, env: { PUBLISHER_TIMEOUT_MS: 'soon' } })
    ).rejects.toThrow("PUBLISHER_TIMEOUT_MS must be an integer, got 'soon'");
  });

  it('rejects an unknown storage kind from the environment', async () => {
    await expect(
      loadPublisherConfig({ cwd: dir, env: { PUBLISHER_CATALOG_STORAGE: 'postgres' } })
    ).rejects.toThrow("PUBLISHER_CATALOG_STORAGE must be 'memory' or 'sqlite', got 'postgres'");
  });

  it('rejects an unknown log level', async () => {
    await expect(
      loadPublisherConfig({ cwd: dir, env: { LOG_LEVEL: 'verbose' } })
    ).rejects.toThrow("LOG_LEVEL must be one of debug, info, warn, error, got 'verbose'");
  });
});

describe('validateConfig', () => {
  it('accepts the test configuration', () => {
    expect(() => validateConfig(buildConfig())).not.toThrow();
  });

  it('rejects a user that cannot appear in a branch name', () => {
    expect(() => validateConfig(buildConfig({ user: 'ana smith' }))).toThrow(
      "Catalog user 'ana smith' is not usable in a branch name"
    );
  });

  it('rejects a non-positive timeout', () => {
    expect(() => validateConfig(buildConfig({ timeoutMs: 0 }))).toThrow(
      'Run timeout must be a positive integer'
    );
  });

  it('reserves the freshness parameter name', () => {
    expect(() => validateConfig(buildConfig({ parameters: { run_date: '01/01/2024' } }))).toThrow(
      "Run parameter 'run_date' is reserved for freshness checks"
    );
  });

  it('rejects an invalid staging prefix', () => {
    expect(() =>
      validateConfig({ ...buildConfig(), staging: { prefix: 'stage.area' } })
    ).toThrow("Invalid staging prefix 'stage.area'");
  });
});
