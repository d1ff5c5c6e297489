/**
 * Local Pipeline Executor Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalPipelineExecutor } from '../../../executor/local-executor.js';
import {
  PipelineProjectRegistry,
  importPipelineProject,
  isPipelineProject,
  type PipelineProject,
} from '../../../executor/pipeline-project.js';
import { LocalVersionedCatalog } from '../../../catalog/local-catalog.js';
import { InMemoryCatalogStorage } from '../../../catalog/adapters/in-memory.js';
import { compileVerificationPlan } from '../../../compiler/rule-compiler.js';
import { VerificationArtifactWriter } from '../../../artifact/verification-artifact.js';
import type { RunRequest, TableData } from '../../../core/types/index.js';
import {
  buildTable,
  buildTripsProject,
  createSilentLogger,
  createTempDir,
} from '../../utils/fixtures.js';

const NOW = new Date('2024-03-15T12:00:00Z');

const RAW_TRIPS = buildTable(['trip_id', 'on_scene_datetime', 'fare', 'driver'], [
  { trip_id: 't-1', on_scene_datetime: '2024-03-14T08:00:00Z', fare: 10, driver: 'd-1' },
  { trip_id: 't-2', on_scene_datetime: '2024-03-14T09:30:00Z', fare: 7.5, driver: 'd-2' },
]);

const VERIFICATION = compileVerificationPlan({
  name: 'trips_summary_quality_checks',
  tableName: 'trips_summary',
  freshnessParameter: 'run_date',
  tableRules: [{ kind: 'freshness', params: { unit: 'day', mustBeLessThan: 1 } }],
  columnRules: [
    { column: 'on_scene_datetime', rules: [{ kind: 'null', params: { mustBeEqualTo: 0 } }] },
  ],
});

describe('LocalPipelineExecutor', () => {
  let catalog: LocalVersionedCatalog;
  let registry: PipelineProjectRegistry;
  let executor: LocalPipelineExecutor;
  let projectDir: string;
  let cleanup: () => Promise<void>;

  function request(overrides: Partial<RunRequest> = {}): RunRequest {
    return {
      projectDir,
      ref: 'main',
      namespace: 'rides',
      parameters: { run_date: '15/03/2024' },
      timeoutMs: 5_000,
      ...overrides,
    };
  }

  async function writeArtifact(): Promise<void> {
    await new VerificationArtifactWriter({ clock: () => NOW }).write(projectDir, VERIFICATION);
  }

  beforeEach(async () => {
    ({ dir: projectDir, cleanup } = await createTempDir());
    catalog = new LocalVersionedCatalog({
      storage: new InMemoryCatalogStorage(),
      clock: () => NOW,
      logger: createSilentLogger(),
    });
    registry = new PipelineProjectRegistry();
    executor = new LocalPipelineExecutor({
      store: catalog,
      registry,
      clock: () => NOW,
      idGenerator: () => 'job-1',
      logger: createSilentLogger(),
    });
  });

  afterEach(async () => {
    catalog.close();
    await cleanup();
  });

  it('materializes every model and passes verification', async () => {
    await catalog.writeTable('main', 'rides', 'raw_trips', RAW_TRIPS, 'REPLACE');
    registry.register(projectDir, buildTripsProject());
    await writeArtifact();

    const result = await executor.run(request());

    expect(result).toEqual({
      jobId: 'job-1',
      jobStatus: 'SUCCESS',
      rowsWritten: 2,
      verification: { name: 'trips_summary_quality_checks', passed: true, assertions: 2 },
    });
    expect(await catalog.readTable('main', 'rides', 'trips_summary')).toEqual({
      columns: ['trip_id', 'on_scene_datetime', 'fare'],
      rows: [
        { trip_id: 't-1', on_scene_datetime: '2024-03-14T08:00:00Z', fare: 10 },
        { trip_id: 't-2', on_scene_datetime: '2024-03-14T09:30:00Z', fare: 7.5 },
      ],
    });
  });

  it('succeeds without verification when the project has no artifact', async () => {
    await catalog.writeTable('main', 'rides', 'raw_trips', RAW_TRIPS, 'REPLACE');
    registry.register(projectDir, buildTripsProject());

    const result = await executor.run(request({ parameters: {} }));

    expect(result).toEqual({ jobId: 'job-1', jobStatus: 'SUCCESS', rowsWritten: 2 });
    expect(result.verification).toBeUndefined();
  });

  it('passes run parameters and the ref to every model', async () => {
    const seen: unknown[] = [];
    registry.register(projectDir, {
      models: [
        {
          name: 'echo',
          transform: (_inputs, context) => {
            seen.push(context);
            return buildTable(['x'], [{ x: 1 }]);
          },
        },
      ],
    });

    await executor.run(request({ parameters: { run_date: '15/03/2024', region: 'north' } }));

    expect(seen).toEqual([
      {
        ref: 'main',
        namespace: 'rides',
        parameters: { run_date: '15/03/2024', region: 'north' },
        now: NOW,
      },
    ]);
  });

  it('fails when an input table is missing', async () => {
    registry.register(projectDir, buildTripsProject());

    const result = await executor.run(request());

    expect(result).toEqual({
      jobId: 'job-1',
      jobStatus: 'FAILED',
      error: 'model trips_summary: input table rides.raw_trips not found',
    });
  });

  it('fails when a model throws', async () => {
    await catalog.writeTable('main', 'rides', 'raw_trips', RAW_TRIPS, 'REPLACE');
    registry.register(projectDir, buildTripsProject({ failWith: 'upstream schema changed' }));

    const result = await executor.run(request());

    expect(result.jobStatus).toBe('FAILED');
    expect(result.error).toBe('model trips_summary: upstream schema changed');
    expect(await catalog.readTable('main', 'rides', 'trips_summary')).toBeNull();
  });

  it('fails when an assertion fails and keeps the written output', async () => {
    const withNull = buildTable(['trip_id', 'on_scene_datetime', 'fare'], [
      ...RAW_TRIPS.rows,
      { trip_id: 't-3', on_scene_datetime: null, fare: 3 },
    ]);
    await catalog.writeTable('main', 'rides', 'raw_trips', withNull, 'REPLACE');
    registry.register(projectDir, buildTripsProject());
    await writeArtifact();

    const result = await executor.run(request());

    expect(result.jobStatus).toBe('FAILED');
    expect(result.error).toBe(
      "verification trips_summary_quality_checks failed: column:on_scene_datetime:null: 1 null value(s) in 'on_scene_datetime'"
    );
    expect(result.verification).toEqual({
      name: 'trips_summary_quality_checks',
      passed: false,
      assertions: 2,
    });
    const written = await catalog.readTable('main', 'rides', 'trips_summary');
    expect(written?.rows).toHaveLength(3);
  });

  it('fails freshness when the run date parameter is missing', async () => {
    await catalog.writeTable('main', 'rides', 'raw_trips', RAW_TRIPS, 'REPLACE');
    registry.register(projectDir, buildTripsProject());
    await writeArtifact();

    const result = await executor.run(request({ parameters: {} }));

    expect(result.error).toBe(
      'verification trips_summary_quality_checks failed: table:freshness: freshness parameter is missing'
    );
  });

  it('fails when the verified table was never written', async () => {
    registry.register(projectDir, { models: [] });
    await writeArtifact();

    const result = await executor.run(request());

    expect(result.error).toBe(
      'verification trips_summary_quality_checks: table rides.trips_summary not found'
    );
  });

  it('reports TIMEOUT when the run outlives its timeout', async () => {
    registry.register(projectDir, {
      models: [{ name: 'stuck', transform: () => new Promise<TableData>(() => undefined) }],
    });

    const result = await executor.run(request({ timeoutMs: 20 }));

    expect(result).toEqual({ jobId: 'job-1', jobStatus: 'TIMEOUT', error: 'run exceeded 20ms' });
  });

  it('fails when no project is registered or found', async () => {
    const result = await executor.run(request());

    expect(result.jobStatus).toBe('FAILED');
    expect(result.error).toBe(`No pipeline project registered or found in ${projectDir}`);
  });
});

describe('pipeline projects', () => {
  it('recognizes valid projects', () => {
    const project: PipelineProject = buildTripsProject();

    expect(isPipelineProject(project)).toBe(true);
    expect(isPipelineProject({ models: [{ name: 'x', transform: () => null, inputs: [1] }] })).toBe(false);
    expect(isPipelineProject({ models: [{ name: '', transform: () => null }] })).toBe(false);
    expect(
      isPipelineProject({ models: [{ name: 'x', transform: () => null, materialization: 'MERGE' }] })
    ).toBe(false);
    expect(isPipelineProject({})).toBe(false);
  });

  it('resolves registered projects by absolute path', () => {
    const project = buildTripsProject();
    const registry = new PipelineProjectRegistry().register('/tmp/projects/../projects/trips', project);

    expect(registry.get('/tmp/projects/trips')).toBe(project);
    expect(registry.get('/tmp/projects/other')).toBeNull();
  });

  it('returns null for a directory without a pipeline module', async () => {
    const { dir, cleanup } = await createTempDir();
    try {
      expect(await importPipelineProject(dir)).toBeNull();
    } finally {
      await cleanup();
    }
  });
});
