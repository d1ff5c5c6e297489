/**
 * Local Pipeline Executor
 *
 * Runs a pipeline project in process against a branch of the local catalog,
 * then evaluates the project's verification artifact on the product table.
 *
 * Terminal statuses:
 * - SUCCESS: every model materialized and every assertion passed; the result
 *   carries the verification outcome, or none when the project has no artifact
 * - FAILED: a model threw, an input was missing, or an assertion failed
 * - TIMEOUT: the run did not finish within `timeoutMs`
 *
 * Outputs written before a failure stay on the ref; the ref is a staging
 * branch the orchestrator preserves for inspection.
 */

import { randomUUID } from 'node:crypto';
import type {
  PipelineExecutor,
  RunRequest,
  RunResult,
  TableData,
  TableStore,
} from '../core/types/index.js';
import { toError } from '../core/errors.js';
import { withTimeout } from '../core/utils/timeout.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { readVerificationArtifact } from '../artifact/verification-artifact.js';
import { runVerification, summarizeFailures } from '../compiler/verification-runner.js';
import {
  importPipelineProject,
  PipelineProjectRegistry,
  type PipelineProject,
} from './pipeline-project.js';

export const JOB_STATUS = {
  SUCCESS: 'SUCCESS',
  FAILED: 'FAILED',
  TIMEOUT: 'TIMEOUT',
} as const;

export interface LocalExecutorOptions {
  readonly store: TableStore;
  readonly registry?: PipelineProjectRegistry;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  readonly logger?: Logger;
}

class RunTimedOut extends Error {
  constructor(timeoutMs: number) {
    super(`run exceeded ${timeoutMs}ms`);
  }
}

export class LocalPipelineExecutor implements PipelineExecutor {
  private readonly store: TableStore;
  private readonly registry: PipelineProjectRegistry;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly log: Logger;

  constructor(options: LocalExecutorOptions) {
    this.store = options.store;
    this.registry = options.registry ?? new PipelineProjectRegistry();
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.log = options.logger ?? createLogger({ module: 'local-executor' });
  }

  async run(request: RunRequest): Promise<RunResult> {
    const jobId = this.idGenerator();
    const log = this.log.child({ jobId, ref: request.ref });
    log.info('Run started', { projectDir: request.projectDir, namespace: request.namespace });

    let result: RunResult;
    try {
      result = await withTimeout(
        this.execute(jobId, request, log),
        request.timeoutMs,
        () => new RunTimedOut(request.timeoutMs)
      );
    } catch (error) {
      const err = toError(error);
      result = {
        jobId,
        jobStatus: err instanceof RunTimedOut ? JOB_STATUS.TIMEOUT : JOB_STATUS.FAILED,
        error: err.message,
      };
    }

    if (result.jobStatus === JOB_STATUS.SUCCESS) {
      log.info('Run finished', { jobStatus: result.jobStatus, rowsWritten: result.rowsWritten });
    } else {
      log.warn('Run finished', { jobStatus: result.jobStatus, error: result.error });
    }
    return result;
  }

  private async execute(jobId: string, request: RunRequest, log: Logger): Promise<RunResult> {
    const project = await this.resolveProject(request.projectDir);
    const now = this.clock();
    let rowsWritten = 0;

    for (const model of project.models) {
      const inputs: Record<string, TableData> = {};
      for (const input of model.inputs ?? []) {
        const table = await this.store.readTable(request.ref, request.namespace, input);
        if (!table) {
          return failed(jobId, `model ${model.name}: input table ${request.namespace}.${input} not found`);
        }
        inputs[input] = table;
      }

      let output: TableData;
      try {
        output = await model.transform(inputs, {
          ref: request.ref,
          namespace: request.namespace,
          parameters: request.parameters,
          now,
        });
      } catch (error) {
        return failed(jobId, `model ${model.name}: ${toError(error).message}`);
      }

      await this.store.writeTable(
        request.ref,
        request.namespace,
        model.name,
        output,
        model.materialization ?? 'REPLACE'
      );
      rowsWritten += output.rows.length;
      log.debug('Model materialized', { model: model.name, rows: output.rows.length });
    }

    const verification = await readVerificationArtifact(request.projectDir);
    if (verification) {
      const table = await this.store.readTable(
        request.ref,
        request.namespace,
        verification.tableName
      );
      if (!table) {
        return failed(
          jobId,
          `verification ${verification.name}: table ${request.namespace}.${verification.tableName} not found`
        );
      }

      const report = runVerification(verification, {
        table,
        parameters: request.parameters,
        now,
      });
      const outcome = {
        name: report.name,
        passed: report.passed,
        assertions: report.results.length,
      };
      if (!report.passed) {
        return {
          ...failed(jobId, `verification ${report.name} failed: ${summarizeFailures(report)}`),
          verification: outcome,
        };
      }
      log.debug('Verification passed', { name: report.name, assertions: report.results.length });
      return { jobId, jobStatus: JOB_STATUS.SUCCESS, rowsWritten, verification: outcome };
    }

    log.warn('No verification artifact, nothing verified', { projectDir: request.projectDir });
    return { jobId, jobStatus: JOB_STATUS.SUCCESS, rowsWritten };
  }

  private async resolveProject(projectDir: string): Promise<PipelineProject> {
    const project = this.registry.get(projectDir) ?? (await importPipelineProject(projectDir));
    if (!project) {
      throw new Error(`No pipeline project registered or found in ${projectDir}`);
    }
    return project;
  }
}

function failed(jobId: string, error: string): RunResult {
  return { jobId, jobStatus: JOB_STATUS.FAILED, error };
}
