/**
 * Publish Orchestrator
 *
 * Write-Audit-Publish for one data product:
 *
 *   load + compile  (fatal errors propagate, catalog untouched)
 *   INIT      -> STAGED     staging branch created from the output branch
 *   STAGED    -> EXECUTED   verification artifact written, pipeline run on staging
 *   EXECUTED  -> MERGED     run and its verification succeeded: merge, delete staging
 *   *         -> PRESERVED  anything else: no merge, staging kept for inspection
 *
 * The output branch is mutated by the merge and nothing else. There is no
 * retry; the next scheduled invocation is the retry.
 */

import { randomUUID } from 'node:crypto';
import type {
  DataProductContract,
  LoadedContract,
  PipelineExecutor,
  PublishAttempt,
  PublishState,
  RunParameters,
  RunResult,
  StateTransition,
  VersionedCatalogClient,
} from '../core/types/index.js';
import { hasPassedVerification, isSuccessfulRun } from '../core/types/index.js';
import type { PublisherConfig } from '../core/config.js';
import { PipelineRunFailure, PipelineTimeoutError, toError } from '../core/errors.js';
import { withTimeout } from '../core/utils/timeout.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { ContractLoader } from '../contract/contract-loader.js';
import { RuleCompiler } from '../compiler/rule-compiler.js';
import { formatRunDate } from '../compiler/expectations.js';
import { VerificationArtifactWriter } from '../artifact/verification-artifact.js';
import { deriveStagingBranchName, prepareStagingBranch } from './staging-branch.js';

// ============================================================================
// Attempt State
// ============================================================================

const ALLOWED_TRANSITIONS: Readonly<Record<PublishState, readonly PublishState[]>> = {
  INIT: ['STAGED', 'PRESERVED'],
  STAGED: ['EXECUTED', 'PRESERVED'],
  EXECUTED: ['MERGED', 'PRESERVED'],
  MERGED: [],
  PRESERVED: [],
};

export class AttemptStateMachine {
  private current: PublishState = 'INIT';
  private readonly history: StateTransition[] = [];

  constructor(
    private readonly clock: () => Date,
    private readonly log: Logger
  ) {}

  get state(): PublishState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return this.history;
  }

  /**
   * @throws Error on a transition the lifecycle does not allow
   */
  transition(to: PublishState): void {
    const from = this.current;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid publish state transition ${from} -> ${to}`);
    }
    this.history.push({ from, to, at: this.clock() });
    this.log.debug('State transition', { from, to });
    this.current = to;
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export interface PublishOrchestratorOptions {
  readonly config: PublisherConfig;
  readonly catalog: VersionedCatalogClient;
  readonly executor: PipelineExecutor;
  readonly loader?: ContractLoader;
  readonly compiler?: RuleCompiler;
  readonly artifactWriter?: VerificationArtifactWriter;
  readonly clock?: () => Date;
  /** Attempt ids; also the staging branch suffix */
  readonly idGenerator?: () => string;
  readonly logger?: Logger;
}

export class PublishOrchestrator {
  private readonly config: PublisherConfig;
  private readonly catalog: VersionedCatalogClient;
  private readonly executor: PipelineExecutor;
  private readonly loader: ContractLoader;
  private readonly compiler: RuleCompiler;
  private readonly artifactWriter: VerificationArtifactWriter;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly log: Logger;

  constructor(options: PublishOrchestratorOptions) {
    this.config = options.config;
    this.catalog = options.catalog;
    this.executor = options.executor;
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.log = options.logger ?? createLogger({ module: 'orchestrator' });
    this.loader =
      options.loader ??
      new ContractLoader({
        projectsRoot: options.config.contract.projectsRoot,
        inputNamespace: options.config.contract.inputNamespace,
      });
    this.compiler =
      options.compiler ??
      new RuleCompiler({ freshnessParameter: options.config.run.freshnessParameter });
    this.artifactWriter = options.artifactWriter ?? new VerificationArtifactWriter({ clock: this.clock });
  }

  /**
   * Load the descriptor at `source` (default: configured contract source) and publish it
   *
   * @throws ContractParseError, NamespaceMismatchError, UnsupportedTableQualityRule,
   *   UnsupportedColumnQualityRule - before any catalog mutation
   */
  async publish(source: string = this.config.contract.source): Promise<PublishAttempt> {
    const loaded = await this.loader.load(source);
    return this.publishContract(loaded);
  }

  /**
   * Publish an already loaded contract
   *
   * Compilation errors propagate. Every later failure ends the attempt in
   * PRESERVED and is reported on the returned attempt, not thrown.
   */
  async publishContract(loaded: LoadedContract): Promise<PublishAttempt> {
    const { contract, projectDir } = loaded;
    const verification = this.compiler.compile(contract);

    const id = this.idGenerator();
    const startedAt = this.clock();
    const stagingBranch = deriveStagingBranchName({
      user: this.config.catalog.user,
      prefix: this.config.staging.prefix,
      productName: contract.productName,
      suffix: id,
    });
    const log = this.log.child({
      attemptId: id,
      product: contract.productName,
      stagingBranch,
    });

    const machine = new AttemptStateMachine(this.clock, log);

    log.info('Publish attempt started', {
      outputBranch: contract.output.branch,
      namespace: contract.output.namespace,
      assertions: verification.assertions.length,
    });

    let runResult: RunResult | null = null;
    try {
      await prepareStagingBranch(this.catalog, stagingBranch, contract.output.branch, log);
      machine.transition('STAGED');

      const artifactPath = await this.artifactWriter.write(projectDir, verification);
      log.debug('Verification artifact ready', { artifactPath });

      runResult = await this.runPipeline(contract, projectDir, stagingBranch, startedAt);
      machine.transition('EXECUTED');
      log.info('Pipeline run finished', {
        jobId: runResult.jobId,
        jobStatus: runResult.jobStatus,
      });

      if (!isSuccessfulRun(runResult)) {
        throw new PipelineRunFailure(runResult.jobId, runResult.jobStatus, runResult.error);
      }
      if (verification.assertions.length > 0 && !hasPassedVerification(runResult, verification.name)) {
        throw new PipelineRunFailure(
          runResult.jobId,
          runResult.jobStatus,
          `verification ${verification.name} was not reported as passed`
        );
      }

      await this.catalog.mergeBranch(stagingBranch, contract.output.branch);
      machine.transition('MERGED');
      log.info('Staging branch merged', { outputBranch: contract.output.branch });
    } catch (error) {
      const err = toError(error);
      const stagingRetained = machine.state !== 'INIT';
      machine.transition('PRESERVED');
      log.error('Publish attempt preserved, output branch untouched', {
        jobId: runResult?.jobId ?? null,
        stagingRetained,
        error: err,
      });
      return this.finish({
        id,
        contract,
        stagingBranch,
        outcome: 'PRESERVED',
        runResult,
        error: err,
        stagingRetained,
        transitions: machine.transitions,
        startedAt,
      });
    }

    let stagingRetained = false;
    try {
      await this.catalog.deleteBranch(stagingBranch);
    } catch (error) {
      stagingRetained = true;
      log.warn('Merged, but staging branch could not be deleted', { error: toError(error) });
    }

    return this.finish({
      id,
      contract,
      stagingBranch,
      outcome: 'MERGED',
      runResult,
      error: null,
      stagingRetained,
      transitions: machine.transitions,
      startedAt,
    });
  }

  private async runPipeline(
    contract: DataProductContract,
    projectDir: string,
    ref: string,
    now: Date
  ): Promise<RunResult> {
    const { timeoutMs, freshnessParameter } = this.config.run;
    const parameters: RunParameters = {
      ...this.config.run.parameters,
      [freshnessParameter]: formatRunDate(now),
    };

    return withTimeout(
      this.executor.run({
        projectDir,
        ref,
        namespace: contract.output.namespace,
        parameters,
        timeoutMs,
      }),
      timeoutMs,
      () => new PipelineTimeoutError(timeoutMs, ref)
    );
  }

  private finish(attempt: Omit<PublishAttempt, 'finishedAt'>): PublishAttempt {
    return Object.freeze({
      ...attempt,
      transitions: Object.freeze([...attempt.transitions]),
      finishedAt: this.clock(),
    });
  }
}
