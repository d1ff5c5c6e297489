/**
 * Data Product Publisher
 *
 * Compiles data product contracts into quality assertions and publishes the
 * product through Write-Audit-Publish on a versioned catalog.
 *
 * @packageDocumentation
 */

// Types
export type * from './core/types/index.js';
export { isSuccessfulRun, hasPassedVerification } from './core/types/index.js';

// Errors
export {
  PublisherError,
  ContractParseError,
  NamespaceMismatchError,
  UnsupportedTableQualityRule,
  UnsupportedColumnQualityRule,
  PipelineRunFailure,
  PipelineTimeoutError,
  MergeConflictError,
  BranchNotFoundError,
  BranchExistsError,
  VerificationArtifactError,
  ConfigurationError,
  isPublisherError,
  isFatalPublisherError,
  isUnsupportedQualityRule,
  type PublisherErrorCode,
  type ContractIssue,
} from './core/errors.js';

// Configuration
export {
  loadPublisherConfig,
  validateConfig,
  DEFAULT_CONFIG,
  type PublisherConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
  type CatalogStorageKind,
} from './core/config.js';

// Logging
export { Logger, logger, createLogger, type LogLevel } from './core/utils/logger.js';

// Contract
export { ContractLoader, DESCRIPTOR_FILE_NAMES, type ContractLoaderOptions } from './contract/contract-loader.js';
export { toQualityRule, describeQualityRule } from './contract/quality-rules.js';

// Compiler
export {
  RuleCompiler,
  compileVerificationPlan,
  describeVerification,
  type AssertionFragment,
  type GeneratedVerification,
  type VerificationInput,
  type VerificationPlan,
} from './compiler/rule-compiler.js';
export {
  expectColumnAllUnique,
  expectColumnNoNulls,
  expectFreshWithinDays,
  parseDateParameter,
  formatRunDate,
} from './compiler/expectations.js';
export { runVerification, type VerificationReport } from './compiler/verification-runner.js';

// Artifact
export {
  VerificationArtifactWriter,
  readVerificationArtifact,
  VERIFICATION_ARTIFACT_NAME,
} from './artifact/verification-artifact.js';

// Catalog
export { LocalVersionedCatalog, type LocalCatalogOptions } from './catalog/local-catalog.js';
export type { CatalogStorage, BranchRecord, TableVersionRecord } from './catalog/storage.js';
export { InMemoryCatalogStorage } from './catalog/adapters/in-memory.js';
export { SqliteCatalogStorage } from './catalog/adapters/sqlite.js';
export { createCatalogStorage } from './catalog/adapters/factory.js';

// Executor
export { LocalPipelineExecutor, JOB_STATUS } from './executor/local-executor.js';
export {
  PipelineProjectRegistry,
  importPipelineProject,
  type PipelineProject,
  type PipelineModel,
  type ModelContext,
} from './executor/pipeline-project.js';

// Orchestration
export { PublishOrchestrator, type PublishOrchestratorOptions } from './orchestrator/publish-orchestrator.js';
export { deriveStagingBranchName, prepareStagingBranch } from './orchestrator/staging-branch.js';
export {
  runScheduledPublish,
  executeScheduledPublish,
  type TriggerSummary,
  type TriggerResult,
} from './orchestrator/trigger.js';
export { createLocalRuntime, type LocalRuntime } from './runtime.js';
