export type {
  DuplicateCountRule,
  NullRule,
  FreshnessRule,
  UnrecognizedRule,
  QualityRule,
  QualityRuleKind,
  ColumnQualityRules,
  OutputLocation,
  DataProductContract,
  LoadedContract,
} from './contract.js';

export type {
  CellValue,
  TableRow,
  TableData,
  Materialization,
  TableRef,
  BranchHandle,
  VersionedCatalogClient,
  TableStore,
  RunParameterValue,
  RunParameters,
  RunRequest,
  RunResult,
  RunVerification,
  PipelineExecutor,
} from './catalog.js';
export { isSuccessfulRun, hasPassedVerification } from './catalog.js';

export type {
  PublishState,
  PublishOutcome,
  StateTransition,
  PublishAttempt,
} from './attempt.js';
