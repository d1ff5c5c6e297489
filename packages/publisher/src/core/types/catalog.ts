/**
 * Versioned Catalog & Pipeline Executor Interfaces
 *
 * The orchestrator consumes the catalog and the executor only through these
 * interfaces. Production deployments plug in a client for their catalog
 * service; the package ships in-process reference implementations under
 * `catalog/` and `executor/`.
 */

// ============================================================================
// Table Data
// ============================================================================

export type CellValue = string | number | boolean | null;

export type TableRow = Readonly<Record<string, CellValue>>;

/**
 * Materialized table contents
 */
export interface TableData {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/**
 * How a model's output replaces the previous table state
 */
export type Materialization = 'REPLACE' | 'APPEND';

export interface TableRef {
  readonly namespace: string;
  readonly table: string;
}

// ============================================================================
// Catalog Client
// ============================================================================

/**
 * Disposable named reference into the catalog
 */
export interface BranchHandle {
  readonly name: string;
  readonly fromRef: string;
  readonly createdAt: Date;
}

export interface VersionedCatalogClient {
  hasBranch(name: string): Promise<boolean>;
  createBranch(name: string, fromRef: string): Promise<BranchHandle>;
  deleteBranch(name: string): Promise<void>;
  mergeBranch(source: string, into: string): Promise<void>;
  /** Optional: operator tooling lists preserved staging branches with it */
  listBranches?(prefix?: string): Promise<readonly string[]>;
}

/**
 * Table reads and writes against a branch
 */
export interface TableStore {
  readTable(ref: string, namespace: string, table: string): Promise<TableData | null>;
  writeTable(
    ref: string,
    namespace: string,
    table: string,
    data: TableData,
    mode: Materialization
  ): Promise<void>;
  listTables(ref: string, namespace?: string): Promise<readonly TableRef[]>;
}

// ============================================================================
// Pipeline Executor
// ============================================================================

export type RunParameterValue = string | number | boolean;

export type RunParameters = Readonly<Record<string, RunParameterValue>>;

export interface RunRequest {
  readonly projectDir: string;
  readonly ref: string;
  readonly namespace: string;
  readonly parameters: RunParameters;
  readonly timeoutMs: number;
}

/**
 * Verification evaluated as part of a run
 */
export interface RunVerification {
  readonly name: string;
  readonly passed: boolean;
  readonly assertions: number;
}

/**
 * Terminal state of a pipeline run
 */
export interface RunResult {
  readonly jobId: string;
  readonly jobStatus: string;
  readonly error?: string;
  readonly rowsWritten?: number;
  /** Absent when the run evaluated no verification */
  readonly verification?: RunVerification;
}

export interface PipelineExecutor {
  run(request: RunRequest): Promise<RunResult>;
}

/**
 * A run succeeded only when it says so
 */
export function isSuccessfulRun(result: RunResult): boolean {
  return result.jobStatus.trim().toLowerCase() === 'success';
}

/**
 * True when the run reports that verification `name` ran and passed
 */
export function hasPassedVerification(result: RunResult, name: string): boolean {
  const verification = result.verification;
  return verification !== undefined && verification.name === name && verification.passed;
}
