/**
 * Publisher Error Types
 *
 * Custom error classes for contract loading, rule compilation and publish
 * attempts. Each error carries a stable `code` and the context an operator
 * needs to reproduce the failure (branch name, rule, job id).
 *
 * FATAL errors abort before any catalog mutation:
 * - ContractParseError, NamespaceMismatchError
 * - UnsupportedTableQualityRule, UnsupportedColumnQualityRule
 * - ConfigurationError
 *
 * RECOVERED errors end an attempt in PRESERVED:
 * - PipelineRunFailure, PipelineTimeoutError
 * - MergeConflictError, BranchNotFoundError, BranchExistsError
 * - VerificationArtifactError
 */

import type { QualityRule } from './types/index.js';
import { describeQualityRule } from '../contract/quality-rules.js';

export type PublisherErrorCode =
  | 'CONTRACT_PARSE'
  | 'NAMESPACE_MISMATCH'
  | 'UNSUPPORTED_TABLE_RULE'
  | 'UNSUPPORTED_COLUMN_RULE'
  | 'PIPELINE_RUN_FAILURE'
  | 'PIPELINE_TIMEOUT'
  | 'MERGE_CONFLICT'
  | 'BRANCH_NOT_FOUND'
  | 'BRANCH_EXISTS'
  | 'VERIFICATION_ARTIFACT'
  | 'CONFIGURATION';

/**
 * Base class for every error raised by the publisher
 */
export abstract class PublisherError extends Error {
  abstract readonly code: PublisherErrorCode;

  /** Fatal errors stop the attempt before a staging branch exists */
  abstract readonly fatal: boolean;

  constructor(message: string) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Contract Errors
// ============================================================================

/**
 * Single problem found in a descriptor
 */
export interface ContractIssue {
  /** Dotted path into the descriptor (e.g. `interfaceComponents.outputPorts.0`) */
  readonly path: string;
  readonly message: string;
}

/**
 * Descriptor is malformed or misses a required field
 */
export class ContractParseError extends PublisherError {
  public readonly name = 'ContractParseError' as const;
  readonly code = 'CONTRACT_PARSE' as const;
  readonly fatal = true;

  constructor(
    message: string,
    public readonly issues: readonly ContractIssue[],
    public readonly source?: string
  ) {
    super(message);
  }

  /**
   * Format all issues for logging
   */
  toLogString(): string {
    const lines = [`ContractParseError: ${this.message}`];
    if (this.source) {
      lines.push(`  Source: ${this.source}`);
    }
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || '(root)'}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * Declared input namespace differs from the output namespace.
 * Cross-namespace products are not supported.
 */
export class NamespaceMismatchError extends PublisherError {
  public readonly name = 'NamespaceMismatchError' as const;
  readonly code = 'NAMESPACE_MISMATCH' as const;
  readonly fatal = true;

  constructor(
    public readonly inputNamespace: string,
    public readonly outputNamespace: string
  ) {
    super(
      `Input namespace '${inputNamespace}' differs from output namespace '${outputNamespace}'`
    );
  }
}

// ============================================================================
// Compilation Errors
// ============================================================================

export class UnsupportedTableQualityRule extends PublisherError {
  public readonly name = 'UnsupportedTableQualityRule' as const;
  readonly code = 'UNSUPPORTED_TABLE_RULE' as const;
  readonly fatal = true;

  constructor(
    public readonly rule: QualityRule,
    public readonly reason: string
  ) {
    super(`Unsupported table quality rule ${describeQualityRule(rule)}: ${reason}`);
  }
}

export class UnsupportedColumnQualityRule extends PublisherError {
  public readonly name = 'UnsupportedColumnQualityRule' as const;
  readonly code = 'UNSUPPORTED_COLUMN_RULE' as const;
  readonly fatal = true;

  constructor(
    public readonly column: string,
    public readonly rule: QualityRule,
    public readonly reason: string
  ) {
    super(
      `Unsupported quality rule ${describeQualityRule(rule)} on column '${column}': ${reason}`
    );
  }
}

// ============================================================================
// Attempt Errors
// ============================================================================

/**
 * Pipeline run reached a terminal status other than success
 */
export class PipelineRunFailure extends PublisherError {
  public readonly name = 'PipelineRunFailure' as const;
  readonly code = 'PIPELINE_RUN_FAILURE' as const;
  readonly fatal = false;

  constructor(
    public readonly jobId: string,
    public readonly jobStatus: string,
    public readonly detail?: string
  ) {
    super(
      `Pipeline run ${jobId} finished with status ${jobStatus}` + (detail ? `: ${detail}` : '')
    );
  }
}

export class PipelineTimeoutError extends PublisherError {
  public readonly name = 'PipelineTimeoutError' as const;
  readonly code = 'PIPELINE_TIMEOUT' as const;
  readonly fatal = false;

  constructor(
    public readonly timeoutMs: number,
    public readonly ref: string
  ) {
    super(`Pipeline run on ${ref} did not finish within ${timeoutMs}ms`);
  }
}

export class MergeConflictError extends PublisherError {
  public readonly name = 'MergeConflictError' as const;
  readonly code = 'MERGE_CONFLICT' as const;
  readonly fatal = false;

  constructor(
    public readonly source: string,
    public readonly into: string,
    public readonly tables: readonly string[]
  ) {
    super(
      `Cannot merge ${source} into ${into}: ${tables.join(', ')} changed on both branches`
    );
  }
}

export class BranchNotFoundError extends PublisherError {
  public readonly name = 'BranchNotFoundError' as const;
  readonly code = 'BRANCH_NOT_FOUND' as const;
  readonly fatal = false;

  constructor(public readonly branch: string) {
    super(`Branch not found: ${branch}`);
  }
}

export class BranchExistsError extends PublisherError {
  public readonly name = 'BranchExistsError' as const;
  readonly code = 'BRANCH_EXISTS' as const;
  readonly fatal = false;

  constructor(public readonly branch: string) {
    super(`Branch already exists: ${branch}`);
  }
}

/**
 * Verification artifact on disk cannot be read back
 */
export class VerificationArtifactError extends PublisherError {
  public readonly name = 'VerificationArtifactError' as const;
  readonly code = 'VERIFICATION_ARTIFACT' as const;
  readonly fatal = false;

  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
  }
}

export class ConfigurationError extends PublisherError {
  public readonly name = 'ConfigurationError' as const;
  readonly code = 'CONFIGURATION' as const;
  readonly fatal = true;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isPublisherError(error: unknown): error is PublisherError {
  return error instanceof PublisherError;
}

/**
 * Errors that must stop an attempt before the catalog is touched
 */
export function isFatalPublisherError(error: unknown): error is PublisherError {
  return isPublisherError(error) && error.fatal;
}

export function isUnsupportedQualityRule(
  error: unknown
): error is UnsupportedTableQualityRule | UnsupportedColumnQualityRule {
  return (
    error instanceof UnsupportedTableQualityRule ||
    error instanceof UnsupportedColumnQualityRule
  );
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
