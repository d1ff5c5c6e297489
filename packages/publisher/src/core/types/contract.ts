/**
 * Data Product Contract Types
 *
 * Structured form of a data product descriptor: the output table, its quality
 * obligations and the catalog location it is served from.
 *
 * Contracts are immutable once loaded. One contract drives one publish attempt.
 */

// ============================================================================
// Quality Rules
// ============================================================================

/**
 * Column-level "no duplicates" rule. Only `mustBeEqualTo: 0` compiles.
 */
export interface DuplicateCountRule {
  readonly kind: 'duplicateCount';
  readonly params: {
    readonly mustBeEqualTo?: number;
  };
}

/**
 * Column-level "no nulls" rule. Only `mustBeEqualTo: 0` compiles.
 */
export interface NullRule {
  readonly kind: 'null';
  readonly params: {
    readonly mustBeEqualTo?: number;
  };
}

/**
 * Table-level freshness rule. Only `unit: 'day'` compiles.
 */
export interface FreshnessRule {
  readonly kind: 'freshness';
  readonly params: {
    readonly unit?: string;
    readonly mustBeLessThan?: number;
  };
}

/**
 * Any rule name the compiler has no translation for.
 *
 * Kept verbatim by the loader so the compiler can reject it by name.
 */
export interface UnrecognizedRule {
  readonly kind: 'unrecognized';
  readonly rule: string;
  readonly params: Readonly<Record<string, unknown>>;
}

export type QualityRule = DuplicateCountRule | NullRule | FreshnessRule | UnrecognizedRule;

export type QualityRuleKind = QualityRule['kind'];

/**
 * Rules declared on a single column, in declaration order
 */
export interface ColumnQualityRules {
  readonly column: string;
  readonly rules: readonly QualityRule[];
}

// ============================================================================
// Contract
// ============================================================================

/**
 * Where the product is served from in the versioned catalog
 */
export interface OutputLocation {
  readonly namespace: string;
  readonly branch: string;
}

export interface DataProductContract {
  /** Product name (schema `databaseName`) */
  readonly productName: string;

  /** Output table checked by the verification (defaults to the product name) */
  readonly tableName: string;

  /** Declared columns, in declaration order */
  readonly columns: readonly string[];

  /** Column rules grouped by column, columns in declaration order */
  readonly columnRules: readonly ColumnQualityRules[];

  /** Rules not tied to a column */
  readonly tableRules: readonly QualityRule[];

  readonly output: OutputLocation;

  /** Namespaces the product reads from (must equal the output namespace) */
  readonly inputNamespaces: readonly string[];
}

/**
 * Contract plus the pipeline project that implements it
 */
export interface LoadedContract {
  readonly contract: DataProductContract;
  readonly projectDir: string;
  readonly descriptorPath: string;
}
