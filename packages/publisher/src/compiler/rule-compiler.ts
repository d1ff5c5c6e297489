/**
 * Rule Compiler
 *
 * Translates a contract's declarative quality rules into assertion fragments:
 * predicate objects evaluated directly against the materialized table. No
 * source code is generated or loaded.
 *
 * | Rule                    | Condition          | Assertion                        |
 * |-------------------------|--------------------|----------------------------------|
 * | column duplicateCount   | mustBeEqualTo == 0 | all non-null values unique       |
 * | column null             | mustBeEqualTo == 0 | no null values                   |
 * | table freshness (day)   | mustBeLessThan = N | now - N days < date param <= now |
 *
 * Compilation is all-or-nothing and pure: the first unsupported rule throws
 * and nothing is emitted.
 *
 * @module compiler/rule-compiler
 */

import type {
  ColumnQualityRules,
  DataProductContract,
  FreshnessRule,
  QualityRule,
  RunParameters,
  TableData,
} from '../core/types/index.js';
import {
  UnsupportedColumnQualityRule,
  UnsupportedTableQualityRule,
} from '../core/errors.js';
import { describeQualityRule } from '../contract/quality-rules.js';
import {
  expectColumnAllUnique,
  expectColumnNoNulls,
  expectFreshWithinDays,
  type ExpectationOutcome,
  type StandardExpectationName,
} from './expectations.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What an assertion is evaluated against
 */
export interface VerificationInput {
  readonly table: TableData;
  readonly parameters: RunParameters;
  readonly now: Date;
}

export interface AssertionFragment {
  /** Stable name, e.g. `column:on_scene_datetime:null` */
  readonly name: string;
  readonly scope: 'table' | 'column';
  readonly column: string | null;
  readonly rule: QualityRule;
  /** Standard expectation the assertion relies on */
  readonly imports: readonly StandardExpectationName[];
  readonly description: string;
  readonly assert: (input: VerificationInput) => ExpectationOutcome;
}

/**
 * Rules as data, bound to a table and a freshness parameter.
 * This is what the artifact writer persists.
 */
export interface VerificationPlan {
  readonly name: string;
  readonly tableName: string;
  readonly freshnessParameter: string;
  readonly tableRules: readonly QualityRule[];
  readonly columnRules: readonly ColumnQualityRules[];
}

export interface GeneratedVerification {
  readonly name: string;
  readonly tableName: string;
  readonly freshnessParameter: string;
  /** Deduplicated standard expectations, in first-use order */
  readonly imports: readonly StandardExpectationName[];
  /** Table assertions first, then column assertions in column order */
  readonly assertions: readonly AssertionFragment[];
  readonly plan: VerificationPlan;
}

export interface RuleCompilerOptions {
  /** Run parameter the freshness assertion reads */
  readonly freshnessParameter: string;
}

// ============================================================================
// Compiler
// ============================================================================

export class RuleCompiler {
  private readonly options: RuleCompilerOptions;

  constructor(options: RuleCompilerOptions) {
    this.options = options;
  }

  /**
   * Compile every quality rule of a contract
   *
   * @throws UnsupportedTableQualityRule
   * @throws UnsupportedColumnQualityRule
   */
  compile(contract: DataProductContract): GeneratedVerification {
    return compileVerificationPlan({
      name: verificationName(contract.productName),
      tableName: contract.tableName,
      freshnessParameter: this.options.freshnessParameter,
      tableRules: contract.tableRules,
      columnRules: contract.columnRules,
    });
  }
}

export function verificationName(productName: string): string {
  return `${productName}_quality_checks`;
}

/**
 * Compile a rule plan, e.g. one read back from a verification artifact
 */
export function compileVerificationPlan(plan: VerificationPlan): GeneratedVerification {
  const assertions: AssertionFragment[] = [];

  if (plan.tableRules.length > 0) {
    assertions.push(compileTableRules(plan.tableRules, plan.freshnessParameter));
  }

  for (const { column, rules } of plan.columnRules) {
    for (const rule of rules) {
      assertions.push(compileColumnRule(column, rule));
    }
  }

  const imports: StandardExpectationName[] = [];
  for (const assertion of assertions) {
    for (const name of assertion.imports) {
      if (!imports.includes(name)) imports.push(name);
    }
  }

  return Object.freeze({
    name: plan.name,
    tableName: plan.tableName,
    freshnessParameter: plan.freshnessParameter,
    imports,
    assertions,
    plan,
  });
}

// ============================================================================
// Rule Translation
// ============================================================================

/**
 * At most one table rule, and it must be a day-based freshness rule
 */
function compileTableRules(
  rules: readonly QualityRule[],
  freshnessParameter: string
): AssertionFragment {
  const [first, second] = rules;

  if (first.kind !== 'freshness') {
    throw new UnsupportedTableQualityRule(first, 'only freshness is supported at table level');
  }
  const fragment = compileFreshness(first, freshnessParameter);

  if (second !== undefined) {
    throw new UnsupportedTableQualityRule(second, 'only one table-level rule is supported');
  }

  return fragment;
}

function compileFreshness(rule: FreshnessRule, freshnessParameter: string): AssertionFragment {
  const { unit, mustBeLessThan } = rule.params;

  if (unit !== 'day') {
    throw new UnsupportedTableQualityRule(
      rule,
      unit === undefined ? 'freshness requires a unit' : `unit '${unit}' is not supported (use 'day')`
    );
  }
  if (mustBeLessThan === undefined || !Number.isInteger(mustBeLessThan) || mustBeLessThan < 1) {
    throw new UnsupportedTableQualityRule(rule, 'mustBeLessThan must be a positive integer');
  }

  const days = mustBeLessThan;
  return {
    name: `table:freshness`,
    scope: 'table',
    column: null,
    rule,
    imports: ['expectFreshWithinDays'],
    description: `'${freshnessParameter}' is within the last ${days} day(s)`,
    assert: ({ parameters, now }) =>
      expectFreshWithinDays(parameters[freshnessParameter], days, now),
  };
}

function compileColumnRule(column: string, rule: QualityRule): AssertionFragment {
  switch (rule.kind) {
    case 'duplicateCount':
      requireZero(column, rule, rule.params.mustBeEqualTo);
      return {
        name: `column:${column}:duplicateCount`,
        scope: 'column',
        column,
        rule,
        imports: ['expectColumnAllUnique'],
        description: `all values in '${column}' are unique`,
        assert: ({ table }) => expectColumnAllUnique(table, column),
      };

    case 'null':
      requireZero(column, rule, rule.params.mustBeEqualTo);
      return {
        name: `column:${column}:null`,
        scope: 'column',
        column,
        rule,
        imports: ['expectColumnNoNulls'],
        description: `'${column}' has no null values`,
        assert: ({ table }) => expectColumnNoNulls(table, column),
      };

    case 'freshness':
      throw new UnsupportedColumnQualityRule(column, rule, 'freshness is a table-level rule');

    case 'unrecognized':
      throw new UnsupportedColumnQualityRule(column, rule, `unknown rule '${rule.rule}'`);
  }
}

function requireZero(column: string, rule: QualityRule, threshold: number | undefined): void {
  if (threshold !== 0) {
    throw new UnsupportedColumnQualityRule(
      column,
      rule,
      threshold === undefined
        ? 'mustBeEqualTo is required'
        : `mustBeEqualTo=${threshold} is not supported (only 0)`
    );
  }
}

/**
 * One-line summary per assertion, for logs and the CLI
 */
export function describeVerification(verification: GeneratedVerification): string[] {
  return verification.assertions.map(
    (assertion) =>
      `${assertion.name} [${describeQualityRule(assertion.rule)}] ${assertion.description}`
  );
}
