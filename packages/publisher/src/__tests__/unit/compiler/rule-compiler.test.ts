/**
 * Rule Compiler Tests
 */

import { describe, it, expect } from 'vitest';
import {
  RuleCompiler,
  compileVerificationPlan,
  describeVerification,
} from '../../../compiler/rule-compiler.js';
import { runVerification } from '../../../compiler/verification-runner.js';
import {
  UnsupportedColumnQualityRule,
  UnsupportedTableQualityRule,
} from '../../../core/errors.js';
import type { DataProductContract } from '../../../core/types/index.js';
import { buildTable } from '../../utils/fixtures.js';

const NOW = new Date('2024-03-15T12:00:00Z');

function buildContract(overrides: Partial<DataProductContract> = {}): DataProductContract {
  return {
    productName: 'trips_summary',
    tableName: 'trips_summary',
    columns: ['trip_id', 'on_scene_datetime', 'fare'],
    columnRules: [
      { column: 'trip_id', rules: [{ kind: 'duplicateCount', params: { mustBeEqualTo: 0 } }] },
      { column: 'on_scene_datetime', rules: [{ kind: 'null', params: { mustBeEqualTo: 0 } }] },
    ],
    tableRules: [{ kind: 'freshness', params: { unit: 'day', mustBeLessThan: 1 } }],
    output: { namespace: 'rides', branch: 'main' },
    inputNamespaces: [],
    ...overrides,
  };
}

function compile(contract: DataProductContract) {
  return new RuleCompiler({ freshnessParameter: 'run_date' }).compile(contract);
}

describe('RuleCompiler', () => {
  describe('compile', () => {
    it('emits the table assertion first, then column assertions in column order', () => {
      const verification = compile(buildContract());

      expect(verification.name).toBe('trips_summary_quality_checks');
      expect(verification.tableName).toBe('trips_summary');
      expect(verification.freshnessParameter).toBe('run_date');
      expect(verification.assertions.map((a) => a.name)).toEqual([
        'table:freshness',
        'column:trip_id:duplicateCount',
        'column:on_scene_datetime:null',
      ]);
      expect(verification.imports).toEqual([
        'expectFreshWithinDays',
        'expectColumnAllUnique',
        'expectColumnNoNulls',
      ]);
    });

    it('deduplicates standard expectations', () => {
      const verification = compile(
        buildContract({
          tableRules: [],
          columnRules: [
            { column: 'trip_id', rules: [{ kind: 'null', params: { mustBeEqualTo: 0 } }] },
            { column: 'fare', rules: [{ kind: 'null', params: { mustBeEqualTo: 0 } }] },
          ],
        })
      );

      expect(verification.assertions).toHaveLength(2);
      expect(verification.imports).toEqual(['expectColumnNoNulls']);
    });

    it('compiles a contract without rules to an empty verification', () => {
      const verification = compile(buildContract({ tableRules: [], columnRules: [] }));

      expect(verification.assertions).toEqual([]);
      expect(verification.imports).toEqual([]);
    });

    it('carries the rules as a plan', () => {
      const contract = buildContract();
      const verification = compile(contract);

      expect(verification.plan).toEqual({
        name: 'trips_summary_quality_checks',
        tableName: 'trips_summary',
        freshnessParameter: 'run_date',
        tableRules: contract.tableRules,
        columnRules: contract.columnRules,
      });
    });

    it('describes every assertion on one line', () => {
      expect(describeVerification(compile(buildContract()))).toEqual([
        "table:freshness [freshness(unit=day, mustBeLessThan=1)] 'run_date' is within the last 1 day(s)",
        "column:trip_id:duplicateCount [duplicateCount(mustBeEqualTo=0)] all values in 'trip_id' are unique",
        "column:on_scene_datetime:null [null(mustBeEqualTo=0)] 'on_scene_datetime' has no null values",
      ]);
    });
  });

  describe('unsupported rules', () => {
    it('rejects a non-zero column threshold', () => {
      const contract = buildContract({
        columnRules: [
          { column: 'trip_id', rules: [{ kind: 'null', params: { mustBeEqualTo: 2 } }] },
        ],
      });

      expect(() => compile(contract)).toThrow(
        new UnsupportedColumnQualityRule(
          'trip_id',
          { kind: 'null', params: { mustBeEqualTo: 2 } },
          'mustBeEqualTo=2 is not supported (only 0)'
        )
      );
      expect(() => compile(contract)).toThrow(
        "Unsupported quality rule null(mustBeEqualTo=2) on column 'trip_id': mustBeEqualTo=2 is not supported (only 0)"
      );
    });

    it('rejects a column rule without a threshold', () => {
      const contract = buildContract({
        columnRules: [{ column: 'fare', rules: [{ kind: 'duplicateCount', params: {} }] }],
      });

      expect(() => compile(contract)).toThrow(UnsupportedColumnQualityRule);
    });

    it('rejects unknown column rules by name', () => {
      const contract = buildContract({
        columnRules: [
          {
            column: 'fare',
            rules: [{ kind: 'unrecognized', rule: 'valueRange', params: { min: 0 } }],
          },
        ],
      });

      expect(() => compile(contract)).toThrow(
        "Unsupported quality rule valueRange(min=0) on column 'fare': unknown rule 'valueRange'"
      );
    });

    it('rejects freshness on a column', () => {
      const contract = buildContract({
        columnRules: [
          { column: 'fare', rules: [{ kind: 'freshness', params: { unit: 'day', mustBeLessThan: 1 } }] },
        ],
      });

      expect(() => compile(contract)).toThrow(UnsupportedColumnQualityRule);
    });

    it('rejects freshness in a unit other than day', () => {
      const contract = buildContract({
        tableRules: [{ kind: 'freshness', params: { unit: 'hour', mustBeLessThan: 1 } }],
      });

      expect(() => compile(contract)).toThrow(
        "Unsupported table quality rule freshness(unit=hour, mustBeLessThan=1): unit 'hour' is not supported (use 'day')"
      );
    });

    it('rejects a non-positive freshness window', () => {
      const contract = buildContract({
        tableRules: [{ kind: 'freshness', params: { unit: 'day', mustBeLessThan: 0 } }],
      });

      expect(() => compile(contract)).toThrow(UnsupportedTableQualityRule);
    });

    it('rejects table rules other than freshness', () => {
      const contract = buildContract({
        tableRules: [{ kind: 'unrecognized', rule: 'rowCount', params: { mustBeLessThan: 10 } }],
      });

      expect(() => compile(contract)).toThrow(
        'Unsupported table quality rule rowCount(mustBeLessThan=10): only freshness is supported at table level'
      );
    });

    it('rejects a second table rule', () => {
      const contract = buildContract({
        tableRules: [
          { kind: 'freshness', params: { unit: 'day', mustBeLessThan: 1 } },
          { kind: 'freshness', params: { unit: 'day', mustBeLessThan: 7 } },
        ],
      });

      expect(() => compile(contract)).toThrow('only one table-level rule is supported');
    });
  });

  describe('compiled assertions', () => {
    const table = buildTable(
      ['trip_id', 'on_scene_datetime', 'fare'],
      [
        { trip_id: 't-1', on_scene_datetime: '2024-03-15T08:00:00Z', fare: 12 },
        { trip_id: 't-2', on_scene_datetime: '2024-03-15T09:00:00Z', fare: 7 },
      ]
    );

    it('pass on a conforming table and run date', () => {
      const report = runVerification(compile(buildContract()), {
        table,
        parameters: { run_date: '15/03/2024' },
        now: NOW,
      });

      expect(report.passed).toBe(true);
      expect(report.results.every((r) => r.passed)).toBe(true);
    });

    it('report each failing assertion', () => {
      const broken = buildTable(table.columns, [
        ...table.rows,
        { trip_id: 't-1', on_scene_datetime: null, fare: 3 },
      ]);

      const report = runVerification(compile(buildContract()), {
        table: broken,
        parameters: { run_date: '13/03/2024' },
        now: NOW,
      });

      expect(report.passed).toBe(false);
      expect(report.results).toEqual([
        {
          name: 'table:freshness',
          passed: false,
          detail: '2024-03-13T00:00:00.000Z is not within 1 day(s) of 2024-03-15T12:00:00.000Z',
        },
        {
          name: 'column:trip_id:duplicateCount',
          passed: false,
          detail: "1 duplicated value(s) in 'trip_id': t-1",
        },
        {
          name: 'column:on_scene_datetime:null',
          passed: false,
          detail: "1 null value(s) in 'on_scene_datetime'",
        },
      ]);
    });
  });

  describe('compileVerificationPlan', () => {
    it('compiles the same assertions as the contract it came from', () => {
      const compiled = compile(buildContract());

      const recompiled = compileVerificationPlan(compiled.plan);

      expect(recompiled.assertions.map((a) => a.name)).toEqual(
        compiled.assertions.map((a) => a.name)
      );
      expect(recompiled.imports).toEqual(compiled.imports);
    });
  });
});
