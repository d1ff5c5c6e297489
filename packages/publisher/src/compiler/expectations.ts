/**
 * Standard Expectations
 *
 * Predicates the compiled verification is built from. Each returns an
 * outcome instead of throwing, so one run reports every failing assertion.
 *
 * @module compiler/expectations
 */

import type { CellValue, TableData } from '../core/types/index.js';

export type StandardExpectationName =
  | 'expectColumnAllUnique'
  | 'expectColumnNoNulls'
  | 'expectFreshWithinDays';

export interface ExpectationOutcome {
  readonly passed: boolean;
  /** Why the expectation failed (absent when it passed) */
  readonly detail?: string;
}

const PASSED: ExpectationOutcome = Object.freeze({ passed: true });

export const DAY_MS = 24 * 60 * 60 * 1000;

function missingColumn(table: TableData, column: string): ExpectationOutcome | null {
  return table.columns.includes(column)
    ? null
    : { passed: false, detail: `column '${column}' not found in table` };
}

function isNullCell(value: CellValue | undefined): boolean {
  return value === null || value === undefined;
}

// Distinguishes 1 from '1' and true from 'true'
function cellKey(value: CellValue): string {
  return `${typeof value}:${String(value)}`;
}

/**
 * Every non-null value in the column is distinct. Nulls are left to the
 * `null` rule and never count as duplicates.
 */
export function expectColumnAllUnique(table: TableData, column: string): ExpectationOutcome {
  const missing = missingColumn(table, column);
  if (missing) return missing;

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const row of table.rows) {
    const value = row[column];
    if (value === null || value === undefined) continue;
    const key = cellKey(value);
    if (seen.has(key)) {
      duplicates.add(String(value));
    } else {
      seen.add(key);
    }
  }

  if (duplicates.size === 0) return PASSED;
  const sample = [...duplicates].slice(0, 5).join(', ');
  return {
    passed: false,
    detail: `${duplicates.size} duplicated value(s) in '${column}': ${sample}`,
  };
}

/**
 * No row has a null (or absent) value in the column
 */
export function expectColumnNoNulls(table: TableData, column: string): ExpectationOutcome {
  const missing = missingColumn(table, column);
  if (missing) return missing;

  const nullCount = table.rows.filter((row) => isNullCell(row[column])).length;
  return nullCount === 0
    ? PASSED
    : { passed: false, detail: `${nullCount} null value(s) in '${column}'` };
}

/**
 * The date parameter falls within the last `days` days:
 * `now - days < date <= now`. Exactly `days` old fails.
 */
export function expectFreshWithinDays(
  value: unknown,
  days: number,
  now: Date
): ExpectationOutcome {
  const date = parseDateParameter(value);
  if (date === null) {
    return {
      passed: false,
      detail: `freshness parameter ${value === undefined ? 'is missing' : `'${String(value)}' is not a date`}`,
    };
  }

  const lowerBound = now.getTime() - days * DAY_MS;
  const time = date.getTime();
  if (time > lowerBound && time <= now.getTime()) {
    return PASSED;
  }

  return {
    passed: false,
    detail:
      time > now.getTime()
        ? `${date.toISOString()} is in the future`
        : `${date.toISOString()} is not within ${days} day(s) of ${now.toISOString()}`,
  };
}

// ============================================================================
// Date Parameter Parsing
// ============================================================================

const DAY_MONTH_YEAR = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects 31/02/2024 and friends, which Date.UTC silently rolls over
  return date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
    ? date
    : null;
}

/**
 * Parse a date-like run parameter.
 *
 * Accepted: `DD/MM/YYYY` and `YYYY-MM-DD` (midnight UTC), ISO-8601 timestamps
 * with an explicit offset, and epoch milliseconds.
 */
export function parseDateParameter(value: unknown): Date | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();

  const dmy = DAY_MONTH_YEAR.exec(text);
  if (dmy) {
    return utcDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));
  }

  const ymd = ISO_DATE.exec(text);
  if (ymd) {
    return utcDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));
  }

  if (ISO_DATE_TIME.test(text)) {
    const date = new Date(text);
    return isNaN(date.getTime()) ? null : date;
  }

  return null;
}

/**
 * Format a date the way run parameters carry it (`DD/MM/YYYY`, UTC)
 */
export function formatRunDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}
