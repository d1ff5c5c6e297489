/**
 * Verification Runner
 *
 * Evaluates every assertion of a compiled verification and collects the
 * outcomes. A failing assertion does not stop the remaining ones.
 */

import { toError } from '../core/errors.js';
import type { GeneratedVerification, VerificationInput } from './rule-compiler.js';

export interface AssertionResult {
  readonly name: string;
  readonly passed: boolean;
  readonly detail?: string;
}

export interface VerificationReport {
  readonly name: string;
  readonly tableName: string;
  readonly passed: boolean;
  readonly results: readonly AssertionResult[];
}

export function runVerification(
  verification: GeneratedVerification,
  input: VerificationInput
): VerificationReport {
  const results: AssertionResult[] = verification.assertions.map((assertion) => {
    try {
      const outcome = assertion.assert(input);
      return outcome.passed
        ? { name: assertion.name, passed: true }
        : { name: assertion.name, passed: false, detail: outcome.detail };
    } catch (error) {
      return {
        name: assertion.name,
        passed: false,
        detail: `assertion threw: ${toError(error).message}`,
      };
    }
  });

  return {
    name: verification.name,
    tableName: verification.tableName,
    passed: results.every((result) => result.passed),
    results,
  };
}

/**
 * Failed assertions as `name: detail`, joined for a run error message
 */
export function summarizeFailures(report: VerificationReport): string {
  return report.results
    .filter((result) => !result.passed)
    .map((result) => (result.detail ? `${result.name}: ${result.detail}` : result.name))
    .join('; ');
}
