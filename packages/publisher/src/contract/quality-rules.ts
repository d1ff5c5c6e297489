/**
 * Quality Rule Normalization
 *
 * Converts descriptor quality entries (`{ rule: 'null', mustBeEqualTo: 0 }`)
 * into the tagged `QualityRule` variant. Normalization never rejects a rule:
 * whether a rule can be enforced is the compiler's decision.
 *
 * @module contract/quality-rules
 */

import type { QualityRule } from '../core/types/index.js';

/**
 * Descriptor quality entry after schema validation
 */
export interface RawQualityRule {
  readonly rule: string;
  readonly mustBeEqualTo?: number;
  readonly mustBeLessThan?: number;
  readonly unit?: string;
  readonly [key: string]: unknown;
}

export function toQualityRule(raw: RawQualityRule): QualityRule {
  switch (raw.rule) {
    case 'duplicateCount':
      return { kind: 'duplicateCount', params: { mustBeEqualTo: raw.mustBeEqualTo } };
    case 'null':
      return { kind: 'null', params: { mustBeEqualTo: raw.mustBeEqualTo } };
    case 'freshness':
      return {
        kind: 'freshness',
        params: { unit: raw.unit, mustBeLessThan: raw.mustBeLessThan },
      };
    default: {
      const { rule, ...params } = raw;
      return { kind: 'unrecognized', rule, params };
    }
  }
}

/**
 * Human-readable rule label for logs and error messages
 *
 * @example describeQualityRule({ kind: 'null', params: { mustBeEqualTo: 2 } }) // 'null(mustBeEqualTo=2)'
 */
export function describeQualityRule(rule: QualityRule): string {
  const name = rule.kind === 'unrecognized' ? rule.rule : rule.kind;
  const params = Object.entries(rule.params)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatParam(value)}`);
  return `${name}(${params.join(', ')})`;
}

function formatParam(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
