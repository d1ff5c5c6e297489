/**
 * Verification Artifact
 *
 * The compiled verification is persisted into the pipeline project as a rule
 * plan (data, not code). The executor side reads it back and compiles it
 * again with `compileVerificationPlan`.
 *
 * @module artifact/verification-artifact
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { QualityRule } from '../core/types/index.js';
import { VerificationArtifactError, toError } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import {
  compileVerificationPlan,
  type GeneratedVerification,
  type VerificationPlan,
} from '../compiler/rule-compiler.js';

const log = createLogger({ module: 'verification-artifact' });

/**
 * Fixed artifact file name inside the project directory
 */
export const VERIFICATION_ARTIFACT_NAME = 'expectations.verification.json';

export const ARTIFACT_VERSION = 1;

// ============================================================================
// Document Schema
// ============================================================================

const QualityRuleSchema: z.ZodType<QualityRule> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('duplicateCount'),
    params: z.object({ mustBeEqualTo: z.number().optional() }),
  }),
  z.object({
    kind: z.literal('null'),
    params: z.object({ mustBeEqualTo: z.number().optional() }),
  }),
  z.object({
    kind: z.literal('freshness'),
    params: z.object({
      unit: z.string().optional(),
      mustBeLessThan: z.number().optional(),
    }),
  }),
  z.object({
    kind: z.literal('unrecognized'),
    rule: z.string(),
    params: z.record(z.unknown()),
  }),
]);

const ArtifactDocumentSchema = z.object({
  version: z.literal(ARTIFACT_VERSION),
  name: z.string().min(1),
  tableName: z.string().min(1),
  freshnessParameter: z.string().min(1),
  generatedAt: z.string(),
  tableRules: z.array(QualityRuleSchema),
  columnRules: z.array(
    z.object({
      column: z.string().min(1),
      rules: z.array(QualityRuleSchema),
    })
  ),
});

export type VerificationArtifactDocument = z.infer<typeof ArtifactDocumentSchema>;

export function artifactPath(projectDir: string): string {
  return join(projectDir, VERIFICATION_ARTIFACT_NAME);
}

// ============================================================================
// Writer
// ============================================================================

export class VerificationArtifactWriter {
  private readonly clock: () => Date;

  constructor(options: { readonly clock?: () => Date } = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Write (or overwrite) the artifact in `projectDir`
   *
   * @returns path of the written file
   * @throws the underlying fs error when the directory is missing or read-only
   */
  async write(projectDir: string, verification: GeneratedVerification): Promise<string> {
    const path = artifactPath(projectDir);
    const document: VerificationArtifactDocument = {
      version: ARTIFACT_VERSION,
      name: verification.plan.name,
      tableName: verification.plan.tableName,
      freshnessParameter: verification.plan.freshnessParameter,
      generatedAt: this.clock().toISOString(),
      tableRules: [...verification.plan.tableRules],
      columnRules: verification.plan.columnRules.map(({ column, rules }) => ({
        column,
        rules: [...rules],
      })),
    };

    // The project directory belongs to the product; never create it
    await atomicWriteJSON(path, document, { createParents: false });

    log.debug('Verification artifact written', {
      path,
      assertions: verification.assertions.length,
    });
    return path;
  }
}

// ============================================================================
// Reader
// ============================================================================

/**
 * Read the artifact in `projectDir` and compile it back into assertions
 *
 * @returns null when the project has no artifact
 * @throws VerificationArtifactError - unreadable or malformed artifact
 */
export async function readVerificationArtifact(
  projectDir: string
): Promise<GeneratedVerification | null> {
  const path = artifactPath(projectDir);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw new VerificationArtifactError(
      `Cannot read verification artifact: ${toError(error).message}`,
      path
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new VerificationArtifactError(
      `Verification artifact is not valid JSON: ${toError(error).message}`,
      path
    );
  }

  const result = ArtifactDocumentSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new VerificationArtifactError(
      `Verification artifact is malformed: ${first.path.join('.') || '(root)'}: ${first.message}`,
      path
    );
  }

  const plan: VerificationPlan = {
    name: result.data.name,
    tableName: result.data.tableName,
    freshnessParameter: result.data.freshnessParameter,
    tableRules: result.data.tableRules,
    columnRules: result.data.columnRules,
  };
  return compileVerificationPlan(plan);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
