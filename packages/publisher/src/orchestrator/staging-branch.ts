/**
 * Staging branch naming and preparation
 */

import type { BranchHandle, VersionedCatalogClient } from '../core/types/index.js';
import type { Logger } from '../core/utils/logger.js';

export interface StagingNameParts {
  readonly user: string;
  readonly prefix: string;
  readonly productName: string;
  /** Unique per attempt (attempt id) */
  readonly suffix: string;
}

/**
 * `<user>.<prefix>_<product>_<suffix>`
 *
 * Characters outside `[A-Za-z0-9_-]` in the product name become `_`.
 *
 * @example deriveStagingBranchName({ user: 'ana', prefix: 'staging', productName: 'trips', suffix: 'a1' })
 * // 'ana.staging_trips_a1'
 */
export function deriveStagingBranchName(parts: StagingNameParts): string {
  const product = parts.productName.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${parts.user}.${parts.prefix}_${product}_${parts.suffix}`;
}

/**
 * Branch name prefix shared by every staging branch of a user
 */
export function stagingBranchPrefix(user: string, prefix: string): string {
  return `${user}.${prefix}_`;
}

/**
 * Delete `name` if it already exists, then create it from `fromRef`.
 * Leftovers of an earlier attempt with the same name never leak into this one.
 */
export async function prepareStagingBranch(
  catalog: VersionedCatalogClient,
  name: string,
  fromRef: string,
  log: Logger
): Promise<BranchHandle> {
  if (await catalog.hasBranch(name)) {
    log.warn('Staging branch already exists, deleting it', { stagingBranch: name });
    await catalog.deleteBranch(name);
  }
  return catalog.createBranch(name, fromRef);
}
