/**
 * Publish Attempt Types
 *
 * A publish attempt lives only in process memory and logs.
 */

import type { DataProductContract } from './contract.js';
import type { RunResult } from './catalog.js';

/**
 * Attempt lifecycle
 *
 * INIT -> STAGED -> EXECUTED -> MERGED
 *                            -> PRESERVED
 * Any failure after INIT ends in PRESERVED.
 */
export type PublishState =
  | 'INIT'       // Contract compiled, nothing touched in the catalog
  | 'STAGED'     // Staging branch created from the output branch
  | 'EXECUTED'   // Pipeline run reached a terminal status
  | 'MERGED'     // Staging merged into the output branch
  | 'PRESERVED'; // Output untouched, staging kept for inspection

export type PublishOutcome = Extract<PublishState, 'MERGED' | 'PRESERVED'>;

export interface StateTransition {
  readonly from: PublishState;
  readonly to: PublishState;
  readonly at: Date;
}

export interface PublishAttempt {
  readonly id: string;
  readonly contract: DataProductContract;
  readonly stagingBranch: string;
  readonly outcome: PublishOutcome;
  readonly runResult: RunResult | null;
  /** Why the attempt was preserved (null when merged) */
  readonly error: Error | null;
  /** True when the staging branch still exists after the attempt */
  readonly stagingRetained: boolean;
  readonly transitions: readonly StateTransition[];
  readonly startedAt: Date;
  readonly finishedAt: Date;
}
