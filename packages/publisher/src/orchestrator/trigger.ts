/**
 * Scheduled Trigger
 *
 * Parameterless entry point for a scheduler (cron, serverless timer). Runs one
 * publish attempt, logs one summary record for telemetry ingestion and
 * reports success as a boolean. It never throws.
 *
 * Credentials and acting user come from the environment
 * (`CATALOG_API_KEY`, `CATALOG_USER`); everything else from configuration.
 */

import { randomUUID } from 'node:crypto';
import type { PublishAttempt, PublishOutcome } from '../core/types/index.js';
import { loadPublisherConfig, type PublisherConfig } from '../core/config.js';
import { isPublisherError, toError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { createLocalRuntime, type LocalRuntime } from '../runtime.js';
import type { PublishOrchestrator } from './publish-orchestrator.js';

/** Attempt stopped before the catalog was touched (contract or config error) */
export type TriggerOutcome = PublishOutcome | 'ABORTED';

export interface TriggerSummary {
  readonly metadata: {
    readonly timeMs: number;
    readonly epochMs: number;
    readonly eventId: string;
  };
  readonly data: {
    readonly totalNewRows: number;
    readonly outcome: TriggerOutcome;
    readonly stagingBranch: string | null;
  };
}

export interface TriggerResult {
  readonly success: boolean;
  readonly summary: TriggerSummary;
  readonly attempt: PublishAttempt | null;
}

export interface TriggerDependencies {
  readonly orchestrator: Pick<PublishOrchestrator, 'publish'>;
  /** Descriptor source (default: the orchestrator's configured source) */
  readonly source?: string;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  readonly logger?: Logger;
}

/**
 * Run one attempt and build its summary
 */
export async function executeScheduledPublish(deps: TriggerDependencies): Promise<TriggerResult> {
  const clock = deps.clock ?? (() => new Date());
  const eventId = (deps.idGenerator ?? randomUUID)();
  const log = deps.logger ?? createLogger({ module: 'trigger' });
  const started = clock();

  let attempt: PublishAttempt | null = null;
  try {
    attempt = await (deps.source === undefined
      ? deps.orchestrator.publish()
      : deps.orchestrator.publish(deps.source));
  } catch (error) {
    const err = toError(error);
    log.error('Publish aborted before staging', {
      eventId,
      code: isPublisherError(err) ? err.code : null,
      error: err,
    });
  }

  const ended = clock();
  const summary: TriggerSummary = {
    metadata: {
      timeMs: ended.getTime() - started.getTime(),
      epochMs: ended.getTime(),
      eventId,
    },
    data: {
      totalNewRows: attempt?.runResult?.rowsWritten ?? 0,
      outcome: attempt?.outcome ?? 'ABORTED',
      stagingBranch: attempt?.stagingBranch ?? null,
    },
  };
  log.info('Publish summary', { ...summary });

  return {
    success: attempt?.outcome === 'MERGED',
    summary,
    attempt,
  };
}

/**
 * Scheduler entry point
 *
 * Without dependencies it loads configuration from the environment and runs
 * against the local runtime, closing it afterwards.
 *
 * @returns true when the attempt merged
 */
export async function runScheduledPublish(deps?: TriggerDependencies): Promise<boolean> {
  if (deps) {
    return (await executeScheduledPublish(deps)).success;
  }

  const log = createLogger({ module: 'trigger' });
  let config: PublisherConfig;
  let runtime: LocalRuntime;
  try {
    config = await loadPublisherConfig();
    runtime = createLocalRuntime(config);
  } catch (error) {
    log.error('Publisher could not be initialized', { error: toError(error) });
    return false;
  }

  try {
    const result = await executeScheduledPublish({
      orchestrator: runtime.orchestrator,
      logger: createLogger({ module: 'trigger', level: config.logLevel }),
    });
    return result.success;
  } finally {
    runtime.close();
  }
}
