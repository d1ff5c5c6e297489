/**
 * Local Runtime
 *
 * Wires a resolved configuration to the in-process catalog, the local
 * pipeline executor and the orchestrator. Remote deployments build the same
 * orchestrator with their own catalog client and executor instead, passing
 * `config.catalog.apiKey` to that client.
 */

import { randomUUID } from 'node:crypto';
import type { PublisherConfig } from './core/config.js';
import { createLogger, type Logger } from './core/utils/logger.js';
import { createCatalogStorage } from './catalog/adapters/factory.js';
import { LocalVersionedCatalog } from './catalog/local-catalog.js';
import type { CatalogStorage } from './catalog/storage.js';
import { LocalPipelineExecutor } from './executor/local-executor.js';
import { PipelineProjectRegistry } from './executor/pipeline-project.js';
import { PublishOrchestrator } from './orchestrator/publish-orchestrator.js';

export interface LocalRuntimeOptions {
  /** Overrides the storage named by the configuration */
  readonly storage?: CatalogStorage;
  readonly registry?: PipelineProjectRegistry;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  readonly logger?: Logger;
}

export interface LocalRuntime {
  readonly config: PublisherConfig;
  readonly catalog: LocalVersionedCatalog;
  readonly executor: LocalPipelineExecutor;
  readonly registry: PipelineProjectRegistry;
  readonly orchestrator: PublishOrchestrator;
  readonly logger: Logger;
  close(): void;
}

export function createLocalRuntime(
  config: PublisherConfig,
  options: LocalRuntimeOptions = {}
): LocalRuntime {
  const logger = options.logger ?? createLogger({ module: 'runtime', level: config.logLevel });
  const clock = options.clock ?? (() => new Date());
  const idGenerator = options.idGenerator ?? randomUUID;
  const registry = options.registry ?? new PipelineProjectRegistry();

  const storage =
    options.storage ??
    createCatalogStorage({
      storage: config.catalog.storage,
      databasePath: config.catalog.databasePath,
    });

  const catalog = new LocalVersionedCatalog({
    storage,
    defaultBranch: config.catalog.defaultBranch,
    clock,
    logger: logger.child({ component: 'catalog' }),
  });

  const executor = new LocalPipelineExecutor({
    store: catalog,
    registry,
    clock,
    logger: logger.child({ component: 'executor' }),
  });

  const orchestrator = new PublishOrchestrator({
    config,
    catalog,
    executor,
    clock,
    idGenerator,
    logger: logger.child({ component: 'orchestrator' }),
  });

  logger.debug('Local runtime ready', {
    storage: options.storage ? 'injected' : config.catalog.storage,
    defaultBranch: config.catalog.defaultBranch,
    user: config.catalog.user,
  });

  return {
    config,
    catalog,
    executor,
    registry,
    orchestrator,
    logger,
    close: () => catalog.close(),
  };
}
