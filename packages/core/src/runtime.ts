// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Wires one engine, distributor and cache from a TandemConfig.
 * The API server and CLI both start here.
 */

import { createResultCache, type ResultCache } from "./cache/result-cache.js";
import { TaskDistributor } from "./distributor/distributor.js";
import type { BaseExecutor } from "./executors/base.js";
import { createExecutors } from "./executors/index.js";
import { createLogger, type Logger } from "./logger.js";
import { ContextState } from "./router/context.js";
import { DelegationEngine } from "./router/delegation.js";
import type { TandemConfig } from "./types.js";

export interface TandemRuntime {
  config: TandemConfig;
  logger: Logger;
  context: ContextState;
  engine: DelegationEngine;
  distributor: TaskDistributor;
  cache: ResultCache;
  executors: { local: BaseExecutor; hosted: BaseExecutor };
  /** Cleans up executors and closes the cache. */
  close(): Promise<void>;
}

export interface RuntimeOverrides {
  logger?: Logger;
  executors?: { local: BaseExecutor; hosted: BaseExecutor };
  cache?: ResultCache;
}

export async function createRuntime(
  config: TandemConfig,
  overrides: RuntimeOverrides = {},
): Promise<TandemRuntime> {
  const logger = overrides.logger ?? createLogger({ ...config.logging });
  const executors = overrides.executors ?? createExecutors(config);
  await Promise.all([executors.local.initialize(), executors.hosted.initialize()]);

  const context = new ContextState(config.context);
  const engine = new DelegationEngine({
    local: executors.local,
    hosted: executors.hosted,
    settings: config.delegation,
    context,
    logger,
  });
  const distributor = new TaskDistributor({ settings: config.distributor, logger });
  const cache = overrides.cache ?? createResultCache(config.cache, logger);

  return {
    config,
    logger,
    context,
    engine,
    distributor,
    cache,
    executors,
    async close() {
      await Promise.all([executors.local.cleanup(), executors.hosted.cleanup()]);
      cache.close();
    },
  };
}
