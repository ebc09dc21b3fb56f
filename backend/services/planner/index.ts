import type { Env } from "../../config/env.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";
import type { Publisher } from "../publishers/publisher.js";
import { PlannerOrchestrator } from "./plannerOrchestrator.service.js";
import { PostLifecycleManager } from "./postLifecycle.service.js";
import type { PostStore } from "./postStore.js";
import { PublishDispatcher } from "./publishDispatcher.service.js";
import type { PlannerConfig } from "./types.js";

export interface Planner {
  orchestrator: PlannerOrchestrator;
  lifecycle: PostLifecycleManager;
  dispatcher: PublishDispatcher;
}

export function plannerConfigFromEnv(env: Env): PlannerConfig {
  return {
    draftOnly: env.PLANNER_DRAFT_ONLY,
    defaultFrequency: env.DEFAULT_POST_FREQUENCY,
    storeTimeoutMs: env.STORE_TIMEOUT_MS,
    publishTimeoutMs: env.PUBLISH_TIMEOUT_MS,
    retentionDays: env.DATA_RETENTION_DAYS,
  };
}

export function createPlanner(deps: {
  store: PostStore;
  publisher: Publisher;
  config: PlannerConfig;
  now?: () => Date;
  logger?: Logger;
}): Planner {
  const logger = deps.logger ?? rootLogger;
  const dispatcher = new PublishDispatcher(deps.publisher, {
    timeoutMs: deps.config.publishTimeoutMs,
    now: deps.now,
    logger,
  });
  const lifecycle = new PostLifecycleManager(deps.store, dispatcher, {
    storeTimeoutMs: deps.config.storeTimeoutMs,
    now: deps.now,
    logger,
  });
  const orchestrator = new PlannerOrchestrator(deps.store, lifecycle, {
    config: deps.config,
    now: deps.now,
    logger,
  });

  return { orchestrator, lifecycle, dispatcher };
}

export * from "./errors.js";
export type * from "./types.js";
export { allocate } from "./slotAllocator.js";
