import type { Redis } from 'ioredis';
import { createAuditListener, createEventBus, LIFECYCLE_EVENT_NAMES, type EventBus } from '@switchyard/event-bus';
import { createLogger, type Logger } from '@switchyard/shared';
import { StateStore } from '@switchyard/state-store';
import { ActionRegistry } from './actions/registry';
import type { ActionCapability } from './actions/types';
import { createBlobStore, type BlobStore } from './audit/blobStore';
import { AuditMiddleware } from './audit/middleware';
import { loadOrchestratorConfig, type OrchestratorConfig } from './config';
import { Gateway } from './gateway';
import { LearningEngine } from './learning/engine';
import { createMetrics, type OrchestratorMetrics } from './metrics';
import { PlanBuilder } from './planning/planBuilder';
import type { PlanProposer } from './planning/proposer';
import type { ContextExtractor } from './workflow/context';
import { Orchestrator } from './workflow/orchestrator';

export type RuntimeOverrides = {
  capabilities?: Iterable<ActionCapability>;
  registry?: ActionRegistry;
  proposer?: PlanProposer | null;
  logger?: Logger;
  metrics?: OrchestratorMetrics;
  createRedis?: (url: string) => Redis;
  stateStore?: StateStore;
  eventBus?: EventBus;
  blobStore?: BlobStore | null;
  contextExtractors?: readonly ContextExtractor[];
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type Runtime = {
  config: OrchestratorConfig;
  logger: Logger;
  metrics: OrchestratorMetrics;
  registry: ActionRegistry;
  stateStore: StateStore;
  eventBus: EventBus;
  planBuilder: PlanBuilder;
  orchestrator: Orchestrator;
  learning: LearningEngine;
  middleware: AuditMiddleware;
  gateway: Gateway;
  close(): Promise<void>;
};

/**
 * Wires every component from explicit configuration and subscribes the
 * lifecycle audit listener. Nothing is shared between runtimes.
 */
export async function createRuntime(
  config: OrchestratorConfig = loadOrchestratorConfig(),
  overrides: RuntimeOverrides = {}
): Promise<Runtime> {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, name: 'switchyard' });
  const metrics = overrides.metrics ?? createMetrics();
  const registry = overrides.registry ?? new ActionRegistry();
  if (overrides.capabilities) {
    for (const capability of overrides.capabilities) {
      registry.register(capability);
    }
  }

  const stateStore =
    overrides.stateStore ??
    new StateStore({
      mode: config.stateStoreMode,
      redisUrl: config.redisUrl,
      createRedis: overrides.createRedis,
      logger: logger.child({ component: 'state-store' })
    });
  const eventBus =
    overrides.eventBus ??
    createEventBus({
      mode: config.eventBusMode,
      redisUrl: config.redisUrl,
      createRedis: overrides.createRedis,
      logger: logger.child({ component: 'event-bus' })
    });

  const planBuilder = new PlanBuilder({
    registry,
    cycleDetection: config.planner.cycleDetection,
    defaultMaxRetries: config.steps.defaultMaxRetries,
    defaultTimeoutMs: config.steps.defaultTimeoutMs,
    logger: logger.child({ component: 'plan-builder' }),
    metrics,
    now: overrides.now
  });

  const learning = new LearningEngine({
    stateStore,
    eventBus,
    planValidator: planBuilder,
    logger: logger.child({ component: 'learning' }),
    metrics,
    eventSource: `${config.eventSource}.learning`,
    enabled: config.learning.enabled,
    minSimilarity: config.learning.minSimilarity,
    retentionDays: config.learning.retentionDays,
    maxSuggestions: config.learning.maxSuggestions,
    now: overrides.now
  });

  const orchestrator = new Orchestrator({
    registry,
    stateStore,
    eventBus,
    logger: logger.child({ component: 'orchestrator' }),
    metrics,
    eventSource: config.eventSource,
    retryBackoff: config.retryBackoff,
    contextExtractors: overrides.contextExtractors,
    feedbackSink: config.learning.enabled ? learning : null,
    now: overrides.now,
    sleep: overrides.sleep
  });

  const middleware = new AuditMiddleware({
    stateStore,
    eventBus,
    blobStore: overrides.blobStore === undefined ? createBlobStore(config.blobStore) : overrides.blobStore,
    logger: logger.child({ component: 'audit' }),
    metrics,
    eventSource: `${config.eventSource}.audit`,
    redactKeys: config.audit.redactKeys,
    offloadThresholdBytes: config.audit.offloadThresholdBytes,
    retentionDays: config.audit.retentionDays,
    now: overrides.now
  });

  const gateway = new Gateway({
    registry,
    planBuilder,
    orchestrator,
    middleware,
    stateStore,
    learning: config.learning.enabled ? learning : null,
    proposer: overrides.proposer,
    fallbackAction: config.planner.fallbackAction,
    defaultMode: config.defaultMode,
    logger: logger.child({ component: 'gateway' })
  });

  const auditListener = createAuditListener(logger.child({ component: 'event-audit' }));
  for (const name of LIFECYCLE_EVENT_NAMES) {
    const subscribed = await eventBus.subscribe(name, auditListener);
    if (!subscribed) {
      logger.warn({ event: name }, 'lifecycle audit listener not subscribed');
    }
  }

  logger.info(
    {
      stateBackend: stateStore.backendKind,
      eventBusMode: eventBus.mode,
      actions: registry.size,
      learning: config.learning.enabled
    },
    'switchyard runtime ready'
  );

  return {
    config,
    logger,
    metrics,
    registry,
    stateStore,
    eventBus,
    planBuilder,
    orchestrator,
    learning,
    middleware,
    gateway,
    async close() {
      await learning.drain();
      await eventBus.close();
      await stateStore.close();
    }
  };
}
