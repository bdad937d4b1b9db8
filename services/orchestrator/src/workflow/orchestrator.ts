import { EVENT_NAMES, type EventBus, type EventIds } from '@switchyard/event-bus';
import {
  computeExponentialBackoff,
  describeError,
  silentLogger,
  sleep,
  toJsonValue,
  type BackoffOptions,
  type JsonObject,
  type JsonValue,
  type Logger
} from '@switchyard/shared';
import { fingerprintAction, type StateStore } from '@switchyard/state-store';
import type { ActionRegistry } from '../actions/registry';
import type { ActionCaller, ActionCapability } from '../actions/types';
import type { ExecutionMode } from '../config';
import { StepExecutionError, StepTimeoutError, WorkflowExhaustedError } from '../errors';
import type { OrchestratorMetrics } from '../metrics';
import type { DagNode, WorkflowDag } from '../planning/types';
import { defaultContextExtractors, mergeStepResult, substituteParams, type ContextExtractor } from './context';
import {
  isTerminal,
  parseStoredState,
  recount,
  snapshotState,
  toStoredState,
  type StepState,
  type WorkflowExecutionState
} from './state';
import { invokeWithTimeout } from './stepRunner';

export type WorkflowFeedback = {
  workflowId: string;
  status: WorkflowExecutionState['status'];
  originalRequest: string | null;
  userId: string | null;
  plan: WorkflowDag;
  state: WorkflowExecutionState;
  durationMs: number;
};

/** Receives finished runs. Must not block: analysis happens on the sink's own schedule. */
export interface WorkflowFeedbackSink {
  workflowFinished(feedback: WorkflowFeedback): void;
}

export type OrchestratorOptions = {
  registry: ActionRegistry;
  stateStore: StateStore;
  eventBus: EventBus;
  logger?: Logger;
  metrics?: OrchestratorMetrics;
  eventSource?: string;
  retryBackoff?: BackoffOptions;
  contextExtractors?: readonly ContextExtractor[];
  feedbackSink?: WorkflowFeedbackSink | null;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type ExecuteOptions = {
  caller: ActionCaller;
  mode?: ExecutionMode;
  originalRequest?: string | null;
  initialContext?: JsonObject;
  userId?: string;
  sessionId?: string;
};

type ActiveRun = {
  dag: WorkflowDag;
  state: WorkflowExecutionState;
  caller: ActionCaller;
  ids: EventIds;
  cancelRequested: boolean;
  controller: AbortController;
};

type StepOutcome =
  | { kind: 'completed' }
  | { kind: 'exhausted'; error: WorkflowExhaustedError }
  | { kind: 'cancelled' };

function presentId(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class Orchestrator {
  private readonly registry: ActionRegistry;
  private readonly stateStore: StateStore;
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly metrics: OrchestratorMetrics | null;
  private readonly eventSource: string;
  private readonly retryBackoff: BackoffOptions;
  private readonly extractors: readonly ContextExtractor[];
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly feedbackSink: WorkflowFeedbackSink | null;
  private readonly active = new Map<string, ActiveRun>();

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.stateStore = options.stateStore;
    this.eventBus = options.eventBus;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? null;
    this.eventSource = options.eventSource ?? 'switchyard.orchestrator';
    this.retryBackoff = options.retryBackoff ?? {};
    this.extractors = options.contextExtractors ?? defaultContextExtractors;
    this.feedbackSink = options.feedbackSink ?? null;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Plan mode returns the pending state without touching any capability.
   * Execute mode runs the nodes one at a time in DAG order and resolves with
   * the terminal state.
   */
  async execute(dag: WorkflowDag, options: ExecuteOptions): Promise<WorkflowExecutionState> {
    const mode = options.mode ?? 'execute';
    const state = this.initialState(dag, mode, options);
    if (mode === 'plan') {
      return state;
    }

    if (this.active.has(dag.id)) {
      throw new Error(`Workflow ${dag.id} is already running`);
    }

    const run: ActiveRun = {
      dag,
      state,
      caller: options.caller,
      ids: { correlationId: dag.id, userId: presentId(options.userId), sessionId: presentId(options.sessionId) },
      cancelRequested: false,
      controller: new AbortController()
    };
    this.active.set(dag.id, run);
    const started = this.now().getTime();

    try {
      state.status = 'running';
      await this.stateStore.createWorkflowSession(dag.id, toStoredState(state));

      try {
        await this.publish(run, EVENT_NAMES.workflowStarted, {
          workflowId: dag.id,
          workflowName: dag.name,
          totalSteps: dag.nodes.length,
          mode
        });
        await this.runNodes(run);
      } catch (err) {
        this.logger.error({ err, workflowId: dag.id }, 'workflow run aborted by an unexpected error');
        state.status = 'failed';
        state.failureReason = `internal error: ${describeError(err)}`;
        state.errors.push(this.errorEntry(null, 'exception', describeError(err), 0));
      }

      return await this.finish(run, started);
    } finally {
      this.active.delete(dag.id);
    }
  }

  /** Requests cooperative cancellation; the run stops after the in-flight step returns. */
  async cancel(workflowId: string): Promise<boolean> {
    const run = this.active.get(workflowId);
    if (run) {
      if (run.cancelRequested || isTerminal(run.state.status)) {
        return false;
      }
      run.cancelRequested = true;
      run.controller.abort();
      this.markCancelled(run.state);
      await this.stateStore.completeWorkflowSession(workflowId, toStoredState(run.state));
      this.logger.info({ workflowId }, 'workflow cancellation requested');
      return true;
    }

    const stored = await this.getStatus(workflowId);
    if (!stored || isTerminal(stored.status)) {
      return false;
    }
    this.markCancelled(stored);
    return this.stateStore.completeWorkflowSession(workflowId, toStoredState(stored));
  }

  async getStatus(workflowId: string): Promise<WorkflowExecutionState | null> {
    const run = this.active.get(workflowId);
    if (run) {
      return snapshotState(run.state);
    }
    return parseStoredState(await this.stateStore.getWorkflowSession(workflowId));
  }

  listActive(): WorkflowExecutionState[] {
    return Array.from(this.active.values()).map((run) => snapshotState(run.state));
  }

  private initialState(dag: WorkflowDag, mode: ExecutionMode, options: ExecuteOptions): WorkflowExecutionState {
    const timestamp = this.timestamp();
    return {
      workflowId: dag.id,
      workflowName: dag.name,
      status: 'pending',
      mode,
      originalRequest: options.originalRequest ?? null,
      callerId: options.caller.id,
      steps: dag.nodes.map((node) => this.initialStep(node)),
      context: { ...(options.initialContext ?? {}) },
      stepResults: {},
      errors: [],
      totalSteps: dag.nodes.length,
      completedSteps: 0,
      failedSteps: 0,
      skippedSteps: 0,
      startedAt: timestamp,
      updatedAt: timestamp,
      completedAt: null,
      cancelledAt: null,
      failureReason: null,
      plan: toJsonValue(dag)
    };
  }

  private initialStep(node: DagNode): StepState {
    return {
      stepId: node.id,
      action: node.action,
      status: 'pending',
      attempts: 0,
      retryCount: 0,
      startedAt: null,
      completedAt: null,
      durationMs: null,
      cached: false,
      errorKind: null,
      errorMessage: null,
      skipReason: null
    };
  }

  private async runNodes(run: ActiveRun): Promise<void> {
    const { dag, state } = run;
    for (const [index, node] of dag.nodes.entries()) {
      if (run.cancelRequested) {
        return;
      }
      const step = state.steps[index];

      const blockedReason = this.blockedReason(node, state);
      if (blockedReason) {
        step.status = 'skipped';
        step.skipReason = blockedReason;
        this.logger.info({ workflowId: dag.id, stepId: node.id, reason: blockedReason }, 'workflow step skipped');
        await this.checkpoint(run);
        await this.publishStep(run, step);
        continue;
      }

      const outcome = await this.runNode(run, node, step);
      if (outcome.kind === 'exhausted') {
        if (!run.cancelRequested) {
          state.status = 'failed';
          state.failureReason = outcome.error.message;
        }
        return;
      }
      if (outcome.kind === 'cancelled') {
        return;
      }
    }
  }

  private blockedReason(node: DagNode, state: WorkflowExecutionState): string | null {
    if (node.prunedDependencies.length > 0) {
      return `dependency ${node.prunedDependencies.join(', ')} was removed during plan validation`;
    }
    for (const dependencyId of node.dependencies) {
      const dependency = state.steps.find((candidate) => candidate.stepId === dependencyId);
      if (!dependency || dependency.status !== 'completed') {
        return `dependency ${dependencyId} is ${dependency ? dependency.status : 'missing'}`;
      }
    }
    return null;
  }

  private async runNode(run: ActiveRun, node: DagNode, step: StepState): Promise<StepOutcome> {
    const { state } = run;
    const capability = this.registry.get(node.action);
    if (!capability) {
      const error = new StepExecutionError(node.id, node.action, 'unknown_action', `Action ${node.action} is not registered`);
      return this.exhaust(run, step, error, 0);
    }

    const params = substituteParams(node.params, state.context);
    const validated = this.validateParams(capability, node, params);
    if (validated instanceof StepExecutionError) {
      return this.exhaust(run, step, validated, 0);
    }

    const cached = await this.readCache(capability, validated);
    if (cached !== undefined) {
      step.cached = true;
      step.startedAt = this.timestamp();
      this.completeStep(run, node, step, cached, 0);
      await this.checkpoint(run);
      await this.publishStep(run, step);
      return { kind: 'completed' };
    }

    const maxAttempts = node.maxRetries + 1;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      step.status = 'running';
      step.attempts = attempt;
      step.startedAt = step.startedAt ?? this.timestamp();
      await this.publish(run, EVENT_NAMES.actionStarted, {
        workflowId: state.workflowId,
        stepId: node.id,
        action: node.action,
        attempt
      });

      const attemptStarted = this.now().getTime();
      const outcome = await this.attemptOnce(run, node, capability, validated, attempt);
      this.metrics?.stepDuration.observe({ action: node.action }, (this.now().getTime() - attemptStarted) / 1_000);
      if (outcome.ok) {
        this.metrics?.stepAttempts.inc({ action: node.action, outcome: 'success' });
        this.completeStep(run, node, step, outcome.data, this.now().getTime() - attemptStarted);
        await this.writeCache(capability, validated, outcome.data);
        await this.checkpoint(run);
        await this.publishStep(run, step);
        await this.publish(run, EVENT_NAMES.actionCompleted, {
          workflowId: state.workflowId,
          stepId: node.id,
          action: node.action,
          attempt
        });
        return { kind: 'completed' };
      }

      const { failure } = outcome;
      this.metrics?.stepAttempts.inc({
        action: node.action,
        outcome: failure instanceof StepTimeoutError ? 'timeout' : 'error'
      });
      state.errors.push(this.errorEntry(node.id, failure.kind, failure.message, attempt));
      this.logger.warn(
        { workflowId: state.workflowId, stepId: node.id, action: node.action, attempt, err: failure },
        'workflow step attempt failed'
      );

      if (attempt >= maxAttempts) {
        return this.exhaust(run, step, failure, attempt);
      }
      if (run.cancelRequested) {
        return this.abandon(run, step);
      }

      step.status = 'retry';
      step.retryCount += 1;
      step.errorKind = failure.kind;
      step.errorMessage = failure.message;
      await this.checkpoint(run);
      await this.sleep(computeExponentialBackoff(attempt, this.retryBackoff), run.controller.signal);
      if (run.cancelRequested) {
        return this.abandon(run, step);
      }
    }

    // maxAttempts is always at least 1, so the loop returns before reaching here.
    return this.abandon(run, step);
  }

  private async attemptOnce(
    run: ActiveRun,
    node: DagNode,
    capability: ActionCapability,
    params: JsonObject,
    attempt: number
  ): Promise<{ ok: true; data: JsonValue } | { ok: false; failure: StepExecutionError }> {
    try {
      const result = await invokeWithTimeout({
        capability,
        caller: run.caller,
        params,
        workflowId: run.state.workflowId,
        stepId: node.id,
        attempt,
        timeoutMs: node.timeoutMs,
        logger: this.logger
      });
      if (result.status === 'success') {
        return { ok: true, data: result.data };
      }
      const message = `${result.errorKind}: ${result.message}`;
      return {
        ok: false,
        failure: new StepExecutionError(node.id, node.action, 'action_error', message, { httpCode: result.httpCode })
      };
    } catch (err) {
      return {
        ok: false,
        failure: err instanceof StepExecutionError
          ? err
          : new StepExecutionError(node.id, node.action, 'exception', describeError(err), { cause: err })
      };
    }
  }

  private validateParams(capability: ActionCapability, node: DagNode, params: JsonObject): JsonObject | StepExecutionError {
    if (!capability.paramsSchema) {
      return params;
    }
    const parsed = capability.paramsSchema.safeParse(params);
    if (parsed.success) {
      return parsed.data;
    }
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'params'}: ${issue.message}`)
      .join('; ');
    return new StepExecutionError(node.id, node.action, 'invalid_params', `Invalid parameters for ${node.action}: ${detail}`);
  }

  private async readCache(capability: ActionCapability, params: JsonObject): Promise<JsonValue | undefined> {
    if (!capability.cacheTtlSeconds || capability.cacheTtlSeconds <= 0) {
      return undefined;
    }
    const hit = await this.stateStore.getCachedResult(capability.name, fingerprintAction(capability.name, params));
    this.metrics?.cacheLookups.inc({ result: hit === undefined ? 'miss' : 'hit' });
    return hit;
  }

  private async writeCache(capability: ActionCapability, params: JsonObject, data: JsonValue): Promise<void> {
    if (!capability.cacheTtlSeconds || capability.cacheTtlSeconds <= 0) {
      return;
    }
    await this.stateStore.cacheActionResult(
      capability.name,
      fingerprintAction(capability.name, params),
      data,
      capability.cacheTtlSeconds
    );
  }

  private completeStep(run: ActiveRun, node: DagNode, step: StepState, data: JsonValue, durationMs: number): void {
    const { state } = run;
    step.status = 'completed';
    step.completedAt = this.timestamp();
    step.durationMs = durationMs;
    step.errorKind = null;
    step.errorMessage = null;
    state.stepResults[node.id] = data;
    state.context = mergeStepResult(state.context, node.id, node.action, data, this.extractors);
  }

  private async exhaust(
    run: ActiveRun,
    step: StepState,
    failure: StepExecutionError,
    attempts: number
  ): Promise<StepOutcome> {
    const { state } = run;
    const error = new WorkflowExhaustedError(state.workflowId, step.stepId, attempts, failure);
    step.status = 'failed';
    step.completedAt = this.timestamp();
    step.errorKind = failure.kind;
    step.errorMessage = failure.message;
    if (attempts === 0) {
      state.errors.push(this.errorEntry(step.stepId, failure.kind, failure.message, 0));
    }
    this.logger.error(
      { workflowId: state.workflowId, stepId: step.stepId, attempts, err: failure },
      'workflow step exhausted its retries'
    );
    await this.checkpoint(run);
    await this.publishStep(run, step);
    await this.publish(run, EVENT_NAMES.actionFailed, {
      workflowId: state.workflowId,
      stepId: step.stepId,
      action: step.action,
      attempts,
      errorKind: failure.kind,
      message: failure.message
    });
    return { kind: 'exhausted', error };
  }

  private async abandon(run: ActiveRun, step: StepState): Promise<StepOutcome> {
    step.status = 'skipped';
    step.skipReason = 'workflow cancelled';
    await this.checkpoint(run);
    return { kind: 'cancelled' };
  }

  private async finish(run: ActiveRun, started: number): Promise<WorkflowExecutionState> {
    const { state, dag } = run;
    if (run.cancelRequested) {
      this.markCancelled(state);
    } else if (state.status !== 'failed') {
      state.status = 'completed';
    }
    const finishedAt = this.timestamp();
    state.completedAt = state.completedAt ?? finishedAt;
    state.updatedAt = finishedAt;
    recount(state);

    await this.stateStore.completeWorkflowSession(state.workflowId, toStoredState(state));
    const durationMs = Math.max(0, this.now().getTime() - started);
    const terminalEvent = state.status === 'completed'
      ? EVENT_NAMES.workflowCompleted
      : state.status === 'cancelled'
        ? EVENT_NAMES.workflowCancelled
        : EVENT_NAMES.workflowFailed;
    await this.publish(run, terminalEvent, {
      workflowId: state.workflowId,
      status: state.status,
      completedSteps: state.completedSteps,
      failedSteps: state.failedSteps,
      skippedSteps: state.skippedSteps,
      durationMs,
      failureReason: state.failureReason
    });
    this.metrics?.workflowRuns.inc({ status: state.status });
    this.logger.info(
      { workflowId: state.workflowId, status: state.status, durationMs, completedSteps: state.completedSteps },
      'workflow finished'
    );

    const result = snapshotState(state);
    this.notifyFeedback({
      workflowId: state.workflowId,
      status: state.status,
      originalRequest: state.originalRequest,
      userId: run.ids.userId ?? null,
      plan: dag,
      state: result,
      durationMs
    });
    return result;
  }

  private notifyFeedback(feedback: WorkflowFeedback): void {
    if (!this.feedbackSink) {
      return;
    }
    try {
      this.feedbackSink.workflowFinished(feedback);
    } catch (err) {
      this.logger.warn({ err, workflowId: feedback.workflowId }, 'failed to hand workflow feedback to learning');
    }
  }

  private markCancelled(state: WorkflowExecutionState): void {
    const timestamp = this.timestamp();
    state.status = 'cancelled';
    state.cancelledAt = state.cancelledAt ?? timestamp;
    state.completedAt = state.completedAt ?? timestamp;
    state.updatedAt = timestamp;
    recount(state);
  }

  private async checkpoint(run: ActiveRun): Promise<void> {
    const { state } = run;
    state.updatedAt = this.timestamp();
    recount(state);
    const stored = toStoredState(state);
    const persisted = run.cancelRequested
      ? await this.stateStore.completeWorkflowSession(state.workflowId, stored)
      : await this.stateStore.updateWorkflowSession(state.workflowId, stored);
    if (!persisted) {
      this.logger.warn({ workflowId: state.workflowId }, 'workflow state checkpoint was not persisted');
    }
  }

  private async publishStep(run: ActiveRun, step: StepState): Promise<void> {
    await this.publish(run, EVENT_NAMES.workflowStepCompleted, {
      workflowId: run.state.workflowId,
      stepId: step.stepId,
      action: step.action,
      status: step.status,
      attempts: step.attempts,
      cached: step.cached,
      skipReason: step.skipReason
    });
  }

  private async publish(run: ActiveRun, name: string, payload: JsonObject): Promise<void> {
    const delivered = await this.eventBus.emit(name, this.eventSource, payload, run.ids);
    if (!delivered) {
      this.logger.debug({ event: name, workflowId: run.state.workflowId }, 'lifecycle event not published');
    }
  }

  private errorEntry(stepId: string | null, kind: string, message: string, attempt: number) {
    return { stepId, kind, message, attempt, timestamp: this.timestamp() };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
