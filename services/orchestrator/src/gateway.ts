import {
  silentLogger,
  toJsonValue,
  type JsonObject,
  type JsonValue,
  type Logger
} from '@switchyard/shared';
import type { StateStore } from '@switchyard/state-store';
import type { ActionRegistry } from './actions/registry';
import type { ActionCaller } from './actions/types';
import type { ExecutionMode } from './config';
import type { LearningEngine } from './learning/engine';
import type { FeedbackRecord, LearningSuggestion } from './learning/types';
import type { AuditMiddleware, OffloadEnvelope } from './audit/middleware';
import { PlanBuilder, singleNodeProposal } from './planning/planBuilder';
import { fallbackProposal, type PlanProposer } from './planning/proposer';
import type { WorkflowDag } from './planning/types';
import type { Orchestrator } from './workflow/orchestrator';
import { toStoredState, type WorkflowExecutionState } from './workflow/state';

export type InvokeRequest = {
  caller: ActionCaller;
  action?: string | null;
  request?: string | null;
  params?: JsonObject;
  /** Omitted: the configured default mode applies. */
  execute?: boolean;
  userId?: string;
  sessionId?: string;
};

export type GatewayResponse =
  | { status: 'planned'; plan: JsonValue; suggestions: JsonValue; warnings: string[] }
  | { status: 'completed' | 'failed' | 'cancelled'; workflow: JsonObject }
  | { status: 'error'; errorKind: string; message: string };

export type GatewayOptions = {
  registry: ActionRegistry;
  planBuilder: PlanBuilder;
  orchestrator: Orchestrator;
  middleware: AuditMiddleware;
  stateStore: StateStore;
  learning?: LearningEngine | null;
  proposer?: PlanProposer | null;
  fallbackAction?: string | null;
  defaultMode?: ExecutionMode;
  logger?: Logger;
};

type PreparedPlan = {
  dag: WorkflowDag;
  warnings: string[];
};

function errorResponse(errorKind: string, message: string): GatewayResponse {
  return { status: 'error', errorKind, message };
}

function conversationKeys(context: JsonObject): JsonObject {
  const kept: JsonObject = {};
  for (const [key, value] of Object.entries(context)) {
    if (key.startsWith('last_')) {
      kept[key] = value;
    }
  }
  return kept;
}

/** Single entry point for callers: direct actions and free-text requests both end up as workflows. */
export class Gateway {
  private readonly registry: ActionRegistry;
  private readonly planBuilder: PlanBuilder;
  private readonly orchestrator: Orchestrator;
  private readonly middleware: AuditMiddleware;
  private readonly stateStore: StateStore;
  private readonly learning: LearningEngine | null;
  private readonly proposer: PlanProposer | null;
  private readonly fallbackAction: string | null;
  private readonly defaultMode: ExecutionMode;
  private readonly logger: Logger;

  constructor(options: GatewayOptions) {
    this.registry = options.registry;
    this.planBuilder = options.planBuilder;
    this.orchestrator = options.orchestrator;
    this.middleware = options.middleware;
    this.stateStore = options.stateStore;
    this.learning = options.learning ?? null;
    this.proposer = options.proposer ?? null;
    this.fallbackAction = options.fallbackAction ?? null;
    this.defaultMode = options.defaultMode ?? 'execute';
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(input: InvokeRequest): Promise<GatewayResponse | OffloadEnvelope> {
    const mode: ExecutionMode = input.execute === undefined ? this.defaultMode : input.execute ? 'execute' : 'plan';
    const action = input.action?.trim() || null;
    const request = input.request?.trim() || null;
    const params = input.params ?? {};
    const userId = input.userId?.trim() || undefined;
    const sessionId = input.sessionId?.trim() || undefined;
    const normalized: InvokeRequest = { ...input, userId, sessionId };

    return this.middleware.wrap(
      { action, request, params, mode, callerId: input.caller.id, userId, sessionId },
      async () => {
        try {
          return await this.handle(normalized, { action, request, params, mode });
        } catch (err) {
          this.logger.error({ err, action, callerId: input.caller.id }, 'gateway request failed');
          return errorResponse('internal_error', 'Internal error while handling the request');
        }
      }
    );
  }

  async getWorkflowStatus(workflowId: string): Promise<WorkflowExecutionState | null> {
    return this.orchestrator.getStatus(workflowId);
  }

  async cancelWorkflow(workflowId: string): Promise<boolean> {
    return this.orchestrator.cancel(workflowId);
  }

  async recordCorrection(input: {
    workflowId: string;
    originalRequest: string;
    originalPlan: JsonValue;
    correctedPlan: JsonValue;
    userId?: string | null;
  }): Promise<FeedbackRecord | null> {
    return this.learning ? this.learning.recordCorrection(input) : null;
  }

  async getSuggestions(request: string): Promise<LearningSuggestion[]> {
    return this.learning ? this.learning.getSuggestions(request) : [];
  }

  private async handle(
    input: InvokeRequest,
    resolved: { action: string | null; request: string | null; params: JsonObject; mode: ExecutionMode }
  ): Promise<GatewayResponse> {
    const { action, request, params, mode } = resolved;
    let prepared: PreparedPlan | GatewayResponse;
    if (action) {
      if (!this.registry.has(action)) {
        return errorResponse('unknown_action', `Action ${action} is not registered`);
      }
      prepared = this.prepare(singleNodeProposal(action, params), []);
    } else if (request) {
      prepared = await this.planRequest(request, input.userId ?? null);
    } else {
      return errorResponse('invalid_request', 'Either an action or a request is required');
    }
    if ('status' in prepared) {
      return prepared;
    }

    const { dag, warnings } = prepared;
    if (dag.nodes.length === 0) {
      const error = PlanBuilder.validationError(dag);
      return errorResponse('invalid_plan', error ? error.message : 'Plan has no executable nodes');
    }

    if (mode === 'plan') {
      const suggestions = request ? await this.getSuggestions(request) : [];
      return { status: 'planned', plan: toJsonValue(dag), suggestions: toJsonValue(suggestions), warnings };
    }

    const conversation = input.userId ? await this.stateStore.getConversationContext(input.userId) : null;
    const state = await this.orchestrator.execute(dag, {
      mode,
      caller: input.caller,
      originalRequest: request,
      initialContext: conversation ? conversationKeys(conversation) : {},
      userId: input.userId,
      sessionId: input.sessionId
    });

    if (input.userId) {
      await this.stateStore.setConversationContext(input.userId, {
        ...conversationKeys(state.context),
        last_workflow_id: state.workflowId
      });
    }

    if (state.status === 'completed' || state.status === 'failed' || state.status === 'cancelled') {
      return { status: state.status, workflow: toStoredState(state) };
    }
    return errorResponse('internal_error', `Workflow ${state.workflowId} ended in status ${state.status}`);
  }

  private async planRequest(request: string, userId: string | null): Promise<PreparedPlan | GatewayResponse> {
    const proposal = await this.propose(request, userId);
    if (proposal === null) {
      return errorResponse('planner_unavailable', 'No plan could be produced for the request');
    }
    const improvement = this.learning
      ? await this.learning.improvePlan(proposal, request)
      : { proposal, appliedPatternId: null, warnings: [] };
    return this.prepare(improvement.proposal, improvement.warnings);
  }

  private async propose(request: string, userId: string | null): Promise<unknown> {
    const fallback = this.fallbackAction && this.registry.has(this.fallbackAction) ? this.fallbackAction : null;
    if (!this.proposer) {
      return fallback ? fallbackProposal(request, fallback) : null;
    }
    try {
      return await this.proposer.propose(request, {
        actions: this.registry.list(),
        conversation: userId ? await this.stateStore.getConversationContext(userId) : null,
        userId
      });
    } catch (err) {
      this.logger.warn({ err, fallbackAction: fallback }, 'plan proposer failed');
      return fallback ? fallbackProposal(request, fallback) : null;
    }
  }

  private prepare(proposal: unknown, extraWarnings: string[]): PreparedPlan {
    const dag = this.planBuilder.build(proposal);
    return {
      dag,
      warnings: [...dag.warnings.map((issue) => issue.detail), ...extraWarnings]
    };
  }
}
