import { randomUUID } from 'node:crypto';
import { silentLogger, type JsonObject, type Logger } from '@switchyard/shared';
import type { ActionRegistry } from '../actions/registry';
import type { CycleDetection } from '../config';
import { PlanValidationError, type PlanIssue } from '../errors';
import type { OrchestratorMetrics } from '../metrics';
import { detectCycle, findSelfDependency, stableTopologicalOrder } from './dag';
import { proposedNodeSchema, proposedPlanSchema, type ProposedNode, type ProposedPlan } from './schema';
import { deepFreeze, type DagNode, type WorkflowDag } from './types';

const DEFAULT_ESTIMATE_SECONDS = 60;
const TIMEOUT_HEADROOM_SECONDS = 60;
const DEFAULT_PRIORITY = 1;

export type PlanBuilderOptions = {
  registry: ActionRegistry;
  cycleDetection?: CycleDetection;
  defaultMaxRetries?: number;
  /** Timeout for nodes that carry neither a timeout nor a duration estimate. */
  defaultTimeoutMs?: number;
  logger?: Logger;
  metrics?: OrchestratorMetrics;
  now?: () => Date;
  idFactory?: () => string;
};

type PlanEnvelope = {
  id?: string;
  name?: string;
  description?: string;
  nodes: unknown[];
};

type Candidate = {
  id: string;
  node: ProposedNode;
  dependencies: string[];
  prunedDependencies: string[];
};

export class PlanBuilder {
  private readonly registry: ActionRegistry;
  private readonly cycleDetection: CycleDetection;
  private readonly defaultMaxRetries: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly metrics: OrchestratorMetrics | null;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: PlanBuilderOptions) {
    this.registry = options.registry;
    this.cycleDetection = options.cycleDetection ?? 'full';
    this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 300_000;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? null;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Validates an externally proposed plan and repairs what it can: malformed,
   * duplicate and unknown-action nodes are dropped, edges to them are pruned,
   * and a cyclic plan is linearised. Never throws for a bad proposal; the
   * repairs are listed in `warnings`.
   */
  build(proposal: unknown): WorkflowDag {
    const issues: PlanIssue[] = [];
    const parsedPlan = proposedPlanSchema.safeParse(proposal);
    const plan: PlanEnvelope = parsedPlan.success ? parsedPlan.data : { nodes: [] };
    if (!parsedPlan.success) {
      issues.push({
        kind: 'malformed_node',
        nodeId: null,
        detail: `Proposed plan is malformed: ${parsedPlan.error.issues.map((issue) => issue.message).join(', ')}`
      });
    }

    const candidates = this.collectCandidates(plan.nodes, issues);
    const ordered = this.orderCandidates(candidates, issues);
    const nodes = ordered.map((candidate) => this.toDagNode(candidate));

    if (nodes.length === 0) {
      issues.push({ kind: 'empty_plan', nodeId: null, detail: 'Plan has no executable nodes' });
    }

    const dag: WorkflowDag = {
      id: this.idFactory(),
      proposalId: plan.id ?? null,
      name: plan.name?.trim() || 'workflow',
      description: plan.description?.trim() ?? '',
      nodes,
      parallelGroups: collectParallelGroups(nodes),
      estimatedDurationSeconds: estimateDuration(nodes),
      createdAt: this.now().toISOString(),
      warnings: issues
    };

    if (issues.length > 0) {
      this.logger.warn(
        { planId: dag.id, issues: issues.map((issue) => issue.detail) },
        'proposed plan repaired during validation'
      );
    }
    this.metrics?.plansBuilt.inc({ repaired: issues.length > 0 ? 'true' : 'false' });
    return deepFreeze(dag);
  }

  /** The validation error describing the repairs applied to `dag`, if any. */
  static validationError(dag: WorkflowDag): PlanValidationError | null {
    return dag.warnings.length > 0 ? new PlanValidationError([...dag.warnings]) : null;
  }

  /** True when the proposal validates without any repair. */
  validatesCleanly(proposal: unknown): boolean {
    return this.build(proposal).warnings.length === 0;
  }

  private collectCandidates(rawNodes: unknown[], issues: PlanIssue[]): Candidate[] {
    const accepted = new Map<string, Candidate>();
    const dropped = new Set<string>();

    rawNodes.forEach((raw, index) => {
      const parsed = proposedNodeSchema.safeParse(raw);
      if (!parsed.success) {
        issues.push({
          kind: 'malformed_node',
          nodeId: null,
          detail: `Node at position ${index} is malformed: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`
        });
        return;
      }
      const node = parsed.data;
      const id = node.id ?? `step_${index + 1}`;
      if (accepted.has(id) || dropped.has(id)) {
        issues.push({ kind: 'duplicate_id', nodeId: id, detail: `Duplicate node id ${id} dropped` });
        return;
      }
      if (!this.registry.has(node.action)) {
        dropped.add(id);
        issues.push({ kind: 'unknown_action', nodeId: id, detail: `Node ${id} uses unknown action ${node.action}` });
        return;
      }
      accepted.set(id, {
        id,
        node,
        dependencies: Array.from(new Set(node.dependencies ?? [])),
        prunedDependencies: []
      });
    });

    for (const candidate of accepted.values()) {
      const kept: string[] = [];
      for (const dependencyId of candidate.dependencies) {
        if (accepted.has(dependencyId)) {
          kept.push(dependencyId);
          continue;
        }
        candidate.prunedDependencies.push(dependencyId);
        issues.push({
          kind: 'dangling_dependency',
          nodeId: candidate.id,
          detail: dropped.has(dependencyId)
            ? `Node ${candidate.id} depended on dropped node ${dependencyId}`
            : `Node ${candidate.id} depended on unknown node ${dependencyId}`
        });
      }
      candidate.dependencies = kept;
    }

    return Array.from(accepted.values());
  }

  private orderCandidates(candidates: Candidate[], issues: PlanIssue[]): Candidate[] {
    const cycle = this.cycleDetection === 'self' ? findSelfDependency(candidates) : detectCycle(candidates);
    if (cycle) {
      issues.push({
        kind: 'cycle',
        nodeId: cycle[0] ?? null,
        detail: `Plan contains a cycle (${cycle.join(' -> ')}); executing nodes sequentially`
      });
      return linearize(candidates);
    }

    const order = stableTopologicalOrder(candidates);
    if (!order) {
      // Only reachable with self-loop detection: the remaining cycle keeps its
      // edges and its nodes are skipped at run time.
      issues.push({
        kind: 'cycle',
        nodeId: null,
        detail: 'Plan dependencies cannot be ordered; nodes on the cycle will be skipped'
      });
      return candidates;
    }

    const byId = new Map(candidates.map((candidate) => [candidate.id, candidate]));
    return order.flatMap((id) => {
      const candidate = byId.get(id);
      return candidate ? [candidate] : [];
    });
  }

  private toDagNode(candidate: Candidate): DagNode {
    const { node } = candidate;
    const estimate = node.estimatedDurationSeconds ?? DEFAULT_ESTIMATE_SECONDS;
    let timeoutMs = this.defaultTimeoutMs;
    if (node.timeoutSeconds !== undefined) {
      timeoutMs = Math.round(node.timeoutSeconds * 1_000);
    } else if (node.estimatedDurationSeconds !== undefined) {
      timeoutMs = Math.round((node.estimatedDurationSeconds + TIMEOUT_HEADROOM_SECONDS) * 1_000);
    }
    const params: JsonObject = node.params ?? {};
    return {
      id: candidate.id,
      action: node.action,
      params,
      dependencies: candidate.dependencies,
      parallelGroup: node.parallelGroup ?? null,
      timeoutMs,
      maxRetries: node.maxRetries ?? this.defaultMaxRetries,
      priority: node.priority ?? DEFAULT_PRIORITY,
      estimatedDurationSeconds: estimate,
      prunedDependencies: candidate.prunedDependencies
    };
  }
}

/** One chain in proposal order: every node depends only on its predecessor and parallel groups are cleared. */
function linearize(candidates: Candidate[]): Candidate[] {
  return candidates.map((candidate, index) => ({
    ...candidate,
    node: { ...candidate.node, parallelGroup: null },
    dependencies: index === 0 ? [] : [candidates[index - 1].id]
  }));
}

function collectParallelGroups(nodes: readonly DagNode[]): Record<string, string[]> {
  const groups: Record<string, string[]> = {};
  for (const node of nodes) {
    if (node.parallelGroup) {
      const members = groups[node.parallelGroup] ?? [];
      members.push(node.id);
      groups[node.parallelGroup] = members;
    }
  }
  return groups;
}

/** Ungrouped nodes add up; a parallel group costs its slowest member. */
export function estimateDuration(nodes: readonly DagNode[]): number {
  let total = 0;
  const groupMax = new Map<string, number>();
  for (const node of nodes) {
    if (!node.parallelGroup) {
      total += node.estimatedDurationSeconds;
      continue;
    }
    groupMax.set(node.parallelGroup, Math.max(groupMax.get(node.parallelGroup) ?? 0, node.estimatedDurationSeconds));
  }
  for (const value of groupMax.values()) {
    total += value;
  }
  return total;
}

export function singleNodeProposal(action: string, params: JsonObject, name = action): ProposedPlan {
  return {
    name,
    description: `Single call to ${action}`,
    nodes: [{ id: 'step_1', action, params }]
  };
}
