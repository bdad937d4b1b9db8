import type { JsonObject } from '@switchyard/shared';
import type { PlanIssue } from '../errors';

export type DagNode = Readonly<{
  id: string;
  action: string;
  params: JsonObject;
  dependencies: readonly string[];
  parallelGroup: string | null;
  timeoutMs: number;
  maxRetries: number;
  /** 1 is the highest priority, 5 the lowest. */
  priority: number;
  estimatedDurationSeconds: number;
  /** Dependencies removed because their node did not survive validation. */
  prunedDependencies: readonly string[];
}>;

export type WorkflowDag = Readonly<{
  id: string;
  /** Id the proposal carried, if any; never used as the run id. */
  proposalId: string | null;
  name: string;
  description: string;
  nodes: readonly DagNode[];
  parallelGroups: Readonly<Record<string, readonly string[]>>;
  estimatedDurationSeconds: number;
  createdAt: string;
  warnings: readonly PlanIssue[];
}>;

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}
