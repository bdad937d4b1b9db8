import { z } from 'zod';
import { jsonObjectSchema, jsonValueSchema, type JsonObject } from '@switchyard/shared';
import type { ExecutionMode } from '../config';

export const workflowStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']);
export type WorkflowStatus = z.infer<typeof workflowStatusSchema>;

export const stepStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'skipped', 'retry']);
export type StepStatus = z.infer<typeof stepStatusSchema>;

export const stepStateSchema = z.object({
  stepId: z.string(),
  action: z.string(),
  status: stepStatusSchema,
  attempts: z.number().int(),
  retryCount: z.number().int(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  durationMs: z.number().nullable(),
  cached: z.boolean(),
  errorKind: z.string().nullable(),
  errorMessage: z.string().nullable(),
  skipReason: z.string().nullable()
});
export type StepState = z.infer<typeof stepStateSchema>;

export const errorLogEntrySchema = z.object({
  stepId: z.string().nullable(),
  kind: z.string(),
  message: z.string(),
  attempt: z.number().int(),
  timestamp: z.string()
});
export type ErrorLogEntry = z.infer<typeof errorLogEntrySchema>;

export const workflowExecutionStateSchema = z.object({
  workflowId: z.string(),
  workflowName: z.string(),
  status: workflowStatusSchema,
  mode: z.enum(['plan', 'execute']),
  originalRequest: z.string().nullable(),
  callerId: z.string().nullable(),
  steps: z.array(stepStateSchema),
  context: jsonObjectSchema,
  stepResults: jsonObjectSchema,
  errors: z.array(errorLogEntrySchema),
  totalSteps: z.number().int(),
  completedSteps: z.number().int(),
  failedSteps: z.number().int(),
  skippedSteps: z.number().int(),
  startedAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  cancelledAt: z.string().nullable(),
  failureReason: z.string().nullable(),
  plan: jsonValueSchema
});
export type WorkflowExecutionState = z.infer<typeof workflowExecutionStateSchema>;

export const TERMINAL_STATUSES: readonly WorkflowStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminal(status: WorkflowStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function recount(state: WorkflowExecutionState): void {
  state.completedSteps = state.steps.filter((step) => step.status === 'completed').length;
  state.failedSteps = state.steps.filter((step) => step.status === 'failed').length;
  state.skippedSteps = state.steps.filter((step) => step.status === 'skipped').length;
}

/** Persistable snapshot; a deep copy so later mutation of the live state never leaks into it. */
export function snapshotState(state: WorkflowExecutionState): WorkflowExecutionState {
  return structuredClone(state);
}

export function toStoredState(state: WorkflowExecutionState): JsonObject {
  return snapshotState(state);
}

export function parseStoredState(value: JsonObject | null): WorkflowExecutionState | null {
  if (!value) {
    return null;
  }
  const parsed = workflowExecutionStateSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export type WorkflowMode = ExecutionMode;
