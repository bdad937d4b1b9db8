import { Counter, Histogram, Registry } from 'prom-client';

export interface OrchestratorMetrics {
  register: Registry;
  workflowRuns: Counter<'status'>;
  stepAttempts: Counter<'action' | 'outcome'>;
  stepDuration: Histogram<'action'>;
  cacheLookups: Counter<'result'>;
  plansBuilt: Counter<'repaired'>;
  auditRecords: Counter<'outcome'>;
  offloads: Counter<'result'>;
  learningFeedback: Counter<'kind'>;
}

export const createMetrics = (register: Registry = new Registry()): OrchestratorMetrics => {
  const workflowRuns = new Counter({
    name: 'switchyard_workflow_runs_total',
    help: 'Workflow runs that reached a terminal status',
    registers: [register],
    labelNames: ['status'] as const
  });

  const stepAttempts = new Counter({
    name: 'switchyard_step_attempts_total',
    help: 'Step attempts by action and outcome',
    registers: [register],
    labelNames: ['action', 'outcome'] as const
  });

  const stepDuration = new Histogram({
    name: 'switchyard_step_duration_seconds',
    help: 'Duration of individual step attempts',
    registers: [register],
    labelNames: ['action'] as const,
    buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60, 300]
  });

  const cacheLookups = new Counter({
    name: 'switchyard_action_cache_lookups_total',
    help: 'Action result cache lookups',
    registers: [register],
    labelNames: ['result'] as const
  });

  const plansBuilt = new Counter({
    name: 'switchyard_plans_built_total',
    help: 'Plans validated by the plan builder',
    registers: [register],
    labelNames: ['repaired'] as const
  });

  const auditRecords = new Counter({
    name: 'switchyard_audit_records_total',
    help: 'Audit records written at the boundary',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const offloads = new Counter({
    name: 'switchyard_response_offloads_total',
    help: 'Oversized responses moved to blob storage',
    registers: [register],
    labelNames: ['result'] as const
  });

  const learningFeedback = new Counter({
    name: 'switchyard_learning_feedback_total',
    help: 'Feedback records accepted by the learning subsystem',
    registers: [register],
    labelNames: ['kind'] as const
  });

  return {
    register,
    workflowRuns,
    stepAttempts,
    stepDuration,
    cacheLookups,
    plansBuilt,
    auditRecords,
    offloads,
    learningFeedback
  };
};
