import { SwitchyardError } from '@switchyard/shared';

export class ConfigurationError extends SwitchyardError {
  constructor(message: string) {
    super('CONFIGURATION_INVALID', message);
    this.name = 'ConfigurationError';
  }
}

export type StepFailureKind = 'action_error' | 'timeout' | 'invalid_params' | 'unknown_action' | 'exception';

export class StepExecutionError extends SwitchyardError {
  readonly stepId: string;
  readonly action: string;
  readonly kind: StepFailureKind;
  readonly httpCode: number | null;

  constructor(
    stepId: string,
    action: string,
    kind: StepFailureKind,
    message: string,
    options: { httpCode?: number | null; cause?: unknown } = {}
  ) {
    super('STEP_FAILED', message, { cause: options.cause });
    this.name = 'StepExecutionError';
    this.stepId = stepId;
    this.action = action;
    this.kind = kind;
    this.httpCode = options.httpCode ?? null;
  }
}

export class StepTimeoutError extends StepExecutionError {
  readonly timeoutMs: number;

  constructor(stepId: string, action: string, timeoutMs: number) {
    super(stepId, action, 'timeout', `Step ${stepId} (${action}) timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type PlanIssue = {
  kind: 'malformed_node' | 'duplicate_id' | 'unknown_action' | 'dangling_dependency' | 'cycle' | 'empty_plan';
  nodeId: string | null;
  detail: string;
};

/** Carries the repairs applied while validating a proposed plan; reported, never thrown by the builder. */
export class PlanValidationError extends SwitchyardError {
  readonly issues: PlanIssue[];

  constructor(issues: PlanIssue[]) {
    super('PLAN_INVALID', issues.map((issue) => issue.detail).join('; ') || 'plan is invalid');
    this.name = 'PlanValidationError';
    this.issues = issues;
  }
}

export class WorkflowExhaustedError extends SwitchyardError {
  readonly workflowId: string;
  readonly stepId: string;
  readonly attempts: number;

  constructor(workflowId: string, stepId: string, attempts: number, lastError: StepExecutionError) {
    super(
      'WORKFLOW_EXHAUSTED',
      `Step ${stepId} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      { cause: lastError }
    );
    this.name = 'WorkflowExhaustedError';
    this.workflowId = workflowId;
    this.stepId = stepId;
    this.attempts = attempts;
  }
}
