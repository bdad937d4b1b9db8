import type { JsonObject, Logger } from '@switchyard/shared';
import type { ActionCaller, ActionCapability, ActionResult } from '../actions/types';
import { StepTimeoutError } from '../errors';

export type StepInvocation = {
  capability: ActionCapability;
  caller: ActionCaller;
  params: JsonObject;
  workflowId: string | null;
  stepId: string;
  attempt: number;
  timeoutMs: number;
  logger: Logger;
};

export function createStepAbortSignal(timeoutMs: number): { signal: AbortSignal; cancel: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), Math.max(1, timeoutMs));
  return {
    signal: controller.signal,
    cancel: () => clearTimeout(timer)
  };
}

/**
 * Runs one attempt of a capability. The capability sees an AbortSignal that
 * fires at the deadline; the attempt itself settles with a StepTimeoutError
 * at that moment whether or not the capability honours the signal.
 */
export async function invokeWithTimeout(invocation: StepInvocation): Promise<ActionResult> {
  const { capability, timeoutMs, stepId } = invocation;
  const { signal, cancel } = createStepAbortSignal(timeoutMs);

  const deadline = new Promise<never>((_, reject) => {
    const onAbort = () => reject(new StepTimeoutError(stepId, capability.name, timeoutMs));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
  // The deadline may reject after the attempt has already settled.
  deadline.catch(() => undefined);

  try {
    return await Promise.race([
      capability.execute(invocation.caller, invocation.params, {
        signal,
        workflowId: invocation.workflowId,
        stepId,
        attempt: invocation.attempt,
        logger: invocation.logger
      }),
      deadline
    ]);
  } finally {
    cancel();
  }
}
