import type { z } from 'zod';
import type { JsonObject, JsonValue, Logger } from '@switchyard/shared';

/** Opaque authenticated client handed through to capabilities untouched. */
export type ActionCaller = {
  id: string;
  userId?: string;
  credentials?: unknown;
};

export type ActionContext = {
  signal: AbortSignal;
  workflowId: string | null;
  stepId: string | null;
  attempt: number;
  logger: Logger;
};

export type ActionSuccess = {
  status: 'success';
  data: JsonValue;
};

export type ActionFailure = {
  status: 'error';
  errorKind: string;
  httpCode: number;
  message: string;
  details?: JsonValue;
};

export type ActionResult = ActionSuccess | ActionFailure;

export type ActionParamsSchema = z.ZodType<JsonObject, z.ZodTypeDef, unknown>;

export interface ActionCapability {
  name: string;
  description?: string;
  paramsSchema?: ActionParamsSchema;
  /** Results of idempotent capabilities are cached for this many seconds. */
  cacheTtlSeconds?: number;
  execute(caller: ActionCaller, params: JsonObject, context: ActionContext): Promise<ActionResult>;
}

export const actionSuccess = (data: JsonValue): ActionSuccess => ({ status: 'success', data });

export const actionError = (
  errorKind: string,
  httpCode: number,
  message: string,
  details?: JsonValue
): ActionFailure => (details === undefined
  ? { status: 'error', errorKind, httpCode, message }
  : { status: 'error', errorKind, httpCode, message, details });
