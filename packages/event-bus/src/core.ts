import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { jsonValueSchema, type JsonValue } from '@switchyard/shared';

export const EVENT_NAMES = {
  workflowStarted: 'workflow.started',
  workflowStepCompleted: 'workflow.step_completed',
  workflowCompleted: 'workflow.completed',
  workflowFailed: 'workflow.failed',
  workflowCancelled: 'workflow.cancelled',
  actionStarted: 'action.started',
  actionCompleted: 'action.completed',
  actionFailed: 'action.failed',
  learningFeedbackRecorded: 'learning.feedback_recorded',
  auditRecorded: 'audit.recorded',
  responseOffloaded: 'response.offloaded'
} as const;

export type LifecycleEventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

export const LIFECYCLE_EVENT_NAMES: readonly LifecycleEventName[] = Object.values(EVENT_NAMES);

const isoTimestamp = z
  .string()
  .min(1, 'timestamp is required')
  .refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'timestamp must be an ISO-8601 timestamp'
  });

export const busEventSchema = z
  .object({
    id: z.string().uuid(),
    name: z.string().min(1, 'name is required'),
    source: z.string().min(1, 'source is required'),
    timestamp: isoTimestamp,
    payload: jsonValueSchema,
    correlationId: z.string().min(1).optional(),
    userId: z.string().min(1).optional(),
    sessionId: z.string().min(1).optional()
  })
  .strict();

export type BusEvent = z.infer<typeof busEventSchema>;

export type BusEventInput = Omit<BusEvent, 'id' | 'timestamp' | 'payload'> & {
  id?: string;
  timestamp?: string | Date;
  payload?: JsonValue;
};

export type EventIds = Pick<BusEvent, 'correlationId' | 'userId' | 'sessionId'>;

export class EventValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventValidationError';
  }
}

export function normalizeEvent(input: BusEventInput): BusEvent {
  const timestamp = input.timestamp instanceof Date
    ? input.timestamp.toISOString()
    : input.timestamp ?? new Date().toISOString();

  const candidate: Record<string, unknown> = {
    ...input,
    id: input.id ?? randomUUID(),
    timestamp,
    payload: input.payload ?? {}
  };
  // Blank ids mean "not known" and are dropped rather than rejected.
  for (const key of ['correlationId', 'userId', 'sessionId'] as const) {
    const value = candidate[key];
    if (value === undefined || (typeof value === 'string' && value.trim().length === 0)) {
      delete candidate[key];
    }
  }

  const result = busEventSchema.safeParse(candidate);
  if (!result.success) {
    throw new EventValidationError(result.error.errors.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/** Decodes a pub/sub message body; anything that is not a valid event yields null. */
export function parseEventMessage(raw: string): BusEvent | null {
  try {
    const result = busEventSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
