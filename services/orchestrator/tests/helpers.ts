import { EventBus, LIFECYCLE_EVENT_NAMES, type BusEvent } from '@switchyard/event-bus';
import type { JsonObject } from '@switchyard/shared';
import { StateStore } from '@switchyard/state-store';
import { ActionRegistry } from '../src/actions/registry';
import {
  actionError,
  actionSuccess,
  type ActionCapability,
  type ActionContext,
  type ActionResult
} from '../src/actions/types';

export const testCaller = { id: 'caller-1', userId: 'user-1' };

export type Invocation = { params: JsonObject; context: ActionContext };

export type RecordingCapability = ActionCapability & { calls: Invocation[] };

export function recordingCapability(
  name: string,
  handler: (params: JsonObject, attempt: number) => ActionResult | Promise<ActionResult> = () => actionSuccess({ ok: true }),
  extra: Partial<Omit<ActionCapability, 'name' | 'execute'>> = {}
): RecordingCapability {
  const calls: Invocation[] = [];
  return {
    name,
    ...extra,
    calls,
    async execute(_caller, params, context) {
      calls.push({ params, context });
      return handler(params, context.attempt);
    }
  };
}

export function failingCapability(name: string): RecordingCapability {
  return recordingCapability(name, () => actionError('upstream_error', 502, 'upstream unavailable'));
}

export function registryOf(...capabilities: ActionCapability[]): ActionRegistry {
  return new ActionRegistry(capabilities);
}

export function memoryStore(now?: () => number): StateStore {
  return new StateStore({ mode: 'memory', now });
}

/** Inline bus that keeps every lifecycle event; call `drain()` before asserting. */
export async function recordingBus(): Promise<{ bus: EventBus; events: BusEvent[]; names: () => string[] }> {
  const bus = new EventBus({ mode: 'inline' });
  const events: BusEvent[] = [];
  for (const name of LIFECYCLE_EVENT_NAMES) {
    await bus.subscribe(name, (event) => {
      events.push(event);
    });
  }
  return { bus, events, names: () => events.map((event) => event.name) };
}

export const noSleep = async (): Promise<void> => undefined;

export function fixedClock(start = '2024-05-01T00:00:00.000Z'): { now: () => Date; advance: (ms: number) => void } {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    }
  };
}
