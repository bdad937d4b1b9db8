import type { JsonObject } from '@switchyard/shared';
import type { ActionDescriptor } from '../actions/registry';
import type { ProposedPlan } from './schema';

export type ProposalContext = {
  actions: ActionDescriptor[];
  conversation: JsonObject | null;
  userId: string | null;
};

/**
 * Translates a free-text request into a proposed plan. The output is
 * untrusted and always passes through the plan builder.
 */
export interface PlanProposer {
  propose(request: string, context: ProposalContext): Promise<unknown>;
}

export function fallbackProposal(request: string, fallbackAction: string): ProposedPlan {
  return {
    name: 'fallback',
    description: 'Planner unavailable; request routed to the fallback action',
    nodes: [{ id: 'fallback', action: fallbackAction, params: { prompt: request } }]
  };
}
