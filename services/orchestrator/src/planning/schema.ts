import { z } from 'zod';
import { jsonObjectSchema } from '@switchyard/shared';

export const proposedNodeSchema = z.object({
  id: z.string().trim().min(1).optional(),
  action: z.string().trim().min(1, 'action is required'),
  params: jsonObjectSchema.optional(),
  dependencies: z.array(z.string()).optional(),
  parallelGroup: z.string().trim().min(1).nullable().optional(),
  estimatedDurationSeconds: z.number().positive().optional(),
  timeoutSeconds: z.number().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  priority: z.number().int().min(1).max(5).optional()
});

export type ProposedNode = z.infer<typeof proposedNodeSchema>;

export const proposedPlanSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  nodes: z.array(z.unknown())
});

export type ProposedPlan = {
  id?: string;
  name?: string;
  description?: string;
  nodes: ProposedNode[];
};
