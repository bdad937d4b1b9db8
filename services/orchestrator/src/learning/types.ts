import { z } from 'zod';
import { jsonObjectSchema, jsonValueSchema } from '@switchyard/shared';

export const feedbackKindSchema = z.enum([
  'success',
  'failure',
  'user_correction',
  'performance_issue',
  'improvement_suggestion'
]);
export type FeedbackKind = z.infer<typeof feedbackKindSchema>;

export const learningCategorySchema = z.enum([
  'workflow_optimization',
  'action_sequencing',
  'parameter_patterns',
  'error_prevention',
  'performance_tuning'
]);
export type LearningCategory = z.infer<typeof learningCategorySchema>;

export const DEFAULT_CATEGORY: Record<FeedbackKind, LearningCategory> = {
  success: 'workflow_optimization',
  failure: 'error_prevention',
  user_correction: 'action_sequencing',
  performance_issue: 'performance_tuning',
  improvement_suggestion: 'workflow_optimization'
};

export const feedbackRecordSchema = z.object({
  id: z.string(),
  kind: feedbackKindSchema,
  category: learningCategorySchema,
  originalRequest: z.string(),
  workflowId: z.string(),
  timestamp: z.string(),
  userId: z.string().nullable(),
  originalPlan: jsonValueSchema.nullable(),
  executionResult: jsonObjectSchema.nullable(),
  userCorrection: jsonObjectSchema.nullable(),
  performanceMetrics: jsonObjectSchema.nullable(),
  errorDetails: jsonObjectSchema.nullable(),
  improvementSuggestion: z.string().nullable(),
  confidence: z.number().min(0).max(1)
});
export type FeedbackRecord = z.infer<typeof feedbackRecordSchema>;

export type FeedbackInput = Pick<FeedbackRecord, 'kind' | 'originalRequest' | 'workflowId'> &
  Partial<Omit<FeedbackRecord, 'id' | 'kind' | 'originalRequest' | 'workflowId' | 'timestamp'>>;

export const patternKindSchema = z.enum(['success', 'correction', 'failure']);
export type PatternKind = z.infer<typeof patternKindSchema>;

export const learningPatternSchema = z.object({
  id: z.string(),
  kind: patternKindSchema,
  category: learningCategorySchema,
  triggers: z.array(z.string()),
  payload: jsonObjectSchema,
  confidence: z.number(),
  usageCount: z.number().int(),
  successRate: z.number(),
  createdAt: z.string(),
  updatedAt: z.string()
});
export type LearningPattern = z.infer<typeof learningPatternSchema>;

export type LearningSuggestion = {
  patternId: string;
  kind: PatternKind;
  category: LearningCategory;
  similarity: number;
  confidence: number;
  successRate: number;
  usageCount: number;
  suggestion: string;
};

export type LearningMetrics = {
  enabled: boolean;
  totalPatterns: number;
  patternsByCategory: Partial<Record<LearningCategory, number>>;
  averageConfidence: number;
  averageSuccessRate: number;
  feedbackRecorded: number;
};

export type PlanImprovement = {
  proposal: unknown;
  appliedPatternId: string | null;
  warnings: string[];
};
