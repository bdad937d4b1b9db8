import { createHash, randomUUID } from 'node:crypto';
import { EVENT_NAMES, type EventBus } from '@switchyard/event-bus';
import { isJsonObject, silentLogger, toJsonValue, type JsonObject, type JsonValue, type Logger } from '@switchyard/shared';
import { stateKeys, type StateStore } from '@switchyard/state-store';
import type { OrchestratorMetrics } from '../metrics';
import type { WorkflowFeedback, WorkflowFeedbackSink } from '../workflow/orchestrator';
import { extractKeywords, jaccardSimilarity } from './keywords';
import {
  DEFAULT_CATEGORY,
  feedbackRecordSchema,
  learningPatternSchema,
  type FeedbackInput,
  type FeedbackRecord,
  type LearningCategory,
  type LearningMetrics,
  type LearningPattern,
  type LearningSuggestion,
  type PatternKind,
  type PlanImprovement
} from './types';

const DAY_SECONDS = 86_400;

const PATTERN_SEEDS: Record<PatternKind, { category: LearningCategory; confidence: number; successRate: number }> = {
  success: { category: 'workflow_optimization', confidence: 0.8, successRate: 1 },
  correction: { category: 'action_sequencing', confidence: 0.9, successRate: 1 },
  failure: { category: 'error_prevention', confidence: 0.7, successRate: 0 }
};

const SUGGESTION_TEXT: Record<PatternKind, string> = {
  success: 'Follow this successful pattern',
  correction: 'Apply user-corrected pattern',
  failure: 'Avoid this pattern; a similar request failed before'
};

/** Validation gate for corrected plans; the plan builder satisfies it. */
export interface PlanValidator {
  validatesCleanly(proposal: unknown): boolean;
}

export type LearningEngineOptions = {
  stateStore: StateStore;
  eventBus?: EventBus | null;
  planValidator?: PlanValidator | null;
  logger?: Logger;
  metrics?: OrchestratorMetrics;
  eventSource?: string;
  enabled?: boolean;
  minSimilarity?: number;
  retentionDays?: number;
  maxSuggestions?: number;
  now?: () => Date;
  idFactory?: () => string;
};

type ScoredPattern = {
  pattern: LearningPattern;
  similarity: number;
};

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function patternId(kind: PatternKind, keywords: readonly string[]): string {
  const digest = createHash('sha256')
    .update(kind)
    .update('\u0000')
    .update([...keywords].sort().join(' '))
    .digest('hex');
  return `${kind}_${digest.slice(0, 16)}`;
}

function successfulActions(executionResult: JsonObject | null): string[] {
  const steps = executionResult?.steps;
  if (!Array.isArray(steps)) {
    return [];
  }
  const actions: string[] = [];
  for (const step of steps) {
    if (isJsonObject(step) && step.status === 'completed' && typeof step.action === 'string') {
      actions.push(step.action);
    }
  }
  return actions;
}

/**
 * Turns workflow outcomes and user corrections into keyword-triggered
 * patterns, and uses them to rank suggestions and repair proposed plans.
 * Analysis runs on a serial queue behind `recordFeedback`.
 */
export class LearningEngine implements WorkflowFeedbackSink {
  private readonly stateStore: StateStore;
  private readonly eventBus: EventBus | null;
  private readonly planValidator: PlanValidator | null;
  private readonly logger: Logger;
  private readonly metrics: OrchestratorMetrics | null;
  private readonly eventSource: string;
  private readonly enabled: boolean;
  private readonly minSimilarity: number;
  private readonly retentionDays: number;
  private readonly maxSuggestions: number;
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private operationQueue: Promise<void> = Promise.resolve();
  private feedbackRecorded = 0;

  constructor(options: LearningEngineOptions) {
    this.stateStore = options.stateStore;
    this.eventBus = options.eventBus ?? null;
    this.planValidator = options.planValidator ?? null;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? null;
    this.eventSource = options.eventSource ?? 'switchyard.learning';
    this.enabled = options.enabled ?? true;
    this.minSimilarity = options.minSimilarity ?? 0.3;
    this.retentionDays = options.retentionDays ?? 90;
    this.maxSuggestions = options.maxSuggestions ?? 5;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Persists the record and queues pattern analysis. Returns null while learning is disabled. */
  async recordFeedback(input: FeedbackInput): Promise<FeedbackRecord | null> {
    if (!this.enabled) {
      return null;
    }
    const record = feedbackRecordSchema.parse({
      id: this.idFactory(),
      kind: input.kind,
      category: input.category ?? DEFAULT_CATEGORY[input.kind],
      originalRequest: input.originalRequest,
      workflowId: input.workflowId,
      timestamp: this.now().toISOString(),
      userId: input.userId ?? null,
      originalPlan: input.originalPlan ?? null,
      executionResult: input.executionResult ?? null,
      userCorrection: input.userCorrection ?? null,
      performanceMetrics: input.performanceMetrics ?? null,
      errorDetails: input.errorDetails ?? null,
      improvementSuggestion: input.improvementSuggestion ?? null,
      confidence: input.confidence ?? 1
    });

    const stored = await this.stateStore.set(stateKeys.feedback(record.id), record, this.retentionSeconds());
    if (!stored) {
      this.logger.warn({ feedbackId: record.id }, 'feedback record was not persisted');
    }
    this.feedbackRecorded += 1;
    this.metrics?.learningFeedback.inc({ kind: record.kind });

    this.enqueue(() => this.analyze(record)).catch((err: unknown) => {
      this.logger.error({ err, feedbackId: record.id }, 'feedback analysis failed');
    });

    if (this.eventBus) {
      await this.eventBus.emit(
        EVENT_NAMES.learningFeedbackRecorded,
        this.eventSource,
        { feedbackId: record.id, kind: record.kind, category: record.category, workflowId: record.workflowId },
        { correlationId: record.workflowId, userId: record.userId ?? undefined }
      );
    }
    return record;
  }

  async recordSuccess(input: {
    workflowId: string;
    originalRequest: string;
    executionResult: JsonObject;
    performanceMetrics?: JsonObject;
    userId?: string | null;
  }): Promise<FeedbackRecord | null> {
    return this.recordFeedback({ kind: 'success', ...input });
  }

  async recordFailure(input: {
    workflowId: string;
    originalRequest: string;
    errorDetails: JsonObject;
    executionResult?: JsonObject;
    userId?: string | null;
  }): Promise<FeedbackRecord | null> {
    return this.recordFeedback({ kind: 'failure', ...input });
  }

  async recordCorrection(input: {
    workflowId: string;
    originalRequest: string;
    originalPlan: JsonValue;
    correctedPlan: JsonValue;
    userId?: string | null;
  }): Promise<FeedbackRecord | null> {
    return this.recordFeedback({
      kind: 'user_correction',
      workflowId: input.workflowId,
      originalRequest: input.originalRequest,
      userId: input.userId,
      originalPlan: input.originalPlan,
      userCorrection: { originalPlan: input.originalPlan, correctedPlan: input.correctedPlan },
      confidence: 0.9
    });
  }

  workflowFinished(feedback: WorkflowFeedback): void {
    const request = feedback.originalRequest?.trim();
    if (!this.enabled || !request || feedback.status === 'cancelled') {
      return;
    }
    const { state } = feedback;
    const executionResult: JsonObject = {
      status: state.status,
      completedSteps: state.completedSteps,
      failedSteps: state.failedSteps,
      skippedSteps: state.skippedSteps,
      steps: state.steps.map((step) => ({ stepId: step.stepId, action: step.action, status: step.status }))
    };
    const common = { workflowId: feedback.workflowId, originalRequest: request, userId: feedback.userId };
    const record = () => feedback.status === 'completed'
      ? this.recordSuccess({
          ...common,
          executionResult,
          performanceMetrics: { durationMs: feedback.durationMs, totalSteps: state.totalSteps }
        })
      : this.recordFailure({
          ...common,
          executionResult,
          errorDetails: {
            reason: state.failureReason,
            errors: toJsonValue(state.errors)
          }
        });
    this.enqueue(record).catch((err: unknown) => {
      this.logger.error({ err, workflowId: feedback.workflowId }, 'failed to record workflow feedback');
    });
  }

  async getSuggestions(request: string): Promise<LearningSuggestion[]> {
    if (!this.enabled) {
      return [];
    }
    const scored = await this.findSimilar(request);
    return scored.slice(0, this.maxSuggestions).map(({ pattern, similarity }) => ({
      patternId: pattern.id,
      kind: pattern.kind,
      category: pattern.category,
      similarity: round(similarity),
      confidence: pattern.confidence,
      successRate: pattern.successRate,
      usageCount: pattern.usageCount,
      suggestion: SUGGESTION_TEXT[pattern.kind]
    }));
  }

  /**
   * Swaps in the best matching user-corrected plan when it validates without
   * repairs. Any problem leaves the proposal untouched.
   */
  async improvePlan(proposal: unknown, request: string): Promise<PlanImprovement> {
    const unchanged: PlanImprovement = { proposal, appliedPatternId: null, warnings: [] };
    if (!this.enabled || !request.trim()) {
      return unchanged;
    }
    try {
      const scored = await this.findSimilar(request);
      const warnings = scored
        .filter(({ pattern }) => pattern.kind === 'failure')
        .map(({ pattern }) => `A similar request failed before (pattern ${pattern.id})`);

      for (const { pattern } of scored) {
        if (pattern.kind !== 'correction' || !this.planValidator) {
          continue;
        }
        const corrected = pattern.payload.correctedPlan;
        if (corrected === undefined || corrected === null || !this.planValidator.validatesCleanly(corrected)) {
          continue;
        }
        this.logger.info({ patternId: pattern.id }, 'applied user-corrected plan');
        return { proposal: corrected, appliedPatternId: pattern.id, warnings };
      }
      return { ...unchanged, warnings };
    } catch (err) {
      this.logger.warn({ err }, 'plan improvement failed; keeping the proposed plan');
      return unchanged;
    }
  }

  /** Deletes patterns not updated within the retention horizon. */
  async pruneExpired(): Promise<number> {
    const horizon = this.now().getTime() - this.retentionDays * DAY_SECONDS * 1_000;
    let removed = 0;
    for (const pattern of await this.loadPatterns()) {
      const updated = Date.parse(pattern.updatedAt);
      if (Number.isNaN(updated) || updated < horizon) {
        if (await this.stateStore.delete(stateKeys.pattern(pattern.id))) {
          removed += 1;
        }
      }
    }
    if (removed > 0) {
      this.logger.info({ removed }, 'pruned expired learning patterns');
    }
    return removed;
  }

  async getMetrics(): Promise<LearningMetrics> {
    const patterns = await this.loadPatterns();
    const patternsByCategory: Partial<Record<LearningCategory, number>> = {};
    let confidence = 0;
    let successRate = 0;
    for (const pattern of patterns) {
      patternsByCategory[pattern.category] = (patternsByCategory[pattern.category] ?? 0) + 1;
      confidence += pattern.confidence;
      successRate += pattern.successRate;
    }
    const count = patterns.length;
    return {
      enabled: this.enabled,
      totalPatterns: count,
      patternsByCategory,
      averageConfidence: count > 0 ? round(confidence / count) : 0,
      averageSuccessRate: count > 0 ? round(successRate / count) : 0,
      feedbackRecorded: this.feedbackRecorded
    };
  }

  /** Resolves once every queued analysis, including ones queued while waiting, has run. */
  async drain(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.operationQueue;
      await current;
    } while (current !== this.operationQueue);
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operationQueue.then(operation);
    this.operationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async analyze(record: FeedbackRecord): Promise<void> {
    const keywords = extractKeywords(record.originalRequest);
    if (keywords.length === 0) {
      return;
    }
    switch (record.kind) {
      case 'success':
        await this.upsertPattern('success', keywords, {
          keywords,
          successfulActions: successfulActions(record.executionResult),
          metrics: record.performanceMetrics
        });
        return;
      case 'user_correction': {
        const correction = record.userCorrection;
        if (!correction) {
          return;
        }
        await this.upsertPattern('correction', keywords, {
          keywords,
          originalPlan: correction.originalPlan ?? null,
          correctedPlan: correction.correctedPlan ?? null
        });
        return;
      }
      case 'failure':
        await this.upsertPattern('failure', keywords, {
          keywords,
          errorDetails: record.errorDetails
        });
        return;
      default:
        this.logger.debug({ feedbackId: record.id, kind: record.kind }, 'feedback kind produces no pattern');
    }
  }

  private async upsertPattern(kind: PatternKind, keywords: string[], payload: JsonObject): Promise<LearningPattern> {
    const id = patternId(kind, keywords);
    const key = stateKeys.pattern(id);
    const timestamp = this.now().toISOString();
    const seed = PATTERN_SEEDS[kind];
    const existing = await this.stateStore.getParsed(key, learningPatternSchema);

    const pattern: LearningPattern = existing
      ? {
          ...existing,
          payload,
          confidence: Math.min(1, round(existing.confidence + 0.1)),
          usageCount: existing.usageCount + 1,
          successRate: round((existing.successRate * existing.usageCount + seed.successRate) / (existing.usageCount + 1)),
          updatedAt: timestamp
        }
      : {
          id,
          kind,
          category: seed.category,
          triggers: keywords,
          payload,
          confidence: seed.confidence,
          usageCount: 1,
          successRate: seed.successRate,
          createdAt: timestamp,
          updatedAt: timestamp
        };

    await this.stateStore.set(key, pattern, this.retentionSeconds());
    this.logger.debug({ patternId: id, usageCount: pattern.usageCount }, 'learning pattern stored');
    return pattern;
  }

  private async findSimilar(request: string): Promise<ScoredPattern[]> {
    const keywords = extractKeywords(request);
    if (keywords.length === 0) {
      return [];
    }
    const scored: ScoredPattern[] = [];
    for (const pattern of await this.loadPatterns()) {
      const similarity = jaccardSimilarity(keywords, pattern.triggers);
      if (similarity > this.minSimilarity) {
        scored.push({ pattern, similarity });
      }
    }
    return scored.sort(
      (a, b) => b.similarity * b.pattern.successRate - a.similarity * a.pattern.successRate
        || b.similarity - a.similarity
        || a.pattern.id.localeCompare(b.pattern.id)
    );
  }

  private async loadPatterns(): Promise<LearningPattern[]> {
    const keys = await this.stateStore.keys(stateKeys.patternPrefix());
    const patterns: LearningPattern[] = [];
    for (const key of keys.sort()) {
      const pattern = await this.stateStore.getParsed(key, learningPatternSchema);
      if (pattern) {
        patterns.push(pattern);
      }
    }
    return patterns;
  }

  private retentionSeconds(): number {
    return this.retentionDays * DAY_SECONDS;
  }
}
