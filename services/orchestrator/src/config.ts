import path from 'node:path';
import { z } from 'zod';
import {
  booleanVar,
  integerVar,
  loadEnvConfig,
  numberVar,
  stringListVar,
  stringVar,
  type BackoffOptions,
  type EnvSource
} from '@switchyard/shared';

export type ExecutionMode = 'plan' | 'execute';
export type CycleDetection = 'self' | 'full';

export const DEFAULT_REDACT_KEYS = ['payload', 'body', 'content', 'attachments', 'file_content', 'data'];

export type BlobStoreConfig =
  | {
      kind: 'local';
      rootDir: string;
      publicBaseUrl: string | null;
    }
  | {
      kind: 's3';
      bucket: string;
      prefix: string;
      region: string;
      endpoint: string | null;
      forcePathStyle: boolean;
      presignTtlSeconds: number;
    };

export interface OrchestratorConfig {
  logLevel: string;
  redisUrl: string | null;
  stateStoreMode: 'redis' | 'memory';
  eventBusMode: 'redis' | 'inline';
  eventSource: string;
  defaultMode: ExecutionMode;
  steps: {
    defaultTimeoutMs: number;
    defaultMaxRetries: number;
  };
  retryBackoff: Required<Omit<BackoffOptions, 'random'>>;
  planner: {
    cycleDetection: CycleDetection;
    fallbackAction: string | null;
  };
  learning: {
    enabled: boolean;
    minSimilarity: number;
    retentionDays: number;
    maxSuggestions: number;
  };
  audit: {
    retentionDays: number;
    offloadThresholdBytes: number;
    redactKeys: string[];
  };
  blobStore: BlobStoreConfig;
}

const DEFAULTS = {
  logLevel: 'info',
  eventSource: 'switchyard.orchestrator',
  stepTimeoutMs: 300_000,
  stepMaxRetries: 3,
  retryBaseMs: 1_000,
  retryFactor: 2,
  retryMaxMs: 60_000,
  retryJitterRatio: 0.2,
  minSimilarity: 0.3,
  learningRetentionDays: 90,
  maxSuggestions: 5,
  auditRetentionDays: 30,
  offloadThresholdBytes: 10 * 1024 * 1024,
  blobDir: 'data/offloads',
  blobPrefix: 'offloads',
  presignTtlSeconds: 7 * 24 * 3600
} as const;

const orchestratorEnvSchema = z
  .object({
    SWITCHYARD_LOG_LEVEL: stringVar({ defaultValue: DEFAULTS.logLevel, lowercase: true }),
    REDIS_URL: stringVar(),
    SWITCHYARD_STATE_MODE: stringVar({ lowercase: true, allowed: ['redis', 'memory'] }),
    SWITCHYARD_EVENTS_MODE: stringVar({ lowercase: true, allowed: ['redis', 'inline'] }),
    SWITCHYARD_EVENT_SOURCE: stringVar({ defaultValue: DEFAULTS.eventSource }),
    SWITCHYARD_DEFAULT_MODE: stringVar({ defaultValue: 'execute', lowercase: true, allowed: ['plan', 'execute'] }),
    SWITCHYARD_STEP_TIMEOUT_MS: integerVar({ defaultValue: DEFAULTS.stepTimeoutMs, min: 1 }),
    SWITCHYARD_STEP_MAX_RETRIES: integerVar({ defaultValue: DEFAULTS.stepMaxRetries, min: 0, max: 20 }),
    SWITCHYARD_RETRY_BASE_MS: integerVar({ defaultValue: DEFAULTS.retryBaseMs, min: 0 }),
    SWITCHYARD_RETRY_FACTOR: numberVar({ defaultValue: DEFAULTS.retryFactor, min: 1 }),
    SWITCHYARD_RETRY_MAX_MS: integerVar({ defaultValue: DEFAULTS.retryMaxMs, min: 0 }),
    SWITCHYARD_RETRY_JITTER_RATIO: numberVar({ defaultValue: DEFAULTS.retryJitterRatio, min: 0, max: 1 }),
    SWITCHYARD_CYCLE_DETECTION: stringVar({ defaultValue: 'full', lowercase: true, allowed: ['self', 'full'] }),
    SWITCHYARD_FALLBACK_ACTION: stringVar(),
    SWITCHYARD_LEARNING_ENABLED: booleanVar({ defaultValue: true }),
    SWITCHYARD_LEARNING_MIN_SIMILARITY: numberVar({ defaultValue: DEFAULTS.minSimilarity, min: 0, max: 1 }),
    SWITCHYARD_LEARNING_RETENTION_DAYS: integerVar({ defaultValue: DEFAULTS.learningRetentionDays, min: 1 }),
    SWITCHYARD_LEARNING_MAX_SUGGESTIONS: integerVar({ defaultValue: DEFAULTS.maxSuggestions, min: 1 }),
    SWITCHYARD_AUDIT_RETENTION_DAYS: integerVar({ defaultValue: DEFAULTS.auditRetentionDays, min: 1 }),
    SWITCHYARD_OFFLOAD_THRESHOLD_BYTES: integerVar({ defaultValue: DEFAULTS.offloadThresholdBytes, min: 1 }),
    SWITCHYARD_REDACT_KEYS: stringListVar({ defaultValue: DEFAULT_REDACT_KEYS, lowercase: true }),
    SWITCHYARD_BLOB_STORE: stringVar({ defaultValue: 'local', lowercase: true, allowed: ['local', 's3'] }),
    SWITCHYARD_BLOB_DIR: stringVar({ defaultValue: DEFAULTS.blobDir }),
    SWITCHYARD_BLOB_PUBLIC_URL: stringVar(),
    SWITCHYARD_BLOB_BUCKET: stringVar(),
    SWITCHYARD_BLOB_PREFIX: stringVar({ defaultValue: DEFAULTS.blobPrefix }),
    SWITCHYARD_BLOB_REGION: stringVar(),
    AWS_REGION: stringVar(),
    SWITCHYARD_BLOB_ENDPOINT: stringVar(),
    SWITCHYARD_BLOB_FORCE_PATH_STYLE: booleanVar({ defaultValue: false }),
    SWITCHYARD_BLOB_PRESIGN_TTL_SECONDS: integerVar({ defaultValue: DEFAULTS.presignTtlSeconds, min: 0, max: DEFAULTS.presignTtlSeconds })
  })
  .passthrough()
  .superRefine((env, ctx) => {
    if (env.SWITCHYARD_BLOB_STORE === 's3' && !env.SWITCHYARD_BLOB_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SWITCHYARD_BLOB_BUCKET'],
        message: 'SWITCHYARD_BLOB_BUCKET must be configured for the s3 blob store'
      });
    }
    if (env.SWITCHYARD_STATE_MODE === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when SWITCHYARD_STATE_MODE is redis'
      });
    }
  })
  .transform((env): OrchestratorConfig => {
    const redisUrl = env.REDIS_URL && env.REDIS_URL !== 'inline' ? env.REDIS_URL : null;
    const blobStore: BlobStoreConfig =
      env.SWITCHYARD_BLOB_STORE === 's3'
        ? {
            kind: 's3',
            bucket: env.SWITCHYARD_BLOB_BUCKET ?? '',
            prefix: (env.SWITCHYARD_BLOB_PREFIX ?? DEFAULTS.blobPrefix).replace(/^\/+/, '').replace(/\/+$/, ''),
            region: env.SWITCHYARD_BLOB_REGION ?? env.AWS_REGION ?? 'us-east-1',
            endpoint: env.SWITCHYARD_BLOB_ENDPOINT ?? null,
            forcePathStyle: Boolean(env.SWITCHYARD_BLOB_FORCE_PATH_STYLE) || Boolean(env.SWITCHYARD_BLOB_ENDPOINT),
            presignTtlSeconds: env.SWITCHYARD_BLOB_PRESIGN_TTL_SECONDS ?? DEFAULTS.presignTtlSeconds
          }
        : {
            kind: 'local',
            rootDir: path.resolve(process.cwd(), env.SWITCHYARD_BLOB_DIR ?? DEFAULTS.blobDir),
            publicBaseUrl: env.SWITCHYARD_BLOB_PUBLIC_URL ?? null
          };

    return {
      logLevel: env.SWITCHYARD_LOG_LEVEL ?? DEFAULTS.logLevel,
      redisUrl,
      stateStoreMode: env.SWITCHYARD_STATE_MODE === 'redis' || (!env.SWITCHYARD_STATE_MODE && redisUrl) ? 'redis' : 'memory',
      eventBusMode: env.SWITCHYARD_EVENTS_MODE === 'redis' || (!env.SWITCHYARD_EVENTS_MODE && redisUrl) ? 'redis' : 'inline',
      eventSource: env.SWITCHYARD_EVENT_SOURCE ?? DEFAULTS.eventSource,
      defaultMode: env.SWITCHYARD_DEFAULT_MODE === 'plan' ? 'plan' : 'execute',
      steps: {
        defaultTimeoutMs: env.SWITCHYARD_STEP_TIMEOUT_MS ?? DEFAULTS.stepTimeoutMs,
        defaultMaxRetries: env.SWITCHYARD_STEP_MAX_RETRIES ?? DEFAULTS.stepMaxRetries
      },
      retryBackoff: {
        baseMs: env.SWITCHYARD_RETRY_BASE_MS ?? DEFAULTS.retryBaseMs,
        factor: env.SWITCHYARD_RETRY_FACTOR ?? DEFAULTS.retryFactor,
        maxMs: env.SWITCHYARD_RETRY_MAX_MS ?? DEFAULTS.retryMaxMs,
        jitterRatio: env.SWITCHYARD_RETRY_JITTER_RATIO ?? DEFAULTS.retryJitterRatio
      },
      planner: {
        cycleDetection: env.SWITCHYARD_CYCLE_DETECTION === 'self' ? 'self' : 'full',
        fallbackAction: env.SWITCHYARD_FALLBACK_ACTION ?? null
      },
      learning: {
        enabled: env.SWITCHYARD_LEARNING_ENABLED ?? true,
        minSimilarity: env.SWITCHYARD_LEARNING_MIN_SIMILARITY ?? DEFAULTS.minSimilarity,
        retentionDays: env.SWITCHYARD_LEARNING_RETENTION_DAYS ?? DEFAULTS.learningRetentionDays,
        maxSuggestions: env.SWITCHYARD_LEARNING_MAX_SUGGESTIONS ?? DEFAULTS.maxSuggestions
      },
      audit: {
        retentionDays: env.SWITCHYARD_AUDIT_RETENTION_DAYS ?? DEFAULTS.auditRetentionDays,
        offloadThresholdBytes: env.SWITCHYARD_OFFLOAD_THRESHOLD_BYTES ?? DEFAULTS.offloadThresholdBytes,
        redactKeys: env.SWITCHYARD_REDACT_KEYS ?? DEFAULT_REDACT_KEYS
      },
      blobStore
    };
  });

export function loadOrchestratorConfig(env?: EnvSource): OrchestratorConfig {
  return loadEnvConfig(orchestratorEnvSchema, { env, context: 'orchestrator' });
}
