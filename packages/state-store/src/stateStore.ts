import { createHash } from 'node:crypto';
import IORedis, { type Redis } from 'ioredis';
import { z } from 'zod';
import {
  canonicalJson,
  describeError,
  isConnectionRefused,
  jsonObjectSchema,
  jsonValueSchema,
  silentLogger,
  withTimeout,
  type JsonObject,
  type JsonValue,
  type Logger
} from '@switchyard/shared';
import { MemoryStateBackend, RedisStateBackend, type StateBackend, type StateBackendKind } from './backends';
import { TransientBackendError, type StoreResult } from './errors';
import { STATE_TTL_SECONDS, stateKeys } from './keys';

export type StateStoreMode = 'redis' | 'memory';

export type StateStoreOptions = {
  mode?: StateStoreMode;
  redisUrl?: string | null;
  createRedis?: (url: string) => Redis;
  backend?: StateBackend;
  logger?: Logger;
  now?: () => number;
  healthTimeoutMs?: number;
};

export type StateHealth = {
  status: 'healthy' | 'degraded' | 'unhealthy';
  backend: StateBackendKind;
  latencyMs: number | null;
  error?: string;
};

export const resourceRecordSchema = z.object({
  resourceId: z.string(),
  resourceType: z.string(),
  createdAt: z.string(),
  metadata: jsonObjectSchema
});

export type ResourceRecord = z.infer<typeof resourceRecordSchema>;

const cacheEntrySchema = z.object({
  actionName: z.string(),
  fingerprint: z.string(),
  result: jsonValueSchema,
  cachedAt: z.string()
});

export function fingerprintAction(actionName: string, params: JsonValue): string {
  return createHash('sha256').update(actionName).update('\u0000').update(canonicalJson(params)).digest('hex');
}

function resolveMode(options: StateStoreOptions): StateStoreMode {
  if (options.mode) {
    return options.mode;
  }
  const url = options.redisUrl?.trim();
  if (!url || url === 'inline') {
    return 'memory';
  }
  return 'redis';
}

export class StateStore {
  private backend: StateBackend;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly healthTimeoutMs: number;
  private fallbackReason: string | null = null;

  constructor(options: StateStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 2_000;

    if (options.backend) {
      this.backend = options.backend;
      return;
    }

    const mode = resolveMode(options);
    const url = options.redisUrl?.trim();
    if (mode === 'memory' || !url) {
      this.backend = new MemoryStateBackend({ now: this.now });
      return;
    }

    const redis = options.createRedis
      ? options.createRedis(url)
      : new IORedis(url, { maxRetriesPerRequest: 1 });
    redis.on('error', (err: unknown) => {
      if (isConnectionRefused(err)) {
        this.fallBackToMemory('Redis unavailable');
        return;
      }
      this.logger.error({ err }, 'state store redis error');
    });
    this.backend = new RedisStateBackend(redis);
  }

  get backendKind(): StateBackendKind {
    return this.backend.kind;
  }

  /** Reason the store left Redis for the memory backend, if it did. */
  get degradedReason(): string | null {
    return this.fallbackReason;
  }

  async trySet(key: string, value: JsonValue, ttlSeconds?: number): Promise<StoreResult<true>> {
    return this.attempt('set', key, async () => {
      await this.backend.set(key, JSON.stringify(value), ttlSeconds);
      return true as const;
    });
  }

  async tryGet(key: string): Promise<StoreResult<JsonValue | null>> {
    return this.attempt('get', key, async () => {
      const raw = await this.backend.get(key);
      if (raw === null) {
        return null;
      }
      const parsed = jsonValueSchema.parse(JSON.parse(raw));
      return parsed;
    });
  }

  async tryDelete(key: string): Promise<StoreResult<boolean>> {
    return this.attempt('delete', key, () => this.backend.delete(key));
  }

  async tryKeys(prefix: string): Promise<StoreResult<string[]>> {
    return this.attempt('scan', prefix, () => this.backend.keys(prefix));
  }

  async set(key: string, value: JsonValue, ttlSeconds?: number): Promise<boolean> {
    const result = await this.trySet(key, value, ttlSeconds);
    return result.ok;
  }

  async get(key: string, fallback: JsonValue = null): Promise<JsonValue> {
    const result = await this.tryGet(key);
    if (!result.ok || result.value === null) {
      return fallback;
    }
    return result.value;
  }

  /** Reads a key and validates it; missing, unreadable or mismatched values yield null. */
  async getParsed<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const result = await this.tryGet(key);
    if (!result.ok || result.value === null) {
      return null;
    }
    const parsed = schema.safeParse(result.value);
    if (!parsed.success) {
      this.logger.warn({ key, issues: parsed.error.issues.length }, 'stored value failed validation');
      return null;
    }
    return parsed.data;
  }

  async delete(key: string): Promise<boolean> {
    const result = await this.tryDelete(key);
    return result.ok && result.value;
  }

  async keys(prefix: string): Promise<string[]> {
    const result = await this.tryKeys(prefix);
    return result.ok ? result.value : [];
  }

  // Workflow sessions

  async createWorkflowSession(workflowId: string, state: JsonObject): Promise<boolean> {
    return this.set(stateKeys.workflow(workflowId), state, STATE_TTL_SECONDS.workflowActive);
  }

  async updateWorkflowSession(workflowId: string, state: JsonObject): Promise<boolean> {
    return this.set(stateKeys.workflow(workflowId), state, STATE_TTL_SECONDS.workflowActive);
  }

  async completeWorkflowSession(workflowId: string, state: JsonObject): Promise<boolean> {
    return this.set(stateKeys.workflow(workflowId), state, STATE_TTL_SECONDS.workflowCompleted);
  }

  async getWorkflowSession(workflowId: string): Promise<JsonObject | null> {
    return this.getParsed(stateKeys.workflow(workflowId), jsonObjectSchema);
  }

  // Resource registry

  async storeResource(resourceType: string, resourceId: string, metadata: JsonObject = {}): Promise<boolean> {
    const record: ResourceRecord = {
      resourceId,
      resourceType,
      createdAt: this.timestamp(),
      metadata
    };
    return this.set(stateKeys.resource(resourceType, resourceId), record, STATE_TTL_SECONDS.resource);
  }

  async getResource(resourceType: string, resourceId: string): Promise<ResourceRecord | null> {
    return this.getParsed(stateKeys.resource(resourceType, resourceId), resourceRecordSchema);
  }

  async listResources(resourceType: string): Promise<ResourceRecord[]> {
    const keys = await this.keys(stateKeys.resourcePrefix(resourceType));
    const records: ResourceRecord[] = [];
    for (const key of keys.sort()) {
      const record = await this.getParsed(key, resourceRecordSchema);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  // Conversation context

  async setConversationContext(userId: string, context: JsonObject): Promise<boolean> {
    const stamped: JsonObject = { ...context, updatedAt: this.timestamp() };
    return this.set(stateKeys.conversation(userId), stamped, STATE_TTL_SECONDS.conversation);
  }

  async getConversationContext(userId: string): Promise<JsonObject | null> {
    return this.getParsed(stateKeys.conversation(userId), jsonObjectSchema);
  }

  // Action result cache

  async cacheActionResult(
    actionName: string,
    fingerprint: string,
    result: JsonValue,
    ttlSeconds: number = STATE_TTL_SECONDS.actionCache
  ): Promise<boolean> {
    const entry: z.infer<typeof cacheEntrySchema> = {
      actionName,
      fingerprint,
      result,
      cachedAt: this.timestamp()
    };
    return this.set(stateKeys.actionCache(actionName, fingerprint), entry, ttlSeconds);
  }

  /** Cached result for the fingerprint, or undefined on a miss. */
  async getCachedResult(actionName: string, fingerprint: string): Promise<JsonValue | undefined> {
    const entry = await this.getParsed(stateKeys.actionCache(actionName, fingerprint), cacheEntrySchema);
    return entry ? entry.result : undefined;
  }

  async healthCheck(): Promise<StateHealth> {
    const backend = this.backend;
    const started = this.now();
    try {
      await withTimeout(backend.ping(), this.healthTimeoutMs, 'state backend ping timed out');
      return {
        status: backend.kind === 'redis' ? 'healthy' : 'degraded',
        backend: backend.kind,
        latencyMs: Math.max(0, this.now() - started)
      };
    } catch (err) {
      return {
        status: 'unhealthy',
        backend: backend.kind,
        latencyMs: null,
        error: describeError(err)
      };
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  private async attempt<T>(operation: string, key: string, run: () => Promise<T>): Promise<StoreResult<T>> {
    try {
      return { ok: true, value: await run() };
    } catch (err) {
      if (isConnectionRefused(err)) {
        this.fallBackToMemory('Redis unavailable');
      }
      const error = new TransientBackendError(operation, key, err);
      this.logger.warn({ err: error, key, operation }, 'state store operation failed');
      return { ok: false, error };
    }
  }

  private fallBackToMemory(reason: string): void {
    if (this.backend.kind === 'memory') {
      return;
    }
    const previous = this.backend;
    this.backend = new MemoryStateBackend({ now: this.now });
    this.fallbackReason = reason;
    this.logger.warn({ reason }, 'state store falling back to in-memory backend');
    previous.close().catch((err: unknown) => {
      this.logger.debug({ err }, 'failed to close redis state backend');
    });
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
