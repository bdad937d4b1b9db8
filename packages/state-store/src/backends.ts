import type { Redis } from 'ioredis';

export type StateBackendKind = 'redis' | 'memory';

export interface StateBackend {
  readonly kind: StateBackendKind;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  get(key: string): Promise<string | null>;
  delete(key: string): Promise<boolean>;
  /** Keys starting with `prefix`, in no particular order. */
  keys(prefix: string): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

type MemoryEntry = {
  value: string;
  expiresAt: number | null;
};

export type MemoryStateBackendOptions = {
  now?: () => number;
};

export class MemoryStateBackend implements StateBackend {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;

  constructor(options: MemoryStateBackendOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1_000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async get(key: string): Promise<string | null> {
    const entry = this.readLive(key);
    return entry ? entry.value : null;
  }

  async delete(key: string): Promise<boolean> {
    const live = this.readLive(key);
    this.entries.delete(key);
    return live !== null;
  }

  async keys(prefix: string): Promise<string[]> {
    const matches: string[] = [];
    for (const key of Array.from(this.entries.keys())) {
      if (key.startsWith(prefix) && this.readLive(key)) {
        matches.push(key);
      }
    }
    return matches;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private readLive(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, (match) => `\\${match}`);
}

export class RedisStateBackend implements StateBackend {
  readonly kind = 'redis' as const;

  constructor(private readonly redis: Redis, private readonly scanCount = 200) {}

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.redis.set(key, value, 'EX', Math.ceil(ttlSeconds));
      return;
    }
    await this.redis.set(key, value);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(key);
    return removed > 0;
  }

  async keys(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(prefix)}*`;
    const found = new Set<string>();
    let cursor = '0';
    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', this.scanCount);
      for (const key of batch) {
        found.add(key);
      }
      cursor = next;
    } while (cursor !== '0');
    return Array.from(found);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    this.redis.removeAllListeners();
    try {
      await this.redis.quit();
    } catch {
      this.redis.disconnect();
    }
  }
}
