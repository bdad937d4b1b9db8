import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { StateStore, TransientBackendError, fingerprintAction, type StateBackend } from '../src';

class FailingBackend implements StateBackend {
  readonly kind = 'redis' as const;
  closed = false;

  constructor(private readonly code: string) {}

  private failure(): Error {
    return Object.assign(new Error(`connect ${this.code} 127.0.0.1:6379`), { code: this.code });
  }

  async set(): Promise<void> {
    throw this.failure();
  }

  async get(): Promise<string | null> {
    throw this.failure();
  }

  async delete(): Promise<boolean> {
    throw this.failure();
  }

  async keys(): Promise<string[]> {
    throw this.failure();
  }

  async ping(): Promise<void> {
    throw this.failure();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('StateStore (memory)', () => {
  it('returns the value before the ttl and the default after it', async () => {
    let now = Date.parse('2024-05-01T00:00:00.000Z');
    const store = new StateStore({ mode: 'memory', now: () => now });

    assert.equal(await store.set('k', { v: 1 }, 1), true);
    assert.deepEqual(await store.get('k'), { v: 1 });

    now += 1_500;
    assert.equal(await store.get('k', 'fallback'), 'fallback');
  });

  it('caches action results per fingerprint', async () => {
    const store = new StateStore({ mode: 'memory' });
    await store.cacheActionResult('act', 'h1', { v: 1 });

    assert.deepEqual(await store.getCachedResult('act', 'h1'), { v: 1 });
    assert.equal(await store.getCachedResult('act', 'h2'), undefined);
    assert.equal(await store.getCachedResult('other', 'h1'), undefined);
  });

  it('keeps resources and conversation context under their namespaces', async () => {
    const now = Date.parse('2024-05-01T12:00:00.000Z');
    const store = new StateStore({ mode: 'memory', now: () => now });

    await store.storeResource('file', 'b', { name: 'b.txt' });
    await store.storeResource('file', 'a');
    await store.storeResource('contact', 'c');
    await store.setConversationContext('user-1', { topic: 'reports' });

    const files = await store.listResources('file');
    assert.deepEqual(
      files.map((record) => record.resourceId),
      ['a', 'b']
    );
    assert.deepEqual(await store.getResource('file', 'b'), {
      resourceId: 'b',
      resourceType: 'file',
      createdAt: '2024-05-01T12:00:00.000Z',
      metadata: { name: 'b.txt' }
    });
    assert.deepEqual(await store.getConversationContext('user-1'), {
      topic: 'reports',
      updatedAt: '2024-05-01T12:00:00.000Z'
    });
    assert.deepEqual(await store.get('context:user-1'), {
      topic: 'reports',
      updatedAt: '2024-05-01T12:00:00.000Z'
    });
  });

  it('reports memory mode as degraded', async () => {
    const store = new StateStore({ redisUrl: 'inline' });
    const health = await store.healthCheck();
    assert.equal(health.status, 'degraded');
    assert.equal(health.backend, 'memory');
  });
});

describe('StateStore failure handling', () => {
  it('surfaces backend failures through the result-typed api', async () => {
    const store = new StateStore({ backend: new FailingBackend('ETIMEDOUT') });

    const result = await store.trySet('k', 1);
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof TransientBackendError);
      assert.equal(result.error.operation, 'set');
      assert.equal(result.error.key, 'k');
    }

    assert.equal(await store.set('k', 1), false);
    assert.equal(await store.get('k', 'default'), 'default');
    assert.equal(await store.delete('k'), false);
    assert.deepEqual(await store.keys('k'), []);
    assert.equal(store.backendKind, 'redis');

    const health = await store.healthCheck();
    assert.equal(health.status, 'unhealthy');
    assert.equal(health.error, 'connect ETIMEDOUT 127.0.0.1:6379');
  });

  it('falls back to memory when redis refuses connections', async () => {
    const backend = new FailingBackend('ECONNREFUSED');
    const store = new StateStore({ backend });

    assert.equal(await store.set('k', 'lost'), false);
    assert.equal(store.backendKind, 'memory');
    assert.equal(store.degradedReason, 'Redis unavailable');
    assert.equal(backend.closed, true);

    assert.equal(await store.set('k', 'kept'), true);
    assert.equal(await store.get('k'), 'kept');
  });
});

describe('fingerprintAction', () => {
  it('ignores key order and distinguishes actions', () => {
    const first = fingerprintAction('act', { a: 1, b: [1, 2] });
    assert.equal(first, fingerprintAction('act', { b: [1, 2], a: 1 }));
    assert.notEqual(first, fingerprintAction('other', { a: 1, b: [1, 2] }));
    assert.match(first, /^[0-9a-f]{64}$/);
  });
});
