import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';
import IORedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { StateStore } from '../src';

describe('StateStore (redis)', () => {
  let redis: Redis;
  let store: StateStore;

  beforeEach(async () => {
    redis = new IORedisMock() as unknown as Redis;
    await redis.flushall();
    store = new StateStore({ redisUrl: 'redis://127.0.0.1:6379', createRedis: () => redis });
  });

  afterEach(async () => {
    await store.close();
  });

  it('writes json with an expiry', async () => {
    assert.equal(await store.set('workflow:wf-1', { status: 'running' }, 3600), true);
    assert.equal(await redis.get('workflow:wf-1'), '{"status":"running"}');
    const ttl = await redis.ttl('workflow:wf-1');
    assert.ok(ttl > 3590 && ttl <= 3600);
    assert.deepEqual(await store.get('workflow:wf-1'), { status: 'running' });
  });

  it('uses the completion ttl for finished workflow sessions', async () => {
    await store.createWorkflowSession('wf-2', { status: 'running' });
    await store.completeWorkflowSession('wf-2', { status: 'completed' });
    const ttl = await redis.ttl('workflow:wf-2');
    assert.ok(ttl > 86_000 && ttl <= 86_400);
    assert.deepEqual(await store.getWorkflowSession('wf-2'), { status: 'completed' });
  });

  it('scans resources by type', async () => {
    await store.storeResource('file', 'f1');
    await store.storeResource('file', 'f2');
    await store.storeResource('contact', 'c1');
    const files = await store.listResources('file');
    assert.deepEqual(
      files.map((record) => record.resourceId),
      ['f1', 'f2']
    );
  });

  it('treats undecodable values as missing', async () => {
    await redis.set('broken', '{not json');
    assert.equal(await store.get('broken', 'fallback'), 'fallback');
    const result = await store.tryGet('broken');
    assert.equal(result.ok, false);
  });

  it('reports a healthy redis backend', async () => {
    const health = await store.healthCheck();
    assert.equal(health.status, 'healthy');
    assert.equal(health.backend, 'redis');
  });
});
