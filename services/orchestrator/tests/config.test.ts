import assert from 'node:assert/strict';
import path from 'node:path';
import { describe, it } from 'node:test';
import { EnvConfigError } from '@switchyard/shared';
import { DEFAULT_REDACT_KEYS, loadOrchestratorConfig } from '../src/config';

describe('loadOrchestratorConfig', () => {
  it('falls back to local defaults without any environment', () => {
    const config = loadOrchestratorConfig({});

    assert.equal(config.redisUrl, null);
    assert.equal(config.stateStoreMode, 'memory');
    assert.equal(config.eventBusMode, 'inline');
    assert.equal(config.defaultMode, 'execute');
    assert.deepEqual(config.steps, { defaultTimeoutMs: 300_000, defaultMaxRetries: 3 });
    assert.deepEqual(config.retryBackoff, { baseMs: 1_000, factor: 2, maxMs: 60_000, jitterRatio: 0.2 });
    assert.deepEqual(config.planner, { cycleDetection: 'full', fallbackAction: null });
    assert.deepEqual(config.learning, { enabled: true, minSimilarity: 0.3, retentionDays: 90, maxSuggestions: 5 });
    assert.deepEqual(config.audit, {
      retentionDays: 30,
      offloadThresholdBytes: 10 * 1024 * 1024,
      redactKeys: DEFAULT_REDACT_KEYS
    });
    assert.deepEqual(config.blobStore, {
      kind: 'local',
      rootDir: path.resolve(process.cwd(), 'data/offloads'),
      publicBaseUrl: null
    });
  });

  it('switches both backends to redis when REDIS_URL is set', () => {
    const config = loadOrchestratorConfig({ REDIS_URL: 'redis://127.0.0.1:6379' });
    assert.equal(config.redisUrl, 'redis://127.0.0.1:6379');
    assert.equal(config.stateStoreMode, 'redis');
    assert.equal(config.eventBusMode, 'redis');
  });

  it('treats the inline redis url as no redis', () => {
    const config = loadOrchestratorConfig({ REDIS_URL: 'inline' });
    assert.equal(config.redisUrl, null);
    assert.equal(config.stateStoreMode, 'memory');
  });

  it('parses overrides', () => {
    const config = loadOrchestratorConfig({
      SWITCHYARD_DEFAULT_MODE: 'PLAN',
      SWITCHYARD_STEP_MAX_RETRIES: '5',
      SWITCHYARD_RETRY_BASE_MS: '0',
      SWITCHYARD_CYCLE_DETECTION: 'self',
      SWITCHYARD_FALLBACK_ACTION: 'assistant.answer',
      SWITCHYARD_LEARNING_ENABLED: 'off',
      SWITCHYARD_REDACT_KEYS: 'Payload, Secret'
    });

    assert.equal(config.defaultMode, 'plan');
    assert.equal(config.steps.defaultMaxRetries, 5);
    assert.equal(config.retryBackoff.baseMs, 0);
    assert.deepEqual(config.planner, { cycleDetection: 'self', fallbackAction: 'assistant.answer' });
    assert.equal(config.learning.enabled, false);
    assert.deepEqual(config.audit.redactKeys, ['payload', 'secret']);
  });

  it('builds the s3 blob store settings', () => {
    const config = loadOrchestratorConfig({
      SWITCHYARD_BLOB_STORE: 's3',
      SWITCHYARD_BLOB_BUCKET: 'offloads',
      SWITCHYARD_BLOB_PREFIX: '/responses/',
      SWITCHYARD_BLOB_ENDPOINT: 'http://127.0.0.1:9000',
      AWS_REGION: 'eu-west-1'
    });

    assert.deepEqual(config.blobStore, {
      kind: 's3',
      bucket: 'offloads',
      prefix: 'responses',
      region: 'eu-west-1',
      endpoint: 'http://127.0.0.1:9000',
      forcePathStyle: true,
      presignTtlSeconds: 7 * 24 * 3600
    });
  });

  it('requires a bucket for the s3 blob store', () => {
    assert.throws(
      () => loadOrchestratorConfig({ SWITCHYARD_BLOB_STORE: 's3' }),
      (err: unknown) => {
        assert.ok(err instanceof EnvConfigError);
        assert.deepEqual(err.issues, [
          'SWITCHYARD_BLOB_BUCKET: SWITCHYARD_BLOB_BUCKET must be configured for the s3 blob store'
        ]);
        return true;
      }
    );
  });

  it('rejects unknown execution modes', () => {
    assert.throws(
      () => loadOrchestratorConfig({ SWITCHYARD_DEFAULT_MODE: 'run' }),
      (err: unknown) => {
        assert.ok(err instanceof EnvConfigError);
        assert.ok(err.message.startsWith('[orchestrator] Invalid environment configuration'));
        assert.ok(err.issues.includes("SWITCHYARD_DEFAULT_MODE: SWITCHYARD_DEFAULT_MODE must be one of 'plan', 'execute'"));
        return true;
      }
    );
  });
});
