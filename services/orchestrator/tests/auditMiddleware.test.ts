import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { isJsonObject } from '@switchyard/shared';
import { stateKeys } from '@switchyard/state-store';
import type { BlobStore, StoredBlob } from '../src/audit/blobStore';
import { AuditMiddleware, type AuditMiddlewareOptions, type BoundaryCall } from '../src/audit/middleware';
import { fixedClock, memoryStore, recordingBus } from './helpers';

const call: BoundaryCall = {
  action: 'files.upload',
  request: null,
  params: { name: 'report.pdf', payload: 'raw-file-bytes' },
  mode: 'execute',
  callerId: 'caller-1',
  userId: 'user-1'
};

function memoryBlobStore(): BlobStore & { bodies: Map<string, string> } {
  const bodies = new Map<string, string>();
  return {
    kind: 'local',
    bodies,
    async put(key: string, body: string): Promise<StoredBlob> {
      bodies.set(key, body);
      return { key, url: `memory://${key}`, sizeBytes: Buffer.byteLength(body) };
    }
  };
}

async function setup(overrides: Partial<AuditMiddlewareOptions> = {}) {
  const stateStore = memoryStore();
  const { bus, names } = await recordingBus();
  const middleware = new AuditMiddleware({
    stateStore,
    eventBus: bus,
    now: fixedClock().now,
    idFactory: () => 'audit-1',
    ...overrides
  });
  return { middleware, stateStore, bus, names };
}

describe('AuditMiddleware', () => {
  it('records a redacted audit entry and passes small responses through', async () => {
    const { middleware, stateStore, bus, names } = await setup();
    const response = { status: 'completed' };

    const result = await middleware.wrap(call, async () => response);
    await bus.drain();

    assert.equal(result, response);
    assert.deepEqual(await stateStore.get(stateKeys.audit('audit-1')), {
      id: 'audit-1',
      timestamp: '2024-05-01T00:00:00.000Z',
      action: 'files.upload',
      request: null,
      params: { name: 'report.pdf', payload: '[redacted:string]' },
      mode: 'execute',
      callerId: 'caller-1',
      outcome: 'success',
      responseSizeBytes: 22,
      durationMs: 0,
      errorMessage: null,
      warnings: []
    });
    assert.deepEqual(names(), ['audit.recorded']);
  });

  it('moves responses above the threshold to blob storage', async () => {
    const blobStore = memoryBlobStore();
    const { middleware, stateStore, bus, names } = await setup({ blobStore });
    const response = { status: 'completed', data: 'x'.repeat(11 * 1024 * 1024) };

    const result = await middleware.wrap(call, async () => response);
    await bus.drain();

    assert.deepEqual(result, {
      status: 'offloaded',
      note: 'Response of 11534368 bytes exceeded the 10485760 byte limit and was moved to blob storage',
      reference: { key: '2024-05-01/audit-1.json', url: 'memory://2024-05-01/audit-1.json' },
      originalSizeBytes: 11534368
    });
    assert.equal(blobStore.bodies.get('2024-05-01/audit-1.json'), JSON.stringify(response));
    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.equal(record.outcome, 'offloaded');
    assert.equal(record.responseSizeBytes, 11534368);
    assert.deepEqual(record.params, { name: 'report.pdf', payload: '[redacted:string]' });
    assert.deepEqual(names(), ['response.offloaded', 'audit.recorded']);
  });

  it('returns the response inline when no blob store is configured', async () => {
    const { middleware, stateStore } = await setup({ offloadThresholdBytes: 10 });
    const response = { status: 'completed' };

    const result = await middleware.wrap(call, async () => response);

    assert.equal(result, response);
    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.equal(record.outcome, 'success');
    assert.deepEqual(record.warnings, [
      'Response of 22 bytes exceeds the offload threshold but no blob store is configured'
    ]);
  });

  it('returns the response inline when the upload fails', async () => {
    const blobStore: BlobStore = {
      kind: 's3',
      async put(): Promise<StoredBlob> {
        throw new Error('bucket unavailable');
      }
    };
    const { middleware, stateStore } = await setup({ blobStore, offloadThresholdBytes: 10 });
    const response = { status: 'completed' };

    const result = await middleware.wrap(call, async () => response);

    assert.equal(result, response);
    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.deepEqual(record.warnings, ['Offload failed: bucket unavailable']);
  });

  it('records handler failures and rethrows them', async () => {
    const { middleware, stateStore } = await setup();

    await assert.rejects(
      middleware.wrap(call, async () => {
        throw new Error('handler exploded');
      }),
      /handler exploded/
    );

    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.equal(record.outcome, 'error');
    assert.equal(record.errorMessage, 'handler exploded');
    assert.equal(record.responseSizeBytes, null);
  });

  it('marks error responses as errors', async () => {
    const { middleware, stateStore } = await setup();

    await middleware.wrap(call, async () => ({ status: 'error', code: 'unknown_action' }));

    const record = await stateStore.get(stateKeys.audit('audit-1'));
    assert.ok(isJsonObject(record));
    assert.equal(record.outcome, 'error');
  });
});
