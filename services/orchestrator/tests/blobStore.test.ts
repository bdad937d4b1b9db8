import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { after, describe, it } from 'node:test';
import type { PutObjectCommand } from '@aws-sdk/client-s3';
import { createBlobStore, LocalBlobStore, normalizeBlobKey, S3BlobStore } from '../src/audit/blobStore';

describe('normalizeBlobKey', () => {
  it('sanitizes segments and drops empty ones', () => {
    assert.equal(normalizeBlobKey('/2024-05-01//../audit 1.json'), '2024-05-01/audit-1.json');
    assert.throws(() => normalizeBlobKey('/../.'), /no usable path segments/);
  });
});

describe('LocalBlobStore', () => {
  const dirs: string[] = [];

  after(async () => {
    await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
  });

  async function tempDir(): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'switchyard-blobs-'));
    dirs.push(dir);
    return dir;
  }

  it('writes the body under the root directory', async () => {
    const rootDir = await tempDir();
    const store = new LocalBlobStore({ rootDir });

    const blob = await store.put('2024-05-01/audit-1.json', '{"ok":true}');

    assert.deepEqual(blob, { key: '2024-05-01/audit-1.json', url: 'local://2024-05-01/audit-1.json', sizeBytes: 11 });
    assert.equal(await readFile(path.join(rootDir, '2024-05-01', 'audit-1.json'), 'utf8'), '{"ok":true}');
  });

  it('builds public URLs when a base URL is configured', async () => {
    const store = new LocalBlobStore({ rootDir: await tempDir(), publicBaseUrl: 'https://blobs.example.test/' });

    const blob = await store.put('reports/audit-2.json', 'é');

    assert.equal(blob.url, 'https://blobs.example.test/reports/audit-2.json');
    assert.equal(blob.sizeBytes, 2);
  });
});

describe('S3BlobStore', () => {
  function recordingClient() {
    const commands: PutObjectCommand[] = [];
    return {
      commands,
      client: {
        async send(command: PutObjectCommand): Promise<unknown> {
          commands.push(command);
          return {};
        }
      }
    };
  }

  it('uploads under the prefix and returns an s3 URL', async () => {
    const { client, commands } = recordingClient();
    const store = new S3BlobStore({ client, bucket: 'audit-bucket', prefix: '/offload/' });

    const blob = await store.put('2024-05-01/audit-1.json', '{}', 'application/json');

    assert.equal(commands.length, 1);
    assert.deepEqual(commands[0].input, {
      Bucket: 'audit-bucket',
      Key: 'offload/2024-05-01/audit-1.json',
      Body: '{}',
      ContentType: 'application/json'
    });
    assert.deepEqual(blob, {
      key: 'offload/2024-05-01/audit-1.json',
      url: 's3://audit-bucket/offload/2024-05-01/audit-1.json',
      sizeBytes: 2
    });
  });

  it('uses the signer for download URLs', async () => {
    const { client } = recordingClient();
    const store = new S3BlobStore({
      client,
      bucket: 'audit-bucket',
      signUrl: async (bucket, key) => `https://signed.example.test/${bucket}/${key}?sig=test`
    });

    const blob = await store.put('audit-1.json', '{}', 'application/json');

    assert.equal(blob.url, 'https://signed.example.test/audit-bucket/audit-1.json?sig=test');
  });
});

describe('createBlobStore', () => {
  it('selects the backend from configuration', () => {
    assert.equal(createBlobStore({ kind: 'local', rootDir: os.tmpdir(), publicBaseUrl: null }).kind, 'local');
    assert.equal(
      createBlobStore({
        kind: 's3',
        bucket: 'audit-bucket',
        prefix: '',
        region: 'us-east-1',
        endpoint: 'http://127.0.0.1:9000',
        forcePathStyle: true,
        presignTtlSeconds: 0
      }).kind,
      's3'
    );
  });
});
