import { promises as fs } from 'node:fs';
import path from 'node:path';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { byteLength } from '@switchyard/shared';
import type { BlobStoreConfig } from '../config';

export type StoredBlob = {
  key: string;
  url: string;
  sizeBytes: number;
};

export interface BlobStore {
  readonly kind: 'local' | 's3';
  put(key: string, body: string, contentType: string): Promise<StoredBlob>;
}

function sanitizeSegment(value: string): string {
  return value
    .trim()
    .replace(/[^a-zA-Z0-9._-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '');
}

/** Splits a blob key into safe path segments; empty and dot segments are dropped. */
export function normalizeBlobKey(key: string): string {
  const segments = key
    .split('/')
    .map((segment) => sanitizeSegment(segment))
    .filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new Error(`Blob key "${key}" has no usable path segments`);
  }
  return segments.join('/');
}

export class LocalBlobStore implements BlobStore {
  readonly kind = 'local' as const;
  private readonly rootDir: string;
  private readonly publicBaseUrl: string | null;

  constructor(options: { rootDir: string; publicBaseUrl?: string | null }) {
    this.rootDir = path.resolve(options.rootDir);
    this.publicBaseUrl = options.publicBaseUrl?.replace(/\/+$/, '') || null;
  }

  async put(key: string, body: string): Promise<StoredBlob> {
    const normalized = normalizeBlobKey(key);
    const target = path.join(this.rootDir, ...normalized.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, body, 'utf8');
    return {
      key: normalized,
      url: this.publicBaseUrl
        ? `${this.publicBaseUrl}/${normalized.split('/').map(encodeURIComponent).join('/')}`
        : `local://${normalized}`,
      sizeBytes: byteLength(body)
    };
  }
}

export interface S3ObjectWriter {
  send(command: PutObjectCommand): Promise<unknown>;
}

export type S3BlobStoreOptions = {
  client: S3ObjectWriter;
  bucket: string;
  prefix?: string;
  /** Produces a download URL for an uploaded key; `s3://bucket/key` is used when absent. */
  signUrl?: ((bucket: string, key: string) => Promise<string>) | null;
};

export class S3BlobStore implements BlobStore {
  readonly kind = 's3' as const;
  private readonly client: S3ObjectWriter;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly signUrl: ((bucket: string, key: string) => Promise<string>) | null;

  constructor(options: S3BlobStoreOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.prefix = (options.prefix ?? '').replace(/^\/+/, '').replace(/\/+$/, '');
    this.signUrl = options.signUrl ?? null;
  }

  async put(key: string, body: string, contentType: string): Promise<StoredBlob> {
    const normalized = normalizeBlobKey(key);
    const objectKey = this.prefix.length > 0 ? `${this.prefix}/${normalized}` : normalized;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: objectKey,
        Body: body,
        ContentType: contentType
      })
    );
    const url = this.signUrl ? await this.signUrl(this.bucket, objectKey) : `s3://${this.bucket}/${objectKey}`;
    return { key: objectKey, url, sizeBytes: byteLength(body) };
  }
}

export function createBlobStore(config: BlobStoreConfig): BlobStore {
  if (config.kind === 'local') {
    return new LocalBlobStore({ rootDir: config.rootDir, publicBaseUrl: config.publicBaseUrl });
  }

  const clientConfig: ConstructorParameters<typeof S3Client>[0] = {
    region: config.region,
    endpoint: config.endpoint ?? undefined,
    forcePathStyle: config.forcePathStyle
  };
  const client = new S3Client(clientConfig);
  const ttl = config.presignTtlSeconds;
  return new S3BlobStore({
    client,
    bucket: config.bucket,
    prefix: config.prefix,
    signUrl: ttl > 0
      ? (bucket, key) => getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: ttl })
      : null
  });
}
