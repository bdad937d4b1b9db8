import { randomUUID } from 'node:crypto';
import { EVENT_NAMES, type EventBus } from '@switchyard/event-bus';
import {
  byteLength,
  describeError,
  isJsonObject,
  silentLogger,
  type JsonObject,
  type JsonValue,
  type Logger
} from '@switchyard/shared';
import { stateKeys, type StateStore } from '@switchyard/state-store';
import { DEFAULT_REDACT_KEYS, type ExecutionMode } from '../config';
import type { OrchestratorMetrics } from '../metrics';
import type { BlobStore } from './blobStore';
import { createRedactor } from './redaction';

const DAY_SECONDS = 86_400;
export const DEFAULT_OFFLOAD_THRESHOLD_BYTES = 10 * 1024 * 1024;

export type BoundaryCall = {
  action: string | null;
  request: string | null;
  params: JsonObject;
  mode: ExecutionMode;
  callerId: string | null;
  userId?: string;
  sessionId?: string;
};

export type OffloadEnvelope = {
  status: 'offloaded';
  note: string;
  reference: { key: string; url: string };
  originalSizeBytes: number;
};

export type AuditOutcome = 'success' | 'error' | 'offloaded';

export type AuditRecord = {
  id: string;
  timestamp: string;
  action: string | null;
  request: string | null;
  params: JsonValue;
  mode: ExecutionMode;
  callerId: string | null;
  outcome: AuditOutcome;
  responseSizeBytes: number | null;
  durationMs: number;
  errorMessage: string | null;
  warnings: string[];
};

export type AuditMiddlewareOptions = {
  stateStore: StateStore;
  eventBus?: EventBus | null;
  blobStore?: BlobStore | null;
  logger?: Logger;
  metrics?: OrchestratorMetrics;
  eventSource?: string;
  redactKeys?: readonly string[];
  offloadThresholdBytes?: number;
  retentionDays?: number;
  now?: () => Date;
  idFactory?: () => string;
};

function isErrorResponse(response: JsonValue): boolean {
  return isJsonObject(response) && (response.status === 'error' || response.status === 'failed');
}

/**
 * Wraps every boundary call: writes a redacted audit record and moves
 * responses above the size threshold to blob storage.
 */
export class AuditMiddleware {
  private readonly stateStore: StateStore;
  private readonly eventBus: EventBus | null;
  private readonly blobStore: BlobStore | null;
  private readonly logger: Logger;
  private readonly metrics: OrchestratorMetrics | null;
  private readonly eventSource: string;
  private readonly redact: (value: JsonValue) => JsonValue;
  private readonly thresholdBytes: number;
  private readonly retentionDays: number;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(options: AuditMiddlewareOptions) {
    this.stateStore = options.stateStore;
    this.eventBus = options.eventBus ?? null;
    this.blobStore = options.blobStore ?? null;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? null;
    this.eventSource = options.eventSource ?? 'switchyard.audit';
    this.redact = createRedactor(options.redactKeys ?? DEFAULT_REDACT_KEYS);
    this.thresholdBytes = options.offloadThresholdBytes ?? DEFAULT_OFFLOAD_THRESHOLD_BYTES;
    this.retentionDays = options.retentionDays ?? 30;
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async wrap<T extends JsonValue>(call: BoundaryCall, handler: () => Promise<T>): Promise<T | OffloadEnvelope> {
    const id = this.idFactory();
    const started = this.now().getTime();
    const warnings: string[] = [];

    let response: T;
    try {
      response = await handler();
    } catch (err) {
      await this.record(call, {
        id,
        outcome: 'error',
        responseSizeBytes: null,
        durationMs: this.elapsed(started),
        errorMessage: describeError(err),
        warnings
      });
      throw err;
    }

    const serialized = JSON.stringify(response);
    const sizeBytes = byteLength(serialized);
    let result: T | OffloadEnvelope = response;
    let outcome: AuditOutcome = isErrorResponse(response) ? 'error' : 'success';

    if (sizeBytes > this.thresholdBytes) {
      const envelope = await this.offload(id, serialized, sizeBytes, call, warnings);
      if (envelope) {
        result = envelope;
        outcome = 'offloaded';
      }
    }

    await this.record(call, {
      id,
      outcome,
      responseSizeBytes: sizeBytes,
      durationMs: this.elapsed(started),
      errorMessage: null,
      warnings
    });
    return result;
  }

  private async offload(
    auditId: string,
    serialized: string,
    sizeBytes: number,
    call: BoundaryCall,
    warnings: string[]
  ): Promise<OffloadEnvelope | null> {
    if (!this.blobStore) {
      warnings.push(`Response of ${sizeBytes} bytes exceeds the offload threshold but no blob store is configured`);
      this.metrics?.offloads.inc({ result: 'skipped' });
      return null;
    }
    const day = this.now().toISOString().slice(0, 10);
    try {
      const blob = await this.blobStore.put(`${day}/${auditId}.json`, serialized, 'application/json');
      this.metrics?.offloads.inc({ result: 'stored' });
      const envelope: OffloadEnvelope = {
        status: 'offloaded',
        note: `Response of ${sizeBytes} bytes exceeded the ${this.thresholdBytes} byte limit and was moved to blob storage`,
        reference: { key: blob.key, url: blob.url },
        originalSizeBytes: sizeBytes
      };
      if (this.eventBus) {
        await this.eventBus.emit(
          EVENT_NAMES.responseOffloaded,
          this.eventSource,
          { auditId, key: blob.key, url: blob.url, originalSizeBytes: sizeBytes },
          { userId: call.userId, sessionId: call.sessionId }
        );
      }
      return envelope;
    } catch (err) {
      this.metrics?.offloads.inc({ result: 'failed' });
      this.logger.warn({ err, auditId, sizeBytes }, 'response offload failed; returning it inline');
      warnings.push(`Offload failed: ${describeError(err)}`);
      return null;
    }
  }

  private async record(
    call: BoundaryCall,
    result: Pick<AuditRecord, 'id' | 'outcome' | 'responseSizeBytes' | 'durationMs' | 'errorMessage' | 'warnings'>
  ): Promise<AuditRecord> {
    const record: AuditRecord = {
      id: result.id,
      timestamp: this.now().toISOString(),
      action: call.action,
      request: call.request,
      params: this.redact(call.params),
      mode: call.mode,
      callerId: call.callerId,
      outcome: result.outcome,
      responseSizeBytes: result.responseSizeBytes,
      durationMs: result.durationMs,
      errorMessage: result.errorMessage,
      warnings: result.warnings
    };

    const stored = await this.stateStore.set(stateKeys.audit(record.id), record, this.retentionDays * DAY_SECONDS);
    if (!stored) {
      this.logger.warn({ auditId: record.id }, 'audit record was not persisted');
    }
    this.metrics?.auditRecords.inc({ outcome: record.outcome });
    const level = record.warnings.length > 0 ? 'warn' : 'info';
    this.logger[level]({ audit: record }, 'boundary call audited');

    if (this.eventBus) {
      await this.eventBus.emit(
        EVENT_NAMES.auditRecorded,
        this.eventSource,
        { auditId: record.id, outcome: record.outcome, action: record.action, responseSizeBytes: record.responseSizeBytes },
        { userId: call.userId, sessionId: call.sessionId }
      );
    }
    return record;
  }

  private elapsed(started: number): number {
    return Math.max(0, this.now().getTime() - started);
  }
}
