import { SwitchyardError } from '@switchyard/shared';

export class TransientBackendError extends SwitchyardError {
  readonly operation: string;
  readonly key: string | null;

  constructor(operation: string, key: string | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TRANSIENT_BACKEND', `State backend ${operation} failed${key ? ` for ${key}` : ''}: ${reason}`, { cause });
    this.name = 'TransientBackendError';
    this.operation = operation;
    this.key = key;
  }
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: TransientBackendError };
