export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

const DEFAULT_BACKOFF = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 60_000,
  jitterRatio: 0.2
} as const;

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay before retry number `attempt` (1-based). A zero base yields an
 * immediate retry regardless of factor and jitter.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const baseMs = Math.max(0, options.baseMs ?? DEFAULT_BACKOFF.baseMs);
  const factor = options.factor ?? DEFAULT_BACKOFF.factor;
  const maxMs = Math.max(baseMs, options.maxMs ?? DEFAULT_BACKOFF.maxMs);
  const jitterRatio = options.jitterRatio ?? DEFAULT_BACKOFF.jitterRatio;

  if (baseMs === 0) {
    return 0;
  }

  const capped = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(capped);
  }

  const random = options.random ?? Math.random;
  const jitter = (random() * 2 - 1) * capped * jitterRatio;
  return Math.round(clamp(capped + jitter, baseMs, maxMs));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
