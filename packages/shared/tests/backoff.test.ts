import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { computeExponentialBackoff, sleep } from '../src';

describe('computeExponentialBackoff', () => {
  it('doubles from the base until the cap', () => {
    const options = { baseMs: 100, factor: 2, maxMs: 500, jitterRatio: 0 };
    assert.deepEqual(
      [1, 2, 3, 4, 5].map((attempt) => computeExponentialBackoff(attempt, options)),
      [100, 200, 400, 500, 500]
    );
  });

  it('retries immediately when the base is zero', () => {
    assert.equal(computeExponentialBackoff(3, { baseMs: 0 }), 0);
  });

  it('applies symmetric jitter', () => {
    const options = { baseMs: 1_000, jitterRatio: 0.2, maxMs: 10_000 };
    assert.equal(computeExponentialBackoff(1, { ...options, random: () => 1 }), 1_200);
    assert.equal(computeExponentialBackoff(2, { ...options, random: () => 0 }), 1_600);
    assert.equal(computeExponentialBackoff(1, { ...options, random: () => 0 }), 1_000);
  });
});

describe('sleep', () => {
  it('resolves early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    assert.ok(Date.now() - started < 5_000);
  });
});
