import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { assertValidRetryConfig, RetryHandler } from './retry-handler.js';
import { HttpRequestError } from './http-errors.js';

const LIMITS = { maxAttempts: 10, maxBackoffMs: 60_000 };

function serverError(): HttpRequestError {
  return new HttpRequestError('HTTP 503', 'http_status', true, 503);
}

describe('RetryHandler', () => {
  it('does not wait or retry when the first attempt succeeds', async () => {
    const waits: number[] = [];
    const handler = new RetryHandler({ maxAttempts: 3, backoffMs: [0, 250, 750] }, async (ms) => { waits.push(ms); });
    let calls = 0;

    const result = await handler.executeWithRetry(async () => {
      calls++;
      return 'ok';
    });

    assert.equal(result, 'ok');
    assert.equal(calls, 1);
    assert.deepEqual(waits, []);
  });

  it('retries retriable failures with the backoff schedule', async () => {
    const waits: number[] = [];
    const handler = new RetryHandler({ maxAttempts: 3, backoffMs: [0, 250, 750] }, async (ms) => { waits.push(ms); });
    const seenAttempts: number[] = [];

    const result = await handler.executeWithRetry(async (attempt) => {
      seenAttempts.push(attempt);
      if (attempt < 2) throw serverError();
      return 'recovered';
    });

    assert.equal(result, 'recovered');
    assert.deepEqual(seenAttempts, [0, 1, 2]);
    assert.deepEqual(waits, [250, 750]);
  });

  it('stops after maxAttempts and rethrows the last error', async () => {
    const handler = new RetryHandler({ maxAttempts: 3, backoffMs: [0] }, async () => {});
    let calls = 0;
    const errors: number[] = [];

    await assert.rejects(
      handler.executeWithRetry(
        async () => {
          calls++;
          throw new HttpRequestError(`HTTP 500 #${calls}`, 'http_status', true, 500);
        },
        { onError: (attempt) => errors.push(attempt) }
      ),
      /HTTP 500 #3/
    );

    assert.equal(calls, 3);
    assert.deepEqual(errors, [0, 1, 2]);
  });

  it('fails fast on non-retriable errors', async () => {
    const handler = new RetryHandler({ maxAttempts: 5, backoffMs: [0, 10] }, async () => {});
    let calls = 0;

    await assert.rejects(
      handler.executeWithRetry(async () => {
        calls++;
        throw new HttpRequestError('HTTP 401', 'http_status', false, 401);
      }),
      /HTTP 401/
    );
    assert.equal(calls, 1);
  });

  it('treats unknown errors as non-retriable', async () => {
    const handler = new RetryHandler({ maxAttempts: 3, backoffMs: [0] }, async () => {});
    let calls = 0;

    await assert.rejects(
      handler.executeWithRetry(async () => {
        calls++;
        throw new Error('unexpected');
      }),
      /unexpected/
    );
    assert.equal(calls, 1);
    assert.equal(handler.categorizeError(new Error('x')).type, 'unknown');
  });

  it('repeats the last backoff entry for later attempts', () => {
    const handler = new RetryHandler({ maxAttempts: 5, backoffMs: [0, 100] });

    assert.equal(handler.delayBefore(0), 0);
    assert.equal(handler.delayBefore(1), 100);
    assert.equal(handler.delayBefore(4), 100);
  });

  it('never waits before the first attempt', () => {
    const handler = new RetryHandler({ maxAttempts: 2, backoffMs: [300, 300] });
    assert.equal(handler.delayBefore(0), 0);
    assert.equal(handler.delayBefore(1), 300);
  });
});

describe('assertValidRetryConfig', () => {
  it('accepts constant and increasing schedules', () => {
    assert.doesNotThrow(() => assertValidRetryConfig({ maxAttempts: 3, backoffMs: [200, 200, 200] }, LIMITS));
    assert.doesNotThrow(() => assertValidRetryConfig({ maxAttempts: 1, backoffMs: [] }, LIMITS));
  });

  it('rejects decreasing schedules', () => {
    assert.throws(
      () => assertValidRetryConfig({ maxAttempts: 3, backoffMs: [0, 500, 100] }, LIMITS),
      /non-decreasing/
    );
  });

  it('rejects attempt counts outside 1..limit', () => {
    assert.throws(() => assertValidRetryConfig({ maxAttempts: 0, backoffMs: [0] }, LIMITS), RangeError);
    assert.throws(() => assertValidRetryConfig({ maxAttempts: 11, backoffMs: [0] }, LIMITS), RangeError);
  });

  it('rejects unbounded delays', () => {
    assert.throws(() => assertValidRetryConfig({ maxAttempts: 2, backoffMs: [0, 60_001] }, LIMITS), RangeError);
  });
});
