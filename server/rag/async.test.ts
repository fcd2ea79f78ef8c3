// ABOUTME: Tests for the retry, sleep and timeout helpers.
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { sleep, withRetry, withTimeout } from './async.js';
import { RetrievalTimeout } from './errors.js';

describe('withRetry', () => {
  it('should retry with exponential backoff until the task succeeds', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return 'ok';
      },
      { maxAttempts: 5, baseDelayMs: 1, onRetry: (_error, _attempt, delayMs) => delays.push(delayMs) },
    );

    assert.strictEqual(result, 'ok');
    assert.strictEqual(calls, 3);
    assert.deepStrictEqual(delays, [1, 2]);
  });

  it('should throw the last error once attempts are exhausted', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async (attempt) => {
          calls++;
          throw new Error(`fail ${attempt}`);
        },
        { maxAttempts: 3, baseDelayMs: 0 },
      ),
      { message: 'fail 3' },
    );
    assert.strictEqual(calls, 3);
  });

  it('should stop at the first non-retryable error', async () => {
    let calls = 0;
    await assert.rejects(
      withRetry(
        async () => {
          calls++;
          throw new Error('bad request');
        },
        { maxAttempts: 5, baseDelayMs: 0, isRetryable: () => false },
      ),
      { message: 'bad request' },
    );
    assert.strictEqual(calls, 1);
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    let calls = 0;

    await assert.rejects(
      withRetry(async () => ++calls, { maxAttempts: 3, baseDelayMs: 0, signal: controller.signal }),
      { message: 'cancelled' },
    );
    assert.strictEqual(calls, 0);
  });
});

describe('sleep', () => {
  it('should reject with the abort reason when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await assert.rejects(pending, { message: 'stop' });
  });
});

describe('withTimeout', () => {
  it('should return the task result when it finishes in time', async () => {
    const result = await withTimeout(async () => 42, 1000, () => new RetrievalTimeout(1000));
    assert.strictEqual(result, 42);
  });

  it('should reject with the timeout error and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;

    await assert.rejects(
      withTimeout(
        (signal) => {
          taskSignal = signal;
          return new Promise<string>((resolve) => {
            signal.addEventListener('abort', () => resolve('too late'));
          });
        },
        10,
        () => new RetrievalTimeout(10),
      ),
      (error: unknown) => error instanceof RetrievalTimeout && error.message === 'Retrieval exceeded 10ms',
    );
    assert.strictEqual(taskSignal?.aborted, true);
  });
});
