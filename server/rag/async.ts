// ABOUTME: Abortable sleep, exponential-backoff retry and hard-timeout helpers shared by indexing and retrieval.
// ABOUTME: Every timer is cleared on completion so callers never leave work running behind them.

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each further attempt. */
  baseDelayMs: number;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Operation aborted');
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }

    const active: AbortSignal = signal;
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(active));
    };

    const timer = setTimeout(() => {
      active.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    active.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` until it succeeds, the error is not retryable, the signal aborts,
 * or `maxAttempts` is reached. Backoff: base, 2x base, 4x base, ...
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxAttempts, baseDelayMs, signal, isRetryable = () => true, onRetry } = options;
  let lastError: unknown = new Error('No attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(signal);

    try {
      return await task(attempt);
    } catch (error) {
      lastError = error;

      if (signal?.aborted || attempt >= maxAttempts || !isRetryable(error)) {
        break;
      }

      const delay = baseDelayMs * Math.pow(2, attempt - 1);
      onRetry?.(error, attempt, delay);
      await sleep(delay, signal);
    }
  }

  throw lastError;
}

/**
 * Race `task` against a hard deadline. On expiry the task's signal is aborted
 * and the promise rejects with the error from `onTimeout`, whether or not the
 * task honours its signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
