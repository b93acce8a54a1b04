import { setTimeout as delay } from 'timers/promises';
import { AllocationInterruptedError, isInterruption } from './errors';

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function throwIfInterrupted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AllocationInterruptedError();
  }
}

/**
 * Runs a task and captures its failure as a value, so one failing task never
 * rejects the fan-in of its siblings. Interruption is the exception: it is
 * rethrown and rejects the whole join.
 */
export async function settle<T>(task: () => Promise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    if (isInterruption(error)) {
      throw error;
    }
    return { ok: false, error };
  }
}

/**
 * Fans out one task per item and joins them all.
 */
export function settleEach<I, T>(items: readonly I[], task: (item: I) => Promise<T>): Promise<Settled<T>[]> {
  return Promise.all(items.map(item => settle(() => task(item))));
}

/**
 * Sleeps for `ms`, rejecting with AllocationInterruptedError as soon as the
 * signal aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfInterrupted(signal);
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new AllocationInterruptedError();
    }
    throw error;
  }
}

export interface RetryUntilOptions {
  /** Epoch milliseconds after which no further attempt is started. */
  deadline: number;
  intervalMs: number;
  signal?: AbortSignal;
  now?: () => number;
  /** Errors it rejects are rethrown at once. Every error is retried without it. */
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Calls `task` until it resolves or the deadline passes, waiting a fixed
 * interval between attempts. Rejects with the last error once out of time.
 */
export async function retryUntil<T>(task: () => Promise<T>, options: RetryUntilOptions): Promise<T> {
  const now = options.now ?? Date.now;
  let attempt = 0;

  for (;;) {
    throwIfInterrupted(options.signal);
    attempt++;
    try {
      return await task();
    } catch (error) {
      if (isInterruption(error) || (options.retryIf && !options.retryIf(error))) {
        throw error;
      }
      const remaining = options.deadline - now();
      if (remaining <= 0) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(Math.min(options.intervalMs, remaining), options.signal);
    }
  }
}
