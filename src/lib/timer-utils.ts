import {
  setInterval as setIntervalPromise,
  setTimeout as setTimeoutPromise,
} from 'node:timers/promises';

import { isAbortError } from '../utils/error-utils.js';

export interface CancellableTimeout<T> {
  promise: Promise<T>;
  cancel: () => void;
}

interface IntervalLoopOptions<T> {
  signal: AbortSignal;
  onTick: (value: T) => void | Promise<void>;
  onError?: (error: unknown) => void;
}

/** Largest delay Node's timers accept without overflowing to 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

async function sleepInChunks(
  timeoutMs: number,
  signal: AbortSignal
): Promise<void> {
  let remaining = timeoutMs;
  while (remaining > MAX_TIMER_DELAY_MS) {
    await setTimeoutPromise(MAX_TIMER_DELAY_MS, undefined, {
      ref: false,
      signal,
    });
    remaining -= MAX_TIMER_DELAY_MS;
  }
  await setTimeoutPromise(remaining, undefined, { ref: false, signal });
}

function createAbortSafeTimeoutPromise<T>(
  timeoutMs: number,
  value: T,
  signal: AbortSignal
): Promise<T> {
  // An infinite delay never fires.
  if (timeoutMs === Number.POSITIVE_INFINITY) {
    return new Promise<T>(() => {});
  }

  return sleepInChunks(timeoutMs, signal).then(
    () => value,
    (err: unknown) => {
      if (isAbortError(err)) {
        return new Promise<T>(() => {});
      }
      throw err;
    }
  );
}

/**
 * Timer that never keeps the process alive. Delays past the timer limit
 * are re-armed in chunks. Cancelling leaves the promise pending forever,
 * so it only ever settles as the winner of a race.
 */
export function createUnrefTimeout<T>(
  timeoutMs: number,
  value: T
): CancellableTimeout<T> {
  const controller = new AbortController();
  const promise = createAbortSafeTimeoutPromise(
    Number.isNaN(timeoutMs) ? 0 : Math.max(0, timeoutMs),
    value,
    controller.signal
  );

  return {
    promise,
    cancel: () => {
      controller.abort();
    },
  };
}

export interface AbortWait<T> {
  promise: Promise<T>;
  dispose: () => void;
}

/**
 * Resolves with `value` once `signal` aborts. `dispose` detaches the
 * listener; the promise then stays pending.
 */
export function waitForAbort<T>(signal: AbortSignal, value: T): AbortWait<T> {
  if (signal.aborted) {
    return { promise: Promise.resolve(value), dispose: () => {} };
  }

  let listener: (() => void) | undefined;
  const promise = new Promise<T>((resolve) => {
    listener = () => {
      resolve(value);
    };
    signal.addEventListener('abort', listener, { once: true });
  });

  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener('abort', listener);
    },
  };
}

export function startAbortableIntervalLoop<T>(
  intervalMs: number,
  value: T,
  options: IntervalLoopOptions<T>
): void {
  const ticks = setIntervalPromise(intervalMs, value, {
    signal: options.signal,
    ref: false,
  });

  void (async () => {
    try {
      for await (const tickValue of ticks) {
        await options.onTick(tickValue);
        if (options.signal.aborted) return;
      }
    } catch (error: unknown) {
      if (isAbortError(error)) return;
      options.onError?.(error);
    }
  })();
}
