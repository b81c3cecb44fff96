/**
 * Promise helpers shared by the toolkit and the agent loop.
 *
 * Both follow the same pattern as the LLM provider's fetchWithTimeout: an
 * AbortController owned by the caller, a timer, and cleanup in `finally`.
 */

import { InterruptedError, TimeoutError } from '../errors.js';

/**
 * Throw InterruptedError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new InterruptedError();
  }
}

/**
 * Settle with `promise`, or reject with InterruptedError as soon as `signal` fires.
 *
 * The underlying promise is not awaited further after an abort.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new InterruptedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      promise.catch(() => undefined);
      reject(new InterruptedError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Run `task` with a child AbortSignal that fires on timeout or when `parent` fires.
 *
 * Rejects with TimeoutError on expiry and InterruptedError on parent abort. The
 * task receives the child signal so it can stop its own work.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', forwardAbort, { once: true });

  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    const running = task(controller.signal);
    return await raceAbort(Promise.race([running, timeout]), parent);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', forwardAbort);
    if (!controller.signal.aborted) {
      controller.abort();
    }
  }
}

/**
 * Resolve after `ms`, or reject early with InterruptedError when `signal` fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new InterruptedError());
  }
  return raceAbort(
    new Promise<void>(resolve => {
      const onAbort = (): void => clearTimeout(id);
      const id = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
    signal
  );
}
