/**
 * Cancellation and per-call deadlines built on AbortSignal
 */

import { CancelledError, TimeoutError } from "./errors.js";

/**
 * Throw CancelledError if the signal has already fired
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Sleep for a given number of milliseconds, waking early on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Controller that aborts when the parent does. Call release() once the
 * child is no longer needed so the parent drops its listener.
 */
export function linkedController(parent?: AbortSignal): {
  controller: AbortController;
  release: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, release: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });

  return {
    controller,
    release: () => parent.removeEventListener("abort", onAbort),
  };
}

/**
 * Reject with CancelledError as soon as the signal fires, otherwise settle with the promise
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Run an operation under a deadline. The operation receives a signal that
 * fires on either the deadline or the caller's cancellation; expiry surfaces
 * as a transient TimeoutError, caller cancellation as CancelledError.
 */
export async function withTimeout<T>(
  operationName: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  throwIfAborted(parent);

  const { controller, release } = linkedController(parent);
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      // Reject before aborting so an operation that settles on abort cannot win the race
      reject(new TimeoutError(operationName, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await raceAbort(Promise.race([operation(controller.signal), deadline]), parent);
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(operationName, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    release();
  }
}
