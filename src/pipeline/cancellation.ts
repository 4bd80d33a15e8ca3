/**
 * Cancellation plumbing.
 *
 * A stage runs under a signal that aborts when the run's signal aborts or
 * when the stage's timeout elapses, whichever comes first. The abort
 * reason is always a CancellationError.
 */

import { CancellationError } from "../errors/index.js";

export interface StageSignal {
  readonly signal: AbortSignal;
  /** Clear the timer and detach from the run signal. */
  dispose(): void;
}

function toCancellation(reason: unknown): CancellationError {
  return reason instanceof CancellationError ? reason : new CancellationError("aborted");
}

/**
 * Combine the run signal with a per-stage timeout.
 */
export function createStageSignal(runSignal: AbortSignal | undefined, timeoutMs: number): StageSignal {
  const controller = new AbortController();

  const onRunAbort = (): void => {
    controller.abort(toCancellation(runSignal?.reason));
  };

  if (runSignal?.aborted) {
    onRunAbort();
  } else {
    runSignal?.addEventListener("abort", onRunAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(
      new CancellationError("timeout", `Stage timed out after ${timeoutMs}ms`)
    );
  }, timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      runSignal?.removeEventListener("abort", onRunAbort);
    },
  };
}

/**
 * The CancellationError carried by an aborted signal.
 */
export function abortReason(signal: AbortSignal): CancellationError {
  return toCancellation(signal.reason);
}

/**
 * Throw the signal's CancellationError if it has aborted.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Settle with the promise, or reject with a CancellationError as soon as
 * the signal aborts. The losing promise is left to settle on its own.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
