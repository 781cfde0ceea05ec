import { ServiceTimeoutError } from './errors.js';

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Combine an optional caller signal with a timeout. The returned signal
 * aborts with the caller's reason or with a ServiceTimeoutError, whichever
 * comes first. Always call cleanup() once the guarded work settles.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new ServiceTimeoutError(timeoutMs));
  }, Math.min(Math.max(0, timeoutMs), MAX_TIMER_MS));
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

function abortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new Error(reason === undefined ? 'Aborted' : String(reason));
}

/**
 * Run `task` as a single suspension point bounded by `timeoutMs`.
 *
 * The task receives the combined signal so it can cancel its own I/O, but the
 * returned promise settles on abort even if the task ignores the signal.
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  callerSignal?: AbortSignal,
): Promise<T> {
  const { signal, cleanup } = createCombinedAbortSignal(callerSignal, timeoutMs);
  try {
    return await new Promise<T>((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError(signal));
        return;
      }
      const onAbort = () => reject(abortError(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      void Promise.resolve()
        .then(() => task(signal))
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  } finally {
    cleanup();
  }
}
