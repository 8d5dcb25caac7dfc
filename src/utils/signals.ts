import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal scoped to a single executor call. */
export interface CallSignal {
  /** Signal to hand to the transport, `null` when nothing can abort the call. */
  signal: AbortSignal | null;
  /** Clears the deadline timer and detaches from the caller's signal. */
  dispose: () => void;
}

/**
 * Builds the signal for one call from the per-call deadline and the caller's
 * own signal.
 *
 * - A `timeoutMs` of `false` or `0` sets no deadline; an elapsed deadline aborts with {@link TimeoutError}.
 * - A caller abort is forwarded with the caller's reason, or an {@link AbortError} when it gave none.
 * - With neither source the signal is `null`.
 *
 * `dispose` must run once the call settles so no timer outlives it.
 */
export function createCallSignal(timeoutMs: number | false, callerSignal?: AbortSignal | null): CallSignal {
  if (!timeoutMs && !callerSignal) {
    return { signal: null, dispose: () => {} };
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const dispose = () => {
    for (const cleanup of cleanups.splice(0)) {
      cleanup();
    }
  };

  const forward = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error request aborted by caller'));
  };

  if (callerSignal?.aborted) {
    forward(callerSignal);
    return { signal: controller.signal, dispose };
  }

  if (callerSignal) {
    const onAbort = () => forward(callerSignal);
    callerSignal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => callerSignal.removeEventListener('abort', onAbort));
  }

  if (timeoutMs) {
    const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  controller.signal.addEventListener('abort', dispose, { once: true });

  return { signal: controller.signal, dispose };
}
