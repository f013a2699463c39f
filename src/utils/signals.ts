import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal that fires after a timeout, with a handle to cancel the pending timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Clears the timer; call once the guarded work has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a {@link TimeoutError}
 * after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/** Signal merged from several sources, with a handle to detach it from them. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Removes the listeners left on the source signals; call once the guarded work has settled. */
  clear: () => void;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is with a no-op `clear`.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Attempts to preserve the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 * - Listeners on the sources are removed on abort or on `clear()`, whichever comes first.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], clear: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const clear = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    if (source.reason !== undefined) {
      controller.abort(source.reason);
      return;
    }

    controller.abort(new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', clear, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, clear };
}
