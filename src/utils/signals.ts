import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * once `timeoutMs` has passed. Returns `null` when the timeout is `false` or `0`.
 * The timer does not keep the process alive and is cleared early once `until` aborts.
 */
export function createTimeoutSignal(timeoutMs?: number | false, until?: AbortSignal): AbortSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  timer.unref();

  const clear = () => clearTimeout(timer);
  controller.signal.addEventListener('abort', clear, { once: true });
  if (until?.aborted) {
    clear();
  } else {
    until?.addEventListener('abort', clear, { once: true });
  }

  return controller.signal;
}

/**
 * Merges several signals into one that aborts as soon as any source does,
 * carrying over the source's `reason`.
 *
 * Nullish entries are ignored; `null` is returned when nothing remains and a
 * lone signal is returned as-is.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s != null);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of detach) {
        remove();
      }
    },
    { once: true },
  );

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const onAbort = () => abortFrom(signal);
    signal.addEventListener('abort', onAbort, { once: true });
    detach.push(() => signal.removeEventListener('abort', onAbort));
  }

  return controller.signal;
}
