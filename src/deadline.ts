/**
 * Rejects with `signal.reason` once the signal aborts. Never settles otherwise.
 */
export function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

// Longest delay setTimeout honours; anything above fires almost at once
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Runs `task` with an abort signal that fires after `ms`. When the deadline
 * passes, the task is told to cancel through the signal and the returned
 * promise rejects with the error built by `onTimeout`, whether or not the task
 * honours the signal. The task's own promise is then handed to `onAbandoned`
 * so the caller can clean up after a task that finishes late. The signal is
 * also aborted once the task settles, so work it left running is cancelled.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error,
  onAbandoned?: (late: Promise<T>) => void,
): Promise<T> {
  if (!(ms >= 0 && ms <= MAX_TIMEOUT_MS)) {
    throw new RangeError(`deadline of ${ms}ms is outside 0..${MAX_TIMEOUT_MS}ms`);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(onTimeout());
  }, ms);

  let running: Promise<T>;
  try {
    running = task(controller.signal);
  } catch (error) {
    clearTimeout(timer);
    throw error;
  }

  try {
    return await Promise.race([running, whenAborted(controller.signal)]);
  } catch (error) {
    if (timedOut) {
      onAbandoned?.(running);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
