/**
 * Async helpers for fan-out/fan-in stages.
 *
 * Every external call in a retrieval stage runs through `settle()`: it gets
 * its own deadline, inherits the caller's cancellation, and resolves to an
 * outcome instead of rejecting, so a stage can join all of its calls with
 * `Promise.all` and inspect each one.
 */

/** Outcome of a settled call. */
export type Settled<T> =
  | { status: 'fulfilled'; value: T; durationMs: number }
  | { status: 'timeout'; durationMs: number }
  | { status: 'cancelled'; durationMs: number }
  | { status: 'rejected'; error: Error; durationMs: number };

/**
 * A timeout linked to an optional parent signal.
 */
export interface Deadline {
  /** Aborts when the timeout elapses or the parent aborts. */
  signal: AbortSignal;
  /** True once the timeout (not the parent) fired. */
  timedOut(): boolean;
  /** Clear the timer and detach from the parent. */
  dispose(): void;
}

/**
 * Create a deadline of `timeoutMs` linked to `parent`.
 */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let fired = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    fired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => fired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Promise that rejects when `signal` aborts. Never settles otherwise.
 */
function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(toError(signal.reason));
      return;
    }
    signal.addEventListener('abort', () => reject(toError(signal.reason)), { once: true });
  });
}

/**
 * Run `fn` with a deadline and resolve to its outcome.
 *
 * `fn` receives a signal that aborts on timeout or parent cancellation.
 * Calls that ignore the signal are abandoned at the deadline.
 */
export async function settle<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<Settled<T>> {
  const startTime = Date.now();
  if (parent?.aborted) {
    return { status: 'cancelled', durationMs: 0 };
  }

  const deadline = createDeadline(timeoutMs, parent);

  try {
    const value = await Promise.race([fn(deadline.signal), whenAborted(deadline.signal)]);
    return { status: 'fulfilled', value, durationMs: Date.now() - startTime };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    if (deadline.timedOut()) {
      return { status: 'timeout', durationMs };
    }
    if (parent?.aborted) {
      return { status: 'cancelled', durationMs };
    }
    return { status: 'rejected', error: toError(error), durationMs };
  } finally {
    deadline.dispose();
  }
}

/**
 * Map over items with at most `concurrency` calls in flight.
 * Results keep the input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value ?? 'Aborted'));
}
