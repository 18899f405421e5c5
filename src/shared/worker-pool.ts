/**
 * Bounded Worker Pool
 *
 * Runs an async task per item with at most `concurrency` tasks in flight.
 * Used by the synchronizer (fail-fast downloads) and the dispatcher
 * (independent per-category sends).
 *
 * - Always waits for every started task to settle before resolving
 * - stopOnError: the first rejection aborts the shared signal; items not yet
 *   started are reported as 'skipped', in-flight tasks see signal.aborted
 * - Never rejects; outcomes are returned in input order
 */

export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  stopOnError?: boolean;
  /** External cancellation; aborting it stops pending items as well */
  signal?: AbortSignal;
}

export type PoolTask<T, R> = (item: T, index: number, signal: AbortSignal) => Promise<R>;

export async function runWithConcurrency<T, R>(
  items: readonly T[],
  task: PoolTask<T, R>,
  options: PoolOptions,
): Promise<TaskOutcome<R>[]> {
  const controller = new AbortController();
  const onExternalAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const outcomes: Array<TaskOutcome<R> | undefined> = new Array(items.length).fill(undefined);
  const laneCount = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (!controller.signal.aborted && next < items.length) {
      const index = next++;
      try {
        const value = await task(items[index], index, controller.signal);
        outcomes[index] = { status: 'fulfilled', value };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason };
        if (options.stopOnError) controller.abort(reason);
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: laneCount }, () => lane()));
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  return outcomes.map(outcome => outcome ?? { status: 'skipped' });
}
