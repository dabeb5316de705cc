import { CancelledError, TimeoutError } from "../errors.js";

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep input order. After a failure no new items start; once in-flight
 * calls settle, the failure with the lowest index is thrown.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: R[] = new Array<R>(items.length);
  const failures: Array<{ index: number; error: unknown }> = [];
  let next = 0;

  async function worker(): Promise<void> {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failures.push({ index, error });
      }
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  if (failures.length > 0) {
    failures.sort((a, b) => a.index - b.index);
    throw failures[0].error;
  }
  return results;
}

export type DeadlineOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Run `work` under a timeout and an optional caller signal.
 * `work` receives a signal that aborts on either; the returned promise rejects
 * with TimeoutError or CancelledError without waiting for `work` to notice.
 */
export async function withDeadline<T>(
  stage: string,
  work: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions = {},
): Promise<T> {
  const { timeoutMs, signal } = opts;
  if (signal?.aborted) throw new CancelledError(stage);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort();
      reject(new CancelledError(stage));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(stage, timeoutMs));
      }, timeoutMs);
    }
  });

  try {
    return await Promise.race([work(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onAbort) signal?.removeEventListener("abort", onAbort);
  }
}
