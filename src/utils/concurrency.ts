/**
 * Runs `task` over `items` with at most `limit` in flight and returns results
 * in input order. The first rejection aborts `signal` for the remaining tasks
 * and is rethrown once every started task has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  parentSignal?: AbortSignal,
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const results: R[] = new Array(items.length);
  const workers = Math.max(1, Math.min(limit, items.length));
  let cursor = 0;
  const failure: { failed: boolean; error: unknown } = { failed: false, error: undefined };

  const runWorker = async () => {
    while (!failure.failed && !controller.signal.aborted) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) {
        return;
      }
      try {
        results[index] = await task(items[index], index, controller.signal);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
          controller.abort(error);
        }
        return;
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: workers }, () => runWorker()));
  } finally {
    parentSignal?.removeEventListener("abort", onParentAbort);
  }

  if (failure.failed) {
    throw failure.error;
  }
  if (controller.signal.aborted) {
    throw controller.signal.reason;
  }
  return results;
}
