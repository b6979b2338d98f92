/**
 * Map over `input` with at most `concurrency` tasks in flight. Results keep
 * input order; the first rejection rejects the whole map.
 */
export async function pMap<T, R>(
  input: readonly T[],
  concurrency: number,
  fn: (value: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  const entries = input.entries();
  const workers = Array.from({ length: Math.min(Math.max(concurrency, 1), input.length) }, async () => {
    for (const [index, value] of entries) {
      results[index] = await fn(value, index);
    }
  });
  await Promise.all(workers);
  return results;
}

export interface RaceOptions {
  concurrency: number;
  /** Number of accepted results after which no new task starts. */
  quota: number;
}

/**
 * Run `task` over items pulled from a shared async iterator until `quota`
 * non-null results have been accepted.
 *
 * Once the quota is met the stop signal is raised: idle workers exit, tasks
 * already running finish and their results are discarded. The source
 * iterator is closed before returning. Async generators queue concurrent
 * `next()` calls, so workers can share one.
 *
 * @param onAccept Called synchronously for every accepted result, in acceptance order.
 */
export async function raceToQuota<T, R>(
  source: AsyncIterable<T>,
  options: RaceOptions,
  task: (item: T, signal: AbortSignal) => Promise<R | null>,
  onAccept?: (result: R, accepted: number) => void,
): Promise<R[]> {
  const { concurrency, quota } = options;
  if (quota <= 0) return [];

  const stop = new AbortController();
  const iterator = source[Symbol.asyncIterator]();
  const accepted: R[] = [];

  const worker = async () => {
    while (!stop.signal.aborted) {
      const step = await iterator.next();
      if (step.done || stop.signal.aborted) return;

      const result = await task(step.value, stop.signal);
      if (result === null || stop.signal.aborted) continue;

      accepted.push(result);
      onAccept?.(result, accepted.length);
      if (accepted.length >= quota) stop.abort();
    }
  };

  try {
    await Promise.all(Array.from({ length: Math.max(concurrency, 1) }, worker));
  } catch (err) {
    stop.abort();
    throw err;
  } finally {
    await iterator.return?.();
  }
  return accepted;
}
