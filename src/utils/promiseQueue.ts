/**
 * Runs the given tasks with at most `maxConcurrency` of them in flight. Results keep the order of `tasks`.
 * A rejected task rejects the queue once every already started task has settled.
 */
export async function promiseQueue<T>(maxConcurrency: number, ...tasks: Array<() => Promise<T>>): Promise<Array<T>> {
  const limit = Math.max(1, Math.floor(maxConcurrency));
  const results: Array<T> = new Array(tasks.length);
  let next = 0;

  const worker = async () => {
    while (next < tasks.length) {
      const index = next;
      next += 1;
      results[index] = await tasks[index]();
    }
  };

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < Math.min(limit, tasks.length); i += 1) {
    workers.push(worker());
  }
  const settled = await Promise.allSettled(workers);
  const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }
  return results;
}
