/**
 * Bounded-concurrency task runner. Results keep the order of `tasks`.
 */

export type PoolEntry<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: Error };

export interface PoolResult<T> {
  results: PoolEntry<T>[];
}

export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  concurrencyLimit: number
): Promise<PoolResult<T>> {
  const limit = Math.max(1, Math.floor(concurrencyLimit));
  const results: PoolEntry<T>[] = new Array(tasks.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (error) {
        results[index] = {
          status: 'rejected',
          error: error instanceof Error ? error : new Error(String(error))
        };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, tasks.length) }, () => worker());
  await Promise.all(workers);

  return { results };
}
