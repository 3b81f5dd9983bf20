/**
 * pLimit
 *
 * Limits the concurrency of async operations.
 *
 * @param concurrency - Max number of concurrent operations
 * @returns A limiter whose `run` takes a thunk and starts it once a slot is free
 */
export interface Limiter {
  run<T>(fn: () => Promise<T>): Promise<T>;
  readonly activeCount: number;
  readonly pendingCount: number;
}

export function pLimit(concurrency: number): Limiter {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const queue: Array<() => void> = [];
  let activeCount = 0;

  const next = (): void => {
    activeCount--;
    queue.shift()?.();
  };

  const run = async <T>(fn: () => Promise<T>): Promise<T> => {
    const execute = async (): Promise<T> => {
      activeCount++;
      try {
        return await fn();
      } finally {
        next();
      }
    };

    if (activeCount < concurrency) {
      return execute();
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  };

  return {
    run,
    get activeCount() {
      return activeCount;
    },
    get pendingCount() {
      return queue.length;
    },
  };
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limiter = pLimit(limit);
  return Promise.all(items.map((item, index) => limiter.run(() => fn(item, index))));
}
