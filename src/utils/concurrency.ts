type LimiterFn = <T>(fn: () => Promise<T>) => Promise<T>;

export const MAX_CONCURRENCY = 10;

export interface ConcurrencyOptions {
  onProgress?: (completed: number, total: number) => void;
}

export function createConcurrencyLimiter(limit: number): LimiterFn {
  const maxConcurrency = Math.min(Math.max(1, limit), MAX_CONCURRENCY);
  let active = 0;
  const queue: (() => void)[] = [];

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    while (active >= maxConcurrency) {
      await new Promise<void>((resolve) => queue.push(resolve));
    }

    active++;
    try {
      return await fn();
    } finally {
      active--;
      const next = queue.shift();
      if (next) next();
    }
  };
}

/**
 * Maps `items` through `mapper` with at most `limit` calls in flight.
 * Results keep the order of `items`; a rejected call rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>,
  options?: ConcurrencyOptions
): Promise<R[]> {
  const limiter = createConcurrencyLimiter(limit);
  const total = items.length;
  let completed = 0;

  return Promise.all(
    items.map(async (item, index) => {
      try {
        return await limiter(() => mapper(item, index));
      } finally {
        completed++;
        options?.onProgress?.(completed, total);
      }
    })
  );
}
