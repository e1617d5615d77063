/**
 * Counting semaphore bounding how many tasks run at once.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  async acquire<T>(fn: () => Promise<T>): Promise<T> {
    if (this.permits > 0) {
      this.permits--;
    } else {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // hand the permit straight to the next waiter
      next();
    } else {
      this.permits++;
    }
  }
}

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight and
 * returns the results in input order. The first rejection rejects the whole
 * call once every started task has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(concurrency);
  const settled = await Promise.allSettled(
    items.map((item, index) => semaphore.acquire(() => fn(item, index))),
  );

  const results: R[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    results.push(result.value);
  }
  return results;
}
