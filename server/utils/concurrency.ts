export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(capacity: number) {
    this.available = Math.max(1, Math.floor(capacity));
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(() => {
        this.available -= 1;
        resolve(this.releaser());
      });
    });
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Runs `task` over `items` with at most `limit` in flight.
 * Results keep the order of `items`, whatever order the tasks settle in.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const semaphore = new Semaphore(limit);
  return await Promise.all(
    items.map(async (item, index) => {
      const release = await semaphore.acquire();
      try {
        return await task(item, index);
      } finally {
        release();
      }
    }),
  );
};
