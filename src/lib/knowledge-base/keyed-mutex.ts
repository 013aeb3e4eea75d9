/**
 * 按名称加锁：同名操作串行，不同名称互不阻塞
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * 同时持有多个名称的锁；按名称排序依次加锁
   */
  runExclusiveAll<T>(keys: Iterable<string>, task: () => Promise<T>): Promise<T> {
    const sorted = [...new Set(keys)].sort();
    const acquire = (i: number): Promise<T> =>
      i === sorted.length ? task() : this.runExclusive(sorted[i], () => acquire(i + 1));
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
