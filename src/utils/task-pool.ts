export interface TaskPoolOptions {
  /**
   * Max tasks allowed to execute at once.
   * @default Infinity (no concurrency cap)
   */
  concurrency?: number;
}

/**
 * FIFO task queue with a concurrency cap.
 *
 * With `concurrency: 1` it is an exclusive section: tasks run one after the
 * other, each to completion, in submission order.
 */
export class TaskPool {
  private readonly concurrency: number;
  private queue: Array<() => Promise<void>> = [];
  private active = 0;

  constructor(options: TaskPoolOptions = {}) {
    const concurrency = options.concurrency ?? Number.POSITIVE_INFINITY;
    if (!(concurrency >= 1)) {
      throw new RangeError(`TaskPool concurrency must be at least 1, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /**
   * Tasks currently executing.
   */
  get running(): number {
    return this.active;
  }

  /**
   * Tasks waiting for a slot.
   */
  get pending(): number {
    return this.queue.length;
  }

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => Promise.resolve().then(fn).then(resolve, reject));
      this._schedule();
    });
  }

  /**
   * Run `fn` over every item through the pool and wait for all of them.
   * Never rejects: each outcome is reported like `Promise.allSettled`.
   */
  settleAll<I, T>(items: readonly I[], fn: (item: I) => Promise<T>): Promise<PromiseSettledResult<T>[]> {
    return Promise.allSettled(items.map((item) => this.run(() => fn(item))));
  }

  private _schedule() {
    while (this.queue.length > 0 && this.active < this.concurrency) {
      const start = this.queue.shift();
      if (!start) break;

      this.active++;

      void start().finally(() => {
        this.active--;
        this._schedule();
      });
    }
  }
}
