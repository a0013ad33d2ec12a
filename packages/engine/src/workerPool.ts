/**
 * Runs submitted tasks with at most `concurrency` in flight. Extra submissions
 * wait in submission order until a slot frees up.
 */
export class WorkerPool {
  public readonly concurrency: number;

  private readonly pending: Array<() => Promise<void>> = [];

  private active = 0;

  private idleResolvers: Array<() => void> = [];

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, received ${concurrency}.`);
    }
    this.concurrency = concurrency;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  submit<T>(run: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(async () => {
        try {
          resolve(await run());
        } catch (error) {
          reject(error);
        }
      });
      this.process();
    });
  }

  /** Resolves once no task is running or waiting. */
  async drain(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  private process(): void {
    while (this.active < this.concurrency) {
      const task = this.pending.shift();
      if (!task) {
        break;
      }

      this.active += 1;
      void Promise.resolve()
        .then(task)
        .finally(() => {
          this.active -= 1;
          this.process();
          this.notifyIdleIfNeeded();
        });
    }
    this.notifyIdleIfNeeded();
  }

  private notifyIdleIfNeeded(): void {
    if (this.active !== 0 || this.pending.length !== 0 || this.idleResolvers.length === 0) {
      return;
    }

    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    resolvers.forEach((resolve) => resolve());
  }
}
