type Job = () => void;

/**
 * Bounded pool between the tool dispatcher and the store. At most `size` jobs
 * run at once; the rest wait in FIFO order. Each job starts on a later
 * macrotask, so submitting never runs store I/O on the caller's stack.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: Job[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit<T>(task: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const job: Job = () => {
        this.active++;
        setImmediate(() => {
          void Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              this.active--;
              this.next();
            });
        });
      };

      if (this.active < this.size) {
        job();
      } else {
        this.queue.push(job);
      }
    });
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private next(): void {
    const job = this.queue.shift();
    if (job) {
      job();
      return;
    }
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }
}
