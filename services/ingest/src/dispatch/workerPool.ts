type QueuedTask = {
  run: () => Promise<void>;
};

export interface WorkerPoolOptions {
  maxWorkers: number;
  /** Called whenever the number of waiting tasks changes. */
  onQueueDepth?: (depth: number) => void;
}

/**
 * Fixed-size pool shared by every submission. Tasks beyond `maxWorkers` wait
 * in FIFO order; a task's rejection is delivered to its own caller only.
 */
export class WorkerPool {
  readonly maxWorkers: number;
  private readonly queue: QueuedTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly onQueueDepth?: (depth: number) => void;
  private active = 0;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, received ${options.maxWorkers}`);
    }
    this.maxWorkers = options.maxWorkers;
    this.onQueueDepth = options.onQueueDepth;
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: () => Promise.resolve().then(task).then(resolve, reject)
      });
      this.onQueueDepth?.(this.queue.length);
      this.drain();
    });
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.active < this.maxWorkers) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      this.active += 1;
      this.onQueueDepth?.(this.queue.length);
      void next.run().finally(() => {
        this.active -= 1;
        this.drain();
        if (this.active === 0 && this.queue.length === 0) {
          for (const waiter of this.idleWaiters.splice(0)) {
            waiter();
          }
        }
      });
    }
  }
}
