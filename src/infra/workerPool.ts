import pLimit from "p-limit";

export interface WorkerPoolStatistics {
  readonly concurrency: number;
  readonly active: number;
  readonly queued: number;
  readonly executed: number;
  readonly failed: number;
}

type Limit = ReturnType<typeof pLimit>;

/**
 * Bounded pool running asynchronous tasks with a fixed concurrency, built on
 * `p-limit`. The transport adapter uses one pool per subscription to process
 * deliveries and the responder keeps a separate pool for analyses, so a long
 * analysis never occupies an intake slot.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly limit: Limit;
  private readonly idleWaiters: Array<() => void> = [];
  /** Tasks handed to `run` whose promise has not settled yet. */
  private outstanding = 0;
  private executed = 0;
  private failed = 0;

  constructor(concurrency: number) {
    if (!Number.isFinite(concurrency) || concurrency < 1) {
      throw new TypeError("concurrency must be a positive number");
    }
    this.concurrency = Math.floor(concurrency);
    this.limit = pLimit(this.concurrency);
  }

  /** Schedules `task`; the returned promise settles with the task outcome. */
  async run<T>(task: () => Promise<T> | T): Promise<T> {
    this.outstanding += 1;
    try {
      const value = await this.limit(task);
      this.executed += 1;
      return value;
    } catch (error) {
      this.failed += 1;
      throw error;
    } finally {
      this.outstanding -= 1;
      this.notifyIdle();
    }
  }

  /** Resolves once no task is running or queued. */
  async onIdle(): Promise<void> {
    if (this.outstanding === 0) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  statistics(): WorkerPoolStatistics {
    return {
      concurrency: this.concurrency,
      active: this.limit.activeCount,
      queued: this.limit.pendingCount,
      executed: this.executed,
      failed: this.failed,
    };
  }

  private notifyIdle(): void {
    if (this.outstanding !== 0) {
      return;
    }
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
