import { describeError, log } from "../../logger";

export type Task = () => Promise<void>;

/**
 * FIFO queue that runs at most `concurrency` tasks at once. A task that
 * rejects is logged and does not stop the pool; callers that care about the
 * outcome record it themselves before settling.
 */
export class WorkerPool {
  private readonly queue: Task[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running;
  }

  enqueue(task: Task): void {
    this.queue.push(task);
    this.drain();
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.running += 1;
      void this.run(task);
    }
    if (this.running === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (error) {
      log.error(`worker task failed: ${describeError(error)}`, "imports");
    } finally {
      this.running -= 1;
      this.drain();
    }
  }
}
