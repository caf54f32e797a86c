import { describeError, type Result } from "../errors/app-error.js";
import type { Logger } from "../logging/logger.js";

/** One connection's full request/response cycle. */
export type Job = () => Promise<Result<void>>;

/**
 * Unbounded FIFO channel. `push` never waits; each item goes to exactly one
 * `receive` call, oldest receiver first.
 */
export class JobQueue<T> {
  private items: T[] = [];
  private receivers: Array<(item: T) => void> = [];

  push(item: T): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
    } else {
      this.items.push(item);
    }
  }

  receive(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** Items queued and not yet received. */
  get length(): number {
    return this.items.length;
  }

  /** Receivers parked waiting for an item. */
  get waiting(): number {
    return this.receivers.length;
  }
}

/**
 * A fixed set of long-lived worker loops draining one queue, so at most
 * `size` jobs run at once. Workers run for the life of the process.
 *
 * Node worker threads cannot own a socket, so the workers are async loops on
 * the event loop; the bound on concurrent jobs is the same.
 */
export class WorkerPool {
  private queue = new JobQueue<Job>();
  private running = 0;

  constructor(
    readonly size: number,
    private readonly logger: Logger,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    for (let id = 0; id < size; id++) {
      void this.runWorker(id);
    }
  }

  /** Queue a job; returns immediately even when every worker is busy. */
  execute(job: Job): void {
    this.queue.push(job);
  }

  /** Jobs waiting for a free worker. */
  get pending(): number {
    return this.queue.length;
  }

  /** Jobs currently running. */
  get active(): number {
    return this.running;
  }

  private async runWorker(id: number): Promise<never> {
    while (true) {
      const job = await this.queue.receive();
      this.running++;
      try {
        const result = await job();
        if (!result.ok) {
          this.logger.warn(`Worker ${id} job failed: ${describeError(result.error)}`);
        }
      } catch (err) {
        this.logger.error(`Worker ${id} job threw:`, err);
      } finally {
        this.running--;
      }
    }
  }
}
