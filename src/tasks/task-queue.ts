import { logger } from "../logger.js";

/**
 * FIFO queue that runs one task at a time. A handler failure is logged and the
 * queue moves on to the next task; the chain itself never rejects.
 */
export class TaskQueue<T> {
  private readonly handler: (task: T) => Promise<void>;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(handler: (task: T) => Promise<void>) {
    this.handler = handler;
  }

  /** Tasks queued but not yet settled, including the one running. */
  get size(): number {
    return this.pending;
  }

  enqueue(task: T): void {
    this.pending++;
    this.tail = this.tail.then(() => this.run(task));
  }

  /** Resolves once every task queued so far has settled. */
  onIdle(): Promise<void> {
    return this.tail;
  }

  private async run(task: T): Promise<void> {
    try {
      await this.handler(task);
    } catch (err) {
      logger.error({ task, error: err instanceof Error ? err.message : String(err) }, "Task failed");
    } finally {
      this.pending--;
    }
  }
}
