/**
 * Bounded pool that runs push tasks off the caller's stack
 */

import { DEFAULTS } from '../config/index.js';
import { InvalidArgument, WorkerPoolClosed } from '../errors/index.js';

/**
 * Runs at most `size` tasks at once. Submissions beyond that wait in FIFO order,
 * so a slow collector caps the number of outstanding requests instead of
 * multiplying them.
 */
export class WorkerPool {
  readonly size: number;
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private closed = false;

  constructor(size: number = DEFAULTS.WORKER_POOL_SIZE) {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidArgument(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /**
   * Queue a task. It always starts asynchronously, never inside this call.
   *
   * @returns settles with the task's result
   */
  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new WorkerPoolClosed());
    }

    return new Promise<T>((resolve, reject) => {
      const run = (): void => {
        this.active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.next();
          });
      };

      if (this.active < this.size) {
        run();
      } else {
        this.waiting.push(run);
      }
    });
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Resolves once no task is running or waiting
   */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Refuse new work and wait for everything already submitted
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private next(): void {
    const run = this.waiting.shift();
    if (run) {
      run();
      return;
    }
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
