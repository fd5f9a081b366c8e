/**
 * Synchronization strategies for engine operations
 *
 * `Passthrough` runs every task immediately. `Mutex` admits one task at a
 * time in FIFO order and holds the lock until the task settles, including
 * any awaited callbacks inside it. A task that awaits another task on the
 * same mutex never settles.
 */

export interface Synchronizer {
  /** True while a task holds the lock */
  readonly locked: boolean;

  run<R>(task: () => R | Promise<R>): Promise<R>;
}

export class Passthrough implements Synchronizer {
  readonly locked = false;

  async run<R>(task: () => R | Promise<R>): Promise<R> {
    return task();
  }
}

export class Mutex implements Synchronizer {
  private queue: Array<() => void> = [];
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  /** Number of tasks waiting for the lock */
  get pending(): number {
    return this.queue.length;
  }

  async run<R>(task: () => R | Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
      return;
    }
    this.held = false;
  }
}
