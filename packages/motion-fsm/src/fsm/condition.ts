/**
 * Broadcast-only condition for awaiting engine state
 *
 * There is no per-predicate signalling: every notifyAll() wakes every
 * waiter, and each waiter re-checks its own predicate. A waiter whose
 * predicate still fails keeps waiting.
 */

export interface WaitOptions {
  /** Milliseconds; 0 or undefined waits forever */
  timeout?: number;
  signal?: AbortSignal;
}

interface Waiter {
  check: () => boolean;
}

export class Condition {
  private waiters = new Set<Waiter>();

  get waiterCount(): number {
    return this.waiters.size;
  }

  /**
   * Resolve true once `predicate` holds after a broadcast (or immediately),
   * false on timeout or abort.
   */
  wait(predicate: () => boolean, options: WaitOptions = {}): Promise<boolean> {
    const { timeout = 0, signal } = options;

    if (predicate()) {
      return Promise.resolve(true);
    }
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (result: boolean): void => {
        this.waiters.delete(waiter);
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const onAbort = (): void => settle(false);

      const waiter: Waiter = {
        check: () => {
          if (!predicate()) {
            return false;
          }
          settle(true);
          return true;
        },
      };

      this.waiters.add(waiter);

      if (timeout > 0) {
        timer = setTimeout(() => settle(false), timeout);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Wake every waiter; returns how many were released
   */
  notifyAll(): number {
    let released = 0;
    for (const waiter of Array.from(this.waiters)) {
      if (waiter.check()) {
        released++;
      }
    }
    return released;
  }
}
