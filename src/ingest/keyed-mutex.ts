/**
 * KeyedMutex - one holder per key, waiters served first come first served
 *
 * Used to serialize ingestion runs of the same dataset while runs of
 * different datasets proceed in parallel.
 */

import { LockTimeoutError } from "../errors.js";

export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  timer: NodeJS.Timeout | undefined;
}

export class KeyedMutex {
  private readonly held = new Set<string>();
  private readonly waiters = new Map<string, Waiter[]>();

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  /** Number of callers queued behind the current holder */
  waiting(key: string): number {
    return this.waiters.get(key)?.length ?? 0;
  }

  /**
   * Wait for the lock on `key`. Rejects with LockTimeoutError when it is not
   * granted within `timeoutMs`; without a timeout the caller waits forever.
   */
  acquire(key: string, timeoutMs?: number): Promise<Release> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.waiters.get(key) ?? [];
      const waiter: Waiter = { grant: resolve, timer: undefined };

      if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          const current = this.waiters.get(key) ?? [];
          const index = current.indexOf(waiter);
          if (index !== -1) {
            current.splice(index, 1);
            if (current.length === 0) {
              this.waiters.delete(key);
            }
          }
          reject(new LockTimeoutError(key, timeoutMs));
        }, timeoutMs);
      }

      queue.push(waiter);
      this.waiters.set(key, queue);
    });
  }

  async runExclusive<T>(
    key: string,
    task: () => Promise<T>,
    timeoutMs?: number
  ): Promise<T> {
    const release = await this.acquire(key, timeoutMs);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const queue = this.waiters.get(key);
      const next = queue?.shift();
      if (queue !== undefined && queue.length === 0) {
        this.waiters.delete(key);
      }
      if (next === undefined) {
        this.held.delete(key);
        return;
      }
      clearTimeout(next.timer);
      next.grant(this.releaser(key));
    };
  }
}
