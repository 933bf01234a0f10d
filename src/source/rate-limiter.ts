/**
 * Minimum-interval rate limiter keyed by upstream host.
 *
 * One instance is shared by every run in the process, so parallel datasets
 * hitting the same host still queue behind a single request slot.
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export class HostRateLimiter {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: Sleep = sleep
  ) {}

  /**
   * Reserve the next request slot for `host` and wait for it.
   * Returns how long the caller waited.
   */
  async acquire(host: string): Promise<number> {
    const now = this.now();
    // Reserve synchronously so concurrent callers get distinct slots
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.minIntervalMs);

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.wait(waitMs);
    }
    return waitMs;
  }

  get intervalMs(): number {
    return this.minIntervalMs;
  }
}
