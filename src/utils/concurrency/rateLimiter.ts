/**
 * Minimum-interval rate limiter
 *
 * Callers reserve request slots spaced at least `minIntervalMs` apart, so
 * concurrent waiters sharing one limiter never fire together.
 */

import { sleep } from "@/utils/backoff";

export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Wait for this caller's slot
   *
   * @throws {RunCancelledError} If the signal fires while waiting
   */
  async wait(signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    await sleep(slot - current, signal);
  }
}
