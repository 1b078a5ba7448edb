/**
 * Per-domain request pacing
 *
 * Each domain gets its own slot timeline. Slots are reserved synchronously,
 * so concurrent callers for the same domain are spaced by the interval
 * instead of all waking at once.
 */

import { sleep } from './retry.js';

export class DomainRateLimiter {
  private readonly nextSlot = new Map<string, number>();
  private readonly overrides = new Map<string, number>();

  constructor(private readonly minIntervalMs: number) {}

  /**
   * Use a longer interval for one domain (e.g. robots.txt Crawl-delay)
   */
  setInterval(domain: string, intervalMs: number): void {
    this.overrides.set(domain, Math.max(this.minIntervalMs, intervalMs));
  }

  intervalFor(domain: string): number {
    return this.overrides.get(domain) ?? this.minIntervalMs;
  }

  /**
   * Milliseconds the caller must wait; reserves the slot
   */
  reserve(domain: string, now: number = Date.now()): number {
    const interval = this.intervalFor(domain);
    const slot = Math.max(now, this.nextSlot.get(domain) ?? now);
    this.nextSlot.set(domain, slot + interval);
    return slot - now;
  }

  async waitForSlot(domain: string): Promise<void> {
    const waitTime = this.reserve(domain);
    if (waitTime > 0) {
      await sleep(waitTime);
    }
  }
}
