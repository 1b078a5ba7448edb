/**
 * Crawl frontier
 *
 * Visited set plus per-URL state. `tryAdd` checks and inserts in one
 * synchronous step, so a URL is enqueued at most once and the first discovery
 * fixes its depth.
 */

import type { FrontierEntry, FrontierState, PageType } from '../types/index.js';
import { normalizeUrl } from '../utils/url.js';

const TRANSITIONS: Record<FrontierState, readonly FrontierState[]> = {
  enqueued: ['visiting', 'skipped'],
  visiting: ['extracted', 'skipped', 'failed'],
  extracted: [],
  skipped: [],
  failed: [],
};

export class Frontier {
  private readonly entries = new Map<string, FrontierEntry>();

  /**
   * Returns the new entry, or null when the URL was already known or does
   * not parse
   */
  tryAdd(url: string, depth: number, pageType: PageType, discoveredFrom?: string): FrontierEntry | null {
    const key = normalizeUrl(url);
    if (!key || this.entries.has(key)) {
      return null;
    }

    const entry: FrontierEntry = {
      url: key,
      depth,
      pageType,
      state: 'enqueued',
      ...(discoveredFrom ? { discoveredFrom } : {}),
    };
    this.entries.set(key, entry);
    return entry;
  }

  has(url: string): boolean {
    const key = normalizeUrl(url);
    return key !== null && this.entries.has(key);
  }

  get(url: string): FrontierEntry | undefined {
    const key = normalizeUrl(url);
    return key ? this.entries.get(key) : undefined;
  }

  /**
   * Move an entry forward. Unknown URLs and backward moves are ignored and
   * reported as false.
   */
  transition(url: string, next: FrontierState): boolean {
    const entry = this.get(url);
    if (!entry || !TRANSITIONS[entry.state].includes(next)) {
      return false;
    }
    entry.state = next;
    return true;
  }

  countByState(): Record<FrontierState, number> {
    const counts: Record<FrontierState, number> = {
      enqueued: 0,
      visiting: 0,
      extracted: 0,
      skipped: 0,
      failed: 0,
    };
    for (const entry of this.entries.values()) {
      counts[entry.state] += 1;
    }
    return counts;
  }

  get size(): number {
    return this.entries.size;
  }
}
