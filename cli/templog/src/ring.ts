import type { Reading } from "./schema.js";

export type HistoryRingOptions = {
  windowMs: number;
  maxSamples: number;
};

/**
 * Timestamp-ordered history bounded by age and by sample count.
 * Every entry keeps an absolute sequence number so iterators stay valid
 * while the writer appends and evicts underneath them.
 */
export class HistoryRing {
  private items: Reading[] = [];
  private head = 0;
  private base = 0;
  private rejectedCount = 0;

  constructor(private options: HistoryRingOptions) {}

  get size(): number {
    return this.items.length - this.head;
  }

  get rejected(): number {
    return this.rejectedCount;
  }

  oldest(): Reading | undefined {
    return this.size > 0 ? this.items[this.head] : undefined;
  }

  newest(): Reading | undefined {
    return this.size > 0 ? this.items[this.items.length - 1] : undefined;
  }

  /** Appends unless the reading is older than the newest entry. */
  push(reading: Reading): boolean {
    const newest = this.newest();
    if (newest && reading.timestamp < newest.timestamp) {
      this.rejectedCount += 1;
      return false;
    }
    this.items.push(reading);
    this.evict(reading.timestamp);
    return true;
  }

  /** Merges readings that predate the current contents, e.g. replayed from disk. */
  prepend(readings: Reading[]): number {
    const oldest = this.oldest();
    const older = readings
      .filter((r) => !oldest || r.timestamp < oldest.timestamp)
      .sort((a, b) => a.timestamp - b.timestamp);
    if (older.length === 0) return 0;
    const live = this.items.slice(this.head);
    this.base = this.base + this.head - older.length;
    this.items = [...older, ...live];
    this.head = 0;
    const newest = this.newest();
    if (newest) this.evict(newest.timestamp);
    return older.length;
  }

  evict(now: number): number {
    const horizon = now - this.options.windowMs;
    let evicted = 0;
    while (this.size > 0 && (this.size > this.options.maxSamples || this.items[this.head].timestamp < horizon)) {
      this.head += 1;
      evicted += 1;
    }
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.base += this.head;
      this.head = 0;
    }
    return evicted;
  }

  /**
   * Lazy view of the entries with timestamp >= since, oldest first.
   * Each iteration starts over and ends at the newest entry present when it began.
   */
  since(since = Number.NEGATIVE_INFINITY): Iterable<Reading> {
    const ring = this;
    return {
      *[Symbol.iterator]() {
        const end = ring.base + ring.items.length;
        let seq = ring.firstSeqAtOrAfter(since);
        while (seq < end) {
          seq = Math.max(seq, ring.base + ring.head);
          if (seq >= end) return;
          yield ring.items[seq - ring.base];
          seq += 1;
        }
      },
    };
  }

  toArray(since?: number): Reading[] {
    return Array.from(this.since(since));
  }

  private firstSeqAtOrAfter(since: number): number {
    let lo = this.head;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.items[mid].timestamp < since) lo = mid + 1;
      else hi = mid;
    }
    return this.base + lo;
  }
}
