import { describeError } from "./errors.js";
import { createLogger, RateLimitedLog } from "./log.js";
import { delay } from "./util.js";

const log = createLogger("queue");

export type WorkQueueOptions = {
  name: string;
  capacity: number;
  logIntervalMs?: number;
};

export type WorkQueueCounters = {
  queued: number;
  processed: number;
  failed: number;
  dropped: number;
};

/**
 * Bounded FIFO drained by a single consumer task. A full queue drops its
 * oldest item instead of pushing back on the producer.
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private wake?: () => void;
  private consumer?: Promise<void>;
  private closed = false;
  private counters = { processed: 0, failed: 0, dropped: 0 };
  private dropLog: RateLimitedLog;
  private failLog: RateLimitedLog;

  constructor(private handler: (item: T) => Promise<void>, private options: WorkQueueOptions) {
    const interval = options.logIntervalMs ?? 60_000;
    this.dropLog = new RateLimitedLog((msg) => log.warn(msg), interval);
    this.failLog = new RateLimitedLog((msg) => log.error(msg), interval);
  }

  /** Starts the consumer; a drained queue accepts work again. */
  start() {
    this.closed = false;
    this.consumer ??= this.run().finally(() => {
      this.consumer = undefined;
    });
  }

  push(item: T): boolean {
    if (this.closed) return false;
    let accepted = true;
    if (this.items.length >= this.options.capacity) {
      this.items.shift();
      this.counters.dropped += 1;
      this.dropLog.emit(`${this.options.name} queue full (${this.options.capacity}), dropped oldest item; ${this.counters.dropped} dropped so far`);
      accepted = false;
    }
    this.items.push(item);
    this.wake?.();
    return accepted;
  }

  get size(): number {
    return this.items.length;
  }

  getCounters(): WorkQueueCounters {
    return { queued: this.items.length, ...this.counters };
  }

  /**
   * Stops accepting work and waits up to `graceMs` for the backlog.
   * Whatever is still queued after the grace period is discarded.
   */
  async drain(graceMs: number): Promise<boolean> {
    this.closed = true;
    this.wake?.();
    if (!this.consumer) {
      const leftover = this.items.length;
      this.items = [];
      return leftover === 0;
    }
    const timeout = new AbortController();
    const finished = await Promise.race([
      this.consumer.then(() => true),
      delay(graceMs, timeout.signal).then(() => false),
    ]);
    timeout.abort();
    if (!finished) {
      log.warn(`${this.options.name} queue: grace period over, discarding ${this.items.length} item(s)`);
      this.items = [];
    }
    return finished;
  }

  private async run() {
    for (;;) {
      if (this.items.length === 0) {
        if (this.closed) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = undefined;
        continue;
      }
      const [item] = this.items.splice(0, 1);
      try {
        await this.handler(item);
        this.counters.processed += 1;
      } catch (err) {
        this.counters.failed += 1;
        this.failLog.emit(`${this.options.name}: ${describeError(err)}`);
      }
    }
  }
}
