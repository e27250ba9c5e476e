import { ConfigurationFault, describeError } from "./errors.js";
import { createLogger } from "./log.js";
import { withStatus } from "./readings.js";
import { HistoryRing } from "./ring.js";
import type { Reading, SourceDescriptor } from "./schema.js";
import { nowMs } from "./util.js";

const log = createLogger("store");

export type StoreOptions = {
  historyWindowMs: number;
  maxSamples: number;
  /** Ok readings older than this are reported as stale by latest(). */
  staleAfterMs: number;
  clock?: () => number;
};

export type ReadingListener = (sourceId: string, reading: Reading) => void;

type Entry = {
  descriptor: SourceDescriptor;
  latest?: Reading;
  ring: HistoryRing;
  updates: number;
};

export type StoreEntryStats = {
  id: string;
  samples: number;
  rejected: number;
  updates: number;
  latest_ts: number | null;
};

/**
 * Latest reading plus a bounded history per source.
 * Every mutation runs synchronously, so readers on the event loop never see
 * an entry between its latest slot and its history being updated.
 */
export class MeasurementStore {
  private entries = new Map<string, Entry>();
  private listeners = new Set<ReadingListener>();
  private clock: () => number;

  constructor(private options: StoreOptions) {
    this.clock = options.clock ?? nowMs;
  }

  register(descriptor: SourceDescriptor) {
    if (this.entries.has(descriptor.id)) {
      throw new ConfigurationFault(`duplicate source id "${descriptor.id}"`);
    }
    this.entries.set(descriptor.id, {
      descriptor,
      ring: new HistoryRing({ windowMs: this.options.historyWindowMs, maxSamples: this.options.maxSamples }),
      updates: 0,
    });
  }

  sources(): SourceDescriptor[] {
    return Array.from(this.entries.values(), (e) => e.descriptor);
  }

  has(sourceId: string): boolean {
    return this.entries.has(sourceId);
  }

  update(sourceId: string, reading: Reading) {
    const entry = this.entries.get(sourceId);
    if (!entry) throw new Error(`unknown source "${sourceId}"`);
    entry.latest = reading;
    entry.updates += 1;
    if (!entry.ring.push(reading)) {
      log.debug(`${sourceId}: reading at ${reading.timestamp} predates history, kept as latest only`);
    }
    for (const listener of this.listeners) {
      try {
        listener(sourceId, reading);
      } catch (err) {
        log.warn(`reading listener failed: ${describeError(err)}`);
      }
    }
  }

  latest(sourceId: string): Reading | undefined {
    const reading = this.entries.get(sourceId)?.latest;
    if (!reading) return undefined;
    if (reading.status === "ok" && this.clock() - reading.timestamp > this.options.staleAfterMs) {
      return withStatus(reading, "stale");
    }
    return reading;
  }

  history(sourceId: string, since?: number): Iterable<Reading> {
    const entry = this.entries.get(sourceId);
    if (!entry) return [];
    // a silent source is not evicted by its own appends
    entry.ring.evict(this.clock());
    return entry.ring.since(since);
  }

  /** Seeds history with replayed readings; returns how many were taken. */
  preload(sourceId: string, readings: Reading[]): number {
    const entry = this.entries.get(sourceId);
    if (!entry) return 0;
    const horizon = this.clock() - this.options.historyWindowMs;
    return entry.ring.prepend(readings.filter((r) => r.timestamp >= horizon));
  }

  subscribe(listener: ReadingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  stats(): StoreEntryStats[] {
    return Array.from(this.entries.values(), (e) => ({
      id: e.descriptor.id,
      samples: e.ring.size,
      rejected: e.ring.rejected,
      updates: e.updates,
      latest_ts: e.latest?.timestamp ?? null,
    }));
  }
}
