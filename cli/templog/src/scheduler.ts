import { describeError } from "./errors.js";
import { createLogger } from "./log.js";
import type { Reading, SourceCounters } from "./schema.js";
import type { SignalSource } from "./signal-source.js";
import type { MeasurementStore } from "./store.js";
import { delay, nowMs } from "./util.js";

const log = createLogger("scheduler");

export type SchedulerOptions = {
  intervalMs: number;
  readTimeoutMs: number;
  clock?: () => number;
};

/** Called after the store took a reading; must not block. */
export type ReadingSink = (source: SignalSource, reading: Reading) => void;

/**
 * One polling loop per source at a fixed period. A slow or failing sensor
 * only delays its own loop; sources on one exclusive channel queue on the
 * channel's lock inside their drivers.
 */
export class Scheduler {
  private controller?: AbortController;
  private loops: Promise<void>[] = [];
  private counters = new Map<string, SourceCounters>();
  private clock: () => number;

  constructor(
    private sources: SignalSource[],
    private store: MeasurementStore,
    private sinks: ReadingSink[],
    private options: SchedulerOptions
  ) {
    this.clock = options.clock ?? nowMs;
    for (const source of sources) this.counters.set(source.id, { cycles: 0, ok: 0, errors: 0 });
  }

  get running(): boolean {
    return this.controller !== undefined;
  }

  start() {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    const startedAt = this.clock();
    log.info(`polling ${this.sources.length} source(s) every ${this.options.intervalMs} ms`);
    this.loops = this.sources.map((source) => this.loop(source, startedAt, controller.signal));
  }

  /** Stops scheduling; resolves once every in-flight read has settled. */
  async stop() {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = undefined;
    log.info("polling stopped");
  }

  /** Polls every source once, concurrently. */
  async runCycle(): Promise<Reading[]> {
    return Promise.all(this.sources.map((source) => this.pollOnce(source)));
  }

  async pollOnce(source: SignalSource): Promise<Reading> {
    const reading = await source.read(this.options.readTimeoutMs);
    this.store.update(source.id, reading);
    const counters = this.counters.get(source.id);
    if (counters) {
      counters.cycles += 1;
      if (reading.status === "ok") counters.ok += 1;
      else counters.errors += 1;
    }
    for (const sink of this.sinks) {
      try {
        sink(source, reading);
      } catch (err) {
        log.error(`${source.id}: reading sink failed: ${describeError(err)}`);
      }
    }
    return reading;
  }

  getCounters(): Record<string, SourceCounters> {
    const out: Record<string, SourceCounters> = {};
    for (const [id, counters] of this.counters) out[id] = { ...counters };
    return out;
  }

  private async loop(source: SignalSource, startedAt: number, signal: AbortSignal) {
    const interval = this.options.intervalMs;
    let slot = 0;
    while (!signal.aborted) {
      try {
        await this.pollOnce(source);
      } catch (err) {
        log.error(`${source.id}: poll failed: ${describeError(err)}`);
      }
      const now = this.clock();
      // ticks stay on the start-aligned grid; overrun slots are skipped, not replayed
      slot = Math.max(slot + 1, Math.floor((now - startedAt) / interval) + 1);
      if (!(await delay(startedAt + slot * interval - now, signal))) break;
    }
  }
}
