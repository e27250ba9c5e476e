import type { SensorDriver } from "./drivers.js";
import { describeError, SensorFault } from "./errors.js";
import { createLogger, RateLimitedLog } from "./log.js";
import type { MeterValue } from "./schema.js";
import { delay, nowMs } from "./util.js";

const log = createLogger("meter");

/** Watt per (kWh per millisecond). */
const KWH_PER_MS_TO_W = 3.6e9;

export type MeterTotals = {
  highKwh: number | null;
  lowKwh: number | null;
  totalKwh: number | null;
};


/** One request/response exchange with the meter's optical port. */
export interface MeterPort {
  readonly path: string;
  request(signal: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

const FRAME_CHARS = "\x02\x03\r\n \t";

function trimFrame(line: string): string {
  let start = 0;
  let end = line.length;
  while (start < end && FRAME_CHARS.includes(line[start])) start += 1;
  while (end > start && FRAME_CHARS.includes(line[end - 1])) end -= 1;
  return line.slice(start, end);
}

function registerValue(line: string): number | null {
  const open = line.indexOf("(");
  const close = line.indexOf(")", open + 1);
  if (open === -1 || close === -1) return null;
  const [number = ""] = line.slice(open + 1, close).split("*");
  if (number.trim() === "") return null;
  const value = Number(number);
  return Number.isFinite(value) ? value : null;
}

/**
 * Extracts the two tariff registers (OBIS 1.8.1 and 1.8.2) from an IEC
 * 62056-21 readout. Registers that are missing or unreadable come back null;
 * the total only exists when both tariffs do.
 */
export function parseEc3Telegram(raw: string): MeterTotals {
  let highKwh: number | null = null;
  let lowKwh: number | null = null;
  for (const line of raw.split("\n")) {
    const cleaned = trimFrame(line);
    if (cleaned.startsWith("1.8.1*")) highKwh = registerValue(cleaned);
    else if (cleaned.startsWith("1.8.2*")) lowKwh = registerValue(cleaned);
  }
  const totalKwh = highKwh !== null && lowKwh !== null ? highKwh + lowKwh : null;
  return { highKwh, lowKwh, totalKwh };
}

/**
 * Derives the current power from the energy registers. A register only moves
 * in whole meter increments, so the power is the last increment divided by
 * the time since the register moved before. Only one tariff counts at a time:
 * a step on one register zeroes the power of the other.
 */
export class TariffPowerTracker {
  highW: number | null = null;
  lowW: number | null = null;
  private prevHigh: number | null = null;
  private prevLow: number | null = null;
  private highSince = 0;
  private lowSince = 0;

  update(totals: MeterTotals, timestamp: number) {
    const high = totals.highKwh;
    if (high !== null && high !== this.prevHigh) {
      if (this.prevHigh !== null) {
        this.highW = ((high - this.prevHigh) * KWH_PER_MS_TO_W) / (timestamp - this.highSince);
        this.lowW = 0;
      }
      this.prevHigh = high;
      this.highSince = timestamp;
    }
    const low = totals.lowKwh;
    if (low !== null && low !== this.prevLow) {
      if (this.prevLow !== null) {
        this.lowW = ((low - this.prevLow) * KWH_PER_MS_TO_W) / (timestamp - this.lowSince);
        this.highW = 0;
      }
      this.prevLow = low;
      this.lowSince = timestamp;
    }
  }

  /** Power of whichever tariff is active; null until a register has moved twice. */
  get powerW(): number | null {
    if (this.highW === null && this.lowW === null) return null;
    return (this.highW ?? 0) + (this.lowW ?? 0);
  }
}

export type Ec3MeterOptions = {
  intervalMs: number;
  /** Snapshots older than this are not served; defaults to three intervals. */
  maxAgeMs?: number;
  clock?: () => number;
};

export type MeterCounters = {
  polls: number;
  failures: number;
};

/**
 * Apator EC3 electricity meter. The meter answers slowly (seconds per
 * readout), so it is polled on its own interval and sources read the latest
 * snapshot. Several sources may map values of the same meter.
 */
export class Ec3Meter {
  private totals?: MeterTotals;
  private takenAt?: number;
  private lastError?: string;
  private tracker = new TariffPowerTracker();
  private users = 0;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private counters: MeterCounters = { polls: 0, failures: 0 };
  private failLog = new RateLimitedLog((msg) => log.warn(msg));
  private clock: () => number;

  constructor(private port: MeterPort, private options: Ec3MeterOptions) {
    this.clock = options.clock ?? nowMs;
  }

  get path(): string {
    return this.port.path;
  }

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  getCounters(): MeterCounters {
    return { ...this.counters };
  }

  /** Registers a user; the first one starts polling. */
  attach() {
    this.users += 1;
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    log.info(`polling meter on ${this.port.path} every ${this.options.intervalMs} ms`);
    this.loop = this.run(controller.signal);
  }

  /** Drops a user; the last one stops polling and closes the port. */
  async detach() {
    if (this.users === 0) return;
    this.users -= 1;
    if (this.users > 0) return;
    this.controller?.abort();
    this.controller = undefined;
    await this.loop;
    this.loop = undefined;
    await this.closePort();
  }

  /** One readout; failures are recorded, never thrown. */
  async poll(signal: AbortSignal): Promise<boolean> {
    this.counters.polls += 1;
    const startedAt = this.clock();
    try {
      const raw = await this.port.request(signal);
      const totals = parseEc3Telegram(raw);
      if (totals.highKwh === null && totals.lowKwh === null) {
        throw new SensorFault("malformed", "readout holds no 1.8.x register");
      }
      this.totals = totals;
      this.takenAt = startedAt;
      this.lastError = undefined;
      this.tracker.update(totals, startedAt);
      return true;
    } catch (err) {
      if (signal.aborted) {
        await this.closePort();
        return false;
      }
      this.counters.failures += 1;
      this.lastError = describeError(err);
      this.failLog.emit(`meter on ${this.port.path}: ${this.lastError}`);
      await this.closePort();
      return false;
    }
  }

  value(kind: MeterValue): number {
    const totals = this.totals;
    if (this.lastError !== undefined) {
      throw new SensorFault("unavailable", `meter on ${this.port.path}: ${this.lastError}`);
    }
    if (!totals || this.takenAt === undefined) {
      throw new SensorFault("unavailable", `meter on ${this.port.path}: no readout yet`);
    }
    const maxAge = this.options.maxAgeMs ?? this.options.intervalMs * 3;
    if (this.clock() - this.takenAt > maxAge) {
      throw new SensorFault("unavailable", `meter on ${this.port.path}: last readout is stale`);
    }
    const picked = pick(kind, totals, this.tracker);
    if (picked === null) {
      throw new SensorFault(kind === "power" ? "unavailable" : "malformed", `meter on ${this.port.path}: no ${kind} value`);
    }
    return picked;
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      await this.poll(signal);
      if (!(await delay(this.options.intervalMs, signal))) break;
    }
  }

  private async closePort() {
    try {
      await this.port.close();
    } catch (err) {
      log.warn(`closing ${this.port.path} failed: ${describeError(err)}`);
    }
  }
}

function pick(kind: MeterValue, totals: MeterTotals, tracker: TariffPowerTracker): number | null {
  switch (kind) {
    case "total":
      return totals.totalKwh;
    case "high":
      return totals.highKwh;
    case "low":
      return totals.lowKwh;
    case "power":
      return tracker.powerW;
  }
}

/** Maps one value of a shared meter onto a source. */
export class MeterDriver implements SensorDriver {
  readonly kind = "apator-ec3";
  private attached = false;

  constructor(private meter: Ec3Meter, private field: MeterValue) {}

  async read(): Promise<number> {
    if (!this.attached) {
      this.meter.attach();
      this.attached = true;
    }
    return this.meter.value(this.field);
  }

  async close() {
    if (!this.attached) return;
    this.attached = false;
    await this.meter.detach();
  }
}
