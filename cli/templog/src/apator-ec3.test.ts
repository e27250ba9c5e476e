import { afterEach, describe, expect, it, vi } from "vitest";
import { Ec3Meter, MeterDriver, parseEc3Telegram, TariffPowerTracker, type MeterPort, type MeterTotals } from "./apator-ec3.js";

const T0 = 1_700_000_000_000;
const HOUR = 3_600_000;

function telegram(high: number, low: number): string {
  const reg = (v: number) => v.toFixed(3).padStart(11, "0");
  return `/APT5EC3\r\n\x02C.1.0(07215391)\r\n1.8.1*00(${reg(high)}*kWh)\r\n1.8.2*00(${reg(low)}*kWh)\r\n!\r\n\x03\x15`;
}

const totals = (highKwh: number | null, lowKwh: number | null): MeterTotals => ({
  highKwh,
  lowKwh,
  totalKwh: highKwh !== null && lowKwh !== null ? highKwh + lowKwh : null,
});

class ScriptedPort implements MeterPort {
  readonly path = "/dev/ttyUSB0";
  closed = 0;

  constructor(private replies: Array<string | Error>, private repeatLast = false) {}

  async request(): Promise<string> {
    const next = this.repeatLast && this.replies.length === 1 ? this.replies[0] : this.replies.shift();
    if (next === undefined) throw new Error("no reply");
    if (next instanceof Error) throw next;
    return next;
  }

  async close() {
    this.closed += 1;
  }
}

describe("parseEc3Telegram", () => {
  it("reads both tariff registers", () => {
    const parsed = parseEc3Telegram("/APT5EC3\r\n\x021.8.1*00(0012345.678*kWh)\r\n1.8.2*00(0000042.100*kWh)\r\n!\r\n\x03\x7f");
    expect(parsed.highKwh).toBe(12345.678);
    expect(parsed.lowKwh).toBe(42.1);
    expect(parsed.totalKwh).toBeCloseTo(12387.778, 6);
  });

  it("leaves out registers it cannot read", () => {
    expect(parseEc3Telegram("1.8.1*00(0000100.000*kWh)\r\n")).toEqual({ highKwh: 100, lowKwh: null, totalKwh: null });
    expect(parseEc3Telegram("1.8.1*00(abc*kWh)\r\n1.8.2*00()\r\n")).toEqual({ highKwh: null, lowKwh: null, totalKwh: null });
    expect(parseEc3Telegram("")).toEqual({ highKwh: null, lowKwh: null, totalKwh: null });
  });
});

describe("TariffPowerTracker", () => {
  it("derives the high tariff power from register steps", () => {
    const tracker = new TariffPowerTracker();
    let t = T0;
    tracker.update(totals(null, null), t);
    expect(tracker.highW).toBeNull();

    tracker.update(totals(2000, 1000), t);
    expect(tracker.highW).toBeNull();

    t += HOUR;
    tracker.update(totals(2000.1, 1000), t);
    expect(tracker.highW).toBeCloseTo(100, 6);

    t += 600_000;
    tracker.lowW = 123;
    tracker.update(totals(2000.1, 1000), t);
    expect(tracker.highW).toBeCloseTo(100, 6);
    expect(tracker.lowW).toBe(123);

    t += 600_000;
    tracker.update(totals(2000.2, 1000), t);
    expect(tracker.highW).toBeCloseTo(300, 6);

    t += 100_000;
    tracker.update(totals(null, null), t);
    expect(tracker.highW).toBeCloseTo(300, 6);

    t += 500_000;
    tracker.lowW = 123;
    tracker.update(totals(2001.2, 1000), t);
    expect(tracker.highW).toBeCloseTo(6000, 6);
    expect(tracker.lowW).toBe(0);
    expect(tracker.powerW).toBeCloseTo(6000, 6);
  });

  it("switches to the low tariff when its register moves", () => {
    const tracker = new TariffPowerTracker();
    tracker.update(totals(2000, 1000), T0);
    expect(tracker.powerW).toBeNull();

    tracker.update(totals(2000, 1000.1), T0 + HOUR);
    expect(tracker.lowW).toBeCloseTo(100, 6);
    expect(tracker.powerW).toBeCloseTo(100, 6);

    tracker.highW = 123;
    tracker.update(totals(2000, 1001.1), T0 + HOUR + 600_000);
    expect(tracker.lowW).toBeCloseTo(6000, 6);
    expect(tracker.highW).toBe(0);
  });
});

describe("Ec3Meter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("serves the values of the latest readout", async () => {
    const clock = { t: T0 };
    const port = new ScriptedPort([telegram(2000, 1000), telegram(2000.5, 1000)]);
    const meter = new Ec3Meter(port, { intervalMs: 30_000, clock: () => clock.t });
    const signal = new AbortController().signal;

    expect(() => meter.value("total")).toThrow("meter on /dev/ttyUSB0: no readout yet");

    expect(await meter.poll(signal)).toBe(true);
    expect(meter.value("high")).toBe(2000);
    expect(meter.value("low")).toBe(1000);
    expect(meter.value("total")).toBe(3000);
    expect(() => meter.value("power")).toThrow("meter on /dev/ttyUSB0: no power value");

    clock.t += 30 * 60_000;
    expect(await meter.poll(signal)).toBe(true);
    expect(meter.value("total")).toBe(3000.5);
    expect(meter.value("power")).toBe(1000);

    clock.t += 90_001;
    expect(() => meter.value("total")).toThrow("meter on /dev/ttyUSB0: last readout is stale");
  });

  it("reports a failed readout until the next one succeeds", async () => {
    const port = new ScriptedPort([new Error("framing error"), telegram(10, 20)]);
    const meter = new Ec3Meter(port, { intervalMs: 30_000, clock: () => T0 });
    const signal = new AbortController().signal;

    expect(await meter.poll(signal)).toBe(false);
    expect(() => meter.value("total")).toThrow("meter on /dev/ttyUSB0: framing error");
    expect(port.closed).toBe(1);
    expect(meter.getCounters()).toEqual({ polls: 1, failures: 1 });

    expect(await meter.poll(signal)).toBe(true);
    expect(meter.value("total")).toBe(30);
  });

  it("rejects a readout without tariff registers", async () => {
    const meter = new Ec3Meter(new ScriptedPort(["/APT5EC3\r\n!\r\n\x03\x15"]), { intervalMs: 30_000, clock: () => T0 });
    expect(await meter.poll(new AbortController().signal)).toBe(false);
    expect(() => meter.value("high")).toThrow("meter on /dev/ttyUSB0: readout holds no 1.8.x register");
  });

  it("polls while any source maps it and closes the port after the last", async () => {
    vi.useFakeTimers();
    const port = new ScriptedPort([telegram(2000, 1000)], true);
    const meter = new Ec3Meter(port, { intervalMs: 30_000, clock: () => T0 });
    const total = new MeterDriver(meter, "total");
    const power = new MeterDriver(meter, "power");

    await expect(total.read()).rejects.toMatchObject({ reason: "unavailable" });
    await vi.advanceTimersByTimeAsync(0);
    expect(await total.read()).toBe(3000);
    await expect(power.read()).rejects.toMatchObject({ reason: "unavailable" });

    await vi.advanceTimersByTimeAsync(30_000);
    expect(meter.getCounters()).toEqual({ polls: 2, failures: 0 });

    await total.close();
    expect(port.closed).toBe(0);
    await power.close();
    expect(port.closed).toBe(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(meter.getCounters().polls).toBe(2);
  });
});
