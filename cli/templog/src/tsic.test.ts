import { describe, expect, it } from "vitest";
import { Mutex } from "./mutex.js";
import type { EdgeWatch, GpioBackend, GpioEdge } from "./pigpio.js";
import { tickDiff, TSIC_MODELS, TsicDriver, ZacWireDecoder, type ZacWirePacket } from "./tsic.js";

const STROBE_US = 62;
const BIT_US = 125;

/** Edges of one ZACWire packet: idle high, then per byte a strobe, 8 data bits MSB first and even parity. */
function encodePacket(bytes: number[], start: number, corruptParity = false): GpioEdge[] {
  const edges: GpioEdge[] = [];
  let t = start;
  edges.push({ level: 1, tick: t });
  t += 2000;
  bytes.forEach((byte, index) => {
    if (index > 0) t += 200;
    edges.push({ level: 0, tick: t });
    t += STROBE_US;
    edges.push({ level: 1, tick: t });
    t += BIT_US - STROBE_US;
    const bits: number[] = [];
    for (let i = 7; i >= 0; i -= 1) bits.push((byte >> i) & 1);
    let parity = bits.reduce((sum, b) => sum + b, 0) % 2;
    if (corruptParity && index === 0) parity ^= 1;
    bits.push(parity);
    for (const bit of bits) {
      const low = bit ? 31 : 94;
      edges.push({ level: 0, tick: t });
      t += low;
      edges.push({ level: 1, tick: t });
      t += BIT_US - low;
    }
  });
  return edges;
}

function decode(edges: GpioEdge[], packetBytes?: number): ZacWirePacket[] {
  const packets: ZacWirePacket[] = [];
  const decoder = new ZacWireDecoder((p) => packets.push(p), packetBytes);
  for (const edge of edges) decoder.push(edge);
  return packets;
}

describe("ZacWireDecoder", () => {
  it("decodes a two-byte packet", () => {
    expect(decode(encodePacket([0x02, 0xcb], 1000), 2)).toEqual([{ status: "ok", bytes: [0x02, 0xcb] }]);
  });

  it("flushes a packet on a watchdog timeout", () => {
    const edges = [...encodePacket([0x07], 1000), { level: "timeout" as const, tick: 9000 }];
    expect(decode(edges)).toEqual([{ status: "ok", bytes: [0x07] }]);
  });

  it("flags a parity error", () => {
    expect(decode(encodePacket([0x02, 0xcb], 1000, true), 2)).toEqual([{ status: "parity", bytes: [0x02] }]);
  });

  it("ignores edges before the first idle gap", () => {
    const noise: GpioEdge[] = [
      { level: 0, tick: 10 },
      { level: 1, tick: 40 },
    ];
    expect(decode([...noise, ...encodePacket([0x02, 0xcb], 100)], 2)).toEqual([{ status: "ok", bytes: [0x02, 0xcb] }]);
  });

  it("measures across the tick counter wrap", () => {
    expect(tickDiff(0xffffff00, 0x10)).toBe(0x110);
    const start = 0xffffffff - 2500;
    const edges = encodePacket([0x02, 0xcb], start).map((e) => ({ ...e, tick: e.tick >>> 0 }));
    expect(decode(edges, 2)).toEqual([{ status: "ok", bytes: [0x02, 0xcb] }]);
  });
});

describe("TSIC_MODELS", () => {
  it("scales the raw value to the model's range", () => {
    expect(TSIC_MODELS["306"].toCelsius([0x07, 0xff])).toBe(150);
    expect(TSIC_MODELS["306"].toCelsius([0, 0])).toBe(-50);
    expect(TSIC_MODELS["506"].toCelsius([0x07, 0xff])).toBe(60);
    expect(TSIC_MODELS["716"].toCelsius([0x3f, 0xff])).toBe(60);
    expect(TSIC_MODELS["306"].toCelsius([0x02, 0xcb])).toBeCloseTo((715 / 2047) * 200 - 50, 9);
  });
});

class ScriptedGpio implements GpioBackend {
  closed = 0;
  watching = 0;

  constructor(private packets: GpioEdge[][]) {}

  async setInput() {}

  async readLevel(): Promise<0 | 1> {
    return 0;
  }

  async watchEdges(_gpio: number, onEdge: (edge: GpioEdge) => void): Promise<EdgeWatch> {
    this.watching += 1;
    const edges = this.packets.shift() ?? [];
    setTimeout(() => {
      for (const edge of edges) onEdge(edge);
    }, 0);
    return {
      close: async () => {
        this.closed += 1;
      },
    };
  }
}

describe("TsicDriver", () => {
  it("converts the first valid packet and releases the watch", async () => {
    const bad = encodePacket([0x02, 0xcb], 0, true);
    const good = encodePacket([0x02, 0xcb], 20_000);
    const gpio = new ScriptedGpio([[...bad, ...good]]);
    const lock = new Mutex();
    const driver = new TsicDriver(17, TSIC_MODELS["306"], gpio, lock);
    const value = await driver.read(new AbortController().signal);
    expect(value).toBeCloseTo((715 / 2047) * 200 - 50, 9);
    expect(driver.rejectedPackets).toBe(1);
    expect(gpio.closed).toBe(1);
    expect(lock.isLocked()).toBe(false);
  });

  it("times out when no packet arrives", async () => {
    const gpio = new ScriptedGpio([[]]);
    const driver = new TsicDriver(17, TSIC_MODELS["306"], gpio, new Mutex());
    const controller = new AbortController();
    const pending = driver.read(controller.signal);
    setTimeout(() => controller.abort(), 5);
    await expect(pending).rejects.toMatchObject({ reason: "timeout" });
    expect(gpio.closed).toBe(1);
  });

  it("reports a busy channel as a timeout", async () => {
    const lock = new Mutex();
    const release = await lock.acquire();
    const driver = new TsicDriver(17, TSIC_MODELS["306"], new ScriptedGpio([]), lock);
    const controller = new AbortController();
    const pending = driver.read(controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow("TSic 306 on GPIO 17: channel busy");
    release();
  });
});
