import { SensorFault } from "./errors.js";
import type { SensorDriver } from "./drivers.js";
import type { Mutex } from "./mutex.js";
import type { EdgeWatch, GpioBackend, GpioEdge } from "./pigpio.js";
import type { TsicModel } from "./schema.js";

export type ZacWireStatus = "ok" | "parity" | "bitCount";

export type ZacWirePacket = { status: ZacWireStatus; bytes: number[] };

/** Microseconds between two ticks of the daemon's wrapping 32-bit counter. */
export function tickDiff(from: number, to: number): number {
  return (to - from) >>> 0;
}

const PACKET_GAP_US = 1000;
const BYTE_GAP_US = 150;

/**
 * ZACWire receiver: bytes of 8 data bits plus an even parity bit, each byte
 * opened by a strobe whose low time separates 0-bits (longer low) from
 * 1-bits (shorter low). A high gap over 1 ms starts a new packet.
 */
export class ZacWireDecoder {
  private lastLowTick?: number;
  private lastHighTick?: number;
  private strobeTicks?: number;
  private parity = 0;
  private bitCount = 0;
  private bytes?: number[];

  /** With `packetBytes`, a packet is emitted as soon as that many bytes arrived. */
  constructor(private onPacket: (packet: ZacWirePacket) => void, private packetBytes?: number) {}

  push(edge: GpioEdge) {
    if (edge.level === "timeout") {
      this.flush("ok");
      this.reset();
      return;
    }
    if (edge.level === 0) this.falling(edge.tick);
    else this.rising(edge.tick);
  }

  private falling(tick: number) {
    if (this.lastHighTick !== undefined) {
      const highTicks = tickDiff(this.lastHighTick, tick);
      if (highTicks > PACKET_GAP_US) {
        this.flush("ok");
        this.bytes = [0];
        this.parity = 0;
        this.bitCount = 0;
        this.strobeTicks = undefined;
      } else if (this.bytes && highTicks > BYTE_GAP_US) {
        if (this.bitCount === 9) {
          this.bytes.push(0);
          this.strobeTicks = undefined;
          this.bitCount = 0;
          this.parity = 0;
        } else {
          this.flush("bitCount");
          this.reset();
        }
      }
    }
    this.lastLowTick = tick;
  }

  private rising(tick: number) {
    if (this.lastLowTick !== undefined && this.bytes) {
      const lowTicks = tickDiff(this.lastLowTick, tick);
      if (this.strobeTicks === undefined) {
        this.strobeTicks = lowTicks;
      } else {
        const bit = lowTicks > this.strobeTicks ? 0 : 1;
        const last = this.bytes.length - 1;
        if (this.bitCount < 8) this.bytes[last] = this.bytes[last] * 2 + bit;
        this.bitCount += 1;
        this.parity += bit;
        if (this.bitCount === 9) {
          if (this.parity % 2 !== 0) {
            this.flush("parity");
            this.reset();
          } else if (this.packetBytes !== undefined && this.bytes.length >= this.packetBytes) {
            this.flush("ok");
            this.reset();
          }
        } else if (this.bitCount > 9) {
          this.flush("bitCount");
          this.reset();
        }
      }
    }
    this.lastHighTick = tick;
  }

  private flush(status: ZacWireStatus) {
    if (!this.bytes) return;
    const bytes = this.bytes;
    this.bytes = undefined;
    this.onPacket({ status, bytes });
  }

  private reset() {
    this.bytes = undefined;
    this.strobeTicks = undefined;
    this.parity = 0;
    this.bitCount = 0;
  }
}

export type TsicType = {
  name: string;
  toCelsius(bytes: number[]): number;
};

function linear(bits: 11 | 14, low: number, high: number) {
  const full = bits === 11 ? 2047 : 16383;
  return (bytes: number[]) => ((bytes[0] * 256 + bytes[1]) / full) * (high - low) + low;
}

export const TSIC_MODELS: Record<TsicModel, TsicType> = {
  "206": { name: "TSic 206", toCelsius: linear(11, -50, 150) },
  "306": { name: "TSic 306", toCelsius: linear(11, -50, 150) },
  "506": { name: "TSic 506", toCelsius: linear(11, -10, 60) },
  "716": { name: "TSic 716", toCelsius: linear(14, -10, 60) },
};

/**
 * TSic sensor on a GPIO. The edge timing only decodes when nothing else
 * listens on the channel, so every read holds the channel's lock from
 * subscribing to the edges until they are released again.
 */
export class TsicDriver implements SensorDriver {
  readonly kind = "tsic";
  readonly channel: string;
  private prepared = false;
  private badPackets = 0;

  constructor(
    private gpio: number,
    private model: TsicType,
    private backend: GpioBackend,
    private lock: Mutex
  ) {
    this.channel = `gpio:${gpio}`;
  }

  get rejectedPackets(): number {
    return this.badPackets;
  }

  async read(signal: AbortSignal): Promise<number> {
    let release: () => void;
    try {
      release = await this.lock.acquire(signal);
    } catch {
      throw new SensorFault("timeout", `${this.model.name} on GPIO ${this.gpio}: channel busy`);
    }
    try {
      if (!this.prepared) {
        await this.backend.setInput(this.gpio);
        this.prepared = true;
      }
      return await this.receive(signal);
    } finally {
      release();
    }
  }

  private async receive(signal: AbortSignal): Promise<number> {
    const pending: { watch?: Promise<EdgeWatch>; detach?: () => void } = {};
    try {
      return await new Promise<number>((resolve, reject) => {
        const fail = () => reject(new SensorFault("timeout", `${this.model.name} on GPIO ${this.gpio}: no valid packet`));
        if (signal.aborted) {
          fail();
          return;
        }
        signal.addEventListener("abort", fail, { once: true });
        pending.detach = () => signal.removeEventListener("abort", fail);
        const decoder = new ZacWireDecoder((packet) => {
          if (packet.status === "ok" && packet.bytes.length === 2) {
            resolve(this.model.toCelsius(packet.bytes));
          } else {
            this.badPackets += 1;
          }
        }, 2);
        pending.watch = this.backend.watchEdges(this.gpio, (edge) => decoder.push(edge));
        void pending.watch.catch(reject);
      });
    } finally {
      pending.detach?.();
      if (pending.watch) {
        // a failed subscription already rejected the read above
        const watch = await pending.watch.catch(() => undefined);
        await watch?.close();
      }
    }
  }
}
