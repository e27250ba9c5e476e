import { MeterDriver, type Ec3Meter } from "./apator-ec3.js";
import { ConfigurationFault, SensorFault } from "./errors.js";
import type { ChannelLocks, Mutex, Release } from "./mutex.js";
import type { GpioBackend } from "./pigpio.js";
import type { DriverSpec, Reading } from "./schema.js";
import { SimulatedDriver } from "./simulated.js";
import { TsicDriver, TSIC_MODELS } from "./tsic.js";
import { W1Driver } from "./w1.js";

/**
 * One physical or simulated sensor. `read` resolves with the raw value or
 * rejects with a SensorFault, and must let go of everything it holds once
 * `signal` aborts.
 */
export interface SensorDriver {
  readonly kind: DriverSpec["kind"];
  /** Exclusive hardware channel the driver locks while reading, if any. */
  readonly channel?: string;
  read(signal: AbortSignal): Promise<number>;
  close?(): Promise<void>;
}

export type DriverDeps = {
  locks: ChannelLocks;
  gpio: () => GpioBackend;
  w1BusDir: string;
  lookup: (sourceId: string) => Reading | undefined;
  /** Shared meter on a serial port, created on first use. */
  meter: (port: string, intervalMs: number) => Ec3Meter;
};

export function createDriver(spec: DriverSpec, deps: DriverDeps): SensorDriver {
  switch (spec.kind) {
    case "w1":
      return new W1Driver(spec.address, deps.w1BusDir);
    case "tsic": {
      const channel = `gpio:${spec.gpio}`;
      return new TsicDriver(spec.gpio, TSIC_MODELS[spec.model], deps.gpio(), deps.locks.get(channel));
    }
    case "gpio-digital":
      return new DigitalInDriver(spec.gpio, deps.gpio(), deps.locks.get(`gpio:${spec.gpio}`));
    case "simulated":
      return new SimulatedDriver(spec);
    case "delta":
      return new DeltaDriver(spec.minuend, spec.subtrahend, deps.lookup);
    case "apator-ec3":
      return new MeterDriver(deps.meter(spec.port, spec.intervalMs), spec.value);
    default:
      return unknownKind(spec);
  }
}

function unknownKind(spec: never): never {
  throw new ConfigurationFault(`unknown driver kind ${JSON.stringify(spec)}`);
}

/** Difference of the current values of two other sources. */
export class DeltaDriver implements SensorDriver {
  readonly kind = "delta";

  constructor(
    private minuend: string,
    private subtrahend: string,
    private lookup: (sourceId: string) => Reading | undefined
  ) {}

  async read(): Promise<number> {
    return this.current(this.minuend) - this.current(this.subtrahend);
  }

  private current(sourceId: string): number {
    const reading = this.lookup(sourceId);
    if (!reading || reading.status !== "ok" || reading.value === null) {
      throw new SensorFault("unavailable", `no current value for "${sourceId}"`);
    }
    return reading.value;
  }
}

/** Digital GPIO input, 0 or 1. Shares the channel lock with any TSic on the same pin. */
export class DigitalInDriver implements SensorDriver {
  readonly kind = "gpio-digital";
  readonly channel: string;
  private prepared = false;

  constructor(private gpio: number, private backend: GpioBackend, private lock: Mutex) {
    this.channel = `gpio:${gpio}`;
  }

  async read(signal: AbortSignal): Promise<number> {
    let release: Release;
    try {
      release = await this.lock.acquire(signal);
    } catch {
      throw new SensorFault("timeout", `GPIO ${this.gpio}: channel busy`);
    }
    try {
      if (!this.prepared) {
        await this.backend.setInput(this.gpio);
        this.prepared = true;
      }
      const level = await this.backend.readLevel(this.gpio);
      if (signal.aborted) throw new SensorFault("timeout", `GPIO ${this.gpio} read aborted`);
      return level;
    } finally {
      release();
    }
  }
}
