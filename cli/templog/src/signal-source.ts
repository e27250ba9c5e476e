import type { SensorDriver } from "./drivers.js";
import { describeError, SensorFault } from "./errors.js";
import { createLogger } from "./log.js";
import { errorReading, fromLogRecord, okReading, toLogRecord } from "./readings.js";
import type { Reading, SourceDescriptor } from "./schema.js";
import { preciseNowMs, roundTo } from "./util.js";

const log = createLogger("source");

/**
 * A configured sensor: identity and display data from the configuration plus
 * the driver it owns. `read` always settles with a Reading within the timeout.
 */
export class SignalSource {
  lastReading?: Reading;
  lastError?: string;

  constructor(
    readonly descriptor: SourceDescriptor,
    private driver: SensorDriver,
    private clock: () => number = preciseNowMs
  ) {}

  get id(): string {
    return this.descriptor.id;
  }

  get channel(): string | undefined {
    return this.driver.channel;
  }

  async read(timeoutMs: number): Promise<Reading> {
    const controller = new AbortController();
    const deadline = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(new SensorFault("timeout", `no answer within ${timeoutMs} ms`)),
        { once: true }
      );
    });
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const raw = await Promise.race([this.driver.read(controller.signal), deadline]);
      return this.remember(this.toReading(raw));
    } catch (err) {
      return this.remember(this.failed(err));
    } finally {
      clearTimeout(timer);
    }
  }

  format(value: number): string {
    const driver = this.descriptor.driver;
    if (driver.kind === "gpio-digital") return value !== 0 ? driver.textOn : driver.textOff;
    return value.toFixed(this.descriptor.decimals);
  }

  /** Re-renders a replayed reading with this source's formatting. */
  restore(reading: Reading): Reading {
    return fromLogRecord(toLogRecord(this.id, reading), (value) => this.format(value));
  }

  async close() {
    try {
      await this.driver.close?.();
    } catch (err) {
      log.warn(`${this.id}: closing driver failed: ${describeError(err)}`);
    }
  }

  private toReading(raw: number): Reading {
    if (!Number.isFinite(raw)) {
      return this.failed(new SensorFault("malformed", `driver returned ${raw}`));
    }
    const value = roundTo(raw + this.descriptor.offset, 3);
    return okReading(value, this.descriptor.unit, this.clock(), this.format(value));
  }

  private failed(err: unknown): Reading {
    const message = describeError(err);
    if (message !== this.lastError) {
      log.warn(`${this.id}: ${message}`);
    }
    this.lastError = message;
    return errorReading(this.descriptor.unit, this.clock());
  }

  private remember(reading: Reading): Reading {
    if (reading.status === "ok" && this.lastError !== undefined) {
      log.info(`${this.id}: reading again`);
      this.lastError = undefined;
    }
    this.lastReading = reading;
    return reading;
  }
}
