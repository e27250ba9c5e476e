import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError, SensorFault } from "./errors.js";
import type { SensorDriver } from "./drivers.js";

export const W1_BUS_DIR = "/sys/bus/w1/devices";

/**
 * DS18x20 on the kernel 1-Wire bus, addressed by its ROM id (e.g. 28-0000089b1ca2).
 * Many devices share the bus; the kernel serializes the transfers.
 */
export class W1Driver implements SensorDriver {
  readonly kind = "w1";

  constructor(private address: string, private busDir = W1_BUS_DIR) {}

  async read(signal: AbortSignal): Promise<number> {
    const path = join(this.busDir, this.address, "w1_slave");
    let text: string;
    try {
      text = await readFile(path, { encoding: "utf8", signal });
    } catch (err) {
      if (signal.aborted) throw new SensorFault("timeout", `1-Wire ${this.address} did not answer`);
      throw new SensorFault("bus", `cannot read 1-Wire ${this.address}: ${describeError(err)}`, { cause: err });
    }
    return parseW1Slave(text, this.address);
  }
}

/**
 * w1_slave holds two lines: the scratchpad with a CRC verdict, then the
 * scratchpad again with `t=<millidegrees>`.
 */
export function parseW1Slave(text: string, address = "device"): number {
  const [crcLine = "", dataLine = ""] = text.split("\n");
  if (!crcLine.trim().endsWith("YES")) {
    throw new SensorFault("malformed", `1-Wire ${address}: CRC check failed`);
  }
  const match = /t=(-?\d+)/.exec(dataLine);
  if (!match) {
    throw new SensorFault("malformed", `1-Wire ${address}: no temperature in "${dataLine.trim()}"`);
  }
  return Number(match[1]) / 1000;
}
