import type { SerialPort } from "serialport";
import type { MeterPort } from "./apator-ec3.js";
import { describeError, SensorFault } from "./errors.js";
import { createLogger } from "./log.js";
import { delay } from "./util.js";

const log = createLogger("serial");

const REQUEST = "/?!\r\n";
/** Acknowledge with readout mode at the 300 baud the exchange started with. */
const ACK_READOUT = "\x06000\r\n";
const ETX = "\x03";

export type SerialMeterPortOptions = {
  /** Pause after each command; the meter is slow to switch modes. */
  settleMs?: number;
  /** Upper bound for the readout once acknowledged. */
  responseTimeoutMs?: number;
};

/**
 * IEC 62056-21 mode C readout over an optical head: 300 baud, 7 data bits,
 * even parity. The port stays open between readouts and is reopened after
 * a failure.
 */
export class SerialMeterPort implements MeterPort {
  private port?: SerialPort;
  private settleMs: number;
  private responseTimeoutMs: number;

  constructor(readonly path: string, options: SerialMeterPortOptions = {}) {
    this.settleMs = options.settleMs ?? 2000;
    this.responseTimeoutMs = options.responseTimeoutMs ?? 10_000;
  }

  async request(signal: AbortSignal): Promise<string> {
    const port = await this.open();
    let text = "";
    const onData = (chunk: Buffer) => {
      text += chunk.toString("latin1");
    };
    port.on("data", onData);
    try {
      await write(port, REQUEST);
      if (!(await delay(this.settleMs, signal))) throw aborted(this.path);
      await write(port, ACK_READOUT);
      const deadline = Date.now() + this.settleMs + this.responseTimeoutMs;
      // the readout ends with ETX and one block check character
      while (!complete(text) && Date.now() < deadline) {
        if (!(await delay(100, signal))) throw aborted(this.path);
      }
    } finally {
      port.off("data", onData);
    }
    if (text.length === 0) throw new SensorFault("timeout", `no answer on ${this.path}`);
    return text;
  }

  async close() {
    const port = this.port;
    this.port = undefined;
    if (!port?.isOpen) return;
    log.info(`closing ${this.path}`);
    await new Promise<void>((resolve, reject) => {
      port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async open(): Promise<SerialPort> {
    if (this.port) return this.port;
    const serialport = await import("serialport");
    const port = new serialport.SerialPort({
      path: this.path,
      baudRate: 300,
      dataBits: 7,
      parity: "even",
      stopBits: 1,
      autoOpen: false,
    });
    log.info(`opening ${this.path}`);
    await new Promise<void>((resolve, reject) => {
      port.open((err) => (err ? reject(err) : resolve()));
    }).catch((err: unknown) => {
      throw new SensorFault("bus", `cannot open ${this.path}: ${describeError(err)}`, { cause: err });
    });
    port.on("error", (err: Error) => log.warn(`${this.path}: ${describeError(err)}`));
    this.port = port;
    return port;
  }
}

function complete(text: string): boolean {
  const etx = text.indexOf(ETX);
  return etx !== -1 && text.length > etx + 1;
}

function aborted(path: string): SensorFault {
  return new SensorFault("timeout", `readout on ${path} aborted`);
}

function write(port: SerialPort, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    port.write(data, "latin1", (err) => {
      if (err) {
        reject(new SensorFault("bus", `write to ${port.path} failed: ${describeError(err)}`, { cause: err }));
        return;
      }
      port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
    });
  });
}
