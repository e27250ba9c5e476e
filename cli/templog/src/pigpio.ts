import { createReadStream } from "node:fs";
import { appendFile, open, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { describeError, SensorFault } from "./errors.js";
import { createLogger } from "./log.js";
import { Mutex } from "./mutex.js";

const log = createLogger("pigpio");

/** One level change on a GPIO; `tick` is the daemon's 32-bit microsecond counter. */
export type GpioEdge = { level: 0 | 1 | "timeout"; tick: number };

export type EdgeWatch = { close(): Promise<void> };

export interface GpioBackend {
  setInput(gpio: number): Promise<void>;
  readLevel(gpio: number): Promise<0 | 1>;
  watchEdges(gpio: number, onEdge: (edge: GpioEdge) => void): Promise<EdgeWatch>;
  close?(): Promise<void>;
}

export type NotifyReport = { seq: number; flags: number; tick: number; level: number };

export const REPORT_SIZE = 12;
const FLAG_WATCHDOG = 1 << 5;
const FLAG_ALIVE = 1 << 6;
const FLAG_EVENT = 1 << 7;
const FLAG_GPIO_MASK = 0x1f;

/** Splits a notification stream chunk into 12-byte reports; returns the leftover bytes. */
export function parseReports(buf: Buffer): { reports: NotifyReport[]; rest: Buffer } {
  const reports: NotifyReport[] = [];
  let offset = 0;
  while (offset + REPORT_SIZE <= buf.length) {
    reports.push({
      seq: buf.readUInt16LE(offset),
      flags: buf.readUInt16LE(offset + 2),
      tick: buf.readUInt32LE(offset + 4),
      level: buf.readUInt32LE(offset + 8),
    });
    offset += REPORT_SIZE;
  }
  return { reports, rest: buf.subarray(offset) };
}

/** Turns the daemon's level-bitmask reports into edges of one GPIO. */
export function edgeTracker(gpio: number, onEdge: (edge: GpioEdge) => void) {
  let previous: 0 | 1 | undefined;
  return (report: NotifyReport) => {
    if (report.flags & FLAG_WATCHDOG) {
      if ((report.flags & FLAG_GPIO_MASK) === gpio) onEdge({ level: "timeout", tick: report.tick });
      return;
    }
    if (report.flags & (FLAG_ALIVE | FLAG_EVENT)) return;
    const level = (report.level >>> gpio) & 1 ? 1 : 0;
    if (level === previous) return;
    previous = level;
    onEdge({ level, tick: report.tick });
  };
}

/**
 * Client for the pigpio daemon's pipe interface: commands go to /dev/pigpio,
 * replies come back on /dev/pigout, notifications stream from /dev/pigpio<handle>.
 * Commands are serialized so replies cannot interleave.
 */
export class PigpioPipe implements GpioBackend {
  private commandLock = new Mutex();
  private replies?: FileHandle;

  constructor(private devDir = "/dev") {}

  async command(cmd: string): Promise<number> {
    return this.commandLock.runExclusive(async () => {
      try {
        await appendFile(join(this.devDir, "pigpio"), `${cmd}\n`);
        const reply = await this.readReply();
        const code = Number(reply.trim());
        if (!Number.isFinite(code)) throw new SensorFault("bus", `pigpio: unexpected reply "${reply}" to "${cmd}"`);
        if (code < 0) throw new SensorFault("bus", `pigpio: "${cmd}" failed with ${code}`);
        return code;
      } catch (err) {
        if (err instanceof SensorFault) throw err;
        throw new SensorFault("unavailable", `pigpio daemon unreachable: ${describeError(err)}`, { cause: err });
      }
    });
  }

  async setInput(gpio: number) {
    await this.command(`m ${gpio} r`);
    await this.command(`pud ${gpio} o`);
  }

  async readLevel(gpio: number): Promise<0 | 1> {
    return (await this.command(`r ${gpio}`)) === 0 ? 0 : 1;
  }

  async watchEdges(gpio: number, onEdge: (edge: GpioEdge) => void): Promise<EdgeWatch> {
    const handle = await this.command("no");
    const track = edgeTracker(gpio, onEdge);
    const stream = createReadStream(join(this.devDir, `pigpio${handle}`));
    let pending: Buffer = Buffer.alloc(0);
    stream.on("data", (chunk) => {
      const data = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      const { reports, rest } = parseReports(Buffer.concat([pending, data]));
      pending = rest;
      for (const report of reports) track(report);
    });
    stream.on("error", (err) => log.warn(`notification pipe ${handle}: ${describeError(err)}`));
    try {
      await this.command(`nb ${handle} ${(1 << gpio) >>> 0}`);
    } catch (err) {
      stream.destroy();
      await this.command(`nc ${handle}`);
      throw err;
    }
    return {
      close: async () => {
        stream.destroy();
        await this.command(`nc ${handle}`);
      },
    };
  }

  async close() {
    await this.replies?.close();
    this.replies = undefined;
  }

  private async readReply(): Promise<string> {
    this.replies ??= await open(join(this.devDir, "pigout"), "r");
    const buf = Buffer.alloc(64);
    let text = "";
    while (!text.includes("\n")) {
      const { bytesRead } = await this.replies.read(buf, 0, buf.length, null);
      if (bytesRead === 0) throw new SensorFault("unavailable", "pigpio: reply pipe closed");
      text += buf.toString("utf8", 0, bytesRead);
    }
    return text.slice(0, text.indexOf("\n"));
  }
}
