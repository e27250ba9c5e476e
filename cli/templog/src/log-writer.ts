import { mkdir, open, readdir, readFile, unlink, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { describeError, errorCode, StorageFault } from "./errors.js";
import { createLogger, RateLimitedLog } from "./log.js";
import { Mutex } from "./mutex.js";
import { fromLogRecord, toLogRecord } from "./readings.js";
import type { LogRecord, Reading } from "./schema.js";
import { DAY_MS, nowMs, safeJsonParse, utcDay } from "./util.js";

const log = createLogger("log-writer");

export const LogRecordSchema = z.object({
  source: z.string().min(1),
  ts: z.number().finite(),
  status: z.enum(["ok", "error"]),
  value: z.number().finite().nullable(),
  unit: z.string(),
});

const PARTITION_PATTERN = /^readings-(\d{4})-(\d{2})-(\d{2})\.ndjson$/;

export type LogWriterOptions = {
  dir: string;
  retentionMs: number;
  fsync?: boolean;
  clock?: () => number;
};

export type Partition = {
  name: string;
  path: string;
  dayStart: number;
};

export type LogWriterCounters = {
  appended: number;
  failed: number;
  malformed: number;
  swept: number;
};

export function partitionName(ms: number): string {
  return `readings-${utcDay(ms)}.ndjson`;
}

/**
 * Append-only reading log, one NDJSON file per UTC day. Expiry deletes whole
 * days, never rewrites a file.
 */
export class LogWriter {
  private handle?: FileHandle;
  private handleName?: string;
  private lock = new Mutex();
  private clock: () => number;
  private failures: RateLimitedLog;
  private counters: LogWriterCounters = { appended: 0, failed: 0, malformed: 0, swept: 0 };

  constructor(private options: LogWriterOptions) {
    this.clock = options.clock ?? nowMs;
    this.failures = new RateLimitedLog((msg) => log.error(msg));
  }

  get dir(): string {
    return this.options.dir;
  }

  getCounters(): LogWriterCounters {
    return { ...this.counters };
  }

  /** Resolves once the record is written (and synced, unless fsync is off). */
  async append(sourceId: string, reading: Reading): Promise<void> {
    const line = `${JSON.stringify(toLogRecord(sourceId, reading))}\n`;
    await this.lock.runExclusive(async () => {
      try {
        const handle = await this.handleFor(partitionName(reading.timestamp));
        await handle.write(line);
        if (this.options.fsync !== false) await handle.sync();
        this.counters.appended += 1;
      } catch (err) {
        this.counters.failed += 1;
        await this.closeHandle();
        const fault = new StorageFault(`append to ${this.options.dir} failed: ${describeError(err)}`, { cause: err });
        this.failures.emit(fault.message);
        throw fault;
      }
    });
  }

  /**
   * Readings of the last `windowMs` (never beyond the retention horizon),
   * grouped by source and sorted by timestamp.
   */
  async loadRecent(windowMs: number, now = this.clock()): Promise<Map<string, Reading[]>> {
    const horizon = now - Math.min(windowMs, this.options.retentionMs);
    const bySource = new Map<string, Reading[]>();
    for (const partition of await this.listPartitions()) {
      if (partition.dayStart + DAY_MS <= horizon) continue;
      let text: string;
      try {
        text = await readFile(partition.path, "utf8");
      } catch (err) {
        log.warn(`skipping ${partition.name}: ${describeError(err)}`);
        continue;
      }
      let malformed = 0;
      for (const line of text.split("\n")) {
        if (!line.trim()) continue;
        const record = parseRecord(line);
        if (!record) {
          malformed += 1;
          continue;
        }
        if (record.ts < horizon) continue;
        const list = bySource.get(record.source) ?? [];
        list.push(fromLogRecord(record));
        bySource.set(record.source, list);
      }
      if (malformed > 0) {
        this.counters.malformed += malformed;
        log.warn(`${partition.name}: skipped ${malformed} malformed line(s)`);
      }
    }
    for (const list of bySource.values()) list.sort((a, b) => a.timestamp - b.timestamp);
    return bySource;
  }

  /**
   * Deletes every day file whose last instant lies before the retention
   * horizon. Failures are logged; returns the names actually deleted.
   */
  async sweepExpired(now = this.clock()): Promise<string[]> {
    const horizon = now - this.options.retentionMs;
    const deleted: string[] = [];
    let partitions: Partition[];
    try {
      partitions = await this.listPartitions();
    } catch (err) {
      log.warn(`retention sweep failed: ${describeError(err)}`);
      return deleted;
    }
    for (const partition of partitions) {
      if (partition.dayStart + DAY_MS > horizon) continue;
      try {
        await this.lock.runExclusive(async () => {
          if (this.handleName === partition.name) await this.closeHandle();
          await unlink(partition.path);
        });
        deleted.push(partition.name);
        log.info(`deleted expired ${partition.name}`);
      } catch (err) {
        log.warn(`could not delete ${partition.name}: ${describeError(err)}`);
      }
    }
    this.counters.swept += deleted.length;
    return deleted;
  }

  async listPartitions(): Promise<Partition[]> {
    let names: string[];
    try {
      names = await readdir(this.options.dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") return [];
      throw new StorageFault(`cannot list ${this.options.dir}: ${describeError(err)}`, { cause: err });
    }
    const partitions: Partition[] = [];
    for (const name of names) {
      const match = PARTITION_PATTERN.exec(name);
      if (!match) continue;
      const dayStart = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
      partitions.push({ name, path: join(this.options.dir, name), dayStart });
    }
    return partitions.sort((a, b) => a.dayStart - b.dayStart);
  }

  async close() {
    await this.lock.runExclusive(() => this.closeHandle());
  }

  private async handleFor(name: string): Promise<FileHandle> {
    if (this.handle && this.handleName === name) return this.handle;
    await this.closeHandle();
    await mkdir(this.options.dir, { recursive: true });
    const handle = await open(join(this.options.dir, name), "a");
    this.handle = handle;
    this.handleName = name;
    log.debug(`writing ${name}`);
    return handle;
  }

  private async closeHandle() {
    const handle = this.handle;
    this.handle = undefined;
    this.handleName = undefined;
    if (!handle) return;
    try {
      await handle.close();
    } catch (err) {
      log.warn(`closing log file failed: ${describeError(err)}`);
    }
  }
}

function parseRecord(line: string): LogRecord | undefined {
  const parsed = safeJsonParse(line);
  if (!parsed.ok) return undefined;
  const result = LogRecordSchema.safeParse(parsed.value);
  return result.success ? result.data : undefined;
}
