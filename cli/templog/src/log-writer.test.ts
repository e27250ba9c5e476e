import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LogWriter, partitionName } from "./log-writer.js";
import { errorReading, okReading } from "./readings.js";
import { DAY_MS } from "./util.js";

const DAY0 = Date.UTC(2024, 2, 1);

describe("LogWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "templog-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("names partitions by UTC day", () => {
    expect(partitionName(DAY0 + 10 * 3600_000)).toBe("readings-2024-03-01.ndjson");
    expect(partitionName(DAY0 - 1)).toBe("readings-2024-02-29.ndjson");
  });

  it("appends one JSON line per reading", async () => {
    const writer = new LogWriter({ dir, retentionMs: 32 * DAY_MS, fsync: false });
    await writer.append("top", okReading(42, "°C", DAY0 + 1000, "42.0"));
    await writer.append("top", errorReading("°C", DAY0 + 2000));
    await writer.close();
    const text = await readFile(join(dir, "readings-2024-03-01.ndjson"), "utf8");
    expect(text).toBe(
      `{"source":"top","ts":${DAY0 + 1000},"status":"ok","value":42,"unit":"°C"}\n` +
        `{"source":"top","ts":${DAY0 + 2000},"status":"error","value":null,"unit":"°C"}\n`
    );
    expect(writer.getCounters().appended).toBe(2);
  });

  it("switches files at midnight UTC", async () => {
    const writer = new LogWriter({ dir, retentionMs: 32 * DAY_MS, fsync: false });
    await writer.append("top", okReading(1, "°C", DAY0 + DAY_MS - 1, "1.0"));
    await writer.append("top", okReading(2, "°C", DAY0 + DAY_MS, "2.0"));
    await writer.close();
    expect((await readdir(dir)).sort()).toEqual(["readings-2024-03-01.ndjson", "readings-2024-03-02.ndjson"]);
  });

  it("loads recent readings grouped by source", async () => {
    const writer = new LogWriter({ dir, retentionMs: 32 * DAY_MS });
    await writer.append("top", okReading(42, "°C", DAY0 + 5000, "42.0"));
    await writer.append("bottom", okReading(30, "°C", DAY0 + 4000, "30.0"));
    await writer.append("top", okReading(41, "°C", DAY0 + 3000, "41.0"));
    await writer.append("top", okReading(40, "°C", DAY0 - 2 * DAY_MS, "40.0"));
    await writer.close();

    const recent = await writer.loadRecent(DAY_MS, DAY0 + 10_000);
    expect(recent.get("top")?.map((r) => r.value)).toEqual([41, 42]);
    expect(recent.get("bottom")).toEqual([okReading(30, "°C", DAY0 + 4000, "30.0")]);
  });

  it("never loads beyond the retention period", async () => {
    const writer = new LogWriter({ dir, retentionMs: DAY_MS });
    await writer.append("top", okReading(1, "°C", DAY0, "1.0"));
    await writer.append("top", okReading(2, "°C", DAY0 + DAY_MS + 10, "2.0"));
    await writer.close();
    const recent = await writer.loadRecent(10 * DAY_MS, DAY0 + DAY_MS + 20);
    expect(recent.get("top")?.map((r) => r.value)).toEqual([2]);
  });

  it("skips malformed lines", async () => {
    await writeFile(
      join(dir, "readings-2024-03-01.ndjson"),
      `{"source":"top","ts":${DAY0 + 1},"status":"ok","value":1,"unit":"°C"}\n` +
        "not json\n" +
        `{"source":"top","ts":${DAY0 + 2},"status":"maybe","value":1,"unit":"°C"}\n` +
        `{"source":"top","ts":${DAY0 + 3},"status":"ok","value":3,"unit":"°C"}` +
        `{"source":"top","ts":${DAY0 + 4},"status":"ok","value":4,"unit":"°C"}\n`
    );
    const writer = new LogWriter({ dir, retentionMs: 32 * DAY_MS });
    const recent = await writer.loadRecent(DAY_MS, DAY0 + 10);
    expect(recent.get("top")?.map((r) => r.value)).toEqual([1]);
    expect(writer.getCounters().malformed).toBe(3);
  });

  it("deletes only days entirely past retention", async () => {
    const writer = new LogWriter({ dir, retentionMs: 2 * DAY_MS, fsync: false });
    for (const day of [0, 1, 2]) {
      await writer.append("top", okReading(day, "°C", DAY0 + day * DAY_MS + 60_000, String(day)));
    }
    await writer.close();
    const now = DAY0 + 3 * DAY_MS;
    expect(await writer.sweepExpired(now)).toEqual(["readings-2024-03-01.ndjson"]);
    expect(await writer.sweepExpired(now)).toEqual([]);
    expect((await writer.listPartitions()).map((p) => p.name)).toEqual([
      "readings-2024-03-02.ndjson",
      "readings-2024-03-03.ndjson",
    ]);
    expect(writer.getCounters().swept).toBe(1);
  });

  it("keeps a record exactly at the retention horizon", async () => {
    const writer = new LogWriter({ dir, retentionMs: 2 * DAY_MS, fsync: false });
    const horizon = DAY0 + DAY_MS;
    await writer.append("top", okReading(1, "°C", horizon - 1, "1.0"));
    await writer.append("top", okReading(2, "°C", horizon, "2.0"));
    await writer.close();
    const now = horizon + 2 * DAY_MS;
    expect(await writer.sweepExpired(now)).toEqual(["readings-2024-03-01.ndjson"]);
    const recent = await writer.loadRecent(2 * DAY_MS, now);
    expect(recent.get("top")?.map((r) => r.timestamp)).toEqual([horizon]);
  });

  it("closes the open partition before deleting it", async () => {
    const writer = new LogWriter({ dir, retentionMs: DAY_MS, fsync: false });
    await writer.append("top", okReading(1, "°C", DAY0, "1.0"));
    expect(await writer.sweepExpired(DAY0 + 2 * DAY_MS)).toEqual(["readings-2024-03-01.ndjson"]);
    await writer.append("top", okReading(2, "°C", DAY0 + 2 * DAY_MS, "2.0"));
    await writer.close();
    expect(await readdir(dir)).toEqual(["readings-2024-03-03.ndjson"]);
  });

  it("lists nothing when the directory does not exist yet", async () => {
    const writer = new LogWriter({ dir: join(dir, "missing"), retentionMs: DAY_MS });
    expect(await writer.listPartitions()).toEqual([]);
    expect(await writer.sweepExpired(DAY0)).toEqual([]);
  });

  it("reports a failed append", async () => {
    await writeFile(join(dir, "blocker"), "");
    const writer = new LogWriter({ dir: join(dir, "blocker"), retentionMs: DAY_MS });
    await expect(writer.append("top", okReading(1, "°C", DAY0, "1.0"))).rejects.toMatchObject({ name: "StorageFault" });
    expect(writer.getCounters().failed).toBe(1);
  });
});
