import { describe, expect, it } from "vitest";
import { errorReading, fromLogRecord, okReading, toLogRecord, toPublishMessage, withStatus } from "./readings.js";

const TS = Date.UTC(2024, 2, 1, 10, 0, 0) + 0.5;

describe("readings", () => {
  it("freezes readings", () => {
    const reading = okReading(21.5, "°C", TS, "21.5");
    expect(Object.isFrozen(reading)).toBe(true);
  });

  it("builds the publish message of an ok reading", () => {
    expect(toPublishMessage(okReading(21.5, "°C", TS, "21.5"))).toEqual({
      status: "ok",
      timestamp: "2024-03-01T10:00:00.000500Z",
      value: 21.5,
      unit: "°C",
      formatted: "21.5",
    });
  });

  it("leaves the value out of error messages", () => {
    const message = toPublishMessage(errorReading("°C", TS));
    expect(message).toEqual({ status: "error", timestamp: "2024-03-01T10:00:00.000500Z", unit: "°C", formatted: "---" });
    expect("value" in message).toBe(false);
  });

  it("keeps value and text when marking a reading stale", () => {
    const stale = withStatus(okReading(3, "K", TS, "3.0"), "stale");
    expect(stale).toEqual({ value: 3, unit: "K", timestamp: TS, status: "stale", formatted: "3.0" });
  });

  it("maps log records both ways", () => {
    const record = toLogRecord("tank", okReading(42, "°C", TS, "42.0"));
    expect(record).toEqual({ source: "tank", ts: TS, status: "ok", value: 42, unit: "°C" });
    expect(fromLogRecord(record, (v) => v.toFixed(2)).formatted).toBe("42.00");
    expect(toLogRecord("tank", errorReading("°C", TS))).toEqual({ source: "tank", ts: TS, status: "error", value: null, unit: "°C" });
    expect(fromLogRecord({ source: "tank", ts: TS, status: "error", value: null, unit: "°C" })).toEqual(errorReading("°C", TS));
  });
});
