import type { LogRecord, PublishMessage, Reading, ReadingStatus } from "./schema.js";
import { isoMicros } from "./util.js";

export const FORMATTED_MISSING = "---";

export function makeReading(fields: Reading): Reading {
  return Object.freeze({ ...fields });
}

export function okReading(value: number, unit: string, timestamp: number, formatted: string): Reading {
  return makeReading({ value, unit, timestamp, status: "ok", formatted });
}

export function errorReading(unit: string, timestamp: number): Reading {
  return makeReading({ value: null, unit, timestamp, status: "error", formatted: FORMATTED_MISSING });
}

export function withStatus(reading: Reading, status: ReadingStatus): Reading {
  if (reading.status === status) return reading;
  return makeReading({ ...reading, status });
}

export function toPublishMessage(reading: Reading): PublishMessage {
  const ok = reading.status === "ok" && reading.value !== null;
  const message: PublishMessage = {
    status: ok ? "ok" : "error",
    timestamp: isoMicros(reading.timestamp),
    unit: reading.unit,
    formatted: ok ? reading.formatted : FORMATTED_MISSING,
  };
  if (ok && reading.value !== null) message.value = reading.value;
  return message;
}

export function toLogRecord(sourceId: string, reading: Reading): LogRecord {
  const ok = reading.status === "ok" && reading.value !== null;
  return {
    source: sourceId,
    ts: reading.timestamp,
    status: ok ? "ok" : "error",
    value: ok ? reading.value : null,
    unit: reading.unit,
  };
}

export function fromLogRecord(record: LogRecord, format: (value: number) => string = defaultFormat): Reading {
  if (record.status === "ok" && record.value !== null) {
    return okReading(record.value, record.unit, record.ts, format(record.value));
  }
  return errorReading(record.unit, record.ts);
}

export function defaultFormat(value: number): string {
  return value.toFixed(1);
}
