export type ReadingStatus = "ok" | "error" | "stale";

export type Reading = {
  value: number | null;
  unit: string;
  /** Epoch milliseconds; the fractional part carries sub-millisecond precision. */
  timestamp: number;
  status: ReadingStatus;
  formatted: string;
};

export type TsicModel = "206" | "306" | "506" | "716";

/** Value a source takes from an electricity meter: energy registers in kWh or power in W. */
export type MeterValue = "total" | "high" | "low" | "power";

export type SimulatedStep = number | "error" | "timeout";

export type DriverSpec =
  | { kind: "w1"; address: string }
  | { kind: "tsic"; gpio: number; model: TsicModel }
  | { kind: "gpio-digital"; gpio: number; textOff: string; textOn: string }
  | { kind: "simulated"; script?: SimulatedStep[]; mean: number; jitter: number; seed: number }
  | { kind: "delta"; minuend: string; subtrahend: string }
  | { kind: "apator-ec3"; port: string; value: MeterValue; intervalMs: number };

export type DriverKind = DriverSpec["kind"];

export type SourceDescriptor = {
  id: string;
  label: string;
  group: string;
  color: string;
  unit: string;
  decimals: number;
  offset: number;
  withGraph: boolean;
  driver: DriverSpec;
};

export type LogRecord = {
  source: string;
  ts: number;
  status: "ok" | "error";
  value: number | null;
  unit: string;
};

export type PublishMessage = {
  status: "ok" | "error";
  timestamp: string;
  value?: number;
  unit: string;
  formatted: string;
};

export type SourceCounters = {
  cycles: number;
  ok: number;
  errors: number;
};
