export class TemplogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SensorFaultReason = "timeout" | "bus" | "malformed" | "unavailable";

/** A single sensor read failed; surfaces as an error reading and is retried next cycle. */
export class SensorFault extends TemplogError {
  constructor(readonly reason: SensorFaultReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StorageFault extends TemplogError {}

export class TransportFault extends TemplogError {}

/** Inconsistent configuration. The only fault allowed to abort startup. */
export class ConfigurationFault extends TemplogError {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(list.length === 1 ? list[0] : `${list.length} configuration problems:\n  - ${list.join("\n  - ")}`);
    this.issues = list;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
