import { isoFromMs, nowMs } from "./util.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const v = value?.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return undefined;
}

let threshold: LogLevel = parseLogLevel(process.env.TEMPLOG_LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export type Logger = Record<LogLevel, (message: string) => void>;

function write(level: LogLevel, scope: string, message: string) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const line = `${isoFromMs(nowMs())} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}`;
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message) => write("debug", scope, message),
    info: (message) => write("info", scope, message),
    warn: (message) => write("warn", scope, message),
    error: (message) => write("error", scope, message),
  };
}

/**
 * Emits the first message right away, then at most one per interval.
 * The next emitted line carries the number of messages swallowed in between.
 */
export class RateLimitedLog {
  private lastAt = Number.NEGATIVE_INFINITY;
  private suppressed = 0;

  constructor(
    private emitLine: (message: string) => void,
    private intervalMs = 60_000,
    private clock: () => number = nowMs
  ) {}

  emit(message: string): boolean {
    const now = this.clock();
    if (now - this.lastAt < this.intervalMs) {
      this.suppressed += 1;
      return false;
    }
    const suffix = this.suppressed > 0 ? ` (${this.suppressed} similar suppressed)` : "";
    this.lastAt = now;
    this.suppressed = 0;
    this.emitLine(`${message}${suffix}`);
    return true;
  }

  get pending(): number {
    return this.suppressed;
  }
}
