import { performance } from "node:perf_hooks";

export function nowMs(): number {
  return Date.now();
}

/** Wall-clock time with the sub-millisecond fraction of the monotonic clock. */
export function preciseNowMs(): number {
  const ms = Date.now();
  const fraction = (performance.timeOrigin + performance.now()) % 1;
  return ms + fraction;
}

export function safeJsonParse(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : "invalid_json" };
  }
}

export function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function isoFromMs(ms: number): string {
  return new Date(ms).toISOString();
}

/** ISO-8601 UTC with six fractional digits, e.g. 2024-03-01T10:00:00.123456Z. */
export function isoMicros(ms: number): string {
  const whole = Math.floor(ms);
  const micros = clamp(Math.round((ms - whole) * 1000), 0, 999);
  const iso = new Date(whole).toISOString();
  return `${iso.slice(0, -1)}${String(micros).padStart(3, "0")}Z`;
}

export const DAY_MS = 24 * 3600 * 1000;

export function utcDay(ms: number): string {
  return isoFromMs(ms).slice(0, 10);
}

/** Resolves true once `ms` has elapsed, false as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Small seeded PRNG (mulberry32) for reproducible simulations. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
