import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationFault, describeError } from "./errors.js";
import type { BrokerConfig } from "./mqtt-transport.js";
import type { DriverSpec, SourceDescriptor } from "./schema.js";
import { safeJsonParse } from "./util.js";
import { W1_BUS_DIR } from "./w1.js";

const DEFAULT_UNIT = "°C";

const gpio = z.number().int().min(0).max(53);

const DriverSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("w1"),
    address: z.string().regex(/^[0-9a-f]{2}-[0-9a-f]{12}$/i, "expected a 1-Wire ROM id like 28-0000089b1ca2"),
  }),
  z.object({
    kind: z.literal("tsic"),
    gpio,
    model: z.enum(["206", "306", "506", "716"]).default("306"),
  }),
  z.object({
    kind: z.literal("gpio-digital"),
    gpio,
    textOff: z.string().default("off"),
    textOn: z.string().default("on"),
  }),
  z.object({
    kind: z.literal("simulated"),
    script: z.array(z.union([z.number().finite(), z.enum(["error", "timeout"])])).min(1).optional(),
    mean: z.number().finite().default(20),
    jitter: z.number().nonnegative().default(2),
    seed: z.number().int().default(1),
  }),
  z.object({
    kind: z.literal("apator-ec3"),
    port: z.string().min(1),
    value: z.enum(["total", "high", "low", "power"]).default("total"),
    intervalMs: z.number().int().min(5000).default(30_000),
  }),
  z.object({
    kind: z.literal("delta"),
    minuend: z.string().min(1),
    subtrahend: z.string().min(1),
  }),
]);

const SourceSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "ids may contain letters, digits, '.', '_' and '-'"),
  label: z.string().optional(),
  group: z.string().default("default"),
  color: z.string().default("#999999"),
  unit: z.string().default(DEFAULT_UNIT),
  decimals: z.number().int().min(0).max(6).default(1),
  offset: z.number().finite().default(0),
  withGraph: z.boolean().default(true),
  driver: DriverSchema,
});

export const ConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(1000),
  readTimeoutMs: z.number().int().positive().default(800),
  staleAfterMs: z.number().int().positive().optional(),
  history: z
    .object({
      windowHours: z.number().positive().default(24),
      maxSamples: z.number().int().positive().default(86_400),
    })
    .default({}),
  storage: z
    .object({
      dir: z.string().min(1).default("data/readings"),
      retentionDays: z.number().positive().default(32),
      fsync: z.boolean().default(true),
      sweepIntervalMs: z.number().int().positive().default(3_600_000),
    })
    .default({}),
  queues: z
    .object({
      capacity: z.number().int().positive().default(1000),
      drainGraceMs: z.number().int().nonnegative().default(5000),
    })
    .default({}),
  broker: z
    .object({
      host: z.string().default(""),
      port: z.number().int().min(1).max(65535).default(8883),
      tls: z.boolean().default(true),
      username: z.string().default(""),
      passwordFile: z.string().optional(),
      caFile: z.string().optional(),
      baseTopic: z.string().min(1).default("templog"),
      clientId: z.string().optional(),
      retain: z.boolean().default(true),
      connectTimeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default("0.0.0.0"),
      port: z.number().int().min(0).max(65535).default(9124),
    })
    .default({}),
  w1: z.object({ busDir: z.string().default(W1_BUS_DIR) }).default({}),
  sources: z.array(SourceSchema).min(1, "at least one source is required"),
});

export type RawConfig = z.input<typeof ConfigSchema>;

export type TemplogConfig = {
  pollIntervalMs: number;
  readTimeoutMs: number;
  staleAfterMs: number;
  history: { windowMs: number; maxSamples: number };
  storage: { dir: string; retentionMs: number; fsync: boolean; sweepIntervalMs: number };
  queues: { capacity: number; drainGraceMs: number };
  broker: BrokerConfig;
  server: { host: string; port: number };
  w1: { busDir: string };
  sources: SourceDescriptor[];
};

const HOUR_MS = 3600 * 1000;

/**
 * Validates a parsed configuration object. Relative paths are resolved
 * against `baseDir`, the configuration file's directory.
 */
export function parseConfig(raw: unknown, baseDir = process.cwd(), env: NodeJS.ProcessEnv = process.env): TemplogConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationFault(
      result.error.issues.map((issue) => `${issue.path.length ? issue.path.join(".") : "config"}: ${issue.message}`)
    );
  }
  const parsed = result.data;
  const sources: SourceDescriptor[] = parsed.sources.map((s) => ({
    id: s.id,
    label: s.label ?? s.id,
    group: s.group,
    color: s.color,
    unit: s.unit === DEFAULT_UNIT ? defaultUnit(s.driver) : s.unit,
    decimals: s.decimals,
    offset: s.offset,
    withGraph: s.withGraph,
    driver: s.driver satisfies DriverSpec,
  }));
  checkSources(sources);

  const at = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));
  const brokerHost = env.TEMPLOG_BROKER_HOST ?? parsed.broker.host;
  const dataDir = env.TEMPLOG_DATA_DIR ?? parsed.storage.dir;
  return {
    pollIntervalMs: parsed.pollIntervalMs,
    readTimeoutMs: Math.min(parsed.readTimeoutMs, parsed.pollIntervalMs),
    staleAfterMs: parsed.staleAfterMs ?? parsed.pollIntervalMs * 3,
    history: { windowMs: parsed.history.windowHours * HOUR_MS, maxSamples: parsed.history.maxSamples },
    storage: {
      dir: at(dataDir),
      retentionMs: parsed.storage.retentionDays * 24 * HOUR_MS,
      fsync: parsed.storage.fsync,
      sweepIntervalMs: parsed.storage.sweepIntervalMs,
    },
    queues: parsed.queues,
    broker: {
      ...parsed.broker,
      host: brokerHost,
      passwordFile: parsed.broker.passwordFile ? at(parsed.broker.passwordFile) : undefined,
      caFile: parsed.broker.caFile ? at(parsed.broker.caFile) : undefined,
    },
    server: parsed.server,
    w1: parsed.w1,
    sources,
  };
}

function defaultUnit(driver: DriverSpec): string {
  if (driver.kind === "gpio-digital") return "";
  if (driver.kind === "apator-ec3") return driver.value === "power" ? "W" : "kWh";
  return DEFAULT_UNIT;
}

function checkSources(sources: SourceDescriptor[]) {
  const issues: string[] = [];
  const ids = new Set<string>();
  for (const source of sources) {
    if (ids.has(source.id)) issues.push(`duplicate source id "${source.id}"`);
    ids.add(source.id);
  }
  const meterIntervals = new Map<string, number>();
  for (const source of sources) {
    const driver = source.driver;
    if (driver.kind !== "apator-ec3") continue;
    const interval = meterIntervals.get(driver.port);
    if (interval === undefined) meterIntervals.set(driver.port, driver.intervalMs);
    else if (interval !== driver.intervalMs) {
      issues.push(`${source.id}: meter on ${driver.port} is already polled every ${interval} ms`);
    }
  }
  for (const source of sources) {
    const driver = source.driver;
    if (driver.kind !== "delta") continue;
    for (const ref of [driver.minuend, driver.subtrahend]) {
      if (ref === source.id) issues.push(`${source.id}: delta source cannot refer to itself`);
      else if (!ids.has(ref)) issues.push(`${source.id}: unknown source "${ref}"`);
    }
  }
  if (issues.length > 0) throw new ConfigurationFault(issues);
}

export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): TemplogConfig {
  const abs = resolve(path);
  if (!existsSync(abs)) throw new ConfigurationFault(`config file not found: ${abs}`);
  let text: string;
  try {
    text = readFileSync(abs, "utf8");
  } catch (err) {
    throw new ConfigurationFault(`cannot read ${abs}: ${describeError(err)}`);
  }
  const parsed = safeJsonParse(text);
  if (!parsed.ok) throw new ConfigurationFault(`${abs}: invalid JSON (${parsed.error})`);
  return parseConfig(parsed.value, dirname(abs), env);
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TEMPLOG_CONFIG ?? "templog.json";
}
