#!/usr/bin/env node
import { defaultConfigPath, loadConfig, type TemplogConfig } from "./config.js";
import { ConfigurationFault, describeError } from "./errors.js";
import { parseLogLevel, setLogLevel } from "./log.js";
import { Pipeline } from "./pipeline.js";
import { TemplogServer } from "./server.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage(exitCode = 0) {
  console.log(`templog <command> [options]

Commands:
  start [--config <path>] [--port <port>] [--data-dir <dir>]
  check [--config <path>]
  read  [--config <path>]
  sweep [--config <path>]

Options:
  --log-level <debug|info|warn|error>

Defaults:
  --config $TEMPLOG_CONFIG or ./templog.json
  --port   from the configuration (9124)
`);
  process.exit(exitCode);
}

if (hasFlag("--help") || cmd === "--help" || cmd === "help") {
  usage(0);
}

const levelArg = getArg("--log-level");
if (levelArg !== undefined) {
  const level = parseLogLevel(levelArg);
  if (!level) {
    console.error(`Invalid --log-level ${levelArg}`);
    process.exit(1);
  }
  setLogLevel(level);
}

function fail(err: unknown): never {
  if (err instanceof ConfigurationFault) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(describeError(err));
  }
  process.exit(1);
}

function config(): TemplogConfig {
  const env = { ...process.env };
  const dataDir = getArg("--data-dir");
  if (dataDir) env.TEMPLOG_DATA_DIR = dataDir;
  try {
    return loadConfig(getArg("--config", defaultConfigPath(env)) ?? defaultConfigPath(env), env);
  } catch (err) {
    fail(err);
  }
}

async function cmdStart() {
  const cfg = config();
  const portArg = getArg("--port");
  const port = portArg === undefined ? cfg.server.port : Number(portArg);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    console.error("Invalid --port");
    process.exit(1);
  }
  let pipeline: Pipeline;
  try {
    pipeline = new Pipeline(cfg);
  } catch (err) {
    fail(err);
  }
  const server = new TemplogServer(pipeline, { host: cfg.server.host, port });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, stopping`);
    let code = 0;
    try {
      await server.stop();
      await pipeline.stop();
    } catch (err) {
      console.error(`shutdown failed: ${describeError(err)}`);
      code = 1;
    }
    process.exit(code);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  try {
    await pipeline.start();
    await server.start();
  } catch (err) {
    await pipeline.stop();
    fail(err);
  }
  console.log(`templog running on http://localhost:${server.address()}`);
}

function cmdCheck() {
  const cfg = config();
  console.log(`poll every ${cfg.pollIntervalMs} ms, read timeout ${cfg.readTimeoutMs} ms`);
  console.log(`log dir ${cfg.storage.dir}, retention ${cfg.storage.retentionMs / 86_400_000} days`);
  console.log(cfg.broker.host ? `broker ${cfg.broker.host}:${cfg.broker.port} topic ${cfg.broker.baseTopic}/<id>` : "broker disabled");
  for (const source of cfg.sources) {
    console.log(`  ${source.id.padEnd(20)} ${source.driver.kind.padEnd(13)} ${source.group} / ${source.label}`);
  }
}

async function cmdRead() {
  const cfg = config();
  let pipeline: Pipeline;
  try {
    pipeline = new Pipeline(cfg, { transport: null });
  } catch (err) {
    fail(err);
  }
  try {
    for (const source of pipeline.sources) {
      const reading = await pipeline.scheduler.pollOnce(source);
      const text = reading.status === "ok" ? `${reading.formatted} ${reading.unit}`.trim() : `${reading.status}: ${source.lastError ?? ""}`;
      console.log(`${source.id.padEnd(20)} ${text}`);
    }
  } finally {
    await pipeline.closeSources();
  }
}

async function cmdSweep() {
  const cfg = config();
  let pipeline: Pipeline;
  try {
    pipeline = new Pipeline(cfg, { transport: null });
  } catch (err) {
    fail(err);
  }
  const deleted = await pipeline.sweep();
  if (deleted.length === 0) console.log("nothing to delete");
  for (const name of deleted) console.log(`deleted ${name}`);
}

if (cmd === "start") {
  await cmdStart();
} else if (cmd === "check") {
  cmdCheck();
} else if (cmd === "read") {
  await cmdRead();
} else if (cmd === "sweep") {
  await cmdSweep();
} else {
  usage(1);
}
