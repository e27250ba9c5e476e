import http from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { describeError } from "./errors.js";
import { createLogger } from "./log.js";
import type { PipelineStatus } from "./pipeline.js";
import type { Reading, SourceDescriptor } from "./schema.js";
import type { ReadingListener } from "./store.js";

const log = createLogger("server");

/** What the HTTP surface needs from the pipeline. */
export interface ReadApi {
  latest(sourceId: string): Reading | undefined;
  history(sourceId: string, since?: number): Iterable<Reading>;
  listSources(): SourceDescriptor[];
  status(): PipelineStatus;
  subscribe(listener: ReadingListener): () => void;
}

export type RouteResult = { status: number; body: unknown };

type ServerOptions = {
  host: string;
  port: number;
};

function notFound(what: string): RouteResult {
  return { status: 404, body: { ok: false, error: what } };
}

function groupSources(sources: SourceDescriptor[]) {
  const groups = new Map<string, SourceDescriptor[]>();
  for (const source of sources) {
    const list = groups.get(source.group) ?? [];
    list.push(source);
    groups.set(source.group, list);
  }
  return Array.from(groups, ([group, items]) => ({
    group,
    sources: items.map(({ id, label, color, unit, decimals, withGraph, driver }) => ({
      id,
      label,
      color,
      unit,
      decimals,
      with_graph: withGraph,
      kind: driver.kind,
    })),
  }));
}

/** Resolves one read-only request against the API; no I/O. */
export function route(api: ReadApi, method: string, rawUrl: string): RouteResult {
  const url = new URL(rawUrl, "http://localhost");
  if (method !== "GET" && method !== "HEAD") {
    return { status: 405, body: { ok: false, error: "method not allowed" } };
  }
  const path = url.pathname.replace(/\/+$/, "") || "/";
  const known = new Set(api.listSources().map((s) => s.id));

  if (path === "/api/sources") {
    return { status: 200, body: { groups: groupSources(api.listSources()) } };
  }
  if (path === "/api/latest") {
    const items: Record<string, Reading | null> = {};
    for (const id of known) items[id] = api.latest(id) ?? null;
    return { status: 200, body: { items } };
  }
  if (path.startsWith("/api/latest/")) {
    const id = decodeURIComponent(path.slice("/api/latest/".length));
    if (!known.has(id)) return notFound(`unknown source "${id}"`);
    return { status: 200, body: { id, reading: api.latest(id) ?? null } };
  }
  if (path.startsWith("/api/history/")) {
    const id = decodeURIComponent(path.slice("/api/history/".length));
    if (!known.has(id)) return notFound(`unknown source "${id}"`);
    const sinceParam = url.searchParams.get("since");
    let since: number | undefined;
    if (sinceParam !== null) {
      since = Number(sinceParam);
      if (sinceParam.trim() === "" || !Number.isFinite(since)) {
        return { status: 400, body: { ok: false, error: "since must be epoch milliseconds" } };
      }
    }
    return { status: 200, body: { id, items: Array.from(api.history(id, since)) } };
  }
  if (path === "/health") {
    const status = api.status();
    return {
      status: 200,
      body: {
        ok: true,
        uptime_ms: Math.floor(process.uptime() * 1000),
        running: status.running,
        sources: known.size,
        broker: status.publisher.state,
      },
    };
  }
  if (path === "/metrics") {
    return { status: 200, body: api.status() };
  }
  return notFound("not found");
}

/** Read-only HTTP and WebSocket view of the pipeline. */
export class TemplogServer {
  private server?: http.Server;
  private wss?: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe?: () => void;

  constructor(private api: ReadApi, private options: ServerOptions) {}

  start(): Promise<void> {
    const server = http.createServer(this.handleRequest.bind(this));
    this.server = server;
    this.wss = new WebSocketServer({ noServer: true });

    server.on("upgrade", (req, socket, head) => {
      const url = req.url ?? "";
      if (url.startsWith("/ws/readings")) {
        this.wss?.handleUpgrade(req, socket, head, (ws) => {
          this.clients.add(ws);
          ws.on("close", () => this.clients.delete(ws));
          ws.on("error", (err) => log.debug(`websocket client: ${describeError(err)}`));
        });
        return;
      }
      socket.destroy();
    });

    this.unsubscribe = this.api.subscribe((sourceId, reading) => this.broadcast(sourceId, reading));

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off("error", reject);
        log.info(`read API on http://${this.options.host}:${this.address()}`);
        resolve();
      });
    });
  }

  /** Bound port; differs from the configured one when that was 0. */
  address(): number {
    const addr = this.server?.address();
    return addr && typeof addr === "object" ? addr.port : this.options.port;
  }

  async stop() {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    this.wss?.close();
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private broadcast(sourceId: string, reading: Reading) {
    if (this.clients.size === 0) return;
    const payload = JSON.stringify({ source: sourceId, ...reading });
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    let result: RouteResult;
    try {
      result = route(this.api, req.method ?? "GET", req.url ?? "/");
    } catch (err) {
      log.error(`${req.method ?? "GET"} ${req.url ?? "/"}: ${describeError(err)}`);
      result = { status: 500, body: { ok: false, error: "internal error" } };
    }
    this.respondJson(res, result.status, result.body);
  }

  private respondJson(res: http.ServerResponse, status: number, payload: unknown) {
    const body = JSON.stringify(payload);
    res.writeHead(status, {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }
}
