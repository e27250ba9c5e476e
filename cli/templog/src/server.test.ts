import { describe, expect, it } from "vitest";
import { parseConfig } from "./config.js";
import { Pipeline } from "./pipeline.js";
import { route } from "./server.js";

function pipeline() {
  const config = parseConfig(
    {
      sources: [
        { id: "top", label: "Top", group: "tank", driver: { kind: "simulated", script: [42] } },
        { id: "pump", group: "heating", driver: { kind: "gpio-digital", gpio: 27, textOn: "running" } },
      ],
    },
    "/tmp",
    {}
  );
  const t = 1000;
  return new Pipeline(config, { transport: null, clock: () => t, readingClock: () => t });
}

describe("route", () => {
  it("groups the source descriptors", () => {
    const result = route(pipeline(), "GET", "/api/sources");
    expect(result).toEqual({
      status: 200,
      body: {
        groups: [
          {
            group: "tank",
            sources: [{ id: "top", label: "Top", color: "#999999", unit: "°C", decimals: 1, with_graph: true, kind: "simulated" }],
          },
          {
            group: "heating",
            sources: [{ id: "pump", label: "pump", color: "#999999", unit: "", decimals: 1, with_graph: true, kind: "gpio-digital" }],
          },
        ],
      },
    });
  });

  it("returns the latest reading of one source", async () => {
    const api = pipeline();
    await api.scheduler.pollOnce(api.sources[0]);
    expect(route(api, "GET", "/api/latest/top")).toEqual({
      status: 200,
      body: { id: "top", reading: { value: 42, unit: "°C", timestamp: 1000, status: "ok", formatted: "42.0" } },
    });
    expect(route(api, "GET", "/api/latest")).toEqual({
      status: 200,
      body: {
        items: {
          top: { value: 42, unit: "°C", timestamp: 1000, status: "ok", formatted: "42.0" },
          pump: null,
        },
      },
    });
  });

  it("filters history by timestamp", async () => {
    const api = pipeline();
    await api.scheduler.pollOnce(api.sources[0]);
    expect(route(api, "GET", "/api/history/top?since=1000").body).toEqual({
      id: "top",
      items: [{ value: 42, unit: "°C", timestamp: 1000, status: "ok", formatted: "42.0" }],
    });
    expect(route(api, "GET", "/api/history/top?since=1001").body).toEqual({ id: "top", items: [] });
    expect(route(api, "GET", "/api/history/top?since=soon")).toEqual({
      status: 400,
      body: { ok: false, error: "since must be epoch milliseconds" },
    });
  });

  it("answers unknown sources and paths with 404", () => {
    const api = pipeline();
    expect(route(api, "GET", "/api/latest/nope")).toEqual({ status: 404, body: { ok: false, error: 'unknown source "nope"' } });
    expect(route(api, "GET", "/api/history/nope").status).toBe(404);
    expect(route(api, "GET", "/api/unknown").status).toBe(404);
  });

  it("is read-only", () => {
    expect(route(pipeline(), "POST", "/api/latest").status).toBe(405);
  });

  it("reports health and counters", () => {
    const health = route(pipeline(), "GET", "/health");
    expect(health.status).toBe(200);
    expect(health.body).toMatchObject({ ok: true, running: false, sources: 2, broker: "disabled" });
    const metrics = route(pipeline(), "GET", "/metrics");
    expect(metrics.body).toMatchObject({ running: false, started_at: null, publisher: { state: "disabled" } });
  });
});
