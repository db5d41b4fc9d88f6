import { describe, it, expect, vi, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import type { ActionArguments, IDeviceTransport } from "@fritzbox-exporter/shared";
import { buildApp } from "./app.js";
import { MetricRegistry } from "./metrics/metric-registry.js";
import { PollScheduler } from "./metrics/poll-scheduler.js";
import { PromExposition } from "./metrics/prom-exposition.js";
import { Sampler } from "./metrics/sampler.js";

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

function createMockTransport(): IDeviceTransport {
  return {
    call: vi.fn(async (_service: string, action: string): Promise<ActionArguments> =>
      action === "GetInfo" ? { NewUpTime: 3600 } : { NewTotalBytesSent: 2048 },
    ),
  };
}

async function setup() {
  const exposition = new PromExposition({ collectDefaults: false });
  const registry = MetricRegistry.load(
    {
      uptime: { service: "DeviceInfo1", action: "GetInfo", param: "NewUpTime", type: "gauge" },
      bytes_sent: {
        service: "WANCommonInterfaceConfig1",
        action: "GetAddonInfos",
        param: "NewTotalBytesSent",
        type: "counter",
      },
    },
    exposition,
  );
  const scheduler = new PollScheduler(registry, new Sampler(createMockTransport()), {
    onRoundComplete: () => exposition.rounds.inc(),
  });
  const app = await buildApp({ exposition, scheduler, registry });
  return { app, scheduler, exposition };
}

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

// ---------------------------------------------------------------------------
// GET /metrics
// ---------------------------------------------------------------------------

describe("GET /metrics", () => {
  it("serves the registry in the Prometheus text format", async () => {
    const ctx = await setup();
    app = ctx.app;

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.body).toContain(
      "# HELP uptime Service: DeviceInfo1, Action: GetInfo, Parameter: NewUpTime\n# TYPE uptime gauge\n",
    );
    expect(res.body).toContain("# TYPE bytes_sent counter\n");
  });

  it("reflects values sampled by the running scheduler", async () => {
    const ctx = await setup();
    app = ctx.app;
    await app.ready();

    // the first metric is sampled as soon as polling starts
    await vi.waitFor(async () => {
      const res = await ctx.exposition.metrics();
      expect(res).toContain("\nuptime 3600\n");
    });
  });
});

// ---------------------------------------------------------------------------
// GET /health
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("reports a running scheduler once the server is ready", async () => {
    const ctx = await setup();
    app = ctx.app;

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({ status: "ok", running: true, metrics: 2, rounds: 0, lastRoundAt: null });
    expect(typeof body.timestamp).toBe("string");
  });

  it("returns 503 when polling has stopped", async () => {
    const ctx = await setup();
    app = ctx.app;
    await app.ready();
    await ctx.scheduler.stop();

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ status: "stopped", running: false });
  });
});

describe("lifecycle", () => {
  it("stops polling when the server closes", async () => {
    const ctx = await setup();
    await ctx.app.ready();
    expect(ctx.scheduler.isRunning).toBe(true);

    await ctx.app.close();
    expect(ctx.scheduler.isRunning).toBe(false);
  });
});
