import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse } from "@fritzbox-exporter/shared";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const { scheduler } = app;
    const running = scheduler.isRunning;

    const payload: HealthResponse = {
      status: running ? "ok" : "stopped",
      running,
      metrics: app.metricRegistry.size,
      rounds: scheduler.roundsCompleted,
      lastRoundAt: scheduler.lastRoundAt?.toISOString() ?? null,
      timestamp: new Date().toISOString(),
    };

    return reply.status(running ? 200 : 503).send(payload);
  });
};
