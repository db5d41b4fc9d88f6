import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";

import type { MetricRegistry } from "./metrics/metric-registry.js";
import type { PollScheduler } from "./metrics/poll-scheduler.js";
import type { PromExposition } from "./metrics/prom-exposition.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions {
  exposition: PromExposition;
  scheduler: PollScheduler;
  registry: MetricRegistry;
  /** Shared process logger (default: Fastify logging disabled) */
  logger?: FastifyBaseLogger;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { exposition, scheduler, registry, logger } = opts;

  const app = Fastify({
    loggerInstance: logger,
    // Generate unique request IDs for tracing
    genReqId: (req) => {
      const header = req.headers["x-request-id"];
      return typeof header === "string" && header !== "" ? header : randomUUID();
    },
  });

  // Polling components (decorated so routes can access them)
  app.decorate("exposition", exposition);
  app.decorate("scheduler", scheduler);
  app.decorate("metricRegistry", registry);

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    // Unexpected errors: log full details, return generic message
    request.log.error({ err: error }, "request failed");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes, { prefix: "/health" });

  // ---------------------------------------------------------------------------
  // Lifecycle hooks
  // ---------------------------------------------------------------------------

  // Start polling when the server is ready, stop it on close
  app.addHook("onReady", async () => {
    scheduler.start();
  });

  app.addHook("onClose", async () => {
    await scheduler.stop();
  });

  return app;
}
