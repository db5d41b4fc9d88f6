/**
 * Prometheus scrape endpoint.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/", async (_request, reply) => {
    const body = await app.exposition.metrics();
    return reply.type(app.exposition.contentType).send(body);
  });
};
