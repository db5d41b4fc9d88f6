import "fastify";
import type { MetricRegistry } from "../metrics/metric-registry.js";
import type { PollScheduler } from "../metrics/poll-scheduler.js";
import type { PromExposition } from "../metrics/prom-exposition.js";

declare module "fastify" {
  interface FastifyInstance {
    exposition: PromExposition;
    scheduler: PollScheduler;
    metricRegistry: MetricRegistry;
  }
}
