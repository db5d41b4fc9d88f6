/**
 * Startup wiring: config file -> registry -> sampler -> scheduler -> server.
 *
 * Any failure here is fatal and propagates to the caller; nothing is polled
 * until every step has succeeded.
 */

import type { Logger } from "pino";
import type { IDeviceTransport } from "@fritzbox-exporter/shared";
import { buildApp } from "./app.js";
import { loadMetricsConfig } from "./config/metrics-config.js";
import type { ExporterOptions } from "./config/options.js";
import {
  MetricRegistry,
  PollScheduler,
  PromExposition,
  Sampler,
  type PollSchedulerOptions,
} from "./metrics/index.js";
import { Tr064Client } from "./tr064/index.js";

export interface ExporterDeps {
  logger: Logger;
  /** Override the device transport (for testing); connect() is skipped */
  transport?: IDeviceTransport;
  /** Override the exposition (for testing) */
  exposition?: PromExposition;
  /** Extra scheduler options, e.g. pacing (for testing) */
  scheduler?: Pick<PollSchedulerOptions, "unitMs" | "random" | "sleep">;
}

export async function createExporter(options: ExporterOptions, deps: ExporterDeps) {
  const { logger } = deps;

  // 1. Metric definitions
  const definitions = await loadMetricsConfig(options.configPath);
  const exposition = deps.exposition ?? new PromExposition();
  const registry = MetricRegistry.load(definitions, exposition);
  logger.debug({ metrics: registry.specs }, "loaded metrics config");

  // 2. Device session, established once and reused by every round
  let transport = deps.transport;
  if (!transport) {
    if (options.username === undefined || options.password === undefined) {
      logger.warn("no TR-064 credentials configured; protected actions will fail");
    }
    const client = new Tr064Client({
      address: options.address,
      port: options.tr064Port,
      username: options.username,
      password: options.password,
      logger,
    });
    await client.connect();
    transport = client;
  }

  // 3. Sampling and scheduling
  const sampler = new Sampler(transport, {
    logger,
    onWrap: (spec) => exposition.wraps.inc({ metric: spec.name }),
  });
  const scheduler = new PollScheduler(registry, sampler, {
    ...deps.scheduler,
    logger,
    onSampleError: (err) => exposition.sampleErrors.inc({ metric: err.metric }),
    onRoundComplete: () => exposition.rounds.inc(),
  });

  // 4. HTTP server (starts the scheduler once ready)
  const app = await buildApp({ exposition, scheduler, registry, logger });

  return { app, scheduler, registry, exposition, transport };
}

export type Exporter = Awaited<ReturnType<typeof createExporter>>;
