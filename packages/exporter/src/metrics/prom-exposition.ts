/**
 * Exporter Adapter: prom-client implementation of the exposition interface.
 *
 * Owns the Registry that `GET /metrics` serializes, plus the exporter's own
 * bookkeeping counters.
 */

import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";
import type {
  CounterHandle,
  GaugeHandle,
  IMetricsExposition,
} from "@fritzbox-exporter/shared";

export interface PromExpositionOptions {
  /** Use an existing registry instead of creating one */
  registry?: Registry;
  /** Also export process/runtime metrics (default: true) */
  collectDefaults?: boolean;
}

export class PromExposition implements IMetricsExposition {
  readonly registry: Registry;

  /** Completed polling rounds */
  readonly rounds: Counter;
  /** Failed samples, by metric */
  readonly sampleErrors: Counter<"metric">;
  /** Counter wraps handled with the estimate, by metric */
  readonly wraps: Counter<"metric">;

  constructor(options?: PromExpositionOptions) {
    this.registry = options?.registry ?? new Registry();
    if (options?.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.rounds = new Counter({
      name: "fritzbox_exporter_rounds_total",
      help: "Completed polling rounds",
      registers: [this.registry],
    });
    this.sampleErrors = new Counter({
      name: "fritzbox_exporter_sample_errors_total",
      help: "Samples that could not be read from the device",
      labelNames: ["metric"] as const,
      registers: [this.registry],
    });
    this.wraps = new Counter({
      name: "fritzbox_exporter_wraps_total",
      help: "Device counter wraps whose increment was estimated",
      labelNames: ["metric"] as const,
      registers: [this.registry],
    });
  }

  newGauge(name: string, help: string): GaugeHandle {
    const gauge = new Gauge({ name, help, registers: [this.registry] });
    return { set: (value) => gauge.set(value) };
  }

  newCounter(name: string, help: string): CounterHandle {
    const counter = new Counter({ name, help, registers: [this.registry] });
    return { increment: (value) => counter.inc(value) };
  }

  /** Serialized registry in the Prometheus text format */
  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
