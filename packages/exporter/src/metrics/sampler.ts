/**
 * Sampler: reads one metric from the device and routes the value.
 *
 * Gauges are overwritten with the raw value. Counters go through the delta
 * reconciler first and are incremented by the result.
 */

import type { Logger } from "pino";
import type {
  IDeviceTransport,
  MetricSpec,
  Sample,
} from "@fritzbox-exporter/shared";
import { SampleError } from "../errors.js";
import { reconcile } from "./delta-reconciler.js";
import type { MetricBinding } from "./metric-registry.js";

export interface SamplerOptions {
  logger?: Logger;
  /** Called when a counter wrap was estimated (after the debug log) */
  onWrap?: (spec: MetricSpec, previous: number, next: number, estimate: number) => void;
}

/** Numeric value of an action argument, or undefined if it has none */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export class Sampler {
  private transport: IDeviceTransport;
  private logger: Logger | null;
  private onWrap: SamplerOptions["onWrap"];

  constructor(transport: IDeviceTransport, options?: SamplerOptions) {
    this.transport = transport;
    this.logger = options?.logger ?? null;
    this.onWrap = options?.onWrap;
  }

  /** Read the raw value of one metric. Throws SampleError. */
  async sample(spec: MetricSpec, signal?: AbortSignal): Promise<number> {
    let response: Record<string, unknown>;
    try {
      response = await this.transport.call(spec.service, spec.action, signal);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SampleError(
        spec.name,
        `${spec.service}#${spec.action} failed: ${reason}`,
        { cause: err },
      );
    }

    if (!Object.hasOwn(response, spec.param)) {
      throw new SampleError(
        spec.name,
        `${spec.service}#${spec.action} returned no "${spec.param}"`,
      );
    }
    const value = toNumber(response[spec.param]);
    if (value === undefined) {
      throw new SampleError(
        spec.name,
        `"${spec.param}" is not numeric: ${JSON.stringify(response[spec.param])}`,
      );
    }
    // 64-bit device counters can exceed what a double holds exactly
    if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
      throw new SampleError(
        spec.name,
        `"${spec.param}" is outside the exact integer range: ${JSON.stringify(response[spec.param])}`,
      );
    }
    if (spec.kind === "counter" && value < 0) {
      throw new SampleError(spec.name, `counter "${spec.param}" is negative: ${value}`);
    }
    return value;
  }

  /** Push a raw value into the metric's exported object */
  record(binding: MetricBinding, rawValue: number): Sample {
    const timestamp = new Date().toISOString();
    const { spec } = binding;

    switch (binding.kind) {
      case "gauge":
        binding.gauge.set(rawValue);
        return { metric: spec.name, kind: "gauge", rawValue, value: rawValue, wrapped: false, timestamp };

      case "counter": {
        let wrapped = false;
        const increment = reconcile(binding.state, rawValue, (previous, next, estimate) => {
          wrapped = true;
          this.logger?.debug(
            { metric: spec.name, previous, next, estimate },
            "counter went backwards, estimating increment",
          );
          this.onWrap?.(spec, previous, next, estimate);
        });
        binding.counter.increment(increment);
        return { metric: spec.name, kind: "counter", rawValue, value: increment, wrapped, timestamp };
      }
    }
  }

  /** Sample and record one metric */
  async poll(binding: MetricBinding, signal?: AbortSignal): Promise<Sample> {
    const rawValue = await this.sample(binding.spec, signal);
    return this.record(binding, rawValue);
  }
}
