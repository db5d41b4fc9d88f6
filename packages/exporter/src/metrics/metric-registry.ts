/**
 * MetricSpec Registry: the fixed set of metrics to poll.
 *
 * Built once at startup from the config file's definitions. Each spec is
 * bound 1:1 to the exported object it feeds: a gauge, or a counter plus the
 * reconciliation state that turns raw totals into increments.
 */

import { Value } from "@sinclair/typebox/value";
import type {
  CounterHandle,
  GaugeHandle,
  IMetricsExposition,
  MetricKind,
  MetricSpec,
} from "@fritzbox-exporter/shared";
import { ConfigError } from "../errors.js";
import { METRIC_NAME_RE, MetricDefinition } from "../config/metrics-config.schemas.js";
import { createReconciliationState, type ReconciliationState } from "./delta-reconciler.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Definitions keyed by metric name, in config order */
export type MetricDefinitions =
  | Record<string, unknown>
  | ReadonlyArray<readonly [string, unknown]>;

export interface GaugeBinding {
  kind: "gauge";
  spec: MetricSpec;
  gauge: GaugeHandle;
}

export interface CounterBinding {
  kind: "counter";
  spec: MetricSpec;
  counter: CounterHandle;
  state: ReconciliationState;
}

/** A spec together with the exported object it writes to */
export type MetricBinding = GaugeBinding | CounterBinding;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function parseKind(name: string, type: string): MetricKind {
  const kind = type.toLowerCase();
  if (kind === "gauge" || kind === "counter") return kind;
  throw new ConfigError(
    `Metric "${name}" has unknown type "${type}" (expected gauge or counter)`,
  );
}

function isEntryList(
  definitions: MetricDefinitions,
): definitions is ReadonlyArray<readonly [string, unknown]> {
  return Array.isArray(definitions);
}

function toEntries(definitions: MetricDefinitions): ReadonlyArray<readonly [string, unknown]> {
  return isEntryList(definitions) ? definitions : Object.entries(definitions);
}

/** Help text recording where a metric's value comes from */
export function describeSpec(spec: MetricSpec): string {
  return `Service: ${spec.service}, Action: ${spec.action}, Parameter: ${spec.param}`;
}

/**
 * Validate metric definitions and return specs in config order.
 * Throws ConfigError on the first invalid or duplicate definition.
 */
export function loadMetricSpecs(definitions: MetricDefinitions): MetricSpec[] {
  const specs: MetricSpec[] = [];
  const seen = new Set<string>();

  for (const [name, definition] of toEntries(definitions)) {
    if (!METRIC_NAME_RE.test(name)) {
      throw new ConfigError(`Invalid metric name "${name}"`);
    }
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate metric name "${name}"`);
    }
    if (!Value.Check(MetricDefinition, definition)) {
      const first = Value.Errors(MetricDefinition, definition).First();
      const where = first?.path ? ` at ${first.path}` : "";
      throw new ConfigError(
        `Invalid definition for metric "${name}"${where}: ${first?.message ?? "expected an object"}`,
      );
    }

    seen.add(name);
    specs.push(
      Object.freeze({
        name,
        service: definition.service,
        action: definition.action,
        param: definition.param,
        kind: parseKind(name, definition.type),
      }),
    );
  }

  if (specs.length === 0) {
    throw new ConfigError("No metrics configured");
  }
  return specs;
}

// ---------------------------------------------------------------------------
// MetricRegistry
// ---------------------------------------------------------------------------

export class MetricRegistry {
  readonly bindings: readonly MetricBinding[];

  private byName: Map<string, MetricBinding>;

  constructor(specs: MetricSpec[], exposition: IMetricsExposition) {
    this.bindings = specs.map((spec) => bind(spec, exposition));
    this.byName = new Map(this.bindings.map((b) => [b.spec.name, b]));
  }

  /** Validate definitions and create their exported objects */
  static load(definitions: MetricDefinitions, exposition: IMetricsExposition): MetricRegistry {
    return new MetricRegistry(loadMetricSpecs(definitions), exposition);
  }

  get size(): number {
    return this.bindings.length;
  }

  get specs(): MetricSpec[] {
    return this.bindings.map((b) => b.spec);
  }

  get(name: string): MetricBinding | undefined {
    return this.byName.get(name);
  }
}

function bind(spec: MetricSpec, exposition: IMetricsExposition): MetricBinding {
  const help = describeSpec(spec);
  try {
    switch (spec.kind) {
      case "gauge":
        return { kind: "gauge", spec, gauge: exposition.newGauge(spec.name, help) };
      case "counter":
        return {
          kind: "counter",
          spec,
          counter: exposition.newCounter(spec.name, help),
          state: createReconciliationState(),
        };
    }
  } catch (err) {
    // e.g. the name collides with an already registered metric
    throw new ConfigError(
      `Cannot register metric "${spec.name}": ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}
