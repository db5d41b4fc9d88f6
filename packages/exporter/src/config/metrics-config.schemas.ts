/**
 * Typebox schemas for the metrics config file.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// One metric definition
// ---------------------------------------------------------------------------

export const MetricDefinition = Type.Object({
  service: Type.String({ minLength: 1 }),
  action: Type.String({ minLength: 1 }),
  param: Type.String({ minLength: 1 }),
  /** "gauge" or "counter", any case */
  type: Type.String({ minLength: 1 }),
});

export type MetricDefinition = Static<typeof MetricDefinition>;

// ---------------------------------------------------------------------------
// Whole file: metric name -> definition
// ---------------------------------------------------------------------------

export const MetricsFile = Type.Record(Type.String(), Type.Unknown());

export type MetricsFile = Static<typeof MetricsFile>;

/** Prometheus metric name syntax */
export const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
