/**
 * Types for the metric pipeline.
 *
 * A MetricSpec is built once from the metrics config file. Samples flow
 * through the sampler on every polling round and are never stored.
 */

// ---------------------------------------------------------------------------
// Metric definitions
// ---------------------------------------------------------------------------

/** Exported Prometheus primitive for a configured metric */
export type MetricKind = "gauge" | "counter";

/** One configured metric, immutable after startup */
export interface MetricSpec {
  /** Prometheus metric name, unique across the registry */
  readonly name: string;
  /** TR-064 service name, e.g. "WANCommonInterfaceConfig1" */
  readonly service: string;
  /** TR-064 action name, e.g. "GetAddonInfos" */
  readonly action: string;
  /** Output argument of the action to read, e.g. "NewTotalBytesSent" */
  readonly param: string;
  readonly kind: MetricKind;
}

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/** Result of polling one metric once */
export interface Sample {
  metric: string;
  kind: MetricKind;
  /** Value as read from the device */
  rawValue: number;
  /** Gauge value, or the increment applied to a counter */
  value: number;
  /** True when a counter was found to have wrapped and the increment is estimated */
  wrapped: boolean;
  /** ISO 8601 timestamp */
  timestamp: string;
}

// ---------------------------------------------------------------------------
// API response envelopes
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok" | "stopped";
  running: boolean;
  metrics: number;
  rounds: number;
  /** ISO 8601 timestamp of the last completed round, null before the first */
  lastRoundAt: string | null;
  timestamp: string;
}
