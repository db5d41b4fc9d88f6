export type { MetricKind, MetricSpec, Sample, HealthResponse } from "./types/metrics.js";
export type { ActionArguments, IDeviceTransport } from "./types/transport.js";
export type { GaugeHandle, CounterHandle, IMetricsExposition } from "./types/exposition.js";
