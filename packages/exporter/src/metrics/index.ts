/**
 * Metrics Module
 *
 * Turns configured TR-064 values into Prometheus metrics: the registry of
 * metric specs, the delta reconciler for device counters, the sampler and
 * the polling scheduler.
 */

export { MetricRegistry, loadMetricSpecs, describeSpec } from "./metric-registry.js";
export type { MetricBinding, GaugeBinding, CounterBinding, MetricDefinitions } from "./metric-registry.js";
export { reconcile, computeIncrement, createReconciliationState } from "./delta-reconciler.js";
export type { ReconciliationState, DeltaResult, WrapHandler } from "./delta-reconciler.js";
export { Sampler, toNumber } from "./sampler.js";
export type { SamplerOptions } from "./sampler.js";
export { PollScheduler, computePauseMs } from "./poll-scheduler.js";
export type { PollSchedulerOptions } from "./poll-scheduler.js";
export { PromExposition } from "./prom-exposition.js";
export type { PromExpositionOptions } from "./prom-exposition.js";
