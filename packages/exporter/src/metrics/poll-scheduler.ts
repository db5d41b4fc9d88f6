/**
 * Poll Scheduler: drives polling rounds over every configured metric.
 *
 * One round samples each metric in registry order. After each metric the
 * loop pauses for (10 + randInt(0, 10)) / N time units, so a full round is
 * spread over 10–19 units whatever N is, and the jitter keeps this poller
 * out of step with others hitting the same device.
 *
 * A failed sample is logged and counted; the round moves on and the metric
 * is simply tried again next round. `stop()` aborts the pending pause or device request and
 * resolves once the loop has exited.
 *
 * Like the sampler, this module knows nothing about the HTTP server.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { Sample } from "@fritzbox-exporter/shared";
import { SampleError } from "../errors.js";
import type { MetricRegistry } from "./metric-registry.js";
import type { Sampler } from "./sampler.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fixed part of a round's total pause, in time units */
const BASE_ROUND_UNITS = 10;
/** Random part of a round's total pause, integer in [0, JITTER_UNITS) */
const JITTER_UNITS = 10;
const DEFAULT_UNIT_MS = 1_000;

export interface PollSchedulerOptions {
  /** Length of one time unit in ms (default: 1000) */
  unitMs?: number;
  /** Random source in [0, 1) (default: Math.random) */
  random?: () => number;
  /** Abortable delay (default: node:timers/promises setTimeout) */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  logger?: Logger;
  /** Called after every successful sample */
  onSample?: (sample: Sample) => void;
  /** Called after every failed sample */
  onSampleError?: (error: SampleError) => void;
  /** Called when a full round has completed */
  onRoundComplete?: (round: number) => void;
}

/** Pause after one metric, in ms */
export function computePauseMs(
  metricCount: number,
  random: () => number = Math.random,
  unitMs = DEFAULT_UNIT_MS,
): number {
  const jitter = Math.floor(random() * JITTER_UNITS);
  return ((BASE_ROUND_UNITS + jitter) * unitMs) / Math.max(1, metricCount);
}

const defaultSleep = (ms: number, signal: AbortSignal): Promise<void> =>
  delay(ms, undefined, { signal });

// ---------------------------------------------------------------------------
// PollScheduler
// ---------------------------------------------------------------------------

export class PollScheduler {
  private registry: MetricRegistry;
  private sampler: Sampler;
  private unitMs: number;
  private random: () => number;
  private sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private logger: Logger | null;
  private onSample: PollSchedulerOptions["onSample"];
  private onSampleError: PollSchedulerOptions["onSampleError"];
  private onRoundComplete: PollSchedulerOptions["onRoundComplete"];

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private rounds = 0;
  private lastRound: Date | null = null;

  constructor(registry: MetricRegistry, sampler: Sampler, options?: PollSchedulerOptions) {
    this.registry = registry;
    this.sampler = sampler;
    this.unitMs = options?.unitMs ?? DEFAULT_UNIT_MS;
    this.random = options?.random ?? Math.random;
    this.sleep = options?.sleep ?? defaultSleep;
    this.logger = options?.logger ?? null;
    this.onSample = options?.onSample;
    this.onSampleError = options?.onSampleError;
    this.onRoundComplete = options?.onRoundComplete;
  }

  /** Start the polling loop */
  start(): void {
    if (this.controller) return; // already running
    const controller = new AbortController();
    this.controller = controller;
    this.logger?.info({ metrics: this.registry.size }, "polling started");

    this.loop = this.run(controller.signal)
      .catch((err: unknown) => {
        this.logger?.error({ err }, "polling loop failed");
      })
      .finally(() => {
        this.controller = null;
        this.loop = null;
      });
  }

  /** Stop the polling loop; resolves when it has exited */
  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller) return;
    controller.abort();
    await loop;
    this.logger?.info({ rounds: this.rounds }, "polling stopped");
  }

  /** Whether the loop is running */
  get isRunning(): boolean {
    return this.controller !== null;
  }

  /** Number of completed rounds */
  get roundsCompleted(): number {
    return this.rounds;
  }

  /** When the last round completed, null before the first */
  get lastRoundAt(): Date | null {
    return this.lastRound;
  }

  /**
   * Run one round over every metric. Returns the successful samples.
   * Returns early, without counting the round, if `signal` is aborted.
   */
  async runRound(signal: AbortSignal = new AbortController().signal): Promise<Sample[]> {
    const bindings = this.registry.bindings;
    const samples: Sample[] = [];

    if (bindings.length === 0) {
      await this.pause(BASE_ROUND_UNITS * this.unitMs, signal);
      return samples;
    }

    for (const binding of bindings) {
      if (signal.aborted) return samples;

      try {
        const sample = await this.sampler.poll(binding, signal);
        samples.push(sample);
        this.logger?.info(
          { metric: sample.metric, kind: sample.kind, value: sample.value, raw: sample.rawValue },
          sample.kind === "gauge" ? "updated gauge" : "incremented counter",
        );
        this.onSample?.(sample);
      } catch (err) {
        if (signal.aborted) {
          this.logger?.debug({ metric: binding.spec.name }, "sample cancelled");
          return samples;
        }
        if (err instanceof SampleError) {
          this.logger?.warn({ metric: err.metric, err }, "sample failed");
          this.onSampleError?.(err);
        } else {
          this.logger?.error({ metric: binding.spec.name, err }, "unexpected error while polling metric");
        }
      }

      const pauseMs = computePauseMs(bindings.length, this.random, this.unitMs);
      if (!(await this.pause(pauseMs, signal))) return samples;
    }

    this.rounds++;
    this.lastRound = new Date();
    this.onRoundComplete?.(this.rounds);
    return samples;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Sleep unless aborted. Returns false if the pause was cut short. */
  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await this.sleep(ms, signal);
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.runRound(signal);
    }
  }
}
