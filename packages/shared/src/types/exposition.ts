/**
 * Exposition interface: where reconciled values end up.
 *
 * The core writes through these handles and never reads back.
 */

export interface GaugeHandle {
  /** Overwrite the current value */
  set(value: number): void;
}

export interface CounterHandle {
  /** Add a non-negative amount */
  increment(value: number): void;
}

export interface IMetricsExposition {
  newGauge(name: string, help: string): GaugeHandle;
  newCounter(name: string, help: string): CounterHandle;
}
