/**
 * Delta Reconciler: turns cumulative device counters into increments.
 *
 * The router only reports running totals, but a Prometheus counter can only
 * be incremented. Each counter metric keeps the last raw value it saw and
 * adds the difference on every sample.
 *
 * Device counters wrap at a width we don't know. When a sample is lower than
 * the previous one we report `next * 2` as the increment: the expected true
 * increment for a uniformly distributed wrap point. This is an estimate and
 * is kept as is.
 */

/** Per-counter state, owned by the metric's registry binding */
export interface ReconciliationState {
  /** Last raw value read from the device (0 until the first sample) */
  lastRawValue: number;
}

export interface DeltaResult {
  /** Non-negative amount to add to the exported counter */
  increment: number;
  /** True when the counter went backwards and `increment` is estimated */
  wrapped: boolean;
}

/** Called when a wrap is detected, with the estimate that was used */
export type WrapHandler = (previous: number, next: number, estimate: number) => void;

export function createReconciliationState(): ReconciliationState {
  return { lastRawValue: 0 };
}

/** Increment between two raw samples, without touching any state */
export function computeIncrement(previous: number, next: number): DeltaResult {
  const diff = next - previous;
  if (diff >= 0) {
    return { increment: diff, wrapped: false };
  }
  return { increment: next * 2, wrapped: true };
}

/**
 * Reconcile a new raw sample against `state` and return the increment.
 * `state.lastRawValue` always ends up as `newRaw`, estimated or not.
 */
export function reconcile(
  state: ReconciliationState,
  newRaw: number,
  onWrap?: WrapHandler,
): number {
  const previous = state.lastRawValue;
  const { increment, wrapped } = computeIncrement(previous, newRaw);
  state.lastRawValue = newRaw;
  if (wrapped && onWrap) {
    onWrap(previous, newRaw, increment);
  }
  return increment;
}
