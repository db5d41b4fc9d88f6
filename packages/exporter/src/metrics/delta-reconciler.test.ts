import { describe, it, expect, vi } from "vitest";
import {
  computeIncrement,
  createReconciliationState,
  reconcile,
} from "./delta-reconciler.js";

// ---------------------------------------------------------------------------
// computeIncrement
// ---------------------------------------------------------------------------

describe("computeIncrement", () => {
  it("returns the difference for monotonic progress", () => {
    expect(computeIncrement(100, 140)).toEqual({ increment: 40, wrapped: false });
  });

  it("returns zero when the counter did not move", () => {
    expect(computeIncrement(512, 512)).toEqual({ increment: 0, wrapped: false });
  });

  it("estimates twice the new value when the counter went backwards", () => {
    expect(computeIncrement(140, 40)).toEqual({ increment: 80, wrapped: true });
  });

  it("reports zero after a wrap to zero", () => {
    expect(computeIncrement(4_000_000_000, 0)).toEqual({ increment: 0, wrapped: true });
  });

  it("is a pure function of its inputs", () => {
    expect(computeIncrement(7, 3)).toEqual(computeIncrement(7, 3));
    expect(computeIncrement(3, 7)).toEqual(computeIncrement(3, 7));
  });
});

// ---------------------------------------------------------------------------
// reconcile
// ---------------------------------------------------------------------------

describe("reconcile", () => {
  it("starts from zero, so the first sample counts in full", () => {
    const state = createReconciliationState();
    expect(state.lastRawValue).toBe(0);
    expect(reconcile(state, 1234)).toBe(1234);
    expect(state.lastRawValue).toBe(1234);
  });

  it("returns b - a and stores b when b >= a", () => {
    const pairs: [number, number][] = [[0, 0], [5, 9], [1000, 1000], [3, 2_000_000]];
    for (const [a, b] of pairs) {
      const state = { lastRawValue: a };
      expect(reconcile(state, b)).toBe(b - a);
      expect(state.lastRawValue).toBe(b);
    }
  });

  it("returns b * 2 and stores b when b < a", () => {
    const pairs: [number, number][] = [[1, 0], [9, 5], [2_000_000, 3]];
    for (const [a, b] of pairs) {
      const state = { lastRawValue: a };
      expect(reconcile(state, b)).toBe(b * 2);
      expect(state.lastRawValue).toBe(b);
    }
  });

  it("gives the same increment for the same input when state is reset between calls", () => {
    const state = { lastRawValue: 50 };
    const first = reconcile(state, 80);
    state.lastRawValue = 50;
    expect(reconcile(state, 80)).toBe(first);
  });

  it("is relative to the latest sample after repeated calls", () => {
    const state = { lastRawValue: 50 };
    expect(reconcile(state, 80)).toBe(30);
    expect(reconcile(state, 80)).toBe(0);
  });

  it("never produces a negative increment", () => {
    const state = createReconciliationState();
    const samples = [10, 5, 5, 0, 300, 299, 1, 1_000_000, 2];
    const increments = samples.map((v) => reconcile(state, v));
    expect(increments).toEqual([10, 10, 0, 0, 300, 598, 2, 999_999, 4]);
    expect(increments.every((i) => i >= 0)).toBe(true);
  });

  it("reports wraps to the handler with the estimate used", () => {
    const onWrap = vi.fn();
    const state = { lastRawValue: 140 };

    expect(reconcile(state, 40, onWrap)).toBe(80);
    expect(onWrap).toHaveBeenCalledWith(140, 40, 80);

    reconcile(state, 90, onWrap);
    expect(onWrap).toHaveBeenCalledTimes(1);
  });

  it("reproduces the traffic counter scenario", () => {
    const state = createReconciliationState();
    const increments = [100, 140, 40, 90].map((v) => reconcile(state, v));
    expect(increments).toEqual([100, 40, 80, 50]);
    expect(increments.reduce((a, b) => a + b, 0)).toBe(270);
    expect(state.lastRawValue).toBe(90);
  });
});
