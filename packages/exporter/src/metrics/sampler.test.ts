import { describe, it, expect, vi } from "vitest";
import type { IDeviceTransport, MetricSpec } from "@fritzbox-exporter/shared";
import { Sampler, toNumber } from "./sampler.js";
import { SampleError } from "../errors.js";
import type { CounterBinding, GaugeBinding } from "./metric-registry.js";

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function createMockTransport(...responses: Record<string, string | number>[]) {
  const call = vi.fn();
  for (const r of responses) call.mockResolvedValueOnce(r);
  return { call } satisfies IDeviceTransport;
}

const signalSpec: MetricSpec = {
  name: "signal",
  service: "WLANConfiguration1",
  action: "GetInfo",
  param: "NewSignal",
  kind: "gauge",
};

const trafficSpec: MetricSpec = {
  name: "traffic",
  service: "WANCommonInterfaceConfig1",
  action: "GetAddonInfos",
  param: "NewTotalBytesSent",
  kind: "counter",
};

function gaugeBinding(): GaugeBinding {
  return { kind: "gauge", spec: signalSpec, gauge: { set: vi.fn() } };
}

function counterBinding(): CounterBinding {
  return {
    kind: "counter",
    spec: trafficSpec,
    counter: { increment: vi.fn() },
    state: { lastRawValue: 0 },
  };
}

// ---------------------------------------------------------------------------
// toNumber
// ---------------------------------------------------------------------------

describe("toNumber", () => {
  it("accepts finite numbers and numeric strings", () => {
    expect(toNumber(42)).toBe(42);
    expect(toNumber("-65")).toBe(-65);
    expect(toNumber("1.5")).toBe(1.5);
  });

  it("rejects everything else", () => {
    expect(toNumber("")).toBeUndefined();
    expect(toNumber("Up")).toBeUndefined();
    expect(toNumber(Number.NaN)).toBeUndefined();
    expect(toNumber(undefined)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// sample
// ---------------------------------------------------------------------------

describe("Sampler.sample", () => {
  it("calls the metric's service and action and extracts the param", async () => {
    const transport = createMockTransport({ NewSignal: -70, NewChannel: 6 });
    const sampler = new Sampler(transport);

    await expect(sampler.sample(signalSpec)).resolves.toBe(-70);
    expect(transport.call).toHaveBeenCalledWith("WLANConfiguration1", "GetInfo", undefined);
  });

  it("hands the abort signal to the transport", async () => {
    const transport = createMockTransport({ NewSignal: -70 });
    const controller = new AbortController();

    await new Sampler(transport).poll(gaugeBinding(), controller.signal);

    expect(transport.call).toHaveBeenCalledWith("WLANConfiguration1", "GetInfo", controller.signal);
  });

  it("converts numeric strings", async () => {
    const sampler = new Sampler(createMockTransport({ NewTotalBytesSent: "123456" }));
    await expect(sampler.sample(trafficSpec)).resolves.toBe(123456);
  });

  it("wraps transport failures in SampleError", async () => {
    const transport: IDeviceTransport = {
      call: vi.fn().mockRejectedValue(new Error("ECONNREFUSED")),
    };
    const sampler = new Sampler(transport);

    const err = await sampler.sample(signalSpec).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SampleError);
    expect(err).toMatchObject({
      code: "SAMPLE",
      metric: "signal",
      message: "signal: WLANConfiguration1#GetInfo failed: ECONNREFUSED",
    });
  });

  it("fails when the param is missing from the response", async () => {
    const sampler = new Sampler(createMockTransport({ NewChannel: 6 }));
    await expect(sampler.sample(signalSpec)).rejects.toThrow(
      'signal: WLANConfiguration1#GetInfo returned no "NewSignal"',
    );
  });

  it("fails when the param is not numeric", async () => {
    const sampler = new Sampler(createMockTransport({ NewSignal: "Up" }));
    await expect(sampler.sample(signalSpec)).rejects.toThrow(
      'signal: "NewSignal" is not numeric: "Up"',
    );
  });

  it("fails on integers a double cannot hold exactly", async () => {
    const sampler = new Sampler(createMockTransport({ NewTotalBytesSent: "9007199254740993" }));
    await expect(sampler.sample(trafficSpec)).rejects.toThrow(
      'traffic: "NewTotalBytesSent" is outside the exact integer range: "9007199254740993"',
    );
  });

  it("accepts the largest exact integer", async () => {
    const sampler = new Sampler(createMockTransport({ NewTotalBytesSent: "9007199254740991" }));
    await expect(sampler.sample(trafficSpec)).resolves.toBe(Number.MAX_SAFE_INTEGER);
  });

  it("fails on a negative counter value", async () => {
    const sampler = new Sampler(createMockTransport({ NewTotalBytesSent: -5 }));
    await expect(sampler.sample(trafficSpec)).rejects.toBeInstanceOf(SampleError);
  });
});

// ---------------------------------------------------------------------------
// record / poll
// ---------------------------------------------------------------------------

describe("Sampler.record", () => {
  it("sets gauges to the raw value", () => {
    const sampler = new Sampler(createMockTransport());
    const binding = gaugeBinding();

    const sample = sampler.record(binding, -65);

    expect(binding.gauge.set).toHaveBeenCalledWith(-65);
    expect(sample).toMatchObject({ metric: "signal", kind: "gauge", rawValue: -65, value: -65, wrapped: false });
  });

  it("increments counters by the reconciled delta", () => {
    const sampler = new Sampler(createMockTransport());
    const binding = counterBinding();
    binding.state.lastRawValue = 100;

    const sample = sampler.record(binding, 140);

    expect(binding.counter.increment).toHaveBeenCalledWith(40);
    expect(binding.state.lastRawValue).toBe(140);
    expect(sample).toMatchObject({ metric: "traffic", kind: "counter", rawValue: 140, value: 40, wrapped: false });
  });

  it("reports wraps", () => {
    const onWrap = vi.fn();
    const sampler = new Sampler(createMockTransport(), { onWrap });
    const binding = counterBinding();
    binding.state.lastRawValue = 140;

    const sample = sampler.record(binding, 40);

    expect(binding.counter.increment).toHaveBeenCalledWith(80);
    expect(sample.wrapped).toBe(true);
    expect(onWrap).toHaveBeenCalledWith(trafficSpec, 140, 40, 80);
  });
});

describe("Sampler.poll", () => {
  it("keeps only the latest gauge value", async () => {
    const transport = createMockTransport({ NewSignal: -70 }, { NewSignal: -65 }, { NewSignal: -80 });
    const sampler = new Sampler(transport);
    const binding = gaugeBinding();

    for (let i = 0; i < 3; i++) await sampler.poll(binding);

    expect(vi.mocked(binding.gauge.set).mock.calls).toEqual([[-70], [-65], [-80]]);
  });

  it("accumulates counter increments across rounds", async () => {
    const transport = createMockTransport(
      { NewTotalBytesSent: 100 },
      { NewTotalBytesSent: 140 },
      { NewTotalBytesSent: 40 },
      { NewTotalBytesSent: 90 },
    );
    const sampler = new Sampler(transport);
    const binding = counterBinding();

    const values: number[] = [];
    for (let i = 0; i < 4; i++) values.push((await sampler.poll(binding)).value);

    expect(values).toEqual([100, 40, 80, 50]);
    expect(vi.mocked(binding.counter.increment).mock.calls).toEqual([[100], [40], [80], [50]]);
  });

  it("leaves the exported value untouched when sampling fails", async () => {
    const transport = createMockTransport({});
    const sampler = new Sampler(transport);
    const binding = counterBinding();

    await expect(sampler.poll(binding)).rejects.toBeInstanceOf(SampleError);
    expect(binding.counter.increment).not.toHaveBeenCalled();
    expect(binding.state.lastRawValue).toBe(0);
  });
});
