import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryMetricsCollector, buildKey } from "./collector.js";
import { NoopMetricsProvider } from "./noop.js";

describe("buildKey", () => {
  it("returns name when no labels", () => {
    expect(buildKey("a.b")).toBe("a.b");
  });

  it("returns name when labels are empty", () => {
    expect(buildKey("a.b", {})).toBe("a.b");
  });

  it("appends sorted labels", () => {
    expect(buildKey("a.b", { z: "1", a: "2" })).toBe("a.b|a=2|z=1");
  });
});

describe("InMemoryMetricsCollector", () => {
  let collector: InMemoryMetricsCollector;
  let clock: number;

  beforeEach(() => {
    clock = 1_000;
    collector = new InMemoryMetricsCollector({ now: () => clock });
  });

  it("accumulates counters per label set", () => {
    collector.counter("degraded", 1, { agent: "vision" });
    collector.counter("degraded", 2, { agent: "vision" });
    collector.counter("degraded", 1, { agent: "graph" });
    collector.counter("audits");

    const snap = collector.getSnapshot();
    expect(snap.counters["degraded|agent=vision"]).toBe(3);
    expect(snap.counters["degraded|agent=graph"]).toBe(1);
    expect(snap.counters["audits"]).toBe(1);
  });

  it("overwrites gauges", () => {
    collector.gauge("active", 3);
    collector.gauge("active", 1);
    expect(collector.getSnapshot().gauges["active"]).toBe(1);
  });

  it("records histogram entries with the clock timestamp", () => {
    collector.histogram("duration", 120, { stage: "scout" });
    clock = 2_000;
    collector.histogram("duration", 80, { stage: "scout" });

    const entries = collector.getSnapshot().histograms["duration|stage=scout"];
    expect(entries).toEqual([
      { value: 120, timestamp: 1_000, labels: { stage: "scout" } },
      { value: 80, timestamp: 2_000, labels: { stage: "scout" } },
    ]);
  });

  it("evicts the oldest histogram entries beyond the cap", () => {
    const small = new InMemoryMetricsCollector({ maxHistogramEntries: 2 });
    small.histogram("h", 1);
    small.histogram("h", 2);
    small.histogram("h", 3);
    expect(small.getSnapshot().histograms["h"]?.map((e) => e.value)).toEqual([2, 3]);
  });

  it("snapshots are copies", () => {
    collector.histogram("h", 1);
    const snap = collector.getSnapshot();
    collector.histogram("h", 2);
    expect(snap.histograms["h"]).toHaveLength(1);
  });

  it("reset clears everything", () => {
    collector.counter("c");
    collector.gauge("g", 1);
    collector.histogram("h", 1);
    collector.reset();
    const snap = collector.getSnapshot();
    expect(snap.counters).toEqual({});
    expect(snap.gauges).toEqual({});
    expect(snap.histograms).toEqual({});
  });
});

describe("NoopMetricsProvider", () => {
  it("accepts calls without side effects", () => {
    const noop = new NoopMetricsProvider();
    expect(() => {
      noop.counter("c");
      noop.histogram("h", 1);
      noop.gauge("g", 1);
    }).not.toThrow();
  });
});
