import { describe, expect, it } from "vitest";
import { createDiscoveryState, diffTopologies, newEntries } from "./snapshot_diff.js";
import { rawBus, rawDevice, rawHub, sampleSource } from "./test_support.js";
import { type RawTopologySource, buildTopology } from "./topology.js";

function build(source: RawTopologySource) {
  return buildTopology(source).topology;
}

function withoutDevice(source: RawTopologySource, name: string): RawTopologySource {
  return { ...source, devices: source.devices.filter((d) => d.name !== name) };
}

describe("diffTopologies", () => {
  const t = build(sampleSource());

  it("marks everything new on first sight, numbered in tree order", () => {
    const { diff, state } = diffTopologies(createDiscoveryState(), undefined, t);
    expect(diff.current.map((e) => [e.path, e.status, e.ordinal])).toEqual([
      ["1-1", "new", 1],
      ["1-1.2", "new", 2],
      ["1-2", "new", 3],
      ["1-3", "new", 4],
      ["2-1", "new", 5],
    ]);
    expect(diff.removed).toEqual([]);
    expect(state.nextOrdinal).toBe(6);
  });

  it("marks everything unchanged against itself", () => {
    const first = diffTopologies(createDiscoveryState(), undefined, t);
    const { diff } = diffTopologies(first.state, t, t);
    expect(diff.current.every((e) => e.status === "unchanged")).toBe(true);
    expect(diff.current.map((e) => e.ordinal)).toEqual([1, 2, 3, 4, 5]);
    expect(newEntries(diff)).toEqual([]);
  });

  it("keeps ordinals stable across a removal and an arrival", () => {
    const first = diffTopologies(createDiscoveryState(), undefined, t);
    const next = build({
      ...withoutDevice(sampleSource(), "1-3"),
      devices: [...withoutDevice(sampleSource(), "1-3").devices, rawDevice("2-2", { idVendor: "abcd", speed: "5000" })],
    });
    const { diff } = diffTopologies(first.state, t, next);
    expect(diff.current.map((e) => [e.path, e.status, e.ordinal])).toEqual([
      ["1-1", "unchanged", 1],
      ["1-1.2", "unchanged", 2],
      ["1-2", "unchanged", 3],
      ["2-1", "unchanged", 5],
      ["2-2", "new", 6],
    ]);
    expect(diff.removed.map((e) => [e.path, e.configKey, e.ordinal])).toEqual([["1-3", "1a86:7523", 4]]);
  });

  it("gives a returning device its old ordinal", () => {
    const s1 = diffTopologies(createDiscoveryState(), undefined, t);
    const without = build(withoutDevice(sampleSource(), "1-3"));
    const s2 = diffTopologies(s1.state, t, without);
    const s3 = diffTopologies(s2.state, without, t);
    expect(s3.diff.current.find((e) => e.path === "1-3")).toEqual({ path: "1-3", configKey: "1a86:7523", status: "new", ordinal: 4 });
    expect(s3.state.nextOrdinal).toBe(6);
  });

  it("treats a different device on a reused path as removed plus new", () => {
    const before = build({ buses: [rawBus(1, "480")], devices: [rawHub("1-1"), rawDevice("1-1.1", { idProduct: "0001" })] });
    const after = build({ buses: [rawBus(1, "480")], devices: [rawHub("1-1"), rawDevice("1-1.1", { idProduct: "0002" })] });
    const s1 = diffTopologies(createDiscoveryState(), undefined, before);
    const { diff } = diffTopologies(s1.state, before, after);
    expect(diff.current.map((e) => [e.path, e.configKey, e.status, e.ordinal])).toEqual([
      ["1-1", "1234:5678", "unchanged", 1],
      ["1-1.1", "1234:0002", "new", 3],
    ]);
    expect(diff.removed.map((e) => [e.path, e.configKey])).toEqual([["1-1.1", "1234:0001"]]);
  });

  it("does not mutate the state it was given", () => {
    const state = createDiscoveryState();
    diffTopologies(state, undefined, t);
    expect(state.ordinals.size).toBe(0);
    expect(state.nextOrdinal).toBe(1);
  });
});
