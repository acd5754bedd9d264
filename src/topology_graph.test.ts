import { describe, expect, it } from "vitest";
import { allocate } from "./allocate.js";
import { defaultLabelConfig } from "./config_load.js";
import { annotateTopology } from "./labels.js";
import { createDiscoveryState, diffTopologies } from "./snapshot_diff.js";
import { sampleSource } from "./test_support.js";
import { buildTopology } from "./topology.js";
import { sizeNode, topologyGraph } from "./topology_graph.js";

const topology = allocate(buildTopology(sampleSource()).topology);

describe("topologyGraph", () => {
  const g = topologyGraph(annotateTopology(topology, defaultLabelConfig()));

  it("emits controllers, buses and devices in tree order", () => {
    expect(g.nodes.map((n) => n.id)).toEqual([
      "controller:0000:00:14.0",
      "bus:1",
      "device:1-1",
      "device:1-1.2",
      "device:1-2",
      "device:1-3",
      "bus:2",
      "device:2-1",
    ]);
    expect(g.nodes.map((n) => n.category)).toEqual(["controller", "bus", "hub", "device", "device", "device", "bus", "device"]);
  });

  it("links each node to its parent", () => {
    expect(g.edges.map((e) => `${e.source} -> ${e.target}`)).toEqual([
      "controller:0000:00:14.0 -> bus:1",
      "bus:1 -> device:1-1",
      "device:1-1 -> device:1-1.2",
      "bus:1 -> device:1-2",
      "bus:1 -> device:1-3",
      "controller:0000:00:14.0 -> bus:2",
      "bus:2 -> device:2-1",
    ]);
  });

  it("carries bandwidth and state in attrs", () => {
    const bus = g.nodes.find((n) => n.id === "bus:1");
    expect(bus?.label).toBe("Bus 1 (480M)\n196.62 Mbps / 384.00 Mbps");
    expect(bus?.attrs).toEqual({ speed: "high", used_bps: "196622400", capacity_bps: "384000000", usage_percent: "51.2" });
    const serial = g.nodes.find((n) => n.id === "device:1-3");
    expect(serial?.attrs?.configured).toBe("false");
  });

  it("sizes nodes from their labels", () => {
    const bus = g.nodes.find((n) => n.id === "bus:1");
    expect([bus?.width, bus?.height]).toEqual([200, 60]);
    expect(sizeNode({ id: "x", label: "a".repeat(80), category: "device" }).width).toBe(320);
    expect(sizeNode({ id: "x", label: "ab", category: "device" }).width).toBe(120);
  });

  it("marks new devices", () => {
    const { diff } = diffTopologies(createDiscoveryState(), undefined, topology);
    const fresh = topologyGraph(annotateTopology(topology, defaultLabelConfig(), diff));
    expect(fresh.nodes.find((n) => n.id === "device:2-1")?.attrs).toMatchObject({ new: "true", ordinal: "5", power_ma: "896" });
  });
});
