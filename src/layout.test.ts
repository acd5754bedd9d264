import { describe, expect, it } from "vitest";
import { buildLayoutOptions, layoutGraph } from "./layout.js";
import type { Graph } from "./util.js";

const graph: Graph = {
  nodes: [
    { id: "bus:1", width: 200, height: 60 },
    { id: "device:1-1", width: 120, height: 50 },
    { id: "device:1-2", width: 120, height: 50 },
  ],
  edges: [
    { id: "a", source: "bus:1", target: "device:1-1" },
    { id: "b", source: "bus:1", target: "device:1-2" },
  ],
};

describe("buildLayoutOptions", () => {
  it("lays out top-down by default and lets options override", () => {
    const opts = buildLayoutOptions({ node_node: 12, options: { "elk.padding": "[top=5]", "elk.randomSeed": 7 } });
    expect(opts["elk.direction"]).toBe("DOWN");
    expect(opts["elk.spacing.nodeNode"]).toBe("12");
    expect(opts["elk.padding"]).toBe("[top=5]");
    expect(opts["elk.randomSeed"]).toBe("7");
  });
});

describe("layoutGraph", () => {
  it("places children below their parent and routes every edge", async () => {
    const out = await layoutGraph(graph);
    const pos = new Map(out.nodes.map((n) => [n.id, n]));
    const bus = pos.get("bus:1");
    const dev = pos.get("device:1-1");
    expect(bus && dev && (dev.y ?? 0) > (bus.y ?? 0)).toBe(true);
    expect(out.nodes.map((n) => [n.width, n.height])).toEqual([
      [200, 60],
      [120, 50],
      [120, 50],
    ]);
    for (const e of out.edges) {
      expect((e.points ?? []).length).toBeGreaterThanOrEqual(2);
    }
  });

  it("honours the direction", async () => {
    const out = await layoutGraph(graph, { direction: "RIGHT" });
    const bus = out.nodes[0];
    const dev = out.nodes[1];
    expect((dev.x ?? 0) > (bus.x ?? 0)).toBe(true);
  });
});
