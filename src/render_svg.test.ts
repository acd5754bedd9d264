import { describe, expect, it } from "vitest";
import { defaultCssPath, nodeClasses, renderSvg } from "./render_svg.js";
import type { Graph } from "./util.js";

const graph: Graph = {
  nodes: [
    { id: "bus:1", label: "Bus 1 (480M)\n400.00 Mbps / 384.00 Mbps", category: "bus", attrs: { over_capacity: "true" }, x: 10, y: 20, width: 200, height: 60 },
    { id: "device:1-1", label: "R&D <scope>", category: "device", attrs: { configured: "false", new: "true" }, x: 50, y: 140, width: 120, height: 50 },
  ],
  edges: [
    {
      source: "bus:1",
      target: "device:1-1",
      points: [
        { x: 110, y: 80 },
        { x: 110, y: 140 },
      ],
    },
  ],
};

describe("renderSvg", () => {
  const svg = renderSvg(graph);

  it("sizes the canvas to the laid-out nodes", () => {
    expect(svg).toContain('<svg xmlns="http://www.w3.org/2000/svg" width="250" height="230" viewBox="0 0 250 230">');
  });

  it("classes nodes by category and state", () => {
    expect(svg).toContain('<g class="node bus overloaded" data-id="bus:1">');
    expect(svg).toContain('<g class="node device unconfigured fresh" data-id="device:1-1">');
    expect(nodeClasses({ id: "x", category: "hub" })).toBe("node hub");
  });

  it("writes one tspan per label line, escaped", () => {
    expect(svg).toContain('<tspan x="110" y="42">Bus 1 (480M)</tspan><tspan x="110" y="58" class="detail">400.00 Mbps / 384.00 Mbps</tspan>');
    expect(svg).toContain('<tspan x="110" y="165">R&amp;D &lt;scope&gt;</tspan>');
  });

  it("draws edges as paths", () => {
    expect(svg).toContain('<path class="edge" d="M110,80 L110,140" marker-end="url(#arrowhead)"/>');
  });

  it("adds a title band", () => {
    const titled = renderSvg(graph, { title: "USB Topology" });
    expect(titled).toContain('height="260"');
    expect(titled).toContain('<text class="diagramTitle" x="20" y="24">USB Topology</text>');
    expect(titled).toContain('<g transform="translate(0,30)">');
  });

  it("inlines the stylesheet", () => {
    const styled = renderSvg(graph, { cssPath: defaultCssPath });
    expect(styled).toContain(".node.overloaded rect {");
  });
});
