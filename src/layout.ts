import ELK from "elkjs/lib/elk.bundled.js";
import type { ELK as ElkApi, ElkExtendedEdge, ElkNode } from "elkjs/lib/elk-api.js";
import type { Graph } from "./util.js";

export type LayoutRules = {
  direction?: "DOWN" | "RIGHT" | "UP" | "LEFT";
  edge_routing?: "ORTHOGONAL" | "POLYLINE" | "SPLINES";
  node_node_between_layers?: number;
  node_node?: number;
  options?: Record<string, string | number | boolean>;
};

type Point = { x: number; y: number };

export function buildLayoutOptions(rules: LayoutRules = {}): Record<string, string> {
  const opts: Record<string, string> = {
    "elk.algorithm": "org.eclipse.elk.layered",
    "elk.direction": rules.direction ?? "DOWN",
    "elk.edgeRouting": rules.edge_routing ?? "ORTHOGONAL",
    "elk.layered.spacing.nodeNodeBetweenLayers": String(rules.node_node_between_layers ?? 50),
    "elk.spacing.nodeNode": String(rules.node_node ?? 30),
    // Siblings keep port order left to right.
    "org.eclipse.elk.layered.considerModelOrder.strategy": "NODES_AND_EDGES",
    "org.eclipse.elk.layered.crossingMinimization.forceNodeModelOrder": "true",
  };
  for (const [k, v] of Object.entries(rules.options ?? {})) {
    opts[k] = String(v);
  }
  return opts;
}

function edgePoints(e: ElkExtendedEdge | undefined): Point[] {
  return (e?.sections ?? []).flatMap((s) => [s.startPoint, ...(s.bendPoints ?? []), s.endPoint]);
}

/** Positions every node and routes every edge with ELK's layered algorithm. */
export async function layoutGraph(graph: Graph, rules: LayoutRules = {}): Promise<Graph> {
  // elk.bundled.js is CommonJS; its default import is the constructor itself.
  const Ctor = ELK as unknown as new () => ElkApi;
  const elk = new Ctor();
  const input: ElkNode = {
    id: "root",
    layoutOptions: buildLayoutOptions(rules),
    children: graph.nodes.map((n) => ({
      id: n.id,
      width: n.width ?? 120,
      height: n.height ?? 60,
    })),
    edges: graph.edges.map((e, i) => ({
      id: e.id ?? `e${i}`,
      sources: [e.source],
      targets: [e.target],
    })),
  };

  const laid = await elk.layout(input);
  const nodeMap = new Map((laid.children ?? []).map((c) => [c.id, c]));
  const edgeMap = new Map((laid.edges ?? []).map((e) => [e.id, e]));
  return {
    nodes: graph.nodes.map((n) => {
      const c = nodeMap.get(n.id);
      return {
        ...n,
        x: c?.x ?? 0,
        y: c?.y ?? 0,
        width: c?.width ?? n.width,
        height: c?.height ?? n.height,
      };
    }),
    edges: graph.edges.map((e, i) => ({ ...e, points: edgePoints(edgeMap.get(e.id ?? `e${i}`)) })),
  };
}
