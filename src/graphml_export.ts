import { XMLBuilder } from "fast-xml-parser";
import type { Edge, Graph, Node } from "./util.js";

const GRAPHML_NS = "http://graphml.graphdrawing.org/xmlns";

type KeyDef = { id: string; for: "node" | "edge"; name: string };

type DataItem = { "@_key": string; "#text": string };

function fieldsOf(item: Node | Edge): Record<string, string> {
  const out: Record<string, string> = { ...(item.attrs ?? {}) };
  if (item.label !== undefined) out.label = item.label;
  if ("category" in item && item.category !== undefined) out.category = item.category;
  return out;
}

function collectKeys(items: Array<Node | Edge>, kind: "node" | "edge", offset: number): KeyDef[] {
  const names = new Set<string>();
  for (const it of items) {
    for (const k of Object.keys(fieldsOf(it))) names.add(k);
  }
  return [...names].sort().map((name, i) => ({ id: `d${offset + i}`, for: kind, name }));
}

function dataItems(fields: Record<string, string>, keys: KeyDef[]): DataItem[] {
  const out: DataItem[] = [];
  for (const k of keys) {
    const v = fields[k.name];
    if (v !== undefined) out.push({ "@_key": k.id, "#text": v });
  }
  return out;
}

/** Serialises a graph as GraphML, one string-typed `<key>` per attribute name. */
export function graphToGraphml(graph: Graph, graphId = "usb"): string {
  const nodeKeys = collectKeys(graph.nodes, "node", 0);
  const edgeKeys = collectKeys(graph.edges, "edge", nodeKeys.length);
  const doc = {
    graphml: {
      "@_xmlns": GRAPHML_NS,
      key: [...nodeKeys, ...edgeKeys].map((k) => ({
        "@_id": k.id,
        "@_for": k.for,
        "@_attr.name": k.name,
        "@_attr.type": "string",
      })),
      graph: {
        "@_id": graphId,
        "@_edgedefault": "directed",
        node: graph.nodes.map((n) => ({ "@_id": n.id, data: dataItems(fieldsOf(n), nodeKeys) })),
        edge: graph.edges.map((e, i) => ({
          "@_id": e.id ?? `e${i}`,
          "@_source": e.source,
          "@_target": e.target,
          data: dataItems(fieldsOf(e), edgeKeys),
        })),
      },
    },
  };
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return `<?xml version="1.0" encoding="UTF-8"?>\n${String(builder.build(doc))}`;
}
