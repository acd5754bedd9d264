import fs from "fs";
import type { Graph, Node } from "./util.js";

export type RenderOptions = {
  cssPath?: string;
  title?: string;
};

export const defaultCssPath = new URL("../styles/topology.css", import.meta.url).pathname;

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").toLowerCase();
}

/** Category class plus one class per flag the node carries. */
export function nodeClasses(n: Node): string {
  const out = ["node", cls(n.category ?? "device")];
  if (n.attrs?.over_capacity === "true") out.push("overloaded");
  if (n.attrs?.configured === "false") out.push("unconfigured");
  if (n.attrs?.new === "true") out.push("fresh");
  return out.join(" ");
}

type Point = { x: number; y: number };

function orthPoints(pts: Point[]): Point[] {
  if (pts.length < 2) return pts;
  const out: Point[] = [pts[0]];
  for (let i = 1; i < pts.length; i += 1) {
    const prev = out[out.length - 1];
    const cur = pts[i];
    if (prev.x !== cur.x && prev.y !== cur.y) {
      out.push({ x: cur.x, y: prev.y });
    }
    out.push(cur);
  }
  return out;
}

export function renderSvg(graph: Graph, opts: RenderOptions = {}): string {
  const pad = 40;
  const titleH = opts.title ? 30 : 0;
  const maxX = Math.max(...graph.nodes.map((n) => (n.x ?? 0) + (n.width ?? 0)), 0) + pad;
  const maxY = Math.max(...graph.nodes.map((n) => (n.y ?? 0) + (n.height ?? 0)), 0) + pad + titleH;
  const css = opts.cssPath ? fs.readFileSync(opts.cssPath, "utf8") : "";

  const rects = graph.nodes.map((n) => {
    const x = n.x ?? 0;
    const y = n.y ?? 0;
    const w = n.width ?? 120;
    const h = n.height ?? 60;
    return `\n    <g class="${nodeClasses(n)}" data-id="${esc(n.id)}">\n      <rect x="${x}" y="${y}" width="${w}" height="${h}" rx="6" ry="6"/>\n    </g>`;
  }).join("");

  const nodeLabels = graph.nodes.map((n) => {
    const x = n.x ?? 0;
    const y = n.y ?? 0;
    const w = n.width ?? 120;
    const h = n.height ?? 60;
    const lines = (n.label ?? n.id).split("\n");
    const top = y + h / 2 - ((lines.length - 1) * 16) / 2;
    const spans = lines
      .map((l, i) => `<tspan x="${x + w / 2}" y="${top + i * 16}"${i > 0 ? ` class="detail"` : ""}>${esc(l)}</tspan>`)
      .join("");
    return `\n    <text class="nodeLabel ${cls(n.category ?? "device")}" text-anchor="middle" dominant-baseline="middle">${spans}</text>`;
  }).join("");

  const paths = graph.edges.map((e) => {
    const pts = orthPoints(e.points ?? []);
    if (pts.length < 2) return "";
    const d = pts.map((p, i) => `${i === 0 ? "M" : "L"}${p.x},${p.y}`).join(" ");
    return `\n    <path class="edge" d="${d}" marker-end="url(#arrowhead)"/>`;
  }).join("");

  const title = opts.title ? `\n<text class="diagramTitle" x="${pad / 2}" y="${pad / 2 + 4}">${esc(opts.title)}</text>` : "";
  const body = `<g transform="translate(0,${titleH})">\n  <g class="edges">${paths}\n  </g>\n  <g class="nodes">${rects}\n  </g>\n  <g class="labels">${nodeLabels}\n  </g>\n</g>`;
  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${maxX}" height="${maxY}" viewBox="0 0 ${maxX} ${maxY}">\n<style>\n${css}\n</style>\n<defs>\n  <marker id="arrowhead" markerWidth="8" markerHeight="6" refX="7" refY="3" orient="auto" markerUnits="strokeWidth">\n    <path d="M0,0 L8,3 L0,6 z" fill="#222"/>\n  </marker>\n</defs>${title}\n${body}\n</svg>\n`;
}
