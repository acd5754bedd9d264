import type { LabelConfig } from "./config_load.js";
import { formatRate, isOverSubscribed } from "./bandwidth.js";
import { type AnnotatedTopology, busLabel, deviceLabel } from "./labels.js";
import { esc as escapeXml } from "./render_svg.js";
import { renderSummary } from "./report.js";
import { speedShortName } from "./speed.js";
import { type Device, vidPid } from "./topology.js";
import { hex4 } from "./util.js";

function sanitizeId(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 80);
}

function esc(s: string): string {
  return s.replace(/"/g, "#quot;").replace(/</g, "#lt;").replace(/>/g, "#gt;");
}

function deviceNodeId(path: string): string {
  return `dev_${sanitizeId(path)}`;
}

function isShown(d: Device, cfg: LabelConfig): boolean {
  if (cfg.mermaid.hide_paths.includes(d.path)) return false;
  if (d.isHub || cfg.mermaid.filter_vendors.length === 0) return true;
  return cfg.mermaid.filter_vendors.includes(hex4(d.vendorId));
}

/** Flowchart of controllers → buses → hubs → devices, honouring the `mermaid` config section. */
export function generateMermaid(a: AnnotatedTopology, cfg: LabelConfig): string {
  const t = a.topology;
  const useBits = cfg.settings.use_bits;
  const lines: string[] = ["graph TD"];
  const links: string[] = [];

  const visible = (path: string): Device | undefined => {
    const d = t.devices.get(path);
    return d && isShown(d, cfg) ? d : undefined;
  };

  const emitDevice = (d: Device, parentId: string): void => {
    const kids = d.children.map(visible).filter((x): x is Device => x !== undefined);
    if (d.isHub && cfg.mermaid.collapse_single_child_hubs && kids.length === 1) {
      emitDevice(kids[0], parentId);
      return;
    }
    const id = deviceNodeId(d.path);
    const entry = a.status.get(d.path);
    const cls = !d.configured ? ":::failed" : entry?.status === "new" ? ":::fresh" : d.isHub ? ":::hub" : "";
    lines.push(`  ${id}["${esc(deviceLabel(a, d))}<br/>${vidPid(d)} · ${d.path}"]${cls}`);
    links.push(`  ${parentId} --> ${id}`);
    for (const k of kids) emitDevice(k, id);
  };

  for (const c of t.controllers) {
    const cid = `ctrl_${sanitizeId(c.id)}`;
    lines.push(`  ${cid}["${esc(a.controllerLabels.get(c.id) ?? "USB Controller")}<br/>${esc(c.pciAddress ?? c.id)}"]:::controller`);
    for (const bus of t.buses.filter((b) => b.controllerId === c.id)) {
      const bid = `bus${bus.busNum}`;
      const usage = `${formatRate(bus.pool.usedBps, useBits)} / ${formatRate(bus.pool.capacityBps, useBits)}`;
      const cls = isOverSubscribed(bus.pool) ? ":::overloaded" : ":::bus";
      lines.push(`  ${bid}["${esc(busLabel(a, bus.busNum))}<br/>${speedShortName(bus.speed)} · ${usage}"]${cls}`);
      links.push(`  ${cid} --> ${bid}`);
      for (const path of bus.devices) {
        const d = visible(path);
        if (d) emitDevice(d, bid);
      }
    }
  }

  lines.push(...links);
  lines.push(
    "  classDef controller fill:#e0e7ff,stroke:#3730a3",
    "  classDef bus fill:#dbeafe,stroke:#1f4f96",
    "  classDef overloaded fill:#fee2e2,stroke:#b91c1c",
    "  classDef hub fill:#f1f5f9,stroke:#475569",
    "  classDef failed fill:#fef3c7,stroke:#b45309",
    "  classDef fresh fill:#dcfce7,stroke:#15803d",
  );
  return lines.join("\n") + "\n";
}

export function generateMarkdown(a: AnnotatedTopology, cfg: LabelConfig): string {
  return [
    "# USB Topology",
    "",
    "## Bandwidth",
    "",
    "```text",
    renderSummary(a, { useBits: cfg.settings.use_bits }).trimEnd(),
    "```",
    "",
    "## Diagram",
    "",
    "```mermaid",
    generateMermaid(a, cfg).trimEnd(),
    "```",
    "",
  ].join("\n");
}

/** Standalone page; the browser renders the diagram with the mermaid script. */
export function generateHtml(a: AnnotatedTopology, cfg: LabelConfig): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '  <meta charset="utf-8">',
    "  <title>USB Topology</title>",
    '  <script src="https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.min.js"></script>',
    "</head>",
    "<body>",
    "  <h1>USB Topology</h1>",
    `  <pre class="summary">${escapeXml(renderSummary(a, { useBits: cfg.settings.use_bits }).trimEnd())}</pre>`,
    '  <pre class="mermaid">',
    escapeXml(generateMermaid(a, cfg).trimEnd()),
    "  </pre>",
    "  <script>mermaid.initialize({ startOnLoad: true });</script>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
