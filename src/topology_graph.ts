import { deviceBandwidthBps } from "./allocate.js";
import { formatRate, isOverSubscribed, usagePercent } from "./bandwidth.js";
import { type AnnotatedTopology, busLabel, deviceLabel } from "./labels.js";
import { speedShortName } from "./speed.js";
import { type Device, vidPid } from "./topology.js";
import type { Edge, Graph, Node } from "./util.js";

export type NodeCategory = "controller" | "bus" | "hub" | "device";

export type GraphOptions = {
  useBits?: boolean;
};

const minW = 120;
const maxW = 320;
const charW = 7;
const grid = 10;

const heights: Record<NodeCategory, number> = {
  controller: 50,
  bus: 60,
  hub: 50,
  device: 50,
};

function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x));
}

function snap(x: number): number {
  return Math.ceil(x / grid) * grid;
}

/** Width grows with the longest label line; height is fixed per category. */
export function sizeNode(n: Node): Node {
  const cat = n.category;
  const lines = (n.label ?? n.id).split("\n");
  const longest = Math.max(...lines.map((l) => l.length));
  const base = cat === "controller" || cat === "bus" || cat === "hub" || cat === "device" ? heights[cat] : 50;
  return {
    ...n,
    width: clamp(snap(longest * charW + 24), minW, maxW),
    height: Math.max(base, snap(lines.length * 16 + 14)),
  };
}

export function controllerNodeId(id: string): string {
  return `controller:${id}`;
}

export function busNodeId(busNum: number): string {
  return `bus:${busNum}`;
}

export function deviceNodeId(path: string): string {
  return `device:${path}`;
}

/** Controllers → buses → devices, with one edge per parent link. */
export function topologyGraph(a: AnnotatedTopology, opts: GraphOptions = {}): Graph {
  const useBits = opts.useBits ?? true;
  const t = a.topology;
  const nodes: Node[] = [];
  const edges: Edge[] = [];

  const addDevice = (d: Device, parent: string): void => {
    const id = deviceNodeId(d.path);
    const entry = a.status.get(d.path);
    const attrs: Record<string, string> = {
      path: d.path,
      vidpid: vidPid(d),
      speed: d.speed,
      configured: String(d.configured),
      bandwidth_bps: String(deviceBandwidthBps(d)),
    };
    if (entry?.status === "new") attrs.new = "true";
    if (entry?.ordinal !== undefined) attrs.ordinal = String(entry.ordinal);
    if (d.maxPowerMa !== undefined) attrs.power_ma = String(d.maxPowerMa);
    nodes.push({
      id,
      label: `${deviceLabel(a, d)}\n${vidPid(d)} ${speedShortName(d.speed)}`,
      category: d.isHub ? "hub" : "device",
      attrs,
    });
    edges.push({ id: `${parent}->${id}`, source: parent, target: id });
    for (const child of d.children) {
      const c = t.devices.get(child);
      if (c) addDevice(c, id);
    }
  };

  for (const c of t.controllers) {
    const cid = controllerNodeId(c.id);
    nodes.push({
      id: cid,
      label: `${a.controllerLabels.get(c.id) ?? "USB Controller"}\n${c.pciAddress ?? c.id}`,
      category: "controller",
      attrs: c.pciAddress ? { pci: c.pciAddress } : {},
    });
    for (const bus of t.buses.filter((b) => b.controllerId === c.id)) {
      const bid = busNodeId(bus.busNum);
      const attrs: Record<string, string> = {
        speed: bus.speed,
        used_bps: String(bus.pool.usedBps),
        capacity_bps: String(bus.pool.capacityBps),
        usage_percent: usagePercent(bus.pool).toFixed(1),
      };
      if (isOverSubscribed(bus.pool)) attrs.over_capacity = "true";
      nodes.push({
        id: bid,
        label: `${busLabel(a, bus.busNum)} (${speedShortName(bus.speed)})\n${formatRate(bus.pool.usedBps, useBits)} / ${formatRate(bus.pool.capacityBps, useBits)}`,
        category: "bus",
        attrs,
      });
      edges.push({ id: `${cid}->${bid}`, source: cid, target: bid });
      for (const path of bus.devices) {
        const d = t.devices.get(path);
        if (d) addDevice(d, bid);
      }
    }
  }
  return { nodes: nodes.map(sizeNode), edges };
}
