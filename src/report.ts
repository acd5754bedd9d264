import { type BusRecommendation, allocationFailures, bestBusesFor, deviceBandwidthBps } from "./allocate.js";
import { availableBps, formatRate, isCritical, isHighUsage, isOverSubscribed, usagePercent } from "./bandwidth.js";
import { pathDepth } from "./device_path.js";
import { describeEndpoint, endpointBandwidthBps } from "./endpoint.js";
import { type AnnotatedTopology, busLabel, deviceLabel } from "./labels.js";
import { type Speed, isSuperSpeed, speedShortName } from "./speed.js";
import { type Device, allDevicesInTreeOrder, busesSorted, deviceCount, devicesInTreeOrder, getPairedBus, periodicEndpoints, totalPowerMa, vidPid } from "./topology.js";

export type ReportOptions = {
  useBits?: boolean;
};

export type ListOptions = ReportOptions & {
  periodicOnly?: boolean;
  verbose?: boolean;
};

function usbGeneration(speed: Speed): string {
  return isSuperSpeed(speed) ? "USB 3.x" : "USB 2.0";
}

export function renderSummary(a: AnnotatedTopology, opts: ReportOptions = {}): string {
  const useBits = opts.useBits ?? true;
  const t = a.topology;
  const lines: string[] = ["USB Bus Bandwidth Summary", "=========================", ""];
  if (t.buses.length === 0) {
    lines.push("No USB buses found.");
    return lines.join("\n") + "\n";
  }
  const failures = new Map(allocationFailures(t).map((f) => [f.busNum, f]));
  for (const bus of busesSorted(t)) {
    const pool = bus.pool;
    lines.push(`${busLabel(a, bus.busNum)} (${usbGeneration(bus.speed)}, ${speedShortName(bus.speed)})`);
    lines.push(
      `  Periodic BW: ${formatRate(pool.usedBps, useBits)} / ${formatRate(pool.capacityBps, useBits)} (${usagePercent(pool).toFixed(1)}%)`,
    );
    lines.push(`  Available:   ${formatRate(availableBps(pool), useBits)}`);
    lines.push(`  Devices:     ${deviceCount(t, bus)}`);
    const power = totalPowerMa(t, bus);
    if (power > 0) lines.push(`  Power:       ${power} mA`);
    const paired = getPairedBus(t, bus.busNum);
    if (paired) lines.push(`  Paired with: ${busLabel(a, paired.busNum)} (separate pool)`);
    if (isOverSubscribed(pool)) lines.push("  OVER CAPACITY: periodic reservations exceed the pool");
    else if (isCritical(pool)) lines.push("  CRITICAL: pool above 95%");
    else if (isHighUsage(pool)) lines.push("  HIGH: pool above 80%");
    const unconfigured = failures.get(bus.busNum)?.unconfigured ?? [];
    if (unconfigured.length > 0) lines.push(`  Not configured: ${unconfigured.join(", ")}`);
    lines.push("");
  }
  return lines.join("\n");
}

function deviceIcon(d: Device): string {
  if (!d.configured) return "!!";
  return d.isHub ? "Hub" : "Dev";
}

function deviceStatus(d: Device, useBits: boolean): string {
  if (!d.configured) return " [NOT CONFIGURED]";
  const bw = deviceBandwidthBps(d);
  return bw > 0 ? ` [${formatRate(bw, useBits)}]` : "";
}

export function renderDeviceList(a: AnnotatedTopology, opts: ListOptions = {}): string {
  const useBits = opts.useBits ?? true;
  const t = a.topology;
  const lines: string[] = [];
  for (const bus of busesSorted(t)) {
    lines.push(`=== ${busLabel(a, bus.busNum)} (${speedShortName(bus.speed)}) ===`);
    for (const d of devicesInTreeOrder(t, bus)) {
      const periodic = periodicEndpoints(d);
      if (opts.periodicOnly && periodic.length === 0) continue;
      const indent = "  ".repeat(pathDepth(d.location) + 1);
      const entry = a.status.get(d.path);
      const fresh = entry?.status === "new" ? ` [NEW #${entry.ordinal ?? "?"}]` : "";
      lines.push(`${indent}${deviceIcon(d)} ${deviceLabel(a, d)} (${vidPid(d)})${deviceStatus(d, useBits)}${fresh}`);
      if (!opts.verbose) continue;
      lines.push(`${indent}    Path: ${d.path}`);
      if (d.maxPowerMa !== undefined && d.maxPowerMa > 0) lines.push(`${indent}    Power: ${d.maxPowerMa} mA`);
      if (d.serial) lines.push(`${indent}    Serial: ${d.serial}`);
      for (const ep of periodic) {
        lines.push(`${indent}    ${describeEndpoint(ep)} -> ${formatRate(endpointBandwidthBps(ep), useBits)}`);
      }
    }
    lines.push("");
  }
  return lines.join("\n");
}

function recommendationLines(a: AnnotatedTopology, recs: BusRecommendation[], useBits: boolean): string[] {
  if (recs.length === 0) return ["  (no bus has enough periodic bandwidth left)"];
  return recs.map(
    (r) => `  ${busLabel(a, r.bus.busNum)} - ${formatRate(r.availableBps, useBits)} available (${usagePercent(r.bus.pool).toFixed(1)}% used)`,
  );
}

export type RecommendOptions = ReportOptions & {
  /** Only list buses whose pool can serve a device of this speed. */
  speed?: Speed;
};

export function renderRecommendations(a: AnnotatedTopology, requiredBps = 0, opts: RecommendOptions = {}): string {
  const useBits = opts.useBits ?? true;
  const lines = [
    "Best Buses for New Devices",
    "==========================",
    "",
    "Note: Bandwidth is shared across the entire bus, not per-hub.",
    "All devices behind a hub share the bus bandwidth pool.",
    "",
  ];
  if (requiredBps > 0) lines.push(`Required: ${formatRate(requiredBps, useBits)}`, "");
  const showUsb3 = opts.speed === undefined || isSuperSpeed(opts.speed);
  const showUsb2 = opts.speed === undefined || !isSuperSpeed(opts.speed);
  if (showUsb3) {
    lines.push("USB 3.x Buses (SuperSpeed):");
    lines.push(...recommendationLines(a, bestBusesFor(a.topology, requiredBps, opts.speed ?? "super"), useBits));
    lines.push("");
  }
  if (showUsb2) {
    lines.push("USB 2.0 Buses (High Speed):");
    lines.push(...recommendationLines(a, bestBusesFor(a.topology, requiredBps, opts.speed ?? "high"), useBits));
    lines.push("");
  }
  return lines.join("\n");
}

export function renderChanges(a: AnnotatedTopology, removed: Array<{ path: string; configKey: string }>): string[] {
  const out: string[] = [];
  for (const d of allDevicesInTreeOrder(a.topology)) {
    const entry = a.status.get(d.path);
    if (entry?.status === "new") out.push(`+ #${entry.ordinal ?? "?"} ${d.path} ${deviceLabel(a, d)} (${vidPid(d)})`);
  }
  for (const r of removed) out.push(`- ${r.path} (${r.configKey})`);
  return out;
}
