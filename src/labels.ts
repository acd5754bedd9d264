import type { LabelConfig, PhysicalPortRule } from "./config_load.js";
import { type DiffEntry, type SnapshotDiff, statusByPath } from "./snapshot_diff.js";
import { type Controller, type Device, type PhysicalLocation, type Topology, configKey, vidPid } from "./topology.js";
import { capitalize } from "./util.js";

export type LabelSource = "product-serial" | "product" | "physical-location" | "device-path" | "auto";

export type ResolvedLabel = {
  label: string;
  source: LabelSource;
};

export type AnnotatedTopology = {
  readonly topology: Topology;
  readonly controllerLabels: ReadonlyMap<string, string>;
  readonly busLabels: ReadonlyMap<number, string>;
  readonly deviceLabels: ReadonlyMap<string, ResolvedLabel>;
  /** Absent when no diff was supplied. */
  readonly status: ReadonlyMap<string, DiffEntry>;
};

export function matchesPortRule(rule: PhysicalPortRule, loc: PhysicalLocation): boolean {
  if (rule.panel !== undefined && rule.panel !== loc.panel) return false;
  if (rule.horizontal_position !== undefined && rule.horizontal_position !== loc.horizontalPosition) return false;
  if (rule.vertical_position !== undefined && rule.vertical_position !== loc.verticalPosition) return false;
  if (rule.dock !== undefined && rule.dock !== loc.dock) return false;
  return true;
}

// center/center is what ACPI reports when it has no real placement data.
export function isSpecificLocation(loc: PhysicalLocation): boolean {
  if (loc.horizontalPosition === "center" && loc.verticalPosition === "center") return false;
  return loc.panel !== "" || loc.horizontalPosition !== "" || loc.verticalPosition !== "";
}

export function positionLabel(config: LabelConfig, loc: PhysicalLocation): string {
  const parts: string[] = [];
  if (loc.panel) parts.push(capitalize(config.position_labels.panel[loc.panel] ?? loc.panel));
  if (loc.verticalPosition) parts.push(capitalize(config.position_labels.vertical[loc.verticalPosition] ?? loc.verticalPosition));
  return parts.length === 0 ? "USB Port" : `${parts.join(" ")} USB Port`;
}

function locationLabel(config: LabelConfig, loc: PhysicalLocation | undefined): string | undefined {
  if (!loc) return undefined;
  const rule = config.physical_ports.find((r) => matchesPortRule(r, loc));
  if (rule) return rule.label;
  return isSpecificLocation(loc) ? positionLabel(config, loc) : undefined;
}

export function autoDeviceLabel(d: Device): string {
  return d.product ?? d.manufacturer ?? vidPid(d);
}

/**
 * Label lookup order: serial-specific product key, product key, physical
 * location, legacy device path, then the device's own descriptor strings.
 */
export function resolveDeviceLabel(config: LabelConfig, d: Device): ResolvedLabel {
  if (d.serial) {
    const bySerial = config.products[configKey(d)];
    if (bySerial !== undefined) return { label: bySerial, source: "product-serial" };
  }
  const byProduct = config.products[vidPid(d)];
  if (byProduct !== undefined) return { label: byProduct, source: "product" };
  const byLocation = locationLabel(config, d.physicalLocation);
  if (byLocation !== undefined) return { label: byLocation, source: "physical-location" };
  const byPath = config.devices[d.path];
  if (byPath !== undefined) return { label: byPath, source: "device-path" };
  return { label: autoDeviceLabel(d), source: "auto" };
}

export function resolveBusLabel(config: LabelConfig, busNum: number): string {
  return config.buses[String(busNum)] ?? `Bus ${busNum}`;
}

export function resolveControllerLabel(config: LabelConfig, c: Controller): string {
  return config.controllers[c.pciAddress ?? c.id] ?? "USB Controller";
}

export function annotateTopology(topology: Topology, config: LabelConfig, diff?: SnapshotDiff): AnnotatedTopology {
  return {
    topology,
    controllerLabels: new Map(topology.controllers.map((c) => [c.id, resolveControllerLabel(config, c)])),
    busLabels: new Map(topology.buses.map((b) => [b.busNum, resolveBusLabel(config, b.busNum)])),
    deviceLabels: new Map([...topology.devices.values()].map((d) => [d.path, resolveDeviceLabel(config, d)])),
    status: diff ? statusByPath(diff) : new Map(),
  };
}

export function deviceLabel(a: AnnotatedTopology, d: Device): string {
  return a.deviceLabels.get(d.path)?.label ?? autoDeviceLabel(d);
}

export function busLabel(a: AnnotatedTopology, busNum: number): string {
  return a.busLabels.get(busNum) ?? `Bus ${busNum}`;
}
