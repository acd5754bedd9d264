import yaml from "js-yaml";
import { type PhysicalPortRule, defaultLabelConfig } from "./config_load.js";
import { isSpecificLocation } from "./labels.js";
import { isSuperSpeed, speedShortName } from "./speed.js";
import { type Topology, allDevicesInTreeOrder, vidPid } from "./topology.js";
import { capitalize, readText } from "./util.js";

export const exampleConfigPath = new URL("../config/example.yaml", import.meta.url).pathname;

export function exampleConfig(): string {
  return readText(exampleConfigPath);
}

const rule = "# =============================================================================";

function dump(value: Record<string, unknown>): string {
  return yaml.dump(value, { lineWidth: -1, quotingType: '"', forceQuotes: true });
}

function banner(title: string, notes: string[] = []): string {
  return [rule, `# ${title}`, rule, ...notes.map((n) => `# ${n}`), ""].join("\n") + "\n";
}

function locationKey(r: PhysicalPortRule): string {
  return [r.panel ?? "", r.horizontal_position ?? "", r.vertical_position ?? ""].join("\u0000");
}

/** One rule per distinct specific ACPI location; horizontal "center" carries no information. */
export function physicalPortRules(t: Topology): PhysicalPortRule[] {
  const seen = new Map<string, { panel: string; h: string; v: string }>();
  for (const d of t.devices.values()) {
    const loc = d.physicalLocation;
    if (!loc || !isSpecificLocation(loc)) continue;
    const key = [loc.panel, loc.horizontalPosition, loc.verticalPosition].join("\u0000");
    if (!seen.has(key)) seen.set(key, { panel: loc.panel, h: loc.horizontalPosition, v: loc.verticalPosition });
  }
  const rules = [...seen.values()].map(({ panel, h, v }) => {
    const parts = [panel, v].filter((s) => s.length > 0).map(capitalize);
    const r: PhysicalPortRule = { label: parts.length === 0 ? "USB Port" : `${parts.join(" ")} USB Port` };
    if (panel) r.panel = panel;
    if (h && h !== "center") r.horizontal_position = h;
    if (v) r.vertical_position = v;
    return r;
  });
  return rules.sort((a, b) => locationKey(a).localeCompare(locationKey(b)));
}

/** First name seen per vid:pid among non-hub devices. */
export function productNames(t: Topology): Record<string, string> {
  const out = new Map<string, string>();
  for (const d of allDevicesInTreeOrder(t)) {
    if (d.isHub) continue;
    const key = vidPid(d);
    if (!out.has(key)) out.set(key, d.product ?? d.manufacturer ?? "Unknown Device");
  }
  return Object.fromEntries([...out.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/** A starting configuration with every controller, bus, port location and product currently attached. */
export function generateConfig(t: Topology): string {
  const d = defaultLabelConfig();
  const out: string[] = [
    "# usbbw configuration file - generated from the current USB topology\n",
    "# Place in ./usbbw.yaml, ~/.config/usbbw/config.yaml, or /etc/usbbw.yaml\n",
    "# Edit the labels below to rename controllers, buses and devices\n\n",
    dump({ settings: d.settings }),
    "\n",
  ];

  const controllerNotes = t.controllers.map((c) => {
    const buses = [
      c.usb2Bus !== undefined ? `USB 2.0 bus ${c.usb2Bus}` : "",
      c.usb3Bus !== undefined ? `USB 3.x bus ${c.usb3Bus}` : "",
    ].filter((s) => s.length > 0);
    return `${c.pciAddress ?? c.id}: ${buses.join(", ")}`;
  });
  out.push(banner("USB Controllers (by PCI address)", controllerNotes));
  out.push(dump({ controllers: Object.fromEntries(t.controllers.map((c) => [c.pciAddress ?? c.id, "USB Controller"])) }), "\n");

  out.push(banner("Bus Labels (by bus number)", t.buses.map((b) => `${b.busNum}: ${isSuperSpeed(b.speed) ? "USB 3.x" : "USB 2.0"} ${speedShortName(b.speed)}`)));
  out.push(dump({ buses: Object.fromEntries(t.buses.map((b) => [String(b.busNum), `Bus ${b.busNum}`])) }), "\n");

  out.push(banner("Position Label Mappings (ACPI value -> display word)", ['e.g. vertical: { upper: "Rear", lower: "Front" }']));
  out.push(dump({ position_labels: d.position_labels }), "\n");

  const ports = physicalPortRules(t);
  out.push(banner("Physical Port Labels (from ACPI)", ports.length === 0 ? ["No specific physical_location attributes found on this system"] : []));
  out.push(dump({ physical_ports: ports }), "\n");

  out.push(banner("Product Labels (by VID:PID)"));
  out.push(dump({ products: productNames(t) }), "\n");

  const pathNotes = allDevicesInTreeOrder(t).map(
    (dev) => `"${dev.path}": "${dev.product ?? dev.manufacturer ?? (dev.isHub ? "USB Hub" : "Unknown Device")}"  # ${dev.isHub ? "Hub" : "Dev"} ${vidPid(dev)}`,
  );
  out.push(banner("Device Path Labels (change when devices move between ports)", pathNotes));
  out.push(dump({ devices: {} }), "\n");

  out.push(banner("Mermaid Diagram Settings"));
  out.push(dump({ mermaid: d.mermaid }));
  return out.join("");
}
