import fs from "fs";
import path from "path";
import type { RawEndpointRecord } from "./endpoint.js";
import { UsbbwError, describeError } from "./errors.js";
import type { RawBusRecord, RawDeviceRecord, RawPhysicalLocation, RawTopologySource } from "./topology.js";

export const SYSFS_USB_DEVICES = "/sys/bus/usb/devices";

export type SysfsReadResult = {
  source: RawTopologySource;
  warnings: UsbbwError[];
};

const deviceDirRe = /^\d+-\d+(\.\d+)*$/;
const rootHubRe = /^usb(\d+)$/;

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");
}

/** Reads one attribute file; a missing file is an absent attribute, any other failure propagates. */
export function readAttr(dir: string, name: string): string | undefined {
  try {
    return fs.readFileSync(path.join(dir, name), "utf8").trim();
  } catch (e) {
    if (isMissing(e)) return undefined;
    throw e;
  }
}

function listDir(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
  } catch (e) {
    if (isMissing(e)) return [];
    throw e;
  }
}

function isDirLike(dir: string, entry: fs.Dirent): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return fs.statSync(path.join(dir, entry.name)).isDirectory();
  } catch (e) {
    if (isMissing(e)) return false;
    throw e;
  }
}

// The root hub link points into the PCI tree: .../0000:c1:00.4/usb1
export function controllerIdFromLink(target: string): string | undefined {
  const parts = target.split("/");
  for (let i = 1; i < parts.length; i += 1) {
    if (!rootHubRe.test(parts[i])) continue;
    const prev = parts[i - 1];
    if (prev.length >= 7 && prev.includes(":") && prev.includes(".")) return prev;
  }
  return undefined;
}

function readControllerId(base: string, name: string): string | undefined {
  try {
    return controllerIdFromLink(fs.readlinkSync(path.join(base, name)));
  } catch (e) {
    if (isMissing(e) || (e instanceof Error && "code" in e && e.code === "EINVAL")) return undefined;
    throw e;
  }
}

function readEndpoint(dir: string): RawEndpointRecord {
  return {
    type: readAttr(dir, "type"),
    direction: readAttr(dir, "direction"),
    bEndpointAddress: readAttr(dir, "bEndpointAddress"),
    bInterval: readAttr(dir, "bInterval"),
    wMaxPacketSize: readAttr(dir, "wMaxPacketSize"),
  };
}

function readEndpoints(deviceDir: string): RawEndpointRecord[] {
  const out: RawEndpointRecord[] = [];
  for (const iface of listDir(deviceDir)) {
    if (!iface.name.includes(":") || !isDirLike(deviceDir, iface)) continue;
    const ifaceDir = path.join(deviceDir, iface.name);
    for (const ep of listDir(ifaceDir)) {
      // ep_00 is the default control pipe; it never reserves periodic bandwidth.
      if (!ep.name.startsWith("ep_") || ep.name === "ep_00") continue;
      out.push(readEndpoint(path.join(ifaceDir, ep.name)));
    }
  }
  return out;
}

function readPhysicalLocation(deviceDir: string): RawPhysicalLocation | undefined {
  const dir = path.join(deviceDir, "physical_location");
  if (!fs.existsSync(dir)) return undefined;
  return {
    panel: readAttr(dir, "panel"),
    horizontal_position: readAttr(dir, "horizontal_position"),
    vertical_position: readAttr(dir, "vertical_position"),
    dock: readAttr(dir, "dock"),
    lid: readAttr(dir, "lid"),
  };
}

export function readDevice(base: string, name: string): RawDeviceRecord {
  const dir = path.join(base, name);
  return {
    name,
    idVendor: readAttr(dir, "idVendor"),
    idProduct: readAttr(dir, "idProduct"),
    serial: readAttr(dir, "serial"),
    manufacturer: readAttr(dir, "manufacturer"),
    product: readAttr(dir, "product"),
    speed: readAttr(dir, "speed"),
    bConfigurationValue: readAttr(dir, "bConfigurationValue"),
    bMaxPower: readAttr(dir, "bMaxPower"),
    bDeviceClass: readAttr(dir, "bDeviceClass"),
    maxchild: readAttr(dir, "maxchild"),
    version: readAttr(dir, "version"),
    bNumInterfaces: readAttr(dir, "bNumInterfaces"),
    physicalLocation: readPhysicalLocation(dir),
    endpoints: readEndpoints(dir),
  };
}

export function readBus(base: string, name: string, busNum: number): RawBusRecord {
  const dir = path.join(base, name);
  return {
    busNum,
    speed: readAttr(dir, "speed"),
    version: readAttr(dir, "version"),
    maxchild: readAttr(dir, "maxchild"),
    controllerId: readControllerId(base, name),
  };
}

/**
 * Collects raw attributes for every root hub and device under `base`. A node
 * whose attributes cannot be read is skipped and reported as a warning.
 */
export function readSysfs(base: string = SYSFS_USB_DEVICES): SysfsReadResult {
  const buses: RawBusRecord[] = [];
  const devices: RawDeviceRecord[] = [];
  const warnings: UsbbwError[] = [];
  for (const entry of fs.readdirSync(base, { withFileTypes: true })) {
    const name = entry.name;
    const hub = rootHubRe.exec(name);
    try {
      if (hub) buses.push(readBus(base, name, Number(hub[1])));
      else if (deviceDirRe.test(name)) devices.push(readDevice(base, name));
    } catch (e) {
      warnings.push(new UsbbwError("MalformedDevice", `cannot read attributes: ${describeError(e)}`, { path: name, cause: e }));
    }
  }
  return { source: { buses, devices }, warnings };
}
