import { type BandwidthPool, createPool } from "./bandwidth.js";
import { type DevicePath, compareDevicePaths, formatDevicePath, parentPath, parseDevicePath, pathDepth } from "./device_path.js";
import { type Endpoint, type RawEndpointRecord, decodeEndpoint, reservesBandwidth } from "./endpoint.js";
import { UsbbwError, isUsbbwError } from "./errors.js";
import { type Speed, speedFromMbps } from "./speed.js";
import { deepFreeze, hex4 } from "./util.js";

export type RawBusRecord = {
  busNum: number;
  speed?: string;
  version?: string;
  maxchild?: string;
  /** PCI address of the host controller, when the root hub link exposes one. */
  controllerId?: string;
};

export type RawPhysicalLocation = {
  panel?: string;
  horizontal_position?: string;
  vertical_position?: string;
  dock?: string;
  lid?: string;
};

export type RawDeviceRecord = {
  name: string;
  idVendor?: string;
  idProduct?: string;
  serial?: string;
  manufacturer?: string;
  product?: string;
  speed?: string;
  bConfigurationValue?: string;
  bMaxPower?: string;
  bDeviceClass?: string;
  maxchild?: string;
  version?: string;
  bNumInterfaces?: string;
  physicalLocation?: RawPhysicalLocation;
  endpoints: RawEndpointRecord[];
};

export type RawTopologySource = {
  buses: RawBusRecord[];
  devices: RawDeviceRecord[];
};

export type PhysicalLocation = {
  panel: string;
  horizontalPosition: string;
  verticalPosition: string;
  dock: boolean;
  lid: boolean;
};

export type Device = {
  readonly path: string;
  readonly location: DevicePath;
  readonly vendorId: number;
  readonly productId: number;
  readonly serial?: string;
  readonly manufacturer?: string;
  readonly product?: string;
  readonly speed: Speed;
  readonly configured: boolean;
  readonly endpoints: readonly Endpoint[];
  readonly maxPowerMa?: number;
  readonly deviceClass: number;
  readonly isHub: boolean;
  readonly numPorts?: number;
  readonly physicalLocation?: PhysicalLocation;
  readonly usbVersion: string;
  readonly numInterfaces: number;
  readonly parent?: string;
  readonly children: readonly string[];
};

export type Bus = {
  readonly busNum: number;
  readonly speed: Speed;
  readonly version: string;
  readonly numPorts: number;
  readonly controllerId: string;
  /** Devices plugged directly into the root hub, ascending port order. */
  readonly devices: readonly string[];
  readonly pool: BandwidthPool;
};

export type Controller = {
  readonly id: string;
  readonly pciAddress?: string;
  readonly usb2Bus?: number;
  readonly usb3Bus?: number;
};

export type Topology = {
  readonly controllers: readonly Controller[];
  readonly buses: readonly Bus[];
  readonly devices: ReadonlyMap<string, Device>;
};

export type BuildResult = {
  topology: Topology;
  warnings: UsbbwError[];
};

const HUB_CLASS = 0x09;

// xHCI pairing: odd bus carries USB 2.x, the next even bus USB 3.x of the same controller.
export function pairedBusNumber(busNum: number): number {
  return busNum % 2 === 1 ? busNum + 1 : busNum - 1;
}

function pairId(busNum: number): string {
  const odd = busNum % 2 === 1 ? busNum : busNum - 1;
  return `usb${odd}+${odd + 1}`;
}

function clean(v: string | undefined): string | undefined {
  if (v === undefined) return undefined;
  const t = v.trim();
  return t.length > 0 ? t : undefined;
}

function parseId16(raw: string | undefined): number | undefined {
  const v = clean(raw);
  if (v === undefined || !/^[0-9a-f]{1,4}$/i.test(v)) return undefined;
  return parseInt(v, 16);
}

function parseIntAttr(raw: string | undefined, radix = 10): number | undefined {
  const v = clean(raw);
  if (v === undefined) return undefined;
  const re = radix === 16 ? /^[0-9a-f]+$/i : /^\d+$/;
  return re.test(v) ? parseInt(v, radix) : undefined;
}

/** Missing, empty or zero `bConfigurationValue` means the device never got configured. */
export function isConfiguredValue(raw: string | undefined): boolean {
  const n = parseIntAttr(raw);
  return n !== undefined && n > 0;
}

export function parseMaxPower(raw: string | undefined): number | undefined {
  const v = clean(raw);
  if (v === undefined) return undefined;
  const m = /^(\d+)\s*mA$/i.exec(v) ?? /^(\d+)$/.exec(v);
  return m ? Number(m[1]) : undefined;
}

function parsePhysicalLocation(raw: RawPhysicalLocation | undefined): PhysicalLocation | undefined {
  if (!raw) return undefined;
  return {
    panel: clean(raw.panel) ?? "",
    horizontalPosition: clean(raw.horizontal_position) ?? "",
    verticalPosition: clean(raw.vertical_position) ?? "",
    dock: clean(raw.dock) === "yes",
    lid: clean(raw.lid) === "yes",
  };
}

type ParsedDevice = Omit<Device, "parent" | "children">;

export function parseDevice(raw: RawDeviceRecord): ParsedDevice {
  const location = parseDevicePath(raw.name);
  const path = formatDevicePath(location);
  const vendorId = parseId16(raw.idVendor);
  if (vendorId === undefined) {
    throw new UsbbwError("MalformedDevice", `missing or invalid idVendor '${raw.idVendor ?? ""}'`, { path });
  }
  const productId = parseId16(raw.idProduct);
  if (productId === undefined) {
    throw new UsbbwError("MalformedDevice", `missing or invalid idProduct '${raw.idProduct ?? ""}'`, { path });
  }
  const speed = raw.speed === undefined ? undefined : speedFromMbps(raw.speed);
  if (!speed) {
    throw new UsbbwError("MalformedDevice", `missing or unknown speed '${raw.speed ?? ""}'`, { path });
  }
  const endpoints = raw.endpoints.map((ep) => decodeEndpoint(ep, speed, path));
  const deviceClass = parseIntAttr(raw.bDeviceClass, 16) ?? 0;
  const isHub = deviceClass === HUB_CLASS;
  return {
    path,
    location,
    vendorId,
    productId,
    serial: clean(raw.serial),
    manufacturer: clean(raw.manufacturer),
    product: clean(raw.product),
    speed,
    configured: isConfiguredValue(raw.bConfigurationValue),
    endpoints,
    maxPowerMa: parseMaxPower(raw.bMaxPower),
    deviceClass,
    isHub,
    numPorts: isHub ? parseIntAttr(raw.maxchild) : undefined,
    physicalLocation: parsePhysicalLocation(raw.physicalLocation),
    usbVersion: clean(raw.version) ?? "",
    numInterfaces: parseIntAttr(raw.bNumInterfaces) ?? 1,
  };
}

function toWarning(e: unknown, name: string): UsbbwError {
  if (isUsbbwError(e)) return e;
  const msg = e instanceof Error ? e.message : String(e);
  return new UsbbwError("MalformedDevice", msg, { path: name, cause: e });
}

/**
 * Builds an immutable topology from raw attribute records. Nodes that fail to
 * parse are left out and reported in `warnings`; nothing here throws.
 */
export function buildTopology(source: RawTopologySource): BuildResult {
  const warnings: UsbbwError[] = [];

  type BusDraft = Omit<Bus, "devices" | "pool">;
  const busDrafts = new Map<number, BusDraft>();
  for (const rb of [...source.buses].sort((a, b) => a.busNum - b.busNum)) {
    const speed = rb.speed === undefined ? undefined : speedFromMbps(rb.speed);
    if (!speed) {
      warnings.push(new UsbbwError("MalformedDevice", `bus ${rb.busNum}: unknown speed '${rb.speed ?? ""}'`, { path: `usb${rb.busNum}` }));
      continue;
    }
    if (busDrafts.has(rb.busNum)) {
      warnings.push(new UsbbwError("MalformedDevice", `bus ${rb.busNum} reported twice`, { path: `usb${rb.busNum}` }));
      continue;
    }
    busDrafts.set(rb.busNum, {
      busNum: rb.busNum,
      speed,
      version: clean(rb.version) ?? "",
      numPorts: parseIntAttr(rb.maxchild) ?? 0,
      controllerId: clean(rb.controllerId) ?? pairId(rb.busNum),
    });
  }

  const parsed: ParsedDevice[] = [];
  for (const rd of source.devices) {
    try {
      parsed.push(parseDevice(rd));
    } catch (e) {
      warnings.push(toWarning(e, rd.name));
    }
  }
  parsed.sort((a, b) => compareDevicePaths(a.location, b.location));

  const kept = new Map<string, ParsedDevice>();
  const children = new Map<string, string[]>();
  for (const d of parsed) {
    if (kept.has(d.path)) {
      warnings.push(new UsbbwError("MalformedDevice", "duplicate device path", { path: d.path }));
      continue;
    }
    if (!busDrafts.has(d.location.bus)) {
      warnings.push(new UsbbwError("MalformedDevice", `bus ${d.location.bus} not present`, { path: d.path }));
      continue;
    }
    const parent = parentPath(d.location);
    if (parent) {
      const parentKey = formatDevicePath(parent);
      if (!kept.has(parentKey)) {
        warnings.push(new UsbbwError("MalformedDevice", `parent hub ${parentKey} not present`, { path: d.path }));
        continue;
      }
      children.get(parentKey)?.push(d.path);
    }
    kept.set(d.path, d);
    children.set(d.path, []);
  }

  const devices = new Map<string, Device>();
  for (const d of kept.values()) {
    const parent = parentPath(d.location);
    devices.set(d.path, {
      ...d,
      parent: parent ? formatDevicePath(parent) : undefined,
      children: children.get(d.path) ?? [],
    });
  }

  const buses: Bus[] = [...busDrafts.values()].map((b) => ({
    ...b,
    devices: [...devices.values()].filter((d) => d.location.bus === b.busNum && pathDepth(d.location) === 0).map((d) => d.path),
    pool: createPool(b.speed),
  }));

  return { topology: assembleTopology(buses, devices), warnings };
}

function buildControllers(buses: readonly Bus[]): Controller[] {
  const byId = new Map<string, { id: string; pciAddress?: string; usb2Bus?: number; usb3Bus?: number }>();
  for (const b of buses) {
    const c = byId.get(b.controllerId) ?? {
      id: b.controllerId,
      pciAddress: b.controllerId.startsWith("usb") ? undefined : b.controllerId,
    };
    if (b.busNum % 2 === 1) c.usb2Bus = b.busNum;
    else c.usb3Bus = b.busNum;
    byId.set(c.id, c);
  }
  return [...byId.values()].sort((a, b) => a.id.localeCompare(b.id));
}

export function assembleTopology(buses: readonly Bus[], devices: ReadonlyMap<string, Device>): Topology {
  const sorted = [...buses].sort((a, b) => a.busNum - b.busNum);
  return deepFreeze({
    controllers: buildControllers(sorted),
    buses: sorted,
    devices: new Map(devices),
  });
}

export function emptyTopology(): Topology {
  return assembleTopology([], new Map());
}

/** Buses are kept in bus-number order from assembly on. */
export function busesSorted(t: Topology): readonly Bus[] {
  return t.buses;
}

export function getBus(t: Topology, busNum: number): Bus | undefined {
  return t.buses.find((b) => b.busNum === busNum);
}

export function getDevice(t: Topology, path: string): Device | undefined {
  return t.devices.get(path);
}

export function controllerForBus(t: Topology, busNum: number): Controller | undefined {
  return t.controllers.find((c) => c.usb2Bus === busNum || c.usb3Bus === busNum);
}

/** The bus sharing a controller with `busNum` under the odd/even pairing, if both are present. */
export function getPairedBus(t: Topology, busNum: number): Bus | undefined {
  const self = getBus(t, busNum);
  const other = getBus(t, pairedBusNumber(busNum));
  if (!self || !other || self.controllerId !== other.controllerId) return undefined;
  return other;
}

export function devicesInTreeOrder(t: Topology, bus: Bus): Device[] {
  const out: Device[] = [];
  const visit = (path: string): void => {
    const d = t.devices.get(path);
    if (!d) return;
    out.push(d);
    for (const c of d.children) visit(c);
  };
  for (const p of bus.devices) visit(p);
  return out;
}

export function allDevicesInTreeOrder(t: Topology): Device[] {
  return t.buses.flatMap((b) => devicesInTreeOrder(t, b));
}

export function deviceCount(t: Topology, bus: Bus): number {
  return devicesInTreeOrder(t, bus).length;
}

export function totalPowerMa(t: Topology, bus: Bus): number {
  return devicesInTreeOrder(t, bus).reduce((sum, d) => sum + (d.maxPowerMa ?? 0), 0);
}

export function periodicEndpoints(d: Device): Endpoint[] {
  return d.endpoints.filter((ep) => reservesBandwidth(ep.transferType));
}

export function vidPid(d: Pick<Device, "vendorId" | "productId">): string {
  return `${hex4(d.vendorId)}:${hex4(d.productId)}`;
}

export function configKey(d: Pick<Device, "vendorId" | "productId" | "serial">): string {
  return d.serial ? `${vidPid(d)}:${d.serial}` : vidPid(d);
}
