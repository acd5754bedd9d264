import { UsbbwError } from "./errors.js";
import type { Speed } from "./speed.js";

export type TransferType = "control" | "bulk" | "interrupt" | "isochronous";

export type Direction = "in" | "out";

export type Endpoint = {
  address: number;
  direction: Direction;
  transferType: TransferType;
  maxPacketSize: number;
  intervalUs: number;
  /** Extra transactions per microframe (high-bandwidth high-speed endpoints only). */
  additionalTransactions?: number;
};

/** Endpoint attributes as sysfs exposes them under `<iface>/ep_XX/`. */
export type RawEndpointRecord = {
  type?: string;
  direction?: string;
  bEndpointAddress?: string;
  bInterval?: string;
  wMaxPacketSize?: string;
};

export function reservesBandwidth(t: TransferType): boolean {
  return t === "interrupt" || t === "isochronous";
}

export function parseTransferType(s: string): TransferType | undefined {
  switch (s.trim()) {
    case "Control":
      return "control";
    case "Bulk":
      return "bulk";
    case "Interrupt":
      return "interrupt";
    case "Isoc":
    case "Isochronous":
      return "isochronous";
    default:
      return undefined;
  }
}

export function parseDirection(s: string): Direction | undefined {
  const v = s.trim();
  if (v === "in" || v === "out") return v;
  return undefined;
}

function parseHex(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().replace(/^0x/i, "");
  if (!/^[0-9a-f]+$/i.test(v)) return undefined;
  return parseInt(v, 16);
}

// Low/full speed: bInterval counts frames (ms). High speed and above: 2^(bInterval-1) microframes.
export function intervalUsFromDescriptor(bInterval: number, speed: Speed): number {
  if (speed === "low" || speed === "full") {
    return (bInterval === 0 ? 1 : bInterval) * 1000;
  }
  if (bInterval === 0) return 125;
  const exponent = Math.min(bInterval - 1, 15);
  return 2 ** exponent * 125;
}

export function decodeEndpoint(raw: RawEndpointRecord, speed: Speed, owner?: string): Endpoint {
  const transferType = raw.type === undefined ? undefined : parseTransferType(raw.type);
  if (!transferType) {
    throw new UsbbwError("InvalidEndpoint", `unknown transfer type '${raw.type ?? ""}'`, { path: owner });
  }
  const direction = raw.direction === undefined ? undefined : parseDirection(raw.direction);
  if (!direction) {
    throw new UsbbwError("InvalidEndpoint", `unknown direction '${raw.direction ?? ""}'`, { path: owner });
  }
  const address = parseHex(raw.bEndpointAddress);
  if (address === undefined || address > 0xff) {
    throw new UsbbwError("InvalidEndpoint", `bad endpoint address '${raw.bEndpointAddress ?? ""}'`, { path: owner });
  }
  const wMaxPacketSize = parseHex(raw.wMaxPacketSize) ?? 0;
  const bInterval = parseHex(raw.bInterval) ?? 0;
  const extra = (wMaxPacketSize >> 11) & 0x03;
  const ep: Endpoint = {
    address,
    direction,
    transferType,
    maxPacketSize: wMaxPacketSize & 0x07ff,
    intervalUs: intervalUsFromDescriptor(bInterval, speed),
  };
  if (speed === "high" && extra > 0) ep.additionalTransactions = extra;
  return ep;
}

export function endpointMultiplier(ep: Endpoint): number {
  return ep.additionalTransactions === undefined ? 1 : 1 + ep.additionalTransactions;
}

/**
 * Periodic bandwidth reserved by one endpoint, in bits per second.
 * Control and bulk endpoints reserve nothing.
 */
export function endpointBandwidthBps(ep: Endpoint): number {
  if (!reservesBandwidth(ep.transferType)) return 0;
  if (!Number.isFinite(ep.intervalUs) || ep.intervalUs <= 0) {
    throw new UsbbwError("InvalidEndpoint", `interval must be positive, got ${ep.intervalUs}us`);
  }
  if (!Number.isFinite(ep.maxPacketSize) || ep.maxPacketSize < 0) {
    throw new UsbbwError("InvalidEndpoint", `max packet size must not be negative, got ${ep.maxPacketSize}`);
  }
  const bitsPerInterval = ep.maxPacketSize * endpointMultiplier(ep) * 8;
  return (bitsPerInterval * 1_000_000) / ep.intervalUs;
}

export function formatInterval(us: number): string {
  return us >= 1000 && us % 1000 === 0 ? `${us / 1000}ms` : `${us}us`;
}

export function describeEndpoint(ep: Endpoint): string {
  const kind = ep.transferType[0].toUpperCase() + ep.transferType.slice(1);
  const addr = ep.address.toString(16).toUpperCase().padStart(2, "0");
  return `EP${addr} ${kind} ${ep.direction.toUpperCase()} ${ep.maxPacketSize}B @ ${formatInterval(ep.intervalUs)}`;
}
