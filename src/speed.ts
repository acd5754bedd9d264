export type Speed = "low" | "full" | "high" | "super" | "super_plus" | "super_plus_2";

export type PoolClass = "usb2" | "usb3";

type SpeedInfo = {
  rawBps: number;
  shortName: string;
};

const speedTable: Record<Speed, SpeedInfo> = {
  low: { rawBps: 1_500_000, shortName: "1.5M" },
  full: { rawBps: 12_000_000, shortName: "12M" },
  high: { rawBps: 480_000_000, shortName: "480M" },
  super: { rawBps: 5_000_000_000, shortName: "5G" },
  super_plus: { rawBps: 10_000_000_000, shortName: "10G" },
  super_plus_2: { rawBps: 20_000_000_000, shortName: "20G" },
};

export const SPEEDS: readonly Speed[] = ["low", "full", "high", "super", "super_plus", "super_plus_2"];

// Periodic transfers may reserve at most 80% of a high-speed microframe.
export const USB2_PERIODIC_CAPACITY_BPS = 384_000_000;
export const PERIODIC_SHARE_PERCENT = 80;

export function isSpeed(s: string): s is Speed {
  return Object.prototype.hasOwnProperty.call(speedTable, s);
}

/** Parses the sysfs `speed` attribute, which is given in Mbps ("1.5", "12", "480", ...). */
export function speedFromMbps(raw: string | number): Speed | undefined {
  const mbps = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isFinite(mbps)) return undefined;
  if (mbps === 1 || mbps === 1.5 || mbps === 2) return "low";
  if (mbps === 12) return "full";
  if (mbps === 480) return "high";
  if (mbps === 5000) return "super";
  if (mbps === 10000) return "super_plus";
  if (mbps === 20000) return "super_plus_2";
  return undefined;
}

export function rawBandwidthBps(speed: Speed): number {
  return speedTable[speed].rawBps;
}

export function isSuperSpeed(speed: Speed): boolean {
  return speed === "super" || speed === "super_plus" || speed === "super_plus_2";
}

export function poolClassOf(speed: Speed): PoolClass {
  return isSuperSpeed(speed) ? "usb3" : "usb2";
}

export function periodicCapacityBps(speed: Speed): number {
  if (poolClassOf(speed) === "usb2") return USB2_PERIODIC_CAPACITY_BPS;
  return (rawBandwidthBps(speed) * PERIODIC_SHARE_PERCENT) / 100;
}

export function speedShortName(speed: Speed): string {
  return speedTable[speed].shortName;
}
