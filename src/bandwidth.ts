import { type PoolClass, type Speed, periodicCapacityBps, poolClassOf, rawBandwidthBps } from "./speed.js";

export type BandwidthPool = {
  poolClass: PoolClass;
  capacityBps: number;
  /** True arithmetic sum of reservations; may exceed capacity. */
  usedBps: number;
  rawBandwidthBps: number;
};

export function createPool(speed: Speed, usedBps = 0): BandwidthPool {
  return {
    poolClass: poolClassOf(speed),
    capacityBps: periodicCapacityBps(speed),
    usedBps,
    rawBandwidthBps: rawBandwidthBps(speed),
  };
}

export function availableBps(pool: BandwidthPool): number {
  return Math.max(0, pool.capacityBps - pool.usedBps);
}

export function usagePercent(pool: BandwidthPool): number {
  if (pool.capacityBps === 0) return 0;
  return (pool.usedBps / pool.capacityBps) * 100;
}

export function isHighUsage(pool: BandwidthPool): boolean {
  return usagePercent(pool) > 80;
}

export function isCritical(pool: BandwidthPool): boolean {
  return usagePercent(pool) > 95;
}

export function isOverSubscribed(pool: BandwidthPool): boolean {
  return pool.usedBps > pool.capacityBps;
}

export function formatBps(bps: number): string {
  if (bps >= 1_000_000_000) return `${(bps / 1_000_000_000).toFixed(2)} Gbps`;
  if (bps >= 1_000_000) return `${(bps / 1_000_000).toFixed(2)} Mbps`;
  if (bps >= 1_000) return `${(bps / 1_000).toFixed(2)} Kbps`;
  return `${Math.round(bps)} bps`;
}

export function formatBytesPerSecond(bps: number): string {
  const bytes = bps / 8;
  if (bytes >= 1_073_741_824) return `${(bytes / 1_073_741_824).toFixed(2)} GB/s`;
  if (bytes >= 1_048_576) return `${(bytes / 1_048_576).toFixed(2)} MB/s`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(2)} KB/s`;
  return `${Math.round(bytes)} B/s`;
}

export function formatRate(bps: number, useBits: boolean): string {
  return useBits ? formatBps(bps) : formatBytesPerSecond(bps);
}

export function bandwidthBar(percent: number, width: number): string {
  const filled = Math.max(0, Math.min(width, Math.round((percent / 100) * width)));
  return `[${"█".repeat(filled)}${"░".repeat(width - filled)}]`;
}
