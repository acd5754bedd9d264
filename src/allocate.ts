import { type BandwidthPool, availableBps, createPool, isOverSubscribed } from "./bandwidth.js";
import { endpointBandwidthBps } from "./endpoint.js";
import { type Speed, poolClassOf } from "./speed.js";
import { type Bus, type Device, type Topology, assembleTopology, devicesInTreeOrder } from "./topology.js";

export type AllocationReport = {
  busNum: number;
  pool: BandwidthPool;
  overSubscribed: boolean;
  /** Devices that failed to configure; reported alongside, not blamed on the pool. */
  unconfigured: string[];
};

export type BusRecommendation = {
  bus: Bus;
  availableBps: number;
};

export function deviceBandwidthBps(d: Device): number {
  return d.endpoints.reduce((sum, ep) => sum + endpointBandwidthBps(ep), 0);
}

export function busUsedBps(t: Topology, bus: Bus): number {
  return devicesInTreeOrder(t, bus).reduce((sum, d) => sum + deviceBandwidthBps(d), 0);
}

/**
 * Recomputes every bus pool from the endpoints reachable below it.
 * Pure: the input topology is left as is and a new one is returned.
 */
export function allocate(t: Topology): Topology {
  const buses = t.buses.map((b) => ({ ...b, pool: createPool(b.speed, busUsedBps(t, b)) }));
  return assembleTopology(buses, t.devices);
}

export function allocationFailures(t: Topology): AllocationReport[] {
  return t.buses
    .map((b) => ({
      busNum: b.busNum,
      pool: b.pool,
      overSubscribed: isOverSubscribed(b.pool),
      unconfigured: devicesInTreeOrder(t, b).filter((d) => !d.configured).map((d) => d.path),
    }))
    .filter((r) => r.overSubscribed || r.unconfigured.length > 0);
}

export function bestBusesFor(t: Topology, requiredBps: number, speed: Speed): BusRecommendation[] {
  const wanted = poolClassOf(speed);
  return t.buses
    .filter((b) => b.pool.poolClass === wanted)
    .map((b) => ({ bus: b, availableBps: availableBps(b.pool) }))
    .filter((r) => r.availableBps >= requiredBps)
    .sort((a, b) => b.availableBps - a.availableBps || a.bus.busNum - b.bus.busNum);
}
