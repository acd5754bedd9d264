import { type Topology, allDevicesInTreeOrder, configKey } from "./topology.js";

export type DeviceStatus = "unchanged" | "new" | "removed";

export type DiffEntry = {
  path: string;
  configKey: string;
  status: DeviceStatus;
  /** Session-wide discovery ordinal, present once the device has been seen as new. */
  ordinal?: number;
};

export type SnapshotDiff = {
  /** Devices of the current snapshot, tree order. */
  current: DiffEntry[];
  /** Devices of the previous snapshot missing from the current one, tree order. */
  removed: DiffEntry[];
};

/** Process-lifetime discovery bookkeeping, owned by whoever drives refreshes. */
export type DiscoveryState = {
  readonly ordinals: ReadonlyMap<string, number>;
  readonly nextOrdinal: number;
};

export function createDiscoveryState(): DiscoveryState {
  return { ordinals: new Map(), nextOrdinal: 1 };
}

// Same port, different device: identity includes the config key, so a swap is removed + new.
function identity(path: string, key: string): string {
  return `${path}|${key}`;
}

function identities(t: Topology): Array<{ path: string; key: string; id: string }> {
  return allDevicesInTreeOrder(t).map((d) => {
    const key = configKey(d);
    return { path: d.path, key, id: identity(d.path, key) };
  });
}

export function diffTopologies(
  state: DiscoveryState,
  previous: Topology | undefined,
  current: Topology,
): { diff: SnapshotDiff; state: DiscoveryState } {
  const before = previous ? identities(previous) : [];
  const beforeIds = new Set(before.map((x) => x.id));
  const now = identities(current);
  const nowIds = new Set(now.map((x) => x.id));

  const ordinals = new Map(state.ordinals);
  let nextOrdinal = state.nextOrdinal;

  const entries: DiffEntry[] = now.map(({ path, key, id }): DiffEntry => {
    if (beforeIds.has(id)) {
      return { path, configKey: key, status: "unchanged", ordinal: ordinals.get(id) };
    }
    let ordinal = ordinals.get(id);
    if (ordinal === undefined) {
      ordinal = nextOrdinal;
      nextOrdinal += 1;
      ordinals.set(id, ordinal);
    }
    return { path, configKey: key, status: "new", ordinal };
  });

  const removed: DiffEntry[] = before
    .filter((x) => !nowIds.has(x.id))
    .map(({ path, key, id }): DiffEntry => ({ path, configKey: key, status: "removed", ordinal: ordinals.get(id) }));

  return { diff: { current: entries, removed }, state: { ordinals, nextOrdinal } };
}

export function statusByPath(diff: SnapshotDiff): Map<string, DiffEntry> {
  return new Map(diff.current.map((e) => [e.path, e]));
}

export function newEntries(diff: SnapshotDiff): DiffEntry[] {
  return diff.current.filter((e) => e.status === "new");
}
