import { UsbbwError } from "./errors.js";

export type DevicePath = {
  bus: number;
  /** Port numbers from the root hub down, e.g. `3-2.1` → [2, 1]. */
  ports: number[];
};

const pathRe = /^(\d+)-(\d+(?:\.\d+)*)$/;

export function parseDevicePath(s: string): DevicePath {
  const m = pathRe.exec(s.trim());
  if (!m) throw new UsbbwError("InvalidPath", `cannot parse device path '${s}'`, { path: s });
  const bus = Number(m[1]);
  const ports = m[2].split(".").map(Number);
  if (bus < 1 || ports.some((p) => p < 1)) {
    throw new UsbbwError("InvalidPath", `bus and port numbers start at 1 in '${s}'`, { path: s });
  }
  return { bus, ports };
}

export function formatDevicePath(p: DevicePath): string {
  return `${p.bus}-${p.ports.join(".")}`;
}

export function parentPath(p: DevicePath): DevicePath | undefined {
  if (p.ports.length <= 1) return undefined;
  return { bus: p.bus, ports: p.ports.slice(0, -1) };
}

/** 0 for a device plugged directly into the root hub. */
export function pathDepth(p: DevicePath): number {
  return p.ports.length - 1;
}

export function compareDevicePaths(a: DevicePath, b: DevicePath): number {
  if (a.bus !== b.bus) return a.bus - b.bus;
  const n = Math.min(a.ports.length, b.ports.length);
  for (let i = 0; i < n; i += 1) {
    if (a.ports[i] !== b.ports[i]) return a.ports[i] - b.ports[i];
  }
  return a.ports.length - b.ports.length;
}

export function comparePathStrings(a: string, b: string): number {
  return compareDevicePaths(parseDevicePath(a), parseDevicePath(b));
}
