import fs from "fs";
import path from "path";

export type Node = {
  id: string;
  label?: string;
  attrs?: Record<string, string>;
  width?: number;
  height?: number;
  x?: number;
  y?: number;
  category?: string;
};

export type Edge = {
  id?: string;
  source: string;
  target: string;
  label?: string;
  attrs?: Record<string, string>;
  points?: { x: number; y: number }[];
};

export type Graph = {
  nodes: Node[];
  edges: Edge[];
};

export function readText(file: string): string {
  return fs.readFileSync(file, "utf8");
}

export function writeText(file: string, data: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, data, "utf8");
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function hasOwn(o: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(o, key);
}

// Plain assignment would hit the __proto__ setter for a key read from YAML.
export function setOwn<T>(o: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(o, key, { value, enumerable: true, writable: true, configurable: true });
}

export function hex4(n: number): string {
  return n.toString(16).padStart(4, "0");
}

export function capitalize(s: string): string {
  return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  if (value instanceof Map) {
    for (const v of value.values()) deepFreeze(v);
  } else {
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return Object.freeze(value);
}
