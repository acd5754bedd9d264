import fs from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { UsbbwError, describeError, isUsbbwError } from "./errors.js";
import { asNum, hasOwn, isRecord, setOwn } from "./util.js";

export type PhysicalPortRule = {
  panel?: string;
  horizontal_position?: string;
  vertical_position?: string;
  dock?: boolean;
  label: string;
};

export type LabelConfig = {
  settings: {
    refresh_ms: number;
    theme: string;
    use_bits: boolean;
  };
  controllers: Record<string, string>;
  buses: Record<string, string>;
  devices: Record<string, string>;
  products: Record<string, string>;
  physical_ports: PhysicalPortRule[];
  position_labels: {
    panel: Record<string, string>;
    vertical: Record<string, string>;
    horizontal: Record<string, string>;
  };
  mermaid: {
    hide_paths: string[];
    filter_vendors: string[];
    collapse_single_child_hubs: boolean;
  };
};

export type LoadedConfig = {
  config: LabelConfig;
  /** File the configuration came from; undefined when defaults were used. */
  file?: string;
};

type RawLayer = Record<string, unknown>;

export function defaultLabelConfig(): LabelConfig {
  return {
    settings: { refresh_ms: 1000, theme: "dark", use_bits: true },
    controllers: {},
    buses: {},
    devices: {},
    products: {},
    physical_ports: [],
    position_labels: { panel: {}, vertical: {}, horizontal: {} },
    mermaid: { hide_paths: [], filter_vendors: [], collapse_single_child_hubs: false },
  };
}

// Child wins: mappings merge per key, sequences append, anything else is replaced.
export function mergeValues(base: unknown, overlay: unknown): unknown {
  if (isRecord(base) && isRecord(overlay)) return mergeLayers(base, overlay);
  if (Array.isArray(base) && Array.isArray(overlay)) return [...base, ...overlay];
  return overlay;
}

export function mergeLayers(base: RawLayer, overlay: RawLayer): RawLayer {
  const out: RawLayer = { ...base };
  for (const [k, v] of Object.entries(overlay)) {
    setOwn(out, k, hasOwn(base, k) ? mergeValues(base[k], v) : v);
  }
  return out;
}

function readLayer(file: string): RawLayer {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (e) {
    throw new UsbbwError("ConfigParseError", `cannot read config: ${describeError(e)}`, { file, cause: e });
  }
  let doc: unknown;
  try {
    doc = yaml.load(text, { filename: file });
  } catch (e) {
    const reason = e instanceof yaml.YAMLException ? e.reason : describeError(e);
    throw new UsbbwError("ConfigParseError", `invalid YAML: ${reason}`, { file, cause: e });
  }
  if (doc === undefined || doc === null) return {};
  if (!isRecord(doc)) {
    throw new UsbbwError("ConfigParseError", "top level must be a mapping", { file });
  }
  return doc;
}

function inheritList(v: unknown, file: string): string[] {
  if (v === undefined || v === null) return [];
  if (typeof v === "string") return [v];
  if (Array.isArray(v) && v.every((x): x is string => typeof x === "string")) return v;
  throw new UsbbwError("ConfigParseError", "inherit must be a string or a list of strings", { file, key: "inherit" });
}

function canonical(file: string): string {
  try {
    return fs.realpathSync(file);
  } catch (e) {
    throw new UsbbwError("ConfigParseError", `cannot read config: ${describeError(e)}`, { file, cause: e });
  }
}

function resolveLayer(file: string, chain: string[]): RawLayer {
  const abs = canonical(file);
  if (chain.includes(abs)) {
    throw new UsbbwError("ConfigCycle", `inheritance cycle: ${[...chain, abs].join(" -> ")}`, { file: abs, key: "inherit" });
  }
  const doc = readLayer(abs);
  const { inherit, ...own } = doc;
  const dir = path.dirname(abs);
  let merged: RawLayer = {};
  for (const parent of inheritList(inherit, abs)) {
    merged = mergeLayers(merged, resolveLayer(path.resolve(dir, parent), [...chain, abs]));
  }
  return mergeLayers(merged, own);
}

/** Loads `file` and everything it inherits from, merged into one raw document. */
export function loadConfigLayers(file: string): RawLayer {
  return resolveLayer(file, []);
}

function labelMap(v: unknown, file: string | undefined, key: string): Record<string, string> {
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new UsbbwError("ConfigParseError", "expected a mapping of labels", { file, key });
  const out: Record<string, string> = {};
  for (const [k, label] of Object.entries(v)) {
    if (typeof label === "string") setOwn(out, k, label);
    else if (typeof label === "number" || typeof label === "boolean") setOwn(out, k, String(label));
    else throw new UsbbwError("ConfigParseError", "label must be a scalar", { file, key: `${key}.${k}` });
  }
  return out;
}

function stringList(v: unknown, file: string | undefined, key: string): string[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new UsbbwError("ConfigParseError", "expected a list", { file, key });
  return v.map((x) => String(x));
}

function section(raw: RawLayer, name: string, file: string | undefined): RawLayer {
  const v = raw[name];
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new UsbbwError("ConfigParseError", "expected a mapping", { file, key: name });
  return v;
}

function refreshMs(v: unknown, file: string | undefined): number | undefined {
  if (v === undefined || v === null) return undefined;
  const n = asNum(v);
  if (n === undefined || !Number.isInteger(n) || n <= 0) {
    throw new UsbbwError("ConfigParseError", `refresh_ms must be a positive integer, got '${String(v)}'`, { file, key: "settings.refresh_ms" });
  }
  return n;
}

function optString(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return undefined;
}

function parsePhysicalPorts(v: unknown, file: string | undefined): PhysicalPortRule[] {
  if (v === undefined || v === null) return [];
  if (!Array.isArray(v)) throw new UsbbwError("ConfigParseError", "expected a list of port rules", { file, key: "physical_ports" });
  return v.map((item, i) => {
    const key = `physical_ports[${i}]`;
    if (!isRecord(item)) throw new UsbbwError("ConfigParseError", "expected a mapping", { file, key });
    const label = optString(item.label);
    if (label === undefined) throw new UsbbwError("ConfigParseError", "port rule needs a label", { file, key: `${key}.label` });
    const rule: PhysicalPortRule = { label };
    const panel = optString(item.panel);
    const h = optString(item.horizontal_position);
    const vpos = optString(item.vertical_position);
    if (panel !== undefined) rule.panel = panel;
    if (h !== undefined) rule.horizontal_position = h;
    if (vpos !== undefined) rule.vertical_position = vpos;
    if (typeof item.dock === "boolean") rule.dock = item.dock;
    return rule;
  });
}

/** Turns a merged raw document into a typed configuration. */
export function parseLabelConfig(raw: RawLayer, file?: string): LabelConfig {
  const d = defaultLabelConfig();
  const settings = section(raw, "settings", file);
  const positions = section(raw, "position_labels", file);
  const mermaid = section(raw, "mermaid", file);
  return {
    settings: {
      refresh_ms: refreshMs(settings.refresh_ms, file) ?? d.settings.refresh_ms,
      theme: optString(settings.theme) ?? d.settings.theme,
      use_bits: typeof settings.use_bits === "boolean" ? settings.use_bits : d.settings.use_bits,
    },
    controllers: labelMap(raw.controllers, file, "controllers"),
    buses: labelMap(raw.buses, file, "buses"),
    devices: labelMap(raw.devices, file, "devices"),
    products: labelMap(raw.products, file, "products"),
    physical_ports: parsePhysicalPorts(raw.physical_ports, file),
    position_labels: {
      panel: labelMap(positions.panel, file, "position_labels.panel"),
      vertical: labelMap(positions.vertical, file, "position_labels.vertical"),
      horizontal: labelMap(positions.horizontal, file, "position_labels.horizontal"),
    },
    mermaid: {
      hide_paths: stringList(mermaid.hide_paths, file, "mermaid.hide_paths"),
      filter_vendors: stringList(mermaid.filter_vendors, file, "mermaid.filter_vendors").map((s) => s.toLowerCase()),
      collapse_single_child_hubs: mermaid.collapse_single_child_hubs === true,
    },
  };
}

export function userConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && xdg.trim().length > 0 ? xdg : path.join(os.homedir(), ".config");
  return path.join(base, "usbbw");
}

export function userConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(userConfigDir(env), "config.yaml");
}

export function configSearchPaths(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  return [path.join(cwd, "usbbw.yaml"), userConfigPath(env), "/etc/usbbw.yaml"];
}

export function loadConfigFile(file: string): LabelConfig {
  return parseLabelConfig(loadConfigLayers(file), file);
}

/** Explicit path, else the first config found on the search path, else defaults. */
export function loadConfig(explicit?: string, searchPaths: string[] = configSearchPaths()): LoadedConfig {
  if (explicit) return { config: loadConfigFile(explicit), file: explicit };
  const found = searchPaths.find((p) => fs.existsSync(p));
  if (!found) return { config: defaultLabelConfig() };
  return { config: loadConfigFile(found), file: found };
}

export function loadConfigOrDefault(
  explicit?: string,
  report: (msg: string) => void = (msg) => console.error(msg),
  searchPaths?: string[],
): LoadedConfig {
  try {
    return loadConfig(explicit, searchPaths);
  } catch (e) {
    if (!isUsbbwError(e)) throw e;
    report(`error: ${describeError(e)}; continuing with the default configuration`);
    return { config: defaultLabelConfig() };
  }
}
