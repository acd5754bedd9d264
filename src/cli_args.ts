import { type Speed, isSpeed } from "./speed.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type GlobalOptions = {
  config?: string;
  sysfs?: string;
};

export type Command =
  | { name: "summary" }
  | { name: "list"; periodicOnly: boolean; verbose: boolean }
  | { name: "recommend"; requiredBps: number; speed?: Speed }
  | { name: "mermaid"; markdown: boolean; html: boolean; output?: string }
  | { name: "diagram"; svg: string; json?: string }
  | { name: "graphml"; output?: string }
  | { name: "init-config" }
  | { name: "generate-config"; output?: string }
  | { name: "set-label"; configKey: string; label: string }
  | { name: "watch"; intervalMs?: number; count?: number }
  | { name: "help" };

export type ParsedCli = {
  global: GlobalOptions;
  command: Command;
};

export const usage = `Usage: usbbw [--config FILE] [--sysfs DIR] <command>

Commands:
  summary                         per-bus periodic bandwidth (default)
  list [--periodic-only] [--verbose]
                                  device tree per bus
  recommend [--required RATE] [--speed NAME]
                                  buses with the most periodic bandwidth left
  mermaid [--markdown | --html] [-o FILE]
                                  Mermaid flowchart (or Markdown report, or HTML page)
  diagram <out.svg> [out.json]    laid-out SVG diagram
  graphml [-o FILE]               GraphML export
  init-config                     print an example configuration
  generate-config [-o FILE]       configuration scaffold from this system
  set-label <config_key> <label>  store a product label in the user config
  watch [--interval MS] [--count N]
                                  refresh periodically and print changes
`;

const rateRe = /^(\d+(?:\.\d+)?)\s*([kmg]?)(?:bps)?$/i;
const scale: Record<string, number> = { "": 1, k: 1e3, m: 1e6, g: 1e9 };

/** "12M", "1.5k", "640000" → bits per second. */
export function parseRate(raw: string): number {
  const m = rateRe.exec(raw.trim());
  if (!m) throw new UsageError(`invalid rate '${raw}'`);
  return Number(m[1]) * scale[m[2].toLowerCase()];
}

// vid:pid are hex and case-insensitive; a serial is kept as written.
export function normalizeConfigKey(raw: string): string {
  const m = /^([0-9a-fA-F]{4}):([0-9a-fA-F]{4})(:.*)?$/.exec(raw);
  if (!m) throw new UsageError(`config key must look like vvvv:pppp or vvvv:pppp:serial, got '${raw}'`);
  return `${m[1].toLowerCase()}:${m[2].toLowerCase()}${m[3] ?? ""}`;
}

function parseCount(raw: string, flag: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new UsageError(`${flag} expects a positive integer, got '${raw}'`);
  return n;
}

class ArgReader {
  private i = 0;

  constructor(private readonly args: string[]) {}

  done(): boolean {
    return this.i >= this.args.length;
  }

  next(): string {
    const v = this.args[this.i];
    this.i += 1;
    return v;
  }

  value(flag: string): string {
    if (this.done()) throw new UsageError(`${flag} needs a value`);
    return this.next();
  }
}

export function parseCli(argv: string[]): ParsedCli {
  const global: GlobalOptions = {};
  const rest: string[] = [];
  const r = new ArgReader(argv);
  while (!r.done()) {
    const a = r.next();
    if (a === "--config") global.config = r.value(a);
    else if (a === "--sysfs") global.sysfs = r.value(a);
    else if (a === "-h" || a === "--help") return { global, command: { name: "help" } };
    else rest.push(a);
  }
  const [name = "summary", ...args] = rest;
  return { global, command: parseCommand(name, args) };
}

function parseCommand(name: string, args: string[]): Command {
  const r = new ArgReader(args);
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  const valued = new Set(["-o", "--output", "--required", "--speed", "--interval", "--count"]);
  while (!r.done()) {
    const a = r.next();
    if (valued.has(a)) flags.set(a, r.value(a));
    else if (a.startsWith("-") && a.length > 1) flags.set(a, true);
    else positional.push(a);
  }
  const str = (...keys: string[]): string | undefined => {
    for (const k of keys) {
      const v = flags.get(k);
      if (typeof v === "string") return v;
    }
    return undefined;
  };
  const allow = (known: string[], maxPositional: number): void => {
    for (const k of flags.keys()) {
      if (!known.includes(k)) throw new UsageError(`unknown option '${k}' for ${name}`);
    }
    if (positional.length > maxPositional) throw new UsageError(`unexpected argument '${positional[maxPositional]}'`);
  };

  switch (name) {
    case "summary":
      allow([], 0);
      return { name: "summary" };
    case "init-config":
      allow([], 0);
      return { name: "init-config" };
    case "help":
      return { name: "help" };
    case "list":
      allow(["--periodic-only", "--verbose", "-v"], 0);
      return { name, periodicOnly: flags.has("--periodic-only"), verbose: flags.has("--verbose") || flags.has("-v") };
    case "recommend": {
      allow(["--required", "--speed"], 0);
      const req = str("--required");
      const rawSpeed = str("--speed");
      let speed: Speed | undefined;
      if (rawSpeed !== undefined) {
        if (!isSpeed(rawSpeed)) throw new UsageError(`unknown speed '${rawSpeed}'`);
        speed = rawSpeed;
      }
      return { name, requiredBps: req === undefined ? 0 : parseRate(req), speed };
    }
    case "mermaid":
      allow(["--markdown", "--html", "-o", "--output"], 0);
      if (flags.has("--markdown") && flags.has("--html")) throw new UsageError("--markdown and --html cannot be combined");
      return { name, markdown: flags.has("--markdown"), html: flags.has("--html"), output: str("-o", "--output") };
    case "diagram":
      allow([], 2);
      if (positional.length === 0) throw new UsageError("diagram needs an output .svg path");
      return { name, svg: positional[0], json: positional[1] };
    case "graphml":
      allow(["-o", "--output"], 0);
      return { name: "graphml", output: str("-o", "--output") };
    case "generate-config":
      allow(["-o", "--output"], 0);
      return { name: "generate-config", output: str("-o", "--output") };
    case "set-label":
      allow([], 2);
      if (positional.length < 2) throw new UsageError("set-label needs <config_key> <label>");
      return { name, configKey: normalizeConfigKey(positional[0]), label: positional[1] };
    case "watch": {
      allow(["--interval", "--count"], 0);
      const interval = str("--interval");
      const count = str("--count");
      return {
        name,
        intervalMs: interval === undefined ? undefined : parseCount(interval, "--interval"),
        count: count === undefined ? undefined : parseCount(count, "--count"),
      };
    }
    default:
      throw new UsageError(`unknown command '${name}'`);
  }
}
