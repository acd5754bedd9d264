import { describe, expect, it } from "vitest";
import { UsageError, normalizeConfigKey, parseCli, parseRate } from "./cli_args.js";

describe("parseRate", () => {
  it("reads suffixed rates", () => {
    expect(parseRate("12M")).toBe(12_000_000);
    expect(parseRate("1.5k")).toBe(1500);
    expect(parseRate("640000bps")).toBe(640_000);
    expect(parseRate("2G")).toBe(2_000_000_000);
  });

  it("rejects junk", () => {
    expect(() => parseRate("fast")).toThrow(UsageError);
  });
});

describe("normalizeConfigKey", () => {
  it("lowercases the ids and keeps the serial", () => {
    expect(normalizeConfigKey("0C45:6366:AbC")).toBe("0c45:6366:AbC");
    expect(normalizeConfigKey("046D:C31C")).toBe("046d:c31c");
  });

  it("rejects other shapes", () => {
    expect(() => normalizeConfigKey("webcam")).toThrow("config key must look like");
  });
});

describe("parseCli", () => {
  it("defaults to the summary", () => {
    expect(parseCli([])).toEqual({ global: {}, command: { name: "summary" } });
  });

  it("takes global options anywhere", () => {
    const parsed = parseCli(["recommend", "--config", "a.yaml", "--required", "12M", "--speed", "high"]);
    expect(parsed.global).toEqual({ config: "a.yaml" });
    expect(parsed.command).toEqual({ name: "recommend", requiredBps: 12_000_000, speed: "high" });
  });

  it("parses command flags", () => {
    expect(parseCli(["list", "-v"]).command).toEqual({ name: "list", periodicOnly: false, verbose: true });
    expect(parseCli(["mermaid", "--markdown", "-o", "t.md"]).command).toEqual({ name: "mermaid", markdown: true, html: false, output: "t.md" });
    expect(parseCli(["mermaid", "--html"]).command).toEqual({ name: "mermaid", markdown: false, html: true });
    expect(parseCli(["diagram", "t.svg", "t.json"]).command).toEqual({ name: "diagram", svg: "t.svg", json: "t.json" });
    expect(parseCli(["watch", "--interval", "250", "--count", "3"]).command).toEqual({ name: "watch", intervalMs: 250, count: 3 });
    expect(parseCli(["set-label", "0BDA:9210", "SSD"]).command).toEqual({ name: "set-label", configKey: "0bda:9210", label: "SSD" });
  });

  it("answers help", () => {
    expect(parseCli(["list", "--help"]).command).toEqual({ name: "help" });
    expect(parseCli(["help"]).command).toEqual({ name: "help" });
  });

  it("reports usage mistakes", () => {
    expect(() => parseCli(["frob"])).toThrow("unknown command 'frob'");
    expect(() => parseCli(["mermaid", "--bogus"])).toThrow("unknown option '--bogus' for mermaid");
    expect(() => parseCli(["mermaid", "--markdown", "--html"])).toThrow("--markdown and --html cannot be combined");
    expect(() => parseCli(["diagram"])).toThrow("diagram needs an output .svg path");
    expect(() => parseCli(["watch", "--count", "0"])).toThrow("--count expects a positive integer, got '0'");
    expect(() => parseCli(["recommend", "--speed", "warp"])).toThrow("unknown speed 'warp'");
    expect(() => parseCli(["--config"])).toThrow("--config needs a value");
  });
});
