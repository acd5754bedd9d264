import { describe, expect, it } from "vitest";
import { compareDevicePaths, comparePathStrings, formatDevicePath, parentPath, parseDevicePath, pathDepth } from "./device_path.js";
import { isUsbbwError } from "./errors.js";

describe("device paths", () => {
  it("parses bus and port chain", () => {
    expect(parseDevicePath("3-2.1.4")).toEqual({ bus: 3, ports: [2, 1, 4] });
    expect(formatDevicePath(parseDevicePath("10-1"))).toBe("10-1");
  });

  it("rejects root hubs, interfaces and zero ports", () => {
    for (const bad of ["usb1", "1-1:1.0", "1-", "0-1", "1-0.2", "1-1..2"]) {
      try {
        parseDevicePath(bad);
        expect.unreachable(bad);
      } catch (e) {
        expect(isUsbbwError(e, "InvalidPath")).toBe(true);
      }
    }
  });

  it("finds the parent hub", () => {
    expect(parentPath(parseDevicePath("1-1"))).toBeUndefined();
    const parent = parentPath(parseDevicePath("1-4.3.2"));
    expect(parent && formatDevicePath(parent)).toBe("1-4.3");
    expect(pathDepth(parseDevicePath("1-4.3.2"))).toBe(2);
  });

  it("orders numerically with parents first", () => {
    const paths = ["2-1", "1-10", "1-2.1", "1-2", "1-9"];
    expect([...paths].sort(comparePathStrings)).toEqual(["1-2", "1-2.1", "1-9", "1-10", "2-1"]);
    expect(compareDevicePaths(parseDevicePath("1-2"), parseDevicePath("1-2"))).toBe(0);
  });
});
