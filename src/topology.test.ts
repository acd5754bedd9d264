import { describe, expect, it } from "vitest";
import { rawBus, rawDevice, rawEndpoint, rawHub, sampleSource } from "./test_support.js";
import {
  buildTopology,
  busesSorted,
  configKey,
  controllerForBus,
  devicesInTreeOrder,
  getBus,
  getDevice,
  getPairedBus,
  isConfiguredValue,
  parseMaxPower,
  totalPowerMa,
  vidPid,
} from "./topology.js";

describe("buildTopology", () => {
  const { topology: t, warnings } = buildTopology(sampleSource());

  it("builds buses in order with their controller", () => {
    expect(warnings).toEqual([]);
    expect(busesSorted(t).map((b) => b.busNum)).toEqual([1, 2]);
    expect(t.controllers).toEqual([{ id: "0000:00:14.0", pciAddress: "0000:00:14.0", usb2Bus: 1, usb3Bus: 2 }]);
    expect(controllerForBus(t, 2)?.id).toBe("0000:00:14.0");
  });

  it("links hubs to their children", () => {
    const bus1 = getBus(t, 1);
    expect(bus1?.devices).toEqual(["1-1", "1-2", "1-3"]);
    expect(getDevice(t, "1-1")?.children).toEqual(["1-1.2"]);
    expect(getDevice(t, "1-1.2")?.parent).toBe("1-1");
    expect(getDevice(t, "1-1")?.isHub).toBe(true);
    expect(getDevice(t, "1-1")?.numPorts).toBe(4);
  });

  it("walks devices depth first", () => {
    const bus1 = getBus(t, 1);
    expect(bus1 && devicesInTreeOrder(t, bus1).map((d) => d.path)).toEqual(["1-1", "1-1.2", "1-2", "1-3"]);
    expect(bus1 && totalPowerMa(t, bus1)).toBe(690);
  });

  it("pairs odd and even buses of one controller", () => {
    expect(getPairedBus(t, 1)?.busNum).toBe(2);
    expect(getPairedBus(t, 2)?.busNum).toBe(1);
  });

  it("starts every pool empty until allocation", () => {
    expect(t.buses.map((b) => b.pool.usedBps)).toEqual([0, 0]);
  });

  it("derives identifiers", () => {
    const cam = getDevice(t, "1-2");
    expect(cam && vidPid(cam)).toBe("0c45:6366");
    expect(cam && configKey(cam)).toBe("0c45:6366:SN1");
    const kbd = getDevice(t, "1-1.2");
    expect(kbd && configKey(kbd)).toBe("046d:c31c");
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(t)).toBe(true);
    expect(Object.isFrozen(t.buses[0])).toBe(true);
    expect(Object.isFrozen(getDevice(t, "1-1")?.children)).toBe(true);
  });
});

describe("malformed input", () => {
  it("drops a device with a bad endpoint and keeps its siblings", () => {
    const { topology, warnings } = buildTopology({
      buses: [rawBus(1, "480")],
      devices: [rawDevice("1-1", { endpoints: [rawEndpoint("Bogus", "81", "0008", "01")] }), rawDevice("1-2")],
    });
    expect([...topology.devices.keys()]).toEqual(["1-2"]);
    expect(warnings.map((w) => [w.kind, w.path])).toEqual([["InvalidEndpoint", "1-1"]]);
  });

  it("drops orphans, duplicates and devices on missing buses", () => {
    const { topology, warnings } = buildTopology({
      buses: [rawBus(1, "480")],
      devices: [rawHub("1-1"), rawDevice("1-1"), rawDevice("1-3.1"), rawDevice("3-1")],
    });
    expect([...topology.devices.keys()]).toEqual(["1-1"]);
    expect(warnings.map((w) => [w.kind, w.path, w.message])).toEqual([
      ["MalformedDevice", "1-1", "duplicate device path"],
      ["MalformedDevice", "1-3.1", "parent hub 1-3 not present"],
      ["MalformedDevice", "3-1", "bus 3 not present"],
    ]);
  });

  it("reports bad ids, speeds and paths", () => {
    const { warnings } = buildTopology({
      buses: [rawBus(1, "480"), rawBus(3, "7")],
      devices: [rawDevice("1-1", { idVendor: "xyz" }), rawDevice("1-2", { speed: "3" }), rawDevice("1-a")],
    });
    expect(warnings.map((w) => w.kind)).toEqual(["MalformedDevice", "MalformedDevice", "MalformedDevice", "InvalidPath"]);
    expect(warnings[0].path).toBe("usb3");
  });

  it("falls back to a pair id when the controller is unknown", () => {
    const { topology } = buildTopology({ buses: [rawBus(3, "480"), rawBus(4, "10000")], devices: [] });
    expect(topology.controllers).toEqual([{ id: "usb3+4", pciAddress: undefined, usb2Bus: 3, usb3Bus: 4 }]);
    expect(getPairedBus(topology, 3)?.busNum).toBe(4);
  });
});

describe("attribute parsing", () => {
  it("treats 0, empty and absent configuration values as unconfigured", () => {
    expect(isConfiguredValue(undefined)).toBe(false);
    expect(isConfiguredValue("")).toBe(false);
    expect(isConfiguredValue("0")).toBe(false);
    expect(isConfiguredValue("1")).toBe(true);
  });

  it("reads bMaxPower with or without the unit", () => {
    expect(parseMaxPower("500mA")).toBe(500);
    expect(parseMaxPower("100")).toBe(100);
    expect(parseMaxPower("lots")).toBeUndefined();
  });
});
