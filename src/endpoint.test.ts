import { describe, expect, it } from "vitest";
import {
  type Endpoint,
  decodeEndpoint,
  describeEndpoint,
  endpointBandwidthBps,
  intervalUsFromDescriptor,
  parseTransferType,
} from "./endpoint.js";
import { isUsbbwError } from "./errors.js";
import { rawEndpoint } from "./test_support.js";

function ep(fields: Partial<Endpoint>): Endpoint {
  return {
    address: 0x81,
    direction: "in",
    transferType: "interrupt",
    maxPacketSize: 64,
    intervalUs: 1000,
    ...fields,
  };
}

describe("endpointBandwidthBps", () => {
  it("is zero for control and bulk endpoints", () => {
    expect(endpointBandwidthBps(ep({ transferType: "control" }))).toBe(0);
    expect(endpointBandwidthBps(ep({ transferType: "bulk", maxPacketSize: 512, intervalUs: 125 }))).toBe(0);
  });

  it("scales packet bits by the service interval", () => {
    expect(endpointBandwidthBps(ep({}))).toBe(512_000);
    expect(endpointBandwidthBps(ep({ transferType: "isochronous", maxPacketSize: 1024, intervalUs: 125 }))).toBe(65_536_000);
  });

  it("decreases strictly as the interval grows", () => {
    const intervals = [125, 250, 1000, 8000, 32000];
    const rates = intervals.map((intervalUs) => endpointBandwidthBps(ep({ intervalUs })));
    for (let i = 1; i < rates.length; i += 1) {
      expect(rates[i]).toBeLessThan(rates[i - 1]);
    }
  });

  it("multiplies by the additional transactions of high-bandwidth endpoints", () => {
    expect(endpointBandwidthBps(ep({ maxPacketSize: 1024, intervalUs: 125, additionalTransactions: 2 }))).toBe(196_608_000);
  });

  it("rejects a non-positive interval", () => {
    expect(() => endpointBandwidthBps(ep({ intervalUs: 0 }))).toThrow(/interval must be positive/);
    try {
      endpointBandwidthBps(ep({ intervalUs: -5 }));
    } catch (e) {
      expect(isUsbbwError(e, "InvalidEndpoint")).toBe(true);
    }
  });
});

describe("intervalUsFromDescriptor", () => {
  it("counts frames at low and full speed", () => {
    expect(intervalUsFromDescriptor(10, "low")).toBe(10_000);
    expect(intervalUsFromDescriptor(1, "full")).toBe(1000);
    expect(intervalUsFromDescriptor(0, "full")).toBe(1000);
  });

  it("uses 2^(b-1) microframes at high speed and above", () => {
    expect(intervalUsFromDescriptor(1, "high")).toBe(125);
    expect(intervalUsFromDescriptor(4, "high")).toBe(1000);
    expect(intervalUsFromDescriptor(16, "super")).toBe(4_096_000);
    expect(intervalUsFromDescriptor(0, "high")).toBe(125);
  });
});

describe("decodeEndpoint", () => {
  it("decodes sysfs hex attributes", () => {
    const decoded = decodeEndpoint(rawEndpoint("Interrupt", "81", "0008", "0a"), "low");
    expect(decoded).toEqual({ address: 0x81, direction: "in", transferType: "interrupt", maxPacketSize: 8, intervalUs: 10_000 });
  });

  it("splits wMaxPacketSize into size and extra transactions at high speed", () => {
    const decoded = decodeEndpoint(rawEndpoint("Isoc", "82", "1400", "01"), "high");
    expect(decoded.maxPacketSize).toBe(1024);
    expect(decoded.additionalTransactions).toBe(2);
  });

  it("ignores the transaction bits outside high speed", () => {
    const decoded = decodeEndpoint(rawEndpoint("Isoc", "82", "1400", "01"), "super");
    expect(decoded.additionalTransactions).toBeUndefined();
  });

  it("reports the owning device for an unknown transfer type", () => {
    try {
      decodeEndpoint(rawEndpoint("Weird", "81", "0008", "01"), "high", "1-4");
      expect.unreachable();
    } catch (e) {
      expect(isUsbbwError(e, "InvalidEndpoint")).toBe(true);
      if (isUsbbwError(e)) expect(e.path).toBe("1-4");
    }
  });

  it("rejects a missing direction", () => {
    expect(() => decodeEndpoint({ type: "Bulk", bEndpointAddress: "02" }, "high")).toThrow(/unknown direction/);
  });
});

describe("formatting", () => {
  it("parses both isochronous spellings", () => {
    expect(parseTransferType("Isoc")).toBe("isochronous");
    expect(parseTransferType("Isochronous")).toBe("isochronous");
    expect(parseTransferType("bulk")).toBeUndefined();
  });

  it("describes an endpoint on one line", () => {
    expect(describeEndpoint(ep({ intervalUs: 8000 }))).toBe("EP81 Interrupt IN 64B @ 8ms");
    expect(describeEndpoint(ep({ address: 0x2, direction: "out", transferType: "isochronous", intervalUs: 125 }))).toBe(
      "EP02 Isochronous OUT 64B @ 125us",
    );
  });
});
