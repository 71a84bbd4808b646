import { describe, expect, it } from "vitest";
import { buildDevice, createDeviceRegistry, MAX_ACTIVE_DEVICES } from "../src/device-registry.js";
import { ConfigurationError } from "../src/errors.js";
import { deviceRecord } from "./fakes.js";

describe("buildDevice", () => {
  it("turns a record into typed tags with numeric offsets", () => {
    const device = buildDevice({
      name: "Chamber",
      ip: "10.10.10.10",
      swapped: 1,
      tags: [
        { label: "Temp", register: "d0002", type: "f" },
        { label: "Alarm", register: "M8125", type: "bit" },
        { label: "Count", register: "D2000", type: "W" },
      ],
    });

    expect(device).toEqual({
      name: "Chamber",
      address: "10.10.10.10",
      byteOrderSwapped: true,
      tags: [
        { label: "Temp", register: "D0002", area: "D", offset: 2, type: "float" },
        { label: "Alarm", register: "M8125", area: "M", offset: 8125, type: "bit" },
        { label: "Count", register: "D2000", area: "D", offset: 2000, type: "word" },
      ],
    });
    expect(Object.isFrozen(device)).toBe(true);
    expect(Object.isFrozen(device.tags)).toBe(true);
  });

  it("defaults the byte-order flag to off", () => {
    const device = buildDevice({ name: "A", ip: "10.0.0.1", tags: [{ label: "x", register: "D0001", type: "W" }] });
    expect(device.byteOrderSwapped).toBe(false);
  });

  it.each([
    ["a name with spaces", { name: "Line 1" }, "Line 1: name: name must be 1-20 letters, digits or underscores"],
    ["a name over 20 characters", { name: "A".repeat(21) }, `${"A".repeat(21)}: name: name must be 1-20 letters, digits or underscores`],
    ["a bad address", { ip: "10.0.0.256" }, "Line_1: ip: ip must be an IPv4 address"],
    ["no tags", { tags: [] }, "Line_1: tags: at least one tag is required"],
    ["a bad register", { tags: [{ label: "T", register: "X0001", type: "F" }] }, "Line_1: tags.0.register: register must look like D0002 or M0100"],
    ["a short register", { tags: [{ label: "T", register: "D12", type: "F" }] }, "Line_1: tags.0.register: register must look like D0002 or M0100"],
    ["an unknown type", { tags: [{ label: "T", register: "D0001", type: "S" }] }, "Line_1: tags.0.type: type must be B, W or F"],
    ["a bit tag on a D register", { tags: [{ label: "Run", register: "D0001", type: "B" }] }, 'Line_1: bit tag "Run" must read from M registers, got D0001'],
    ["a float tag on an M relay", { tags: [{ label: "T", register: "M0001", type: "F" }] }, 'Line_1: float tag "T" must read from D registers, got M0001'],
  ])("rejects %s", (_, patch, message) => {
    const base = { name: "Line_1", ip: "10.0.0.1", tags: [{ label: "T", register: "D0001", type: "F" }] };
    expect(() => buildDevice({ ...base, ...patch })).toThrowError(message);
  });

  it("rejects duplicate labels within one device", () => {
    expect(() => buildDevice(deviceRecord("A", "10.0.0.1", [["T", "D0001", "F"], ["T", "D0003", "F"]]))).toThrow(
      'A: duplicate tag label "T"',
    );
  });

  it("names unnamed records by position", () => {
    const registry = createDeviceRegistry([
      deviceRecord("A", "10.0.0.1", [["T", "D0001", "F"]]),
      deviceRecord("B", "10.0.0.2", [["T", "D0001", "F"]]),
      { ip: "10.0.0.3", tags: [] },
    ]);
    expect(registry.rejected).toHaveLength(1);
    expect(registry.rejected[0]).toBeInstanceOf(ConfigurationError);
    expect(registry.rejected[0].device).toBe("device #3");
  });
});

describe("createDeviceRegistry", () => {
  it("skips invalid devices but keeps the rest in order", () => {
    const registry = createDeviceRegistry([
      deviceRecord("A", "10.0.0.1", [["T", "D0001", "F"]]),
      deviceRecord("B", "not-an-ip", [["T", "D0001", "F"]]),
      deviceRecord("C", "10.0.0.3", [["T", "D0001", "F"]]),
    ]);
    expect(registry.devices.map((d) => d.name)).toEqual(["A", "C"]);
    expect(registry.rejected.map((e) => e.device)).toEqual(["B"]);
  });

  it("rejects a second device with the same name", () => {
    const registry = createDeviceRegistry([
      deviceRecord("A", "10.0.0.1", [["T", "D0001", "F"]]),
      deviceRecord("A", "10.0.0.2", [["T", "D0001", "F"]]),
    ]);
    expect(registry.devices.map((d) => d.address)).toEqual(["10.0.0.1"]);
    expect(registry.rejected[0].message).toBe("A: duplicate device name");
  });

  it("activates only the first five valid devices", () => {
    const records = Array.from({ length: 7 }, (_, i) => deviceRecord(`P${i}`, `10.0.0.${i + 1}`, [["T", "D0001", "W"]]));
    const registry = createDeviceRegistry(records);
    expect(MAX_ACTIVE_DEVICES).toBe(5);
    expect(registry.active.map((d) => d.name)).toEqual(["P0", "P1", "P2", "P3", "P4"]);
    expect(registry.skipped.map((d) => d.name)).toEqual(["P5", "P6"]);
  });

  it("finds devices by name, case-insensitive name or address", () => {
    const registry = createDeviceRegistry([deviceRecord("Logger", "10.10.10.57", [["T", "D0002", "F"]])]);
    expect(registry.find("Logger")?.address).toBe("10.10.10.57");
    expect(registry.find("logger")?.address).toBe("10.10.10.57");
    expect(registry.find("10.10.10.57")?.name).toBe("Logger");
    expect(registry.find("nope")).toBeUndefined();
  });

  it("lists distinct tag labels across active devices in code point order", () => {
    const registry = createDeviceRegistry([
      deviceRecord("A", "10.0.0.1", [["Temp", "D0001", "F"], ["Level", "D0003", "W"]]),
      deviceRecord("B", "10.0.0.2", [["Temp", "D0001", "F"], ["Alarm", "M0001", "B"]]),
    ]);
    expect(registry.tagLabels()).toEqual(["Alarm", "Level", "Temp"]);
  });
});
