import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadConfigFile } from "../src/config.js";
import { createDeviceRegistry } from "../src/device-registry.js";
import { RegisterReader } from "../src/register-reader.js";
import { createSimulatedDriver, decodeWithWordsExchanged } from "../src/sim-driver.js";
import { captureLogger } from "./fakes.js";

const NOW = 1_700_000_123_000;

describe("simulated driver", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("produces plausible floats in the default word order", async () => {
    const handle = await createSimulatedDriver().connect("10.0.0.1");
    const value = await handle.readFloat(2, false);
    expect(value).toBeGreaterThan(14);
    expect(value).toBeLessThan(28);
  });

  it("decodes garbage when the word order is wrong", () => {
    // 1.0 is 0x3F800000; exchanged it becomes 0x00003F80, a denormal
    const garbage = decodeWithWordsExchanged(1);
    expect(garbage).toBeGreaterThan(0);
    expect(garbage).toBeLessThan(1e-38);
  });

  it("counts words with the clock and toggles bits every ten seconds", async () => {
    const handle = await createSimulatedDriver().connect("10.0.0.1");
    expect(await handle.readWord(5)).toBe((1_700_000_123 + 5) & 0xffff);
    expect(await handle.readBits(0)).toBe(Math.floor(1_700_000_123 / 10) % 2 === 0);
  });

  it("reads contiguous blocks the way single reads do", async () => {
    const handle = await createSimulatedDriver().connect("10.0.0.1");
    expect(await handle.readWordsBlock?.(5, 3)).toEqual([5, 6, 7].map((o) => (1_700_000_123 + o) & 0xffff));
    expect(await handle.readBitsBlock?.(0, 2)).toEqual([await handle.readBits(0), await handle.readBits(1)]);
    const floats = await handle.readFloatsBlock?.(2, 2, false);
    expect(floats).toHaveLength(2);
    for (const v of floats ?? []) {
      expect(v).toBeGreaterThan(14);
      expect(v).toBeLessThan(30);
    }
  });

  it("refuses connections to offline addresses", async () => {
    const driver = createSimulatedDriver({ offline: ["10.0.0.9"] });
    await expect(driver.connect("10.0.0.9")).rejects.toThrow("connect ECONNREFUSED 10.0.0.9:2101");
  });

  it("gives plausible readings for every tag of the shipped example", async () => {
    const file = loadConfigFile(fileURLToPath(new URL("../../../docs/plc-trend.example.json", import.meta.url)));
    const registry = createDeviceRegistry(file.devices);
    const reader = new RegisterReader(createSimulatedDriver(), captureLogger().logger);

    for (let i = 0; i < 5; i += 1) {
      vi.setSystemTime(NOW + i * 7_000);
      for (const device of registry.active) {
        const samples = await reader.readDevice(device, NOW);
        for (const tag of device.tags) {
          const value = samples.get(tag.label)?.value;
          if (tag.type === "float") {
            expect(value).toBeGreaterThan(14);
            expect(value).toBeLessThan(36);
          } else if (tag.type === "bit") {
            expect([0, 1]).toContain(value);
          } else {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(0xffff);
          }
        }
      }
    }
    expect(reader.getCounters().reads_failed).toBe(0);
  });
});
