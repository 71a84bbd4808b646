import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CsvLogger, csvField } from "../src/csv-log.js";
import { buildDevice } from "../src/device-registry.js";
import type { Sample } from "../src/schema.js";
import { localDateStamp } from "../src/util.js";
import { captureLogger, deviceRecord } from "./fakes.js";

const device = buildDevice(deviceRecord("Oven_2", "10.0.0.8", [["Temp", "D0002", "F"], ["Door", "M0001", "B"]]));

function samples(t: number, temp: number | null, door: number | null) {
  return new Map<string, Sample>([
    ["Temp", { timestamp: t, value: temp }],
    ["Door", { timestamp: t, value: door }],
  ]);
}

describe("CsvLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plc-trend-csv-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the header once and appends one row per tick", () => {
    const csv = new CsvLogger(dir, captureLogger().logger);
    const t1 = Date.UTC(2024, 4, 1, 12, 0, 0);
    const t2 = t1 + 1000;

    csv.record(device, t1, samples(t1, 21.5, 1));
    csv.record(device, t2, samples(t2, null, 0));

    const path = join(dir, `Oven_2_${localDateStamp(t1)}.csv`);
    expect(csv.fileFor(device, t1)).toBe(path);
    expect(readFileSync(path, "utf8")).toBe(
      "timestamp,Temp,Door\n" +
        "2024-05-01T12:00:00.000Z,21.5,1\n" +
        "2024-05-01T12:00:01.000Z,,0\n",
    );
  });

  it("starts a new file when the local date changes", () => {
    const csv = new CsvLogger(dir, captureLogger().logger);
    const day1 = new Date(2024, 0, 1, 23, 59, 59).getTime();
    const day2 = new Date(2024, 0, 2, 0, 0, 1).getTime();

    csv.record(device, day1, samples(day1, 1, 1));
    csv.record(device, day2, samples(day2, 2, 0));

    expect(existsSync(join(dir, "Oven_2_2024-01-01.csv"))).toBe(true);
    expect(readFileSync(join(dir, "Oven_2_2024-01-02.csv"), "utf8").split("\n")[0]).toBe("timestamp,Temp,Door");
  });

  it("quotes fields that need it", () => {
    expect(csvField("plain")).toBe("plain");
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
  });
});
