import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { Device, Sample } from "./schema.js";
import { isoFromMs, localDateStamp } from "./util.js";

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function csvRow(fields: string[]): string {
  return fields.map(csvField).join(",") + "\n";
}

// One file per device per local day; the header goes in when the file is created.
export class CsvLogger {
  constructor(private dir: string, private logger: Logger = createLogger("csv")) {
    mkdirSync(dir, { recursive: true });
  }

  fileFor(device: Pick<Device, "name">, timestamp: number): string {
    return join(this.dir, `${device.name}_${localDateStamp(timestamp)}.csv`);
  }

  record(device: Device, timestamp: number, samples: Map<string, Sample>) {
    const path = this.fileFor(device, timestamp);
    const row = [isoFromMs(timestamp)];
    for (const tag of device.tags) {
      const value = samples.get(tag.label)?.value ?? null;
      row.push(value === null ? "" : String(value));
    }
    try {
      if (!existsSync(path)) {
        writeFileSync(path, csvRow(["timestamp", ...device.tags.map((t) => t.label)]));
      }
      appendFileSync(path, csvRow(row));
    } catch (err) {
      this.logger.warn(`Error writing ${path}: ${errorMessage(err)}`);
    }
  }
}
