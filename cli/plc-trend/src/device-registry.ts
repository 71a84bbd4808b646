import { DeviceRecordSchema, formatIssues, type TagRecord } from "./config.js";
import { ConfigurationError } from "./errors.js";
import type { Device, RegisterArea, Tag } from "./schema.js";
import { byCodePoint } from "./util.js";

export const MAX_ACTIVE_DEVICES = 5;

function recordName(raw: unknown): string | undefined {
  if (!raw || typeof raw !== "object" || !("name" in raw)) return undefined;
  const name = raw.name;
  return typeof name === "string" && name.trim() ? name.trim() : undefined;
}

// Bits live in the M relays, words and floats in the D registers.
export function buildTag(record: TagRecord, device?: string): Tag {
  const area: RegisterArea = record.register.startsWith("M") ? "M" : "D";
  const expected: RegisterArea = record.type === "bit" ? "M" : "D";
  if (area !== expected) {
    throw new ConfigurationError(`${record.type} tag "${record.label}" must read from ${expected} registers, got ${record.register}`, device);
  }
  return Object.freeze({
    label: record.label,
    register: record.register,
    area,
    offset: Number(record.register.slice(1)),
    type: record.type,
  });
}

export function buildDevice(raw: unknown, index = 0): Device {
  const label = recordName(raw) ?? `device #${index + 1}`;
  const parsed = DeviceRecordSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigurationError(formatIssues(parsed.error, "device"), label);

  const rec = parsed.data;
  const seen = new Set<string>();
  const tags: Tag[] = [];
  for (const t of rec.tags) {
    if (seen.has(t.label)) throw new ConfigurationError(`duplicate tag label "${t.label}"`, rec.name);
    seen.add(t.label);
    tags.push(buildTag(t, rec.name));
  }

  return Object.freeze({
    name: rec.name,
    address: rec.ip,
    byteOrderSwapped: rec.swapped,
    tags: Object.freeze(tags),
  });
}

export class DeviceRegistry {
  readonly devices: readonly Device[];
  readonly rejected: readonly ConfigurationError[];
  readonly maxActive: number;

  constructor(devices: Device[], rejected: ConfigurationError[] = [], maxActive = MAX_ACTIVE_DEVICES) {
    this.devices = Object.freeze([...devices]);
    this.rejected = Object.freeze([...rejected]);
    this.maxActive = maxActive;
  }

  get active(): readonly Device[] {
    return this.devices.slice(0, this.maxActive);
  }

  get skipped(): readonly Device[] {
    return this.devices.slice(this.maxActive);
  }

  find(nameOrAddress: string): Device | undefined {
    const key = nameOrAddress.trim();
    return (
      this.devices.find((d) => d.name === key) ??
      this.devices.find((d) => d.name.toLowerCase() === key.toLowerCase()) ??
      this.devices.find((d) => d.address === key)
    );
  }

  tagLabels(): string[] {
    const labels = new Set<string>();
    for (const device of this.active) {
      for (const tag of device.tags) labels.add(tag.label);
    }
    return Array.from(labels).sort(byCodePoint);
  }
}

// A bad record rejects that device only, as does reusing an earlier name.
export function createDeviceRegistry(records: readonly unknown[], maxActive = MAX_ACTIVE_DEVICES): DeviceRegistry {
  const devices: Device[] = [];
  const rejected: ConfigurationError[] = [];
  const names = new Set<string>();

  records.forEach((raw, index) => {
    try {
      const device = buildDevice(raw, index);
      if (names.has(device.name)) throw new ConfigurationError("duplicate device name", device.name);
      names.add(device.name);
      devices.push(device);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      rejected.push(err);
    }
  });

  return new DeviceRegistry(devices, rejected, maxActive);
}
