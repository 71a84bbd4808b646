import type { Sample } from "./schema.js";
import { byCodePoint } from "./util.js";

export interface SeriesView {
  readonly capacity: number;
  timestamps(): number[];
  tagLabels(): string[];
  snapshotFor(tagLabel: string): Map<string, Sample[]>;
}

// A series never holds more entries than the shared timestamp buffer, so its
// values always line up with the buffer's tail.
export class TimeSeriesStore implements SeriesView {
  private stamps: number[] = [];
  private series = new Map<string, Map<string, Sample[]>>();

  constructor(readonly capacity = 3600) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  register(tagLabel: string, deviceName: string) {
    this.bucket(tagLabel, deviceName);
  }

  recordTick(timestamp: number): number {
    this.stamps.push(timestamp);
    trimFront(this.stamps, this.capacity);
    return this.stamps.length;
  }

  append(tagLabel: string, deviceName: string, sample: Sample) {
    const list = this.bucket(tagLabel, deviceName);
    list.push(sample);
    trimFront(list, this.stamps.length);
  }

  trimAll(maxLen: number) {
    const limit = Math.max(0, Math.floor(maxLen));
    trimFront(this.stamps, limit);
    for (const devices of this.series.values()) {
      for (const list of devices.values()) trimFront(list, limit);
    }
  }

  timestamps(): number[] {
    return [...this.stamps];
  }

  get tickCount(): number {
    return this.stamps.length;
  }

  tagLabels(): string[] {
    return Array.from(this.series.keys()).sort(byCodePoint);
  }

  seriesFor(tagLabel: string, deviceName: string): Sample[] {
    return [...(this.series.get(tagLabel)?.get(deviceName) ?? [])];
  }

  valuesFor(tagLabel: string, deviceName: string): Array<number | null> {
    return (this.series.get(tagLabel)?.get(deviceName) ?? []).map((s) => s.value);
  }

  snapshotFor(tagLabel: string): Map<string, Sample[]> {
    const out = new Map<string, Sample[]>();
    const devices = this.series.get(tagLabel);
    if (!devices) return out;
    for (const [device, list] of devices) out.set(device, [...list]);
    return out;
  }

  private bucket(tagLabel: string, deviceName: string): Sample[] {
    let devices = this.series.get(tagLabel);
    if (!devices) {
      devices = new Map();
      this.series.set(tagLabel, devices);
    }
    let list = devices.get(deviceName);
    if (!list) {
      list = [];
      devices.set(deviceName, list);
    }
    return list;
  }
}

function trimFront<T>(list: T[], max: number) {
  if (list.length > max) list.splice(0, list.length - max);
}
