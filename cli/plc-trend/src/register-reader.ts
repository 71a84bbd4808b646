import { ConnectionError, ReadError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PlcDriver, PlcHandle } from "./plc-driver.js";
import type { Device, Sample, Tag, TagType } from "./schema.js";
import { roundTo } from "./util.js";

export type ReadCounters = {
  reads_ok: number;
  reads_failed: number;
  connects_failed: number;
};

export type DeviceStatus = {
  name: string;
  address: string;
  connected: boolean;
  last_error: string | null;
  last_poll: number | null;
};

export type BlockReading = {
  register: string;
  value: number;
};

// Floats span two D registers, so consecutive floats sit two offsets apart.
const STRIDE: Record<TagType, number> = { float: 2, word: 1, bit: 1 };

function registerName(tag: Tag, offset: number): string {
  return `${tag.area}${String(offset).padStart(4, "0")}`;
}

function decode(raw: unknown, device: Device, tag: Tag, register: string): number {
  if (tag.type === "bit" && typeof raw === "boolean") return raw ? 1 : 0;
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new ReadError(device.name, tag.label, `non-numeric ${tag.type} value ${String(raw)} at ${register}`);
  }
  return tag.type === "float" ? roundTo(raw, 2) : raw;
}

// Polling reads never throw: a failure is logged and stored as a null sample.
export class RegisterReader {
  private counters: ReadCounters = { reads_ok: 0, reads_failed: 0, connects_failed: 0 };
  private status = new Map<string, DeviceStatus>();

  constructor(private driver: PlcDriver, private logger: Logger = createLogger("reader")) {}

  getCounters(): ReadCounters {
    return { ...this.counters };
  }

  getStatus(): DeviceStatus[] {
    return Array.from(this.status.values(), (s) => ({ ...s }));
  }

  async readTag(handle: PlcHandle, device: Device, tag: Tag, timestamp: number): Promise<Sample> {
    try {
      const value = await this.readValue(handle, device, tag);
      this.counters.reads_ok++;
      return { timestamp, value };
    } catch (err) {
      const failure = err instanceof ReadError ? err : new ReadError(device.name, tag.label, err);
      this.counters.reads_failed++;
      this.markStatus(device, true, failure.message, timestamp);
      this.logger.warn(`Error reading ${tag.label} from ${device.name}: ${failure.message}`);
      return { timestamp, value: null };
    }
  }

  async readDevice(device: Device, timestamp: number): Promise<Map<string, Sample>> {
    const samples = new Map<string, Sample>();
    let handle: PlcHandle;
    try {
      handle = await this.driver.connect(device.address);
    } catch (err) {
      const failure = new ConnectionError(device.name, device.address, err);
      this.counters.connects_failed++;
      this.markStatus(device, false, failure.message, timestamp);
      this.logger.warn(`Error connecting to ${device.name}: ${failure.message}`);
      for (const tag of device.tags) samples.set(tag.label, { timestamp, value: null });
      return samples;
    }

    this.markStatus(device, true, null, timestamp);
    try {
      for (const tag of device.tags) {
        samples.set(tag.label, await this.readTag(handle, device, tag, timestamp));
      }
    } finally {
      await this.closeQuietly(handle, device);
    }
    return samples;
  }

  // One-off queries throw instead of returning null.
  async readOnce(device: Device, tag: Tag): Promise<number> {
    return this.withHandle(device, tag, (handle) => this.readValue(handle, device, tag));
  }

  async readBlock(device: Device, tag: Tag, count: number): Promise<BlockReading[]> {
    return this.withHandle(device, tag, async (handle) => {
      const raw = await this.readRawBlock(handle, device, tag, count);
      if (raw.length !== count) throw new ReadError(device.name, tag.label, `expected ${count} values, got ${raw.length}`);
      return raw.map((value, i) => {
        const register = registerName(tag, tag.offset + i * STRIDE[tag.type]);
        return { register, value: decode(value, device, tag, register) };
      });
    });
  }

  private async withHandle<T>(device: Device, tag: Tag, read: (handle: PlcHandle) => Promise<T>): Promise<T> {
    let handle: PlcHandle;
    try {
      handle = await this.driver.connect(device.address);
    } catch (err) {
      throw new ConnectionError(device.name, device.address, err);
    }
    try {
      return await read(handle);
    } catch (err) {
      throw err instanceof ReadError ? err : new ReadError(device.name, tag.label, err);
    } finally {
      await this.closeQuietly(handle, device);
    }
  }

  private async readValue(handle: PlcHandle, device: Device, tag: Tag): Promise<number> {
    return decode(await this.readRaw(handle, device, tag, tag.offset), device, tag, tag.register);
  }

  private readRaw(handle: PlcHandle, device: Device, tag: Tag, offset: number): Promise<number | boolean> {
    switch (tag.type) {
      case "float":
        return handle.readFloat(offset, device.byteOrderSwapped);
      case "word":
        return handle.readWord(offset);
      case "bit":
        return handle.readBits(offset);
    }
  }

  private async readRawBlock(handle: PlcHandle, device: Device, tag: Tag, count: number): Promise<Array<number | boolean>> {
    if (tag.type === "float" && handle.readFloatsBlock) return handle.readFloatsBlock(tag.offset, count, device.byteOrderSwapped);
    if (tag.type === "word" && handle.readWordsBlock) return handle.readWordsBlock(tag.offset, count);
    if (tag.type === "bit" && handle.readBitsBlock) return handle.readBitsBlock(tag.offset, count);
    const values: Array<number | boolean> = [];
    for (let i = 0; i < count; i += 1) {
      values.push(await this.readRaw(handle, device, tag, tag.offset + i * STRIDE[tag.type]));
    }
    return values;
  }

  private async closeQuietly(handle: PlcHandle, device: Device) {
    if (!handle.close) return;
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn(`Error closing connection to ${device.name}: ${errorMessage(err)}`);
    }
  }

  private markStatus(device: Device, connected: boolean, error: string | null, timestamp: number) {
    const prev = this.status.get(device.name);
    this.status.set(device.name, {
      name: device.name,
      address: device.address,
      connected,
      last_error: error ?? (prev?.last_poll === timestamp ? prev.last_error : null),
      last_poll: timestamp,
    });
  }
}
