import type { PlcDriver, PlcHandle } from "./plc-driver.js";
import { hashToUnit, nowMs, roundTo } from "./util.js";

export type SimulatedDriverOptions = {
  offline?: string[];
};

// Synthetic plant: slow sine drift plus a little noise per register, phase keyed
// on address and offset so every tag draws its own curve.
class SimulatedHandle implements PlcHandle {
  constructor(private address: string) {}

  private phase(offset: number): number {
    return hashToUnit(`${this.address}:${offset}`) * Math.PI * 2;
  }

  async readFloat(offset: number, swapped: boolean): Promise<number> {
    const t = nowMs() / 1000;
    const base = 20 + (offset % 50);
    const drift = Math.sin(t / 30 + this.phase(offset)) * 5;
    const noise = (Math.random() - 0.5) * 0.4;
    const value = base + drift + noise;
    return swapped ? decodeWithWordsExchanged(value) : roundTo(value, 3);
  }

  async readWord(offset: number): Promise<number> {
    const t = Math.floor(nowMs() / 1000);
    return (t + offset) & 0xffff;
  }

  async readBits(offset: number): Promise<boolean> {
    const t = Math.floor(nowMs() / 1000);
    return Math.floor((t + offset) / 10) % 2 === 0;
  }

  async readFloatsBlock(offset: number, count: number, swapped: boolean): Promise<number[]> {
    const values: number[] = [];
    for (let i = 0; i < count; i += 1) values.push(await this.readFloat(offset + i * 2, swapped));
    return values;
  }

  async readWordsBlock(offset: number, count: number): Promise<number[]> {
    const values: number[] = [];
    for (let i = 0; i < count; i += 1) values.push(await this.readWord(offset + i));
    return values;
  }

  async readBitsBlock(offset: number, count: number): Promise<boolean[]> {
    const values: boolean[] = [];
    for (let i = 0; i < count; i += 1) values.push(await this.readBits(offset + i));
    return values;
  }

  close() {}
}

// The simulated controller stores floats low word first, the FC6A default.
// Reading them with the words exchanged gives what a wrong swapped flag gives.
export function decodeWithWordsExchanged(value: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value);
  const hi = view.getUint16(0);
  const lo = view.getUint16(2);
  view.setUint16(0, lo);
  view.setUint16(2, hi);
  return view.getFloat32(0);
}

export function createSimulatedDriver(options: SimulatedDriverOptions = {}): PlcDriver {
  const offline = new Set(options.offline ?? []);
  return {
    name: "sim",
    async connect(address: string) {
      if (offline.has(address)) throw new Error(`connect ECONNREFUSED ${address}:2101`);
      return new SimulatedHandle(address);
    },
  };
}
