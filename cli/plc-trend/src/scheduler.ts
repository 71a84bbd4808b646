import { setTimeout as delay } from "node:timers/promises";
import type { DeviceRegistry } from "./device-registry.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { Renderer } from "./renderer.js";
import type { Device, Sample } from "./schema.js";
import type { TimeSeriesStore } from "./series-store.js";
import { nowMs } from "./util.js";

export type SchedulerState = "idle" | "ticking" | "reading_all" | "rendering" | "sleeping" | "stopped";

export interface DeviceReader {
  readDevice(device: Device, timestamp: number): Promise<Map<string, Sample>>;
}

export interface TickSink {
  record(device: Device, timestamp: number, samples: Map<string, Sample>): void;
}

export type Sleeper = (ms: number, signal: AbortSignal) => Promise<unknown>;

export type SchedulerOptions = {
  registry: DeviceRegistry;
  reader: DeviceReader;
  store: TimeSeriesStore;
  renderers?: Renderer[];
  sinks?: TickSink[];
  intervalMs?: number;
  clock?: () => number;
  sleep?: Sleeper;
  logger?: Logger;
  onState?: (state: SchedulerState) => void;
};

const defaultSleep: Sleeper = (ms, signal) => delay(ms, undefined, { signal });

export class PollScheduler {
  readonly devices: readonly Device[];
  private state: SchedulerState = "idle";
  private ticks = 0;
  private lastTickAt: number | null = null;
  private controller = new AbortController();
  private renderers: Renderer[];
  private sinks: TickSink[];
  private intervalMs: number;
  private clock: () => number;
  private sleep: Sleeper;
  private logger: Logger;

  constructor(private options: SchedulerOptions) {
    this.devices = options.registry.active;
    this.renderers = options.renderers ?? [];
    this.sinks = options.sinks ?? [];
    this.intervalMs = options.intervalMs ?? 1000;
    this.clock = options.clock ?? nowMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger("scheduler");
    for (const device of this.devices) {
      for (const tag of device.tags) options.store.register(tag.label, device.name);
    }
  }

  getState(): SchedulerState {
    return this.state;
  }

  getTickCount(): number {
    return this.ticks;
  }

  getLastTickAt(): number | null {
    return this.lastTickAt;
  }

  async tick(): Promise<number> {
    const { store } = this.options;
    this.setState("ticking");
    const timestamp = this.clock();
    store.recordTick(timestamp);

    this.setState("reading_all");
    for (const device of this.devices) {
      const samples = await this.readDevice(device, timestamp);
      for (const tag of device.tags) {
        store.append(tag.label, device.name, samples.get(tag.label) ?? { timestamp, value: null });
      }
      for (const sink of this.sinks) {
        try {
          sink.record(device, timestamp, samples);
        } catch (err) {
          this.logger.warn(`Error recording ${device.name}: ${errorMessage(err)}`);
        }
      }
    }

    this.setState("rendering");
    for (const renderer of this.renderers) {
      try {
        await renderer.render(store);
      } catch (err) {
        this.logger.warn(`Error rendering ${renderer.name}: ${errorMessage(err)}`);
      }
    }

    this.ticks += 1;
    this.lastTickAt = timestamp;
    return timestamp;
  }

  // The pause is the full interval: the period is interval plus read and render time.
  async run(signal?: AbortSignal): Promise<void> {
    if (signal) {
      if (signal.aborted) this.controller.abort();
      else signal.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
    const stop = this.controller.signal;
    while (!stop.aborted) {
      await this.tick();
      if (stop.aborted) break;
      this.setState("sleeping");
      try {
        await this.sleep(this.intervalMs, stop);
      } catch (err) {
        if (stop.aborted) break;
        throw err;
      }
    }
    this.setState("stopped");
  }

  stop() {
    this.controller.abort();
  }

  private async readDevice(device: Device, timestamp: number): Promise<Map<string, Sample>> {
    try {
      return await this.options.reader.readDevice(device, timestamp);
    } catch (err) {
      this.logger.warn(`Error reading ${device.name}: ${errorMessage(err)}`);
      return new Map();
    }
  }

  private setState(next: SchedulerState) {
    this.state = next;
    this.options.onState?.(next);
  }
}
