import type { ConfigFile, RuntimeSettings } from "./config.js";
import { CsvLogger } from "./csv-log.js";
import { createDeviceRegistry, type DeviceRegistry } from "./device-registry.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PlcDriver } from "./plc-driver.js";
import { RegisterReader } from "./register-reader.js";
import { assignColors, type Renderer } from "./renderer.js";
import { PollScheduler, type TickSink } from "./scheduler.js";
import { TimeSeriesStore } from "./series-store.js";
import { TrendServer } from "./server.js";
import { TerminalRenderer, type Writable } from "./terminal-renderer.js";

export type Monitor = {
  registry: DeviceRegistry;
  store: TimeSeriesStore;
  reader: RegisterReader;
  scheduler: PollScheduler;
  renderers: Renderer[];
  server?: TrendServer;
};

export type MonitorOptions = {
  settings: RuntimeSettings;
  file: ConfigFile;
  driver: PlcDriver;
  publicDir: string;
  out?: Writable;
  logger?: Logger;
};

export function createMonitor({ settings, file, driver, publicDir, out, logger = createLogger("monitor") }: MonitorOptions): Monitor {
  const registry = createDeviceRegistry(file.devices);
  for (const err of registry.rejected) logger.warn(`Skipping device ${err.message}`);
  if (registry.active.length === 0) throw new ConfigurationError("no valid devices configured");
  if (registry.skipped.length > 0) {
    logger.debug(`polling the first ${registry.maxActive} devices; not polled: ${registry.skipped.map((d) => d.name).join(", ")}`);
  }

  const colors = assignColors(registry.active);
  const store = new TimeSeriesStore(settings.window);
  const reader = new RegisterReader(driver);
  const renderers: Renderer[] = [];
  const sinks: TickSink[] = [];

  if (settings.terminal) renderers.push(new TerminalRenderer(colors, settings.title, out));

  let scheduler: PollScheduler | undefined;
  let server: TrendServer | undefined;
  if (settings.port !== undefined) {
    server = new TrendServer({
      port: settings.port,
      publicDir,
      title: settings.title,
      colors,
      status: () => ({
        driver: driver.name,
        state: scheduler?.getState() ?? "idle",
        ticks: scheduler?.getTickCount() ?? 0,
        last_tick_ms: scheduler?.getLastTickAt() ?? null,
        reads: reader.getCounters(),
        devices: reader.getStatus(),
      }),
    });
    renderers.push(server);
  }
  if (settings.csvDir) sinks.push(new CsvLogger(settings.csvDir));

  scheduler = new PollScheduler({
    registry,
    reader,
    store,
    renderers,
    sinks,
    intervalMs: settings.intervalMs,
  });

  return { registry, store, reader, scheduler, renderers, server };
}

export async function runMonitor(monitor: Monitor, signal: AbortSignal): Promise<void> {
  try {
    if (monitor.server) await monitor.server.start();
    await monitor.scheduler.run(signal);
  } finally {
    for (const renderer of monitor.renderers) await renderer.close?.();
  }
}
