import { fileURLToPath } from "node:url";
import { formatIssues, loadConfigFile, resolveSettings, TagRecordSchema } from "./config.js";
import { buildTag, createDeviceRegistry, MAX_ACTIVE_DEVICES } from "./device-registry.js";
import { ConfigurationError, PlcTrendError, errorMessage } from "./errors.js";
import { createMonitor, runMonitor } from "./monitor.js";
import { loadDriver, type PlcDriver } from "./plc-driver.js";
import { RegisterReader } from "./register-reader.js";
import type { Device } from "./schema.js";
import type { SimulatedDriverOptions } from "./sim-driver.js";
import { formatValue, type Writable } from "./terminal-renderer.js";

export type CliIo = {
  env: NodeJS.ProcessEnv;
  out: (line: string) => void;
  err: (line: string) => void;
  stdout?: Writable;
  signal?: AbortSignal;
  publicDir?: string;
  loadDriver?: (spec: string, sim: SimulatedDriverOptions) => Promise<PlcDriver>;
};

const BOOLEAN_FLAGS = new Set(["--quiet", "--swapped", "--help"]);

export function commandOf(args: string[]): string {
  return args[0] && !args[0].startsWith("--") ? args[0] : "run";
}

export function getArg(args: string[], flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

export function hasFlag(args: string[], flag: string) {
  return args.includes(flag);
}

// Words that are neither flags nor the value of a flag that takes one.
export function positional(args: string[], index: number): string | undefined {
  const list = args.filter((a, i) => {
    if (a.startsWith("--")) return false;
    const prev = i > 0 ? args[i - 1] : "";
    return !(prev.startsWith("--") && !BOOLEAN_FLAGS.has(prev));
  });
  return list[index];
}

const USAGE = `plc-trend <command> [options]

Commands:
  run [--config <path>] [--driver <module|sim>] [--interval <ms>] [--window <n>]
      [--csv-dir <dir>] [--port <port>] [--quiet]
  check [--config <path>]
  read <device|ip> <register> <B|W|F> [--count <n>] [--swapped] [--config <path>] [--driver <module|sim>]

Defaults:
  --config   plc-trend.json   (PLC_TREND_CONFIG)
  --driver   sim              (PLC_TREND_DRIVER)
  --interval 1000
  --window   3600
  --csv-dir  off              (PLC_TREND_CSV_DIR)
  --port     off              (PLC_TREND_PORT)

PLC_TREND_SIM_OFFLINE lists addresses the sim driver refuses, comma separated.
`;

function usage(io: CliIo, exitCode: number): number {
  io.out(USAGE);
  return exitCode;
}

function settingsArgs(args: string[]) {
  return {
    config: getArg(args, "--config"),
    driver: getArg(args, "--driver"),
    interval: getArg(args, "--interval"),
    window: getArg(args, "--window"),
    "csv-dir": getArg(args, "--csv-dir"),
    port: getArg(args, "--port"),
    quiet: hasFlag(args, "--quiet"),
  };
}

function driverFor(io: CliIo, spec: string, offline: string[]): Promise<PlcDriver> {
  const sim = { offline };
  return io.loadDriver ? io.loadDriver(spec, sim) : loadDriver(spec, undefined, sim);
}

function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return controller.signal;
}

async function cmdRun(args: string[], io: CliIo): Promise<number> {
  const initial = resolveSettings({ args: settingsArgs(args), env: io.env });
  const file = loadConfigFile(initial.configPath);
  const settings = resolveSettings({ args: settingsArgs(args), env: io.env, file });
  const driver = await driverFor(io, settings.driver, settings.simOffline);
  const monitor = createMonitor({
    settings,
    file,
    driver,
    publicDir: io.publicDir ?? fileURLToPath(new URL("../public/", import.meta.url)),
    out: io.stdout,
  });

  if (monitor.server) io.out(`plc-trend dashboard on http://localhost:${settings.port}`);
  await runMonitor(monitor, io.signal ?? interruptSignal());
  io.out("\nExiting gracefully.");
  return 0;
}

async function cmdCheck(args: string[], io: CliIo): Promise<number> {
  const settings = resolveSettings({ args: settingsArgs(args), env: io.env });
  const file = loadConfigFile(settings.configPath);
  const registry = createDeviceRegistry(file.devices);
  for (const device of registry.active) {
    io.out(`active   ${device.name.padEnd(20)} ${device.address.padEnd(15)} swapped=${device.byteOrderSwapped ? 1 : 0}`);
    for (const tag of device.tags) io.out(`           ${tag.label} ${tag.register} ${tag.type}`);
  }
  for (const device of registry.skipped) {
    io.out(`skipped  ${device.name.padEnd(20)} ${device.address.padEnd(15)} (only the first ${MAX_ACTIVE_DEVICES} are polled)`);
  }
  for (const err of registry.rejected) {
    io.out(`invalid  ${err.message}`);
  }
  if (registry.active.length === 0) {
    io.err("No valid devices configured");
    return 1;
  }
  io.out(`panels   ${registry.tagLabels().join(", ")}`);
  return 0;
}

function blockCount(args: string[]): number | undefined {
  const raw = getArg(args, "--count");
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError(`--count must be a positive integer, got "${raw}"`);
  return n;
}

async function cmdRead(args: string[], io: CliIo): Promise<number> {
  const target = positional(args, 1);
  const register = positional(args, 2);
  const type = positional(args, 3);
  if (!target || !register || !type) return usage(io, 1);

  const parsedTag = TagRecordSchema.safeParse({ label: register, register, type });
  if (!parsedTag.success) throw new ConfigurationError(formatIssues(parsedTag.error, "read"));
  const tag = buildTag({ ...parsedTag.data, label: parsedTag.data.register });
  const count = blockCount(args);
  const swapped = hasFlag(args, "--swapped");

  const settings = resolveSettings({ args: settingsArgs(args), env: io.env });
  let device: Device = { name: target, address: target, byteOrderSwapped: swapped, tags: [] };
  if (!/^\d{1,3}(\.\d{1,3}){3}$/.test(target)) {
    const file = loadConfigFile(settings.configPath);
    const known = createDeviceRegistry(file.devices).find(target);
    if (!known) throw new ConfigurationError(`unknown device "${target}"`);
    device = { ...known, byteOrderSwapped: swapped || known.byteOrderSwapped };
  }

  const reader = new RegisterReader(await driverFor(io, settings.driver, settings.simOffline));
  try {
    if (count === undefined) {
      io.out(formatValue(await reader.readOnce(device, tag)));
    } else {
      for (const reading of await reader.readBlock(device, tag, count)) {
        io.out(`${reading.register}  ${formatValue(reading.value)}`);
      }
    }
  } catch (err) {
    io.err(`Communication error: ${errorMessage(err)}`);
    return 2;
  }
  return 0;
}

export async function runCli(args: string[], io: CliIo): Promise<number> {
  const cmd = commandOf(args);
  if (hasFlag(args, "--help") || cmd === "help") return usage(io, 0);
  try {
    switch (cmd) {
      case "run":
        return await cmdRun(args, io);
      case "check":
        return await cmdCheck(args, io);
      case "read":
        return await cmdRead(args, io);
      default:
        return usage(io, 1);
    }
  } catch (err) {
    const prefix = err instanceof PlcTrendError ? "Error" : "Unexpected error";
    io.err(`${prefix}: ${errorMessage(err)}`);
    return 1;
  }
}
